/**
 * Fleetboard Types
 *
 * Shared domain types for categories, fleets, notification state and the
 * collaborators the engine consumes (policy provider, repository, transport).
 *
 * @module types
 */

// =============================================================================
// Category Policy
// =============================================================================

/** Sentinel ping target that notifies the whole server instead of roles */
export const PING_EVERYONE = 'everyone';

export type PingTarget = string; // role id or PING_EVERYONE

/**
 * Per-category configuration bundle. Read-only from the engine's perspective:
 * owned by configuration management and consumed as already validated.
 */
export interface CategoryPolicy {
  id: string;
  /** Organizational unit (Discord server) the category belongs to */
  scopeId: string;
  name: string;
  /** Minimum gap between two fleets of this category; 0 allows concurrent fleets */
  minSpacingMs: number;
  /** Furthest in the future a fleet may be scheduled at creation time */
  maxAdvanceMs: number;
  /** Lead time before form-up at which a reminder fires; absent means no reminder */
  reminderLeadMs?: number;
  viewerRoles: string[];
  creatorRoles: string[];
  managerRoles: string[];
  pingRoles: PingTarget[];
  /** Ordered channel ids receiving pings */
  destinations: string[];
  /** Categories in the same ping group share a spacing window */
  pingGroupId?: string;
}

export interface PingGroup {
  id: string;
  scopeId: string;
  name: string;
  cooldownMs: number;
}

// =============================================================================
// Fleet
// =============================================================================

export type FleetStatus = 'Scheduled' | 'ReminderSent' | 'FormingUp' | 'Cancelled';

/** Status as shown to viewers; Expired is derived, never persisted */
export type FleetViewStatus = FleetStatus | 'Expired';

/** Opaque descriptive fields defined by the category's ping format */
export type FleetDetails = Record<string, string>;

export type NotificationKind = 'create' | 'reminder' | 'formup' | 'update' | 'cancel';

export type DeliveryStatus = 'pending' | 'confirmed' | 'abandoned' | 'superseded';

/**
 * One outbound notification for one destination. The id doubles as the
 * transport nonce so a retried send is deduplicated by the transport.
 */
export interface Delivery {
  id: string;
  kind: NotificationKind;
  status: DeliveryStatus;
  /** Fleet revision when the delivery was enqueued */
  revision: number;
  attempts: number;
  createdAt: string;
  /** Earliest time the next attempt may run (backoff) */
  nextAttemptAt: string | null;
  lastError: string | null;
  confirmedAt: string | null;
  /** Message posted by this delivery, if it posted one */
  messageId: string | null;
  /** Form-up time shown before a reschedule (update deliveries only) */
  rescheduledFrom?: string;
}

export interface DestinationNotificationState {
  destination: string;
  /** Ping messages (create/reminder/formup) that updates and cancellation edit in place */
  messageIds: string[];
  /** Revision and form-up time every message in `messageIds` shows */
  renderedRevision: number;
  renderedFormUpTime: string | null;
  deliveries: Delivery[];
}

export interface Fleet {
  id: string;
  scopeId: string;
  categoryId: string;
  name: string;
  commanderId: string;
  formUpTime: string;
  status: FleetStatus;
  details: FleetDetails;
  /** Skip the creation ping; the first ping that fires announces the fleet */
  hidden: boolean;
  disableReminder: boolean;
  reminderEligible: boolean;
  /** Incremented on every detail edit or reschedule */
  revision: number;
  /** Optimistic concurrency counter, incremented on every save */
  version: number;
  createdAt: string;
  cancelledAt: string | null;
  cancelledBy: string | null;
  archivedAt: string | null;
  /** Destinations snapshotted from the category at creation */
  destinations: string[];
  notificationState: DestinationNotificationState[];
}

export interface FleetFilter {
  scopeId?: string;
  categoryId?: string;
  categoryIds?: string[];
}

// =============================================================================
// Summary
// =============================================================================

export interface SummaryState {
  destination: string;
  lastSummaryMessageId: string | null;
  publishedAt: string | null;
}

export interface SummaryDestination {
  id: string;
  scopeId: string;
  /** Roles known to the destination's audience */
  roles: string[];
}

// =============================================================================
// Collaborators
// =============================================================================

export interface CategoryPolicyProvider {
  getCategoryPolicy(categoryId: string): Promise<CategoryPolicy | null>;
  listCategoryPolicies(scopeId?: string): Promise<CategoryPolicy[]>;
  getPingGroup(pingGroupId: string): Promise<PingGroup | null>;
}

export interface FleetRepository {
  /** Fleets that are not archived, optionally filtered */
  loadActiveFleets(filter?: FleetFilter): Promise<Fleet[]>;
  loadFleet(id: string): Promise<Fleet | null>;
  /**
   * Persist a fleet. When expectedVersion is given and differs from the
   * stored version, the save is refused with a PersistenceError.
   */
  saveFleet(fleet: Fleet, expectedVersion?: number): Promise<Fleet>;
  loadSummaryState(destination: string): Promise<SummaryState | null>;
  saveSummaryState(state: SummaryState): Promise<void>;
}

export interface MessageEmbed {
  title: string;
  description?: string;
  color: number;
  fields?: Array<{ name: string; value: string; inline?: boolean }>;
  footer?: string;
  timestamp?: string;
  url?: string;
}

export interface OutboundMessage {
  content: string;
  embed?: MessageEmbed;
}

/** Edit payload; omitted parts of the message are left as they are */
export interface MessageEdit {
  content?: string;
  embed?: MessageEmbed;
}

export interface SendOptions {
  /** Roles to mention; an empty list posts silently */
  ping?: PingTarget[];
  /** Idempotency key; the same nonce never posts twice */
  nonce?: string;
  replyTo?: string;
}

export interface MessagingTransport {
  sendMessage(destination: string, message: OutboundMessage, options?: SendOptions): Promise<string>;
  editMessage(destination: string, messageId: string, edit: MessageEdit): Promise<void>;
  deleteMessage(destination: string, messageId: string): Promise<void>;
}

export interface DestinationDirectory {
  listSummaryDestinations(): Promise<SummaryDestination[]>;
}


// =============================================================================
// Logging
// =============================================================================

export interface Logger {
  debug?: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}
