export {
  NotificationDispatcher,
  type DispatcherConfig,
  type TickReport,
} from './dispatcher.js';
export {
  DEFAULT_BACKOFF,
  backoffDelay,
  countDeliveries,
  planNotifications,
  type BackoffConfig,
  type NotificationPlan,
} from './outbox.js';
export {
  EMBED_COLORS,
  MAX_EMBED_FIELDS,
  buildCancelNotice,
  buildCancelledMessage,
  buildPingMessage,
  buildRescheduleNotice,
  buildSummaryMessage,
  buildUpdateEmbed,
  mention,
  pingTitle,
  type RenderContext,
  type SummaryEntry,
} from './message-builder.js';
export {
  DiscordRestTransport,
  LogTransport,
  createTransport,
  type DiscordTransportConfig,
} from './transport.js';
