/**
 * Message Builder - renders fleet pings, edits, notices and the summary
 *
 * @module notifications/message-builder
 */

import { discordTimestamp, formatCountdown, formatUtc } from '../time.js';
import {
  PING_EVERYONE,
  type CategoryPolicy,
  type Fleet,
  type MessageEmbed,
  type OutboundMessage,
  type PingTarget,
} from '../types.js';

export const EMBED_COLORS = {
  create: 0x3498db,
  update: 0x3498db,
  reminder: 0xf39c12,
  formup: 0xe74c3c,
  cancel: 0x95a5a6,
  summary: 0x2ecc71,
} as const;

/** Discord rejects embed descriptions longer than this */
const MAX_DESCRIPTION_LENGTH = 4096;
/** ...and embeds with more fields than this */
export const MAX_EMBED_FIELDS = 25;

export type PingKind = 'create' | 'reminder' | 'formup';

export interface RenderContext {
  policy: CategoryPolicy;
  /** Base URL of the web board, linked from embeds when set */
  appUrl?: string;
}

export function mention(target: PingTarget): string {
  return target === PING_EVERYONE ? '@everyone' : `<@&${target}>`;
}

export function pingTitle(kind: PingKind, categoryName: string, announced: boolean): string {
  switch (kind) {
    case 'create':
      return `**.:New Upcoming ${categoryName}:.**`;
    case 'reminder':
      // A hidden fleet's first ping doubles as its announcement
      return announced
        ? `**.:Reminder - Upcoming ${categoryName}:.**`
        : `**.:New Upcoming ${categoryName}:.**`;
    case 'formup':
      return `**.:${categoryName} Forming Now:.**`;
  }
}

export function buildFleetEmbed(fleet: Fleet, ctx: RenderContext, color: number): MessageEmbed {
  const fields: NonNullable<MessageEmbed['fields']> = [
    {
      name: 'Form-up',
      value: `${formatUtc(fleet.formUpTime)} UTC (${discordTimestamp(fleet.formUpTime)})`,
      inline: false,
    },
    { name: 'FC', value: `<@${fleet.commanderId}>`, inline: true },
  ];
  const details = Object.entries(fleet.details).filter(([, value]) => value.trim() !== '');
  const room = MAX_EMBED_FIELDS - fields.length;
  for (const [name, value] of details.slice(0, room)) {
    fields.push({ name, value, inline: true });
  }

  // Details past the field limit go in the description
  let description: string | undefined;
  const overflow = details.slice(room).map(([name, value]) => `**${name}:** ${value}`);
  if (overflow.length > 0) {
    description = overflow.join('\n');
    if (description.length > MAX_DESCRIPTION_LENGTH) {
      description = `${description.slice(0, MAX_DESCRIPTION_LENGTH - 1)}…`;
    }
  }

  return {
    title: fleet.name,
    color,
    description,
    fields,
    footer: ctx.policy.name,
    url: ctx.appUrl ? `${ctx.appUrl.replace(/\/$/, '')}/fleets/${fleet.id}` : undefined,
  };
}

export function buildPingMessage(
  kind: PingKind,
  fleet: Fleet,
  ctx: RenderContext,
  announced: boolean,
): OutboundMessage {
  const title = pingTitle(kind, ctx.policy.name, announced);
  const mentions = ctx.policy.pingRoles.map(mention).join(' ');
  return {
    content: mentions ? `${title}\n\n${mentions}` : title,
    embed: buildFleetEmbed(fleet, ctx, EMBED_COLORS[kind]),
  };
}

/** Edit payload for an update: embed only, the original content stays */
export function buildUpdateEmbed(fleet: Fleet, ctx: RenderContext): MessageEmbed {
  return buildFleetEmbed(fleet, ctx, EMBED_COLORS.update);
}

export function buildCancelledMessage(fleet: Fleet, ctx: RenderContext): OutboundMessage {
  const category = ctx.policy.name;
  return {
    content: '',
    embed: {
      title: `.:${category} Cancelled:.`,
      color: EMBED_COLORS.cancel,
      description:
        `${category} posted by <@${fleet.commanderId}>, **${fleet.name}**, scheduled for ` +
        `**${formatUtc(fleet.formUpTime)} UTC** (${discordTimestamp(fleet.formUpTime)}) was cancelled.`,
      footer: `Cancelled by: ${fleet.cancelledBy ? `<@${fleet.cancelledBy}>` : 'system'}`,
      timestamp: fleet.cancelledAt ?? undefined,
    },
  };
}

export function buildCancelNotice(fleet: Fleet, ctx: RenderContext): OutboundMessage {
  return {
    content: `**${fleet.name}** (${ctx.policy.name}, ${formatUtc(fleet.formUpTime)} UTC) has been cancelled.`,
  };
}

export function buildRescheduleNotice(fleet: Fleet, ctx: RenderContext, from: string): OutboundMessage {
  return {
    content:
      `**${fleet.name}** (${ctx.policy.name}) has been rescheduled from ${formatUtc(from)} UTC ` +
      `to ${formatUtc(fleet.formUpTime)} UTC (${discordTimestamp(fleet.formUpTime, 'R')}).`,
  };
}

export interface SummaryEntry {
  fleet: Fleet;
  policy: CategoryPolicy;
}

export function summaryLine(entry: SummaryEntry, now: Date): string {
  const { fleet, policy } = entry;
  return (
    `**${policy.name}** · ${fleet.name} · ${formatUtc(fleet.formUpTime)} UTC ` +
    `(${discordTimestamp(fleet.formUpTime)}) · ${formatCountdown(fleet.formUpTime, now)}`
  );
}

/**
 * The "upcoming fleets" view. Entries must already be filtered and sorted.
 */
export function buildSummaryMessage(entries: SummaryEntry[], now: Date): OutboundMessage {
  let description: string;
  if (entries.length === 0) {
    description = 'No upcoming fleets scheduled.';
  } else {
    const lines: string[] = [];
    let length = 0;
    for (let i = 0; i < entries.length; i++) {
      const line = summaryLine(entries[i], now);
      const overflow = `…and ${entries.length - i} more`;
      if (length + line.length + 1 + overflow.length > MAX_DESCRIPTION_LENGTH) {
        lines.push(overflow);
        break;
      }
      lines.push(line);
      length += line.length + 1;
    }
    description = lines.join('\n');
  }

  return {
    content: '',
    embed: {
      title: '.:Upcoming Fleets:.',
      color: EMBED_COLORS.summary,
      description,
      footer: `Updated ${formatUtc(now.toISOString())} UTC`,
      timestamp: now.toISOString(),
    },
  };
}
