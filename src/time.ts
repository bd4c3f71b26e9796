/**
 * Time helpers shared by the validator, state machine and renderers.
 *
 * @module time
 */

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/** A fleet whose form-up is more than this far in the past is expired */
export const EXPIRY_GRACE_MS = HOUR_MS;

export function toMs(value: string | Date): number {
  return typeof value === 'string' ? Date.parse(value) : value.getTime();
}

const DURATION_RE = /^(?:(\d+)d)?(?:(\d+)h)?(?:(\d+)m)?(?:(\d+)s)?$/;

/**
 * Parse `1d`, `2h`, `90m`, `1h30m`, `45s` (or a bare number of milliseconds).
 * Returns null for anything else.
 */
export function parseDuration(input: string | number): number | null {
  if (typeof input === 'number') {
    return Number.isFinite(input) && input >= 0 ? input : null;
  }
  const trimmed = input.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }
  const match = DURATION_RE.exec(trimmed);
  if (!match || trimmed === '') {
    return null;
  }
  const [, d, h, m, s] = match;
  return (
    Number(d ?? 0) * DAY_MS +
    Number(h ?? 0) * HOUR_MS +
    Number(m ?? 0) * MINUTE_MS +
    Number(s ?? 0) * 1000
  );
}

/** `2h 30m`, `45m`, `1d 2h`; sub-minute remainders are dropped */
export function formatDuration(ms: number): string {
  const totalMinutes = Math.floor(Math.abs(ms) / MINUTE_MS);
  const days = Math.floor(totalMinutes / (24 * 60));
  const hours = Math.floor((totalMinutes % (24 * 60)) / 60);
  const minutes = totalMinutes % 60;
  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0 || parts.length === 0) parts.push(`${minutes}m`);
  return parts.join(' ');
}

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

/**
 * Countdown label for a form-up time relative to `now`, using the same
 * bands as the web board.
 */
export function formatCountdown(formUpTime: string, now: Date): string {
  const diffMs = toMs(formUpTime) - now.getTime();
  const seconds = Math.trunc(diffMs / 1000);

  if (seconds < -1800) {
    const hours = Math.trunc(Math.abs(seconds) / 3600);
    return hours > 0
      ? `Started ${plural(hours, 'hour')} ago`
      : `Started ${plural(Math.trunc(Math.abs(seconds) / 60), 'minute')} ago`;
  }
  if (seconds < -60) {
    return `Started ${plural(Math.trunc(Math.abs(seconds) / 60), 'minute')} ago`;
  }
  if (seconds < 60) {
    return 'Starting now';
  }
  if (seconds < 3600) {
    return `In ${plural(Math.trunc(seconds / 60), 'minute')}`;
  }
  const days = Math.trunc(seconds / 86400);
  if (days > 0) {
    return `In ${plural(days, 'day')}`;
  }
  return `In ${plural(Math.trunc(seconds / 3600), 'hour')}`;
}

/** `2026-10-19 18:30` in UTC */
export function formatUtc(iso: string): string {
  return new Date(iso).toISOString().slice(0, 16).replace('T', ' ');
}

/** Discord timestamp markup rendering in the reader's locale */
export function discordTimestamp(iso: string, style: 'F' | 'R' | 't' = 'F'): string {
  return `<t:${Math.floor(toMs(iso) / 1000)}:${style}>`;
}
