import { describe, expect, it } from 'vitest';
import { discordTimestamp, formatCountdown, formatDuration, formatUtc, parseDuration } from '../time.js';
import { T0, at } from './fakes.js';

const MIN = 60 * 1000;
const HOUR = 60 * MIN;

describe('parseDuration', () => {
  it('parses unit suffixes and combinations', () => {
    expect(parseDuration('90m')).toBe(90 * MIN);
    expect(parseDuration('2h')).toBe(2 * HOUR);
    expect(parseDuration('1h30m')).toBe(90 * MIN);
    expect(parseDuration('1d')).toBe(24 * HOUR);
    expect(parseDuration('45s')).toBe(45_000);
  });

  it('treats bare numbers as milliseconds', () => {
    expect(parseDuration('1500')).toBe(1500);
    expect(parseDuration(0)).toBe(0);
    expect(parseDuration(60_000)).toBe(60_000);
  });

  it('rejects anything else', () => {
    expect(parseDuration('')).toBeNull();
    expect(parseDuration('soon')).toBeNull();
    expect(parseDuration('2x')).toBeNull();
    expect(parseDuration('30m2h')).toBeNull();
    expect(parseDuration(-5)).toBeNull();
  });
});

describe('formatDuration', () => {
  it('renders days, hours and minutes', () => {
    expect(formatDuration(150 * MIN)).toBe('2h 30m');
    expect(formatDuration(45 * MIN)).toBe('45m');
    expect(formatDuration(26 * HOUR)).toBe('1d 2h');
    expect(formatDuration(0)).toBe('0m');
  });
});

describe('formatCountdown', () => {
  const label = (offsetMs: number) => formatCountdown(at(offsetMs).toISOString(), T0);

  it('reads "Starting now" within a minute either side', () => {
    expect(label(30_000)).toBe('Starting now');
    expect(label(-30_000)).toBe('Starting now');
  });

  it('counts minutes, hours and days ahead', () => {
    expect(label(1 * MIN)).toBe('In 1 minute');
    expect(label(5 * MIN)).toBe('In 5 minutes');
    expect(label(1 * HOUR)).toBe('In 1 hour');
    expect(label(2 * HOUR + 10 * MIN)).toBe('In 2 hours');
    expect(label(3 * 24 * HOUR)).toBe('In 3 days');
  });

  it('counts time since start', () => {
    expect(label(-10 * MIN)).toBe('Started 10 minutes ago');
    expect(label(-45 * MIN)).toBe('Started 45 minutes ago');
    expect(label(-2 * HOUR)).toBe('Started 2 hours ago');
  });
});

describe('formatUtc / discordTimestamp', () => {
  it('formats to the minute in UTC', () => {
    expect(formatUtc('2026-03-01T12:00:59.000Z')).toBe('2026-03-01 12:00');
  });

  it('renders Discord timestamp markup in epoch seconds', () => {
    expect(discordTimestamp(T0.toISOString())).toBe('<t:1772366400:F>');
    expect(discordTimestamp(T0.toISOString(), 'R')).toBe('<t:1772366400:R>');
  });
});
