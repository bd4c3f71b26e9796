import { describe, expect, it } from 'vitest';
import { at, makeFleet, makePolicy, T0 } from '../../__tests__/fakes.js';
import {
  buildCancelNotice,
  buildCancelledMessage,
  buildFleetEmbed,
  buildPingMessage,
  buildRescheduleNotice,
  buildSummaryMessage,
  EMBED_COLORS,
  MAX_EMBED_FIELDS,
  mention,
  pingTitle,
} from '../message-builder.js';

const HOUR = 60 * 60 * 1000;

describe('message-builder', () => {
  const policy = makePolicy();
  const ctx = { policy };

  describe('pingTitle', () => {
    it('should title each ping kind', () => {
      expect(pingTitle('create', 'Strat Op', false)).toBe('**.:New Upcoming Strat Op:.**');
      expect(pingTitle('reminder', 'Strat Op', true)).toBe('**.:Reminder - Upcoming Strat Op:.**');
      expect(pingTitle('formup', 'Strat Op', true)).toBe('**.:Strat Op Forming Now:.**');
    });

    it('should announce an unannounced fleet on its reminder', () => {
      expect(pingTitle('reminder', 'Strat Op', false)).toBe('**.:New Upcoming Strat Op:.**');
    });
  });

  it('should render role and everyone mentions', () => {
    expect(mention('role-pilots')).toBe('<@&role-pilots>');
    expect(mention('everyone')).toBe('@everyone');
  });

  describe('buildPingMessage', () => {
    it('should put the title and mentions in content and the fleet in the embed', () => {
      const fleet = makeFleet({ details: { Doctrine: 'Eagles', Comms: ' ' } });
      const message = buildPingMessage('create', fleet, ctx, false);

      expect(message.content).toBe('**.:New Upcoming Strat Op:.**\n\n<@&role-pilots>');
      expect(message.embed).toEqual({
        title: 'Strat Op',
        color: EMBED_COLORS.create,
        fields: [
          { name: 'Form-up', value: '2026-03-01 15:00 UTC (<t:1772377200:F>)', inline: false },
          { name: 'FC', value: '<@user-fc>', inline: true },
          { name: 'Doctrine', value: 'Eagles', inline: true },
        ],
        footer: 'Strat Op',
        url: undefined,
      });
    });

    it('should omit the mention block when the category pings nobody', () => {
      const message = buildPingMessage('formup', makeFleet(), { policy: makePolicy({ pingRoles: [] }) }, true);
      expect(message.content).toBe('**.:Strat Op Forming Now:.**');
    });
  });

  describe('detail overflow', () => {
    const numbered = (count: number): Record<string, string> =>
      Object.fromEntries(Array.from({ length: count }, (_, i) => [`Detail ${i + 1}`, `value ${i + 1}`]));

    it('should keep the embed within 25 fields and list the rest in the description', () => {
      const embed = buildFleetEmbed(makeFleet({ details: numbered(30) }), ctx, 1);

      expect(embed.fields).toHaveLength(MAX_EMBED_FIELDS);
      expect(embed.fields?.at(-1)).toEqual({ name: 'Detail 23', value: 'value 23', inline: true });
      expect(embed.description?.split('\n')).toEqual([
        '**Detail 24:** value 24',
        '**Detail 25:** value 25',
        '**Detail 26:** value 26',
        '**Detail 27:** value 27',
        '**Detail 28:** value 28',
        '**Detail 29:** value 29',
        '**Detail 30:** value 30',
      ]);
    });

    it('should leave the description empty when every detail fits', () => {
      expect(buildFleetEmbed(makeFleet({ details: numbered(23) }), ctx, 1).description).toBeUndefined();
    });

    it('should trim overflowing details to the description limit', () => {
      const details = { ...numbered(23), 'Notes A': 'a'.repeat(3000), 'Notes B': 'b'.repeat(3000) };
      const description = buildFleetEmbed(makeFleet({ details }), ctx, 1).description ?? '';

      expect(description).toHaveLength(4096);
      expect(description.startsWith('**Notes A:** aaa')).toBe(true);
      expect(description.endsWith('b…')).toBe(true);
    });
  });

  it('should link the embed to the board when an app url is set', () => {
    const embed = buildFleetEmbed(makeFleet(), { policy, appUrl: 'https://board.example/' }, 1);
    expect(embed.url).toBe('https://board.example/fleets/fleet-1');
  });

  it('should render the cancelled edit with who cancelled it', () => {
    const fleet = makeFleet({ cancelledBy: 'user-lead', cancelledAt: T0.toISOString() });
    const message = buildCancelledMessage(fleet, ctx);

    expect(message.content).toBe('');
    expect(message.embed?.title).toBe('.:Strat Op Cancelled:.');
    expect(message.embed?.description).toBe(
      'Strat Op posted by <@user-fc>, **Strat Op**, scheduled for **2026-03-01 15:00 UTC** (<t:1772377200:F>) was cancelled.',
    );
    expect(message.embed?.footer).toBe('Cancelled by: <@user-lead>');
    expect(message.embed?.timestamp).toBe('2026-03-01T12:00:00.000Z');
  });

  it('should render the cancel and reschedule notices', () => {
    const fleet = makeFleet({ name: 'Home Defense' });
    expect(buildCancelNotice(fleet, ctx).content).toBe(
      '**Home Defense** (Strat Op, 2026-03-01 15:00 UTC) has been cancelled.',
    );
    expect(buildRescheduleNotice(fleet, ctx, at(2 * HOUR).toISOString()).content).toBe(
      '**Home Defense** (Strat Op) has been rescheduled from 2026-03-01 14:00 UTC to 2026-03-01 15:00 UTC (<t:1772377200:R>).',
    );
  });

  describe('buildSummaryMessage', () => {
    it('should say so when nothing is scheduled', () => {
      const message = buildSummaryMessage([], T0);
      expect(message.embed?.description).toBe('No upcoming fleets scheduled.');
      expect(message.embed?.footer).toBe('Updated 2026-03-01 12:00 UTC');
    });

    it('should list one line per fleet with a countdown', () => {
      const entries = [
        { fleet: makeFleet({ id: 'a', name: 'Alpha' }), policy },
        { fleet: makeFleet({ id: 'b', name: 'Bravo', formUpTime: at(30 * 60 * 1000).toISOString() }), policy },
      ];
      const lines = buildSummaryMessage(entries, T0).embed?.description?.split('\n');

      expect(lines).toEqual([
        '**Strat Op** · Alpha · 2026-03-01 15:00 UTC (<t:1772377200:F>) · In 3 hours',
        '**Strat Op** · Bravo · 2026-03-01 12:30 UTC (<t:1772368200:F>) · In 30 minutes',
      ]);
    });

    it('should stay within the description limit', () => {
      const entries = Array.from({ length: 200 }, (_, i) => ({
        fleet: makeFleet({ id: `f-${i}`, name: `Fleet number ${i} with a fairly long name` }),
        policy,
      }));
      const description = buildSummaryMessage(entries, T0).embed?.description ?? '';

      expect(description.length).toBeLessThanOrEqual(4096);
      expect(description.split('\n').at(-1)).toMatch(/^…and \d+ more$/);
    });
  });
});
