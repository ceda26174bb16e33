import { describe, it, expect } from 'vitest';
import { ConfigError } from '@relaybot/bot';
import { EIGHT_BALL_ANSWERS, channelLoadLabel, defaultPlugins, selectPlugins } from '../index.js';
import { ALICE, BOB, LOCAL, createPluginHarness } from './helpers.js';

describe('@relaybot/plugins', () => {
  // ─────────────────────────────────────────────────────────────────────
  // REGISTRATION
  // ─────────────────────────────────────────────────────────────────────

  describe('registration', () => {
    it('adds plugin commands after the built-ins', () => {
      const { bot } = createPluginHarness();

      expect(bot.getRegistry().list().map((c) => c.name)).toEqual([
        'help',
        'ping',
        'whoami',
        'nodes',
        'uptime',
        'weather',
        'air',
        'msg',
        'inbox',
        'snr',
        'route',
        'seen',
        'load',
        'roll',
        '8ball',
        'stats',
        'noise',
      ]);
    });

    it('selects bundled plugins by name', () => {
      expect(selectPlugins(['radio', 'fun']).map((p) => p.name)).toEqual(['radio', 'fun']);
      expect(selectPlugins([])).toEqual([]);
      expect(defaultPlugins.map((p) => p.name)).toEqual(['diagnostics', 'fun', 'radio']);
    });

    it('rejects unknown plugin names', () => {
      expect(() => selectPlugins(['weather'])).toThrow(ConfigError);
      expect(() => selectPlugins(['weather'])).toThrow(
        "Unknown plugin 'weather'. Available: diagnostics, fun, radio",
      );
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // DIAGNOSTICS
  // ─────────────────────────────────────────────────────────────────────

  describe('snr', () => {
    it('shows packet signal values with placeholders', () => {
      const { invoke } = createPluginHarness();

      expect(invoke('snr', ALICE, [], { rxSnr: -3.5, rxRssi: -118 })).toBe('📶 SNR: -3.5 | RSSI: -118');
      expect(invoke('snr', ALICE)).toBe('📶 SNR: ? | RSSI: ?');
    });
  });

  describe('route', () => {
    it('prefers hop count, then hop limit', () => {
      const { invoke } = createPluginHarness();

      expect(invoke('route', ALICE, [], { hopsAway: 2, hopLimit: 3 })).toBe('🧭 Route: 2 hops');
      expect(invoke('route', ALICE, [], { hopsAway: 0 })).toBe('🧭 Route: 0 hops');
      expect(invoke('route', ALICE, [], { hopLimit: 3 })).toBe('🧭 Hop limit: 3');
      expect(invoke('route', ALICE)).toBe('🧭 Route: (no hop info in packet)');
    });
  });

  describe('seen', () => {
    it('reports the sender by default, counting the current packet', async () => {
      const { transport, send } = createPluginHarness();

      await send(ALICE, '!seen');

      expect(transport.sentTexts()).toEqual([`👀 Seen: ${ALICE} — 0s ago`]);
    });

    it('resolves a named node and reports its age', async () => {
      const { transport, send, advance } = createPluginHarness();

      await send(BOB, 'anyone around?');
      advance(3 * 3600_000 + 5 * 60_000);
      await send(ALICE, '!seen bob');

      expect(transport.sentTexts()).toEqual([`👀 Seen: ${BOB} — 3h 5m ago`]);
    });

    it('reports nodes never heard in this session', () => {
      const { invoke } = createPluginHarness();

      expect(invoke('seen', ALICE, ['Bob', 'Mobile'])).toBe(`👀 Seen: ${BOB} — never (in this bot session)`);
      expect(invoke('seen', ALICE, ['Carol'])).toBe('👀 Seen: Carol — never (in this bot session)');
    });
  });

  describe('load', () => {
    it('labels channel utilization', () => {
      expect(channelLoadLabel(0.5)).toBe('IDLE');
      expect(channelLoadLabel(1)).toBe('OK');
      expect(channelLoadLabel(4.99)).toBe('OK');
      expect(channelLoadLabel(5)).toBe('BUSY');
      expect(channelLoadLabel(15)).toBe('CONGESTED');
    });

    it('reads the local node metrics', () => {
      const { directory, invoke } = createPluginHarness();

      expect(invoke('load', ALICE)).toBe('📡 Channel load: unknown');

      directory.updateMetrics(LOCAL, { channelUtilization: 7.25 });
      expect(invoke('load', ALICE)).toBe('📡 Channel load: BUSY (CH 7.3%)');
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // FUN
  // ─────────────────────────────────────────────────────────────────────

  describe('roll', () => {
    it('rolls a d6 by default', () => {
      const { invoke } = createPluginHarness({ random: () => 0.5 });

      expect(invoke('roll', ALICE)).toBe('🎲 d6: 4');
    });

    it('stays within range at the extremes of the random source', () => {
      expect(createPluginHarness({ random: () => 0 }).invoke('roll', ALICE, ['20'])).toBe('🎲 d20: 1');
      expect(createPluginHarness({ random: () => 0.9999 }).invoke('roll', ALICE, ['20'])).toBe('🎲 d20: 20');
    });

    it('validates the number of sides', () => {
      const { invoke } = createPluginHarness();

      expect(invoke('roll', ALICE, ['many'])).toBe('Usage: !roll [sides]');
      expect(invoke('roll', ALICE, ['2.5'])).toBe('Usage: !roll [sides]');
      expect(invoke('roll', ALICE, ['1'])).toBe('Usage: !roll [2..1000]');
      expect(invoke('roll', ALICE, ['1001'])).toBe('Usage: !roll [2..1000]');
      expect(invoke('roll', ALICE, ['1000'])).toBe('🎲 d1000: 1');
    });
  });

  describe('8ball', () => {
    it('answers from the fixed list', () => {
      expect(createPluginHarness({ random: () => 0 }).invoke('8ball', ALICE)).toBe('🎱 It is certain.');
      expect(createPluginHarness({ random: () => 0.99 }).invoke('8ball', ALICE)).toBe('🎱 Very doubtful.');
      expect(EIGHT_BALL_ANSWERS).toHaveLength(9);
    });
  });

  describe('stats', () => {
    it('counts messages, commands and unique senders', async () => {
      const { transport, send } = createPluginHarness();

      await send(ALICE, 'hello');
      await send(BOB, '!ping');
      await send(BOB, '!nope');
      await send(ALICE, '!stats');

      expect(transport.sentTexts().at(-1)).toBe('📊 Stats: messages=4, commands=2, unique_nodes=2');
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // RADIO
  // ─────────────────────────────────────────────────────────────────────

  describe('noise', () => {
    it('estimates the noise floor from RSSI and SNR', () => {
      const { invoke } = createPluginHarness();

      expect(invoke('noise', ALICE, [], { rxRssi: -110, rxSnr: 7.5 })).toBe(
        '📡 Noise floor (est.): -117.5 dBm | RSSI -110 dBm | SNR 7.5 dB',
      );
    });

    it('needs both values', () => {
      const { invoke } = createPluginHarness();

      expect(invoke('noise', ALICE, [], { rxRssi: -110 })).toBe(
        '📡 Noise floor: unavailable (rxSnr/rxRssi missing in this packet)',
      );
    });
  });
});
