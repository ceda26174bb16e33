import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Mailbox, createPendingMessage } from '../index.js';

// Quiet logger for tests
const quietLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

const TTL_SECONDS = 60;

describe('@relaybot/mailbox', () => {
  let clock: number;
  let mailbox: Mailbox;

  beforeEach(() => {
    clock = 1_000_000;
    mailbox = new Mailbox({ ttlSeconds: TTL_SECONDS, now: () => clock, logger: quietLogger });
  });

  function message(text: string, from = '!a1b2c3d4') {
    return createPendingMessage(from, text, clock);
  }

  // ─────────────────────────────────────────────────────────────────────
  // BASIC OPERATIONS
  // ─────────────────────────────────────────────────────────────────────

  describe('add / getFor', () => {
    it('returns messages in insertion order', () => {
      mailbox.add('!11223344', message('one'));
      mailbox.add('!11223344', message('two'));

      expect(mailbox.getFor('!11223344').map((m) => m.text)).toEqual(['one', 'two']);
    });

    it('does not remove messages on peek', () => {
      mailbox.add('!11223344', message('one'));
      mailbox.getFor('!11223344');

      expect(mailbox.getFor('!11223344')).toHaveLength(1);
    });

    it('returns a copy that does not alias the store', () => {
      mailbox.add('!11223344', message('one'));
      const snapshot = mailbox.getFor('!11223344');
      snapshot.pop();

      expect(mailbox.getFor('!11223344')).toHaveLength(1);
    });

    it('returns an empty list for unknown keys', () => {
      expect(mailbox.getFor('!deadbeef')).toEqual([]);
      expect(mailbox.has('!deadbeef')).toBe(false);
    });

    it('emits added events', () => {
      const handler = vi.fn();
      mailbox.on('added', handler);
      const m = message('hi');
      mailbox.add('!11223344', m);

      expect(handler).toHaveBeenCalledWith('!11223344', m);
    });
  });

  describe('popFor', () => {
    it('returns every pending message exactly once', () => {
      mailbox.add('!11223344', message('one'));
      mailbox.add('!11223344', message('two'));
      mailbox.add('!55667788', message('other'));

      expect(mailbox.popFor('!11223344').map((m) => m.text)).toEqual(['one', 'two']);
      expect(mailbox.popFor('!11223344')).toEqual([]);
      expect(mailbox.has('!11223344')).toBe(false);
      expect(mailbox.getFor('!55667788')).toHaveLength(1);
      expect(mailbox.size).toBe(1);
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // EXPIRY
  // ─────────────────────────────────────────────────────────────────────

  describe('expiry', () => {
    it('keeps messages younger than the ttl', () => {
      mailbox.add('!11223344', message('fresh'));
      clock += TTL_SECONDS * 1000 - 1;

      expect(mailbox.getFor('!11223344')).toHaveLength(1);
    });

    it('drops messages once the ttl has elapsed', () => {
      mailbox.add('!11223344', message('stale'));
      clock += TTL_SECONDS * 1000;

      expect(mailbox.popFor('!11223344')).toEqual([]);
      expect(mailbox.has('!11223344')).toBe(false);
      expect(mailbox.keys()).toEqual([]);
    });

    it('drops only the expired part of a queue', () => {
      mailbox.add('!11223344', message('old'));
      clock += 30_000;
      mailbox.add('!11223344', message('new'));
      clock += 30_000;

      expect(mailbox.getFor('!11223344').map((m) => m.text)).toEqual(['new']);
      expect(mailbox.size).toBe(1);
    });

    it('purges other keys during an add', () => {
      mailbox.add('!11223344', message('old'));
      clock += TTL_SECONDS * 1000;
      mailbox.add('!55667788', message('new'));

      expect(mailbox.keys()).toEqual(['!55667788']);
    });

    it('reports expired messages', () => {
      const handler = vi.fn();
      mailbox.on('evicted', handler);
      const m = message('old');
      mailbox.add('!11223344', m);
      clock += TTL_SECONDS * 1000;

      expect(mailbox.purge()).toBe(1);
      expect(handler).toHaveBeenCalledWith('!11223344', m, 'expired');
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // CAPS
  // ─────────────────────────────────────────────────────────────────────

  describe('caps', () => {
    it('evicts the oldest message for a node beyond maxPerNode', () => {
      mailbox = new Mailbox({ ttlSeconds: TTL_SECONDS, maxPerNode: 2, now: () => clock, logger: quietLogger });
      mailbox.add('!11223344', message('one'));
      mailbox.add('!11223344', message('two'));
      mailbox.add('!11223344', message('three'));

      expect(mailbox.getFor('!11223344').map((m) => m.text)).toEqual(['two', 'three']);
    });

    it('evicts the oldest message overall beyond maxTotal', () => {
      mailbox = new Mailbox({ ttlSeconds: TTL_SECONDS, maxTotal: 2, now: () => clock, logger: quietLogger });
      const handler = vi.fn();
      mailbox.on('evicted', handler);

      mailbox.add('!11223344', message('first'));
      clock += 1000;
      mailbox.add('!55667788', message('second'));
      clock += 1000;
      mailbox.add('!55667788', message('third'));

      expect(mailbox.has('!11223344')).toBe(false);
      expect(mailbox.getFor('!55667788').map((m) => m.text)).toEqual(['second', 'third']);
      expect(handler).toHaveBeenCalledWith('!11223344', expect.objectContaining({ text: 'first' }), 'overflow');
    });
  });
});
