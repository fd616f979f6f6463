import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CallStore, callId } from './index.js';
import type { Call } from '../types/index.js';

describe('CallStore', () => {
  let store: CallStore;

  beforeEach(() => {
    store = new CallStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  const call = (startTime: number, extra: Partial<Call> = {}): Call => ({
    systemId: 7804,
    talkgroupId: 2451,
    startTime,
    filename: `${startTime}-2451`,
    ...extra,
  });

  describe('saveCalls', () => {
    it('should insert calls and report how many were added', () => {
      expect(store.saveCalls([call(100), call(200)])).toBe(2);
      expect(store.countCalls()).toBe(2);
    });

    it('should ignore calls that are already stored', () => {
      store.saveCalls([call(100), call(200)]);

      expect(store.saveCalls([call(200), call(300)])).toBe(1);
      expect(store.countCalls()).toBe(3);
    });

    it('should keep two calls with the same start time but different files', () => {
      store.saveCalls([call(100, { filename: 'a' }), call(100, { filename: 'b' })]);

      expect(store.countCalls()).toBe(2);
    });

    it('should fill missing ids from the defaults', () => {
      store.saveCalls([{ startTime: 100, filename: 'x' }], { systemId: 1, talkgroupId: 2 });

      expect(store.getCalls()[0]).toMatchObject({ id: '1-2-100-x', systemId: 1, talkgroupId: 2 });
    });

    it('should skip calls that cannot be keyed', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      expect(store.saveCalls([{ filename: 'no-time', systemId: 1, talkgroupId: 2 }, call(100)])).toBe(1);
      expect(warn).toHaveBeenCalledWith('[CallStore] Skipped 1 calls without system, talkgroup or start time');
    });
  });

  describe('getCalls', () => {
    it('should round-trip every call field and drop unset ones', () => {
      store.saveCalls([
        call(100, { duration: 4.5, talkgroupName: 'Fire Dispatch', talkgroupGroup: 'Fire', unitRadioId: 1201, hash: 'h1' }),
        call(200),
      ]);

      const [latest, earliest] = store.getCalls();

      expect(earliest).toMatchObject({
        id: '7804-2451-100-100-2451',
        systemId: 7804,
        talkgroupId: 2451,
        startTime: 100,
        duration: 4.5,
        filename: '100-2451',
        talkgroupName: 'Fire Dispatch',
        talkgroupGroup: 'Fire',
        unitRadioId: 1201,
        hash: 'h1',
      });
      expect(typeof earliest.createdAt).toBe('number');
      expect(latest).not.toHaveProperty('hash');
      expect(latest).not.toHaveProperty('duration');
    });

    it('should return the newest calls first', () => {
      store.saveCalls([call(100), call(300), call(200)]);

      expect(store.getCalls().map((c) => c.startTime)).toEqual([300, 200, 100]);
    });

    it('should filter by talkgroup and start time', () => {
      store.saveCalls([call(100), call(200), call(300, { talkgroupId: 9 })]);

      expect(store.getCalls({ talkgroupId: 2451 }).map((c) => c.startTime)).toEqual([200, 100]);
      expect(store.getCalls({ since: 100 }).map((c) => c.startTime)).toEqual([300, 200]);
      expect(store.getCalls({ systemId: 1 })).toEqual([]);
    });

    it('should page with limit and offset', () => {
      store.saveCalls([call(100), call(200), call(300)]);

      expect(store.getCalls({ limit: 1, offset: 1 }).map((c) => c.startTime)).toEqual([200]);
    });
  });

  describe('countCalls', () => {
    it('should count per system and talkgroup', () => {
      store.saveCalls([call(100), call(200, { talkgroupId: 9 }), call(300, { systemId: 1 })]);

      expect(store.countCalls({ systemId: 7804 })).toBe(2);
      expect(store.countCalls({ systemId: 7804, talkgroupId: 9 })).toBe(1);
    });
  });
});

describe('callId', () => {
  it('should join system, talkgroup, start time and filename', () => {
    expect(callId(7804, 2451, 1733229012, '1733229012-2451')).toBe('7804-2451-1733229012-1733229012-2451');
    expect(callId(1, 2, 3)).toBe('1-2-3-');
  });
});
