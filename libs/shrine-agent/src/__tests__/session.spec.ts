/**
 * SessionManager tests
 */

import type { DerivedKey } from '@shrine/storage';
import { SessionManager } from '../session';
import type { ClearReason } from '../session';

const TTL_MS = 60_000;

function makeKey(): DerivedKey {
  return {
    key: Buffer.alloc(32, 7),
    params: { algorithm: 'pbkdf2-sha256', iterations: 1000, salt: Buffer.alloc(16, 1) },
  };
}

describe('SessionManager', () => {
  let sessions: SessionManager;
  let cleared: ClearReason[];

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    sessions = new SessionManager('/tmp/shrine', TTL_MS);
    cleared = [];
    sessions.setClearHandler((reason) => cleared.push(reason));
  });

  afterEach(() => {
    sessions.clear('shutdown');
    jest.useRealTimers();
  });

  it('starts locked', () => {
    expect(sessions.state).toBe('locked');
    expect(sessions.current()).toBeUndefined();
  });

  it('reports unlocking while a password check runs', () => {
    sessions.beginUnlock();
    expect(sessions.state).toBe('unlocking');
    sessions.abortUnlock();
    expect(sessions.state).toBe('locked');
  });

  it('opens a session with an absolute expiry', () => {
    const session = sessions.open(makeKey());

    expect(sessions.state).toBe('unlocked');
    expect(session.expiresAt).toBe(Date.parse('2026-01-01T00:01:00Z'));
    expect(session.shrinePath).toBe('/tmp/shrine');
  });

  it('does not extend the session on use', () => {
    const session = sessions.open(makeKey());

    jest.advanceTimersByTime(TTL_MS - 1_000);
    expect(sessions.current()?.expiresAt).toBe(session.expiresAt);

    jest.advanceTimersByTime(1_000);
    expect(sessions.current()).toBeUndefined();
    expect(sessions.state).toBe('locked');
  });

  it('wipes the key when the timer fires', () => {
    const key = makeKey();
    sessions.open(key);

    jest.advanceTimersByTime(TTL_MS);

    expect(key.key.equals(Buffer.alloc(32))).toBe(true);
    expect(cleared).toEqual(['expired']);
  });

  it('wipes the key on lock', () => {
    const key = makeKey();
    sessions.open(key);

    sessions.clear('lock');

    expect(key.key.equals(Buffer.alloc(32))).toBe(true);
    expect(cleared).toEqual(['lock']);
    expect(sessions.state).toBe('locked');
  });

  it('replaces an open session and wipes the old key', () => {
    const first = makeKey();
    sessions.open(first);
    jest.advanceTimersByTime(30_000);

    const second = sessions.open(makeKey());

    expect(first.key.equals(Buffer.alloc(32))).toBe(true);
    expect(cleared).toEqual(['replaced']);
    expect(second.expiresAt).toBe(Date.now() + TTL_MS);
  });

  it('does not report a clear when nothing was open', () => {
    sessions.clear('lock');
    expect(cleared).toEqual([]);
  });

  it('keeps a session longer than one timer period until its expiry', () => {
    const thirtyDays = 30 * 24 * 3600 * 1000;
    const long = new SessionManager('/tmp/shrine', thirtyDays);
    long.setClearHandler((reason) => cleared.push(reason));
    long.open(makeKey());

    jest.advanceTimersByTime(50);
    expect(long.state).toBe('unlocked');

    jest.advanceTimersByTime(thirtyDays - 1_000);
    expect(long.state).toBe('unlocked');

    jest.advanceTimersByTime(1_000);
    expect(cleared).toEqual(['expired']);
    expect(long.state).toBe('locked');
  });
});

describe('SessionManager with real timers', () => {
  it('does not expire a thirty-day session right away', async () => {
    const sessions = new SessionManager('/tmp/shrine', 30 * 24 * 3600 * 1000);
    sessions.open(makeKey());

    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(sessions.state).toBe('unlocked');
    sessions.clear('shutdown');
  });
});
