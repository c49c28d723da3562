/**
 * Session manager
 *
 * Holds at most one unlocked key. The expiry is fixed when the session opens
 * and activity never extends it. Expiry, `lock` and shutdown all go through
 * `clear()`, which wipes the key.
 */

import { wipeKey } from '@shrine/storage';
import type { DerivedKey } from '@shrine/storage';
import { MAX_TIMER_DELAY_MS } from '@shrine/ipc';
import type { AgentState } from '@shrine/ipc';

export interface Session {
  key: DerivedKey;
  shrinePath: string;
  unlockedAt: number;
  expiresAt: number;
}

export type ClearReason = 'expired' | 'lock' | 'shutdown' | 'replaced';

export class SessionManager {
  private session: Session | null = null;
  private unlocking = false;
  private expiryTimer: ReturnType<typeof setTimeout> | null = null;
  private onClearHandler?: (reason: ClearReason) => void;

  constructor(
    private readonly shrinePath: string,
    private readonly ttlMs: number,
  ) {}

  /**
   * Register a callback invoked whenever a session is cleared.
   */
  setClearHandler(handler: (reason: ClearReason) => void): void {
    this.onClearHandler = handler;
  }

  get state(): AgentState {
    if (this.current()) return 'unlocked';
    return this.unlocking ? 'unlocking' : 'locked';
  }

  /**
   * Mark the password check as in progress.
   */
  beginUnlock(): void {
    this.unlocking = true;
  }

  abortUnlock(): void {
    this.unlocking = false;
  }

  /**
   * Start a session for `key`, replacing any current one.
   */
  open(key: DerivedKey): Session {
    this.clear('replaced');
    this.unlocking = false;

    const now = Date.now();
    const session: Session = {
      key,
      shrinePath: this.shrinePath,
      unlockedAt: now,
      expiresAt: now + this.ttlMs,
    };
    this.session = session;

    this.scheduleExpiry(session.expiresAt);
    return session;
  }

  /**
   * Node fires longer timers immediately, so far expiries are reached in
   * steps.
   */
  private scheduleExpiry(expiresAt: number): void {
    const delay = Math.min(Math.max(expiresAt - Date.now(), 0), MAX_TIMER_DELAY_MS);
    this.expiryTimer = setTimeout(() => {
      this.expiryTimer = null;
      if (Date.now() >= expiresAt) {
        this.clear('expired');
      } else {
        this.scheduleExpiry(expiresAt);
      }
    }, delay);
    this.expiryTimer.unref?.();
  }

  /**
   * The active session, or undefined once it is past its expiry.
   */
  current(): Session | undefined {
    if (!this.session) return undefined;
    if (Date.now() >= this.session.expiresAt) {
      this.clear('expired');
      return undefined;
    }
    return this.session;
  }

  clear(reason: ClearReason): void {
    if (this.expiryTimer) {
      clearTimeout(this.expiryTimer);
      this.expiryTimer = null;
    }
    if (!this.session) return;

    wipeKey(this.session.key);
    this.session = null;
    this.onClearHandler?.(reason);
  }
}
