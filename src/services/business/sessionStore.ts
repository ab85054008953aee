/**
 * Download Session Store
 * Tracks at most one cancellable download per user.
 *
 * Every method is synchronous. On the single-threaded event loop each call
 * runs to completion before any other, so check-and-insert in `start` can
 * never interleave with another `start`, `cancel` or `finish`.
 */

export type UserId = number;

export interface Session {
  userId: UserId;
  controller: AbortController;
  startedAt: number;
}

/** Returned by `start` when the user already has an active session. */
export const REJECTED = Symbol("session-rejected");
export type Rejected = typeof REJECTED;

export class SessionStore {
  private readonly sessions = new Map<UserId, Session>();

  /**
   * Registers a new session and returns its cancellation signal,
   * or `REJECTED` if one is already active for this user.
   */
  start(userId: UserId): AbortSignal | Rejected {
    if (this.sessions.has(userId)) {
      console.log(`[sessions] rejected start for user ${userId}: download already active`);
      return REJECTED;
    }

    const controller = new AbortController();
    this.sessions.set(userId, { userId, controller, startedAt: Date.now() });
    return controller.signal;
  }

  /**
   * Signals cancellation of the user's active session.
   * Advisory: the fetcher observes the signal at its own pace.
   */
  cancel(userId: UserId): boolean {
    const session = this.sessions.get(userId);
    if (!session) return false;

    session.controller.abort();
    console.log(`[sessions] cancellation requested by user ${userId}`);
    return true;
  }

  /** Removes the user's session. No-op when absent. */
  finish(userId: UserId): void {
    this.sessions.delete(userId);
  }

  has(userId: UserId): boolean {
    return this.sessions.has(userId);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Signals every active session, used on shutdown. Returns how many were signalled. */
  cancelAll(): number {
    for (const session of this.sessions.values()) {
      session.controller.abort();
    }
    return this.sessions.size;
  }
}
