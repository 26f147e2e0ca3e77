// Session store: maps a user identity to a bounded conversation history

import type { Session, SessionRegistry, Turn } from "./types";
import { SessionError } from "./types";
import { Mutex, ReadWriteLock } from "./locks";

export const DEFAULT_MAX_CONTEXT_MESSAGES = 10;

class SessionState implements Session {
  readonly createdAt = Date.now();
  readonly lock = new Mutex();
  turns: Turn[] = [];

  constructor(readonly userId: string) {}
}

/**
 * In-memory session registry.
 *
 * Two lock tiers: the registry map sits behind a reader/writer lock, and
 * every session owns a mutex around its turn list, so unrelated users
 * never contend. Sessions live for the lifetime of the process.
 */
export class SessionStore implements SessionRegistry {
  private readonly sessions = new Map<string, SessionState>();
  private readonly registryLock = new ReadWriteLock();

  constructor(readonly maxContextMessages: number = DEFAULT_MAX_CONTEXT_MESSAGES) {
    if (!Number.isInteger(maxContextMessages) || maxContextMessages < 1) {
      throw new SessionError(
        `maxContextMessages must be a positive integer, got ${maxContextMessages}`,
      );
    }
  }

  async getOrCreate(userId: string): Promise<Session> {
    const existing = await this.registryLock.read(() => this.sessions.get(userId));
    if (existing) return existing;

    return this.registryLock.write(() => {
      // Another caller may have registered it while we waited for the write lock
      const raced = this.sessions.get(userId);
      if (raced) return raced;

      const session = new SessionState(userId);
      this.sessions.set(userId, session);
      return session;
    });
  }

  async appendAndTrim(session: Session, turn: Turn): Promise<void> {
    const state = await this.stateOf(session);
    await state.lock.runExclusive(() => {
      state.turns.push(turn);
      const overflow = state.turns.length - this.maxContextMessages;
      if (overflow > 0) {
        state.turns.splice(0, overflow);
      }
    });
  }

  async snapshot(session: Session): Promise<readonly Turn[]> {
    const state = await this.stateOf(session);
    return state.lock.runExclusive(() => [...state.turns]);
  }

  async has(userId: string): Promise<boolean> {
    return this.registryLock.read(() => this.sessions.has(userId));
  }

  get size(): number {
    return this.sessions.size;
  }

  private async stateOf(session: Session): Promise<SessionState> {
    const state = await this.registryLock.read(() => this.sessions.get(session.userId));
    if (!state || state !== session) {
      throw new SessionError(`Session is not registered in this store: ${session.userId}`);
    }
    return state;
  }
}
