// Session: per-user bounded conversation history

import type { Turn } from "./message";

export interface Session {
  readonly userId: string;
  readonly createdAt: number;
}

export interface SessionRegistry {
  /** Return the session for a user, creating an empty one on first contact. */
  getOrCreate(userId: string): Promise<Session>;

  /** Append a turn and drop the oldest turns beyond the window. */
  appendAndTrim(session: Session, turn: Turn): Promise<void>;

  /** Independent copy of the session's current turns. */
  snapshot(session: Session): Promise<readonly Turn[]>;
}
