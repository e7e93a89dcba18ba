import crypto from "node:crypto";
import type { Notice } from "../../../../packages/shared/src/types";
import { env } from "../../config/env";
import { createLogger } from "../../utils/logger";
import {
  applySessionEvent,
  emptySessionState,
  type SessionEvent,
  type SessionEventBody,
  type SessionState
} from "./state";

const log = createLogger("sessions");

type StoredSession = {
  events: SessionEvent[];
  state: SessionState;
  touched_at: number;
};

export type SessionStoreOptions = {
  maxSessions: number;
  ttlMs: number;
  now?: () => number;
};

/**
 * In-memory event store, one ordered event log per session.
 * Sessions idle longer than ttlMs are dropped on access; beyond maxSessions the
 * least recently touched session is evicted.
 */
export class SessionStore {
  private readonly sessions = new Map<string, StoredSession>();
  private readonly now: () => number;

  constructor(private readonly options: SessionStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(template: string): SessionState {
    this.pruneExpired();
    const id = crypto.randomUUID();
    const stored: StoredSession = { events: [], state: emptySessionState(id), touched_at: this.now() };
    this.sessions.set(id, stored);
    this.evictOverflow();
    log.debug(`created ${id} (${this.sessions.size} active)`);
    return this.append(id, { type: "SESSION_CREATED", template });
  }

  /** Current state, or null when the session does not exist or has expired. */
  get(id: string): SessionState | null {
    const stored = this.touch(id);
    return stored ? stored.state : null;
  }

  getEvents(id: string): SessionEvent[] | null {
    const stored = this.touch(id);
    return stored ? [...stored.events] : null;
  }

  /**
   * Append one event and return the reduced state.
   * Throws if the session is unknown; callers resolve the session first.
   */
  append(id: string, body: SessionEventBody, notices: Notice[] = []): SessionState {
    const stored = this.touch(id);
    if (!stored) throw new Error(`Unknown session ${id}`);
    const ev: SessionEvent = {
      ...body,
      seq: stored.state.last_seq + 1,
      created_at: new Date(this.now()).toISOString(),
      notices
    };
    stored.events.push(ev);
    stored.state = applySessionEvent(stored.state, ev);
    return stored.state;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  clear(): void {
    this.sessions.clear();
  }

  private touch(id: string): StoredSession | null {
    const stored = this.sessions.get(id);
    if (!stored) return null;
    const now = this.now();
    if (now - stored.touched_at > this.options.ttlMs) {
      this.sessions.delete(id);
      log.debug(`expired ${id}`);
      return null;
    }
    stored.touched_at = now;
    // Re-insert so Map order tracks recency.
    this.sessions.delete(id);
    this.sessions.set(id, stored);
    return stored;
  }

  private pruneExpired(): void {
    const now = this.now();
    for (const [id, stored] of this.sessions) {
      if (now - stored.touched_at > this.options.ttlMs) this.sessions.delete(id);
    }
  }

  private evictOverflow(): void {
    while (this.sessions.size > this.options.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) return;
      this.sessions.delete(oldest.value);
      log.info(`evicted ${oldest.value} (limit ${this.options.maxSessions})`);
    }
  }
}

export const sessionStore = new SessionStore({
  maxSessions: env.MAX_SESSIONS,
  ttlMs: env.SESSION_TTL_MS
});
