// src/lib/advisor/sessionStore.ts
import { randomUUID } from "crypto";
import * as logger from "../logger";
import { ConversationSession } from "./session";

type Entry = { session: ConversationSession; lastSeen: number };

/**
 * In-memory sessions keyed by chat session id or call SID. Idle entries
 * expire after `ttlMs`; nothing survives a restart.
 */
export class SessionStore {
  private readonly entries = new Map<string, Entry>();

  constructor(
    private readonly factory: () => ConversationSession,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  create(id: string = randomUUID()): { id: string; session: ConversationSession } {
    this.sweep();
    const session = this.factory();
    this.entries.set(id, { session, lastSeen: this.now() });
    return { id, session };
  }

  get(id: string): ConversationSession | null {
    const entry = this.entries.get(id);
    if (!entry) return null;

    if (this.now() - entry.lastSeen > this.ttlMs) {
      this.entries.delete(id);
      logger.debug("⌛ [SESSIONS] expired", id);
      return null;
    }
    entry.lastSeen = this.now();
    return entry.session;
  }

  getOrCreate(id: string): ConversationSession {
    return this.get(id) ?? this.create(id).session;
  }

  delete(id: string): boolean {
    return this.entries.delete(id);
  }

  get size() {
    return this.entries.size;
  }

  sweep() {
    const cutoff = this.now() - this.ttlMs;
    for (const [id, entry] of this.entries) {
      if (entry.lastSeen < cutoff) this.entries.delete(id);
    }
  }
}
