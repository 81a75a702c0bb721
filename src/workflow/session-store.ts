import { DeploymentContext } from "../types.js";

export interface SessionStoreOptions {
  maxEntries?: number;
  ttlMs?: number;
  now?: () => number;
}

interface StoredSession {
  context: DeploymentContext;
  touchedAt: number;
}

/**
 * Latest context per session, held in memory. Sessions idle for longer than
 * `ttlMs` are dropped, and past `maxEntries` the least recently saved go
 * first. A session running a step, or the one being saved, is never dropped.
 */
export class SessionStore {
  private readonly sessions = new Map<string, StoredSession>();
  private readonly busy = new Set<string>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.maxEntries = options.maxEntries ?? 500;
    this.ttlMs = options.ttlMs ?? 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  get(sessionId: string): DeploymentContext | undefined {
    this.evict();
    return this.sessions.get(sessionId)?.context;
  }

  save(context: DeploymentContext): DeploymentContext {
    // Re-insert so Map order stays least recently saved first.
    this.sessions.delete(context.sessionId);
    this.sessions.set(context.sessionId, { context, touchedAt: this.now() });
    this.evict(context.sessionId);
    return context;
  }

  /** Marks a session as running a step; false when one is already running. */
  tryBegin(sessionId: string): boolean {
    if (this.busy.has(sessionId)) {
      return false;
    }
    this.busy.add(sessionId);
    return true;
  }

  end(sessionId: string): void {
    this.busy.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  private evict(keep?: string): void {
    const expiredBefore = this.now() - this.ttlMs;
    let excess = this.sessions.size - this.maxEntries;

    for (const [sessionId, stored] of this.sessions) {
      if (sessionId === keep || this.busy.has(sessionId)) {
        continue;
      }
      if (stored.touchedAt <= expiredBefore || excess > 0) {
        this.sessions.delete(sessionId);
        excess -= 1;
      }
    }
  }
}
