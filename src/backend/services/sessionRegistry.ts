/**
 * Session Registry
 *
 * Owns one MetricsLog per browser session and serializes runs within a
 * session: a session holds at most one in-flight generation. A session is
 * only kept once its log holds a record.
 */

import { MetricsLog } from '../../shared/metrics';

interface SessionEntry {
  log: MetricsLog;
  busy: boolean;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, SessionEntry>();

  private entry(sessionId: string): SessionEntry {
    let entry = this.sessions.get(sessionId);
    if (!entry) {
      entry = { log: new MetricsLog(), busy: false };
      this.sessions.set(sessionId, entry);
    }
    return entry;
  }

  /**
   * Mark the session busy and hand out its log.
   * Returns undefined when a run is already in progress for the session.
   */
  tryAcquire(sessionId: string): MetricsLog | undefined {
    const entry = this.entry(sessionId);
    if (entry.busy) {
      return undefined;
    }
    entry.busy = true;
    return entry.log;
  }

  release(sessionId: string): void {
    const entry = this.sessions.get(sessionId);
    if (!entry) return;
    if (entry.log.size === 0) {
      this.sessions.delete(sessionId);
    } else {
      entry.busy = false;
    }
  }

  isBusy(sessionId: string): boolean {
    return this.sessions.get(sessionId)?.busy ?? false;
  }

  /**
   * The session's log without creating one
   */
  peek(sessionId: string): MetricsLog | undefined {
    return this.sessions.get(sessionId)?.log;
  }

  get size(): number {
    return this.sessions.size;
  }
}
