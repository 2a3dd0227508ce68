import type { ResolutionOrchestrator } from "./agent/orchestrator";

/**
 * One orchestrator per conversation so memory never crosses sessions. The
 * least recently used session is dropped once the limit is reached.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, ResolutionOrchestrator>();

  constructor(
    private readonly createOrchestrator: () => ResolutionOrchestrator,
    private readonly limit = 500
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get(sessionId: string): ResolutionOrchestrator {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      this.sessions.delete(sessionId);
      this.sessions.set(sessionId, existing);
      return existing;
    }

    const orchestrator = this.createOrchestrator();
    this.sessions.set(sessionId, orchestrator);
    while (this.sessions.size > this.limit) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
    return orchestrator;
  }

  /** Clears the session's memory; false when the session is unknown. */
  clear(sessionId: string): boolean {
    const orchestrator = this.sessions.get(sessionId);
    if (!orchestrator) {
      return false;
    }
    orchestrator.clearHistory();
    return true;
  }
}
