/**
 * Executors keyed by (session id, agent name). The first caller for a key
 * stores the pending creation, so callers racing on that key share one
 * instance while other keys proceed independently. A failed creation is
 * dropped so the next caller can retry.
 */
export class ExecutorCache<T> {
  private readonly entries = new Map<string, Promise<T>>();

  static key(sessionId: string, agentName: string): string {
    return `${sessionId}:${agentName}`;
  }

  getOrCreate(sessionId: string, agentName: string, factory: () => T | Promise<T>): Promise<T> {
    const key = ExecutorCache.key(sessionId, agentName);
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }

    const pending = Promise.resolve().then(factory);
    this.entries.set(key, pending);
    void pending.catch(() => {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
    });
    return pending;
  }

  get size(): number {
    return this.entries.size;
  }
}
