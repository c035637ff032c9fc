import type { SessionState } from './types.js';
import type { ProcessResult, WorkflowEngine } from './workflowEngine.js';

export interface SessionStore {
  getSession(id: string): Promise<SessionState>;
  saveSession(id: string, state: SessionState): Promise<void>;
  resetSession(id: string): Promise<void>;
  /** Feeds `text` to the engine; calls for one session run one after another. */
  process(id: string, text: string): Promise<ProcessResult>;
}

/**
 * In-memory store. Sessions are independent; within a session every
 * `process` call sees the state the previous one saved.
 */
export function createSessionStore(engine: WorkflowEngine): SessionStore {
  const mem = new Map<string, SessionState>();
  const queues = new Map<string, Promise<void>>();

  function exclusive<T>(id: string, task: () => Promise<T>): Promise<T> {
    const previous = queues.get(id) ?? Promise.resolve();
    const run = previous.then(task);
    const tail: Promise<void> = run
      .then(() => undefined, () => undefined)
      .then(() => {
        if (queues.get(id) === tail) queues.delete(id);
      });
    queues.set(id, tail);
    return run;
  }

  const store: SessionStore = {
    async getSession(id) {
      const existing = mem.get(id);
      if (existing) return existing;
      const fresh = engine.createInitialState(id);
      mem.set(id, fresh);
      return fresh;
    },

    async saveSession(id, state) {
      mem.set(id, state);
    },

    async resetSession(id) {
      await exclusive(id, async () => {
        mem.delete(id);
      });
    },

    process(id, text) {
      return exclusive(id, async () => {
        const prior = await store.getSession(id);
        const result = await engine.process(text, prior);
        await store.saveSession(id, result.state);
        return result;
      });
    }
  };
  return store;
}
