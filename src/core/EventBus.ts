import { Logger } from './Logger';

/**
 * Tiny typed event bus for decoupled gameplay hooks (sound cues, effects, diagnostics).
 * Each game owns its own bus; there is no shared global instance.
 */
type Handler<T> = (payload: T) => void;

type HandlerSets<M> = { [K in keyof M]?: Set<Handler<M[K]>> };

export class EventBus<M extends object> {
  private listeners: HandlerSets<M> = {};

  on<K extends keyof M>(type: K, fn: Handler<M[K]>): () => void {
    let set = this.listeners[type];
    if (!set) {
      set = new Set<Handler<M[K]>>();
      this.listeners[type] = set;
    }
    set.add(fn);
    return () => this.off(type, fn);
  }

  off<K extends keyof M>(type: K, fn: Handler<M[K]>): void {
    this.listeners[type]?.delete(fn);
  }

  /** Listener failures are reported and do not stop the remaining listeners or the tick. */
  emit<K extends keyof M>(type: K, payload: M[K]): void {
    const set = this.listeners[type];
    if (!set || set.size === 0) return;
    for (const fn of set) {
      try {
        fn(payload);
      } catch (err) {
        Logger.error(`[EventBus] listener for '${String(type)}' failed`, err);
      }
    }
  }

  clear(): void {
    this.listeners = {};
  }
}
