import { EventEmitter } from "node:events";

type EventKey<TEvents> = keyof TEvents & string;

/**
 * Type-safe event emitter built on node:events.
 *
 * Usage:
 * ```ts
 * interface QueueEvents {
 *   idle: { delivered: number };
 *   dropped: { count: number };
 * }
 * class Queue extends TypedEventEmitter<QueueEvents> {}
 * ```
 *
 * Event names are plain strings; avoid `"error"`, which node:events throws
 * for when nobody listens.
 */
export class TypedEventEmitter<TEvents extends object> {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(100);
  }

  on<K extends EventKey<TEvents>>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends EventKey<TEvents>>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends EventKey<TEvents>>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  removeAllListeners<K extends EventKey<TEvents>>(event?: K): this {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }

  listenerCount<K extends EventKey<TEvents>>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  protected emit<K extends EventKey<TEvents>>(event: K, payload: TEvents[K]): boolean {
    return this.emitter.emit(event, payload);
  }
}
