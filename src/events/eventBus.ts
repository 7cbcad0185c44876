import { getLogger } from '../utils/logging.js';

type Listener<T> = (event: T) => void | Promise<void>;

/**
 * Typed in-process event bus. Listeners run in registration order; a failing
 * listener is logged and does not stop the others or the emitter.
 */
export class EventBus<EventMap extends { [event: string]: unknown }> {
  private listeners: { [K in keyof EventMap]?: Listener<EventMap[K]>[] } = {};

  on<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    (this.listeners[event] ||= []).push(listener);
    return () => this.off(event, listener);
  }

  off<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): void {
    const list = this.listeners[event];
    if (!list) return;
    this.listeners[event] = list.filter((l) => l !== listener);
  }

  async emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): Promise<void> {
    const list = this.listeners[event];
    if (!list) return;
    for (const l of list) {
      try {
        await l(payload);
      } catch (err) {
        getLogger().error({ err, event: String(event) }, 'event listener failed');
      }
    }
  }
}
