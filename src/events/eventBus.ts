type Listener<T> = (event: T) => void | Promise<void>;

/**
 * Typed in-process pub/sub. `emit` awaits each listener in registration
 * order, so a caller that awaits it observes every side effect.
 */
export class EventBus<EventMap extends { [event: string]: unknown }> {
  private listeners: { [K in keyof EventMap]?: Listener<EventMap[K]>[] } = {};

  /** Returns a function that removes the listener again. */
  on<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    (this.listeners[event] ||= []).push(listener);
    return () => this.off(event, listener);
  }

  off<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): void {
    const list = this.listeners[event];
    if (!list) return;
    const idx = list.indexOf(listener);
    if (idx >= 0) list.splice(idx, 1);
  }

  async emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): Promise<void> {
    const list = this.listeners[event];
    if (!list) return;
    // Snapshot: a listener may unsubscribe itself mid-dispatch
    for (const l of [...list]) {
      await l(payload);
    }
  }
}
