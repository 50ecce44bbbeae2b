/** Minimal strongly-typed event emitter used by the client. */
export class EventEmitter<
  T extends Record<string, unknown[]> = Record<string, unknown[]>,
> {
  #listeners: { [K in keyof T]?: Array<(...args: T[K]) => void> } = {};

  on<K extends keyof T>(event: K, listener: (...args: T[K]) => void): this {
    const eventListeners = this.#listeners[event] ?? [];
    eventListeners.push(listener);
    this.#listeners[event] = eventListeners;
    return this;
  }

  off<K extends keyof T>(event: K, listener: (...args: T[K]) => void): this {
    const eventListeners = this.#listeners[event];
    if (eventListeners) {
      const index = eventListeners.indexOf(listener);
      if (index !== -1) {
        eventListeners.splice(index, 1);
      }
    }
    return this;
  }

  protected emit<K extends keyof T>(event: K, ...args: T[K]): void {
    // copy so listeners may unsubscribe while being called
    for (const listener of [...(this.#listeners[event] ?? [])]) {
      listener(...args);
    }
  }
}
