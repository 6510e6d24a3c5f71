/** Typed listener registry. Dispatch iterates over a snapshot, so listeners may unsubscribe while handling an event. */
export class EventTarget<
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  EventTypesMap extends { [key: string]: (...args: any[]) => unknown },
> {
  private readonly listeners = new Map<
    keyof EventTypesMap,
    Set<EventTypesMap[keyof EventTypesMap]>
  >();

  private getListeners<K extends keyof EventTypesMap>(eventName: K) {
    let listeners = this.listeners.get(eventName);
    if (!listeners) {
      listeners = new Set();
      this.listeners.set(eventName, listeners);
    }
    return listeners;
  }

  public dispatchEvent<K extends keyof EventTypesMap>(
    eventName: K,
    ...args: Parameters<EventTypesMap[K]>
  ) {
    const listeners = this.listeners.get(eventName);
    if (!listeners) return;
    for (const listener of [...listeners]) {
      listener(...args);
    }
  }

  /** Returns a function dispatching `eventName`, bound to its listener set. */
  public getEventDispatcher<K extends keyof EventTypesMap>(eventName: K) {
    const listeners = this.getListeners(eventName);
    return (...args: Parameters<EventTypesMap[K]>) => {
      for (const listener of [...listeners]) {
        listener(...args);
      }
    };
  }

  /** @returns A function removing the listener. */
  public addEventListener<K extends keyof EventTypesMap>(
    eventName: K,
    listener: EventTypesMap[K],
  ): () => void {
    this.getListeners(eventName).add(listener);
    return () => this.removeEventListener(eventName, listener);
  }

  public removeEventListener<K extends keyof EventTypesMap>(
    eventName: K,
    listener: EventTypesMap[K],
  ) {
    this.listeners.get(eventName)?.delete(listener);
  }

  public listenerCount(eventName: keyof EventTypesMap) {
    return this.listeners.get(eventName)?.size ?? 0;
  }
}
