import { EventEmitter } from 'eventemitter3';
import { getLogger } from './logger.js';
import type { EventCallback, EventSink, EventType, VoxEvent, VoxEvents } from './types.js';

type Listener = (event: VoxEvent<never>) => void;

/**
 * Synchronous publish/subscribe bus.
 *
 * One instance is constructed at startup and handed to every component that
 * publishes or listens. Subscribing the same callback twice is a no-op, and a
 * throwing subscriber is logged without disturbing the other subscribers or
 * the publisher.
 */
export class EventBus implements EventSink {
  private emitter = new EventEmitter();
  private wrappers = new Map<EventType, Map<EventCallback<never>, Listener>>();

  subscribe<K extends EventType>(type: K, callback: EventCallback<K>): void {
    let byCallback = this.wrappers.get(type);
    if (!byCallback) {
      byCallback = new Map();
      this.wrappers.set(type, byCallback);
    }
    if (byCallback.has(callback)) return;

    const wrapper = (event: VoxEvent<K>): void => {
      try {
        callback(event);
      } catch (err) {
        getLogger().error({ event: type, err }, 'Event subscriber threw');
      }
    };
    byCallback.set(callback, wrapper);
    this.emitter.on(type, wrapper);
  }

  unsubscribe<K extends EventType>(type: K, callback: EventCallback<K>): void {
    const byCallback = this.wrappers.get(type);
    const wrapper = byCallback?.get(callback);
    if (!byCallback || !wrapper) return;
    byCallback.delete(callback);
    this.emitter.off(type, wrapper);
  }

  publish<K extends EventType>(event: VoxEvent<K>): void {
    const frozen: VoxEvent<K> = Object.freeze({
      type: event.type,
      data: Object.freeze({ ...event.data }),
    });
    this.emitter.emit(event.type, frozen);
  }

  /** Convenience for publishers that have the parts rather than an event. */
  emit<K extends EventType>(type: K, data: VoxEvents[K]): void {
    this.publish({ type, data });
  }

  subscriberCount(type: EventType): number {
    return this.emitter.listenerCount(type);
  }

  clear(): void {
    this.emitter.removeAllListeners();
    this.wrappers.clear();
  }
}
