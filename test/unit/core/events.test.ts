import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/core/events.js';
import type { VoxEvent } from '../../../src/core/types.js';

describe('EventBus', () => {
  it('should deliver published events to subscribers of that type', () => {
    const bus = new EventBus();
    const received: VoxEvent<'overlay:hidden'>[] = [];
    bus.subscribe('overlay:hidden', (event) => received.push(event));

    bus.publish({ type: 'overlay:hidden', data: { overlay: 'grid' } });
    bus.publish({ type: 'overlay:shown', data: { overlay: 'grid', options: {} } });

    expect(received).toHaveLength(1);
    expect(received[0].data.overlay).toBe('grid');
  });

  it('should freeze delivered events', () => {
    const bus = new EventBus();
    const received: VoxEvent<'text:typed'>[] = [];
    bus.subscribe('text:typed', (event) => received.push(event));

    bus.emit('text:typed', { text: 'hi', length: 2 });

    expect(received).toHaveLength(1);
    expect(Object.isFrozen(received[0])).toBe(true);
    expect(Object.isFrozen(received[0].data)).toBe(true);
  });

  it('should ignore a second subscription of the same callback', () => {
    const bus = new EventBus();
    const callback = vi.fn();
    bus.subscribe('error', callback);
    bus.subscribe('error', callback);

    bus.emit('error', { component: 'test', error: 'boom' });

    expect(callback).toHaveBeenCalledTimes(1);
    expect(bus.subscriberCount('error')).toBe(1);
  });

  it('should stop delivering after unsubscribe', () => {
    const bus = new EventBus();
    const callback = vi.fn();
    bus.subscribe('error', callback);
    bus.unsubscribe('error', callback);

    bus.emit('error', { component: 'test', error: 'boom' });

    expect(callback).not.toHaveBeenCalled();
    expect(bus.subscriberCount('error')).toBe(0);
  });

  it('should treat unsubscribing an unknown callback as a no-op', () => {
    const bus = new EventBus();
    expect(() => bus.unsubscribe('error', vi.fn())).not.toThrow();
  });

  it('should keep delivering when a subscriber throws', () => {
    const bus = new EventBus();
    const after = vi.fn();
    bus.subscribe('error', () => {
      throw new Error('subscriber failure');
    });
    bus.subscribe('error', after);

    expect(() => bus.emit('error', { component: 'test', error: 'boom' })).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('should deliver to subscribers in subscription order', () => {
    const bus = new EventBus();
    const order: string[] = [];
    bus.subscribe('overlay:hidden', () => order.push('first'));
    bus.subscribe('overlay:hidden', () => order.push('second'));

    bus.emit('overlay:hidden', { overlay: 'help' });

    expect(order).toEqual(['first', 'second']);
  });

  it('should remove every subscriber on clear', () => {
    const bus = new EventBus();
    const callback = vi.fn();
    bus.subscribe('error', callback);
    bus.subscribe('overlay:hidden', callback);
    bus.clear();

    bus.emit('error', { component: 'test', error: 'boom' });

    expect(callback).not.toHaveBeenCalled();
    expect(bus.subscriberCount('overlay:hidden')).toBe(0);
  });
});
