import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus } from '../../../src/kernel/event-bus.js';

const scheduledAt = new Date(2026, 9, 12, 7, 0);
const skipped = { cronExpr: '0 7 * * *', taskId: 'daily', scheduledAt, lastRunEpoch: 0 };

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  it('should subscribe and receive events synchronously', () => {
    const handler = vi.fn();

    eventBus.on('schedule:skipped', handler);
    eventBus.emit('schedule:skipped', skipped);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(skipped);
  });

  it('should unsubscribe via returned function and stop receiving events', () => {
    const handler = vi.fn();

    const unsubscribe = eventBus.on('schedule:skipped', handler);
    eventBus.emit('schedule:skipped', skipped);
    unsubscribe();
    eventBus.emit('schedule:skipped', skipped);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(eventBus.listenerCount('schedule:skipped')).toBe(0);
  });

  it('should remove specific handler with off()', () => {
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    eventBus.on('schedule:skipped', handler1);
    eventBus.on('schedule:skipped', handler2);
    eventBus.off('schedule:skipped', handler1);
    eventBus.emit('schedule:skipped', skipped);

    expect(handler1).not.toHaveBeenCalled();
    expect(handler2).toHaveBeenCalledTimes(1);
    expect(eventBus.listenerCount('schedule:skipped')).toBe(1);
  });

  it('should fire once() handler only once', () => {
    const handler = vi.fn();

    eventBus.once('schedule:skipped', handler);
    eventBus.emit('schedule:skipped', skipped);
    eventBus.emit('schedule:skipped', skipped);

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should keep other events isolated', () => {
    const handler = vi.fn();

    eventBus.on('schedule:task_run', handler);
    eventBus.emit('schedule:skipped', skipped);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should isolate a throwing handler and report it', () => {
    const failing = vi.fn(() => {
      throw new Error('handler broke');
    });
    const healthy = vi.fn();
    const reported = vi.fn();

    eventBus.on('schedule:skipped', failing);
    eventBus.on('schedule:skipped', healthy);
    eventBus.on('system:handler_error', reported);

    expect(() => eventBus.emit('schedule:skipped', skipped)).not.toThrow();
    expect(healthy).toHaveBeenCalledTimes(1);
    expect(eventBus.getHandlerErrorCount()).toBe(1);
    expect(reported).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'schedule:skipped', error: 'handler broke' }),
    );
  });

  it('should not recurse when a handler_error handler throws', () => {
    eventBus.on('system:handler_error', () => {
      throw new Error('reporter broke');
    });
    eventBus.on('schedule:skipped', () => {
      throw new Error('handler broke');
    });

    expect(() => eventBus.emit('schedule:skipped', skipped)).not.toThrow();
    expect(eventBus.getHandlerErrorCount()).toBe(2);
  });

  it('should clear all listeners and the error count', () => {
    eventBus.on('schedule:skipped', () => {
      throw new Error('x');
    });
    eventBus.emit('schedule:skipped', skipped);

    eventBus.clear();

    expect(eventBus.listenerCount('schedule:skipped')).toBe(0);
    expect(eventBus.getHandlerErrorCount()).toBe(0);
  });
});
