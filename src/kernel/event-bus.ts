import { createLogger } from '../utils/logger.js';

const log = createLogger('event-bus');

/**
 * EventMap interface defining event name to payload mappings.
 */
export interface EventMap {
  'schedule:evaluated': { cronExpr: string; taskId: string; now: Date; scheduledAt: Date | null };
  'schedule:skipped': { cronExpr: string; taskId: string; scheduledAt: Date; lastRunEpoch: number };
  'schedule:task_run': { cronExpr: string; taskId: string; scheduledAt: Date; startedAt: Date };
  'schedule:task_complete': {
    cronExpr: string;
    taskId: string;
    scheduledAt: Date;
    durationMs: number;
    success: boolean;
    error?: string;
  };
  'system:handler_error': { event: string; error: string; handler: string; timestamp: Date };
}

/**
 * Typed synchronous event bus. A throwing handler is logged and reported
 * on 'system:handler_error'; it never interrupts the emitter.
 */
export class EventBus {
  private listeners: Map<keyof EventMap, Set<(payload: never) => void>> = new Map();
  private handlerErrors = 0;

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof EventMap>(event: K, handler: (payload: EventMap[K]) => void): () => void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }
    handlers.add(handler);

    return () => this.off(event, handler);
  }

  off<K extends keyof EventMap>(event: K, handler: (payload: EventMap[K]) => void): void {
    const handlers = this.listeners.get(event);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const handlers = this.listeners.get(event);
    if (!handlers) return;

    for (const handler of [...handlers]) {
      try {
        (handler as (payload: EventMap[K]) => void)(payload);
      } catch (error) {
        this.handlerErrors++;
        const errorMsg = error instanceof Error ? error.message : String(error);

        log.error({ event, err: error }, 'Error in event handler');

        // Guard against recursion from handler_error handlers
        if (event !== 'system:handler_error') {
          this.emit('system:handler_error', {
            event,
            error: errorMsg,
            handler: handler.name || 'anonymous',
            timestamp: new Date(),
          });
        }
      }
    }
  }

  /**
   * Subscribe to an event for a single occurrence
   * @returns Unsubscribe function
   */
  once<K extends keyof EventMap>(event: K, handler: (payload: EventMap[K]) => void): () => void {
    const wrappedHandler = (payload: EventMap[K]): void => {
      this.off(event, wrappedHandler);
      handler(payload);
    };

    return this.on(event, wrappedHandler);
  }

  clear(): void {
    this.listeners.clear();
    this.handlerErrors = 0;
  }

  listenerCount(event: keyof EventMap): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  getHandlerErrorCount(): number {
    return this.handlerErrors;
  }
}
