import type { RunnerEvent, RunnerEventType } from './RunnerEvents.js';

export type EventHandler = (event: RunnerEvent) => void | Promise<void>;

/**
 * Receives errors thrown by event handlers
 */
export type HandlerErrorReporter = (eventType: RunnerEventType, error: unknown) => void;

const reportToConsole: HandlerErrorReporter = (eventType, error) => {
  console.error(`[EventBus] Handler error for event '${eventType}':`, error);
};

/**
 * EventBus - pub/sub between the runner and its observers
 *
 * - Handlers run in registration order; async handlers are awaited
 * - A throwing handler is reported and does not stop the others
 * - '*' subscribes to every event
 *
 * @example
 * ```ts
 * const bus = new EventBus();
 *
 * bus.on(RunnerEventType.TASK_STARTED, (event) => {
 *   if (event.type === RunnerEventType.TASK_STARTED) {
 *     console.log(`running task: ${event.payload.taskId}`);
 *   }
 * });
 *
 * await bus.emit(event);
 * ```
 */
export class EventBus {
  private listeners: Map<RunnerEventType, EventHandler[]> = new Map();
  private wildcardListeners: EventHandler[] = [];
  private readonly onHandlerError: HandlerErrorReporter;

  constructor(options: { onHandlerError?: HandlerErrorReporter } = {}) {
    this.onHandlerError = options.onHandlerError ?? reportToConsole;
  }

  /**
   * Subscribe to one event type, or '*' for all
   *
   * @returns Unsubscribe function
   */
  on(eventType: RunnerEventType | '*', handler: EventHandler): () => void {
    if (eventType === '*') {
      this.wildcardListeners.push(handler);
      return () => {
        const index = this.wildcardListeners.indexOf(handler);
        if (index !== -1) {
          this.wildcardListeners.splice(index, 1);
        }
      };
    }

    const handlers = this.listeners.get(eventType) ?? [];
    handlers.push(handler);
    this.listeners.set(eventType, handlers);

    return () => {
      const current = this.listeners.get(eventType);
      if (current) {
        const index = current.indexOf(handler);
        if (index !== -1) {
          current.splice(index, 1);
        }
      }
    };
  }

  /**
   * Subscribe to several event types with the same handler
   */
  onMany(eventTypes: RunnerEventType[], handler: EventHandler): () => void {
    const unsubscribers = eventTypes.map((type) => this.on(type, handler));
    return () => {
      unsubscribers.forEach((unsub) => unsub());
    };
  }

  /**
   * Fire once, then unsubscribe
   */
  once(eventType: RunnerEventType, handler: EventHandler): void {
    const unsubscribe = this.on(eventType, async (event) => {
      unsubscribe();
      await handler(event);
    });
  }

  async emit(event: RunnerEvent): Promise<void> {
    const handlers = this.listeners.get(event.type) ?? [];
    const allHandlers = [...handlers, ...this.wildcardListeners];

    for (const handler of allHandlers) {
      try {
        await handler(event);
      } catch (error) {
        this.onHandlerError(event.type, error);
      }
    }
  }

  /**
   * Remove all handlers for one event type
   */
  off(eventType: RunnerEventType): void {
    this.listeners.delete(eventType);
  }

  clear(): void {
    this.listeners.clear();
    this.wildcardListeners = [];
  }

  listenerCount(eventType: RunnerEventType): number {
    return (this.listeners.get(eventType) ?? []).length;
  }

  hasListeners(eventType: RunnerEventType): boolean {
    return this.listenerCount(eventType) > 0 || this.wildcardListeners.length > 0;
  }
}
