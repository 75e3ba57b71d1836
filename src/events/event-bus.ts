/**
 * Synchronous multi-subscriber event bus
 */

import { Clock, SystemClock } from '../types/clock';
import { Logger } from '../types/logger';
import { errorMessage } from '../core/errors';
import {
  EventInput,
  WorkflowEvent,
  WorkflowEventMap,
  WorkflowEventType,
  isEventOfType,
} from './events';

type AnyHandler = (event: WorkflowEvent) => void;

interface Subscription {
  type: WorkflowEventType | '*';
  original: unknown;
  invoke: AnyHandler;
}

export class EventBus {
  private subscriptions: Subscription[] = [];

  constructor(
    private readonly logger: Logger,
    private readonly clock: Clock = new SystemClock()
  ) {}

  /**
   * Subscribe to one event type
   */
  on<K extends WorkflowEventType>(type: K, handler: (event: WorkflowEventMap[K]) => void): void {
    this.subscriptions.push({
      type,
      original: handler,
      invoke: (event) => {
        if (isEventOfType(event, type)) {
          handler(event);
        }
      },
    });
  }

  /**
   * Subscribe to every event
   */
  onAny(handler: AnyHandler): void {
    this.subscriptions.push({ type: '*', original: handler, invoke: handler });
  }

  off<K extends WorkflowEventType>(type: K, handler: (event: WorkflowEventMap[K]) => void): void {
    this.remove(type, handler);
  }

  offAny(handler: AnyHandler): void {
    this.remove('*', handler);
  }

  /**
   * Deliver an event to its subscribers in subscription order.
   * A throwing subscriber is logged and the rest still run.
   */
  emit(input: EventInput): void {
    const event: WorkflowEvent = { ...input, timestamp: this.clock.iso() };
    for (const sub of [...this.subscriptions]) {
      if (sub.type !== '*' && sub.type !== event.type) {
        continue;
      }
      try {
        sub.invoke(event);
      } catch (error) {
        this.logger.event('subscriber_failed', `Event subscriber failed on ${event.type}: ${errorMessage(error)}`, {
          eventType: event.type,
        });
      }
    }
  }

  hasHandlers(type?: WorkflowEventType): boolean {
    if (type === undefined) {
      return this.subscriptions.length > 0;
    }
    return this.subscriptions.some((sub) => sub.type === type || sub.type === '*');
  }

  clear(): void {
    this.subscriptions = [];
  }

  private remove(type: WorkflowEventType | '*', handler: unknown): void {
    this.subscriptions = this.subscriptions.filter(
      (sub) => !(sub.type === type && sub.original === handler)
    );
  }
}
