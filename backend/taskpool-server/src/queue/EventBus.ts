/**
 * EventBus
 *
 * Publish/subscribe channel for pool lifecycle events. The event map type
 * parameter ties each event name to its payload:
 *
 * ```typescript
 * const bus = new EventBus<SchedulerEvents>();
 * bus.subscribe("task.failed", (event) => alert(event.payload.name));
 * bus.publishSync("task.failed", { name: "sync", error: "timeout", durationMs: 12 });
 * ```
 *
 * - Multiple subscribers per event, plus wildcard ('*') subscribers
 * - Handler failures are isolated from the publisher and from each other
 */

import type { Logger } from "pino";
import { getDefaultLogger } from "../logger";
import { toError } from "./errors";

export type EventMap = Record<string, unknown>;

/**
 * Published event envelope
 */
export interface Event<T = unknown> {
  /** Event name (e.g. 'task.admitted') */
  type: string;
  payload: T;
  timestamp: Date;
}

export type EventHandler<T = unknown> = (event: Event<T>) => void | Promise<void>;

export interface Subscription {
  id: string;
  eventType: string;
  unsubscribe: () => void;
}

export interface EventBusOptions {
  /** Where handler errors are reported */
  logger?: Logger;
}

interface SubscriptionRecord {
  id: string;
  handler: EventHandler;
}

export const WILDCARD = "*";

export class EventBus<TEvents extends EventMap = EventMap> {
  private readonly subscriptions: Map<string, SubscriptionRecord[]> = new Map();
  private subscriptionCounter: number = 0;
  private readonly logger: Logger;

  constructor(options: EventBusOptions = {}) {
    this.logger = options.logger ?? getDefaultLogger();
  }

  /**
   * Subscribe to one event type.
   */
  subscribe<K extends keyof TEvents & string>(eventType: K, handler: EventHandler<TEvents[K]>): Subscription {
    return this.addSubscription(eventType, handler as EventHandler);
  }

  /**
   * Subscribe to every event type.
   */
  subscribeAll(handler: EventHandler<TEvents[keyof TEvents]>): Subscription {
    return this.addSubscription(WILDCARD, handler as EventHandler);
  }

  /**
   * @returns true if the subscription existed
   */
  unsubscribe(eventType: string, subscriptionId: string): boolean {
    const subs = this.subscriptions.get(eventType);
    const index = subs?.findIndex((s) => s.id === subscriptionId) ?? -1;
    if (!subs || index === -1) {
      return false;
    }
    subs.splice(index, 1);
    if (subs.length === 0) {
      this.subscriptions.delete(eventType);
    }
    return true;
  }

  /**
   * Publish without waiting. Handlers run synchronously up to their first
   * await; failures (sync or async) are logged, never thrown at the publisher.
   *
   * @returns the number of handlers invoked
   */
  publishSync<K extends keyof TEvents & string>(eventType: K, payload: TEvents[K]): number {
    const event: Event = { type: eventType, payload, timestamp: new Date() };
    const handlers = [...(this.subscriptions.get(eventType) ?? []), ...(this.subscriptions.get(WILDCARD) ?? [])];

    for (const sub of handlers) {
      try {
        const result = sub.handler(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportHandlerError(event, toError(error)));
        }
      } catch (error) {
        this.reportHandlerError(event, toError(error));
      }
    }

    return handlers.length;
  }

  getSubscriberCount(eventType: string): number {
    const specific = this.subscriptions.get(eventType)?.length ?? 0;
    const wildcard = eventType !== WILDCARD ? (this.subscriptions.get(WILDCARD)?.length ?? 0) : 0;
    return specific + wildcard;
  }

  /**
   * Remove all subscriptions
   */
  clear(): void {
    this.subscriptions.clear();
    this.subscriptionCounter = 0;
  }

  private addSubscription(eventType: string, handler: EventHandler): Subscription {
    const id = `sub-${(++this.subscriptionCounter).toString(16)}`;
    const subs = this.subscriptions.get(eventType) ?? [];
    subs.push({ id, handler });
    this.subscriptions.set(eventType, subs);

    return {
      id,
      eventType,
      unsubscribe: () => {
        this.unsubscribe(eventType, id);
      },
    };
  }

  private reportHandlerError(event: Event, error: Error): void {
    this.logger.error({ err: error, event: event.type }, `Event handler for ${event.type} failed: ${error.message}`);
  }
}
