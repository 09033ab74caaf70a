/**
 * EventBroadcaster
 *
 * Relays scheduler events to WebSocket clients. Every client receives every
 * event until it narrows its subscription to some event types or task names.
 *
 * Client messages (JSON):
 * - `{ "action": "subscribe", "types": ["task.failed"], "tasks": ["sync"] }`
 * - `{ "action": "unsubscribe" }` (back to receiving everything)
 * - `{ "action": "ping" }`
 */

import { WebSocket } from "ws";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { Event, Subscription } from "../queue/EventBus";
import { SCHEDULER_EVENT_TYPES, type SchedulerEventBus, type SchedulerEventType } from "../queue/events";

/**
 * Message sent to WebSocket clients
 */
export type BroadcastMessage =
  | { type: "event"; event: string; payload: unknown; timestamp: string }
  | { type: "status"; data: { status: string; clientId: string }; timestamp: string }
  | { type: "error"; data: { error: string }; timestamp: string };

const EventTypeSchema = z.enum(SCHEDULER_EVENT_TYPES);

const ClientMessageSchema = z.discriminatedUnion("action", [
  z.object({
    action: z.literal("subscribe"),
    types: z.array(EventTypeSchema).optional(),
    tasks: z.array(z.string().min(1)).optional(),
  }),
  z.object({ action: z.literal("unsubscribe") }),
  z.object({ action: z.literal("ping") }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export interface SubscribeFilter {
  /** Event types to receive; all when empty */
  types?: SchedulerEventType[];
  /** Task names to receive task events for; all when empty */
  tasks?: string[];
}

interface ClientSubscription {
  socket: WebSocket;
  types: Set<string>;
  tasks: Set<string>;
}

function taskNameOf(payload: unknown): string | undefined {
  if (typeof payload === "object" && payload !== null && "name" in payload && typeof payload.name === "string") {
    return payload.name;
  }
  return undefined;
}

export class EventBroadcaster {
  /** Map of client ID to subscription info */
  private clients: Map<string, ClientSubscription> = new Map();
  private readonly subscription: Subscription;

  constructor(events: SchedulerEventBus) {
    this.subscription = events.subscribeAll((event) => this.broadcast(event));
  }

  /**
   * Register a new WebSocket client
   *
   * @returns The client ID for this connection
   */
  addClient(socket: WebSocket): string {
    const clientId = uuidv4();

    this.clients.set(clientId, {
      socket,
      types: new Set(),
      tasks: new Set(),
    });

    socket.on("close", () => {
      this.removeClient(clientId);
    });

    socket.on("error", () => {
      this.removeClient(clientId);
    });

    this.sendToClient(clientId, {
      type: "status",
      data: { status: "connected", clientId },
      timestamp: new Date().toISOString(),
    });

    return clientId;
  }

  removeClient(clientId: string): void {
    this.clients.delete(clientId);
  }

  /**
   * Narrow what a client receives. Replaces any previous filter.
   */
  subscribe(clientId: string, filter: SubscribeFilter = {}): boolean {
    const client = this.clients.get(clientId);
    if (!client) return false;

    client.types = new Set(filter.types ?? []);
    client.tasks = new Set(filter.tasks ?? []);
    this.sendStatus(clientId, "subscribed");
    return true;
  }

  /**
   * Drop a client's filter so it receives every event again
   */
  unsubscribe(clientId: string): boolean {
    const client = this.clients.get(clientId);
    if (!client) return false;

    client.types.clear();
    client.tasks.clear();
    this.sendStatus(clientId, "unsubscribed");
    return true;
  }

  /**
   * Handle a raw message received from a client
   */
  handleMessage(clientId: string, raw: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.sendError(clientId, "Message is not valid JSON");
      return;
    }

    const result = ClientMessageSchema.safeParse(parsed);
    if (!result.success) {
      this.sendError(clientId, `Invalid message: ${result.error.issues.map((i) => i.message).join("; ")}`);
      return;
    }

    const message = result.data;
    switch (message.action) {
      case "subscribe":
        this.subscribe(clientId, { types: message.types, tasks: message.tasks });
        break;
      case "unsubscribe":
        this.unsubscribe(clientId);
        break;
      case "ping":
        this.sendStatus(clientId, "pong");
        break;
    }
  }

  /**
   * Send a scheduler event to every client whose filter accepts it
   */
  broadcast(event: Event): void {
    if (this.clients.size === 0) return;

    const message: BroadcastMessage = {
      type: "event",
      event: event.type,
      payload: event.payload,
      timestamp: event.timestamp.toISOString(),
    };
    const json = JSON.stringify(message);
    const taskName = taskNameOf(event.payload);

    for (const client of this.clients.values()) {
      if (client.types.size > 0 && !client.types.has(event.type)) continue;
      if (client.tasks.size > 0 && (taskName === undefined || !client.tasks.has(taskName))) continue;
      if (client.socket.readyState === WebSocket.OPEN) {
        client.socket.send(json);
      }
    }
  }

  getClientCount(): number {
    return this.clients.size;
  }

  /**
   * Close all connections and stop listening to the scheduler
   */
  dispose(): void {
    this.subscription.unsubscribe();
    for (const client of this.clients.values()) {
      client.socket.close();
    }
    this.clients.clear();
  }

  private sendStatus(clientId: string, status: string): void {
    this.sendToClient(clientId, {
      type: "status",
      data: { status, clientId },
      timestamp: new Date().toISOString(),
    });
  }

  private sendError(clientId: string, error: string): void {
    this.sendToClient(clientId, {
      type: "error",
      data: { error },
      timestamp: new Date().toISOString(),
    });
  }

  private sendToClient(clientId: string, message: BroadcastMessage): void {
    const client = this.clients.get(clientId);
    if (client && client.socket.readyState === WebSocket.OPEN) {
      client.socket.send(JSON.stringify(message));
    }
  }
}
