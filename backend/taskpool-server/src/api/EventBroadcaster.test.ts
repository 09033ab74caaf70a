/**
 * EventBroadcaster Tests
 *
 * Scheduler events reach WebSocket clients according to their filters.
 */

import { test, describe, beforeEach, afterEach, mock } from "node:test";
import assert from "node:assert";
import { WebSocket } from "ws";
import { EventBroadcaster, type BroadcastMessage } from "./EventBroadcaster";
import { EventBus } from "../queue/EventBus";
import type { SchedulerEvents } from "../queue/events";
import { createSilentLogger } from "../testUtils";

/**
 * Create a mock WebSocket and accessors for what it was sent.
 */
function createMockWebSocket(readyState: number = WebSocket.OPEN) {
  const send = mock.fn((_data: string) => undefined);
  const on = mock.fn((_event: string, _listener: () => void) => undefined);
  const close = mock.fn(() => undefined);
  const socket = { readyState, send, on, close } as unknown as WebSocket;

  const sent = (): BroadcastMessage[] =>
    send.mock.calls.map((call) => {
      const message: BroadcastMessage = JSON.parse(call.arguments[0]);
      return message;
    });

  return {
    socket,
    close,
    sent,
    events(): string[] {
      return sent().flatMap((message) => (message.type === "event" ? [message.event] : []));
    },
    emit(event: string): void {
      for (const call of on.mock.calls) {
        if (call.arguments[0] === event) {
          call.arguments[1]();
        }
      }
    },
  };
}

describe("EventBroadcaster", () => {
  let bus: EventBus<SchedulerEvents>;
  let broadcaster: EventBroadcaster;

  beforeEach(() => {
    bus = new EventBus<SchedulerEvents>({ logger: createSilentLogger() });
    broadcaster = new EventBroadcaster(bus);
  });

  afterEach(() => {
    broadcaster.dispose();
  });

  test("greets new clients with their id", () => {
    const client = createMockWebSocket();
    const clientId = broadcaster.addClient(client.socket);

    const [greeting] = client.sent();
    assert.strictEqual(greeting.type, "status");
    assert.deepStrictEqual(greeting.type === "status" && greeting.data, { status: "connected", clientId });
    assert.strictEqual(broadcaster.getClientCount(), 1);
  });

  test("relays every event to unfiltered clients", () => {
    const client = createMockWebSocket();
    broadcaster.addClient(client.socket);

    bus.publishSync("task.submitted", { name: "sync", priority: 1 });
    bus.publishSync("pool.started", { maxWorkers: 2, pending: 1 });

    assert.deepStrictEqual(client.events(), ["task.submitted", "pool.started"]);
    const relayed = client.sent()[1];
    assert.ok(relayed.type === "event");
    assert.deepStrictEqual(relayed.payload, { name: "sync", priority: 1 });
  });

  test("filters by event type and task name", () => {
    const failuresOnly = createMockWebSocket();
    const syncOnly = createMockWebSocket();
    broadcaster.subscribe(broadcaster.addClient(failuresOnly.socket), { types: ["task.failed"] });
    broadcaster.subscribe(broadcaster.addClient(syncOnly.socket), { tasks: ["sync"] });

    bus.publishSync("task.failed", { name: "other", error: "boom", durationMs: 3 });
    bus.publishSync("task.succeeded", { name: "sync", durationMs: 5 });
    bus.publishSync("pool.started", { maxWorkers: 2, pending: 0 });

    assert.deepStrictEqual(failuresOnly.events(), ["task.failed"]);
    assert.deepStrictEqual(syncOnly.events(), ["task.succeeded"]);
  });

  test("applies subscribe and unsubscribe messages", () => {
    const client = createMockWebSocket();
    const clientId = broadcaster.addClient(client.socket);

    broadcaster.handleMessage(clientId, JSON.stringify({ action: "subscribe", types: ["task.retried"] }));
    bus.publishSync("task.submitted", { name: "a", priority: 0 });
    broadcaster.handleMessage(clientId, JSON.stringify({ action: "unsubscribe" }));
    bus.publishSync("task.submitted", { name: "b", priority: 0 });

    assert.deepStrictEqual(client.events(), ["task.submitted"]);
    const statuses = client.sent().flatMap((message) => (message.type === "status" ? [message.data.status] : []));
    assert.deepStrictEqual(statuses, ["connected", "subscribed", "unsubscribed"]);
  });

  test("answers pings and reports bad messages", () => {
    const client = createMockWebSocket();
    const clientId = broadcaster.addClient(client.socket);

    broadcaster.handleMessage(clientId, JSON.stringify({ action: "ping" }));
    broadcaster.handleMessage(clientId, "not json");
    broadcaster.handleMessage(clientId, JSON.stringify({ action: "subscribe", types: ["task.exploded"] }));

    const [, pong, notJson, invalid] = client.sent();
    assert.ok(pong.type === "status");
    assert.strictEqual(pong.data.status, "pong");
    assert.ok(notJson.type === "error");
    assert.strictEqual(notJson.data.error, "Message is not valid JSON");
    assert.ok(invalid.type === "error");
    assert.ok(invalid.data.error.startsWith("Invalid message: "));
  });

  test("skips sockets that are not open", () => {
    const client = createMockWebSocket(WebSocket.CLOSED);
    broadcaster.addClient(client.socket);

    bus.publishSync("task.submitted", { name: "a", priority: 0 });

    assert.deepStrictEqual(client.sent(), []);
  });

  test("forgets clients whose socket closes", () => {
    const client = createMockWebSocket();
    broadcaster.addClient(client.socket);

    client.emit("close");
    bus.publishSync("task.submitted", { name: "a", priority: 0 });

    assert.strictEqual(broadcaster.getClientCount(), 0);
    assert.deepStrictEqual(client.events(), []);
  });

  test("dispose closes sockets and stops relaying", () => {
    const client = createMockWebSocket();
    broadcaster.addClient(client.socket);

    broadcaster.dispose();

    assert.strictEqual(client.close.mock.callCount(), 1);
    assert.strictEqual(bus.getSubscriberCount("task.submitted"), 0);
  });
});
