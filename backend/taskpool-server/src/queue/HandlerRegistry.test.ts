import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";
import { HandlerRegistry } from "./HandlerRegistry";
import { TaskScheduler } from "./TaskScheduler";
import { DuplicateNameError, InvalidSubmissionError } from "./errors";
import { createSilentLogger } from "../testUtils";

describe("HandlerRegistry", () => {
  let handlers: HandlerRegistry;
  let scheduler: TaskScheduler;

  beforeEach(() => {
    handlers = new HandlerRegistry();
    handlers.register("add", {
      description: "Add two numbers",
      args: z.object({ a: z.number(), b: z.number().default(1) }),
      run: (_ctx, { a, b }) => a + b,
    });
    scheduler = new TaskScheduler({ maxWorkers: 2, daemon: true, logger: createSilentLogger() });
  });

  it("should list registered handlers", () => {
    handlers.register("noop", { args: z.object({}), run: () => null });

    assert.deepEqual(handlers.list(), [
      { type: "add", description: "Add two numbers" },
      { type: "noop", description: undefined },
    ]);
    assert.equal(handlers.has("noop"), true);
    assert.equal(handlers.unregister("noop"), true);
    assert.equal(handlers.has("noop"), false);
  });

  it("should submit validated arguments under the handler type name", async () => {
    const first = handlers.submit(scheduler, { type: "add", args: { a: 2, b: 3 } });
    const second = handlers.submit(scheduler, { type: "add", args: { a: 2 }, priority: 4 });

    assert.equal(first.name, "add");
    assert.equal(second.name, "add-2");
    assert.equal(scheduler.get("add-2").priority, 4);

    await scheduler.run();
    assert.deepEqual(scheduler.results(), { add: 5, "add-2": 3 });
  });

  it("should honour an explicit name", () => {
    handlers.submit(scheduler, { type: "add", args: { a: 1 }, name: "sum" });

    assert.throws(() => handlers.submit(scheduler, { type: "add", args: { a: 1 }, name: "sum" }), DuplicateNameError);
  });

  it("should reject unknown types", () => {
    assert.throws(
      () => handlers.submit(scheduler, { type: "mystery" }),
      (error: unknown) =>
        error instanceof InvalidSubmissionError &&
        error.message === "Unknown task type 'mystery': registered types: add"
    );
  });

  it("should reject arguments the schema refuses without registering a task", () => {
    assert.throws(
      () => handlers.submit(scheduler, { type: "add", args: { a: "two" } }),
      (error: unknown) =>
        error instanceof InvalidSubmissionError &&
        error.issues.length === 1 &&
        error.issues[0].startsWith("a: ")
    );
    assert.deepEqual(scheduler.allNames(), []);
  });
});
