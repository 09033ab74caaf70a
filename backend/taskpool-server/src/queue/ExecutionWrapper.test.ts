import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { ExecutionWrapper } from "./ExecutionWrapper";
import { EventBus, type Event } from "./EventBus";
import type { SchedulerEvents } from "./events";
import { StatusRegistry } from "./StatusRegistry";
import { createTaskRecord, TaskContext, TaskRecord } from "./TaskRecord";
import { TaskState } from "./TaskState";
import { createCapturingLogger, createSilentLogger } from "../testUtils";

type ProgressCall = [string, number, number];

function record(name: string, invoke: (context: TaskContext) => unknown, total?: number): TaskRecord {
  return createTaskRecord({ name, priority: 0, daemon: true, args: [], invoke, total });
}

describe("ExecutionWrapper", () => {
  let registry: StatusRegistry;
  let events: EventBus<SchedulerEvents>;
  let controller: AbortController;
  let progress: ProgressCall[];
  let published: Event[];

  function createWrapper(logger = createSilentLogger()): ExecutionWrapper {
    return new ExecutionWrapper({
      registry,
      events,
      signal: controller.signal,
      logger,
      observer: (name, completed, total) => {
        progress.push([name, completed, total]);
      },
    });
  }

  beforeEach(() => {
    registry = new StatusRegistry();
    events = new EventBus<SchedulerEvents>({ logger: createSilentLogger() });
    controller = new AbortController();
    progress = [];
    published = [];
    events.subscribeAll((event) => {
      published.push(event);
    });
  });

  it("should mark the record running before the body starts", async () => {
    registry.add(record("job", () => "ok"));
    const wrapper = createWrapper();

    const execution = wrapper.execute(registry.require("job"));
    assert.equal(registry.get("job").state, TaskState.RUNNING);

    const snapshot = await execution;
    assert.equal(snapshot.state, TaskState.SUCCEEDED);
    assert.equal(snapshot.result, "ok");
  });

  it("should store the resolved value of an async body", async () => {
    registry.add(
      record("job", async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return { rows: 3 };
      })
    );

    const snapshot = await createWrapper().execute(registry.require("job"));

    assert.deepEqual(snapshot.result, { rows: 3 });
    assert.deepEqual(progress, [
      ["job", 0, 100],
      ["job", 100, 100],
    ]);
    assert.deepEqual(
      published.map((e) => e.type),
      ["task.succeeded"]
    );
  });

  it("should record and log a failure without rejecting", async () => {
    const { logger, errors } = createCapturingLogger();
    registry.add(
      record("job", () => {
        throw new Error("disk full");
      })
    );

    const snapshot = await createWrapper(logger).execute(registry.require("job"));

    assert.equal(snapshot.state, TaskState.FAILED);
    assert.equal(snapshot.failure?.message, "disk full");
    assert.equal(snapshot.result, undefined);
    assert.deepEqual(errors(), ["Task job raised: disk full"]);
    assert.deepEqual(published.find((e) => e.type === "task.failed")?.payload, {
      name: "job",
      error: "disk full",
      durationMs: snapshot.durationMs,
    });
  });

  it("should wrap non-Error rejections", async () => {
    registry.add(record("job", () => Promise.reject("plain string")));

    const snapshot = await createWrapper().execute(registry.require("job"));

    assert.ok(snapshot.failure instanceof Error);
    assert.equal(snapshot.failure.message, "plain string");
  });

  it("should forward progress reports to the registry, observer and bus", async () => {
    registry.add(
      record(
        "job",
        (ctx) => {
          ctx.reportProgress(2);
          ctx.advance();
          ctx.advance(2);
          return null;
        },
        10
      )
    );

    await createWrapper().execute(registry.require("job"));

    assert.deepEqual(progress, [
      ["job", 0, 10],
      ["job", 2, 10],
      ["job", 3, 10],
      ["job", 5, 10],
      ["job", 10, 10],
    ]);
    assert.deepEqual(
      published.filter((e) => e.type === "task.progress").map((e) => e.payload),
      [
        { name: "job", completed: 2, total: 10 },
        { name: "job", completed: 3, total: 10 },
        { name: "job", completed: 5, total: 10 },
      ]
    );
  });

  it("should report partial progress when the body fails", async () => {
    registry.add(
      record(
        "job",
        (ctx) => {
          ctx.reportProgress(4);
          throw new Error("halfway");
        },
        8
      )
    );

    await createWrapper().execute(registry.require("job"));

    assert.deepEqual(progress.at(-1), ["job", 4, 8]);
  });

  it("should ignore progress reported after completion", async () => {
    const contexts: TaskContext[] = [];
    registry.add(
      record("job", (ctx) => {
        contexts.push(ctx);
        return "done";
      })
    );

    await createWrapper().execute(registry.require("job"));
    contexts[0].reportProgress(50);

    contexts[0].advance(10);

    assert.deepEqual(registry.get("job").progress, { completed: 100, total: 100 });
    assert.deepEqual(progress.at(-1), ["job", 100, 100]);
  });

  it("should keep task state when the observer throws", async () => {
    const { logger, errors } = createCapturingLogger();
    registry.add(record("job", () => 7));
    const wrapper = new ExecutionWrapper({
      registry,
      events,
      signal: controller.signal,
      logger,
      observer: () => {
        throw new Error("renderer crashed");
      },
    });

    const snapshot = await wrapper.execute(registry.require("job"));

    assert.equal(snapshot.state, TaskState.SUCCEEDED);
    assert.equal(snapshot.result, 7);
    assert.deepEqual(errors(), [
      "Progress observer failed for task job: renderer crashed",
      "Progress observer failed for task job: renderer crashed",
    ]);
  });

  it("should expose the shared cancellation signal to the body", async () => {
    registry.add(record("job", (ctx) => ctx.isCancelled()));
    controller.abort();

    const snapshot = await createWrapper().execute(registry.require("job"));

    assert.equal(snapshot.result, true);
  });

  it("should run the settle hook before the completion promise resolves", async () => {
    const order: string[] = [];
    registry.add(record("job", () => "ok"));
    const target = registry.require("job");
    const completion = target.completion.then(() => order.push("completion"));

    await createWrapper().execute(target, () => order.push("settled"));
    await completion;

    assert.deepEqual(order, ["settled", "completion"]);
  });
});
