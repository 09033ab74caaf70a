/**
 * Unit tests for SafeFileWriter
 */

import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { SafeFileWriter } from "./SafeFileWriter";
import { FileSinkError } from "../queue/errors";
import { TaskScheduler } from "../queue/TaskScheduler";
import { createSilentLogger } from "../testUtils";

describe("SafeFileWriter", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "safe-writer-test-"));
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  function readLines(filePath: string): string[] {
    return fs.readFileSync(filePath, "utf-8").split("\n").slice(0, -1);
  }

  it("appends each write as its own line", async () => {
    const filePath = path.join(testDir, "output.txt");
    const writer = new SafeFileWriter(filePath);

    await writer.write("Hello");
    await writer.write("World");

    assert.deepEqual(readLines(filePath), ["Hello", "World"]);
    assert.equal(writer.getLineCount(), 2);
  });

  it("keeps the order writes were issued in", async () => {
    const filePath = path.join(testDir, "output.txt");
    const writer = new SafeFileWriter(filePath);

    const writes = Array.from({ length: 50 }, (_, i) => writer.write(`line ${i}`));
    await Promise.all(writes);

    assert.deepEqual(
      readLines(filePath),
      Array.from({ length: 50 }, (_, i) => `line ${i}`)
    );
  });

  it("writes a block of lines without interleaving", async () => {
    const filePath = path.join(testDir, "output.txt");
    const writer = new SafeFileWriter(filePath);

    const first = writer.writeLines(["a1", "a2", "a3"]);
    const second = writer.write("b1");
    await Promise.all([first, second]);

    assert.deepEqual(readLines(filePath), ["a1", "a2", "a3", "b1"]);
  });

  it("strips ANSI escape codes by default", async () => {
    const filePath = path.join(testDir, "output.txt");
    const writer = new SafeFileWriter(filePath);
    const raw = new SafeFileWriter(filePath, { stripAnsi: false });

    await writer.write("\u001b[32mgreen\u001b[39m");
    await raw.write("\u001b[1mbold\u001b[22m");

    assert.deepEqual(readLines(filePath), ["green", "\u001b[1mbold\u001b[22m"]);
  });

  it("rejects with FileSinkError naming the file and keeps accepting writes", async () => {
    const filePath = path.join(testDir, "missing", "output.txt");
    const writer = new SafeFileWriter(filePath);

    await assert.rejects(writer.write("lost"), (error: unknown) => {
      return error instanceof FileSinkError && error.filePath === filePath && error.code === "FILE_SINK";
    });

    fs.mkdirSync(path.dirname(filePath));
    await writer.write("kept");
    await writer.flush();

    assert.deepEqual(readLines(filePath), ["kept"]);
    assert.equal(writer.getLineCount(), 1);
  });

  it("creates the parent directory when asked to", async () => {
    const filePath = path.join(testDir, "nested", "dir", "output.txt");
    const writer = new SafeFileWriter(filePath, { createDirectory: true });

    await writer.write("first");

    assert.deepEqual(readLines(filePath), ["first"]);
  });

  it("collects one line per task when shared by a scheduler", async () => {
    const filePath = path.join(testDir, "output.txt");
    const writer = new SafeFileWriter(filePath);
    const scheduler = new TaskScheduler({ maxWorkers: 3, daemon: true, logger: createSilentLogger() });

    for (let i = 0; i < 5; i++) {
      scheduler.submit((_ctx, message: string) => writer.write(message), [`Message ${i}`]);
    }
    await scheduler.run();

    assert.deepEqual(readLines(filePath).sort(), [
      "Message 0",
      "Message 1",
      "Message 2",
      "Message 3",
      "Message 4",
    ]);
  });
});
