import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { loadConfig, DEFAULT_CONFIG_FILE } from "./loadConfig";
import { ConfigurationError } from "../queue/errors";

describe("loadConfig", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "taskpool-config-test-"));
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  function writeConfig(content: string, name: string = DEFAULT_CONFIG_FILE): string {
    const filePath = path.join(testDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  it("returns defaults when nothing is configured", () => {
    assert.deepEqual(loadConfig({ env: {}, cwd: testDir }), {
      maxWorkers: 4,
      daemon: false,
      host: "0.0.0.0",
      port: 3000,
      logLevel: "info",
      outputFile: undefined,
      configFile: undefined,
    });
  });

  it("reads taskpool.yml from the working directory", () => {
    const filePath = writeConfig(
      ["max_workers: 8", "daemon: true", "log_level: debug", "output_file: out.txt", "server:", "  host: 127.0.0.1", "  port: 4000"].join(
        "\n"
      )
    );

    assert.deepEqual(loadConfig({ env: {}, cwd: testDir }), {
      maxWorkers: 8,
      daemon: true,
      host: "127.0.0.1",
      port: 4000,
      logLevel: "debug",
      outputFile: "out.txt",
      configFile: filePath,
    });
  });

  it("lets environment variables override the file", () => {
    writeConfig("max_workers: 8\nserver:\n  port: 4000\n");

    const config = loadConfig({
      env: { TASKPOOL_MAX_WORKERS: "2", TASKPOOL_DAEMON: "yes", TASKPOOL_LOG_LEVEL: "warn" },
      cwd: testDir,
    });

    assert.equal(config.maxWorkers, 2);
    assert.equal(config.daemon, true);
    assert.equal(config.logLevel, "warn");
    assert.equal(config.port, 4000);
  });

  it("treats empty environment variables as unset", () => {
    const config = loadConfig({ env: { TASKPOOL_MAX_WORKERS: "", TASKPOOL_PORT: "  " }, cwd: testDir });

    assert.equal(config.maxWorkers, 4);
    assert.equal(config.port, 3000);
  });

  it("uses the file named by TASKPOOL_CONFIG", () => {
    const filePath = writeConfig("max_workers: 3\n", "custom.yml");

    const config = loadConfig({ env: { TASKPOOL_CONFIG: "custom.yml" }, cwd: testDir });

    assert.equal(config.maxWorkers, 3);
    assert.equal(config.configFile, filePath);
  });

  it("accepts an empty configuration file", () => {
    writeConfig("");

    assert.equal(loadConfig({ env: {}, cwd: testDir }).maxWorkers, 4);
  });

  it("rejects an explicit file that does not exist", () => {
    assert.throws(
      () => loadConfig({ env: {}, cwd: testDir, configPath: "missing.yml" }),
      (error: unknown) =>
        error instanceof ConfigurationError &&
        error.message.startsWith(`Cannot read configuration file ${path.join(testDir, "missing.yml")}`)
    );
  });

  it("lists every invalid setting in the file", () => {
    writeConfig("max_workers: 0\nserver:\n  port: 70000\n");

    assert.throws(
      () => loadConfig({ env: {}, cwd: testDir }),
      (error: unknown) =>
        error instanceof ConfigurationError &&
        error.issues.length === 2 &&
        error.issues[0].startsWith("max_workers: ") &&
        error.issues[1].startsWith("server.port: ")
    );
  });

  it("rejects unknown keys in the file", () => {
    writeConfig("workers: 2\n");

    assert.throws(() => loadConfig({ env: {}, cwd: testDir }), /Unrecognized key\(s\) in object: 'workers'/);
  });

  it("rejects malformed YAML", () => {
    writeConfig("max_workers: [1, 2\n");

    assert.throws(() => loadConfig({ env: {}, cwd: testDir }), /Cannot parse configuration file/);
  });

  it("rejects invalid environment values", () => {
    assert.throws(
      () => loadConfig({ env: { TASKPOOL_MAX_WORKERS: "many", TASKPOOL_DAEMON: "maybe" }, cwd: testDir }),
      (error: unknown) =>
        error instanceof ConfigurationError &&
        error.code === "CONFIGURATION" &&
        error.issues.length === 2 &&
        error.issues[0].startsWith("TASKPOOL_MAX_WORKERS: ") &&
        error.issues[1].startsWith("TASKPOOL_DAEMON: ")
    );
  });
});
