/**
 * Server Entry Point
 *
 * Loads configuration, starts the scheduler with the built-in handlers and
 * serves it over HTTP. Can be run directly with: tsx src/serve.ts
 */

import { loadConfig, type TaskpoolConfig } from "./config/loadConfig";
import { createLogger } from "./logger";
import { startServer } from "./api";
import { TaskScheduler, HandlerRegistry, toError } from "./queue";
import { SafeFileWriter, ProgressReporter, registerBuiltinHandlers } from "./runner";

function loadConfigOrExit(): TaskpoolConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(toError(err).message);
    return process.exit(1);
  }
}

const config = loadConfigOrExit();

const log = createLogger({ level: config.logLevel });

if (config.configFile) {
  log.info(`Configuration read from ${config.configFile}`);
}

// Progress lines go to the debug log
const progress = new ProgressReporter({
  output: { write: (line: string) => log.debug(line.trimEnd()) },
});

const scheduler = new TaskScheduler({
  maxWorkers: config.maxWorkers,
  daemon: config.daemon,
  onProgress: progress.observer,
  logger: log,
});

const writer = config.outputFile ? new SafeFileWriter(config.outputFile, { createDirectory: true }) : undefined;
const handlers = registerBuiltinHandlers(new HandlerRegistry(), { writer });

log.info(`Scheduler configured: maxWorkers=${config.maxWorkers}, daemon=${config.daemon}`);

// Finished tasks drop out of the progress table
scheduler.events.subscribe("task.succeeded", (event) => progress.forget(event.payload.name));
scheduler.events.subscribe("task.failed", (event) => progress.forget(event.payload.name));

// Graceful shutdown handler
let isShuttingDown = false;

async function gracefulShutdown(signal: string, timeoutMs: number, close: () => Promise<void>): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  log.info(`${signal} received, initiating graceful shutdown...`);

  try {
    const stillRunning = await scheduler.shutdown(timeoutMs);
    await close();
    if (writer) {
      await writer.flush();
    }

    log.info(stillRunning.length > 0 ? `Shutdown complete, abandoned: ${stillRunning.join(", ")}` : "Shutdown complete");
    process.exit(0);
  } catch (err) {
    log.error({ err }, "Error during shutdown");
    process.exit(1);
  }
}

startServer({ scheduler, handlers, port: config.port, host: config.host, log })
  .then((server) => {
    const close = () => server.close();
    process.on("SIGTERM", () => void gracefulShutdown("SIGTERM", 30000, close));
    process.on("SIGINT", () => void gracefulShutdown("SIGINT", 10000, close));

    // Submitted tasks are admitted as soon as a slot is free
    scheduler.startAll();

    log.info(`Health check: http://${config.host}:${config.port}/health`);
    log.info(`TRPC endpoint: http://${config.host}:${config.port}/trpc`);
    log.info(`Event stream: ws://${config.host}:${config.port}/ws/events`);
    log.info(`Handlers: ${handlers.list().map((h) => h.type).join(", ")}`);
  })
  .catch((err: unknown) => {
    log.error({ err }, "Failed to start server");
    process.exit(1);
  });
