/**
 * Fastify Server with TRPC Integration and WebSocket Support
 *
 * HTTP server providing:
 * - /health endpoint for health checks
 * - /trpc/* endpoints for the pool router
 * - /ws/events WebSocket endpoint relaying scheduler events
 * - CORS support for cross-origin requests
 */

import Fastify from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import { fastifyTRPCPlugin, FastifyTRPCPluginOptions } from "@trpc/server/adapters/fastify";
import type { Logger } from "pino";
import { appRouter, createContext, AppRouter } from "./trpc";
import { EventBroadcaster } from "./EventBroadcaster";
import { TaskScheduler } from "../queue/TaskScheduler";
import { HandlerRegistry } from "../queue/HandlerRegistry";
import { getDefaultLogger } from "../logger";

export interface ServerOptions {
  scheduler: TaskScheduler;
  handlers: HandlerRegistry;
  /** Port to listen on (default: 3000) */
  port?: number;
  /** Host to bind to (default: '0.0.0.0') */
  host?: string;
  /** Enable request logging (default: true) */
  logger?: boolean;
  /** Application logger for TRPC errors and startup */
  log?: Logger;
  /** Relay for /ws/events (default: one attached to the scheduler's events) */
  broadcaster?: EventBroadcaster;
}

/**
 * Create and configure a Fastify server with TRPC
 */
export async function createServer(options: ServerOptions) {
  const { scheduler, handlers, logger = true, log = getDefaultLogger() } = options;
  const broadcaster = options.broadcaster ?? new EventBroadcaster(scheduler.events);

  const server = Fastify({ logger });

  await server.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
    credentials: true,
  });

  await server.register(websocket);

  server.addHook("onClose", async () => {
    broadcaster.dispose();
  });

  server.get("/health", async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  server.get("/ws/events", { websocket: true }, (socket, _req) => {
    const clientId = broadcaster.addClient(socket);

    socket.on("message", (rawMessage) => {
      broadcaster.handleMessage(clientId, rawMessage.toString());
    });
  });

  await server.register(fastifyTRPCPlugin, {
    prefix: "/trpc",
    trpcOptions: {
      router: appRouter,
      createContext: () => createContext(scheduler, handlers),
      onError: ({ path, error }) => {
        if (error.code === "INTERNAL_SERVER_ERROR") {
          log.error({ err: error, path }, `TRPC error on ${path}`);
        } else {
          log.debug({ code: error.code, path }, `TRPC ${error.code} on ${path}: ${error.message}`);
        }
      },
    } satisfies FastifyTRPCPluginOptions<AppRouter>["trpcOptions"],
  });

  return server;
}

/**
 * Start the server and listen on the specified port
 */
export async function startServer(options: ServerOptions) {
  const { port = 3000, host = "0.0.0.0", log = getDefaultLogger() } = options;

  const server = await createServer(options);

  try {
    const address = await server.listen({ port, host });
    log.info(`Server listening at ${address}`);
    return server;
  } catch (err) {
    server.log.error(err);
    throw err;
  }
}
