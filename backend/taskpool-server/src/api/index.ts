/**
 * API Module Exports
 *
 * Barrel exports for the Fastify/TRPC API layer.
 */

// Server exports
export { createServer, startServer } from "./server";
export type { ServerOptions } from "./server";

// TRPC exports
export {
  appRouter,
  poolRouter,
  router,
  publicProcedure,
  createContext,
  createCallerFactory,
  toTaskView,
  toTRPCError,
} from "./trpc";
export type { AppRouter, Context, TaskView } from "./trpc";

// WebSocket event streaming exports
export { EventBroadcaster } from "./EventBroadcaster";
export type { BroadcastMessage, ClientMessage, SubscribeFilter } from "./EventBroadcaster";
