export { appRouter, type AppRouter } from "./app-router.js";
export { createCallerFactory, type Context } from "./trpc.js";
export {
  SimulationService,
  type EventLogQuery,
  type JournalRecord,
  type SimulationMetrics,
  type SimulationServiceOptions,
  type TickResult,
} from "./simulation-service.js";
