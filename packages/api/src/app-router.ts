import { router } from "./trpc.js";
import { simulationRouter } from "./routers/simulation.js";
import { agentsRouter } from "./routers/agents.js";
import { relationshipsRouter } from "./routers/relationships.js";
import { eventsRouter } from "./routers/events.js";

export const appRouter = router({
  simulation: simulationRouter,
  agents: agentsRouter,
  relationships: relationshipsRouter,
  events: eventsRouter,
});

export type AppRouter = typeof appRouter;
