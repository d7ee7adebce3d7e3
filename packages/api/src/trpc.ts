import { initTRPC } from "@trpc/server";
import type { SimulationService } from "./simulation-service.js";

export interface Context {
  simulation: SimulationService;
}

const t = initTRPC.context<Context>().create();

export const router = t.router;
export const publicProcedure = t.procedure;
export const createCallerFactory = t.createCallerFactory;
