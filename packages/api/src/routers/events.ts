import { z } from "zod";
import { router, publicProcedure } from "../trpc.js";

export const eventsRouter = router({
  getLog: publicProcedure
    .input(
      z
        .object({
          agentId: z.string().optional(),
          otherAgentId: z.string().optional(),
          kind: z.string().optional(),
          fromTick: z.number().int().min(0).optional(),
          toTick: z.number().int().min(0).optional(),
          limit: z.number().int().min(1).max(1000).default(100),
        })
        .default({}),
    )
    .query(({ ctx, input }) => {
      return ctx.simulation.getEventLog(input);
    }),
});
