import { z } from "zod";
import { router, publicProcedure } from "../trpc.js";

export const relationshipsRouter = router({
  getBetween: publicProcedure
    .input(z.object({ agentA: z.string(), agentB: z.string(), type: z.string().optional() }))
    .query(({ ctx, input }) => {
      return ctx.simulation.getRelationshipsBetween(input.agentA, input.agentB, input.type);
    }),

  getOfAgent: publicProcedure
    .input(z.object({ agentId: z.string() }))
    .query(({ ctx, input }) => {
      return ctx.simulation.getRelationshipsOf(input.agentId);
    }),

  getByType: publicProcedure
    .input(z.object({ type: z.string() }))
    .query(({ ctx, input }) => {
      return ctx.simulation.getRelationshipsByType(input.type);
    }),

  getGraph: publicProcedure
    .input(z.object({ centerId: z.string(), depth: z.number().int().min(1).max(3).default(2) }))
    .query(({ ctx, input }) => {
      return ctx.simulation.getGraph(input.centerId, input.depth);
    }),
});
