import { z } from "zod";
import { router, publicProcedure } from "../trpc.js";

const memoryQueryInput = z.object({
  agentId: z.string(),
  tags: z.array(z.string()).optional(),
  text: z.string().optional(),
  importanceMin: z.number().min(0).max(1).optional(),
  associations: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  from: z.string().datetime().optional(),
  to: z.string().datetime().optional(),
  limit: z.number().int().min(1).max(500).optional(),
});

export const agentsRouter = router({
  getAll: publicProcedure
    .input(z.object({ type: z.string().optional() }).default({}))
    .query(({ ctx, input }) => {
      return ctx.simulation.getAgents(input.type);
    }),

  getById: publicProcedure
    .input(z.object({ id: z.string() }))
    .query(({ ctx, input }) => {
      return ctx.simulation.getAgent(input.id) ?? null;
    }),

  getMemories: publicProcedure.input(memoryQueryInput).query(({ ctx, input }) => {
    const memories = ctx.simulation.getMemories(
      input.agentId,
      {
        tags: input.tags,
        text: input.text,
        importanceMin: input.importanceMin,
        associations: input.associations,
        timestampMin: input.from !== undefined ? new Date(input.from) : undefined,
        timestampMax: input.to !== undefined ? new Date(input.to) : undefined,
      },
      input.limit,
    );
    return memories ?? null;
  }),
});
