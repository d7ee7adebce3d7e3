import { router, publicProcedure } from "../trpc.js";

export const simulationRouter = router({
  advanceTick: publicProcedure.mutation(async ({ ctx }) => {
    return ctx.simulation.advanceTick();
  }),

  getState: publicProcedure.query(({ ctx }) => {
    return ctx.simulation.getState();
  }),

  getMetrics: publicProcedure.query(({ ctx }) => {
    return ctx.simulation.getMetrics();
  }),
});
