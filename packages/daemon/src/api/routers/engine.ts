import { procedure, router } from "../trpc.js";

export const engineRouter = router({
  status: procedure.query(({ ctx }) => {
    return ctx.orchestrator.status();
  }),

  restart: procedure.mutation(async ({ ctx }) => {
    if (ctx.orchestrator.isRunning) await ctx.orchestrator.restart();
    else await ctx.orchestrator.start();
    return ctx.orchestrator.status();
  }),
});
