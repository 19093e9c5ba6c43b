import { z } from "zod";
import { procedure, router } from "../trpc.js";

export const configRouter = router({
  export: procedure.query(({ ctx }) => {
    return { json: ctx.repository.exportConfiguration() };
  }),

  import: procedure
    .input(z.object({ json: z.string().min(1) }))
    .mutation(({ ctx, input }) => {
      const imported = ctx.repository.importConfiguration(input.json);
      ctx.orchestrator.applySettings(imported.settings);
      if (ctx.orchestrator.isRunning) ctx.orchestrator.syncAutomations(imported.rules);
      return { rules: imported.rules.length };
    }),
});
