import { procedure, router } from "../trpc.js";
import { settingsSchema } from "../../automation/schema.js";

export const settingsRouter = router({
  get: procedure.query(({ ctx }) => {
    return ctx.repository.getSettings();
  }),

  update: procedure
    .input(settingsSchema.partial())
    .mutation(({ ctx, input }) => {
      return ctx.orchestrator.applySettings(input);
    }),
});
