import { z } from "zod";
import { procedure, router } from "../trpc.js";
import { parameterMapSchema } from "../../automation/schema.js";
import { CapabilityNotFoundError } from "../../engine/errors.js";

export const capabilitiesRouter = router({
  list: procedure.query(({ ctx }) => {
    return ctx.orchestrator.getAvailableCapabilities();
  }),

  get: procedure
    .input(z.object({ id: z.string().min(1) }))
    .query(({ ctx, input }) => {
      const descriptor = ctx.orchestrator.getCapabilityDescriptor(input.id);
      if (!descriptor) throw new CapabilityNotFoundError(input.id);
      return descriptor;
    }),

  execute: procedure
    .input(
      z.object({
        capabilityId: z.string().min(1),
        action: z.string().min(1),
        parameters: parameterMapSchema.default({}),
      }),
    )
    .mutation(async ({ ctx, input }) => {
      await ctx.orchestrator.executeQuickAction(input.capabilityId, input.action, input.parameters);
      return { success: true };
    }),
});
