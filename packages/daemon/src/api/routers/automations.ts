import { z } from "zod";
import type { AutomationRule } from "@sundial/shared";
import { normalizeTrigger } from "@sundial/shared";
import { procedure, router } from "../trpc.js";
import type { TRPCContext } from "../context.js";
import { ruleInputSchema } from "../../automation/schema.js";
import { CapabilityNotFoundError, RuleNotFoundError } from "../../engine/errors.js";

const idInput = z.object({ id: z.string().min(1) });

function requireRule(ctx: TRPCContext, id: string): AutomationRule {
  const rule = ctx.repository.get(id);
  if (!rule) throw new RuleNotFoundError(id);
  return rule;
}

/** While the engine runs, changes go through the orchestrator so the schedule follows. */
function saveRule(ctx: TRPCContext, rule: AutomationRule): AutomationRule {
  if (ctx.orchestrator.isRunning) return ctx.orchestrator.updateAutomation(rule);
  return ctx.repository.updateRule(rule);
}

export const automationsRouter = router({
  list: procedure.query(({ ctx }) => {
    return ctx.repository.getAll();
  }),

  active: procedure.query(({ ctx }) => {
    return ctx.orchestrator.getActiveAutomations();
  }),

  debug: procedure.query(({ ctx }) => {
    return ctx.orchestrator.getScheduleDebugInfo();
  }),

  create: procedure
    .input(ruleInputSchema)
    .mutation(({ ctx, input }) => {
      const running = ctx.orchestrator.isRunning;
      if (running && input.enabled && !ctx.capabilities.has(input.capabilityId)) {
        throw new CapabilityNotFoundError(input.capabilityId);
      }

      const rule = ctx.repository.create(input);
      if (running && rule.enabled) ctx.orchestrator.registerAutomation(rule);
      return rule;
    }),

  update: procedure
    .input(
      z.object({
        id: z.string().min(1),
        changes: ruleInputSchema.partial(),
      }),
    )
    .mutation(({ ctx, input }) => {
      const existing = requireRule(ctx, input.id);
      const merged: AutomationRule = {
        ...existing,
        ...input.changes,
        description: input.changes.description ?? existing.description,
        enabled: input.changes.enabled ?? existing.enabled,
        parameters: input.changes.parameters ?? existing.parameters,
        trigger: normalizeTrigger(input.changes.trigger ?? existing.trigger),
      };
      return saveRule(ctx, merged);
    }),

  toggle: procedure
    .input(idInput)
    .mutation(({ ctx, input }) => {
      const existing = requireRule(ctx, input.id);
      return saveRule(ctx, { ...existing, enabled: !existing.enabled });
    }),

  delete: procedure
    .input(idInput)
    .mutation(({ ctx, input }) => {
      ctx.repository.deleteRule(input.id);
      ctx.orchestrator.unregisterAutomation(input.id);
      return { success: true };
    }),

  runNow: procedure
    .input(idInput)
    .mutation(({ ctx, input }) => {
      return ctx.orchestrator.runAutomationNow(input.id);
    }),
});
