import { z } from "zod";
import type { ParameterValue } from "@sundial/shared";

export const parameterValueSchema: z.ZodType<ParameterValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(parameterValueSchema),
    z.record(parameterValueSchema),
  ]),
);

export const parameterMapSchema = z.record(parameterValueSchema);

export const triggerSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("time_of_day"),
    hour: z.number().int().min(0).max(23),
    minute: z.number().int().min(0).max(59),
    daysOfWeek: z.array(z.number().int().min(0).max(6)).default([]),
  }),
  z.object({
    type: z.literal("solar"),
    event: z.enum(["sunrise", "sunset"]),
    offsetMinutes: z.number().int().min(-720).max(720).default(0),
  }),
  z.object({
    type: z.literal("interval"),
    periodMs: z.number().positive(),
  }),
]);

export const ruleInputSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  enabled: z.boolean().default(true),
  trigger: triggerSchema,
  capabilityId: z.string().min(1),
  action: z.string().min(1),
  parameters: parameterMapSchema.default({}),
});

export type RuleInput = z.input<typeof ruleInputSchema>;

export const ruleSchema = ruleInputSchema.extend({
  id: z.string().min(1),
  createdAt: z.number().int().nonnegative(),
  updatedAt: z.number().int().nonnegative(),
});

export const settingsSchema = z.object({
  notificationsEnabled: z.boolean(),
  latitude: z.number().min(-90).max(90).nullable(),
  longitude: z.number().min(-180).max(180).nullable(),
  useAutomaticLocation: z.boolean(),
});

export const EXPORT_VERSION = 1;

export const exportSchema = z.object({
  version: z.literal(EXPORT_VERSION),
  exportedAt: z.string(),
  rules: z.array(ruleSchema),
  settings: settingsSchema,
});
