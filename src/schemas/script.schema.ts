import { z } from 'zod';

export const ParamBagSchema = z.record(z.unknown());

export const ScriptConditionSchema = z.object({
  type: z.string().min(1),
  parameters: ParamBagSchema.default({}),
  operator: z.string().default('AND'),
});

export const ScriptActionSchema = z.object({
  type: z.string().min(1),
  parameters: ParamBagSchema.default({}),
  delayAfterMs: z.number().int().nonnegative().max(2 ** 31 - 1).default(0),
});

export const ScriptStepSchema = z.object({
  id: z.string().min(1),
  order: z.number().int().default(0),
  type: z.string().min(1),
  name: z.string().default(''),
  parameters: ParamBagSchema.default({}),
  conditions: z.array(ScriptConditionSchema).default([]),
  actions: z.array(ScriptActionSchema).default([]),
  elseStepId: z
    .string()
    .nullable()
    .optional()
    .transform((v) => v ?? undefined),
  enabled: z.boolean().default(true),
});

export const TargetWindowPreferenceSchema = z.object({
  handle: z.string(),
  enabled: z.boolean().default(false),
});

export const AutomationScriptSchema = z.object({
  id: z.string().min(1),
  name: z.string().default(''),
  description: z.string().default(''),
  createdAt: z.string().default(() => new Date().toISOString()),
  modifiedAt: z.string().default(() => new Date().toISOString()),
  steps: z.array(ScriptStepSchema).default([]),
  infiniteRepeat: z.boolean().default(false),
  repeatCount: z.number().int().min(1).default(1),
  delayBetweenRepeatsMs: z.number().int().nonnegative().max(2 ** 31 - 1).default(0),
  targetWindow: TargetWindowPreferenceSchema.nullable()
    .optional()
    .transform((v) => v ?? undefined),
});
