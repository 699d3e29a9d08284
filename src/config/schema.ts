import { z } from 'zod';
import { SEVERITIES } from '../events/alert.js';

export const OPERATORS = ['<', '>', '<=', '>=', '==', '!='] as const;

const scalar = z.union([z.number(), z.string(), z.boolean(), z.null()]);

export const fusionSourceSchema = z.object({
  detector: z.string().min(1),
  field: z.string().min(1),
  weight: z.number().min(0).max(10).default(1),
});

export const fusionRuleSchema = z.object({
  signal: z.string().min(1),
  sources: z.array(fusionSourceSchema).min(1),
  // Unknown names are kept and fall back at fusion time.
  strategy: z.string().default('weighted_average'),
  min_sources: z.number().int().nonnegative().default(1),
});

export const conditionSchema = z.object({
  detector: z.string().min(1),
  field: z.string().min(1),
  operator: z.enum(OPERATORS),
  value: scalar,
  duration_seconds: z.number().nonnegative().default(0),
});

export const alertRuleSchema = z.object({
  name: z.string().min(1),
  conditions: z.array(conditionSchema).min(1),
  severity: z.enum(SEVERITIES).default('critical'),
  combine: z.enum(['all', 'any']).default('all'),
  duration_seconds: z.number().nonnegative().default(0),
  cooldown_seconds: z.number().nonnegative().default(30),
  message: z.string().default(''),
});

export const rulesFileSchema = z.object({
  fusion: z.array(fusionRuleSchema).default([]),
  alerts: z.array(alertRuleSchema).default([]),
});

export type FusionRuleConfig = z.infer<typeof fusionRuleSchema>;
export type ConditionConfig = z.input<typeof conditionSchema>;
export type AlertRuleConfig = z.input<typeof alertRuleSchema>;
export type RulesFile = z.infer<typeof rulesFileSchema>;
