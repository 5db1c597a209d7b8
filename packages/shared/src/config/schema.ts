import { z } from 'zod';

export const ProviderConfigSchema = z
  .object({
    type: z.string(),
    model: z.string(),
    api_key_env: z.string().optional(),
    api_key: z.string().optional(),
    baseUrl: z.string().optional(),
    timeoutMs: z.number().optional(),
    pricing: z
      .object({
        inputPerMTokUsd: z.number().optional(),
        outputPerMTokUsd: z.number().optional(),
      })
      .optional(),
  })
  .passthrough();

export const GeneratorConfigSchema = z.object({
  /** Key into `providers` */
  provider: z.string().optional(),
  timeoutMs: z.number().int().positive().default(300_000),
  /** Minimum spacing between two provider calls */
  minIntervalMs: z.number().int().min(0).default(15_000),
  minOutputTokens: z.number().int().positive().default(8192),
  maxOutputTokens: z.number().int().positive().default(100_000),
  temperature: z.number().min(0).max(2).default(0),
});

export const ReconcileConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  /** Failed hunks plus rejected files above which the generator is not called */
  complexityThreshold: z.number().int().min(1).default(10),
  /** Lines of pristine content on each side of a rejected or offset hunk */
  excerptRadius: z.number().int().min(0).default(10),
  /** Lines on each side of a cleanly applied hunk */
  cleanExcerptRadius: z.number().int().min(0).default(3),
  /** How far from the expected line to look for a hunk's context */
  searchRadius: z.number().int().min(0).default(200),
  revertStrategy: z.enum(['snapshot', 'git']).default('snapshot'),
});

export const ApplyConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(60_000),
  gitPath: z.string().default('git'),
});

export const ValidationCommandSchema = z.object({
  name: z.string(),
  command: z.string(),
  timeoutMs: z.number().int().positive().optional(),
});

export const ValidationConfigSchema = z.object({
  skip: z.boolean().default(false),
  commands: z.array(ValidationCommandSchema).default([]),
  timeoutMs: z.number().int().positive().default(600_000),
  /** Candidate may change at most this many times the original's +/- lines */
  maxDriftRatio: z.number().positive().default(1.5),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  providers: z.record(z.string(), ProviderConfigSchema).optional(),
  generator: GeneratorConfigSchema.default(GeneratorConfigSchema.parse({})),
  reconcile: ReconcileConfigSchema.default(ReconcileConfigSchema.parse({})),
  apply: ApplyConfigSchema.default(ApplyConfigSchema.parse({})),
  validation: ValidationConfigSchema.default(ValidationConfigSchema.parse({})),
  /** JSONL event trace, relative to the repo root */
  tracePath: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;
export type ReconcileConfig = z.infer<typeof ReconcileConfigSchema>;
export type ApplyConfig = z.infer<typeof ApplyConfigSchema>;
export type ValidationConfig = z.infer<typeof ValidationConfigSchema>;
export type ValidationCommand = z.infer<typeof ValidationCommandSchema>;
