import { z } from "zod";

export const MERGE_STRATEGIES = ["fast_forward", "squash", "three_way"] as const;

export const MergeStrategySchema = z.enum(MERGE_STRATEGIES);

export const AwsConfigSchema = z.object({
  region: z.string().min(1).optional(),
}).strict();

export const CacheConfigSchema = z.object({
  ttlSeconds: z.number().int().nonnegative().default(20),
}).strict();

export const DefaultsConfigSchema = z.object({
  repository: z.string().min(1).optional(),
  mainBranch: z.string().min(1).default("master"),
  mergeStrategy: MergeStrategySchema.default("squash"),
}).strict();

export const CcprConfigSchema = z.object({
  version: z.literal(1).default(1),
  aws: AwsConfigSchema.default({}),
  cache: CacheConfigSchema.default({ ttlSeconds: 20 }),
  defaults: DefaultsConfigSchema.default({
    mainBranch: "master",
    mergeStrategy: "squash",
  }),
}).strict();

export type MergeStrategy = z.infer<typeof MergeStrategySchema>;
export type CcprConfig = z.infer<typeof CcprConfigSchema>;
