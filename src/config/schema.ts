/**
 * Shape of a config file. Unknown keys are dropped; a value of the wrong
 * type rejects the file so a typo never silently half-applies.
 *
 * The field schemas are shared with the env var overrides.
 */

import { z } from 'zod';

export const StatuslineConfigSchema = z.object({
  cacheMaxAgeSeconds: z.number().nonnegative(),
  fetchTimeoutMs: z.number().int().positive(),
  usageEndpoint: z.string().url(),
  cachePath: z.string().min(1),
  showQuota: z.boolean(),
  showBranch: z.boolean(),
});

export const LessonConfigSchema = z.object({
  enabled: z.boolean(),
  targetLanguage: z.string().min(1),
  model: z.string().min(1),
  logPath: z.string().min(1),
  timeoutMs: z.number().int().positive(),
});

export const PluginConfigSchema = z.object({
  statusline: StatuslineConfigSchema.partial().optional(),
  lesson: LessonConfigSchema.partial().optional(),
  debug: z.boolean().optional(),
});
