import { z } from 'zod';

const WindowSchema = z
  .object({
    utilization: z.number().nullable().optional(),
    resets_at: z.string().nullable().optional(),
  })
  .passthrough();

/** Usage endpoint response. Only the windows we display are checked. */
export const UsageResponseSchema = z
  .object({
    five_hour: WindowSchema.nullable().optional(),
    seven_day: WindowSchema.nullable().optional(),
  })
  .passthrough();

const OAuthSchema = z.object({
  accessToken: z.string().nullable().optional(),
  expiresAt: z.number().nullable().optional(),
});

/** ~/.claude/.credentials.json, wrapped or flat. */
export const CredentialsFileSchema = z.union([
  z.object({ claudeAiOauth: OAuthSchema }),
  OAuthSchema,
]);
