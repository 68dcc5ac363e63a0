import { z } from 'zod';

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.preprocess(
    (v) => (v === undefined || v === '' ? fallback : Number(v)),
    z.number().int().min(min).max(max),
  );

export const envSchema = z.object({
  INSIGHTS_PORT: intFromEnv(8080, 1, 65535),
  INSIGHTS_DB_PATH: z.string().min(1).default('data/insights.sqlite'),
  INSIGHTS_API_KEY: z.string().default(''),
  INSIGHTS_HOARDER_LOOKBACK_DAYS: intFromEnv(30, 1, 365),
});

export type InsightsEnv = z.infer<typeof envSchema>;

/**
 * `ConfigModule` validate hook. Unknown variables pass through untouched so
 * the rest of the process environment stays readable from `ConfigService`.
 */
export function validateEnv(
  raw: Record<string, unknown>,
): Record<string, unknown> & InsightsEnv {
  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${issues}`);
  }
  return { ...raw, ...parsed.data };
}
