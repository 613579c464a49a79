// src/config/env.zod.ts
import { z } from 'zod';

const MIN_SECRET_BYTES = 32; // HMAC-SHA256 wants >= 256 bits
// setInterval takes a signed 32-bit millisecond delay; longer ones fire after 1ms
const MAX_TIMER_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

const booleanish = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((v) => v === true || v === 'true' || v === '1');

export const EnvZ = z
  .object({
    PORT: z.coerce.number().int().positive().default(4000),

    JWT_SECRET: z
      .string()
      .min(1, 'JWT_SECRET is required')
      .refine((v) => Buffer.from(v, 'base64').length >= MIN_SECRET_BYTES, {
        message: `JWT_SECRET must decode (base64) to at least ${MIN_SECRET_BYTES} bytes`,
      }),
    JWT_ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 15),
    JWT_REFRESH_TOKEN_TTL_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .default(60 * 60 * 24 * 7),

    DATABASE_URL: z.string().optional(),
    PG_USER: z.string().optional(),
    PG_PASSWORD: z.string().optional(),
    PG_HOST: z.string().default('localhost'),
    PG_PORT: z.coerce.number().int().positive().default(5432),
    PG_DB: z.string().default('postgres'),

    REDIS_URL: z.string().optional(),

    SESSION_CLEANUP_ENABLED: booleanish.default(true),
    SESSION_CLEANUP_INTERVAL_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .max(MAX_TIMER_SECONDS)
      .default(60 * 60 * 24),
  })
  .refine((env) => env.JWT_REFRESH_TOKEN_TTL_SECONDS > env.JWT_ACCESS_TOKEN_TTL_SECONDS, {
    message: 'JWT_REFRESH_TOKEN_TTL_SECONDS must be greater than JWT_ACCESS_TOKEN_TTL_SECONDS',
    path: ['JWT_REFRESH_TOKEN_TTL_SECONDS'],
  });

export type Env = z.infer<typeof EnvZ>;

/**
 * ConfigModule `validate` hook. Throws on the first boot with a readable list
 * of the offending keys.
 */
export function validateEnv(raw: Record<string, unknown>): Env {
  const parsed = EnvZ.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}
