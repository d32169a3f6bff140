import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

export const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),

    JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),
    JWT_ISSUER: z.string().min(1).default('contact-book'),
    TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
    BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),

    DB_TYPE: z.enum(['better-sqlite3', 'postgres']).default('better-sqlite3'),
    SQLITE_PATH: z.string().min(1).default('contacts.db'),
    DB_HOST: z.string().min(1).optional(),
    DB_PORT: z.coerce.number().int().positive().default(5432),
    DB_USER: z.string().min(1).optional(),
    DB_PASSWORD: z.string().optional(),
    DB_NAME: z.string().min(1).optional(),
    DB_SSL: booleanFlag.default('false'),
    DB_SYNCHRONIZE: booleanFlag.default('true'),
  })
  .superRefine((env, ctx) => {
    if (env.DB_TYPE !== 'postgres') return;
    for (const key of ['DB_HOST', 'DB_USER', 'DB_NAME'] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when DB_TYPE is postgres`,
        });
      }
    }
  });

export type Env = z.infer<typeof envSchema>;

/**
 * Passed to `ConfigModule.forRoot({ validate })`. Throwing here aborts
 * bootstrap, so a missing or weak signing secret never serves traffic.
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return result.data;
}
