import { z } from 'zod';

const intFromString = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive());

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    DATABASE_URL: z.string().url(),

    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

    ANTHROPIC_API_KEY: z.string().min(1).optional(),
    ANTHROPIC_MODEL: z.string().default('claude-sonnet-4-20250514'),

    PAYLOAD_ROOT: z.string().default('./payloads'),
    SEARCH_PUBLIC_URL: z.string().url().default('http://localhost:3000/search'),

    AI_BOUND_CONCURRENCY: intFromString('5'),
    IO_BOUND_CONCURRENCY: intFromString('20'),
    LIGHTWEIGHT_CONCURRENCY: intFromString('50'),

    REPAIR_INTERVAL_MS: intFromString('30000'),
    REPAIR_BATCH_SIZE: intFromString('10'),
    MAX_REPAIR_ATTEMPTS: intFromString('5'),

    SHUTDOWN_TIMEOUT_MS: intFromString('60000'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV !== 'test' && !env.ANTHROPIC_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ANTHROPIC_API_KEY'],
        message: 'ANTHROPIC_API_KEY is required outside tests',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

let validatedEnv: Env | null = null;

export function parseEnv(source: Record<string, string | undefined>) {
  return envSchema.safeParse(source);
}

export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const result = parseEnv(process.env);

  if (!result.success) {
    process.stderr.write('❌ Environment validation failed:\n');
    for (const issue of result.error.issues) {
      process.stderr.write(`  - ${issue.path.join('.')}: ${issue.message}\n`);
    }
    process.exit(1);
  }

  validatedEnv = result.data;
  return validatedEnv;
}

export function getEnv(): Env {
  if (process.env.NODE_ENV === 'test') {
    validatedEnv = null;
  }
  if (!validatedEnv) {
    return validateEnv();
  }
  return validatedEnv;
}

export function resetEnv(): void {
  validatedEnv = null;
}
