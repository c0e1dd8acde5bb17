import { z } from 'zod';

/**
 * Environment variable validation schema
 *
 * Every required variable must be present and valid before the application
 * starts. If validation fails the process exits with a readable report.
 *
 * @see {@link https://github.com/colinhacks/zod} Zod documentation
 */
const envSchema = z.object({
  // Application Settings
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().min(1000).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),

  // Database Configuration (PostgreSQL)
  PGHOST: z.string().min(1, 'PostgreSQL host is required'),
  PGPORT: z.coerce.number().default(5432),
  PGDATABASE: z.string().min(1, 'PostgreSQL database name is required'),
  PGUSER: z.string().min(1, 'PostgreSQL user is required'),
  PGPASSWORD: z.string().min(1, 'PostgreSQL password is required'),
  PG_POOL_MAX: z.coerce.number().int().positive().default(10)
});

export type Env = z.infer<typeof envSchema>;

/**
 * Splits zod issues into missing and invalid variables, one line each.
 */
export function describeEnvIssues(error: z.ZodError): { missing: string[]; invalid: string[] } {
  const missing: string[] = [];
  const invalid: string[] = [];

  error.errors.forEach((err) => {
    const path = err.path.join('.');
    if (err.code === 'invalid_type' && err.received === 'undefined') {
      missing.push(`  ${path}: ${err.message}`);
    } else {
      invalid.push(`  ${path}: ${err.message}`);
    }
  });

  return { missing, invalid };
}

/**
 * Validates environment variables against the schema
 *
 * @returns Validated and typed environment variables
 *
 * @example
 * ```typescript
 * ConfigModule.forRoot({
 *   validate: validateEnv
 * })
 * ```
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = envSchema.safeParse(config);
  if (result.success) return result.data;

  const { missing, invalid } = describeEnvIssues(result.error);

  console.error('\nENVIRONMENT VALIDATION FAILED\n');

  if (missing.length > 0) {
    console.error('Missing required environment variables:');
    missing.forEach((msg) => console.error(msg));
    console.error('');
  }

  if (invalid.length > 0) {
    console.error('Invalid environment variable values:');
    invalid.forEach((msg) => console.error(msg));
    console.error('');
  }

  console.error('Check your .env file against .env.example (cp .env.example .env)\n');

  process.exit(1);
}
