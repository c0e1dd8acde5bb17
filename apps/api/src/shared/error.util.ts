import { QueryFailedError } from 'typeorm';

const PG_UNIQUE_VIOLATION = '23505';

/**
 * Safely extract message and stack from an unknown caught value.
 * Use in catch blocks: `const err = toErrorInfo(error);`
 */
export function toErrorInfo(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

/**
 * Check whether an unknown caught value is a PostgreSQL unique-constraint
 * violation (error code 23505) surfaced through TypeORM's QueryFailedError.
 * When `constraint` is given, the violated constraint must carry that name.
 */
export function isUniqueConstraintViolation(error: unknown, constraint?: string): boolean {
  if (!(error instanceof QueryFailedError)) return false;

  const driver: unknown = error.driverError;
  if (typeof driver !== 'object' || driver === null) return false;
  if (!('code' in driver) || driver.code !== PG_UNIQUE_VIOLATION) return false;

  return constraint === undefined || ('constraint' in driver && driver.constraint === constraint);
}
