import { QueryFailedError } from 'typeorm';

// PostgreSQL SQLSTATE for unique_violation
const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return typeof driverError === 'object'
    && driverError !== null
    && Reflect.get(driverError, 'code') === UNIQUE_VIOLATION;
}
