import { QueryFailedError } from 'typeorm';

// 23505 is postgres' unique_violation; better-sqlite3 reports SQLITE_CONSTRAINT_UNIQUE
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null || !('code' in driverError)) {
    return false;
  }
  const code = String(driverError.code);
  return code === '23505' || code === 'SQLITE_CONSTRAINT_UNIQUE';
}
