import { Logger } from '@nestjs/common';
import { EntityManager, QueryFailedError } from 'typeorm';

const logger = new Logger('Transaction');

/** PostgreSQL serialization_failure and deadlock_detected */
const RETRYABLE_SQLSTATES = new Set(['40001', '40P01']);

export const DEFAULT_MAX_ATTEMPTS = 3;

/** The slice of `DataSource` this helper needs. */
export interface TransactionRunner {
  transaction<T>(
    isolationLevel: 'SERIALIZABLE',
    work: (manager: EntityManager) => Promise<T>,
  ): Promise<T>;
}

export function isSerializationFailure(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) return false;
  if (!('code' in driverError)) return false;
  return (
    typeof driverError.code === 'string' &&
    RETRYABLE_SQLSTATES.has(driverError.code)
  );
}

/**
 * Runs a validate-then-mutate unit of work under SERIALIZABLE isolation.
 * Conflicting concurrent writers abort with a serialization failure; the
 * whole unit (including its reads) is replayed against fresh state.
 */
export async function runSerializable<T>(
  dataSource: TransactionRunner,
  work: (manager: EntityManager) => Promise<T>,
  maxAttempts = DEFAULT_MAX_ATTEMPTS,
): Promise<T> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await dataSource.transaction('SERIALIZABLE', work);
    } catch (error) {
      if (!isSerializationFailure(error) || attempt >= maxAttempts) {
        throw error;
      }
      logger.warn(
        `Serialization conflict, retrying (attempt ${attempt + 1}/${maxAttempts})`,
      );
    }
  }
}
