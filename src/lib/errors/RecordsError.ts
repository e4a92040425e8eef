import { AppError } from './AppError';

/**
 * Persistence-level domain errors shared by all repositories.
 * Controllers map these to HTTP statuses; tool handlers surface their message.
 */

export class RecordNotFoundError extends AppError {
  constructor(
    readonly table: string,
    readonly id: string,
  ) {
    super(`${table} record not found: ${id}`, 'RECORD_NOT_FOUND');
  }
}

export class UnsafeIdentifierError extends AppError {
  constructor(
    readonly kind: 'sort column' | 'sort direction' | 'column',
    readonly value: string,
  ) {
    super(`Refusing unsafe ${kind}: ${value}`, 'RECORD_UNSAFE_IDENTIFIER');
  }
}
