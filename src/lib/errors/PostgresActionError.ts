import { AppError } from './AppError';

/**
 * Operations the repositories perform against Postgres.
 * Open-ended so new call sites do not need to touch this union.
 */
export type PostgresOperation =
  | 'connect'
  | 'query'
  | 'ping'
  | 'insert'
  | 'select'
  | 'list'
  | 'update'
  | 'delete'
  | (string & {});

/**
 * Structured context attached to Postgres errors.
 */
export interface PostgresErrorContext {
  /** Logical operation being attempted (e.g., "insert"). */
  readonly operation: PostgresOperation;
  /** Table the statement targets, when there is one. */
  readonly table?: string;
  /** SQLSTATE reported by the server (e.g., "23505"). */
  readonly driverCode?: string;
  /** Offending constraint, when the server names one. */
  readonly constraint?: string;
}

/**
 * Failure while talking to Postgres. Wraps the driver error and keeps
 * only safe, structured context (never bound parameter values).
 */
export class PostgresActionError extends AppError {
  public readonly context: Readonly<PostgresErrorContext>;
  private readonly original?: Error;

  constructor(message: string, context: PostgresErrorContext, cause?: Error) {
    super(message, 'POSTGRES_ACTION_FAILED', cause);
    this.context = Object.freeze({ ...context });
    this.original = cause;
  }

  /** One-line summary for logs. */
  public summary(): string {
    const parts: string[] = [`op=${this.context.operation}`];
    if (this.context.table) parts.push(`table=${this.context.table}`);
    if (this.context.driverCode) parts.push(`sqlstate=${this.context.driverCode}`);
    if (this.context.constraint) parts.push(`constraint=${this.context.constraint}`);
    return `Postgres action failed: ${parts.join(' ')}`;
  }

  public toJSON(): {
    name: string;
    message: string;
    context: PostgresErrorContext;
    cause?: { name: string; message: string };
  } {
    const c = this.original;
    return {
      name: this.name,
      message: this.message,
      context: this.context,
      cause: c ? { name: c.name, message: c.message } : undefined,
    };
  }

  /**
   * Wrap a thrown value with consistent context.
   * An existing PostgresActionError is returned unchanged.
   */
  public static wrap(
    err: unknown,
    context: PostgresErrorContext,
    fallbackMessage = 'Postgres action failed',
  ): PostgresActionError {
    if (err instanceof PostgresActionError) {
      return err;
    }
    const { message, driverCode, constraint } = extractDriverDetails(err);
    return new PostgresActionError(
      message ?? fallbackMessage,
      { ...context, driverCode, constraint },
      err instanceof Error ? err : undefined,
    );
  }
}

/**
 * Pull message, SQLSTATE and constraint name off a node-postgres
 * DatabaseError (or anything shaped like one).
 */
function extractDriverDetails(err: unknown): {
  message?: string;
  driverCode?: string;
  constraint?: string;
} {
  if (!(err instanceof Error)) {
    return typeof err === 'string' && err.length > 0 ? { message: err } : {};
  }
  const details: { message?: string; driverCode?: string; constraint?: string } =
    {};
  if (err.message.length > 0) details.message = err.message;
  if ('code' in err && typeof err.code === 'string') details.driverCode = err.code;
  if ('constraint' in err && typeof err.constraint === 'string') {
    details.constraint = err.constraint;
  }
  return details;
}
