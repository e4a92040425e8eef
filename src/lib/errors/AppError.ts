/**
 * Base class for every domain error raised by this service.
 * `code` is a stable, machine-readable identifier; `message` is for humans.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly cause?: unknown;

  constructor(message: string, code = 'APP_ERROR', cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.cause = cause;
  }
}
