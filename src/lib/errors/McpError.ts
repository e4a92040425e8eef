import { AppError } from './AppError';

/** The request body is not a JSON-RPC envelope we can answer. */
export class InvalidEnvelopeError extends AppError {
  constructor(readonly reason: string) {
    super(`Invalid JSON-RPC request: ${reason}`, 'MCP_INVALID_ENVELOPE');
  }
}

/** A required tool argument is absent, empty or of the wrong type. */
export class MissingToolArgumentError extends AppError {
  constructor(readonly argument: string) {
    super(`${argument} is required`, 'MCP_MISSING_ARGUMENT');
  }
}
