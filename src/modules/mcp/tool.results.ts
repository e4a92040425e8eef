import type { ToolCallResult } from './types';

export function textResult(text: string): ToolCallResult {
  return { isError: false, content: [{ type: 'text', text }] };
}

/** Tool-level failure. The JSON-RPC call itself still succeeds. */
export function errorResult(message: string): ToolCallResult {
  return { isError: true, content: [{ type: 'text', text: `Error: ${message}` }] };
}

/** Compact JSON of a row or list of rows as a single text block. */
export function jsonResult(value: unknown): ToolCallResult {
  return textResult(JSON.stringify(value));
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : String(err);
}
