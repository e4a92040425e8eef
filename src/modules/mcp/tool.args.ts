import { isRFC3339 } from 'class-validator';
import { MissingToolArgumentError } from '../../lib/errors/McpError';

/** Page size for list tools when `limit` is absent or not positive. */
export const DEFAULT_TOOL_LIMIT = 20;
export const MAX_TOOL_LIMIT = 1000;

/** Comma-separated tag list; blanks are dropped. */
export function splitTags(raw: string | undefined): string[] | undefined {
  if (raw === undefined || raw === '') return undefined;
  return raw
    .split(',')
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}

/** RFC3339 timestamp, or undefined when the text does not parse. */
export function parseRfc3339(raw: string | undefined): Date | undefined {
  if (raw === undefined || !isRFC3339(raw)) return undefined;
  const date = new Date(raw);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Typed reads over arguments that already passed the catalog schema.
 * Values of the wrong type read as absent.
 */
export class ToolArgs {
  constructor(private readonly raw: Readonly<Record<string, unknown>>) {}

  /** Non-empty string, or undefined. */
  string(name: string): string | undefined {
    const v = this.raw[name];
    return typeof v === 'string' && v.length > 0 ? v : undefined;
  }

  requiredString(name: string, opts: { allowEmpty?: boolean } = {}): string {
    const v = this.raw[name];
    if (typeof v !== 'string' || (v.length === 0 && !opts.allowEmpty)) {
      throw new MissingToolArgumentError(name);
    }
    return v;
  }

  number(name: string): number | undefined {
    const v = this.raw[name];
    return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
  }

  /** Kept only when the raw number lies inside [min, max], then truncated. */
  integerInRange(name: string, min: number, max: number): number | undefined {
    const v = this.number(name);
    if (v === undefined || v < min || v > max) return undefined;
    return Math.trunc(v);
  }

  /** Number truncated toward zero. */
  integer(name: string): number | undefined {
    const v = this.number(name);
    return v === undefined ? undefined : Math.trunc(v);
  }

  tags(name = 'tags'): string[] | undefined {
    return splitTags(this.string(name));
  }

  date(name: string): Date | undefined {
    return parseRfc3339(this.string(name));
  }

  limit(): number {
    const n = this.integer('limit');
    if (n === undefined || n <= 0) return DEFAULT_TOOL_LIMIT;
    return Math.min(n, MAX_TOOL_LIMIT);
  }

  /** The arguments as received, for the filter compiler. */
  all(): Readonly<Record<string, unknown>> {
    return this.raw;
  }
}
