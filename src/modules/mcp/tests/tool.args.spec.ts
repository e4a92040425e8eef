import { ToolArgs, parseRfc3339, splitTags } from '../tool.args';
import { toJsonText } from '../tools/preferences.tools';
import { MissingToolArgumentError } from '../../../lib/errors/McpError';

describe('tool argument helpers', () => {
  it('splits, trims and drops blank tags', () => {
    expect(splitTags(' a, b ,,c ')).toEqual(['a', 'b', 'c']);
    expect(splitTags('')).toBeUndefined();
    expect(splitTags(undefined)).toBeUndefined();
  });

  it('parses RFC3339 and drops anything else', () => {
    expect(parseRfc3339('2025-01-15T10:00:00+02:00')).toEqual(
      new Date('2025-01-15T08:00:00Z'),
    );
    expect(parseRfc3339('2025-01-15')).toBeUndefined();
    expect(parseRfc3339('soon')).toBeUndefined();
  });

  it('stores JSON text as is and wraps plain text as a JSON string', () => {
    expect(toJsonText('{"a":1}')).toBe('{"a":1}');
    expect(toJsonText('42')).toBe('42');
    expect(toJsonText('no meat')).toBe('"no meat"');
  });
});

describe('ToolArgs', () => {
  it('reads typed values and treats empty strings as absent', () => {
    const args = new ToolArgs({ title: 'x', note: '', n: 2.9, flag: true });
    expect(args.string('title')).toBe('x');
    expect(args.string('note')).toBeUndefined();
    expect(args.integer('n')).toBe(2);
    expect(args.number('flag')).toBeUndefined();
  });

  it('keeps integers only inside the range', () => {
    const args = new ToolArgs({ low: 0, mid: 3.7, high: 6 });
    expect(args.integerInRange('low', 1, 5)).toBeUndefined();
    expect(args.integerInRange('mid', 1, 5)).toBe(3);
    expect(args.integerInRange('high', 1, 5)).toBeUndefined();
  });

  it('checks the range before truncating', () => {
    const args = new ToolArgs({ over: 5.5, under: 0.9, edge: 5 });
    expect(args.integerInRange('over', 1, 5)).toBeUndefined();
    expect(args.integerInRange('under', 1, 5)).toBeUndefined();
    expect(args.integerInRange('edge', 1, 5)).toBe(5);
  });

  it('defaults and caps the list limit', () => {
    expect(new ToolArgs({}).limit()).toBe(20);
    expect(new ToolArgs({ limit: -4 }).limit()).toBe(20);
    expect(new ToolArgs({ limit: 7.9 }).limit()).toBe(7);
    expect(new ToolArgs({ limit: 50_000 }).limit()).toBe(1000);
  });

  it('throws for a missing required string unless empty is allowed', () => {
    const args = new ToolArgs({ description: '' });
    expect(() => args.requiredString('description')).toThrow(
      new MissingToolArgumentError('description'),
    );
    expect(args.requiredString('description', { allowEmpty: true })).toBe('');
    expect(() => args.requiredString('title', { allowEmpty: true })).toThrow(
      MissingToolArgumentError,
    );
  });
});
