import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { safeParse } from './safeJson';

const schema = z.object({ a: z.number() });

describe('safeParse', () => {
  it('parses valid JSON', () => {
    expect(safeParse('{"a":1}', schema, { a: 0 })).toEqual({ a: 1 });
    expect(safeParse('[1,2]', z.array(z.number()), [])).toEqual([1, 2]);
  });

  it('returns fallback for invalid JSON', () => {
    const fallback = { a: 0 };
    expect(safeParse('{ invalid', schema, fallback)).toBe(fallback);
    expect(safeParse('', schema, fallback)).toBe(fallback);
    expect(safeParse(null, schema, fallback)).toBe(fallback);
  });

  it('returns fallback when the value has the wrong shape', () => {
    const fallback = { a: 0 };
    expect(safeParse('{"a":"1"}', schema, fallback)).toBe(fallback);
  });
});
