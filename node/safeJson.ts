import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Safe JSON parse for values read back from the cache database. Malformed text or a value
 * that does not fit `schema` yields `fallback`.
 */
export function safeParse<T>(raw: string | null | undefined, schema: ZodType<T, ZodTypeDef, unknown>, fallback: T): T {
  if (!raw) return fallback;
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return fallback;
  }
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : fallback;
}
