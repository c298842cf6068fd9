import { z } from 'zod';

/**
 * Helper to create enum-like object with Zod schema
 * - Creates object with uppercase keys: cbz -> CBZ
 * - Creates Zod schema for validation
 * - Infers TypeScript type as string literals
 *
 * @example
 * ```ts
 * const formats = createEnum(['cbz', 'dir'] as const);
 *
 * // formats.object.CBZ === 'cbz'
 * // formats.schema - Zod schema
 * // typeof formats.type === 'cbz' | 'dir'
 * ```
 */
export function createEnum<const T extends readonly [string, ...string[]]>(values: T) {
  const obj = Object.fromEntries(values.map((v) => [v.toUpperCase(), v])) as Record<Uppercase<T[number]>, T[number]>;

  return {
    values,
    object: obj,
    schema: z.enum(values),
    type: null as unknown as T[number],
  };
}
