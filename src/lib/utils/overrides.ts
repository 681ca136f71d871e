import type { z } from 'zod'
import { fromZodError } from './errors'

/**
 * Validate a partial override object and lay it over the defaults.
 * Keys explicitly set to undefined keep their default. The result is frozen.
 */
export function mergeOverrides<T extends { [K in keyof T]: number }>(
  defaults: T,
  schema: z.ZodType<Partial<T>, z.ZodTypeDef, unknown>,
  overrides: unknown,
  context: string
): Readonly<T> {
  const parsed = schema.safeParse(overrides ?? {})
  if (!parsed.success) throw fromZodError(parsed.error, context)

  const merged: T = { ...defaults }
  for (const key in defaults) {
    const value = parsed.data[key]
    if (value !== undefined) merged[key] = value
  }
  return Object.freeze(merged)
}
