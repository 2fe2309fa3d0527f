import type { z } from 'zod'
import type { CapabilityDefinition } from '../types'

/**
 * Define a capability with its handler typed from the schemas.
 * Returns the input unchanged.
 *
 * @example
 * ```typescript
 * const double = defineCapability({
 *   name: 'double',
 *   input: z.object({ value: z.number() }),
 *   output: z.number(),
 *   handler: ({ value }) => value * 2,
 * })
 * ```
 */
export function defineCapability<TInput extends z.ZodTypeAny, TOutput extends z.ZodTypeAny>(
  definition: CapabilityDefinition<TInput, TOutput>
): CapabilityDefinition<TInput, TOutput> {
  return definition
}
