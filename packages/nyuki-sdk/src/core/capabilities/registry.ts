/**
 * Capability registry.
 *
 * Capabilities are registered during startup. The dispatcher freezes the
 * registry when it starts accepting requests; it is read-only afterwards.
 *
 * @module Core/Capabilities
 */
import type { z } from 'zod'
import { DuplicateCapabilityError, RegistryFrozenError } from '../errors'
import { logDebug } from '../logger'
import type { Capability, CapabilityDefinition, CapabilityDescriptor, CapabilitySummary } from '../types'

export class CapabilityRegistry {
  private readonly capabilities = new Map<string, Capability>()
  private frozen = false

  /**
   * @throws DuplicateCapabilityError if the name is taken
   * @throws RegistryFrozenError once the registry is frozen
   */
  register<TInput extends z.ZodTypeAny, TOutput extends z.ZodTypeAny>(
    definition: CapabilityDefinition<TInput, TOutput>
  ): void {
    if (this.frozen) throw new RegistryFrozenError(definition.name)
    if (this.capabilities.has(definition.name)) throw new DuplicateCapabilityError(definition.name)

    this.capabilities.set(definition.name, { ...definition, mode: definition.mode ?? 'async' })
    logDebug(`Registered capability ${definition.name}`)
  }

  lookup(name: string): Capability | undefined {
    return this.capabilities.get(name)
  }

  /** Registered capabilities in registration order. */
  list(): CapabilityDescriptor[] {
    return [...this.capabilities.values()].map(({ name, input, output, mode, description }) => {
      const descriptor: CapabilityDescriptor = { name, input, output, mode }
      if (description !== undefined) descriptor.description = description
      return descriptor
    })
  }

  /** Name, mode and description of each capability, as announced on the bus. */
  summaries(): CapabilitySummary[] {
    return this.list().map(({ name, mode, description }) =>
      description === undefined ? { name, mode } : { name, mode, description }
    )
  }

  freeze(): void {
    this.frozen = true
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  get size(): number {
    return this.capabilities.size
  }
}
