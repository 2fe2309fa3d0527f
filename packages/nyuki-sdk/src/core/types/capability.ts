/**
 * Capability, request and response types.
 *
 * @packageDocumentation
 * @module Types/Capability
 */

import type { z } from 'zod'

export type ExecutionMode = 'sync' | 'async'

/** Transport a request arrived on; its response goes back the same way. */
export type Transport = 'bus' | 'http'

export type ResponseErrorKind =
  | 'NotFound'
  | 'InvalidInput'
  | 'HandlerFailure'
  | 'InternalFault'
  | 'Timeout'
  | 'Overloaded'

export const RESPONSE_ERROR_KINDS: readonly ResponseErrorKind[] = [
  'NotFound',
  'InvalidInput',
  'HandlerFailure',
  'InternalFault',
  'Timeout',
  'Overloaded',
]

export interface ResponseError {
  kind: ResponseErrorKind
  message: string
  detail?: unknown
}

export interface CapabilityRequest {
  correlationId: string
  transport: Transport
  capability: string
  payload: unknown
  /** Relative deadline in milliseconds, counted from submission. */
  deadlineMs?: number
  /** Sender address (bus JID or HTTP remote address). */
  from?: string
}

export type CapabilityResponse =
  | { correlationId: string; status: 'ok'; payload: unknown }
  | { correlationId: string; status: 'error'; error: ResponseError }

/** Passed to every handler invocation. */
export interface CapabilityContext {
  correlationId: string
  transport: Transport
  from?: string
  /** Aborted when the deadline expires or the dispatcher stops. Advisory. */
  signal: AbortSignal
}

export type CapabilityHandler<TInput, TOutput> = (
  input: TInput,
  context: CapabilityContext
) => TOutput | Promise<TOutput>

export interface CapabilityDefinition<
  TInput extends z.ZodTypeAny = z.ZodTypeAny,
  TOutput extends z.ZodTypeAny = z.ZodTypeAny,
> {
  name: string
  description?: string
  /** Defaults to 'async'. A 'sync' handler must return its value directly. */
  mode?: ExecutionMode
  input: TInput
  output: TOutput
  handler: CapabilityHandler<z.output<TInput>, z.input<TOutput>>
}

/** A registered capability: the definition with its mode resolved. */
export interface Capability extends CapabilityDefinition {
  mode: ExecutionMode
}

export interface CapabilityDescriptor {
  name: string
  input: z.ZodTypeAny
  output: z.ZodTypeAny
  mode: ExecutionMode
  description?: string
}

/** What the dispatcher does with a request when every execution slot is busy. */
export type OverloadPolicy = 'queue' | 'reject'
