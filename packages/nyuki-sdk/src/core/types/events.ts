/**
 * Internal event bus topic map.
 *
 * Topic names are `<area>:<event>`; each maps to its payload type.
 *
 * @packageDocumentation
 * @module Types/Events
 */

import type { z } from 'zod'
import type { DecodeError, NyukiError } from '../errors'
import type { BusEvent } from './bus'
import type { Transport } from './capability'
import type { SessionState } from './session'

export type DispatchDiagnostic =
  | {
      type: 'output-violation'
      correlationId: string
      capability: string
      issues: z.ZodIssue[]
    }
  | {
      type: 'sync-returned-promise'
      correlationId: string
      capability: string
    }
  | {
      type: 'late-result'
      correlationId: string
      capability: string
      outcome: 'ok' | 'error'
    }
  | {
      /** A refinement or transform threw instead of reporting issues. */
      type: 'schema-failure'
      correlationId: string
      capability: string
      schema: 'input' | 'output'
      error: string
    }
  | {
      type: 'duplicate-request'
      correlationId: string
      transport: Transport
    }

export type NyukiEventMap = {
  'session:state': { state: SessionState; previous: SessionState }
  'session:event': { event: BusEvent }
  'session:decode-error': { error: DecodeError }
  'session:dropped': { attempt: number; delayMs: number; reason: string | null }
  'session:fatal': { error: NyukiError }
  'dispatch:diagnostic': DispatchDiagnostic
}

export type NyukiEventTopic = keyof NyukiEventMap
