/**
 * Runtime error classes.
 *
 * Thrown errors are reserved for startup mistakes and session-level
 * failures. Per-request failures never throw: the dispatcher turns them
 * into error responses (see `ResponseErrorKind`).
 *
 * @module Core/Errors
 */

export type NyukiErrorKind =
  | 'DuplicateCapability'
  | 'RegistryFrozen'
  | 'AuthFailure'
  | 'ConnectionDrop'
  | 'QueueFull'
  | 'SessionClosed'
  | 'DecodeError'

export class NyukiError extends Error {
  readonly kind: NyukiErrorKind

  constructor(kind: NyukiErrorKind, message: string) {
    super(message)
    this.name = 'NyukiError'
    this.kind = kind
  }

  toJSON(): { name: string; kind: NyukiErrorKind; message: string } {
    return { name: this.name, kind: this.kind, message: this.message }
  }
}

// ============================================================================
// Startup errors
// ============================================================================

export class DuplicateCapabilityError extends NyukiError {
  readonly capability: string

  constructor(capability: string) {
    super('DuplicateCapability', `Capability "${capability}" is already registered`)
    this.name = 'DuplicateCapabilityError'
    this.capability = capability
  }
}

export class RegistryFrozenError extends NyukiError {
  constructor(capability: string) {
    super('RegistryFrozen', `Cannot register "${capability}": the registry is frozen once dispatch starts`)
    this.name = 'RegistryFrozenError'
  }
}

// ============================================================================
// Session errors
// ============================================================================

export class AuthFailureError extends NyukiError {
  constructor(jid: string, reason: string) {
    super('AuthFailure', `Authentication failed for ${jid}: ${reason}`)
    this.name = 'AuthFailureError'
  }
}

export class ConnectionDropError extends NyukiError {
  readonly attempts: number

  constructor(reason: string, attempts: number) {
    super('ConnectionDrop', `Connection lost after ${attempts} reconnect attempts: ${reason}`)
    this.name = 'ConnectionDropError'
    this.attempts = attempts
  }
}

export class QueueFullError extends NyukiError {
  readonly capacity: number

  constructor(capacity: number) {
    super('QueueFull', `Outbound queue is full (capacity ${capacity})`)
    this.name = 'QueueFullError'
    this.capacity = capacity
  }
}

export class SessionClosedError extends NyukiError {
  constructor(operation: string) {
    super('SessionClosed', `Cannot ${operation}: the session is closed`)
    this.name = 'SessionClosedError'
  }
}

// ============================================================================
// Codec errors
// ============================================================================

export type DecodeErrorReason = 'malformed' | 'unsupported'

/**
 * Returned (never thrown) by the stanza codec. Keeps the offending raw
 * fragment so it can be logged.
 */
export class DecodeError extends NyukiError {
  readonly reason: DecodeErrorReason
  readonly fragment: string

  constructor(reason: DecodeErrorReason, message: string, fragment: string) {
    super('DecodeError', message)
    this.name = 'DecodeError'
    this.reason = reason
    this.fragment = fragment
  }
}

export function isDecodeError(value: unknown): value is DecodeError {
  return value instanceof DecodeError
}
