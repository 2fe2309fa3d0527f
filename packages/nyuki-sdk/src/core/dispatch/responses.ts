import type {
  BusEvent,
  CapabilityRequest,
  CapabilityResponse,
  ResponseError,
  ResponseErrorKind,
} from '../types'

/** HTTP status returned for each response error kind. */
export const HTTP_STATUS_BY_KIND: Record<ResponseErrorKind, number> = {
  NotFound: 404,
  InvalidInput: 400,
  HandlerFailure: 500,
  InternalFault: 500,
  Timeout: 504,
  Overloaded: 503,
}

export function okResponse(request: CapabilityRequest, payload: unknown): CapabilityResponse {
  return { correlationId: request.correlationId, status: 'ok', payload }
}

export function errorResponse(
  request: CapabilityRequest,
  kind: ResponseErrorKind,
  message: string,
  detail?: unknown
): CapabilityResponse {
  const error: ResponseError = detail === undefined ? { kind, message } : { kind, message, detail }
  return { correlationId: request.correlationId, status: 'error', error }
}

/** The bus stanza answering a request, addressed back to its sender. */
export function toBusResponse(response: CapabilityResponse, to: string | undefined): BusEvent {
  const address = to === undefined ? {} : { to }
  if (response.status === 'ok') {
    return { kind: 'capability-result', id: response.correlationId, ...address, payload: response.payload }
  }
  return { kind: 'capability-error', id: response.correlationId, ...address, error: response.error }
}
