export { Dispatcher, type DispatcherOptions, type ResponseSink } from './Dispatcher'
export { RemoteCaller, DEFAULT_CALL_DEADLINE_MS, type CallOptions } from './remoteCaller'
export { HTTP_STATUS_BY_KIND, errorResponse, okResponse, toBusResponse } from './responses'
export { correlationKey } from './inFlightTable'
