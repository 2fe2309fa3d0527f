// Agent facade
export { Nyuki, DEFAULT_DISPATCH, DEFAULT_DRAIN_TIMEOUT_MS } from './Nyuki'
export type { NyukiConfig, ApiAddress, DispatchConfig, TeardownHook } from './Nyuki'

// Session
export { Session, DEFAULT_PORT, DEFAULT_RESOURCE } from './session/Session'
export type { SessionOptions, TopicListener } from './session/Session'
export { OutboundQueue, DEFAULT_QUEUE_OPTIONS } from './session/outboundQueue'
export type { QueueEntry } from './session/outboundQueue'
export {
  sessionMachine,
  computeBackoffDelay,
  getSessionStateFromValue,
  DEFAULT_BACKOFF,
  INITIAL_RECONNECT_DELAY,
  MAX_RECONNECT_DELAY,
  RECONNECT_MULTIPLIER,
  RECONNECT_JITTER,
} from './sessionMachine'
export type { SessionActor, SessionStateValue, SessionMachineEvent } from './sessionMachine'

// Capabilities and dispatch
export { CapabilityRegistry, defineCapability } from './capabilities'
export {
  Dispatcher,
  RemoteCaller,
  DEFAULT_CALL_DEADLINE_MS,
  HTTP_STATUS_BY_KIND,
  errorResponse,
  okResponse,
  toBusResponse,
} from './dispatch'
export type { DispatcherOptions, ResponseSink, CallOptions } from './dispatch'

// Wire format
export { encode, encodeElement, decode, decodeElement } from './codec'
export type { DecodeResult } from './codec'
export { NS_CAPABILITY, NS_CAPABILITY_LIST, NS_EVENT, NS_MUC } from './namespaces'
export { getBareJid, getDomain, getLocalPart, getResource, parseJid, topicRoomJid, topicFromRoomJid } from './jid'

// Event bus
export { EventBus } from './events/eventBus'
export type { Listener, SubscriptionHandle } from './events/eventBus'

// HTTP surface
export { createApiServer, CORRELATION_HEADER, DEADLINE_HEADER } from './http/apiServer'
export type { ApiServerOptions, SessionStatusSource } from './http/apiServer'

// Errors and logging
export {
  NyukiError,
  DuplicateCapabilityError,
  RegistryFrozenError,
  AuthFailureError,
  ConnectionDropError,
  QueueFullError,
  SessionClosedError,
  DecodeError,
  isDecodeError,
} from './errors'
export type { NyukiErrorKind, DecodeErrorReason } from './errors'
export { logDebug, logInfo, logWarn, logError, describeError, setDebugLogging } from './logger'

// Types
export * from './types'

// Re-export xml builder from @xmpp/client for raw stanza construction
export { xml } from '@xmpp/client'
export type { Element } from '@xmpp/client'
