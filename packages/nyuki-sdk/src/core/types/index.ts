export type * from './bus'
export type * from './capability'
export type * from './session'
export type * from './events'
export { RESPONSE_ERROR_KINDS } from './capability'
