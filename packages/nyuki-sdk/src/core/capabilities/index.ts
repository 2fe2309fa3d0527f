export { CapabilityRegistry } from './registry'
export { defineCapability } from './defineCapability'
