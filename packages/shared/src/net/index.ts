/**
 * Network protocol: input codec, binary replication messages and the JSON
 * room control messages.
 */

export * from './input'
export * from './wire'
export * from './snapshot'
export * from './events'
export * from './protocol'
export * from './clock'
export * from './lobby'
