/**
 * Game simulation module
 *
 * Entity arena, system pipeline and match lifecycle.
 * This runs identically on client and server.
 */

export * from './config'
export * from './entities'
export * from './events'
export * from './world'
export * from './step'
export * from './prefabs'
export * from './systems'
export * from './SpatialHash'
export * from './playerRegistry'
export * from './match'
export * from './hash'
