/**
 * @rubble/shared
 *
 * The deterministic simulation core, fixed-point math and the replication
 * protocol. This package runs identically on client and server.
 */

export const VERSION = '0.1.0'

// Math utilities
export * from './math'

// Simulation (entities, systems, match lifecycle)
export * from './sim'

// Network protocol
export * from './net'
