/**
 * Client tuning. Everything here is local to one client; gameplay constants
 * come from the server's SimConfig in the game-config message.
 */

import { INPUT_REDUNDANCY, MAX_INPUTS_PER_MESSAGE } from '@rubble/shared'

export interface ClientConfig {
  /** Predicted ticks kept for replay; past this the engine resyncs */
  predictionBufferSize: number
  /** Ticks of lead on top of half the round trip */
  leadMargin: number
  /** Lead drift beyond this snaps instead of being absorbed */
  leadSnapThresholdTicks: number
  /** World pixels (or pixels per tick) of error that count as a misprediction */
  correctionEpsilon: number
  /** Decay rate of the visual correction offset, per second */
  correctionDecay: number
  /** Visual corrections larger than this (world pixels) snap */
  snapThreshold: number
  /** Request a full snapshot after this long without one */
  snapshotTimeoutMs: number
  /** Applied snapshots kept as delta bases */
  snapshotWindow: number
  pingIntervalMs: number
  /** Earlier inputs repeated in every input message */
  inputRedundancy: number
  /** Run every predicted step twice and compare world hashes */
  verifyDeterminism: boolean
  /** Throw on determinism violations instead of logging */
  debug: boolean
  /** Draw remote ships from the snapshot buffer instead of the prediction */
  interpolateRemoteShips: boolean
}

export const DEFAULT_CLIENT_CONFIG: Readonly<ClientConfig> = Object.freeze({
  predictionBufferSize: 128,
  leadMargin: 2,
  leadSnapThresholdTicks: 16,
  correctionEpsilon: 0.5,
  correctionDecay: 15,
  snapThreshold: 128,
  snapshotTimeoutMs: 1000,
  snapshotWindow: 32,
  pingIntervalMs: 2000,
  inputRedundancy: INPUT_REDUNDANCY,
  verifyDeterminism: false,
  debug: false,
  interpolateRemoteShips: true,
})

export function resolveClientConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  const config: ClientConfig = { ...DEFAULT_CLIENT_CONFIG, ...overrides }
  if (!Number.isInteger(config.predictionBufferSize) || config.predictionBufferSize < 1) {
    throw new Error(`Invalid predictionBufferSize: ${config.predictionBufferSize}`)
  }
  if (!Number.isInteger(config.snapshotWindow) || config.snapshotWindow < 1) {
    throw new Error(`Invalid snapshotWindow: ${config.snapshotWindow}`)
  }
  if (
    !Number.isInteger(config.inputRedundancy) ||
    config.inputRedundancy < 0 ||
    config.inputRedundancy >= MAX_INPUTS_PER_MESSAGE
  ) {
    throw new Error(`Invalid inputRedundancy: ${config.inputRedundancy}`)
  }
  return config
}
