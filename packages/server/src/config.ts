/**
 * Server settings, read once from the environment at startup.
 *
 * Gameplay tuning lives in SimConfig (shared); this is only what the
 * replication layer and the process need.
 */

export interface ServerConfig {
  port: number
  /** Snapshot cadence in ticks (64Hz / 4 = 16Hz) */
  snapshotIntervalTicks: number
  /** Interest radius in world pixels; 0 replicates everything */
  interestRadius: number
  /** Per-client inbound input queue bound */
  maxInputQueue: number
  /** How long a dropped client's ship is kept for reconnection */
  reconnectSeconds: number
  /** Malformed messages tolerated before a client is disconnected */
  maxProtocolViolations: number
  /** Sent snapshots kept per client as delta baselines */
  baselineHistory: number
  inputRateLimitPerSecond: number
  inputRateBurst: number
  /** Simulation seed; a random one per match when unset */
  seed: number | null
}

export const DEFAULT_SERVER_CONFIG: Readonly<ServerConfig> = Object.freeze({
  port: 2567,
  snapshotIntervalTicks: 4,
  interestRadius: 0,
  maxInputQueue: 32,
  reconnectSeconds: 30,
  maxProtocolViolations: 10,
  baselineHistory: 32,
  inputRateLimitPerSecond: 128,
  inputRateBurst: 64,
  seed: null,
})

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name}: expected an integer >= ${min}, got "${raw}"`)
  }
  return value
}

/**
 * @throws If a variable is set to something unusable
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const d = DEFAULT_SERVER_CONFIG
  const seed = readInt(env, 'SEED', -1, 0)
  return {
    port: readInt(env, 'PORT', d.port, 1),
    snapshotIntervalTicks: readInt(env, 'SNAPSHOT_INTERVAL_TICKS', d.snapshotIntervalTicks, 1),
    interestRadius: readInt(env, 'INTEREST_RADIUS', d.interestRadius, 0),
    maxInputQueue: readInt(env, 'MAX_INPUT_QUEUE', d.maxInputQueue, 1),
    reconnectSeconds: readInt(env, 'RECONNECT_SECONDS', d.reconnectSeconds, 0),
    maxProtocolViolations: readInt(env, 'MAX_PROTOCOL_VIOLATIONS', d.maxProtocolViolations, 1),
    baselineHistory: readInt(env, 'BASELINE_HISTORY', d.baselineHistory, 1),
    inputRateLimitPerSecond: readInt(env, 'INPUT_RATE_LIMIT', d.inputRateLimitPerSecond, 1),
    inputRateBurst: readInt(env, 'INPUT_RATE_BURST', d.inputRateBurst, 1),
    seed: seed >= 0 ? seed : null,
  }
}
