/**
 * GameClient - the networked client core
 *
 * Wires the input channel, clock sync, replication receiver and prediction
 * engine together. The host drives it from a GameLoop: fixedUpdate() once
 * per tick, render() once per frame. Everything arrives through the
 * handle*() methods, normally subscribed by attach().
 *
 * Prediction starts when a game config with a player slot arrives and the
 * first full snapshot has been applied.
 */

import {
  NO_ENTITY,
  TICK_MS,
  encodeInputMessage,
  type EntityId,
  type GameConfigMessage,
  type GameEvent,
  type PongMessage,
  type WorldSnapshot,
} from '@rubble/shared'
import { resolveClientConfig, type ClientConfig } from './config'
import { ClockSync } from './net/ClockSync'
import { InputChannel } from './net/InputChannel'
import type { NetworkClient } from './net/NetworkClient'
import { SnapshotBuffer } from './net/SnapshotBuffer'
import { SnapshotReceiver, type ReceiverState } from './net/SnapshotReceiver'
import { TickLead } from './net/TickLead'
import { PredictionEngine, type ReconcileResult } from './prediction/PredictionEngine'
import { buildRenderView, sampleRemoteShips, type RemotePose, type RenderEntity } from './prediction/RenderView'

/** Outgoing traffic; NetworkClient provides it */
export interface ClientTransport {
  sendReplication(bytes: Uint8Array): void
  sendPing(clientTime: number): void
}

/** What presentation gets each frame */
export interface RenderFrame {
  entities: RenderEntity[]
  /** Speculative events of the ticks predicted since the last frame */
  events: GameEvent[]
  /** Authoritative events the server sent since the last frame */
  confirmedEvents: GameEvent[]
}

/** Running match state, present between a game config and the match end */
interface MatchSession {
  config: GameConfigMessage
  prediction: PredictionEngine
  interpolation: SnapshotBuffer
}

export class GameClient {
  readonly input: InputChannel
  readonly clock: ClockSync
  readonly lead: TickLead
  readonly config: ClientConfig
  private readonly receiver: SnapshotReceiver
  private match: MatchSession | null = null
  private speculative: GameEvent[] = []
  private confirmed: GameEvent[] = []

  constructor(
    private readonly transport: ClientTransport,
    overrides: Partial<ClientConfig> = {},
    private readonly now: () => number = () => performance.now()
  ) {
    this.config = resolveClientConfig(overrides)
    this.input = new InputChannel(this.config.inputRedundancy)
    this.clock = new ClockSync(now)
    this.lead = new TickLead(this.config.leadMargin, this.config.leadSnapThresholdTicks)
    this.receiver = new SnapshotReceiver({
      windowSize: this.config.snapshotWindow,
      timeoutMs: this.config.snapshotTimeoutMs,
      send: (bytes) => transport.sendReplication(bytes),
      currentTick: () => this.estimatedServerTick(),
    })
  }

  get state(): ReceiverState {
    return this.receiver.state
  }

  /** Ship driven by local input, NO_ENTITY when spectating or idle */
  get shipId(): EntityId {
    return this.match?.config.shipId ?? NO_ENTITY
  }

  get prediction(): PredictionEngine | null {
    return this.match?.prediction ?? null
  }

  /** Newest applied server snapshot */
  get latestSnapshot(): WorldSnapshot | null {
    return this.receiver.latest
  }

  /**
   * Subscribe to a NetworkClient and start pinging.
   *
   * @returns Detach function
   */
  attach(net: NetworkClient): () => void {
    const off = [
      net.on('game-config', (config) => this.handleGameConfig(config)),
      net.on('replication', (bytes) => this.handleReplication(bytes)),
      net.on('pong', (pong) => this.handlePong(pong)),
      net.on('match-ended', () => this.handleMatchEnded()),
      net.on('disconnect', () => this.handleDisconnect()),
    ]
    const latest = net.getLatestGameConfig()
    if (latest) this.handleGameConfig(latest)
    this.clock.start((clientTime) => this.transport.sendPing(clientTime), this.config.pingIntervalMs)

    return () => {
      for (const unsubscribe of off) unsubscribe()
      this.clock.stop()
    }
  }

  handleGameConfig(config: GameConfigMessage): void {
    this.clock.anchorTick(config.serverTick)
    if (config.slot === null) {
      this.endMatch()
      return
    }

    this.match = {
      config,
      prediction: new PredictionEngine({
        shipId: config.shipId,
        simConfig: config.simConfig,
        bufferSize: this.config.predictionBufferSize,
        correctionEpsilon: this.config.correctionEpsilon,
        correctionDecay: this.config.correctionDecay,
        snapThreshold: this.config.snapThreshold,
        verifyDeterminism: this.config.verifyDeterminism,
        debug: this.config.debug,
      }),
      interpolation: new SnapshotBuffer(config.snapshotIntervalTicks * TICK_MS, this.now),
    }
    this.input.reset()
    this.speculative = []
    this.receiver.beginSync(this.now())
    console.log(`[GameClient] Syncing (slot=${config.slot}, ship=${config.shipId}, tick=${config.serverTick})`)
  }

  handleReplication(bytes: Uint8Array): void {
    const received = this.receiver.receive(bytes, this.now())
    if (!received) return

    if (received.kind === 'events') {
      this.confirmed.push(...received.events)
      return
    }

    const match = this.match
    if (!match) return
    match.interpolation.push(received.snapshot)
    if (!match.prediction.ready) {
      match.prediction.resync(received.snapshot)
      return
    }
    this.afterReconcile(match.prediction.reconcile(received.snapshot))
  }

  private afterReconcile(result: ReconcileResult): void {
    if (result.kind === 'resync') {
      this.receiver.requestFull()
    } else if (result.kind === 'replayed' && result.mispredicted > 0 && this.config.debug) {
      console.log(`[Prediction] Replayed ${result.ticks} ticks, ${result.mispredicted} mispredicted`)
    }
  }

  handlePong(pong: PongMessage): void {
    this.clock.onPong(pong)
    this.lead.observeRtt(this.clock.getRTT())
  }

  handleMatchEnded(): void {
    this.receiver.reset()
    this.endMatch()
  }

  handleDisconnect(): void {
    this.receiver.disconnect()
    this.endMatch()
    this.clock.stop()
  }

  private endMatch(): void {
    this.match = null
    this.speculative = []
  }

  /** Server tick estimate, falling back to the newest snapshot before any anchor */
  private estimatedServerTick(): number {
    return this.clock.estimateServerTick() ?? this.receiver.latestTick
  }

  /**
   * One fixed tick: watch for snapshot loss, then predict as many ticks as
   * it takes to keep the head at its lead over the server.
   */
  fixedUpdate(): void {
    this.receiver.checkTimeout(this.now())

    const match = this.match
    if (!match || !match.prediction.ready) return

    const serverTick = this.estimatedServerTick()
    const steps = this.lead.stepsFor(match.prediction.headTick, serverTick)
    if (steps === 'snap') {
      this.snapLead(match, this.lead.targetTick(serverTick))
      return
    }
    for (let i = 0; i < steps; i++) this.predictTick(match)
  }

  /**
   * The head drifted too far: restart it from the newest confirmed state and
   * fast-forward to the target with the current input.
   */
  private snapLead(match: MatchSession, target: number): void {
    const latest = this.receiver.latest
    const { prediction } = match
    console.warn(`[Prediction] Lead snap: head ${prediction.headTick}, target ${target}`)
    if (latest && (prediction.headTick > target || prediction.headTick < latest.tick)) {
      prediction.resync(latest)
    }
    const limit = Math.min(target, prediction.headTick + this.config.predictionBufferSize - 1)
    while (prediction.headTick < limit) this.predictTick(match)
  }

  private predictTick(match: MatchSession): void {
    const tick = match.prediction.headTick + 1
    const input = this.input.capture()
    this.input.record(tick, input)
    this.speculative.push(...match.prediction.step(input))
    if (match.config.shipId !== NO_ENTITY) {
      this.transport.sendReplication(encodeInputMessage(this.input.buildMessage(tick)))
    }
  }

  /**
   * Presentation view for this frame.
   *
   * @param alpha - Progress toward the next fixed tick
   * @param frameSeconds - Wall time since the last frame, for smoothing
   */
  render(alpha: number, frameSeconds: number): RenderFrame {
    const events = this.speculative
    const confirmedEvents = this.confirmed
    this.speculative = []
    this.confirmed = []

    const match = this.match
    const head = match?.prediction.getHead()
    const previous = match?.prediction.getPrevious()
    if (!match || !head || !previous) {
      return { entities: [], events, confirmedEvents }
    }

    const { prediction } = match
    prediction.smoother.update(frameSeconds)
    const entities = buildRenderView(previous, head, alpha, {
      localShipId: match.config.shipId,
      correction: { x: prediction.smoother.x, y: prediction.smoother.y },
      remote: this.remotePoses(match),
    })
    return { entities, events, confirmedEvents }
  }

  private remotePoses(match: MatchSession): Map<EntityId, RemotePose> | undefined {
    if (!this.config.interpolateRemoteShips) return undefined
    const serverTick = this.clock.estimateServerTick()
    const state = match.interpolation.getInterpolationState(serverTick === null ? undefined : serverTick * TICK_MS)
    if (!state) return undefined
    return sampleRemoteShips(state, match.config.simConfig, match.config.shipId)
  }
}
