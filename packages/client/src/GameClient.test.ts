import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  ACK_REQUEST_FULL,
  MessageKind,
  TICK_MS,
  captureSnapshot,
  computeDelta,
  createDefaultSystems,
  decodeClientMessage,
  encodeDeltaSnapshot,
  encodeEventMessage,
  encodeFullSnapshot,
  initializeMatch,
  stepWorld,
  type AckMessage,
  type GameConfigMessage,
  type GameEvent,
  type GameWorld,
  type InputMessage,
} from '@rubble/shared'
import { GameClient, type ClientTransport } from './GameClient'
import { NetworkClient, type RoomConnection, type RoomConnector } from './net/NetworkClient'

const SHIP = 1

class FakeTransport implements ClientTransport {
  sent: Uint8Array[] = []
  pings: number[] = []

  sendReplication(bytes: Uint8Array): void {
    this.sent.push(bytes)
  }

  sendPing(clientTime: number): void {
    this.pings.push(clientTime)
  }

  acks(): AckMessage[] {
    const acks: AckMessage[] = []
    for (const bytes of this.sent) {
      const message = decodeClientMessage(bytes)
      if (message.kind === MessageKind.Ack) {
        acks.push({ seq: message.seq, tick: message.tick, ackTick: message.ackTick, flags: message.flags })
      }
    }
    return acks
  }

  inputs(): InputMessage[] {
    const inputs: InputMessage[] = []
    for (const bytes of this.sent) {
      const message = decodeClientMessage(bytes)
      if (message.kind === MessageKind.Input) {
        inputs.push({ seq: message.seq, tick: message.tick, inputs: message.inputs })
      }
    }
    return inputs
  }
}

class OfflineConnector implements RoomConnector {
  joinOrCreate(): Promise<RoomConnection> {
    return Promise.reject(new Error('offline'))
  }

  reconnect(): Promise<RoomConnection> {
    return Promise.reject(new Error('offline'))
  }
}

function serverWorld(): GameWorld {
  const world = initializeMatch(7, [{ playerId: 'a' }], { asteroidSpawnIntervalTicks: 0 })
  const systems = createDefaultSystems()
  while (world.tick < 8) stepWorld(world, systems)
  return world
}

function gameConfig(world: GameWorld, overrides: Partial<GameConfigMessage> = {}): GameConfigMessage {
  return {
    sessionId: 'session-a',
    slot: 0,
    shipId: SHIP,
    tickRate: 64,
    snapshotIntervalTicks: 4,
    serverTick: world.tick,
    simConfig: world.config,
    ...overrides,
  }
}

/** A client that received the config and a full snapshot of the world at tick 8 */
function createSynced(overrides = {}) {
  const world = serverWorld()
  const transport = new FakeTransport()
  let time = 0
  const client = new GameClient(transport, { interpolateRemoteShips: false, ...overrides }, () => time)
  vi.spyOn(console, 'log').mockImplementation(() => undefined)
  client.handleGameConfig(gameConfig(world))
  client.handleReplication(encodeFullSnapshot(1, captureSnapshot(world)))
  return {
    world,
    transport,
    client,
    setTime: (ms: number) => {
      time = ms
    },
  }
}

afterEach(() => {
  vi.restoreAllMocks()
  vi.useRealTimers()
})

describe('GameClient', () => {
  it('does nothing before a game config', () => {
    const transport = new FakeTransport()
    const client = new GameClient(transport, {}, () => 0)

    client.handleReplication(encodeFullSnapshot(1, captureSnapshot(serverWorld())))
    client.fixedUpdate()

    expect(client.state).toBe('connecting')
    expect(transport.sent).toEqual([])
    expect(client.render(0, 0)).toEqual({ entities: [], events: [], confirmedEvents: [] })
  })

  it('stays idle on a config without a player slot', () => {
    const world = serverWorld()
    const transport = new FakeTransport()
    const client = new GameClient(transport, {}, () => 0)

    client.handleGameConfig(gameConfig(world, { slot: null, shipId: 0 }))
    client.handleReplication(encodeFullSnapshot(1, captureSnapshot(world)))

    expect(client.state).toBe('connecting')
    expect(client.prediction).toBeNull()
    expect(transport.sent).toEqual([])
  })

  it('adopts the first full snapshot and acks it', () => {
    const { client, transport } = createSynced()

    expect(client.state).toBe('connected')
    expect(client.shipId).toBe(SHIP)
    expect(client.prediction?.headTick).toBe(8)
    expect(transport.acks()).toEqual([{ seq: 1, tick: 8, ackTick: 8, flags: 0 }])
  })

  it('predicts up to the lead and sends each tick with redundancy', () => {
    const { client, transport, setTime } = createSynced()
    client.input.setThrust(true)

    // Server tick 8, lead 2: two steps to reach 10
    client.fixedUpdate()
    expect(client.prediction?.headTick).toBe(10)

    setTime(TICK_MS)
    client.fixedUpdate()
    expect(client.prediction?.headTick).toBe(11)

    const thrust = { buttons: 0, thrust: 1, turn: 0 }
    expect(transport.inputs()).toEqual([
      { seq: 1, tick: 9, inputs: [thrust] },
      { seq: 2, tick: 10, inputs: [thrust, thrust] },
      { seq: 3, tick: 11, inputs: [thrust, thrust, thrust] },
    ])
  })

  it('replays unconfirmed ticks on a matching server snapshot without correction', () => {
    const { world, client, transport, setTime } = createSynced()
    client.input.setThrust(true)
    client.fixedUpdate()
    setTime(TICK_MS)
    client.fixedUpdate()

    // The server runs ticks 9 and 10 with the inputs it received
    const base = captureSnapshot(world)
    const systems = createDefaultSystems()
    for (const message of transport.inputs().slice(0, 2)) {
      world.inputs.set(SHIP, message.inputs[0])
      stepWorld(world, systems)
    }
    client.handleReplication(encodeDeltaSnapshot(2, computeDelta(base, captureSnapshot(world))))

    expect(client.prediction?.lastConfirmedTick).toBe(10)
    expect(client.prediction?.headTick).toBe(11)
    expect(client.prediction?.smoother.active).toBe(false)
    expect(transport.acks().map((ack) => ack.ackTick)).toEqual([8, 10])
  })

  it('requests a full snapshot when prediction has to restart', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    const { world, client, transport } = createSynced()

    // Head still at 8 while the server is already at 12
    const base = captureSnapshot(world)
    const systems = createDefaultSystems()
    while (world.tick < 12) stepWorld(world, systems)
    client.handleReplication(encodeDeltaSnapshot(2, computeDelta(base, captureSnapshot(world))))

    expect(client.prediction?.headTick).toBe(12)
    expect(client.state).toBe('synchronizing')
    expect(transport.acks().map(({ ackTick, flags }) => ({ ackTick, flags }))).toEqual([
      { ackTick: 8, flags: 0 },
      { ackTick: 12, flags: 0 },
      { ackTick: 12, flags: ACK_REQUEST_FULL },
    ])
  })

  it('snaps the head to the target when it falls far behind', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    const { client, transport, setTime } = createSynced()

    // Server tick 28, target 30: drift 22 is past the snap threshold
    setTime(20 * TICK_MS)
    client.fixedUpdate()

    expect(client.prediction?.headTick).toBe(30)
    expect(transport.inputs()).toHaveLength(22)
    expect(warn).toHaveBeenCalledWith('[Prediction] Lead snap: head 8, target 30')
  })

  it('requests a full snapshot when none arrives before the timeout', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    const world = serverWorld()
    const transport = new FakeTransport()
    let time = 0
    const client = new GameClient(transport, {}, () => time)
    client.handleGameConfig(gameConfig(world))

    time = 1000
    client.fixedUpdate()

    expect(transport.acks()).toEqual([{ seq: 1, tick: 72, ackTick: 0, flags: ACK_REQUEST_FULL }])
    expect(transport.inputs()).toEqual([])
  })

  it('renders the predicted world and drains events once', () => {
    const { client } = createSynced()
    client.fixedUpdate()

    const events: GameEvent[] = [{ type: 'score', tick: 9, slot: 0, points: 20, total: 20 }]
    client.handleReplication(encodeEventMessage(2, 9, events))

    const frame = client.render(0.5, 1 / 60)
    expect(frame.entities.map((entity) => [entity.id, entity.kind, entity.local])).toEqual([[SHIP, 'ship', true]])
    expect(frame.confirmedEvents).toEqual(events)
    expect(client.render(0.5, 1 / 60).confirmedEvents).toEqual([])
  })

  it('feeds round trips into the tick lead', () => {
    const { client, setTime } = createSynced()
    setTime(100)
    client.handlePong({ clientTime: 0, serverTime: 50, serverTick: 20 })

    // ceil(50 / 15.625) + 2
    expect(client.lead.lead).toBe(6)
    expect(client.clock.estimateServerTick()).toBeCloseTo(23.2)
  })

  it('drops the match when it ends', () => {
    const { client, transport } = createSynced()
    client.handleMatchEnded()

    expect(client.state).toBe('connecting')
    expect(client.prediction).toBeNull()
    expect(client.shipId).toBe(0)
    client.fixedUpdate()
    expect(transport.inputs()).toEqual([])
  })

  it('forgets everything on disconnect', () => {
    const { client } = createSynced()
    client.handleDisconnect()

    expect(client.state).toBe('disconnected')
    expect(client.latestSnapshot).toBeNull()
    expect(client.prediction).toBeNull()
  })

  it('pings while attached', () => {
    vi.useFakeTimers()
    const transport = new FakeTransport()
    const client = new GameClient(transport, { pingIntervalMs: 2000 }, () => 5)
    const net = new NetworkClient('ws://localhost:2567', { connector: new OfflineConnector() })

    const detach = client.attach(net)
    vi.advanceTimersByTime(4000)
    expect(transport.pings).toEqual([5, 5, 5])

    detach()
    vi.advanceTimersByTime(4000)
    expect(transport.pings).toHaveLength(3)
  })
})
