import { describe, expect, test } from 'vitest'
import {
  ACK_REQUEST_FULL,
  MessageKind,
  applyDelta,
  captureSnapshot,
  decodeServerMessage,
  despawnEntity,
  encodeAck,
  encodeInputMessage,
  type ServerMessage,
  type WorldSnapshot,
} from '@rubble/shared'
import { ReplicationServer, type ReplicationOptions, type Transport } from './ReplicationServer'

const OPTIONS: ReplicationOptions = {
  snapshotIntervalTicks: 2,
  interestRadius: 0,
  maxInputQueue: 32,
  maxProtocolViolations: 2,
  baselineHistory: 16,
  inputRateLimitPerSecond: 1000,
  inputRateBurst: 100,
  // No asteroids: the world only changes through the ships
  simConfig: { asteroidSpawnIntervalTicks: 0 },
}

class FakeTransport implements Transport {
  readonly sent: Uint8Array[] = []
  readonly disconnects: string[] = []

  send(bytes: Uint8Array): void {
    this.sent.push(bytes)
  }

  disconnect(reason: string): void {
    this.disconnects.push(reason)
  }

  messages(): ServerMessage[] {
    return this.sent.map((bytes) => decodeServerMessage(bytes))
  }
}

function fullSnapshotOf(message: ServerMessage | undefined): WorldSnapshot {
  if (message?.kind !== MessageKind.FullSnapshot) throw new Error('expected a full snapshot')
  return message.snapshot
}

function startMatch(ids: string[], options: ReplicationOptions = OPTIONS) {
  const server = new ReplicationServer(options)
  const transports = new Map<string, FakeTransport>()
  for (const id of ids) {
    const transport = new FakeTransport()
    transports.set(id, transport)
    server.addClient(id, transport, 0)
  }
  server.initialize(42, ids.map((playerId) => ({ playerId })))
  const transportOf = (id: string): FakeTransport => {
    const transport = transports.get(id)
    if (!transport) throw new Error(`no transport for ${id}`)
    return transport
  }
  return { server, transportOf }
}

function stepTimes(server: ReplicationServer, count: number): void {
  for (let i = 0; i < count; i++) server.step()
}

describe('ReplicationServer', () => {
  test('does nothing before a match starts', () => {
    const server = new ReplicationServer(OPTIONS)
    server.addClient('a', new FakeTransport(), 0)
    expect(server.step()).toBeNull()
    expect(server.getSession('a')?.state).toBe('connecting')
  })

  test('initialize gives every client a ship and starts synchronizing', () => {
    const { server } = startMatch(['a', 'b'])
    expect(server.isRunning).toBe(true)
    expect(server.getSession('a')?.shipId).toBe(1)
    expect(server.getSession('b')?.shipId).toBe(2)
    expect(server.getSlot('b')).toBe(1)
    expect(server.getSession('a')?.state).toBe('synchronizing')
  })

  test('sends a full snapshot and the pending events on snapshot ticks', () => {
    const { server, transportOf } = startMatch(['a', 'b'])

    server.step()
    expect(transportOf('a').sent).toHaveLength(0)

    server.step()
    const [snapshot, events] = transportOf('a').messages()
    expect(fullSnapshotOf(snapshot).tick).toBe(2)
    expect(fullSnapshotOf(snapshot).entities.map((entity) => entity.id)).toEqual([1, 2])
    expect(events).toEqual({
      kind: MessageKind.Event,
      seq: 2,
      tick: 2,
      events: [
        { type: 'spawn', tick: 0, entityId: 1, kind: 'ship' },
        { type: 'spawn', tick: 0, entityId: 2, kind: 'ship' },
      ],
    })
  })

  test('switches to deltas once the full snapshot is acked', () => {
    const { server, transportOf } = startMatch(['a'])
    stepTimes(server, 2)
    const full = fullSnapshotOf(transportOf('a').messages()[0])

    server.receive('a', encodeAck({ seq: 1, tick: 2, ackTick: 2, flags: 0 }), 0)
    expect(server.getSession('a')?.state).toBe('connected')

    stepTimes(server, 2)
    const messages = transportOf('a').messages()
    expect(messages).toHaveLength(3)
    const delta = messages[2]
    if (delta.kind !== MessageKind.DeltaSnapshot) throw new Error('expected a delta')
    expect(delta.delta.baseTick).toBe(2)

    const world = server.getWorld()
    if (!world) throw new Error('no world')
    expect(applyDelta(full, delta.delta)).toEqual(captureSnapshot(world))
  })

  test('REQUEST_FULL gets a full snapshot next time', () => {
    const { server, transportOf } = startMatch(['a'])
    stepTimes(server, 2)
    server.receive('a', encodeAck({ seq: 1, tick: 2, ackTick: 2, flags: 0 }), 0)
    server.receive('a', encodeAck({ seq: 2, tick: 3, ackTick: 0, flags: ACK_REQUEST_FULL }), 0)

    stepTimes(server, 2)
    expect(transportOf('a').messages()[2].kind).toBe(MessageKind.FullSnapshot)
  })

  test('applies an input on the tick it drives', () => {
    const { server } = startMatch(['a', 'b'])
    const thrust = encodeInputMessage({ seq: 1, tick: 1, inputs: [{ buttons: 0, thrust: 1, turn: 0 }] })
    server.receive('a', thrust, 0)
    server.step()

    const world = server.getWorld()
    expect(world?.ships.get(1)?.thrust).toBe(127)
    expect(world?.ships.get(2)?.thrust).toBe(0)
  })

  test('disconnects a client after too many malformed messages', () => {
    const { server, transportOf } = startMatch(['a', 'b'])
    const garbage = new Uint8Array([1, 2, 3])

    server.receive('a', garbage, 0)
    expect(server.getSession('a')?.violations).toBe(1)
    expect(transportOf('a').disconnects).toEqual([])

    server.receive('a', garbage, 0)
    expect(transportOf('a').disconnects).toEqual(['protocol violation'])
    expect(server.getSession('a')).toBeUndefined()
    expect(server.clientCount).toBe(1)
    expect(server.getWorld()?.ships.has(1)).toBe(false)
  })

  test('a late joiner gets a ship and a full snapshot', () => {
    const { server, transportOf } = startMatch(['a'])
    const late = new FakeTransport()
    server.addClient('c', late, 0)
    expect(server.getSession('c')?.shipId).toBe(2)
    expect(server.getSession('c')?.state).toBe('synchronizing')

    stepTimes(server, 2)
    const [snapshot, events] = late.messages()
    expect(fullSnapshotOf(snapshot).players.map((player) => player.playerId)).toEqual(['a', 'c'])
    expect(events).toEqual(transportOf('a').messages()[1])
    expect(events).toEqual({
      kind: MessageKind.Event,
      seq: 2,
      tick: 2,
      events: [
        { type: 'spawn', tick: 0, entityId: 1, kind: 'ship' },
        { type: 'spawn', tick: 0, entityId: 2, kind: 'ship' },
      ],
    })
  })

  test('a suspended client hears nothing until it reconnects', () => {
    const { server, transportOf } = startMatch(['a', 'b'])
    server.suspendClient('a')
    stepTimes(server, 2)
    expect(transportOf('a').sent).toHaveLength(0)
    expect(transportOf('b').sent).toHaveLength(2)

    const fresh = new FakeTransport()
    server.addClient('a', fresh, 0)
    expect(server.getSession('a')?.shipId).toBe(1)
    stepTimes(server, 2)
    expect(fresh.messages()[0].kind).toBe(MessageKind.FullSnapshot)
  })

  test('sends each client only the events of entities it sees', () => {
    // Ships spawn 240px apart
    const { server, transportOf } = startMatch(['a', 'b'], { ...OPTIONS, interestRadius: 100 })
    stepTimes(server, 2)

    const [, eventsA] = transportOf('a').messages()
    const [, eventsB] = transportOf('b').messages()
    expect(eventsA).toEqual({
      kind: MessageKind.Event,
      seq: 2,
      tick: 2,
      events: [{ type: 'spawn', tick: 0, entityId: 1, kind: 'ship' }],
    })
    expect(eventsB).toEqual({
      kind: MessageKind.Event,
      seq: 2,
      tick: 2,
      events: [{ type: 'spawn', tick: 0, entityId: 2, kind: 'ship' }],
    })
  })

  test('a filtered client still hears the despawn of an entity it saw', () => {
    const { server, transportOf } = startMatch(['a', 'b'], { ...OPTIONS, interestRadius: 300 })
    stepTimes(server, 2)
    server.removeClient('b')
    stepTimes(server, 2)

    const messages = transportOf('a').messages()
    expect(fullSnapshotOf(messages[2]).entities.map((entity) => entity.id)).toEqual([1])
    expect(messages[3]).toEqual({
      kind: MessageKind.Event,
      seq: 4,
      tick: 4,
      events: [{ type: 'despawn', tick: 2, entityId: 2, kind: 'ship', reason: 'removed' }],
    })
  })

  test('reports the match over once every ship is gone', () => {
    const { server } = startMatch(['a'])
    const world = server.getWorld()
    const ship = world?.ships.get(1)
    if (!world || !ship) throw new Error('no ship')
    despawnEntity(world, ship, 'destroyed')

    expect(server.step()?.matchOver).toBe(true)
    expect(server.terminate()).toEqual([{ playerId: 'a', slot: 0, score: 0, survived: false }])
    expect(server.isRunning).toBe(false)
    expect(server.clientCount).toBe(0)
    expect(server.step()).toBeNull()
  })
})
