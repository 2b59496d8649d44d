import { describe, expect, test } from 'vitest'
import { ACK_REQUEST_FULL, Button, type InputState, type WorldSnapshot } from '@rubble/shared'
import { ClientSession, type SessionOptions } from './ClientSession'

const OPTIONS: SessionOptions = {
  maxInputQueue: 4,
  maxProtocolViolations: 3,
  baselineHistory: 3,
  inputRateLimitPerSecond: 10,
  inputRateBurst: 2,
}

const FIRE: InputState = { buttons: Button.FIRE, thrust: 0, turn: 0 }
const IDLE: InputState = { buttons: 0, thrust: 0, turn: 0 }

function snapshotAt(tick: number): WorldSnapshot {
  return { tick, meta: { nextEntityId: 1, rngState: 0, spawnTimer: 0 }, players: [], entities: [] }
}

function syncingSession(options: SessionOptions = OPTIONS): ClientSession {
  const session = new ClientSession('a', options, 0)
  session.beginSync()
  return session
}

function connectedSession(): ClientSession {
  const session = syncingSession()
  session.recordSent(snapshotAt(4), true)
  session.receiveAck({ seq: 1, tick: 6, ackTick: 4, flags: 0 })
  return session
}

describe('ClientSession', () => {
  describe('inputs', () => {
    test('ignores inputs until the session is synchronizing', () => {
      const session = new ClientSession('a', OPTIONS, 0)
      expect(session.receiveInput({ seq: 1, tick: 5, inputs: [FIRE] }, 1, 0)).toBe('ignored')
      expect(session.queuedInputs).toBe(0)
    })

    test('queues each entry under the tick it drives', () => {
      const session = syncingSession()
      expect(session.receiveInput({ seq: 1, tick: 6, inputs: [FIRE, IDLE] }, 5, 0)).toBe('accepted')

      expect(session.takeInput(5)).toEqual(IDLE)
      expect(session.takeInput(6)).toEqual(FIRE)
      expect(session.queuedInputs).toBe(0)
    })

    test('normalizes analog values', () => {
      const session = syncingSession()
      session.receiveInput({ seq: 1, tick: 2, inputs: [{ buttons: 0xff, thrust: 2, turn: -0.5 }] }, 1, 0)
      expect(session.takeInput(2)).toEqual({ buttons: Button.FIRE, thrust: 1, turn: -63 / 127 })
    })

    test('discards repeated sequence numbers', () => {
      const session = syncingSession()
      session.receiveInput({ seq: 3, tick: 2, inputs: [FIRE] }, 1, 0)
      expect(session.receiveInput({ seq: 3, tick: 3, inputs: [FIRE] }, 1, 0)).toBe('duplicate')
      expect(session.receiveInput({ seq: 2, tick: 4, inputs: [FIRE] }, 1, 0)).toBe('duplicate')
      expect(session.queuedInputs).toBe(1)
    })

    test('redundant copies never replace the first arrival', () => {
      const session = syncingSession()
      session.receiveInput({ seq: 1, tick: 2, inputs: [FIRE] }, 1, 0)
      session.receiveInput({ seq: 2, tick: 3, inputs: [IDLE, IDLE] }, 1, 0)
      expect(session.takeInput(2)).toEqual(FIRE)
      expect(session.takeInput(3)).toEqual(IDLE)
    })

    test('rate-limits with a token bucket', () => {
      const session = syncingSession()
      session.receiveInput({ seq: 1, tick: 2, inputs: [FIRE] }, 1, 0)
      session.receiveInput({ seq: 2, tick: 3, inputs: [FIRE] }, 1, 0)
      expect(session.receiveInput({ seq: 3, tick: 4, inputs: [FIRE] }, 1, 0)).toBe('rate-limited')
      expect(session.rateLimitedDrops).toBe(1)

      // 100ms at 10/s refills one token
      expect(session.receiveInput({ seq: 4, tick: 5, inputs: [FIRE] }, 1, 100)).toBe('accepted')
    })

    test('a rate-limited message does not consume its sequence number', () => {
      const session = syncingSession()
      session.receiveInput({ seq: 1, tick: 2, inputs: [FIRE] }, 1, 0)
      session.receiveInput({ seq: 2, tick: 3, inputs: [FIRE] }, 1, 0)
      session.receiveInput({ seq: 3, tick: 4, inputs: [FIRE] }, 1, 0)
      expect(session.receiveInput({ seq: 3, tick: 4, inputs: [FIRE] }, 1, 100)).toBe('accepted')
    })

    test('drops inputs for ticks already advanced', () => {
      const session = syncingSession()
      expect(session.receiveInput({ seq: 1, tick: 3, inputs: [FIRE, FIRE, FIRE] }, 5, 0)).toBe('stale')
      expect(session.staleInputDrops).toBe(1)
      expect(session.queuedInputs).toBe(0)
    })

    test('keeps the newest ticks when the queue overflows', () => {
      const session = syncingSession()
      session.receiveInput({ seq: 1, tick: 10, inputs: [FIRE, FIRE, FIRE] }, 1, 0)
      session.receiveInput({ seq: 2, tick: 13, inputs: [IDLE, IDLE, IDLE] }, 1, 0)

      expect(session.queuedInputs).toBe(4)
      expect(session.overflowDrops).toBe(2)
      expect(session.takeInput(9)).toBeUndefined()
      expect(session.takeInput(10)).toEqual(FIRE)
    })

    test('taking a tick discards everything older', () => {
      const session = syncingSession()
      session.receiveInput({ seq: 1, tick: 13, inputs: [IDLE, IDLE, FIRE, FIRE] }, 1, 0)
      expect(session.takeInput(12)).toEqual(IDLE)
      expect(session.queuedInputs).toBe(1)
      expect(session.takeInput(11)).toBeUndefined()
    })
  })

  describe('acks and baselines', () => {
    test('stays synchronizing until the full snapshot is acked', () => {
      const session = syncingSession()
      session.recordSent(snapshotAt(4), true)
      expect(session.syncFullTick).toBe(4)
      expect(session.deltaBase()).toBeNull()

      session.receiveAck({ seq: 1, tick: 6, ackTick: 4, flags: 0 })
      expect(session.state).toBe('connected')
      expect(session.lastAckedTick).toBe(4)
      expect(session.deltaBase()?.tick).toBe(4)
    })

    test('connects on a late ack after newer full snapshots went out', () => {
      const session = new ClientSession('a', { ...OPTIONS, baselineHistory: 32 }, 0)
      session.beginSync()

      // Interval 4, each ack arriving 5 ticks after its snapshot was sent
      session.recordSent(snapshotAt(4), session.deltaBase() === null)
      session.recordSent(snapshotAt(8), session.deltaBase() === null)
      session.receiveAck({ seq: 1, tick: 9, ackTick: 4, flags: 0 })

      expect(session.state).toBe('connected')
      expect(session.lastAckedTick).toBe(4)
      expect(session.deltaBase()?.tick).toBe(4)
    })

    test('connects and stays connected under a steady ack delay longer than the interval', () => {
      const session = new ClientSession('a', { ...OPTIONS, baselineHistory: 32 }, 0)
      session.beginSync()
      const sent: number[] = []
      let ackSeq = 0

      for (let tick = 1; tick <= 400; tick++) {
        const due = sent.find((sentTick) => sentTick + 5 === tick)
        if (due !== undefined) {
          ackSeq++
          session.receiveAck({ seq: ackSeq, tick, ackTick: due, flags: 0 })
        }
        if (tick % 4 === 0) {
          session.recordSent(snapshotAt(tick), session.deltaBase() === null)
          sent.push(tick)
        }
      }

      expect(session.state).toBe('connected')
      // The snapshot of tick 396 is acked at 401
      expect(session.lastAckedTick).toBe(392)
    })

    test('a full snapshot from before a resync does not count', () => {
      const session = new ClientSession('a', { ...OPTIONS, baselineHistory: 32 }, 0)
      session.beginSync()
      session.recordSent(snapshotAt(4), true)
      session.beginSync()
      session.recordSent(snapshotAt(8), true)

      session.receiveAck({ seq: 1, tick: 9, ackTick: 4, flags: 0 })
      expect(session.state).toBe('synchronizing')
      expect(session.syncFullTick).toBe(8)
    })

    test('ignores acks for ticks that were never sent', () => {
      const session = syncingSession()
      session.recordSent(snapshotAt(4), true)
      session.receiveAck({ seq: 1, tick: 6, ackTick: 5, flags: 0 })
      expect(session.state).toBe('synchronizing')
      expect(session.lastAckedTick).toBe(0)
    })

    test('ignores acks with an old sequence number', () => {
      const session = connectedSession()
      session.recordSent(snapshotAt(8), false)
      session.receiveAck({ seq: 1, tick: 9, ackTick: 8, flags: 0 })
      expect(session.lastAckedTick).toBe(4)
    })

    test('an ack prunes older baselines', () => {
      const session = connectedSession()
      session.recordSent(snapshotAt(8), false)
      session.recordSent(snapshotAt(12), false)
      session.receiveAck({ seq: 2, tick: 13, ackTick: 8, flags: 0 })
      expect(session.baselines.getOldestTick()).toBe(8)
      expect(session.baselines.size).toBe(2)
    })

    test('REQUEST_FULL drops back to synchronizing', () => {
      const session = connectedSession()
      session.receiveAck({ seq: 2, tick: 8, ackTick: 0, flags: ACK_REQUEST_FULL })
      expect(session.state).toBe('synchronizing')
      expect(session.baselines.size).toBe(0)
      expect(session.deltaBase()).toBeNull()
    })

    test('resynchronizes once the acked baseline ages out', () => {
      const session = connectedSession()
      session.recordSent(snapshotAt(8), false)
      session.recordSent(snapshotAt(12), false)
      session.recordSent(snapshotAt(16), false)

      expect(session.deltaBase()).toBeNull()
      expect(session.state).toBe('synchronizing')
    })
  })

  test('reports when the violation allowance is used up', () => {
    const session = syncingSession()
    expect(session.recordViolation()).toBe(false)
    expect(session.recordViolation()).toBe(false)
    expect(session.recordViolation()).toBe(true)
  })

  test('disconnect is terminal and releases buffers', () => {
    const session = connectedSession()
    session.receiveInput({ seq: 1, tick: 20, inputs: [FIRE] }, 1, 0)
    session.disconnect()

    expect(session.state).toBe('disconnected')
    expect(session.queuedInputs).toBe(0)
    expect(session.baselines.size).toBe(0)

    session.beginSync()
    expect(session.state).toBe('disconnected')
  })
})
