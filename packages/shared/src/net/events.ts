/**
 * Event Message Codec
 *
 * Server → client batch of gameplay events accumulated since the previous
 * event message. Clients use them for presentation (audio, particles, kill
 * feed); the receiver never feeds them back into the simulation.
 */

import { DESPAWN_REASONS, type DespawnReason, type GameEvent } from '../sim/events'
import { ENTITY_KIND_CODE, entityKindFromCode, type EntityKind } from '../sim/entities'
import { BinaryReader, BinaryWriter, MessageKind, ProtocolError, writeEnvelope } from './wire'

const EVENT_CODE = { spawn: 1, despawn: 2, damage: 3, score: 4 } as const

function readKind(reader: BinaryReader): EntityKind {
  const code = reader.u8('entity kind')
  const kind = entityKindFromCode(code)
  if (kind === undefined) throw new ProtocolError(`Unknown entity kind code: ${code}`)
  return kind
}

function readReason(reader: BinaryReader): DespawnReason {
  const code = reader.u8('despawn reason')
  if (code >= DESPAWN_REASONS.length) throw new ProtocolError(`Unknown despawn reason code: ${code}`)
  return DESPAWN_REASONS[code]
}

export function encodeEventMessage(seq: number, tick: number, events: readonly GameEvent[]): Uint8Array {
  const writer = new BinaryWriter()
  writeEnvelope(writer, MessageKind.Event, seq, tick)
  writer.u16(events.length)
  for (const event of events) {
    writer.u8(EVENT_CODE[event.type]).u32(event.tick)
    switch (event.type) {
      case 'spawn':
        writer.u32(event.entityId).u8(ENTITY_KIND_CODE[event.kind])
        break
      case 'despawn':
        writer.u32(event.entityId).u8(ENTITY_KIND_CODE[event.kind]).u8(DESPAWN_REASONS.indexOf(event.reason))
        break
      case 'damage':
        writer.u32(event.entityId).u32(event.sourceId).i32(event.amount).i32(event.remaining)
        break
      case 'score':
        writer.u8(event.slot).i32(event.points).i32(event.total)
        break
    }
  }
  return writer.finish()
}

/** Event payload (envelope already read) */
export function readEvents(reader: BinaryReader): GameEvent[] {
  const count = reader.u16('event count')
  const events: GameEvent[] = []
  for (let i = 0; i < count; i++) {
    const code = reader.u8('event type')
    const tick = reader.u32('event tick')
    switch (code) {
      case EVENT_CODE.spawn: {
        const entityId = reader.u32()
        events.push({ type: 'spawn', tick, entityId, kind: readKind(reader) })
        break
      }
      case EVENT_CODE.despawn: {
        const entityId = reader.u32()
        const kind = readKind(reader)
        events.push({ type: 'despawn', tick, entityId, kind, reason: readReason(reader) })
        break
      }
      case EVENT_CODE.damage:
        events.push({
          type: 'damage',
          tick,
          entityId: reader.u32(),
          sourceId: reader.u32(),
          amount: reader.i32(),
          remaining: reader.i32(),
        })
        break
      case EVENT_CODE.score:
        events.push({ type: 'score', tick, slot: reader.u8(), points: reader.i32(), total: reader.i32() })
        break
      default:
        throw new ProtocolError(`Unknown event type code: ${code}`)
    }
  }
  return events
}
