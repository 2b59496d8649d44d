/**
 * Replication Protocol Messages
 *
 * Client → server: Input (with redundancy) and Ack.
 * Server → client: FullSnapshot, DeltaSnapshot, Event.
 *
 * Control messages that are not per-tick (ping/pong, game config, match
 * lifecycle) travel as JSON room messages; see clock.ts and lobby.ts.
 */

import { INPUT_BYTES, readInput, writeInput, type InputState } from './input'
import { readDeltaSnapshot, readFullSnapshot, type SnapshotDelta, type WorldSnapshot } from './snapshot'
import { readEvents } from './events'
import type { GameEvent } from '../sim/events'
import {
  BinaryReader,
  BinaryWriter,
  MessageKind,
  ProtocolError,
  readEnvelope,
  writeEnvelope,
} from './wire'

/** Earlier inputs re-sent with every input message */
export const INPUT_REDUNDANCY = 3

/** Upper bound on entries in one input message */
export const MAX_INPUTS_PER_MESSAGE = 16

/** Ack flag: the client has no usable baseline and wants a full snapshot */
export const ACK_REQUEST_FULL = 1 << 0

const KNOWN_ACK_FLAGS = ACK_REQUEST_FULL

// ============================================================================
// Messages
// ============================================================================

export interface InputMessage {
  seq: number
  /** Tick of inputs[0] */
  tick: number
  /** inputs[i] drives tick `tick - i` */
  inputs: InputState[]
}

export interface AckMessage {
  seq: number
  /** Client's estimated tick when it sent the ack */
  tick: number
  /** Last snapshot tick applied, 0 if none */
  ackTick: number
  flags: number
}

export type ClientMessage =
  | ({ kind: typeof MessageKind.Input } & InputMessage)
  | ({ kind: typeof MessageKind.Ack } & AckMessage)

export type ServerMessage =
  | { kind: typeof MessageKind.FullSnapshot; seq: number; tick: number; snapshot: WorldSnapshot }
  | { kind: typeof MessageKind.DeltaSnapshot; seq: number; tick: number; delta: SnapshotDelta }
  | { kind: typeof MessageKind.Event; seq: number; tick: number; events: GameEvent[] }

// ============================================================================
// Encoders
// ============================================================================

export function encodeInputMessage(message: InputMessage): Uint8Array {
  const count = message.inputs.length
  if (count === 0 || count > MAX_INPUTS_PER_MESSAGE) {
    throw new RangeError(`Input message must carry 1-${MAX_INPUTS_PER_MESSAGE} inputs, got ${count}`)
  }
  const writer = new BinaryWriter(16 + count * INPUT_BYTES)
  writeEnvelope(writer, MessageKind.Input, message.seq, message.tick)
  writer.u8(count)
  for (const input of message.inputs) {
    writer.writeWith(INPUT_BYTES, (view, offset) => writeInput(view, offset, input))
  }
  return writer.finish()
}

export function encodeAck(message: AckMessage): Uint8Array {
  const writer = new BinaryWriter(16)
  writeEnvelope(writer, MessageKind.Ack, message.seq, message.tick)
  writer.u32(message.ackTick).u8(message.flags & KNOWN_ACK_FLAGS)
  return writer.finish()
}

// ============================================================================
// Decoders
// ============================================================================

function readInputs(reader: BinaryReader, tick: number): InputState[] {
  const count = reader.u8('input count')
  if (count === 0 || count > MAX_INPUTS_PER_MESSAGE) {
    throw new ProtocolError(`Input count out of range: ${count}`)
  }
  if (count - 1 > tick) {
    throw new ProtocolError(`Input message at tick ${tick} cannot carry ${count} inputs`)
  }
  const inputs: InputState[] = []
  for (let i = 0; i < count; i++) {
    inputs.push(reader.readWith(INPUT_BYTES, 'input', readInput))
  }
  return inputs
}

/**
 * Decode a message a client sent.
 *
 * @throws ProtocolError if it is malformed or a server-only kind
 */
export function decodeClientMessage(bytes: Uint8Array): ClientMessage {
  const reader = new BinaryReader(bytes)
  const { kind, seq, tick } = readEnvelope(reader)
  let message: ClientMessage
  switch (kind) {
    case MessageKind.Input:
      message = { kind, seq, tick, inputs: readInputs(reader, tick) }
      break
    case MessageKind.Ack: {
      const ackTick = reader.u32('ackTick')
      const flags = reader.u8('ack flags')
      if ((flags & ~KNOWN_ACK_FLAGS) !== 0) {
        throw new ProtocolError(`Unknown ack flags: ${flags}`)
      }
      message = { kind, seq, tick, ackTick, flags }
      break
    }
    default:
      throw new ProtocolError(`Unexpected message kind from client: ${kind}`)
  }
  reader.expectEnd()
  return message
}

/**
 * Decode a message the server sent.
 *
 * @throws ProtocolError if it is malformed or a client-only kind
 */
export function decodeServerMessage(bytes: Uint8Array): ServerMessage {
  const reader = new BinaryReader(bytes)
  const { kind, seq, tick } = readEnvelope(reader)
  let message: ServerMessage
  switch (kind) {
    case MessageKind.FullSnapshot:
      message = { kind, seq, tick, snapshot: readFullSnapshot(reader, tick) }
      break
    case MessageKind.DeltaSnapshot:
      message = { kind, seq, tick, delta: readDeltaSnapshot(reader, tick) }
      break
    case MessageKind.Event:
      message = { kind, seq, tick, events: readEvents(reader) }
      break
    default:
      throw new ProtocolError(`Unexpected message kind from server: ${kind}`)
  }
  reader.expectEnd()
  return message
}

/**
 * Expand an input message into per-tick entries, newest first. Entries that
 * would land before tick 1 are dropped.
 */
export function unpackInputs(message: InputMessage): Array<{ tick: number; input: InputState }> {
  const entries: Array<{ tick: number; input: InputState }> = []
  message.inputs.forEach((input, i) => {
    const tick = message.tick - i
    if (tick >= 1) entries.push({ tick, input })
  })
  return entries
}
