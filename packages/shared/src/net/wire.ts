/**
 * Binary Wire Primitives
 *
 * Every message between client and server starts with the same envelope:
 *
 *   u8 version | u8 kind | u32 seq | u32 tick | payload
 *
 * All multi-byte values are little-endian. Readers throw ProtocolError on
 * truncated or malformed input instead of the DataView's RangeError, so
 * handlers can tell a bad packet from a bug.
 */

/** Bump whenever any payload layout or entity field list changes */
export const PROTOCOL_VERSION = 1

export const MessageKind = {
  Input: 1,
  FullSnapshot: 2,
  DeltaSnapshot: 3,
  Ack: 4,
  Event: 5,
} as const

export type MessageKind = (typeof MessageKind)[keyof typeof MessageKind]

const MESSAGE_KINDS: readonly number[] = Object.values(MessageKind)

function isMessageKind(value: number): value is MessageKind {
  return MESSAGE_KINDS.includes(value)
}

/** Envelope size in bytes */
export const ENVELOPE_BYTES = 10

export interface Envelope {
  version: number
  kind: MessageKind
  /** Per-sender monotonic sequence number */
  seq: number
  /** Simulation tick the message refers to */
  tick: number
}

/**
 * A message that is malformed, truncated, of the wrong kind, or from an
 * incompatible protocol version.
 */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ProtocolError'
  }
}

export function isProtocolError(error: unknown): error is ProtocolError {
  return error instanceof ProtocolError
}

// ============================================================================
// Writer
// ============================================================================

const INITIAL_BUFFER_SIZE = 1024

const textEncoder = new TextEncoder()
const textDecoder = new TextDecoder('utf-8', { fatal: true })

/**
 * Growable little-endian byte writer. `finish()` returns a copy, so a writer
 * can be reused for the next message.
 */
export class BinaryWriter {
  private buffer: ArrayBuffer
  private view: DataView
  private offset = 0

  constructor(initialSize = INITIAL_BUFFER_SIZE) {
    this.buffer = new ArrayBuffer(initialSize)
    this.view = new DataView(this.buffer)
  }

  get length(): number {
    return this.offset
  }

  private ensure(bytes: number): void {
    const needed = this.offset + bytes
    if (needed <= this.buffer.byteLength) return
    const grown = new ArrayBuffer(Math.max(needed, this.buffer.byteLength * 2))
    new Uint8Array(grown).set(new Uint8Array(this.buffer, 0, this.offset))
    this.buffer = grown
    this.view = new DataView(grown)
  }

  u8(value: number): this {
    this.ensure(1)
    this.view.setUint8(this.offset, value)
    this.offset += 1
    return this
  }

  i8(value: number): this {
    this.ensure(1)
    this.view.setInt8(this.offset, value)
    this.offset += 1
    return this
  }

  u16(value: number): this {
    this.ensure(2)
    this.view.setUint16(this.offset, value, true)
    this.offset += 2
    return this
  }

  u32(value: number): this {
    this.ensure(4)
    this.view.setUint32(this.offset, value, true)
    this.offset += 4
    return this
  }

  i32(value: number): this {
    this.ensure(4)
    this.view.setInt32(this.offset, value, true)
    this.offset += 4
    return this
  }

  /** UTF-8 string with a u8 byte-length prefix */
  string(value: string): this {
    const bytes = textEncoder.encode(value)
    if (bytes.byteLength > 0xff) {
      throw new RangeError(`String too long for wire: ${bytes.byteLength} bytes`)
    }
    this.u8(bytes.byteLength)
    this.ensure(bytes.byteLength)
    new Uint8Array(this.buffer, this.offset, bytes.byteLength).set(bytes)
    this.offset += bytes.byteLength
    return this
  }

  /** Give direct access for codecs that write through a DataView */
  writeWith(bytes: number, write: (view: DataView, offset: number) => void): this {
    this.ensure(bytes)
    write(this.view, this.offset)
    this.offset += bytes
    return this
  }

  finish(): Uint8Array {
    return new Uint8Array(this.buffer.slice(0, this.offset))
  }
}

// ============================================================================
// Reader
// ============================================================================

export class BinaryReader {
  private readonly view: DataView
  private offset = 0

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  get remaining(): number {
    return this.bytes.byteLength - this.offset
  }

  private need(bytes: number, what: string): void {
    if (this.remaining < bytes) {
      throw new ProtocolError(`Truncated message: needed ${bytes} bytes for ${what} at offset ${this.offset}`)
    }
  }

  u8(what = 'u8'): number {
    this.need(1, what)
    const value = this.view.getUint8(this.offset)
    this.offset += 1
    return value
  }

  i8(what = 'i8'): number {
    this.need(1, what)
    const value = this.view.getInt8(this.offset)
    this.offset += 1
    return value
  }

  u16(what = 'u16'): number {
    this.need(2, what)
    const value = this.view.getUint16(this.offset, true)
    this.offset += 2
    return value
  }

  u32(what = 'u32'): number {
    this.need(4, what)
    const value = this.view.getUint32(this.offset, true)
    this.offset += 4
    return value
  }

  i32(what = 'i32'): number {
    this.need(4, what)
    const value = this.view.getInt32(this.offset, true)
    this.offset += 4
    return value
  }

  string(what = 'string'): string {
    const length = this.u8(what)
    this.need(length, what)
    const slice = this.bytes.subarray(this.offset, this.offset + length)
    this.offset += length
    try {
      return textDecoder.decode(slice)
    } catch (error) {
      throw new ProtocolError(`Invalid UTF-8 in ${what}: ${String(error)}`)
    }
  }

  readWith<T>(bytes: number, what: string, read: (view: DataView, offset: number) => T): T {
    this.need(bytes, what)
    const value = read(this.view, this.offset)
    this.offset += bytes
    return value
  }

  /** Payloads must be consumed exactly */
  expectEnd(): void {
    if (this.remaining !== 0) {
      throw new ProtocolError(`Unexpected ${this.remaining} trailing bytes`)
    }
  }
}

// ============================================================================
// Envelope
// ============================================================================

export function writeEnvelope(writer: BinaryWriter, kind: MessageKind, seq: number, tick: number): void {
  writer.u8(PROTOCOL_VERSION).u8(kind).u32(seq).u32(tick)
}

/**
 * @throws ProtocolError on version mismatch, unknown kind or truncation
 */
export function readEnvelope(reader: BinaryReader): Envelope {
  const version = reader.u8('version')
  if (version !== PROTOCOL_VERSION) {
    throw new ProtocolError(`Protocol version mismatch: expected ${PROTOCOL_VERSION}, got ${version}`)
  }
  const kind = reader.u8('kind')
  if (!isMessageKind(kind)) {
    throw new ProtocolError(`Unknown message kind: ${kind}`)
  }
  const seq = reader.u32('seq')
  const tick = reader.u32('tick')
  return { version, kind, seq, tick }
}
