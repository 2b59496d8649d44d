/**
 * Input state types for ship controls
 *
 * InputState is captured on the client each tick, sent to the server, and
 * applied deterministically in the shared simulation. Analog axes are
 * quantized to 1/127 steps so every value survives serialization exactly.
 */

/** Button bit flags */
export const Button = {
  FIRE: 1 << 0,
} as const

export type ButtonFlag = (typeof Button)[keyof typeof Button]

const KNOWN_BUTTONS = Button.FIRE

/** Resolution of analog axes */
export const AXIS_STEPS = 127

/**
 * Complete input state for a single tick
 */
export type InputState = {
  /** Bit flags for pressed buttons */
  buttons: number
  /** Forward thrust (0 to 1) */
  thrust: number
  /** Turn rate (-1 = full left, 1 = full right) */
  turn: number
}

/** Create a default (empty) input state */
export function createInputState(): InputState {
  return { buttons: 0, thrust: 0, turn: 0 }
}

/** Check if a button is pressed */
export function hasButton(input: InputState, flag: ButtonFlag): boolean {
  return (input.buttons & flag) !== 0
}

/** Set a button flag */
export function setButton(buttons: number, flag: ButtonFlag): number {
  return buttons | flag
}

/** Clear a button flag */
export function clearButton(buttons: number, flag: ButtonFlag): number {
  return buttons & ~flag
}

/** Analog value to its integer step, clamped to [min, max] steps */
export function axisToLevel(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return 0
  const level = Math.round(value * AXIS_STEPS)
  const clamped = Math.max(min * AXIS_STEPS, Math.min(max * AXIS_STEPS, level))
  return clamped === 0 ? 0 : clamped
}

/** Integer step back to its analog value */
export function levelToAxis(level: number): number {
  return level === 0 ? 0 : level / AXIS_STEPS
}

/**
 * Clamp and quantize an input into canonical form. Two inputs that act the
 * same in the simulation are equal after normalization.
 */
export function normalizeInput(input: InputState): InputState {
  return {
    buttons: input.buttons & KNOWN_BUTTONS,
    thrust: levelToAxis(axisToLevel(input.thrust, 0, 1)),
    turn: levelToAxis(axisToLevel(input.turn, -1, 1)),
  }
}

export function inputsEqual(a: InputState, b: InputState): boolean {
  return a.buttons === b.buttons && a.thrust === b.thrust && a.turn === b.turn
}

// ============================================================================
// Serialization
// ============================================================================

/** Bytes per serialized input: buttons u8, thrust u8, turn i8 */
export const INPUT_BYTES = 3

/** Write an input at offset; returns the offset past it */
export function writeInput(view: DataView, offset: number, input: InputState): number {
  view.setUint8(offset, input.buttons & KNOWN_BUTTONS)
  view.setUint8(offset + 1, axisToLevel(input.thrust, 0, 1))
  view.setInt8(offset + 2, axisToLevel(input.turn, -1, 1))
  return offset + INPUT_BYTES
}

/** Read an input written by writeInput */
export function readInput(view: DataView, offset: number): InputState {
  return {
    buttons: view.getUint8(offset) & KNOWN_BUTTONS,
    thrust: levelToAxis(Math.min(view.getUint8(offset + 1), AXIS_STEPS)),
    turn: levelToAxis(Math.max(-AXIS_STEPS, view.getInt8(offset + 2))),
  }
}

export function serializeInput(input: InputState): Uint8Array {
  const bytes = new Uint8Array(INPUT_BYTES)
  writeInput(new DataView(bytes.buffer), 0, input)
  return bytes
}

/**
 * @throws If fewer than INPUT_BYTES bytes are given
 */
export function deserializeInput(bytes: Uint8Array): InputState {
  if (bytes.byteLength < INPUT_BYTES) {
    throw new Error(`Input too short: expected ${INPUT_BYTES} bytes, got ${bytes.byteLength}`)
  }
  return readInput(new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength), 0)
}
