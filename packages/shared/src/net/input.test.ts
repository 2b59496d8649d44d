import { describe, expect, it } from 'vitest'
import {
  AXIS_STEPS,
  Button,
  INPUT_BYTES,
  axisToLevel,
  clearButton,
  createInputState,
  deserializeInput,
  hasButton,
  inputsEqual,
  normalizeInput,
  readInput,
  serializeInput,
  setButton,
} from './input'

describe('input', () => {
  it('starts neutral', () => {
    expect(createInputState()).toEqual({ buttons: 0, thrust: 0, turn: 0 })
  })

  it('sets and clears buttons', () => {
    const buttons = setButton(0, Button.FIRE)
    expect(hasButton({ buttons, thrust: 0, turn: 0 }, Button.FIRE)).toBe(true)
    expect(clearButton(buttons, Button.FIRE)).toBe(0)
  })

  describe('axisToLevel', () => {
    it('rounds to the nearest step', () => {
      expect(axisToLevel(0.5, 0, 1)).toBe(64)
      expect(axisToLevel(-0.3, -1, 1)).toBe(-38)
    })

    it('clamps to the axis range', () => {
      expect(axisToLevel(2, 0, 1)).toBe(AXIS_STEPS)
      expect(axisToLevel(-1, 0, 1)).toBe(0)
      expect(axisToLevel(-5, -1, 1)).toBe(-AXIS_STEPS)
    })

    it('maps non-finite values and negative zero to 0', () => {
      expect(axisToLevel(Number.NaN, -1, 1)).toBe(0)
      expect(Object.is(axisToLevel(-0.001, -1, 1), 0)).toBe(true)
    })
  })

  it('normalizes to quantized values and known buttons', () => {
    const input = normalizeInput({ buttons: 0xff, thrust: 1.5, turn: -0.3 })
    expect(input).toEqual({ buttons: Button.FIRE, thrust: 1, turn: -38 / 127 })
  })

  it('treats inputs that quantize alike as equal', () => {
    const a = normalizeInput({ buttons: 0, thrust: 0.5, turn: 0 })
    const b = normalizeInput({ buttons: 0, thrust: 0.501, turn: 0 })
    expect(inputsEqual(a, b)).toBe(true)
  })

  describe('serialization', () => {
    it('packs into three bytes', () => {
      const bytes = serializeInput({ buttons: Button.FIRE, thrust: 1, turn: -1 })
      expect(bytes.byteLength).toBe(INPUT_BYTES)
      expect([...bytes]).toEqual([1, 127, 0x81])
    })

    it('round-trips a normalized input exactly', () => {
      const input = normalizeInput({ buttons: Button.FIRE, thrust: 0.25, turn: 0.7 })
      expect(deserializeInput(serializeInput(input))).toEqual(input)
    })

    it('clamps out-of-range bytes when reading', () => {
      const view = new DataView(new Uint8Array([0xfe, 200, 0x80]).buffer)
      expect(readInput(view, 0)).toEqual({ buttons: Button.FIRE, thrust: 1, turn: -1 })
    })

    it('rejects short buffers', () => {
      expect(() => deserializeInput(new Uint8Array(2))).toThrow('Input too short: expected 3 bytes, got 2')
    })
  })
})
