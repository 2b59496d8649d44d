/**
 * InputChannel - logical actions in, per-tick inputs out
 *
 * The input layer sets the current action state through the setters; the
 * fixed update captures it once per predicted tick. Every captured input is
 * kept by tick so outgoing messages can repeat the previous few and cover
 * single packet losses.
 */

import {
  Button,
  INPUT_REDUNDANCY,
  normalizeInput,
  type InputMessage,
  type InputState,
} from '@rubble/shared'

/** Ticks of sent input kept for redundancy */
const HISTORY_TICKS = 64

export class InputChannel {
  private thrust = 0
  private turn = 0
  private fire = false

  private readonly history = new Map<number, InputState>()
  private seq = 0

  constructor(private readonly redundancy = INPUT_REDUNDANCY) {}

  /** Analog thrust in [0, 1]; a boolean maps to 0 or 1 */
  setThrust(value: number | boolean): void {
    this.thrust = typeof value === 'boolean' ? (value ? 1 : 0) : value
  }

  /** -1 full left, 1 full right */
  setTurn(value: number): void {
    this.turn = value
  }

  setFire(pressed: boolean): void {
    this.fire = pressed
  }

  /** Current action state, quantized the way the wire carries it */
  capture(): InputState {
    return normalizeInput({
      buttons: this.fire ? Button.FIRE : 0,
      thrust: this.thrust,
      turn: this.turn,
    })
  }

  /** Remember the input that drives `tick` */
  record(tick: number, input: InputState): void {
    this.history.set(tick, input)
    if (this.history.size <= HISTORY_TICKS) return
    for (const key of this.history.keys()) {
      if (key <= tick - HISTORY_TICKS) this.history.delete(key)
    }
  }

  inputFor(tick: number): InputState | undefined {
    return this.history.get(tick)
  }

  /**
   * Input message for `tick` with up to `redundancy` earlier inputs attached,
   * newest first. Stops at the first tick with no recorded input.
   *
   * @throws If nothing was recorded for `tick`
   */
  buildMessage(tick: number): InputMessage {
    const first = this.history.get(tick)
    if (!first) throw new Error(`No input recorded for tick ${tick}`)

    const inputs: InputState[] = [first]
    for (let i = 1; i <= this.redundancy; i++) {
      const earlier = this.history.get(tick - i)
      if (!earlier) break
      inputs.push(earlier)
    }
    this.seq++
    return { seq: this.seq, tick, inputs }
  }

  /**
   * Forget recorded inputs (new match or resync). The sequence keeps
   * counting; the server only ever wants it to grow.
   */
  reset(): void {
    this.history.clear()
  }
}
