import { Schema, type, MapSchema } from '@colyseus/schema'
import type { MatchPhase } from '@rubble/shared'

export class PlayerMeta extends Schema {
  @type('string') name: string = ''
  /** -1 until the player has a ship in a running match */
  @type('int8') slot: number = -1
  @type('int32') score: number = 0
  @type('boolean') alive: boolean = false
}

export class GameRoomState extends Schema {
  @type('string') phase: MatchPhase = 'lobby'
  @type({ map: PlayerMeta }) players = new MapSchema<PlayerMeta>()
  @type('uint32') serverTick: number = 0
}
