/**
 * Gameplay Events
 *
 * Discrete things that happened during a tick, in the order they happened.
 * Presentation collaborators (audio, particles) consume them; the
 * simulation never reads them back.
 */

import type { EntityId, EntityKind } from './entities'

export type DespawnReason =
  /** Health reached zero */
  | 'destroyed'
  /** Large asteroid broke into children */
  | 'split'
  /** Projectile hit something */
  | 'impact'
  /** Time-to-live ran out */
  | 'expired'
  /** Used up its wrap allowance */
  | 'wrapped'
  /** Owning player left the match */
  | 'removed'

export const DESPAWN_REASONS: readonly DespawnReason[] = [
  'destroyed',
  'split',
  'impact',
  'expired',
  'wrapped',
  'removed',
]

export type GameEvent =
  | { type: 'spawn'; tick: number; entityId: EntityId; kind: EntityKind }
  | { type: 'despawn'; tick: number; entityId: EntityId; kind: EntityKind; reason: DespawnReason }
  | {
      type: 'damage'
      tick: number
      entityId: EntityId
      sourceId: EntityId
      amount: number
      remaining: number
    }
  | { type: 'score'; tick: number; slot: number; points: number; total: number }

export type GameEventType = GameEvent['type']
