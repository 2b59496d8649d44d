import { describe, expect, test } from 'vitest'
import {
  createSpatialHash,
  rebuildSpatialHash,
  forEachInRadius,
  queryCandidates,
  type SpatialHash,
} from './SpatialHash'

/** Helper: create a hash, index entries at the given positions (ids from 1), rebuild */
function setupHash(
  positions: Array<{ x: number; y: number }>,
  worldWidth = 320,
  worldHeight = 320,
  cellSize = 32
): SpatialHash {
  const hash = createSpatialHash(worldWidth, worldHeight, cellSize)
  rebuildSpatialHash(
    hash,
    positions.map((pos, i) => ({ id: i + 1, x: pos.x, y: pos.y }))
  )
  return hash
}

/** Collect all ids returned by forEachInRadius */
function queryRadius(hash: SpatialHash, x: number, y: number, radius: number): number[] {
  const results: number[] = []
  forEachInRadius(hash, x, y, radius, (id) => results.push(id))
  return results
}

describe('SpatialHash', () => {
  describe('createSpatialHash', () => {
    test('creates with correct grid dimensions', () => {
      const hash = createSpatialHash(320, 320, 32)
      expect(hash.width).toBe(10)
      expect(hash.height).toBe(10)
      expect(hash.numCells).toBe(100)
      expect(hash.cellSize).toBe(32)
    })

    test('rounds up for non-divisible world sizes', () => {
      const hash = createSpatialHash(100, 100, 32)
      expect(hash.width).toBe(4)
      expect(hash.height).toBe(4)
    })
  })

  describe('rebuildSpatialHash + forEachInRadius', () => {
    test('finds nearby entities', () => {
      const hash = setupHash([
        { x: 50, y: 50 },
        { x: 55, y: 55 },
      ])
      expect(queryRadius(hash, 50, 50, 20).sort()).toEqual([1, 2])
    })

    test('excludes distant entity', () => {
      const hash = setupHash([
        { x: 50, y: 50 },
        { x: 250, y: 250 },
      ])
      expect(queryRadius(hash, 50, 50, 20)).toEqual([1])
    })

    test('empty hash returns no results', () => {
      const hash = setupHash([])
      expect(queryRadius(hash, 160, 160, 500)).toEqual([])
    })

    test('grows past its initial capacity', () => {
      const positions = Array.from({ length: 600 }, (_, i) => ({ x: (i * 7) % 320, y: (i * 13) % 320 }))
      const hash = setupHash(positions)
      expect(hash.entityCount).toBe(600)
      expect(queryRadius(hash, 160, 160, 1000)).toHaveLength(600)
    })

    test('a radius covering the whole world visits each entity once', () => {
      const hash = setupHash([
        { x: 5, y: 5 },
        { x: 300, y: 10 },
        { x: 160, y: 315 },
      ])
      expect(queryRadius(hash, 160, 160, 400).sort()).toEqual([1, 2, 3])
    })
  })

  describe('wraparound', () => {
    test('query near the left edge sees entities near the right edge', () => {
      const hash = setupHash([
        { x: 315, y: 100 },
        { x: 150, y: 100 },
      ])
      expect(queryRadius(hash, 4, 100, 12)).toEqual([1])
    })

    test('query near the top edge sees entities near the bottom edge', () => {
      const hash = setupHash([{ x: 100, y: 318 }])
      expect(queryRadius(hash, 100, 2, 8)).toEqual([1])
    })

    test('query near a corner sees the diagonally opposite corner', () => {
      const hash = setupHash([{ x: 318, y: 318 }])
      expect(queryRadius(hash, 1, 1, 6)).toEqual([1])
    })

    test('positions outside the world are indexed in their wrapped cell', () => {
      const hash = setupHash([{ x: -10, y: 330 }])
      expect(queryRadius(hash, 310, 10, 4)).toEqual([1])
    })
  })

  describe('queryCandidates', () => {
    test('returns ids sorted ascending regardless of cell layout', () => {
      // id 1 lands in a later cell than id 3, id 2 in the earliest
      const hash = setupHash([
        { x: 70, y: 70 },
        { x: 40, y: 40 },
        { x: 66, y: 40 },
      ])
      expect(queryRadius(hash, 55, 55, 20)).toEqual([2, 3, 1])
      expect(queryCandidates(hash, 55, 55, 20)).toEqual([1, 2, 3])
    })

    test('excludes the querying entity', () => {
      const hash = setupHash([
        { x: 50, y: 50 },
        { x: 52, y: 50 },
      ])
      expect(queryCandidates(hash, 50, 50, 10, 1)).toEqual([2])
    })

    test('same entries give the same candidates after rebuild', () => {
      const positions = [
        { x: 10, y: 10 },
        { x: 20, y: 12 },
        { x: 310, y: 5 },
      ]
      const a = setupHash(positions)
      const b = setupHash(positions)
      expect(queryCandidates(a, 5, 5, 30)).toEqual(queryCandidates(b, 5, 5, 30))
      expect(queryCandidates(a, 5, 5, 30)).toEqual([1, 2, 3])
    })
  })
})
