/**
 * Spatial Hash Grid
 *
 * Counting-sort spatial hash for broad-phase collision queries on a toroidal
 * world. A single flat array of entity IDs sorted by cell index; each cell
 * is a contiguous slice defined by cellStart[cell] and cellCount[cell].
 *
 * Coordinates are fixed-point. Queries wrap across the world edges, so an
 * entity near x = 0 sees candidates near x = width.
 */

export interface SpatialHash {
  /** Cell size (fixed-point) */
  cellSize: number
  /** Grid cells wide */
  width: number
  /** Grid cells tall */
  height: number
  numCells: number
  /** Start offset in entities[] per cell */
  cellStart: Uint32Array
  /** Entity count per cell */
  cellCount: Uint32Array
  /** Entity IDs sorted by cell; grows on demand */
  entities: Uint32Array
  /** Temp: cell index per rebuild-order slot */
  entityCell: Uint32Array
  /** Number of entities in the hash after last rebuild */
  entityCount: number
}

/** Anything the hash can index */
export interface SpatialEntry {
  id: number
  x: number
  y: number
}

const INITIAL_CAPACITY = 256

/**
 * Create a spatial hash grid.
 *
 * @param worldWidth - World width (fixed-point)
 * @param worldHeight - World height (fixed-point)
 * @param cellSize - Cell size (fixed-point); should divide both dimensions
 */
export function createSpatialHash(worldWidth: number, worldHeight: number, cellSize: number): SpatialHash {
  const width = Math.ceil(worldWidth / cellSize)
  const height = Math.ceil(worldHeight / cellSize)
  const numCells = width * height

  return {
    cellSize,
    width,
    height,
    numCells,
    cellStart: new Uint32Array(numCells),
    cellCount: new Uint32Array(numCells),
    entities: new Uint32Array(INITIAL_CAPACITY),
    entityCell: new Uint32Array(INITIAL_CAPACITY),
    entityCount: 0,
  }
}

function cellCoord(v: number, cellSize: number, cells: number): number {
  const c = Math.floor(v / cellSize) % cells
  return c < 0 ? c + cells : c
}

/**
 * Rebuild the spatial hash from scratch using counting sort.
 *
 * Three passes:
 * 1. Compute cell index per entity, count per cell
 * 2. Prefix sum → cellStart
 * 3. Place entities into sorted entities[]
 *
 * Within a cell, entities keep the order they were given in.
 */
export function rebuildSpatialHash(hash: SpatialHash, entries: readonly SpatialEntry[]): void {
  const { cellSize, width, height, numCells, cellStart, cellCount } = hash
  const count = entries.length
  hash.entityCount = count

  if (count > hash.entities.length) {
    let capacity = hash.entities.length
    while (capacity < count) capacity *= 2
    hash.entities = new Uint32Array(capacity)
    hash.entityCell = new Uint32Array(capacity)
  }
  const { entities, entityCell } = hash

  cellCount.fill(0)

  // Pass 1: cell index per entity and count per cell
  for (let i = 0; i < count; i++) {
    const entry = entries[i]
    const cellIdx = cellCoord(entry.y, cellSize, height) * width + cellCoord(entry.x, cellSize, width)
    entityCell[i] = cellIdx
    cellCount[cellIdx]++
  }

  // Pass 2: prefix sum → cellStart
  let offset = 0
  for (let c = 0; c < numCells; c++) {
    cellStart[c] = offset
    offset += cellCount[c]
  }

  // Reset counts for placement pass (reuse as write cursors)
  cellCount.fill(0)

  // Pass 3: place entities
  for (let i = 0; i < count; i++) {
    const cellIdx = entityCell[i]
    entities[cellStart[cellIdx] + cellCount[cellIdx]] = entries[i].id
    cellCount[cellIdx]++
  }
}

/**
 * Cell indices along one axis covered by [center - radius, center + radius],
 * wrapped, each at most once.
 */
function coveredCells(center: number, radius: number, cellSize: number, cells: number): number[] {
  const min = Math.floor((center - radius) / cellSize)
  const max = Math.floor((center + radius) / cellSize)
  const out: number[] = []
  if (max - min + 1 >= cells) {
    for (let c = 0; c < cells; c++) out.push(c)
    return out
  }
  for (let c = min; c <= max; c++) {
    out.push(((c % cells) + cells) % cells)
  }
  return out
}

/**
 * Iterate all entities in cells overlapping the circle at (x, y).
 *
 * Order follows cell layout, not EntityId. Callers do their own narrow-phase
 * distance check in the callback.
 */
export function forEachInRadius(
  hash: SpatialHash,
  x: number,
  y: number,
  radius: number,
  callback: (id: number) => void
): void {
  const { cellSize, width, height, cellStart, cellCount, entities } = hash
  const columns = coveredCells(x, radius, cellSize, width)
  const rows = coveredCells(y, radius, cellSize, height)

  for (const cy of rows) {
    for (const cx of columns) {
      const cellIdx = cy * width + cx
      const start = cellStart[cellIdx]
      const end = start + cellCount[cellIdx]
      for (let i = start; i < end; i++) {
        callback(entities[i])
      }
    }
  }
}

/**
 * Candidate set for a circle: every indexed entity whose cell the circle
 * touches, ascending by id, excluding `excludeId`. No false negatives for
 * entities whose center lies within `radius` of (x, y).
 */
export function queryCandidates(
  hash: SpatialHash,
  x: number,
  y: number,
  radius: number,
  excludeId = 0
): number[] {
  const out: number[] = []
  forEachInRadius(hash, x, y, radius, (id) => {
    if (id !== excludeId) out.push(id)
  })
  out.sort((a, b) => a - b)
  return out
}
