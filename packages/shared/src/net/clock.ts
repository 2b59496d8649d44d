/** Client → Server */
export interface PingMessage {
  clientTime: number // performance.now() on client
}

/** Server → Client */
export interface PongMessage {
  clientTime: number // Echoed from PingMessage
  serverTime: number // performance.now() on server
  serverTick: number
}

function isFiniteNumber(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v)
}

export function isPingMessage(data: unknown): data is PingMessage {
  return typeof data === 'object' && data !== null && isFiniteNumber(Reflect.get(data, 'clientTime'))
}

export function isPongMessage(data: unknown): data is PongMessage {
  return (
    typeof data === 'object' &&
    data !== null &&
    isFiniteNumber(Reflect.get(data, 'clientTime')) &&
    isFiniteNumber(Reflect.get(data, 'serverTime')) &&
    isFiniteNumber(Reflect.get(data, 'serverTick'))
  )
}
