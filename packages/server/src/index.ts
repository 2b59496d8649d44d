import { Server } from '@colyseus/core'
import { WebSocketTransport } from '@colyseus/ws-transport'
import { loadServerConfig } from './config'
import { GameRoom, type GameRoomOptions } from './rooms/GameRoom'

async function main() {
  const config = loadServerConfig()
  const server = new Server({ transport: new WebSocketTransport() })
  server.define('game', GameRoom, { config } satisfies GameRoomOptions)
  await server.listen(config.port)
  console.log(`[Server] Rubble listening on ws://localhost:${config.port}`)
}

main().catch((err) => {
  console.error('[Server] Fatal error:', err)
  process.exit(1)
})
