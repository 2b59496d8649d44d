/**
 * Engine module exports
 */

export { GameLoop, type FrameScheduler, type RenderCallback, type UpdateCallback } from './GameLoop'
