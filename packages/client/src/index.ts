/**
 * @rubble/client - client core
 */

export { DEFAULT_CLIENT_CONFIG, resolveClientConfig, type ClientConfig } from './config'
export { GameClient, type ClientTransport, type RenderFrame } from './GameClient'
export { GameLoop, type FrameScheduler, type RenderCallback, type UpdateCallback } from './engine'
export { ClockSync } from './net/ClockSync'
export { InputChannel } from './net/InputChannel'
export {
  NetworkClient,
  colyseusConnector,
  normalizeRoomState,
  sessionTokenStore,
  type JoinOptions,
  type NetworkClientOptions,
  type NetworkEventMap,
  type PlayerView,
  type RoomConnection,
  type RoomConnector,
  type RoomStateView,
  type TokenStore,
} from './net/NetworkClient'
export { SnapshotBuffer, type InterpolationState, type TimestampedSnapshot } from './net/SnapshotBuffer'
export { SnapshotReceiver, type ReceiverOptions, type ReceiverState, type Received } from './net/SnapshotReceiver'
export { TickLead, type LeadSteps } from './net/TickLead'
export { CorrectionSmoother } from './prediction/CorrectionSmoother'
export { PredictionBuffer, type PredictedShip } from './prediction/PredictionBuffer'
export {
  DeterminismError,
  PredictionEngine,
  type PredictionOptions,
  type ReconcileResult,
  type ResyncReason,
} from './prediction/PredictionEngine'
export {
  buildRenderView,
  sampleRemoteShips,
  type RemotePose,
  type RenderEntity,
  type RenderViewOptions,
} from './prediction/RenderView'
