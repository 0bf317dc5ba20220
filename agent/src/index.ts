export * from './lib/errors.js';
export { logger, silentLogger, type Logger } from './lib/logger.js';
export * from './rfb/constants.js';
export { RfbCodec, type CodecParameters } from './rfb/codec.js';
export { CLIENT_PIXEL_FORMAT, PixelDecoder, type PixelFormat } from './rfb/pixelFormat.js';
export { decoderFor, SUPPORTED_ENCODINGS } from './rfb/encodings.js';
export type * from './rfb/types.js';
export { Framebuffer, type FrameSnapshot } from './frame/framebuffer.js';
export { FramePipeline, type FrameListener } from './frame/framePipeline.js';
export { InputForwarder } from './input/inputForwarder.js';
export type { Transport, TransportFactory, TransportHandlers, TransportOpenOptions } from './transport/transport.js';
export { openTcpTransport } from './transport/tcpTransport.js';
export { DEFAULT_BACKOFF, backoffDelay, type BackoffPolicy } from './session/backoff.js';
export { noneSecurity, type SecurityContext, type SecurityHandler } from './session/security.js';
export { vncAuthSecurity, vncChallengeResponse, vncKey } from './session/vncAuth.js';
export {
  RemoteDesktopSession,
  type SessionOptions,
  type SessionState,
} from './session/remoteDesktopSession.js';
export type { ControlFeed, ControlMessage } from './control/controlFeed.js';
export { ControlClient, type ControlClientOptions } from './control/controlClient.js';
export { MembershipMirror, type ApplyResult } from './membership/membershipMirror.js';
export {
  SessionCoordinator,
  type ActiveSession,
  type CoordinatorIssue,
  type SessionConnector,
} from './coordinator/sessionCoordinator.js';
