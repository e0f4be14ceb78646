export { ExponentialBackoff, type ExponentialBackoffOptions } from './backoff.js';
export { ClientSession, type ClientSessionOptions } from './client/clientSession.js';
export { TunnelClient, type TunnelClientOptions, type TunnelClientStatus } from './client/tunnelClient.js';
export { loadClientConfig, loadRelayConfig, type ClientConfig, type Env, type RelayConfig } from './config.js';
export { ConnectionPool, dialLocalService, type ConnectionPoolOptions, type DialFn } from './connectionPool.js';
export { ConnectionTable, type LogicalConnection, type LogicalConnectionInit } from './connectionTable.js';
export {
  AuthenticationError,
  LocalIOError,
  ProtocolError,
  ProtocolErrorCode,
  ResourceExhaustionError,
  TransportError,
} from './errors.js';
export { startForwarder, type Forwarder, type ForwarderOptions, type ForwardSummary } from './forwarder.js';
export { createLogger, logLevels, type LogLevel, type Logger } from './logger.js';
export { createRelayMetrics, setupMetrics, type RelayMetrics } from './metrics.js';
export { PortLifecycleManager, type PortLifecycleOptions, type PortState, type RegisteredPort } from './portLifecycle.js';
export { ScanPlanner, probePort, scanPorts, type ProbeFn, type ScanPlan } from './portScanner.js';
export {
  ControlChannel,
  ControlMsgType,
  decodeControlMessage,
  encodeControlMessage,
  type ControlMessage,
} from './protocol/control.js';
export {
  CONTROL_CONN_ID,
  DEFAULT_MAX_FRAME_PAYLOAD_BYTES,
  FRAME_HEADER_BYTES,
  FrameDecoder,
  decodeFrame,
  encodeCloseFrame,
  encodeFrame,
  isCloseFrame,
  type DecodedFrame,
  type Frame,
} from './protocol/frame.js';
export { RelaySession, type RelaySessionOptions } from './relay/relaySession.js';
export { buildRelayServer, type RelayServerBundle, type RelayServerOverrides } from './relay/server.js';
export { TunnelRelay, type TunnelRelayOptions } from './relay/tunnelRelay.js';
export { TUNNEL_PATH, WsStreamConnection, connectWsTransport } from './transport/wsStreamTransport.js';
export type {
  TransportConnection,
  TransportConnectOptions,
  TransportConnector,
  TransportSession,
  TransportStream,
  TransportTlsOptions,
} from './transport/types.js';
export type { ErrorCode, Result } from './result.js';
