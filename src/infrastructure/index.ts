export { loadRelayConfig, ConfigError } from './config.js';
export type { RelayConfig } from './config.js';
export { createShutdownHandler, SHUTDOWN_GRACE_MS } from './shutdown.js';
export type { ShutdownOptions } from './shutdown.js';
export {
  SlackWebApiClient,
  SlackHttpError,
  DEFAULT_SLACK_API_BASE_URL,
} from './slack/index.js';
export type {
  SlackConnectionsApi,
  SlackMessagingApi,
  OpenConnectionResponse,
  PermalinkResponse,
  PostMessageResponse,
} from './slack/index.js';
export {
  ConnectionSupervisor,
  HandshakeError,
  withDebugReconnects,
  WsConnection,
  connectWebSocket,
} from './socket/index.js';
export type { Frame, OutboundFrame, DuplexConnection, Connector, LoopExit } from './socket/index.js';
