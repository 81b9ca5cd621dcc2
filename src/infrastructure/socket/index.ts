export { ConnectionSupervisor, HandshakeError, withDebugReconnects } from './connection-supervisor.js';
export type { SupervisorDeps, ThreadReactor, LoopExit } from './connection-supervisor.js';
export { WsConnection, connectWebSocket } from './ws-connection.js';
export type { Frame, OutboundFrame, DuplexConnection, Connector } from './duplex-connection.js';
