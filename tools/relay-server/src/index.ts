// Store-and-forward relay: coordinators put requests, participants read and
// answer them, all over one WebSocket protocol.

export const RELAY_SERVER_VERSION = '0.1.0';

export const DEFAULT_RELAY_PORT = 3002;

export { isRelayRequest, isRelayReply } from './protocol.js';
export type { RelayOperation, RelayRequest, RelayReply } from './protocol.js';
export { createRelayServer } from './server.js';
export type { RelayServer } from './server.js';
export { RelayTransport } from './relay-transport.js';
export type { RelayTransportOptions } from './relay-transport.js';
