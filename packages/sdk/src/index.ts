export { ROUNDGRID_PROTOCOL_VERSION, MESSAGE_TYPES, MemoryTransport, FileTransport, FileMailbox } from 'roundgrid-protocol';
export type { MessageEnvelope, Transport, Mailbox, NodeId } from 'roundgrid-protocol';
export {
  Grid,
  DEFAULT_STOP_REASON,
  DEFAULT_STOP_GROUP_ID,
  DEFAULT_STOP_TTL_SECONDS,
} from './grid.js';
export type { GridOptions, StopSignalOptions, StatusHandler } from './grid.js';
export { ParticipantClient } from './participant-client.js';
export type { ParticipantClientOptions, ParticipantClientEvents, RequestHandler } from './participant-client.js';
export { loadGridConfig, resolveGridConfig, ENV } from './config.js';
export type { GridConfig, Environment } from './config.js';
