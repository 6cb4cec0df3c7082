export type { Transport, Mailbox } from './transport.js';
export { MemoryTransport } from './memory-transport.js';
export { FileTransport, FileMailbox, DEFAULT_ENDPOINT } from './file-transport.js';
export type { FileTransportOptions } from './file-transport.js';
export { TransportAdapter } from './transport-adapter.js';
export type { ResolveResult, TransportAdapterOptions, TransportAdapterEvents } from './transport-adapter.js';
