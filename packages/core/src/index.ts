export const ROUNDGRID_PROTOCOL_VERSION = '0.1.0';

export { COORDINATOR_NODE_ID, IdentityMapper, addressToNodeId, crc32, isNodeId } from './identity/index.js';
export type { NodeId, Participant, IdentityMapperOptions } from './identity/index.js';

export { MESSAGE_TYPES, ENVELOPE_ERROR_CODES, RunContext } from './types/index.js';
export type { MessageEnvelope, EnvelopeError, KnownMessageType, PendingCorrelation } from './types/index.js';

export {
  GridError,
  UnknownParticipantError,
  UnknownNodeError,
  NodeIdCollisionError,
  InvalidEnvelopeError,
  RunNotStartedError,
  RunAlreadyStartedError,
  InvalidArgumentError,
  SubmitError,
  CorruptEnvelopeError,
  MissingKeyError,
  KeyParameterError,
  InvalidConfigError,
  isKeyMaterialError,
  describeError,
} from './errors/index.js';
export type { GridErrorCode } from './errors/index.js';

export {
  EnvelopeBuilder,
  DEFAULT_TTL_SECONDS,
  JsonEnvelopeCodec,
  WIRE_VERSION,
  bytesToBase64,
  base64ToBytes,
  encodeStopPayload,
  decodeSystemPayload,
  isStopSignal,
  STOP_ACTION,
} from './envelope/index.js';
export type { EnvelopeBuilderOptions, EnvelopeCodec, SystemPayload } from './envelope/index.js';

// Encryption (tweetnacl box, ephemeral sender keys)
export {
  ENCRYPTION_KEY_LENGTH,
  generateEncryptionKeypair,
  encryptionKeyToHex,
  hexToEncryptionKey,
  encryptBytes,
  decryptBytes,
  isEncryptedPayload,
  NaclEnvelopeCrypto,
  MemoryKeyDirectory,
  loadKeyDirectory,
  loadOrCreateEncryptionKeypair,
  bytesToHex,
  hexToBytes,
  newCorrelationId,
} from './crypto/index.js';
export type { EncryptionKeypair, EncryptedPayload, EnvelopeCrypto, KeyDirectory } from './crypto/index.js';

export { MemoryTransport, FileTransport, FileMailbox, DEFAULT_ENDPOINT, TransportAdapter } from './transport/index.js';
export type {
  Transport,
  Mailbox,
  FileTransportOptions,
  ResolveResult,
  TransportAdapterOptions,
  TransportAdapterEvents,
} from './transport/index.js';

export { RoundOrchestrator, ShutdownBroadcaster, DEFAULT_POLL_INTERVAL_MS } from './orchestrator/index.js';
export type { RoundOrchestratorOptions, RoundOrchestratorEvents, PullResult } from './orchestrator/index.js';
