export { MESSAGE_TYPES, ENVELOPE_ERROR_CODES } from './envelope.js';
export type { MessageEnvelope, EnvelopeError, KnownMessageType, PendingCorrelation } from './envelope.js';
export { RunContext } from './run-context.js';
