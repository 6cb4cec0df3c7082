export { EnvelopeBuilder, DEFAULT_TTL_SECONDS } from './envelope-builder.js';
export type { EnvelopeBuilderOptions } from './envelope-builder.js';
export { JsonEnvelopeCodec, WIRE_VERSION, bytesToBase64, base64ToBytes } from './codec.js';
export type { EnvelopeCodec } from './codec.js';
export { encodeStopPayload, decodeSystemPayload, isStopSignal, STOP_ACTION } from './system-payload.js';
export type { SystemPayload } from './system-payload.js';
