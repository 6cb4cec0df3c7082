import type { NodeId } from '../identity/index.js';

export const MESSAGE_TYPES = {
  TRAIN: 'train',
  EVALUATE: 'evaluate',
  QUERY: 'query',
  SYSTEM: 'system',
} as const;

export type KnownMessageType = (typeof MESSAGE_TYPES)[keyof typeof MESSAGE_TYPES];

/** Error reported by a participant in place of a reply payload */
export interface EnvelopeError {
  code: number;
  reason: string;
}

export const ENVELOPE_ERROR_CODES = {
  UNKNOWN: 0,
  HANDLER_FAILED: 1,
  MALFORMED_REQUEST: 2,
} as const;

export interface MessageEnvelope {
  runId: number;
  // Empty until the transport adapter assigns the correlation id
  messageId: string;
  srcNodeId: NodeId;
  dstNodeId: NodeId;
  // Empty for fresh requests, the request's messageId on replies
  replyToMessageId: string;
  // Caller-defined tag, e.g. the round number
  groupId: string;
  ttlSeconds: number;
  messageType: string;
  payload: Uint8Array;
  createdAt: number;
  error?: EnvelopeError;
}

export interface PendingCorrelation {
  correlationId: string;
  destination: {
    address: string;
    nodeId: NodeId;
  };
}
