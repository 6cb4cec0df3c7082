import { InvalidEnvelopeError } from '../errors/index.js';
import { COORDINATOR_NODE_ID, type IdentityMapper, type NodeId } from '../identity/index.js';
import type { MessageEnvelope } from '../types/envelope.js';
import type { RunContext } from '../types/run-context.js';

/** Default time-to-live for envelopes (12 hours) */
export const DEFAULT_TTL_SECONDS = 43200;

export interface EnvelopeBuilderOptions {
  selfNodeId?: NodeId;
  defaultTtlSeconds?: number;
}

function isValidTtl(ttlSeconds: number): boolean {
  return Number.isFinite(ttlSeconds) && ttlSeconds > 0;
}

/**
 * Builds outbound envelopes for the current run and checks them before they
 * are handed to the transport. A rejected envelope is a programming error in
 * the caller and is never retried.
 */
export class EnvelopeBuilder {
  readonly selfNodeId: NodeId;
  private mapper: IdentityMapper;
  private runContext: RunContext;
  private defaultTtlSeconds: number;

  constructor(mapper: IdentityMapper, runContext: RunContext, options: EnvelopeBuilderOptions = {}) {
    this.mapper = mapper;
    this.runContext = runContext;
    this.selfNodeId = options.selfNodeId ?? COORDINATOR_NODE_ID;
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? DEFAULT_TTL_SECONDS;
    if (!isValidTtl(this.defaultTtlSeconds)) {
      throw new InvalidEnvelopeError(['defaultTtlSeconds']);
    }
  }

  build(
    payload: Uint8Array,
    messageType: string,
    dstAddress: string,
    groupId: string,
    ttlSeconds?: number,
  ): MessageEnvelope {
    const dstNodeId = this.mapper.resolve(dstAddress);
    const runId = this.runContext.runId;

    const violations: string[] = [];
    if (messageType.length === 0) violations.push('messageType');
    if (ttlSeconds !== undefined && !isValidTtl(ttlSeconds)) violations.push('ttlSeconds');
    if (violations.length > 0) {
      throw new InvalidEnvelopeError(violations);
    }

    return Object.freeze({
      runId,
      messageId: '',
      srcNodeId: this.selfNodeId,
      dstNodeId,
      replyToMessageId: '',
      groupId,
      ttlSeconds: ttlSeconds ?? this.defaultTtlSeconds,
      messageType,
      payload,
      createdAt: Date.now(),
    });
  }

  validate(envelope: MessageEnvelope): void {
    const violations: string[] = [];
    if (envelope.runId !== this.runContext.runId) violations.push('runId');
    if (envelope.srcNodeId !== this.selfNodeId) violations.push('srcNodeId');
    if (envelope.messageId !== '') violations.push('messageId');
    if (envelope.replyToMessageId !== '') violations.push('replyToMessageId');
    if (!isValidTtl(envelope.ttlSeconds)) violations.push('ttlSeconds');

    if (violations.length > 0) {
      console.log(`[EnvelopeBuilder] Rejected envelope for node ${envelope.dstNodeId}: ${violations.join(', ')}`);
      throw new InvalidEnvelopeError(violations);
    }
  }
}
