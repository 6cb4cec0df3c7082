import {
  COORDINATOR_NODE_ID,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_TTL_SECONDS,
  ENVELOPE_ERROR_CODES,
  type EnvelopeCodec,
  type EnvelopeCrypto,
  type EnvelopeError,
  JsonEnvelopeCodec,
  MESSAGE_TYPES,
  type Mailbox,
  type MessageEnvelope,
  type NodeId,
  addressToNodeId,
  decodeSystemPayload,
  describeError,
  isKeyMaterialError,
  isStopSignal,
} from 'roundgrid-protocol';

export type RequestHandler = (request: MessageEnvelope) => Uint8Array | Promise<Uint8Array>;

export interface ParticipantClientOptions {
  address: string;
  /** Address replies are encrypted for */
  coordinatorAddress: string;
  mailbox: Mailbox;
  handler: RequestHandler;
  codec?: EnvelopeCodec;
  crypto?: EnvelopeCrypto;
  pollIntervalMs?: number;
}

export interface ParticipantClientEvents {
  onReplied?: (correlationId: string, reply: MessageEnvelope) => void;
  onHandlerError?: (correlationId: string, error: unknown) => void;
  onStop?: (reason: string | undefined) => void;
  /** Writing a reply failed; the request is retried on the next poll */
  onReplyFailed?: (correlationId: string, error: unknown) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Participant side of a round: answers the coordinator's requests from a
 * mailbox until a stop signal arrives.
 */
export class ParticipantClient {
  readonly address: string;
  readonly nodeId: NodeId;
  private coordinatorAddress: string;
  private mailbox: Mailbox;
  private handler: RequestHandler;
  private codec: EnvelopeCodec;
  private crypto: EnvelopeCrypto | null;
  private pollIntervalMs: number;
  private events: ParticipantClientEvents;
  private handled = new Set<string>();
  private stopped = false;
  private stopReason: string | undefined;

  constructor(options: ParticipantClientOptions, events: ParticipantClientEvents = {}) {
    this.address = options.address;
    this.nodeId = addressToNodeId(options.address);
    this.coordinatorAddress = options.coordinatorAddress;
    this.mailbox = options.mailbox;
    this.handler = options.handler;
    this.codec = options.codec ?? new JsonEnvelopeCodec();
    this.crypto = options.crypto ?? null;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.events = events;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Answer every request currently waiting in the mailbox.
   * Returns the number of requests answered.
   *
   * A request whose reply cannot be written stays unhandled and is tried
   * again on the next poll.
   */
  async pollOnce(): Promise<number> {
    const ids = await this.mailbox.listRequests(this.address);

    // Ids the mailbox no longer lists have been answered for good
    const listed = new Set(ids);
    for (const id of this.handled) {
      if (!listed.has(id)) this.handled.delete(id);
    }

    let processed = 0;
    for (const correlationId of ids) {
      if (this.stopped) break;
      if (this.handled.has(correlationId)) continue;

      try {
        if (await this.process(correlationId)) {
          this.handled.add(correlationId);
          processed++;
        }
      } catch (error) {
        console.error(
          `[ParticipantClient] Could not answer ${correlationId.slice(0, 8)}, retrying next poll: ${describeError(error)}`,
        );
        this.events.onReplyFailed?.(correlationId, error);
      }
    }
    return processed;
  }

  /**
   * Poll until a stop signal arrives. Resolves with the stop reason.
   */
  async run(): Promise<string | undefined> {
    console.log(`[ParticipantClient] ${this.address} (node ${this.nodeId}) waiting for requests`);
    while (!this.stopped) {
      await this.pollOnce();
      if (this.stopped) break;
      await sleep(this.pollIntervalMs);
    }
    return this.stopReason;
  }

  stop(reason?: string): void {
    if (this.stopped) return;
    this.stopped = true;
    this.stopReason = reason;
    console.log(`[ParticipantClient] ${this.address} stopping${reason ? `: ${reason}` : ''}`);
    this.events.onStop?.(reason);
  }

  private async process(correlationId: string): Promise<boolean> {
    const bytes = await this.mailbox.readRequest(correlationId);
    if (bytes === null) return false;

    let request: MessageEnvelope;
    try {
      request = this.codec.decode(this.decrypt(bytes));
    } catch (error) {
      console.warn(`[ParticipantClient] Malformed request ${correlationId.slice(0, 8)}: ${describeError(error)}`);
      await this.sendReply(correlationId, this.malformedReply(correlationId, describeError(error)));
      return true;
    }

    if (isStopSignal(request)) {
      // Acknowledge so the stop does not stay in the mailbox for the next run
      await this.sendReply(correlationId, this.replyTo(request, new Uint8Array(0)));
      this.stop(decodeSystemPayload(request.payload)?.reason);
      return true;
    }

    await this.sendReply(correlationId, await this.answer(correlationId, request));
    return true;
  }

  private async answer(correlationId: string, request: MessageEnvelope): Promise<MessageEnvelope> {
    try {
      const payload = await this.handler(request);
      return this.replyTo(request, payload);
    } catch (error) {
      console.error(`[ParticipantClient] Handler failed for ${correlationId.slice(0, 8)}: ${describeError(error)}`);
      this.events.onHandlerError?.(correlationId, error);
      return this.replyTo(request, new Uint8Array(0), {
        code: ENVELOPE_ERROR_CODES.HANDLER_FAILED,
        reason: describeError(error),
      });
    }
  }

  private replyTo(request: MessageEnvelope, payload: Uint8Array, error?: EnvelopeError): MessageEnvelope {
    const reply: MessageEnvelope = {
      runId: request.runId,
      messageId: '',
      srcNodeId: this.nodeId,
      dstNodeId: request.srcNodeId,
      replyToMessageId: request.messageId,
      groupId: request.groupId,
      ttlSeconds: request.ttlSeconds,
      messageType: request.messageType,
      payload,
      createdAt: Date.now(),
    };
    if (error) reply.error = error;
    return reply;
  }

  private malformedReply(correlationId: string, reason: string): MessageEnvelope {
    return {
      runId: 0,
      messageId: '',
      srcNodeId: this.nodeId,
      dstNodeId: COORDINATOR_NODE_ID,
      replyToMessageId: correlationId,
      groupId: '',
      ttlSeconds: DEFAULT_TTL_SECONDS,
      messageType: MESSAGE_TYPES.SYSTEM,
      payload: new Uint8Array(0),
      createdAt: Date.now(),
      error: { code: ENVELOPE_ERROR_CODES.MALFORMED_REQUEST, reason },
    };
  }

  private async sendReply(correlationId: string, reply: MessageEnvelope): Promise<void> {
    await this.mailbox.respond(correlationId, this.encrypt(this.codec.encode(reply)));
    this.events.onReplied?.(correlationId, reply);
  }

  private decrypt(bytes: Uint8Array): Uint8Array {
    if (!this.crypto) return bytes;
    try {
      return this.crypto.decrypt(bytes, this.coordinatorAddress);
    } catch {
      // Coordinators without a key for us send plaintext
      return bytes;
    }
  }

  private encrypt(bytes: Uint8Array): Uint8Array {
    if (!this.crypto) return bytes;
    try {
      return this.crypto.encrypt(bytes, this.coordinatorAddress);
    } catch (error) {
      if (!isKeyMaterialError(error)) throw error;
      console.warn(`[ParticipantClient] ${error.message}, replying unencrypted`);
      return bytes;
    }
  }
}
