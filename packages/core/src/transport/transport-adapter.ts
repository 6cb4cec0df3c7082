import { newCorrelationId } from '../crypto/secure-random.js';
import type { EnvelopeCrypto } from '../crypto/envelope-crypto.js';
import { type EnvelopeCodec, JsonEnvelopeCodec } from '../envelope/codec.js';
import { SubmitError, describeError, isKeyMaterialError } from '../errors/index.js';
import type { Participant } from '../identity/index.js';
import type { MessageEnvelope, PendingCorrelation } from '../types/envelope.js';
import type { Transport } from './transport.js';

export type ResolveResult =
  | { status: 'pending' }
  | { status: 'failed'; reason: string }
  | { status: 'resolved'; envelope: MessageEnvelope };

export interface TransportAdapterOptions {
  codec?: EnvelopeCodec;
  crypto?: EnvelopeCrypto;
  /** Defaults to true whenever a crypto collaborator is given */
  encryptionEnabled?: boolean;
}

export interface TransportAdapterEvents {
  /** A destination had no usable key and its message went out unencrypted */
  onEncryptionFallback?: (address: string, error: Error) => void;
  /** A response was dropped for good */
  onResponseFailed?: (correlationId: string, reason: string) => void;
}

const PENDING: ResolveResult = { status: 'pending' };

function shortId(id: string): string {
  return id.slice(0, 8);
}

/**
 * Wraps a store-and-forward Transport with envelope encoding, optional
 * encryption and response correlation.
 */
export class TransportAdapter {
  private transport: Transport;
  private codec: EnvelopeCodec;
  private crypto: EnvelopeCrypto | null;
  private events: TransportAdapterEvents;

  constructor(transport: Transport, options: TransportAdapterOptions = {}, events: TransportAdapterEvents = {}) {
    this.transport = transport;
    this.codec = options.codec ?? new JsonEnvelopeCodec();
    const enabled = options.encryptionEnabled ?? options.crypto !== undefined;
    this.crypto = enabled ? (options.crypto ?? null) : null;
    this.events = events;

    if (enabled && !options.crypto) {
      console.warn('[TransportAdapter] Encryption requested without a crypto provider, messages go out in plaintext');
    }
  }

  get encryptionEnabled(): boolean {
    return this.crypto !== null;
  }

  /**
   * Encode (and encrypt) an envelope and hand it to the transport.
   *
   * Missing or unusable key material downgrades this one message to
   * plaintext. Any other failure throws SubmitError.
   */
  async submit(envelope: MessageEnvelope, destination: Participant): Promise<string> {
    const correlationId = newCorrelationId();

    let bytes: Uint8Array;
    try {
      bytes = this.codec.encode({ ...envelope, messageId: correlationId });
    } catch (error) {
      throw new SubmitError(destination.address, error);
    }

    let encrypted = false;
    if (this.crypto) {
      try {
        bytes = this.crypto.encrypt(bytes, destination.address);
        encrypted = true;
      } catch (error) {
        if (!isKeyMaterialError(error)) {
          throw new SubmitError(destination.address, error);
        }
        console.warn(
          `[TransportAdapter] ${error.message}. Falling back to unencrypted transmission for node ${destination.nodeId}`,
        );
        this.events.onEncryptionFallback?.(destination.address, error);
      }
    }

    try {
      await this.transport.put(correlationId, destination.address, bytes);
    } catch (error) {
      throw new SubmitError(destination.address, error);
    }

    console.log(
      `[TransportAdapter] Pushed ${encrypted ? 'encrypted' : 'plaintext'} ${envelope.messageType} message to ${destination.address} (id=${shortId(correlationId)}, ${bytes.length} bytes)`,
    );
    return correlationId;
  }

  /**
   * Check whether a response has arrived for a submitted request.
   */
  async resolve(pending: PendingCorrelation): Promise<ResolveResult> {
    const { correlationId, destination } = pending;

    let bytes: Uint8Array | null;
    try {
      bytes = await this.transport.get(correlationId);
    } catch (error) {
      console.warn(`[TransportAdapter] Reading response ${shortId(correlationId)} failed, retrying later: ${describeError(error)}`);
      return PENDING;
    }

    if (bytes === null) return PENDING;
    if (bytes.length === 0) {
      return this.fail(correlationId, 'empty response');
    }

    let body = bytes;
    if (this.crypto) {
      try {
        body = this.crypto.decrypt(bytes, destination.address);
      } catch (error) {
        // Peers without encryption support reply in plaintext
        console.log(
          `[TransportAdapter] Response ${shortId(correlationId)} treated as plaintext: ${describeError(error)}`,
        );
      }
    }

    let envelope: MessageEnvelope;
    try {
      envelope = this.codec.decode(body);
    } catch (error) {
      return this.fail(correlationId, `corrupt response: ${describeError(error)}`);
    }

    if (envelope.error) {
      return this.fail(
        correlationId,
        `participant returned error code=${envelope.error.code}, reason=${envelope.error.reason}`,
      );
    }
    if (envelope.replyToMessageId !== correlationId) {
      return this.fail(correlationId, `reply references ${envelope.replyToMessageId || 'no message'}`);
    }
    if (envelope.srcNodeId !== destination.nodeId) {
      return this.fail(correlationId, `reply from node ${envelope.srcNodeId}, expected ${destination.nodeId}`);
    }

    await this.release(correlationId);
    console.log(
      `[TransportAdapter] Pulled ${envelope.messageType} reply from ${destination.address} (id=${shortId(correlationId)})`,
    );
    return { status: 'resolved', envelope };
  }

  private async fail(correlationId: string, reason: string): Promise<ResolveResult> {
    console.error(`[TransportAdapter] Dropping response ${shortId(correlationId)}: ${reason}`);
    this.events.onResponseFailed?.(correlationId, reason);
    await this.release(correlationId);
    return { status: 'failed', reason };
  }

  private async release(correlationId: string): Promise<void> {
    try {
      await this.transport.discard(correlationId);
    } catch (error) {
      console.warn(`[TransportAdapter] Could not discard ${shortId(correlationId)}: ${describeError(error)}`);
    }
  }
}
