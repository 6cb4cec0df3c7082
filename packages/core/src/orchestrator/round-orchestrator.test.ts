import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NaclEnvelopeCrypto } from '../crypto/envelope-crypto.js';
import { generateEncryptionKeypair } from '../crypto/encryption.js';
import { MemoryKeyDirectory } from '../crypto/key-directory.js';
import { JsonEnvelopeCodec } from '../envelope/codec.js';
import { EnvelopeBuilder } from '../envelope/envelope-builder.js';
import {
  InvalidArgumentError,
  InvalidEnvelopeError,
  MissingKeyError,
  RunNotStartedError,
  UnknownNodeError,
} from '../errors/index.js';
import { IdentityMapper } from '../identity/index.js';
import { MemoryTransport } from '../transport/memory-transport.js';
import { TransportAdapter } from '../transport/transport-adapter.js';
import type { Transport } from '../transport/transport.js';
import { MESSAGE_TYPES, type MessageEnvelope } from '../types/envelope.js';
import { RunContext } from '../types/run-context.js';
import { RoundOrchestrator } from './round-orchestrator.js';

const ADDRESSES = ['alice@example.org', 'bob@example.org', 'carol@example.org'];
const COORDINATOR = 'coordinator@example.org';
const codec = new JsonEnvelopeCodec();
const encoder = new TextEncoder();
const decoder = new TextDecoder();

interface ScriptedReply {
  delayMs: number;
  error?: { code: number; reason: string };
}

/**
 * Memory transport whose participants answer on a timer.
 */
class ScriptedTransport implements Transport {
  readonly store = new MemoryTransport();
  putCount = 0;
  private replies: Record<string, ScriptedReply>;
  private unreachable: Set<string>;

  constructor(replies: Record<string, ScriptedReply>, unreachable: string[] = []) {
    this.replies = replies;
    this.unreachable = new Set(unreachable);
  }

  async put(correlationId: string, destination: string, bytes: Uint8Array): Promise<void> {
    if (this.unreachable.has(destination)) {
      throw new Error(`${destination} is unreachable`);
    }
    this.putCount++;
    await this.store.put(correlationId, destination, bytes);

    const reply = this.replies[destination];
    if (!reply) return;
    const request = codec.decode(bytes);
    setTimeout(() => {
      const response: MessageEnvelope = {
        ...request,
        messageId: '',
        srcNodeId: request.dstNodeId,
        dstNodeId: request.srcNodeId,
        replyToMessageId: request.messageId,
        payload: encoder.encode(`reply from ${destination}`),
        error: reply.error,
      };
      void this.store.respond(correlationId, codec.encode(response));
    }, reply.delayMs);
  }

  get(correlationId: string): Promise<Uint8Array | null> {
    return this.store.get(correlationId);
  }

  discard(correlationId: string): Promise<void> {
    return this.store.discard(correlationId);
  }
}

function setup(replies: Record<string, ScriptedReply>, unreachable: string[] = []) {
  const transport = new ScriptedTransport(replies, unreachable);
  const mapper = new IdentityMapper(ADDRESSES);
  const runContext = new RunContext();
  runContext.start(7);
  const builder = new EnvelopeBuilder(mapper, runContext);
  const events = { onSubmitFailed: vi.fn(), onRoundTimeout: vi.fn() };
  const orchestrator = new RoundOrchestrator(mapper, builder, new TransportAdapter(transport), {}, events);
  const envelopes = ADDRESSES.map((address) =>
    builder.build(encoder.encode('weights'), MESSAGE_TYPES.TRAIN, address, 'round-1'),
  );
  return { transport, mapper, builder, events, orchestrator, envelopes };
}

/**
 * Round where alice and bob have published keys and carol has not.
 */
function encryptedSetup() {
  const transport = new MemoryTransport();
  const coordinatorKeys = generateEncryptionKeypair();
  const aliceKeys = generateEncryptionKeypair();
  const bobKeys = generateEncryptionKeypair();
  const coordinatorDirectory = new MemoryKeyDirectory([[COORDINATOR, coordinatorKeys.publicKey]]);
  const participantCrypto = new Map<string, NaclEnvelopeCrypto>([
    ['alice@example.org', new NaclEnvelopeCrypto(aliceKeys, coordinatorDirectory)],
    ['bob@example.org', new NaclEnvelopeCrypto(bobKeys, coordinatorDirectory)],
  ]);
  const onEncryptionFallback = vi.fn();
  const adapter = new TransportAdapter(
    transport,
    {
      crypto: new NaclEnvelopeCrypto(
        coordinatorKeys,
        new MemoryKeyDirectory([
          ['alice@example.org', aliceKeys.publicKey],
          ['bob@example.org', bobKeys.publicKey],
        ]),
      ),
    },
    { onEncryptionFallback },
  );
  const mapper = new IdentityMapper(ADDRESSES);
  const runContext = new RunContext();
  runContext.start(7);
  const builder = new EnvelopeBuilder(mapper, runContext);
  const orchestrator = new RoundOrchestrator(mapper, builder, adapter, { pollIntervalMs: 100 });
  const envelopes = ADDRESSES.map((address) =>
    builder.build(encoder.encode('weights'), MESSAGE_TYPES.TRAIN, address, 'round-1'),
  );
  return { transport, participantCrypto, onEncryptionFallback, mapper, orchestrator, envelopes };
}

/**
 * Answer every waiting request the way each participant can: encrypted
 * when it holds a keypair, plaintext otherwise.
 */
async function answerAll(transport: MemoryTransport, participantCrypto: Map<string, NaclEnvelopeCrypto>): Promise<number> {
  let answered = 0;
  for (const address of ADDRESSES) {
    const crypto = participantCrypto.get(address);
    for (const correlationId of await transport.listRequests(address)) {
      const raw = await transport.readRequest(correlationId);
      if (!raw) continue;
      const request = codec.decode(crypto ? crypto.decrypt(raw, COORDINATOR) : raw);
      const reply = codec.encode({
        ...request,
        messageId: '',
        srcNodeId: request.dstNodeId,
        dstNodeId: request.srcNodeId,
        replyToMessageId: request.messageId,
        payload: encoder.encode(`reply from ${address}`),
      });
      await transport.respond(correlationId, crypto ? crypto.encrypt(reply, COORDINATOR) : reply);
      answered++;
    }
  }
  return answered;
}

function senders(mapper: IdentityMapper, results: MessageEnvelope[]): string[] {
  return results.map((result) => mapper.reverse(result.srcNodeId)).sort();
}

describe('RoundOrchestrator', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('sendAndReceive', () => {
    it('returns the replies that arrived when the deadline passes', async () => {
      const { orchestrator, envelopes, mapper, events } = setup({
        'alice@example.org': { delayMs: 2000 },
        'bob@example.org': { delayMs: 2000 },
      });
      const start = Date.now();
      let settledAt: number | null = null;

      const round = orchestrator.sendAndReceive(envelopes, 5000).then((results) => {
        settledAt = Date.now();
        return results;
      });

      await vi.advanceTimersByTimeAsync(4999);
      expect(settledAt).toBeNull();

      await vi.advanceTimersByTimeAsync(1);
      const results = await round;

      expect(settledAt).toBe(start + 5000);
      expect(senders(mapper, results)).toEqual(['alice@example.org', 'bob@example.org']);
      expect(events.onRoundTimeout).toHaveBeenCalledWith(1);
    });

    it('returns at the first poll that finds every reply', async () => {
      const { orchestrator, envelopes, mapper, events } = setup({
        'alice@example.org': { delayMs: 500 },
        'bob@example.org': { delayMs: 500 },
        'carol@example.org': { delayMs: 500 },
      });
      const start = Date.now();
      let settledAt: number | null = null;

      const round = orchestrator.sendAndReceive(envelopes, 30_000).then((results) => {
        settledAt = Date.now();
        return results;
      });

      await vi.advanceTimersByTimeAsync(2999);
      expect(settledAt).toBeNull();

      await vi.advanceTimersByTimeAsync(1);
      const results = await round;

      expect(settledAt).toBe(start + 3000);
      expect(senders(mapper, results)).toEqual(ADDRESSES);
      expect(events.onRoundTimeout).not.toHaveBeenCalled();
    });

    it('waits for every reply when no timeout is given', async () => {
      const { orchestrator, envelopes } = setup({
        'alice@example.org': { delayMs: 100 },
        'bob@example.org': { delayMs: 100 },
        'carol@example.org': { delayMs: 10_000 },
      });
      let settled = false;

      const round = orchestrator.sendAndReceive(envelopes).then((results) => {
        settled = true;
        return results;
      });

      await vi.advanceTimersByTimeAsync(11_999);
      expect(settled).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      expect(await round).toHaveLength(3);
    });

    it('polls once and gives up with a zero timeout', async () => {
      const { orchestrator, envelopes, events, transport } = setup({
        'alice@example.org': { delayMs: 0 },
      });

      const results = await orchestrator.sendAndReceive(envelopes, 0);

      expect(results).toEqual([]);
      expect(transport.putCount).toBe(3);
      expect(events.onRoundTimeout).toHaveBeenCalledWith(3);
    });

    it('drops error replies without waiting for the deadline', async () => {
      const { orchestrator, envelopes, mapper, events } = setup({
        'alice@example.org': { delayMs: 500 },
        'bob@example.org': { delayMs: 500 },
        'carol@example.org': { delayMs: 500, error: { code: 1, reason: 'handler crashed' } },
      });

      const round = orchestrator.sendAndReceive(envelopes, 60_000);
      await vi.advanceTimersByTimeAsync(3000);
      const results = await round;

      expect(senders(mapper, results)).toEqual(['alice@example.org', 'bob@example.org']);
      expect(events.onRoundTimeout).not.toHaveBeenCalled();
    });

    it('drops destinations whose submit fails', async () => {
      const { orchestrator, envelopes, mapper, events } = setup(
        {
          'alice@example.org': { delayMs: 500 },
          'carol@example.org': { delayMs: 500 },
        },
        ['bob@example.org'],
      );

      const round = orchestrator.sendAndReceive(envelopes, 10_000);
      await vi.advanceTimersByTimeAsync(3000);
      const results = await round;

      expect(senders(mapper, results)).toEqual(['alice@example.org', 'carol@example.org']);
      expect(events.onSubmitFailed).toHaveBeenCalledTimes(1);
      expect(events.onSubmitFailed).toHaveBeenCalledWith('bob@example.org', expect.any(Error));
    });

    it('returns immediately for an empty round', async () => {
      const { orchestrator, transport } = setup({});
      expect(await orchestrator.sendAndReceive([], 5000)).toEqual([]);
      expect(transport.putCount).toBe(0);
    });

    it('rejects an unknown destination before submitting anything', async () => {
      const { orchestrator, envelopes, transport } = setup({});
      const stray = { ...envelopes[2], dstNodeId: 42 };

      await expect(orchestrator.sendAndReceive([envelopes[0], stray], 5000)).rejects.toBeInstanceOf(
        UnknownNodeError,
      );
      expect(transport.putCount).toBe(0);
    });

    it('rejects a tampered envelope before submitting anything', async () => {
      const { orchestrator, envelopes, transport } = setup({});
      const tampered = { ...envelopes[1], runId: 8, messageId: 'forged' };

      const error = await orchestrator.sendAndReceive([envelopes[0], tampered], 5000).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidEnvelopeError);
      expect(error).toMatchObject({ violations: ['runId', 'messageId'] });
      expect(transport.putCount).toBe(0);
    });

    it.each([-1, Number.NaN, Number.POSITIVE_INFINITY])('rejects timeout %s', async (timeoutMs) => {
      const { orchestrator, envelopes, transport } = setup({});
      await expect(orchestrator.sendAndReceive(envelopes, timeoutMs)).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(transport.putCount).toBe(0);
    });
  });

  describe('push and pull', () => {
    it('pull makes a single pass over the pending correlations', async () => {
      const { orchestrator, envelopes } = setup({
        'alice@example.org': { delayMs: 100 },
        'carol@example.org': { delayMs: 100, error: { code: 2, reason: 'bad request' } },
      });

      const pending = await orchestrator.push(envelopes);
      expect(pending.map((p) => p.destination.address)).toEqual(ADDRESSES);

      const before = await orchestrator.pull(pending);
      expect(before.resolved.size).toBe(0);
      expect(before.failed.size).toBe(0);

      await vi.advanceTimersByTimeAsync(100);
      const after = await orchestrator.pull(pending);

      expect([...after.resolved.keys()]).toEqual([pending[0].correlationId]);
      expect([...after.failed]).toEqual([pending[2].correlationId]);
    });
  });

  describe('with encryption', () => {
    it('push encrypts for known keys and sends the rest in plaintext', async () => {
      const { transport, participantCrypto, onEncryptionFallback, orchestrator, envelopes } = encryptedSetup();

      const pending = await orchestrator.push(envelopes);

      expect(pending.map((p) => p.destination.address)).toEqual(ADDRESSES);
      expect(transport.requestCount).toBe(3);
      expect(onEncryptionFallback).toHaveBeenCalledTimes(1);
      expect(onEncryptionFallback).toHaveBeenCalledWith('carol@example.org', expect.any(MissingKeyError));

      for (const { correlationId, destination } of pending) {
        const raw = await transport.readRequest(correlationId);
        if (!raw) throw new Error(`no request for ${destination.address}`);
        const crypto = participantCrypto.get(destination.address);
        if (crypto) {
          expect(() => codec.decode(raw)).toThrow();
        }
        const request = codec.decode(crypto ? crypto.decrypt(raw, COORDINATOR) : raw);
        expect(request.messageId).toBe(correlationId);
        expect(decoder.decode(request.payload)).toBe('weights');
      }
    });

    it('sendAndReceive collects encrypted and plaintext replies in one round', async () => {
      const { transport, participantCrypto, mapper, orchestrator, envelopes } = encryptedSetup();

      const round = orchestrator.sendAndReceive(envelopes, 1000);
      await vi.advanceTimersByTimeAsync(50);
      expect(await answerAll(transport, participantCrypto)).toBe(3);
      await vi.advanceTimersByTimeAsync(50);
      const results = await round;

      expect(senders(mapper, results)).toEqual(ADDRESSES);
      expect(results.map((reply) => decoder.decode(reply.payload)).sort()).toEqual([
        'reply from alice@example.org',
        'reply from bob@example.org',
        'reply from carol@example.org',
      ]);
      expect(transport.requestCount).toBe(0);
    });
  });

  it('rejects a non-positive poll interval', () => {
    const mapper = new IdentityMapper(ADDRESSES);
    const builder = new EnvelopeBuilder(mapper, new RunContext());
    const adapter = new TransportAdapter(new MemoryTransport());
    expect(() => new RoundOrchestrator(mapper, builder, adapter, { pollIntervalMs: 0 })).toThrow(InvalidArgumentError);
  });

  it('surfaces a missing run when validating', async () => {
    const mapper = new IdentityMapper(ADDRESSES);
    const started = new RunContext();
    started.start(1);
    const envelope = new EnvelopeBuilder(mapper, started).build(new Uint8Array(), 'train', ADDRESSES[0], 'g');
    const orchestrator = new RoundOrchestrator(
      mapper,
      new EnvelopeBuilder(mapper, new RunContext()),
      new TransportAdapter(new MemoryTransport()),
    );

    await expect(orchestrator.sendAndReceive([envelope])).rejects.toBeInstanceOf(RunNotStartedError);
  });
});
