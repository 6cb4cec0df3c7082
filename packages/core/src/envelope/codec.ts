/**
 * Envelope wire codec.
 *
 * The default codec writes UTF-8 JSON with a version tag and a base64
 * payload. The orchestrator only depends on the EnvelopeCodec interface, so
 * deployments with their own wire format plug in a different codec.
 */

import { CorruptEnvelopeError } from '../errors/index.js';
import { isNodeId } from '../identity/index.js';
import type { EnvelopeError, MessageEnvelope } from '../types/envelope.js';

export interface EnvelopeCodec {
  encode(envelope: MessageEnvelope): Uint8Array;
  decode(bytes: Uint8Array): MessageEnvelope;
}

export const WIRE_VERSION = 1;

interface WireEnvelope {
  v: number;
  runId: number;
  messageId: string;
  srcNodeId: number;
  dstNodeId: number;
  replyToMessageId: string;
  groupId: string;
  ttlSeconds: number;
  messageType: string;
  createdAt: number;
  payload: string;
  error?: EnvelopeError;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

function isEnvelopeError(value: unknown): value is EnvelopeError {
  if (typeof value !== 'object' || value === null) return false;
  const e = value as Record<string, unknown>;
  return typeof e.code === 'number' && Number.isInteger(e.code) && typeof e.reason === 'string';
}

function isWireEnvelope(value: unknown): value is WireEnvelope {
  if (typeof value !== 'object' || value === null) return false;
  const w = value as Record<string, unknown>;
  return (
    w.v === WIRE_VERSION &&
    typeof w.runId === 'number' &&
    Number.isSafeInteger(w.runId) &&
    typeof w.messageId === 'string' &&
    isNodeId(w.srcNodeId) &&
    isNodeId(w.dstNodeId) &&
    typeof w.replyToMessageId === 'string' &&
    typeof w.groupId === 'string' &&
    typeof w.ttlSeconds === 'number' &&
    typeof w.messageType === 'string' &&
    typeof w.createdAt === 'number' &&
    typeof w.payload === 'string' &&
    BASE64_PATTERN.test(w.payload) &&
    (w.error === undefined || isEnvelopeError(w.error))
  );
}

export function bytesToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

export function base64ToBytes(base64: string): Uint8Array {
  return new Uint8Array(Buffer.from(base64, 'base64'));
}

export class JsonEnvelopeCodec implements EnvelopeCodec {
  encode(envelope: MessageEnvelope): Uint8Array {
    const wire: WireEnvelope = {
      v: WIRE_VERSION,
      runId: envelope.runId,
      messageId: envelope.messageId,
      srcNodeId: envelope.srcNodeId,
      dstNodeId: envelope.dstNodeId,
      replyToMessageId: envelope.replyToMessageId,
      groupId: envelope.groupId,
      ttlSeconds: envelope.ttlSeconds,
      messageType: envelope.messageType,
      createdAt: envelope.createdAt,
      payload: bytesToBase64(envelope.payload),
    };
    if (envelope.error) {
      wire.error = { code: envelope.error.code, reason: envelope.error.reason };
    }
    return new TextEncoder().encode(JSON.stringify(wire));
  }

  decode(bytes: Uint8Array): MessageEnvelope {
    if (bytes.length === 0) {
      throw new CorruptEnvelopeError('Empty envelope');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(bytes));
    } catch {
      throw new CorruptEnvelopeError('Envelope is not valid JSON');
    }

    if (!isWireEnvelope(parsed)) {
      throw new CorruptEnvelopeError('Envelope is missing fields or has the wrong version');
    }

    const envelope: MessageEnvelope = {
      runId: parsed.runId,
      messageId: parsed.messageId,
      srcNodeId: parsed.srcNodeId,
      dstNodeId: parsed.dstNodeId,
      replyToMessageId: parsed.replyToMessageId,
      groupId: parsed.groupId,
      ttlSeconds: parsed.ttlSeconds,
      messageType: parsed.messageType,
      payload: base64ToBytes(parsed.payload),
      createdAt: parsed.createdAt,
    };
    if (parsed.error) {
      envelope.error = { code: parsed.error.code, reason: parsed.error.reason };
    }
    return envelope;
  }
}
