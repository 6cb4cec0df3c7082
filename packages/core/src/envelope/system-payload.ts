import { MESSAGE_TYPES, type MessageEnvelope } from '../types/envelope.js';

export interface SystemPayload {
  action: string;
  reason?: string;
}

export const STOP_ACTION = 'stop';

export function encodeStopPayload(reason: string): Uint8Array {
  const payload: SystemPayload = { action: STOP_ACTION, reason };
  return new TextEncoder().encode(JSON.stringify(payload));
}

/**
 * Decode a SYSTEM payload, or null if the bytes are not one.
 */
export function decodeSystemPayload(bytes: Uint8Array): SystemPayload | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(bytes));
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) return null;
  const p = parsed as Record<string, unknown>;
  if (typeof p.action !== 'string') return null;
  if (p.reason !== undefined && typeof p.reason !== 'string') return null;
  return p.reason === undefined ? { action: p.action } : { action: p.action, reason: p.reason };
}

export function isStopSignal(envelope: MessageEnvelope): boolean {
  if (envelope.messageType !== MESSAGE_TYPES.SYSTEM) return false;
  return decodeSystemPayload(envelope.payload)?.action === STOP_ACTION;
}
