// Relay wire frames. Every request carries a client-chosen seq that the
// matching reply echoes.

/** Request frames without the client-chosen sequence number */
export type RelayOperation =
  | { type: 'put'; correlationId: string; destination: string; body: string }
  | { type: 'get'; correlationId: string }
  | { type: 'discard'; correlationId: string }
  | { type: 'list'; address: string }
  | { type: 'read'; correlationId: string }
  | { type: 'respond'; correlationId: string; body: string };

export type RelayRequest = RelayOperation & { seq: number };

export type RelayReply =
  | { type: 'ok'; seq: number; body?: string | null; ids?: string[] }
  | { type: 'error'; seq?: number; error: string };

function isString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

export function isRelayRequest(value: unknown): value is RelayRequest {
  if (typeof value !== 'object' || value === null) return false;
  const msg = value as Record<string, unknown>;
  if (typeof msg.seq !== 'number' || !Number.isInteger(msg.seq)) return false;

  switch (msg.type) {
    case 'put':
      return isString(msg.correlationId) && isString(msg.destination) && typeof msg.body === 'string';
    case 'respond':
      return isString(msg.correlationId) && typeof msg.body === 'string';
    case 'get':
    case 'discard':
    case 'read':
      return isString(msg.correlationId);
    case 'list':
      return isString(msg.address);
    default:
      return false;
  }
}

export function isRelayReply(value: unknown): value is RelayReply {
  if (typeof value !== 'object' || value === null) return false;
  const msg = value as Record<string, unknown>;
  if (msg.type === 'ok') {
    return (
      typeof msg.seq === 'number' &&
      (msg.body === undefined || msg.body === null || typeof msg.body === 'string') &&
      (msg.ids === undefined || (Array.isArray(msg.ids) && msg.ids.every((id) => typeof id === 'string')))
    );
  }
  if (msg.type === 'error') {
    return typeof msg.error === 'string' && (msg.seq === undefined || typeof msg.seq === 'number');
  }
  return false;
}
