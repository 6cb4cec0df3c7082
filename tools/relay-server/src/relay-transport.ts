import {
  GridError,
  type Mailbox,
  type Transport,
  base64ToBytes,
  bytesToBase64,
} from 'roundgrid-protocol';
import WebSocket from 'ws';
import { type RelayOperation, type RelayReply, isRelayReply } from './protocol.js';

export interface RelayTransportOptions {
  /** How long to wait for the relay to answer one frame */
  requestTimeoutMs?: number;
}

type OkReply = Extract<RelayReply, { type: 'ok' }>;

interface Waiting {
  resolve: (reply: OkReply) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Transport and mailbox backed by a relay server. Coordinators and
 * participants each hold their own connection.
 */
export class RelayTransport implements Transport, Mailbox {
  private url: string;
  private requestTimeoutMs: number;
  private ws: WebSocket | null = null;
  private seq = 0;
  private waiting = new Map<number, Waiting>();

  constructor(url: string, options: RelayTransportOptions = {}) {
    this.url = url;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
  }

  async connect(): Promise<void> {
    const ws = new WebSocket(this.url);
    await new Promise<void>((resolve, reject) => {
      ws.once('open', () => resolve());
      ws.once('error', (err) => reject(new GridError('TRANSPORT_FAILED', `Failed to connect to relay: ${err.message}`)));
    });

    ws.on('message', (data: WebSocket.RawData) => this.handleReply(data.toString()));
    ws.on('error', (err) => console.error(`[RelayTransport] Connection error: ${err.message}`));
    ws.on('close', () => {
      this.ws = null;
      this.rejectAll('Relay connection closed');
    });
    this.ws = ws;
  }

  close(): void {
    this.ws?.close();
    this.ws = null;
    this.rejectAll('Relay connection closed');
  }

  async put(correlationId: string, destination: string, bytes: Uint8Array): Promise<void> {
    await this.request({ type: 'put', correlationId, destination, body: bytesToBase64(bytes) });
  }

  async get(correlationId: string): Promise<Uint8Array | null> {
    const reply = await this.request({ type: 'get', correlationId });
    return typeof reply.body === 'string' ? base64ToBytes(reply.body) : null;
  }

  async discard(correlationId: string): Promise<void> {
    await this.request({ type: 'discard', correlationId });
  }

  async listRequests(address: string): Promise<string[]> {
    const reply = await this.request({ type: 'list', address });
    return reply.ids ?? [];
  }

  async readRequest(correlationId: string): Promise<Uint8Array | null> {
    const reply = await this.request({ type: 'read', correlationId });
    return typeof reply.body === 'string' ? base64ToBytes(reply.body) : null;
  }

  async respond(correlationId: string, bytes: Uint8Array): Promise<void> {
    await this.request({ type: 'respond', correlationId, body: bytesToBase64(bytes) });
  }

  private request(operation: RelayOperation): Promise<OkReply> {
    const ws = this.ws;
    if (!ws || ws.readyState !== ws.OPEN) {
      return Promise.reject(new GridError('TRANSPORT_FAILED', 'Relay not connected'));
    }

    const seq = ++this.seq;
    return new Promise<OkReply>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiting.delete(seq);
        reject(new GridError('TRANSPORT_FAILED', `Relay did not answer ${operation.type} within ${this.requestTimeoutMs}ms`));
      }, this.requestTimeoutMs);
      this.waiting.set(seq, { resolve, reject, timer });
      ws.send(JSON.stringify({ ...operation, seq }));
    });
  }

  private handleReply(raw: string): void {
    let msg: unknown;
    try {
      msg = JSON.parse(raw);
    } catch {
      console.warn('[RelayTransport] Ignoring non-JSON frame from relay');
      return;
    }
    if (!isRelayReply(msg)) {
      console.warn('[RelayTransport] Ignoring unexpected frame from relay');
      return;
    }
    if (msg.seq === undefined) {
      console.warn(`[RelayTransport] Relay error: ${msg.type === 'error' ? msg.error : 'no sequence number'}`);
      return;
    }

    const waiting = this.waiting.get(msg.seq);
    if (!waiting) return;
    this.waiting.delete(msg.seq);
    clearTimeout(waiting.timer);

    if (msg.type === 'error') {
      waiting.reject(new GridError('TRANSPORT_FAILED', msg.error, { seq: msg.seq }));
    } else {
      waiting.resolve(msg);
    }
  }

  private rejectAll(reason: string): void {
    for (const waiting of this.waiting.values()) {
      clearTimeout(waiting.timer);
      waiting.reject(new GridError('TRANSPORT_FAILED', reason));
    }
    this.waiting.clear();
  }
}
