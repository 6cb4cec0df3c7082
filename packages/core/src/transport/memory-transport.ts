import { GridError } from '../errors/index.js';
import type { Mailbox, Transport } from './transport.js';

interface StoredRequest {
  destination: string;
  bytes: Uint8Array;
}

/**
 * In-process transport: both ends share one instance.
 */
export class MemoryTransport implements Transport, Mailbox {
  private requests = new Map<string, StoredRequest>();
  private responses = new Map<string, Uint8Array>();

  async put(correlationId: string, destination: string, bytes: Uint8Array): Promise<void> {
    if (this.requests.has(correlationId)) return;
    this.requests.set(correlationId, { destination, bytes });
  }

  async get(correlationId: string): Promise<Uint8Array | null> {
    return this.responses.get(correlationId) ?? null;
  }

  async discard(correlationId: string): Promise<void> {
    this.requests.delete(correlationId);
    this.responses.delete(correlationId);
  }

  async listRequests(address: string): Promise<string[]> {
    const ids: string[] = [];
    for (const [id, request] of this.requests) {
      if (request.destination === address && !this.responses.has(id)) {
        ids.push(id);
      }
    }
    return ids;
  }

  async readRequest(correlationId: string): Promise<Uint8Array | null> {
    return this.requests.get(correlationId)?.bytes ?? null;
  }

  async respond(correlationId: string, bytes: Uint8Array): Promise<void> {
    if (!this.requests.has(correlationId)) {
      throw new GridError('TRANSPORT_FAILED', `No request with correlation id ${correlationId}`, { correlationId });
    }
    if (this.responses.has(correlationId)) return;
    this.responses.set(correlationId, bytes);
  }

  /** Destination of a stored request, if any */
  destinationOf(correlationId: string): string | undefined {
    return this.requests.get(correlationId)?.destination;
  }

  get requestCount(): number {
    return this.requests.size;
  }
}
