/**
 * Store-and-forward transport contracts.
 *
 * A Transport is what the coordinator talks to: it writes request bytes for
 * a destination under a correlation id and later reads the response written
 * under the same id. A Mailbox is the participant's view of the same store.
 *
 * Bundled transports re-read a response until it is discarded, and ignore a
 * second put or respond for an id that already has one.
 */

export interface Transport {
  put(correlationId: string, destination: string, bytes: Uint8Array): Promise<void>;
  /** Response bytes, or null while no response has been written */
  get(correlationId: string): Promise<Uint8Array | null>;
  /** Drop the request and its response */
  discard(correlationId: string): Promise<void>;
}

export interface Mailbox {
  /** Correlation ids addressed to `address` that have no response yet */
  listRequests(address: string): Promise<string[]>;
  readRequest(correlationId: string): Promise<Uint8Array | null>;
  respond(correlationId: string, bytes: Uint8Array): Promise<void>;
}
