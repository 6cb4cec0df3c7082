/**
 * File-based transport for synced folders.
 *
 * Layout, relative to a shared root:
 *   {root}/{to}/app_data/{app}/rpc/{endpoint}/{sender}/{id}.request
 *   {root}/{to}/app_data/{app}/rpc/{endpoint}/{sender}/{id}.response
 *
 * Files are written to a temporary name and renamed, so a reader never sees
 * a partial file.
 */

import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join, sep } from 'node:path';
import { InvalidArgumentError } from '../errors/index.js';
import type { Mailbox, Transport } from './transport.js';

export const DEFAULT_ENDPOINT = 'messages';

const REQUEST_SUFFIX = '.request';
const RESPONSE_SUFFIX = '.response';

export interface FileTransportOptions {
  rootDir: string;
  appName: string;
  endpoint?: string;
}

function safeSegment(value: string, label: string): string {
  if (value.length === 0 || value === '.' || value === '..' || /[/\\\0]/.test(value)) {
    throw new InvalidArgumentError(`Invalid ${label} for a path segment: "${value}"`, { [label]: value });
  }
  return value;
}

function inboxDir(options: FileTransportOptions, owner: string): string {
  return join(
    options.rootDir,
    safeSegment(owner, 'address'),
    'app_data',
    safeSegment(options.appName, 'appName'),
    'rpc',
    safeSegment(options.endpoint ?? DEFAULT_ENDPOINT, 'endpoint'),
  );
}

async function writeAtomic(path: string, bytes: Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp`;
  await writeFile(tmp, bytes);
  await rename(tmp, path);
}

async function readIfExists(path: string): Promise<Uint8Array | null> {
  try {
    return new Uint8Array(await readFile(path));
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function responsePathFor(requestPath: string): string {
  return `${requestPath.slice(0, -REQUEST_SUFFIX.length)}${RESPONSE_SUFFIX}`;
}

/**
 * Coordinator side: writes requests into participants' inboxes.
 */
export class FileTransport implements Transport {
  private options: FileTransportOptions;
  private senderAddress: string;
  // correlationId -> request path. Entries live until discard: a request
  // left over from a timed-out round can still be pulled later.
  private pendingFutures = new Map<string, string>();

  constructor(senderAddress: string, options: FileTransportOptions) {
    this.senderAddress = safeSegment(senderAddress, 'address');
    this.options = options;
  }

  async put(correlationId: string, destination: string, bytes: Uint8Array): Promise<void> {
    if (this.pendingFutures.has(correlationId)) return;
    const requestPath = join(
      inboxDir(this.options, destination),
      this.senderAddress,
      `${safeSegment(correlationId, 'correlationId')}${REQUEST_SUFFIX}`,
    );
    await writeAtomic(requestPath, bytes);
    this.pendingFutures.set(correlationId, requestPath);
  }

  async get(correlationId: string): Promise<Uint8Array | null> {
    const requestPath = this.pendingFutures.get(correlationId);
    if (!requestPath) {
      console.warn(`[FileTransport] Unknown correlation id ${correlationId.slice(0, 8)}`);
      return null;
    }
    return readIfExists(responsePathFor(requestPath));
  }

  async discard(correlationId: string): Promise<void> {
    const requestPath = this.pendingFutures.get(correlationId);
    if (!requestPath) return;
    this.pendingFutures.delete(correlationId);
    await rm(requestPath, { force: true });
    await rm(responsePathFor(requestPath), { force: true });
  }

  /** Number of correlation ids not yet discarded */
  get trackedCount(): number {
    return this.pendingFutures.size;
  }
}

/**
 * Participant side: reads requests from its own inbox and writes responses
 * next to them.
 */
export class FileMailbox implements Mailbox {
  private options: FileTransportOptions;
  private knownRequests = new Map<string, string>(); // correlationId -> request path

  constructor(options: FileTransportOptions) {
    this.options = options;
  }

  async listRequests(address: string): Promise<string[]> {
    const inbox = inboxDir(this.options, address);
    let senders: string[];
    try {
      senders = await readdir(inbox);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const ids: string[] = [];
    const seen = new Set<string>();
    for (const sender of senders) {
      let files: string[];
      try {
        files = await readdir(join(inbox, sender));
      } catch {
        // not a directory
        continue;
      }
      const answered = new Set(files.filter((f) => f.endsWith(RESPONSE_SUFFIX)).map((f) => basename(f, RESPONSE_SUFFIX)));
      for (const file of files) {
        if (!file.endsWith(REQUEST_SUFFIX)) continue;
        const id = basename(file, REQUEST_SUFFIX);
        if (answered.has(id)) continue;
        this.knownRequests.set(id, join(inbox, sender, file));
        seen.add(id);
        ids.push(id);
      }
    }

    // Forget requests of this inbox that were answered or removed
    for (const [id, requestPath] of this.knownRequests) {
      if (requestPath.startsWith(inbox + sep) && !seen.has(id)) this.knownRequests.delete(id);
    }
    return ids;
  }

  async readRequest(correlationId: string): Promise<Uint8Array | null> {
    const requestPath = this.knownRequests.get(correlationId);
    if (!requestPath) return null;
    return readIfExists(requestPath);
  }

  async respond(correlationId: string, bytes: Uint8Array): Promise<void> {
    const requestPath = this.knownRequests.get(correlationId);
    if (!requestPath) {
      throw new InvalidArgumentError(`No request with correlation id ${correlationId}`, { correlationId });
    }
    const responsePath = responsePathFor(requestPath);
    if ((await readIfExists(responsePath)) !== null) return;
    await writeAtomic(responsePath, bytes);
    this.knownRequests.delete(correlationId);
  }
}
