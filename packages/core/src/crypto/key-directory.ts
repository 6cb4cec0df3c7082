import { bytesToHex, hexToBytes } from './hex.js';
import { GridError } from '../errors/index.js';
import { ENCRYPTION_KEY_LENGTH, type EncryptionKeypair, generateEncryptionKeypair } from './encryption.js';

/**
 * Source of participants' public encryption keys.
 */
export interface KeyDirectory {
  lookup(address: string): Uint8Array | undefined;
}

export class MemoryKeyDirectory implements KeyDirectory {
  private keys = new Map<string, Uint8Array>();

  constructor(entries?: Iterable<[string, Uint8Array]>) {
    for (const [address, key] of entries ?? []) {
      this.keys.set(address, key);
    }
  }

  register(address: string, publicKey: Uint8Array): void {
    this.keys.set(address, publicKey);
  }

  lookup(address: string): Uint8Array | undefined {
    return this.keys.get(address);
  }

  get size(): number {
    return this.keys.size;
  }
}

/**
 * Load a directory from a JSON file mapping addresses to hex public keys.
 * Entries whose value is not a string are skipped.
 */
export async function loadKeyDirectory(filePath: string): Promise<MemoryKeyDirectory> {
  const { readFile } = await import('node:fs/promises');
  const raw = await readFile(filePath, 'utf-8');
  const data: unknown = JSON.parse(raw);
  const directory = new MemoryKeyDirectory();
  if (typeof data !== 'object' || data === null) {
    return directory;
  }
  for (const [address, value] of Object.entries(data)) {
    if (typeof value === 'string') {
      directory.register(address, hexToBytes(value));
    }
  }
  return directory;
}

interface StoredKeypair {
  publicKey: string;
  secretKey: string;
}

/**
 * Load this node's encryption keypair from disk, creating and saving a new
 * one when the file does not exist yet.
 */
export async function loadOrCreateEncryptionKeypair(filePath: string): Promise<EncryptionKeypair> {
  const { mkdir, readFile, writeFile } = await import('node:fs/promises');
  const { dirname } = await import('node:path');

  let raw: string | null = null;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (!isMissingFile(error)) throw error;
  }

  if (raw !== null) {
    const data: unknown = JSON.parse(raw);
    if (!isStoredKeypair(data)) {
      throw new GridError('INVALID_CONFIG', `Keypair file ${filePath} does not hold a hex publicKey and secretKey`, {
        filePath,
      });
    }
    return {
      publicKey: hexToBytes(data.publicKey),
      secretKey: hexToBytes(data.secretKey),
    };
  }

  const keypair = generateEncryptionKeypair();
  const stored: StoredKeypair = {
    publicKey: bytesToHex(keypair.publicKey),
    secretKey: bytesToHex(keypair.secretKey),
  };
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(stored, null, 2), { encoding: 'utf-8', mode: 0o600 });
  return keypair;
}

const STORED_KEY_PATTERN = new RegExp(`^[0-9a-fA-F]{${ENCRYPTION_KEY_LENGTH * 2}}$`);

function isStoredKeypair(value: unknown): value is StoredKeypair {
  if (typeof value !== 'object' || value === null) return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.publicKey === 'string' &&
    STORED_KEY_PATTERN.test(v.publicKey) &&
    typeof v.secretKey === 'string' &&
    STORED_KEY_PATTERN.test(v.secretKey)
  );
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
