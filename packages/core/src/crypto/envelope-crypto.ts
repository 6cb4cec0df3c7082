import { GridError, KeyParameterError, MissingKeyError } from '../errors/index.js';
import {
  ENCRYPTION_KEY_LENGTH,
  type EncryptionKeypair,
  decryptBytes,
  encryptBytes,
  isEncryptedPayload,
} from './encryption.js';
import type { KeyDirectory } from './key-directory.js';

/**
 * Encryption collaborator used by the transport adapter.
 *
 * Implementations signal absent or unusable key material with
 * MissingKeyError / KeyParameterError; any other error aborts only the
 * message being processed.
 */
export interface EnvelopeCrypto {
  encrypt(bytes: Uint8Array, recipientAddress: string): Uint8Array;
  decrypt(bytes: Uint8Array, senderAddress: string): Uint8Array;
}

export class NaclEnvelopeCrypto implements EnvelopeCrypto {
  private keypair: EncryptionKeypair;
  private directory: KeyDirectory;

  constructor(keypair: EncryptionKeypair, directory: KeyDirectory) {
    this.keypair = keypair;
    this.directory = directory;
  }

  get publicKey(): Uint8Array {
    return this.keypair.publicKey;
  }

  encrypt(bytes: Uint8Array, recipientAddress: string): Uint8Array {
    const recipientKey = this.directory.lookup(recipientAddress);
    if (!recipientKey) {
      throw new MissingKeyError(recipientAddress);
    }
    if (recipientKey.length !== ENCRYPTION_KEY_LENGTH) {
      throw new KeyParameterError(
        recipientAddress,
        `expected ${ENCRYPTION_KEY_LENGTH} bytes, got ${recipientKey.length}`,
      );
    }
    const encrypted = encryptBytes(bytes, recipientKey);
    return new TextEncoder().encode(JSON.stringify(encrypted));
  }

  decrypt(bytes: Uint8Array, senderAddress: string): Uint8Array {
    let parsed: unknown;
    try {
      parsed = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(bytes));
    } catch {
      throw new GridError('CRYPTO_FAILED', `Message from ${senderAddress} is not an encrypted payload`);
    }
    if (!isEncryptedPayload(parsed)) {
      throw new GridError('CRYPTO_FAILED', `Message from ${senderAddress} is not an encrypted payload`);
    }
    const plaintext = decryptBytes(parsed, this.keypair.secretKey);
    if (!plaintext) {
      throw new GridError('CRYPTO_FAILED', `Could not decrypt message from ${senderAddress}`);
    }
    return plaintext;
  }
}
