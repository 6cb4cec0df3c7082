/**
 * End-to-end encryption of envelope bytes.
 *
 * Uses TweetNaCl box (x25519-xsalsa20-poly1305) with a fresh ephemeral
 * keypair per message, so only the recipient's secret key opens it.
 */

import nacl from 'tweetnacl';
import { bytesToHex, hexToBytes } from './hex.js';

// ============================================
// Types
// ============================================

export interface EncryptionKeypair {
  publicKey: Uint8Array;
  secretKey: Uint8Array;
}

export interface EncryptedPayload {
  /** Encrypted ciphertext (hex encoded) */
  ciphertext: string;
  /** Random nonce used for encryption (hex encoded) */
  nonce: string;
  /** Sender's ephemeral public key for this message (hex encoded) */
  ephemeralPublicKey: string;
}

export const ENCRYPTION_KEY_LENGTH = nacl.box.publicKeyLength;

// ============================================
// Key Generation
// ============================================

export function generateEncryptionKeypair(): EncryptionKeypair {
  const keypair = nacl.box.keyPair();
  return {
    publicKey: keypair.publicKey,
    secretKey: keypair.secretKey,
  };
}

export function encryptionKeyToHex(publicKey: Uint8Array): string {
  return bytesToHex(publicKey);
}

export function hexToEncryptionKey(hex: string): Uint8Array {
  return hexToBytes(hex);
}

// ============================================
// Encryption / Decryption
// ============================================

/**
 * Encrypt raw bytes for a recipient.
 *
 * @throws Error from tweetnacl if the public key has the wrong size
 */
export function encryptBytes(plaintext: Uint8Array, recipientPublicKey: Uint8Array): EncryptedPayload {
  const ephemeralKeypair = nacl.box.keyPair();
  const nonce = nacl.randomBytes(nacl.box.nonceLength);
  const ciphertext = nacl.box(plaintext, nonce, recipientPublicKey, ephemeralKeypair.secretKey);

  return {
    ciphertext: bytesToHex(ciphertext),
    nonce: bytesToHex(nonce),
    ephemeralPublicKey: bytesToHex(ephemeralKeypair.publicKey),
  };
}

/**
 * Decrypt an encrypted payload, or null if it does not open with this key
 * (wrong key, tampered ciphertext, malformed hex).
 */
export function decryptBytes(encrypted: EncryptedPayload, recipientSecretKey: Uint8Array): Uint8Array | null {
  try {
    const ciphertext = hexToBytes(encrypted.ciphertext);
    const nonce = hexToBytes(encrypted.nonce);
    const senderPublicKey = hexToBytes(encrypted.ephemeralPublicKey);
    return nacl.box.open(ciphertext, nonce, senderPublicKey, recipientSecretKey);
  } catch {
    return null;
  }
}

// ============================================
// Type Guards
// ============================================

export function isEncryptedPayload(payload: unknown): payload is EncryptedPayload {
  if (typeof payload !== 'object' || payload === null) return false;
  const p = payload as Record<string, unknown>;
  return typeof p.ciphertext === 'string' && typeof p.nonce === 'string' && typeof p.ephemeralPublicKey === 'string';
}
