export {
  type EncryptionKeypair,
  type EncryptedPayload,
  ENCRYPTION_KEY_LENGTH,
  generateEncryptionKeypair,
  encryptionKeyToHex,
  hexToEncryptionKey,
  encryptBytes,
  decryptBytes,
  isEncryptedPayload,
} from './encryption.js';
export { type EnvelopeCrypto, NaclEnvelopeCrypto } from './envelope-crypto.js';
export {
  type KeyDirectory,
  MemoryKeyDirectory,
  loadKeyDirectory,
  loadOrCreateEncryptionKeypair,
} from './key-directory.js';
export { bytesToHex, hexToBytes } from './hex.js';
export { newCorrelationId } from './secure-random.js';
