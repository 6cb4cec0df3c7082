/**
 * Node identifiers.
 *
 * A participant is addressed by a stable string (usually an email-like
 * address). The round protocol works with unsigned 32-bit node ids, derived
 * from the address with CRC-32 so no identity table has to be persisted.
 */

export type NodeId = number;

/** Node id used by the coordinator itself */
export const COORDINATOR_NODE_ID: NodeId = 1;

const CRC32_TABLE = buildCrc32Table();

function buildCrc32Table(): Uint32Array {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
}

/**
 * CRC-32 (IEEE 802.3) of a byte sequence, as an unsigned integer.
 */
export function crc32(bytes: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of bytes) {
    crc = CRC32_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

export function addressToNodeId(address: string): NodeId {
  return crc32(new TextEncoder().encode(address));
}

export function isNodeId(value: unknown): value is NodeId {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xffffffff;
}
