import { describe, expect, it } from 'vitest';
import { NodeIdCollisionError, UnknownNodeError, UnknownParticipantError } from '../errors/index.js';
import { IdentityMapper } from './identity-mapper.js';
import { addressToNodeId } from './node-id.js';

const ADDRESSES = ['alice@example.org', 'bob@example.org', 'carol@example.org'];

describe('IdentityMapper', () => {
  it('resolves every known address to its CRC-32 node id', () => {
    const mapper = new IdentityMapper(ADDRESSES);
    for (const address of ADDRESSES) {
      expect(mapper.resolve(address)).toBe(addressToNodeId(address));
    }
  });

  it('is deterministic across instances', () => {
    const first = new IdentityMapper(ADDRESSES);
    const second = new IdentityMapper([...ADDRESSES].reverse());
    for (const address of ADDRESSES) {
      expect(first.resolve(address)).toBe(second.resolve(address));
      expect(first.resolve(address)).toBe(first.resolve(address));
    }
  });

  it('reverses node ids back to addresses', () => {
    const mapper = new IdentityMapper(ADDRESSES);
    for (const address of ADDRESSES) {
      expect(mapper.reverse(mapper.resolve(address))).toBe(address);
    }
  });

  it('throws UnknownParticipantError for unknown addresses', () => {
    const mapper = new IdentityMapper(ADDRESSES);
    expect(() => mapper.resolve('not-a-participant')).toThrow(UnknownParticipantError);
  });

  it('throws UnknownNodeError for unknown node ids', () => {
    const mapper = new IdentityMapper(ADDRESSES);
    expect(() => mapper.reverse(12345)).toThrow(UnknownNodeError);
  });

  it('collapses duplicate addresses', () => {
    const mapper = new IdentityMapper(['alice@example.org', 'alice@example.org']);
    expect(mapper.size).toBe(1);
    expect(mapper.participants()).toEqual([
      { address: 'alice@example.org', nodeId: addressToNodeId('alice@example.org') },
    ]);
  });

  it('lists node ids in participant order', () => {
    const mapper = new IdentityMapper(ADDRESSES);
    expect(mapper.nodeIds()).toEqual(ADDRESSES.map(addressToNodeId));
  });

  it('rejects two addresses mapping to the same node id', () => {
    expect(() => new IdentityMapper(['a', 'b'], { hash: () => 7 })).toThrow(NodeIdCollisionError);
  });

  it('rejects an address mapping to the coordinator node id', () => {
    expect(() => new IdentityMapper(['a'], { hash: () => 1 })).toThrow(NodeIdCollisionError);
    expect(() => new IdentityMapper(['a'], { hash: () => 9, selfNodeId: 9 })).toThrow(NodeIdCollisionError);
  });

  it('returns frozen participants', () => {
    const mapper = new IdentityMapper(ADDRESSES);
    const [first] = mapper.participants();
    expect(Object.isFrozen(first)).toBe(true);
  });
});
