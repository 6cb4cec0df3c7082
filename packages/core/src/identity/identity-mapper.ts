import { NodeIdCollisionError, UnknownNodeError, UnknownParticipantError } from '../errors/index.js';
import { COORDINATOR_NODE_ID, type NodeId, addressToNodeId } from './node-id.js';

export interface Participant {
  address: string;
  nodeId: NodeId;
}

export interface IdentityMapperOptions {
  /** Node id reserved for the coordinator; no participant may map onto it */
  selfNodeId?: NodeId;
  /** Address hash, CRC-32 unless overridden */
  hash?: (address: string) => NodeId;
}

/**
 * Bidirectional address <-> node id lookup over a fixed participant set.
 *
 * Built once and never mutated. Two addresses hashing to the same node id
 * (or an address hashing to the coordinator's id) would silently misroute
 * messages, so construction rejects such a set.
 */
export class IdentityMapper {
  private byAddress = new Map<string, Participant>();
  private byNodeId = new Map<NodeId, Participant>();

  constructor(addresses: readonly string[], options: IdentityMapperOptions = {}) {
    const selfNodeId = options.selfNodeId ?? COORDINATOR_NODE_ID;
    const hash = options.hash ?? addressToNodeId;

    for (const address of addresses) {
      if (this.byAddress.has(address)) continue;

      const nodeId = hash(address);
      if (nodeId === selfNodeId) {
        throw new NodeIdCollisionError(nodeId, address, '<coordinator>');
      }
      const existing = this.byNodeId.get(nodeId);
      if (existing) {
        throw new NodeIdCollisionError(nodeId, existing.address, address);
      }

      const participant: Participant = Object.freeze({ address, nodeId });
      this.byAddress.set(address, participant);
      this.byNodeId.set(nodeId, participant);
    }
  }

  resolve(address: string): NodeId {
    const participant = this.byAddress.get(address);
    if (!participant) {
      throw new UnknownParticipantError(address);
    }
    return participant.nodeId;
  }

  reverse(nodeId: NodeId): string {
    return this.participantFor(nodeId).address;
  }

  participantFor(nodeId: NodeId): Participant {
    const participant = this.byNodeId.get(nodeId);
    if (!participant) {
      throw new UnknownNodeError(nodeId);
    }
    return participant;
  }

  has(address: string): boolean {
    return this.byAddress.has(address);
  }

  participants(): Participant[] {
    return Array.from(this.byAddress.values());
  }

  nodeIds(): NodeId[] {
    return Array.from(this.byNodeId.keys());
  }

  get size(): number {
    return this.byAddress.size;
  }
}
