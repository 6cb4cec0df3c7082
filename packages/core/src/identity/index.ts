export { COORDINATOR_NODE_ID, crc32, addressToNodeId, isNodeId } from './node-id.js';
export type { NodeId } from './node-id.js';
export { IdentityMapper } from './identity-mapper.js';
export type { Participant, IdentityMapperOptions } from './identity-mapper.js';
