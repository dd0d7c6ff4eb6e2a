export * from './types';
export * from './schemas';
export * from './errors';
export * from './where';
export { createLogger, type Logger } from './logger';
export { ArrayCollection } from './collection';
export { UnionView, type UnionSource } from './union';
export {
  declareNetwork,
  declareUnion,
  declareHasMany,
  normalizeNetwork,
  type AccessorMap,
  type NormalizedNetwork,
  type OwnerInfo
} from './accessors';
export { NodeType, NetworkNode, type AccessorInfo, type NodeTypeOptions } from './node';
export { NodeRegistry, buildRegistry, findUp, loadCatalog, loadNetworks } from './registry';
export { MemoryStore } from './memory-store';
