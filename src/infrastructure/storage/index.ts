export { MemoryCircuitStorage } from './memory-circuit.storage';
export { DEFAULT_BASE_NAMESPACE, RedisCircuitStorage, SET_IF_GREATER_SCRIPT } from './redis-circuit.storage';
export type { RedisCircuitStorageOptions } from './redis-circuit.storage';
