export {
  NULL_ENTITY,
  StringTable,
  type EntityId,
  type EntityStore,
  type StringResolver,
} from "./entity-store";
export { MemoryWorld, type MemoryWorldOptions } from "./memory-world";
