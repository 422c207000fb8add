// Prefab exports
export { applyFieldValue, readFieldValue } from "./field-applier";
export {
  spawnPrefab,
  spawnPrefabAt,
  DEFAULT_POSITION_COMPONENT,
  type SpawnContext,
  type PrefabSource,
} from "./spawner";
export {
  PrefabRegistry,
  loadPrefabString,
  DEFAULT_PREFAB_CAPACITY,
  type PrefabRegistryOptions,
} from "./prefab-registry";
export { writePrefabFile } from "@keystone/lang";
