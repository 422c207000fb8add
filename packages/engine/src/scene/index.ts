// Scene exports
export {
  Scene,
  SceneState,
  AssetType,
  guessAssetType,
  collectAssetRefs,
  deriveSceneName,
  type AssetRef,
  type AssetLoader,
  type SceneContext,
  type SceneInit,
} from "./scene";
export {
  SceneManager,
  loadSceneString,
  DEFAULT_SCENE_CAPACITY,
  type SceneEvent,
  type SceneManagerOptions,
} from "./scene-manager";
export {
  writeEntities,
  writeWorldScene,
  captureEntity,
  type EntityWriterOptions,
} from "./entity-writer";
