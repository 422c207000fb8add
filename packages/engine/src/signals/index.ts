// Signals exports
export {
  SCENE_SIGNALS,
  type SceneSignal,
  type SceneListener,
  SignalBus,
} from "./signal-bus";
