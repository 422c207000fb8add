// Scene Manager - caches scenes by path and switches the active one

import {
  Err,
  Errors,
  Ok,
  wrapError,
  type FileSystem,
  type KeystoneError,
  type Result,
} from "@keystone/core";
import { parseScene, writeSceneFile } from "@keystone/lang";
import { SignalBus, type SceneSignal } from "../signals/signal-bus";
import type { EntityStore } from "../world/entity-store";
import { Scene, SceneState, deriveSceneName, type SceneContext } from "./scene";

export const DEFAULT_SCENE_CAPACITY = 64;

export interface SceneEvent {
  scene?: Scene;
  name: string;
  path?: string;
  error?: KeystoneError;
}

export interface SceneManagerOptions {
  fileSystem: FileSystem;
  context?: SceneContext;
  capacity?: number;
  signals?: SignalBus;
}

/** Parse a scene from text; the result is not cached anywhere */
export function loadSceneString(
  source: string,
  name?: string,
  ctx: SceneContext = {}
): Result<Scene, KeystoneError> {
  const parsed = parseScene(source, { name, limits: ctx.limits });
  if (!parsed.ok) return parsed;
  return Ok(new Scene(parsed.value, { name: name ?? "unnamed" }));
}

export class SceneManager {
  readonly signals: SignalBus;
  readonly capacity: number;
  lastError?: KeystoneError;

  private fileSystem: FileSystem;
  private context: SceneContext;
  private scenes: Map<string, Scene> = new Map();
  private active?: Scene;

  constructor(options: SceneManagerOptions) {
    this.fileSystem = options.fileSystem;
    this.context = options.context ?? {};
    this.capacity = options.capacity ?? DEFAULT_SCENE_CAPACITY;
    this.signals = options.signals ?? new SignalBus();
  }

  get count(): number {
    return this.scenes.size;
  }

  // ============ Loading ============

  load(path: string): Result<Scene, KeystoneError> {
    const cached = this.scenes.get(path);
    if (cached) return Ok(cached);

    if (this.scenes.size >= this.capacity) {
      return this.fail(Errors.cacheFull("Scene", this.capacity));
    }

    let source: string;
    try {
      source = this.fileSystem.read(path);
    } catch (error) {
      return this.fail(wrapError(error, path));
    }

    const parsed = parseScene(source, { name: path, limits: this.context.limits });
    if (!parsed.ok) {
      return this.fail(parsed.error);
    }

    const scene = new Scene(parsed.value, { name: deriveSceneName(path), path });
    this.scenes.set(path, scene);
    this.emit("scene.loaded", scene);
    return Ok(scene);
  }

  lookup(path: string): Scene | undefined {
    return this.scenes.get(path);
  }

  // ============ Lifecycle ============

  instantiate(scene: Scene, world: EntityStore): Result<void, KeystoneError> {
    const result = scene.instantiate(world, this.context);
    if (!result.ok) {
      this.lastError = result.error;
      return result;
    }
    this.emit("scene.instantiated", scene);
    return result;
  }

  uninstantiate(scene: Scene, world?: EntityStore): Result<void, KeystoneError> {
    const result = scene.uninstantiate(world);
    if (!result.ok) {
      this.lastError = result.error;
      return result;
    }
    this.emit("scene.uninstantiated", scene);
    return result;
  }

  getActive(): Scene | undefined {
    return this.active;
  }

  setActive(scene: Scene | undefined): void {
    this.active = scene;
    if (scene) this.emit("scene.activated", scene);
  }

  /**
   * Load `path`, tear down the active scene and instantiate the new one.
   * A scene that fails to load leaves the active scene untouched. A scene
   * that fails to instantiate brings the previous one back when possible.
   */
  transition(path: string, world: EntityStore): Result<Scene, KeystoneError> {
    const loaded = this.load(path);
    if (!loaded.ok) {
      this.signals.emit("scene.transition.failed", { name: path, path, error: loaded.error });
      return loaded;
    }

    const next = loaded.value;
    const previous = this.active;

    if (previous?.isInstantiated) {
      this.uninstantiate(previous, world);
    }

    const instantiated = this.instantiate(next, world);
    if (!instantiated.ok) {
      this.emit("scene.transition.failed", next, instantiated.error);

      if (previous && previous.state === SceneState.PARSED && this.instantiate(previous, world).ok) {
        this.emit("scene.transition.rollback", previous);
      }

      this.lastError = instantiated.error;
      return Err(instantiated.error);
    }

    this.setActive(next);
    return Ok(next);
  }

  // ============ Writing ============

  writeSceneFile(scene: Scene, path: string): Result<void, KeystoneError> {
    const result = writeSceneFile(this.fileSystem, scene.roots, path);
    if (!result.ok) this.lastError = result.error;
    return result;
  }

  destroy(): void {
    for (const scene of this.scenes.values()) {
      scene.destroy();
    }
    this.scenes.clear();
    this.active = undefined;
  }

  private fail(error: KeystoneError): Result<Scene, KeystoneError> {
    this.lastError = error;
    return Err(error);
  }

  private emit(signal: SceneSignal, scene: Scene, error?: KeystoneError): void {
    this.signals.emit(signal, { scene, name: scene.name, path: scene.path, error });
  }
}
