/**
 * Scene - parsed root entities plus the live entities spawned from them
 *
 * State flow: UNLOADED -> PARSED <-> INSTANTIATED, with UNLOADING while
 * tracked entities are being deleted.
 */

import {
  Err,
  Errors,
  KeystoneError,
  Ok,
  walkPrefab,
  type Diagnostics,
  type ParseLimits,
  type Prefab,
  type Result,
} from "@keystone/core";
import { writeScene } from "@keystone/lang";
import type { ReflectRegistry } from "../reflect/reflect-registry";
import { spawnPrefab, type PrefabSource } from "../prefab/spawner";
import { NULL_ENTITY, type EntityId, type EntityStore } from "../world/entity-store";

export enum SceneState {
  UNLOADED = "unloaded",
  PARSED = "parsed",
  INSTANTIATED = "instantiated",
  UNLOADING = "unloading",
}

export enum AssetType {
  TEXTURE = "texture",
  SOUND = "sound",
  MUSIC = "music",
  PREFAB = "prefab",
  UNKNOWN = "unknown",
}

export interface AssetRef {
  path: string;
  type: AssetType;
}

/** Loads non-prefab assets during preloading; returns false when it fails */
export interface AssetLoader {
  load(ref: AssetRef): boolean;
}

export interface SceneContext {
  reflect?: ReflectRegistry;
  prefabs?: PrefabSource;
  assets?: AssetLoader;
  /** Run preloadAssets before spawning */
  preloadAssets?: boolean;
  diagnostics?: Diagnostics;
  positionComponent?: string;
  limits?: Partial<ParseLimits>;
}

// ============================================================================
// Asset references
// ============================================================================

const EXTENSIONS: Record<string, AssetType> = {
  png: AssetType.TEXTURE,
  jpg: AssetType.TEXTURE,
  jpeg: AssetType.TEXTURE,
  bmp: AssetType.TEXTURE,
  tga: AssetType.TEXTURE,
  gif: AssetType.TEXTURE,
  wav: AssetType.SOUND,
  ogg: AssetType.SOUND,
  mp3: AssetType.SOUND,
  flac: AssetType.SOUND,
  mid: AssetType.MUSIC,
  midi: AssetType.MUSIC,
  mod: AssetType.MUSIC,
  xm: AssetType.MUSIC,
  it: AssetType.MUSIC,
  s3m: AssetType.MUSIC,
  prefab: AssetType.PREFAB,
};

// Extension of the last path segment, lower-cased
function extensionOf(path: string): string | undefined {
  const segment = path.split(/[\\/]/).pop() ?? "";
  const dot = segment.lastIndexOf(".");
  if (dot < 0 || dot === segment.length - 1) return undefined;
  return segment.slice(dot + 1).toLowerCase();
}

export function guessAssetType(path: string): AssetType {
  const ext = extensionOf(path);
  if (ext === undefined) return AssetType.UNKNOWN;
  return EXTENSIONS[ext] ?? AssetType.UNKNOWN;
}

/** Base prefab references and string values that look like file paths */
export function collectAssetRefs(roots: readonly Prefab[]): AssetRef[] {
  const refs: AssetRef[] = [];
  const seen = new Set<string>();

  const add = (path: string, type: AssetType) => {
    if (path.length === 0 || seen.has(path)) return;
    seen.add(path);
    refs.push({ path, type });
  };

  for (const root of roots) {
    walkPrefab(root, (node) => {
      if (node.basePrefab !== undefined) {
        add(node.basePrefab, AssetType.PREFAB);
      }
      for (const component of node.components) {
        for (const assign of component.fields) {
          if (assign.value.type === "string" && extensionOf(assign.value.value) !== undefined) {
            add(assign.value.value, guessAssetType(assign.value.value));
          }
        }
      }
      return true;
    });
  }

  return refs;
}

// Base name without extension
export function deriveSceneName(path: string): string {
  const segment = path.split(/[\\/]/).pop() ?? path;
  const dot = segment.lastIndexOf(".");
  return dot >= 0 ? segment.slice(0, dot) : segment;
}

// ============================================================================
// Scene
// ============================================================================

export interface SceneInit {
  name?: string;
  path?: string;
}

export class Scene {
  readonly name: string;
  readonly path?: string;
  readonly assetRefs: readonly AssetRef[];
  private _state: SceneState;
  private _roots: Prefab[];
  private entities: EntityId[] = [];
  private rootEntities: EntityId[] = [];
  private world?: EntityStore;

  constructor(roots: Prefab[], init: SceneInit = {}) {
    this._roots = roots;
    this.name = init.name ?? "unnamed";
    this.path = init.path;
    this.assetRefs = collectAssetRefs(roots);
    this._state = SceneState.PARSED;
  }

  get state(): SceneState {
    return this._state;
  }

  get roots(): readonly Prefab[] {
    return this._roots;
  }

  get rootCount(): number {
    return this._roots.length;
  }

  get entityCount(): number {
    return this.entities.length;
  }

  get isInstantiated(): boolean {
    return this._state === SceneState.INSTANTIATED;
  }

  /** Every tracked entity, roots before their descendants */
  getEntities(): EntityId[] {
    return [...this.entities];
  }

  getRootEntities(): EntityId[] {
    return [...this.rootEntities];
  }

  /** First live tracked entity with this name, or NULL_ENTITY */
  findEntity(name: string): EntityId {
    const world = this.world;
    if (!world) return NULL_ENTITY;

    for (const entity of this.entities) {
      if (!world.isAlive(entity)) continue;
      if (world.getName(entity) === name) return entity;
    }
    return NULL_ENTITY;
  }

  /**
   * Spawn every root at its declared position, tracking each entity as the
   * world creates it. A root the world cannot create, or a strict diagnostic
   * raised mid-spawn, rolls back everything spawned so far.
   */
  instantiate(world: EntityStore, ctx: SceneContext = {}): Result<void, KeystoneError> {
    if (this._state === SceneState.INSTANTIATED) {
      return Err(Errors.alreadyInstantiated(this.name));
    }
    if (this._state !== SceneState.PARSED) {
      return Err(Errors.sceneNotParsed(this.name));
    }

    this.entities = [];
    this.rootEntities = [];

    if (ctx.preloadAssets) {
      this.preloadAssets(ctx);
    }

    for (const [index, root] of this._roots.entries()) {
      let entity: EntityId;
      try {
        entity = spawnPrefab(root, {
          world,
          reflect: ctx.reflect,
          prefabs: ctx.prefabs,
          diagnostics: ctx.diagnostics,
          positionComponent: ctx.positionComponent,
          onCreate: (created) => this.entities.push(created),
        });
      } catch (error) {
        this.deleteTracked(world);
        if (error instanceof KeystoneError) return Err(error);
        throw error;
      }

      if (entity === NULL_ENTITY) {
        this.deleteTracked(world);
        return Err(Errors.instantiateFailed(this.name, root.name ?? `#${index}`));
      }

      this.rootEntities.push(entity);
    }

    this.world = world;
    this._state = SceneState.INSTANTIATED;
    return Ok(undefined);
  }

  /** Delete tracked entities, children first, and return to PARSED */
  uninstantiate(world?: EntityStore): Result<void, KeystoneError> {
    const target = world ?? this.world;
    if (this._state !== SceneState.INSTANTIATED || !target) {
      return Err(Errors.notInstantiated(this.name));
    }

    this._state = SceneState.UNLOADING;
    this.deleteTracked(target);
    this.world = undefined;
    this._state = SceneState.PARSED;
    return Ok(undefined);
  }

  /**
   * Load every referenced asset: prefabs through the prefab source, the rest
   * through the asset loader when one is given. True when nothing failed.
   */
  preloadAssets(ctx: SceneContext): boolean {
    let allLoaded = true;

    for (const ref of this.assetRefs) {
      if (ref.type === AssetType.PREFAB) {
        if (ctx.prefabs && !ctx.prefabs.load(ref.path).ok) {
          allLoaded = false;
        }
      } else if (ctx.assets && !ctx.assets.load(ref)) {
        allLoaded = false;
      }
    }

    return allLoaded;
  }

  write(): string {
    return writeScene(this._roots);
  }

  destroy(): void {
    if (this.isInstantiated) {
      this.uninstantiate();
    }
    this._roots = [];
    this._state = SceneState.UNLOADED;
  }

  private deleteTracked(world: EntityStore): void {
    for (let i = this.entities.length - 1; i >= 0; i--) {
      const entity = this.entities[i];
      if (world.isAlive(entity)) {
        world.delete(entity);
      }
    }
    this.entities = [];
    this.rootEntities = [];
  }
}
