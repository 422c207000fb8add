// Prefab Registry - parses prefab files once and caches the trees by path

import {
  Err,
  Errors,
  Ok,
  wrapError,
  type FileSystem,
  type KeystoneError,
  type ParseLimits,
  type Prefab,
  type Result,
} from "@keystone/core";
import { parsePrefab } from "@keystone/lang";
import type { ReflectRegistry } from "../reflect/reflect-registry";
import { NULL_ENTITY, type EntityId } from "../world/entity-store";
import { spawnPrefab, type PrefabSource, type SpawnContext } from "./spawner";

export const DEFAULT_PREFAB_CAPACITY = 256;

export interface PrefabRegistryOptions {
  fileSystem: FileSystem;
  /** Layouts used by spawn() */
  reflect?: ReflectRegistry;
  capacity?: number;
  limits?: Partial<ParseLimits>;
}

export class PrefabRegistry implements PrefabSource {
  readonly reflect?: ReflectRegistry;
  readonly capacity: number;
  lastError?: KeystoneError;

  private fileSystem: FileSystem;
  private limits?: Partial<ParseLimits>;
  private cache: Map<string, Prefab> = new Map();

  constructor(options: PrefabRegistryOptions) {
    this.fileSystem = options.fileSystem;
    this.reflect = options.reflect;
    this.capacity = options.capacity ?? DEFAULT_PREFAB_CAPACITY;
    this.limits = options.limits;
  }

  get count(): number {
    return this.cache.size;
  }

  /**
   * Cached tree for `path`, or read and parse it. Failed loads are not cached
   * and leave the reason in `lastError`.
   */
  load(path: string): Result<Prefab, KeystoneError> {
    const cached = this.cache.get(path);
    if (cached) return Ok(cached);

    if (this.cache.size >= this.capacity) {
      return this.fail(Errors.cacheFull("Prefab", this.capacity));
    }

    let source: string;
    try {
      source = this.fileSystem.read(path);
    } catch (error) {
      return this.fail(wrapError(error, path));
    }

    const parsed = parsePrefab(source, { name: path, limits: this.limits });
    if (!parsed.ok) {
      return this.fail(parsed.error);
    }

    const prefab = parsed.value;
    prefab.path = path;
    this.cache.set(path, prefab);
    return Ok(prefab);
  }

  /**
   * Load `path` and spawn it with this registry's reflection data, resolving
   * base prefabs through this registry. NULL_ENTITY when loading fails.
   */
  spawn(path: string, ctx: Omit<SpawnContext, "reflect" | "prefabs">): EntityId {
    const loaded = this.load(path);
    if (!loaded.ok) return NULL_ENTITY;
    return spawnPrefab(loaded.value, { ...ctx, reflect: this.reflect, prefabs: this });
  }

  lookup(path: string): Prefab | undefined {
    return this.cache.get(path);
  }

  has(path: string): boolean {
    return this.cache.has(path);
  }

  paths(): string[] {
    return [...this.cache.keys()];
  }

  clear(): void {
    this.cache.clear();
  }

  destroy(): void {
    this.clear();
    this.lastError = undefined;
  }

  private fail(error: KeystoneError): Result<Prefab, KeystoneError> {
    this.lastError = error;
    return Err(error);
  }
}

/** Parse a prefab from text without caching it */
export function loadPrefabString(
  source: string,
  name?: string,
  limits?: Partial<ParseLimits>
): Result<Prefab, KeystoneError> {
  return parsePrefab(source, { name, limits });
}
