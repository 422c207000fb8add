/**
 * Spawner - turns Prefab Trees into live entities
 *
 * - Base prefab components applied first, then the node's own (single level)
 * - Field assignments resolved through the Reflection Registry
 * - Position component written from offset + declared position
 * - Children spawned under the new entity at their local offset
 */

import {
  SINGLE_VALUE_FIELD,
  describeProp,
  type ComponentConfig,
  type Diagnostics,
  type KeystoneError,
  type Prefab,
  type Result,
} from "@keystone/core";
import type { ReflectRegistry } from "../reflect/reflect-registry";
import type { ComponentMeta } from "../reflect/types";
import { NULL_ENTITY, type EntityId, type EntityStore } from "../world/entity-store";
import { applyFieldValue } from "./field-applier";

export const DEFAULT_POSITION_COMPONENT = "C_Position";

// ============================================================================
// Spawn Context
// ============================================================================

/** Where base prefabs are resolved from */
export interface PrefabSource {
  lookup(path: string): Prefab | undefined;
  load(path: string): Result<Prefab, KeystoneError>;
}

export interface SpawnContext {
  world: EntityStore;
  reflect?: ReflectRegistry;
  prefabs?: PrefabSource;
  /** Added to the root's declared position */
  offset?: [number, number];
  parent?: EntityId;
  diagnostics?: Diagnostics;
  /** Component receiving the two-float position (default "C_Position") */
  positionComponent?: string;
  /** Called for every entity as soon as the world creates it, parents first */
  onCreate?: (entity: EntityId) => void;
}

// ============================================================================
// Spawning
// ============================================================================

/**
 * Spawn `prefab` and its children. Returns the root entity, or NULL_ENTITY
 * when the world could not create it. Children that fail to spawn are
 * skipped; entities already created stay alive.
 */
export function spawnPrefab(prefab: Prefab, ctx: SpawnContext): EntityId {
  const [ox, oy] = ctx.offset ?? [0, 0];
  return spawnNode(prefab, ctx, ox + prefab.position[0], oy + prefab.position[1]);
}

export function spawnPrefabAt(
  prefab: Prefab,
  world: EntityStore,
  reflect: ReflectRegistry | undefined,
  x: number,
  y: number
): EntityId {
  return spawnPrefab(prefab, { world, reflect, offset: [x, y] });
}

function spawnNode(prefab: Prefab, ctx: SpawnContext, x: number, y: number): EntityId {
  const { world } = ctx;

  const entity = world.create(prefab.name);
  if (entity === NULL_ENTITY) return NULL_ENTITY;
  ctx.onCreate?.(entity);

  if (ctx.parent !== undefined && ctx.parent !== NULL_ENTITY) {
    world.setParent(entity, ctx.parent);
  }

  if (prefab.basePrefab !== undefined) {
    const base = resolveBase(prefab.basePrefab, ctx);
    if (base) {
      applyComponents(entity, base.components, ctx);
    }
  }

  applyComponents(entity, prefab.components, ctx);
  applyPosition(entity, x, y, ctx);

  for (const child of prefab.children) {
    spawnNode(child, { ...ctx, parent: entity, offset: [0, 0] }, child.position[0], child.position[1]);
  }

  return entity;
}

function resolveBase(path: string, ctx: SpawnContext): Prefab | undefined {
  if (!ctx.prefabs) {
    ctx.diagnostics?.report({
      kind: "unresolved-prefab",
      message: `No prefab registry to resolve base prefab '${path}'`,
    });
    return undefined;
  }

  const cached = ctx.prefabs.lookup(path);
  if (cached) return cached;

  const loaded = ctx.prefabs.load(path);
  if (loaded.ok) return loaded.value;

  ctx.diagnostics?.report({
    kind: "unresolved-prefab",
    message: `Base prefab '${path}' could not be loaded: ${loaded.error.message}`,
  });
  return undefined;
}

function applyComponents(
  entity: EntityId,
  components: readonly ComponentConfig[],
  ctx: SpawnContext
): void {
  if (!ctx.reflect) return;

  for (const config of components) {
    const meta = ctx.reflect.getByName(config.name);
    if (!meta) {
      ctx.diagnostics?.report({
        kind: "unknown-component",
        message: `Unknown component '${config.name}'`,
        component: config.name,
      });
      continue;
    }

    ctx.world.setComponent(entity, meta.id, buildComponent(meta, config, ctx));
  }
}

// Zeroed record of the component's size with every known assignment applied
function buildComponent(meta: ComponentMeta, config: ComponentConfig, ctx: SpawnContext): Uint8Array {
  const buffer = new Uint8Array(meta.size);

  for (const assign of config.fields) {
    const target =
      assign.name === SINGLE_VALUE_FIELD && meta.fields.length > 0
        ? meta.fields[0]
        : meta.fields.find((f) => f.name === assign.name);

    if (!target) {
      ctx.diagnostics?.report({
        kind: "unknown-field",
        message: `Component '${meta.name}' has no field '${assign.name}'`,
        component: meta.name,
        field: assign.name,
      });
      continue;
    }

    if (!applyFieldValue(buffer, target, assign.value, ctx.world.strings)) {
      ctx.diagnostics?.report({
        kind: "type-mismatch",
        message: `Cannot assign ${describeProp(assign.value)} to ${meta.name}.${target.name} (${target.type})`,
        component: meta.name,
        field: target.name,
      });
    }
  }

  return buffer;
}

function applyPosition(entity: EntityId, x: number, y: number, ctx: SpawnContext): void {
  if (!ctx.reflect) return;

  const name = ctx.positionComponent ?? DEFAULT_POSITION_COMPONENT;
  const meta = ctx.reflect.getByName(name);
  if (!meta) return;

  if (meta.size < 8) {
    ctx.diagnostics?.report({
      kind: "position-too-small",
      message: `Position component '${name}' is ${meta.size} bytes, needs at least 8`,
      component: name,
    });
    return;
  }

  const buffer = new Uint8Array(meta.size);
  const view = new DataView(buffer.buffer);
  view.setFloat32(0, x, true);
  view.setFloat32(4, y, true);
  ctx.world.setComponent(entity, meta.id, buffer);
}
