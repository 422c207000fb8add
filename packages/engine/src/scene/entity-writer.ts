// Writes live entities back to scene text through their reflected component bytes

import { SINGLE_VALUE_FIELD, createPrefab, type ComponentConfig, type Prefab } from "@keystone/core";
import { writeScene } from "@keystone/lang";
import type { ReflectRegistry } from "../reflect/reflect-registry";
import type { ComponentMeta } from "../reflect/types";
import { readFieldValue } from "../prefab/field-applier";
import { DEFAULT_POSITION_COMPONENT } from "../prefab/spawner";
import { NULL_ENTITY, type EntityId, type EntityStore } from "../world/entity-store";
import type { Scene } from "./scene";

export interface EntityWriterOptions {
  positionComponent?: string;
}

function captureComponent(meta: ComponentMeta, bytes: Uint8Array, world: EntityStore): ComponentConfig {
  if (meta.fields.length === 1) {
    return {
      name: meta.name,
      fields: [{ name: SINGLE_VALUE_FIELD, value: readFieldValue(bytes, meta.fields[0], world.strings) }],
    };
  }
  return {
    name: meta.name,
    fields: meta.fields.map((f) => ({ name: f.name, value: readFieldValue(bytes, f, world.strings) })),
  };
}

/**
 * Prefab Tree mirroring `entity`: the position component becomes the header
 * offset and every other registered component present on the entity is
 * captured in registration order.
 */
export function captureEntity(
  world: EntityStore,
  entity: EntityId,
  reflect: ReflectRegistry,
  options: EntityWriterOptions = {}
): Prefab {
  const positionMeta = reflect.getByName(options.positionComponent ?? DEFAULT_POSITION_COMPONENT);
  const prefab = createPrefab({ name: world.getName(entity) });

  if (positionMeta && positionMeta.fields.length >= 2) {
    const bytes = world.getComponent(entity, positionMeta.id);
    if (bytes && bytes.byteLength >= 8) {
      const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
      prefab.position = [view.getFloat32(0, true), view.getFloat32(4, true)];
    }
  }

  for (const meta of reflect.getAll()) {
    if (meta === positionMeta) continue;
    const bytes = world.getComponent(entity, meta.id);
    if (!bytes) continue;
    prefab.components.push(captureComponent(meta, bytes, world));
  }

  for (const child of world.getChildren(entity)) {
    if (world.isAlive(child)) {
      prefab.children.push(captureEntity(world, child, reflect, options));
    }
  }

  return prefab;
}

/**
 * Scene text for `entities`. Dead entities and entities with a parent are
 * skipped; children are written inside their parent's block.
 */
export function writeEntities(
  world: EntityStore,
  entities: readonly EntityId[],
  reflect: ReflectRegistry,
  options: EntityWriterOptions = {}
): string {
  const roots = entities
    .filter((e) => world.isAlive(e) && world.getParent(e) === NULL_ENTITY)
    .map((e) => captureEntity(world, e, reflect, options));
  return writeScene(roots);
}

export function writeWorldScene(
  world: EntityStore,
  scene: Scene,
  reflect: ReflectRegistry,
  options: EntityWriterOptions = {}
): string {
  return writeEntities(world, scene.getRootEntities(), reflect, options);
}
