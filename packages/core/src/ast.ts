// Prefab tree produced by the parser and consumed by the spawner and writer

import { cloneProp, type PropValue } from "./values";

export const MAX_COMPONENTS = 32;
export const MAX_FIELDS = 32;
export const MAX_CHILDREN = 64;

// Field name a `Name: value` component is normalized to
export const SINGLE_VALUE_FIELD = "value";

export interface ParseLimits {
  components: number;
  fields: number;
  children: number;
}

export const DEFAULT_LIMITS: ParseLimits = {
  components: MAX_COMPONENTS,
  fields: MAX_FIELDS,
  children: MAX_CHILDREN,
};

export interface FieldAssign {
  name: string;
  value: PropValue;
}

export interface ComponentConfig {
  name: string;
  fields: FieldAssign[];
}

export interface Prefab {
  name?: string;
  /** Set by registries for trees loaded from a file */
  path?: string;
  position: [number, number];
  components: ComponentConfig[];
  children: Prefab[];
  /** Base prefab path, resolved at spawn time */
  basePrefab?: string;
}

export function createPrefab(init: Partial<Prefab> = {}): Prefab {
  return {
    name: init.name,
    path: init.path,
    position: init.position ?? [0, 0],
    components: init.components ?? [],
    children: init.children ?? [],
    basePrefab: init.basePrefab,
  };
}

export function clonePrefab(prefab: Prefab): Prefab {
  return {
    name: prefab.name,
    path: prefab.path,
    position: [prefab.position[0], prefab.position[1]],
    components: prefab.components.map((c) => ({
      name: c.name,
      fields: c.fields.map((f) => ({ name: f.name, value: cloneProp(f.value) })),
    })),
    children: prefab.children.map(clonePrefab),
    basePrefab: prefab.basePrefab,
  };
}

/**
 * Depth-first pre-order walk. Returning false from the visitor skips that
 * node's children.
 */
export function walkPrefab(
  prefab: Prefab,
  visit: (node: Prefab, depth: number) => boolean | void,
  depth = 0
): void {
  if (visit(prefab, depth) === false) return;
  for (const child of prefab.children) {
    walkPrefab(child, visit, depth + 1);
  }
}

// Node count including the root
export function countPrefabNodes(prefab: Prefab): number {
  let count = 0;
  walkPrefab(prefab, () => {
    count++;
  });
  return count;
}
