// Entity storage contract used by spawning, scenes and the live-entity writer

export type EntityId = number;

export const NULL_ENTITY: EntityId = 0;

export interface StringResolver {
  resolve(handle: number): string | undefined;
}

/**
 * Interned strings referenced from component bytes by a 32-bit handle.
 * Handle 0 is reserved for "no string".
 */
export class StringTable implements StringResolver {
  private values: string[] = [];
  private handles: Map<string, number> = new Map();

  intern(text: string): number {
    const existing = this.handles.get(text);
    if (existing !== undefined) return existing;

    this.values.push(text);
    const handle = this.values.length;
    this.handles.set(text, handle);
    return handle;
  }

  resolve(handle: number): string | undefined {
    if (handle <= 0) return undefined;
    return this.values[handle - 1];
  }

  get size(): number {
    return this.values.length;
  }
}

export interface EntityStore {
  /** Returns NULL_ENTITY when no entity could be created */
  create(name?: string): EntityId;
  delete(entity: EntityId): void;
  isAlive(entity: EntityId): boolean;
  getComponent(entity: EntityId, componentId: number): Uint8Array | undefined;
  setComponent(entity: EntityId, componentId: number, bytes: Uint8Array): void;
  setParent(child: EntityId, parent: EntityId): void;
  getParent(entity: EntityId): EntityId;
  getChildren(entity: EntityId): EntityId[];
  getName(entity: EntityId): string | undefined;
  count(): number;
  readonly strings: StringTable;
}
