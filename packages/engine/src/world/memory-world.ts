// In-memory entity store

import { NULL_ENTITY, StringTable, type EntityId, type EntityStore } from "./entity-store";

interface EntityRecord {
  id: EntityId;
  name?: string;
  parent: EntityId;
  children: EntityId[];
  components: Map<number, Uint8Array>;
}

export interface MemoryWorldOptions {
  /** `create` returns NULL_ENTITY once this many entities are alive */
  maxEntities?: number;
}

export class MemoryWorld implements EntityStore {
  readonly strings = new StringTable();
  private entities: Map<EntityId, EntityRecord> = new Map();
  private nextId = 1;
  private maxEntities: number;

  constructor(options: MemoryWorldOptions = {}) {
    this.maxEntities = options.maxEntities ?? Number.POSITIVE_INFINITY;
  }

  create(name?: string): EntityId {
    if (this.entities.size >= this.maxEntities) return NULL_ENTITY;

    const id = this.nextId++;
    this.entities.set(id, {
      id,
      name: name && name.length > 0 ? name : undefined,
      parent: NULL_ENTITY,
      children: [],
      components: new Map(),
    });
    return id;
  }

  // Deletes the entity and, recursively, its children
  delete(entity: EntityId): void {
    const record = this.entities.get(entity);
    if (!record) return;

    for (const child of [...record.children]) {
      this.delete(child);
    }

    this.detach(record);
    this.entities.delete(entity);
  }

  isAlive(entity: EntityId): boolean {
    return this.entities.has(entity);
  }

  getComponent(entity: EntityId, componentId: number): Uint8Array | undefined {
    return this.entities.get(entity)?.components.get(componentId);
  }

  setComponent(entity: EntityId, componentId: number, bytes: Uint8Array): void {
    const record = this.entities.get(entity);
    if (!record) return;
    record.components.set(componentId, bytes.slice());
  }

  hasComponent(entity: EntityId, componentId: number): boolean {
    return this.entities.get(entity)?.components.has(componentId) ?? false;
  }

  setParent(child: EntityId, parent: EntityId): void {
    const record = this.entities.get(child);
    if (!record || child === parent) return;

    this.detach(record);
    const parentRecord = this.entities.get(parent);
    if (!parentRecord) return;

    record.parent = parent;
    parentRecord.children.push(child);
  }

  getParent(entity: EntityId): EntityId {
    return this.entities.get(entity)?.parent ?? NULL_ENTITY;
  }

  getChildren(entity: EntityId): EntityId[] {
    return [...(this.entities.get(entity)?.children ?? [])];
  }

  getName(entity: EntityId): string | undefined {
    return this.entities.get(entity)?.name;
  }

  count(): number {
    return this.entities.size;
  }

  private detach(record: EntityRecord): void {
    const parent = this.entities.get(record.parent);
    if (parent) {
      parent.children = parent.children.filter((c) => c !== record.id);
    }
    record.parent = NULL_ENTITY;
  }
}
