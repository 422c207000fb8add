// Reflection Registry - component layouts by id and by name

import { Errors, type RegistryError } from "@keystone/core";
import { formatFixed } from "@keystone/lang";
import { FieldType, fieldView, typeName, type ComponentMeta, type FieldDesc } from "./types";
import type { StringResolver } from "../world/entity-store";

const HASH_SLOTS = 512;
const SLOT_MASK = HASH_SLOTS - 1;
const KNUTH = 2654435761 | 0;

export const DEFAULT_MAX_COMPONENTS = 256;
export const DEFAULT_MAX_FIELDS = 32;

export interface ReflectRegistryOptions {
  maxComponents?: number;
  maxFields?: number;
}

function hashId(id: number): number {
  return Math.imul(id, KNUTH) >>> 0;
}

export class ReflectRegistry {
  readonly maxComponents: number;
  readonly maxFields: number;
  lastError?: RegistryError;

  private components: ComponentMeta[] = [];
  private slots: Array<ComponentMeta | undefined> = new Array(HASH_SLOTS).fill(undefined);

  constructor(options: ReflectRegistryOptions = {}) {
    this.maxComponents = Math.min(options.maxComponents ?? DEFAULT_MAX_COMPONENTS, HASH_SLOTS);
    this.maxFields = options.maxFields ?? DEFAULT_MAX_FIELDS;
  }

  get count(): number {
    return this.components.length;
  }

  register(id: number, name: string, size: number, fields: readonly FieldDesc[]): boolean {
    const error = this.validate(id, name, size, fields);
    if (error) {
      this.lastError = error;
      return false;
    }

    const meta: ComponentMeta = {
      id,
      name,
      size,
      fields: fields.map((f) => ({ ...f })),
    };

    const hash = hashId(id);
    for (let i = 0; i < HASH_SLOTS; i++) {
      const slot = (hash + i) & SLOT_MASK;
      if (this.slots[slot] === undefined) {
        this.slots[slot] = meta;
        this.components.push(meta);
        this.lastError = undefined;
        return true;
      }
    }

    this.lastError = Errors.registryFull("Component registry", HASH_SLOTS);
    return false;
  }

  get(id: number): ComponentMeta | undefined {
    if (!Number.isInteger(id) || id <= 0) return undefined;

    const hash = hashId(id);
    for (let i = 0; i < HASH_SLOTS; i++) {
      const meta = this.slots[(hash + i) & SLOT_MASK];
      if (meta === undefined) return undefined;
      if (meta.id === id) return meta;
    }
    return undefined;
  }

  getByName(name: string): ComponentMeta | undefined {
    return this.components.find((c) => c.name === name);
  }

  /** Components in registration order */
  getAll(): readonly ComponentMeta[] {
    return this.components;
  }

  typeName(type: FieldType): string {
    return typeName(type);
  }

  /**
   * Human-readable rendering of one field's current value. `bytes` is the
   * whole component record; string handles are resolved through `strings`.
   */
  formatField(desc: FieldDesc, bytes: Uint8Array, strings?: StringResolver): string {
    const view = fieldView(bytes, desc);
    if (!view) return "(out of range)";

    switch (desc.type) {
      case FieldType.INT:
        return String(view.getInt32(0, true));
      case FieldType.UINT:
        return String(view.getUint32(0, true));
      case FieldType.INT8:
        return String(view.getInt8(0));
      case FieldType.UINT8:
        return String(view.getUint8(0));
      case FieldType.INT16:
        return String(view.getInt16(0, true));
      case FieldType.UINT16:
        return String(view.getUint16(0, true));
      case FieldType.INT64:
        return view.getBigInt64(0, true).toString();
      case FieldType.UINT64:
        return view.getBigUint64(0, true).toString();
      case FieldType.FLOAT:
        return formatFixed(view.getFloat32(0, true), 3);
      case FieldType.DOUBLE:
        return formatFixed(view.getFloat64(0, true), 6);
      case FieldType.BOOL:
        return view.getUint8(0) !== 0 ? "true" : "false";
      case FieldType.VEC2:
      case FieldType.VEC3:
      case FieldType.VEC4: {
        const arity = desc.type === FieldType.VEC2 ? 2 : desc.type === FieldType.VEC3 ? 3 : 4;
        const parts: string[] = [];
        for (let i = 0; i < arity; i++) {
          parts.push(formatFixed(view.getFloat32(i * 4, true), 2));
        }
        return `(${parts.join(", ")})`;
      }
      case FieldType.STRING: {
        const handle = view.getUint32(0, true);
        const text = handle === 0 ? undefined : strings?.resolve(handle);
        return text === undefined ? "(null)" : `"${text}"`;
      }
      case FieldType.ENTITY: {
        const id = desc.size >= 8 ? view.getBigUint64(0, true) : BigInt(view.getUint32(0, true));
        return id === 0n ? "(none)" : id.toString();
      }
      case FieldType.UNKNOWN: {
        let out = "";
        const shown = Math.min(desc.size, 8);
        for (let i = 0; i < shown; i++) {
          out += view.getUint8(i).toString(16).toUpperCase().padStart(2, "0") + " ";
        }
        if (desc.size > 8) out += "...";
        return out;
      }
    }
  }

  private validate(
    id: number,
    name: string,
    size: number,
    fields: readonly FieldDesc[]
  ): RegistryError | undefined {
    if (this.components.length >= this.maxComponents) {
      return Errors.registryFull("Component registry", this.maxComponents);
    }
    if (!Number.isInteger(id) || id <= 0) {
      return Errors.invalidComponent(name, `id ${id} must be a positive integer`);
    }
    if (name.length === 0) {
      return Errors.invalidComponent(name, "name is empty");
    }
    if (fields.length < 1 || fields.length > this.maxFields) {
      return Errors.invalidComponent(
        name,
        `field count ${fields.length} is outside 1..${this.maxFields}`
      );
    }
    for (const f of fields) {
      if (f.offset < 0 || f.offset + f.size > size) {
        return Errors.invalidComponent(name, `field '${f.name}' does not fit in ${size} bytes`);
      }
    }
    const existing = this.get(id);
    if (existing) {
      return Errors.duplicateComponent(id, existing.name);
    }
    return undefined;
  }
}
