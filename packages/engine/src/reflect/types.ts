// Component layout descriptors

export enum FieldType {
  INT = "int",
  UINT = "uint",
  FLOAT = "float",
  DOUBLE = "double",
  BOOL = "bool",
  VEC2 = "vec2",
  VEC3 = "vec3",
  VEC4 = "vec4",
  STRING = "string", // 32-bit string table handle
  ENTITY = "entity",
  INT8 = "int8",
  UINT8 = "uint8",
  INT16 = "int16",
  UINT16 = "uint16",
  INT64 = "int64",
  UINT64 = "uint64",
  UNKNOWN = "unknown",
}

export interface FieldDesc {
  name: string;
  type: FieldType;
  /** Byte offset inside the component record */
  offset: number;
  size: number;
}

export interface ComponentMeta {
  id: number;
  name: string;
  size: number;
  fields: readonly FieldDesc[];
}

const NATURAL_SIZES: Record<FieldType, number> = {
  [FieldType.INT]: 4,
  [FieldType.UINT]: 4,
  [FieldType.FLOAT]: 4,
  [FieldType.DOUBLE]: 8,
  [FieldType.BOOL]: 1,
  [FieldType.VEC2]: 8,
  [FieldType.VEC3]: 12,
  [FieldType.VEC4]: 16,
  [FieldType.STRING]: 4,
  [FieldType.ENTITY]: 8,
  [FieldType.INT8]: 1,
  [FieldType.UINT8]: 1,
  [FieldType.INT16]: 2,
  [FieldType.UINT16]: 2,
  [FieldType.INT64]: 8,
  [FieldType.UINT64]: 8,
  [FieldType.UNKNOWN]: 0,
};

export function naturalSize(type: FieldType): number {
  return NATURAL_SIZES[type];
}

/** Field descriptor with the type's natural width unless `size` is given */
export function field(name: string, type: FieldType, offset: number, size?: number): FieldDesc {
  return { name, type, offset, size: size ?? naturalSize(type) };
}

export function typeName(type: FieldType): string {
  return type;
}

// Entity ids may be stored in 32 or 64 bits; every other type needs its natural width
function minimumSize(type: FieldType): number {
  return type === FieldType.ENTITY ? 4 : naturalSize(type);
}

/**
 * DataView over exactly the field's bytes, or undefined when the field does
 * not fit inside `bytes` or is narrower than its type.
 */
export function fieldView(bytes: Uint8Array, desc: FieldDesc): DataView | undefined {
  if (desc.offset < 0 || desc.size < minimumSize(desc.type)) return undefined;
  if (desc.offset + desc.size > bytes.byteLength) {
    return undefined;
  }
  return new DataView(bytes.buffer, bytes.byteOffset + desc.offset, desc.size);
}
