// Field Value Applier - PropValue literals to and from component bytes

import {
  Bool,
  Float,
  Int,
  Null,
  Str,
  Vec2,
  Vec3,
  Vec4,
  type PropValue,
} from "@keystone/core";
import { FieldType, fieldView, type FieldDesc } from "../reflect/types";
import type { StringTable, StringResolver } from "../world/entity-store";

const VECTOR_TAGS = {
  [FieldType.VEC2]: "vec2",
  [FieldType.VEC3]: "vec3",
  [FieldType.VEC4]: "vec4",
} as const;

const INTEGER_FIELDS: ReadonlySet<FieldType> = new Set([
  FieldType.INT,
  FieldType.UINT,
  FieldType.INT8,
  FieldType.UINT8,
  FieldType.INT16,
  FieldType.UINT16,
  FieldType.INT64,
  FieldType.UINT64,
]);

function isIntegerField(type: FieldType): boolean {
  return INTEGER_FIELDS.has(type);
}

/**
 * Write `value` into the field's slot of `buffer` (the whole component
 * record, little-endian). Returns false and leaves the bytes untouched when
 * the literal does not fit the field type or the field lies outside the buffer.
 *
 * - int / uint accept integer or float literals, floats truncated toward zero
 * - float / double accept integer or float literals
 * - sized integers (8/16/64-bit) accept integer literals only, wrapping to width
 * - vectors need a literal of the same arity
 * - string fields take a string or identifier, stored as a handle in `strings`
 * - non-finite numbers never fit an integer field
 */
export function applyFieldValue(
  buffer: Uint8Array,
  field: FieldDesc,
  value: PropValue,
  strings: StringTable
): boolean {
  const view = fieldView(buffer, field);
  if (!view) return false;
  if (isIntegerField(field.type) && (value.type === "int" || value.type === "float")) {
    if (!Number.isFinite(value.value)) return false;
  }

  switch (field.type) {
    case FieldType.INT:
      if (value.type !== "int" && value.type !== "float") return false;
      view.setInt32(0, Math.trunc(value.value), true);
      return true;

    case FieldType.UINT:
      if (value.type !== "int" && value.type !== "float") return false;
      view.setUint32(0, Math.trunc(value.value) >>> 0, true);
      return true;

    case FieldType.FLOAT:
      if (value.type !== "int" && value.type !== "float") return false;
      view.setFloat32(0, value.value, true);
      return true;

    case FieldType.DOUBLE:
      if (value.type !== "int" && value.type !== "float") return false;
      view.setFloat64(0, value.value, true);
      return true;

    case FieldType.BOOL:
      if (value.type !== "bool") return false;
      view.setUint8(0, value.value ? 1 : 0);
      return true;

    case FieldType.VEC2:
    case FieldType.VEC3:
    case FieldType.VEC4: {
      if (value.type !== VECTOR_TAGS[field.type]) return false;
      if (value.type !== "vec2" && value.type !== "vec3" && value.type !== "vec4") return false;
      value.value.forEach((component, i) => view.setFloat32(i * 4, component, true));
      return true;
    }

    case FieldType.STRING:
      if (value.type !== "string" && value.type !== "identifier") return false;
      view.setUint32(0, strings.intern(value.value), true);
      return true;

    case FieldType.INT8:
      if (value.type !== "int") return false;
      view.setInt8(0, value.value);
      return true;

    case FieldType.UINT8:
      if (value.type !== "int") return false;
      view.setUint8(0, value.value);
      return true;

    case FieldType.INT16:
      if (value.type !== "int") return false;
      view.setInt16(0, value.value, true);
      return true;

    case FieldType.UINT16:
      if (value.type !== "int") return false;
      view.setUint16(0, value.value, true);
      return true;

    case FieldType.INT64:
      if (value.type !== "int") return false;
      view.setBigInt64(0, BigInt(value.value), true);
      return true;

    case FieldType.UINT64:
      if (value.type !== "int") return false;
      view.setBigUint64(0, BigInt.asUintN(64, BigInt(value.value)), true);
      return true;

    case FieldType.ENTITY:
    case FieldType.UNKNOWN:
      return false;
  }
}

// Inverse of applyFieldValue, used when writing live entities back to text
export function readFieldValue(
  bytes: Uint8Array,
  field: FieldDesc,
  strings?: StringResolver
): PropValue {
  const view = fieldView(bytes, field);
  if (!view) return Null();

  switch (field.type) {
    case FieldType.INT:
      return Int(view.getInt32(0, true));
    case FieldType.UINT:
      return Int(view.getUint32(0, true));
    case FieldType.INT8:
      return Int(view.getInt8(0));
    case FieldType.UINT8:
      return Int(view.getUint8(0));
    case FieldType.INT16:
      return Int(view.getInt16(0, true));
    case FieldType.UINT16:
      return Int(view.getUint16(0, true));
    case FieldType.INT64:
      return Int(Number(view.getBigInt64(0, true)));
    case FieldType.UINT64:
      return Int(Number(view.getBigUint64(0, true)));
    case FieldType.FLOAT:
      return Float(view.getFloat32(0, true));
    case FieldType.DOUBLE:
      return Float(view.getFloat64(0, true));
    case FieldType.BOOL:
      return Bool(view.getUint8(0) !== 0);
    case FieldType.VEC2:
      return Vec2(view.getFloat32(0, true), view.getFloat32(4, true));
    case FieldType.VEC3:
      return Vec3(view.getFloat32(0, true), view.getFloat32(4, true), view.getFloat32(8, true));
    case FieldType.VEC4:
      return Vec4(
        view.getFloat32(0, true),
        view.getFloat32(4, true),
        view.getFloat32(8, true),
        view.getFloat32(12, true)
      );
    case FieldType.STRING: {
      const handle = view.getUint32(0, true);
      const text = handle === 0 ? undefined : strings?.resolve(handle);
      return text === undefined ? Null() : Str(text);
    }
    case FieldType.ENTITY:
      return Int(field.size >= 8 ? Number(view.getBigUint64(0, true)) : view.getUint32(0, true));
    case FieldType.UNKNOWN:
      return Null();
  }
}
