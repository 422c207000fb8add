// Property values assigned to component fields in prefab/scene sources

export type PropValue =
  | PropNull
  | PropInt
  | PropFloat
  | PropBool
  | PropString
  | PropVec2
  | PropVec3
  | PropVec4
  | PropIdentifier;

export type PropType = PropValue["type"];

export interface PropNull {
  type: "null";
}

export interface PropInt {
  type: "int";
  value: number;
}

export interface PropFloat {
  type: "float";
  value: number;
}

export interface PropBool {
  type: "bool";
  value: boolean;
}

export interface PropString {
  type: "string";
  value: string;
}

// Unquoted word such as `aggressive`; kept apart from quoted strings
export interface PropIdentifier {
  type: "identifier";
  value: string;
}

export type Vec2 = [number, number];
export type Vec3 = [number, number, number];
export type Vec4 = [number, number, number, number];

export interface PropVec2 {
  type: "vec2";
  value: Vec2;
}

export interface PropVec3 {
  type: "vec3";
  value: Vec3;
}

export interface PropVec4 {
  type: "vec4";
  value: Vec4;
}

export type PropVector = PropVec2 | PropVec3 | PropVec4;

// ============ Constructors ============

export const Null = (): PropNull => ({ type: "null" });
export const Int = (value: number): PropInt => ({ type: "int", value: Math.trunc(value) });
export const Float = (value: number): PropFloat => ({ type: "float", value });
export const Bool = (value: boolean): PropBool => ({ type: "bool", value });
export const Str = (value: string): PropString => ({ type: "string", value });
export const Ident = (value: string): PropIdentifier => ({ type: "identifier", value });
export const Vec2 = (x: number, y: number): PropVec2 => ({ type: "vec2", value: [x, y] });
export const Vec3 = (x: number, y: number, z: number): PropVec3 => ({
  type: "vec3",
  value: [x, y, z],
});
export const Vec4 = (x: number, y: number, z: number, w: number): PropVec4 => ({
  type: "vec4",
  value: [x, y, z, w],
});

/**
 * Build a vector value from 2 to 4 components.
 * Returns undefined for any other arity.
 */
export function vectorOf(components: readonly number[]): PropVector | undefined {
  switch (components.length) {
    case 2:
      return Vec2(components[0], components[1]);
    case 3:
      return Vec3(components[0], components[1], components[2]);
    case 4:
      return Vec4(components[0], components[1], components[2], components[3]);
    default:
      return undefined;
  }
}

// ============ Guards ============

export const isNumeric = (v: PropValue): v is PropInt | PropFloat =>
  v.type === "int" || v.type === "float";

export const isVector = (v: PropValue): v is PropVector =>
  v.type === "vec2" || v.type === "vec3" || v.type === "vec4";

export const isText = (v: PropValue): v is PropString | PropIdentifier =>
  v.type === "string" || v.type === "identifier";

// ============ Helpers ============

export function propValuesEqual(a: PropValue, b: PropValue): boolean {
  switch (a.type) {
    case "null":
      return b.type === "null";
    case "int":
    case "float":
    case "bool":
    case "string":
    case "identifier":
      return b.type === a.type && b.value === a.value;
    case "vec2":
    case "vec3":
    case "vec4": {
      if (b.type !== a.type) return false;
      const other: readonly number[] = b.value;
      return a.value.every((n, i) => n === other[i]);
    }
  }
}

export function cloneProp(v: PropValue): PropValue {
  switch (v.type) {
    case "vec2":
      return Vec2(v.value[0], v.value[1]);
    case "vec3":
      return Vec3(v.value[0], v.value[1], v.value[2]);
    case "vec4":
      return Vec4(v.value[0], v.value[1], v.value[2], v.value[3]);
    default:
      return { ...v };
  }
}

// Short human form used in diagnostics
export function describeProp(v: PropValue): string {
  switch (v.type) {
    case "null":
      return "null";
    case "string":
      return JSON.stringify(v.value);
    case "vec2":
    case "vec3":
    case "vec4":
      return `(${v.value.join(", ")})`;
    default:
      return String(v.value);
  }
}
