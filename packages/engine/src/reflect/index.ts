export {
  FieldType,
  field,
  fieldView,
  naturalSize,
  typeName,
  type FieldDesc,
  type ComponentMeta,
} from "./types";
export {
  ReflectRegistry,
  DEFAULT_MAX_COMPONENTS,
  DEFAULT_MAX_FIELDS,
  type ReflectRegistryOptions,
} from "./reflect-registry";
