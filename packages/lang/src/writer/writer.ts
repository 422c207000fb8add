// Writer - renders prefab trees back to source text

import {
  ENTITY_KEYWORD,
  PREFAB_KEYWORD,
  SINGLE_VALUE_FIELD,
  Ok,
  Err,
  wrapError,
  type ComponentConfig,
  type FileSystem,
  type KeystoneError,
  type Prefab,
  type PropValue,
  type Result,
} from "@keystone/core";
import { formatFloat, formatGeneral } from "./format";

const INDENT = "    ";

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidIdentifier(text: string): boolean {
  return IDENTIFIER_PATTERN.test(text);
}

// Quoted string literal with \" \\ \n \r \t escaped
export function escapeString(text: string): string {
  let out = '"';
  for (const c of text) {
    switch (c) {
      case '"':
        out += '\\"';
        break;
      case "\\":
        out += "\\\\";
        break;
      case "\n":
        out += "\\n";
        break;
      case "\r":
        out += "\\r";
        break;
      case "\t":
        out += "\\t";
        break;
      default:
        out += c;
    }
  }
  return out + '"';
}

export function writePropValue(value: PropValue): string {
  switch (value.type) {
    case "null":
      return "null";
    case "int":
      return String(value.value);
    case "float":
      return formatFloat(value.value);
    case "bool":
      return value.value ? "true" : "false";
    case "string":
      return escapeString(value.value);
    case "identifier":
      return isValidIdentifier(value.value) ? value.value : escapeString(value.value);
    case "vec2":
    case "vec3":
    case "vec4":
      return `(${value.value.map((n) => formatGeneral(n)).join(", ")})`;
  }
}

function writeComponent(config: ComponentConfig, depth: number, out: string[]): void {
  const pad = INDENT.repeat(depth);

  if (config.fields.length === 0) {
    out.push(`${pad}${config.name}: {}`);
    return;
  }

  if (config.fields.length === 1 && config.fields[0].name === SINGLE_VALUE_FIELD) {
    out.push(`${pad}${config.name}: ${writePropValue(config.fields[0].value)}`);
    return;
  }

  out.push(`${pad}${config.name}: {`);
  for (const field of config.fields) {
    out.push(`${pad}${INDENT}${field.name}: ${writePropValue(field.value)}`);
  }
  out.push(`${pad}}`);
}

function writeHeader(prefab: Prefab): string {
  let header = "";
  if (prefab.name) {
    header = isValidIdentifier(prefab.name) ? prefab.name : escapeString(prefab.name);
  } else {
    // Unnamed blocks keep the keyword so they still read as entities inside a body
    header = ENTITY_KEYWORD;
  }

  const [x, y] = prefab.position;
  if (x !== 0 || y !== 0) {
    header += ` @(${formatGeneral(x)}, ${formatGeneral(y)})`;
  }
  return `${header} {`;
}

function writeEntity(prefab: Prefab, depth: number, out: string[]): void {
  const pad = INDENT.repeat(depth);
  out.push(pad + writeHeader(prefab));

  if (prefab.basePrefab) {
    out.push(`${pad}${INDENT}${PREFAB_KEYWORD}: ${escapeString(prefab.basePrefab)}`);
  }

  for (const component of prefab.components) {
    writeComponent(component, depth + 1, out);
  }

  if (prefab.children.length > 0 && prefab.components.length > 0) {
    out.push("");
  }

  for (const child of prefab.children) {
    writeEntity(child, depth + 1, out);
  }

  out.push(`${pad}}`);
}

export function writePrefab(prefab: Prefab): string {
  const out: string[] = [];
  writeEntity(prefab, 0, out);
  return out.join("\n") + "\n";
}

// Root blocks separated by a blank line
export function writeScene(roots: readonly Prefab[]): string {
  return roots.map(writePrefab).join("\n");
}

function writeFile(fs: FileSystem, path: string, content: string): Result<void, KeystoneError> {
  try {
    fs.write(path, content);
    return Ok(undefined);
  } catch (error) {
    return Err(wrapError(error, path));
  }
}

export function writePrefabFile(fs: FileSystem, prefab: Prefab, path: string): Result<void, KeystoneError> {
  return writeFile(fs, path, writePrefab(prefab));
}

export function writeSceneFile(
  fs: FileSystem,
  roots: readonly Prefab[],
  path: string
): Result<void, KeystoneError> {
  return writeFile(fs, path, writeScene(roots));
}
