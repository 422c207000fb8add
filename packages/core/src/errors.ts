// Error handling for Keystone prefab and scene tooling

// Error codes for categorization
export enum ErrorCode {
  // Lexical and syntax errors (1xx)
  UNEXPECTED_CHARACTER = 100,
  UNTERMINATED_STRING = 101,
  INVALID_NUMBER = 102,
  UNEXPECTED_TOKEN = 103,
  MISSING_TOKEN = 104,
  INVALID_VECTOR = 105,
  LIMIT_EXCEEDED = 106,
  NO_ENTITIES = 107,

  // Registry and resource errors (2xx)
  REGISTRY_FULL = 200,
  DUPLICATE_COMPONENT = 201,
  INVALID_COMPONENT = 202,
  CACHE_FULL = 203,
  STRICT_VIOLATION = 204,

  // File system errors (3xx)
  FILE_NOT_FOUND = 300,
  NOT_A_FILE = 302,
  NOT_A_DIRECTORY = 303,
  PATH_EXISTS = 304,
  INVALID_PATH = 306,
  IO_ERROR = 307,

  // Scene lifecycle errors (4xx)
  ALREADY_INSTANTIATED = 400,
  SCENE_NOT_PARSED = 401,
  NOT_INSTANTIATED = 402,
  INSTANTIATE_FAILED = 403,
}

// Hints for common errors
const ERROR_HINTS: Record<ErrorCode, string> = {
  [ErrorCode.UNEXPECTED_CHARACTER]: "Only identifiers, numbers, strings and @ ( ) { } : , - are allowed",
  [ErrorCode.UNTERMINATED_STRING]: "Add a closing quote to your string",
  [ErrorCode.INVALID_NUMBER]: "Exponents need a digit (1e3); integers must stay within ±9007199254740991",
  [ErrorCode.UNEXPECTED_TOKEN]: "Check for typos or a missing ':' between name and value",
  [ErrorCode.MISSING_TOKEN]: "Add the required token at this position",
  [ErrorCode.INVALID_VECTOR]: "Vectors take 2 to 4 numbers, e.g. (1, 2) or (1, 2, 3, 4)",
  [ErrorCode.LIMIT_EXCEEDED]: "Split the entity into a base prefab or move data into children",
  [ErrorCode.NO_ENTITIES]: "A scene needs at least one entity block such as Name { }",

  [ErrorCode.REGISTRY_FULL]: "Raise the registry capacity when constructing it",
  [ErrorCode.DUPLICATE_COMPONENT]: "Each component id may only be registered once",
  [ErrorCode.INVALID_COMPONENT]: "Components need a positive id, a name and 1 to 32 fields inside their size",
  [ErrorCode.CACHE_FULL]: "Call clear() or raise the capacity of the cache",
  [ErrorCode.STRICT_VIOLATION]: "Fix the content or disable strict diagnostics",

  [ErrorCode.FILE_NOT_FOUND]: "Check the file path for typos",
  [ErrorCode.NOT_A_FILE]: "This path points to a directory, not a file",
  [ErrorCode.NOT_A_DIRECTORY]: "This path points to a file, not a directory",
  [ErrorCode.PATH_EXISTS]: "Choose a different name or remove the existing file/directory",
  [ErrorCode.INVALID_PATH]: "Check that all parent directories exist",
  [ErrorCode.IO_ERROR]: "Check file permissions and available disk space",

  [ErrorCode.ALREADY_INSTANTIATED]: "Uninstantiate the scene before instantiating it again",
  [ErrorCode.SCENE_NOT_PARSED]: "Load the scene before instantiating it",
  [ErrorCode.NOT_INSTANTIATED]: "Only instantiated scenes can be uninstantiated",
  [ErrorCode.INSTANTIATE_FAILED]: "The entity store refused to create an entity; check its capacity",
};

// Source location information
export interface SourceLocation {
  line: number;
  column: number;
  file?: string;
  source?: string;
}

// Base error class with enhanced information
export class KeystoneError extends Error {
  readonly code: ErrorCode;
  readonly location?: SourceLocation;
  readonly hint?: string;

  constructor(
    message: string,
    code: ErrorCode,
    location?: SourceLocation,
    hint?: string
  ) {
    super(message);
    this.name = "KeystoneError";
    this.code = code;
    this.location = location;
    this.hint = hint ?? ERROR_HINTS[code];
  }

  // Format the error for display
  format(options: { showHint?: boolean; showCode?: boolean } = {}): string {
    const { showHint = true, showCode = true } = options;
    const parts: string[] = [];

    const codeStr = showCode ? ` [E${this.code}]` : "";
    parts.push(`${this.name}${codeStr}: ${this.message}`);

    if (this.location) {
      const file = this.location.file ? `${this.location.file}:` : "";
      parts.push(`  at ${file}${this.location.line}:${this.location.column}`);

      if (this.location.source) {
        const lines = this.location.source.split("\n");
        const lineNum = this.location.line;
        const contextLines: string[] = [];

        // Line before, current line, line after
        for (let i = Math.max(0, lineNum - 2); i < Math.min(lines.length, lineNum + 1); i++) {
          const prefix = i === lineNum - 1 ? ">" : " ";
          const lineNumStr = String(i + 1).padStart(4, " ");
          contextLines.push(`${prefix}${lineNumStr} | ${lines[i]}`);
        }

        if (contextLines.length > 0) {
          parts.push("");
          parts.push(...contextLines);

          if (this.location.column > 0) {
            parts.push(" ".repeat(7 + this.location.column - 1) + "^");
          }
        }
      }
    }

    if (showHint && this.hint) {
      parts.push("");
      parts.push(`Hint: ${this.hint}`);
    }

    return parts.join("\n");
  }
}

export class ParseError extends KeystoneError {
  constructor(message: string, code: ErrorCode, location?: SourceLocation, hint?: string) {
    super(message, code, location, hint);
    this.name = "ParseError";
  }
}

export class RegistryError extends KeystoneError {
  constructor(message: string, code: ErrorCode, hint?: string) {
    super(message, code, undefined, hint);
    this.name = "RegistryError";
  }
}

export class FileSystemError extends KeystoneError {
  readonly path: string;

  constructor(message: string, code: ErrorCode, path: string) {
    super(message, code);
    this.name = "FileSystemError";
    this.path = path;
  }
}

export class SceneError extends KeystoneError {
  readonly scene: string;

  constructor(message: string, code: ErrorCode, scene: string) {
    super(message, code);
    this.name = "SceneError";
    this.scene = scene;
  }
}

// Error factory functions for common cases
export const Errors = {
  // Parse errors
  unexpectedCharacter: (loc?: SourceLocation) =>
    new ParseError("Unexpected character", ErrorCode.UNEXPECTED_CHARACTER, loc),

  unterminatedString: (loc?: SourceLocation) =>
    new ParseError("Unterminated string", ErrorCode.UNTERMINATED_STRING, loc),

  invalidExponent: (loc?: SourceLocation) =>
    new ParseError("Invalid number exponent", ErrorCode.INVALID_NUMBER, loc),

  numberOutOfRange: (text: string, loc?: SourceLocation) =>
    new ParseError(`Number '${text}' is out of range`, ErrorCode.INVALID_NUMBER, loc),

  expected: (message: string, loc?: SourceLocation) =>
    new ParseError(message, ErrorCode.MISSING_TOKEN, loc),

  unexpectedToken: (message: string, loc?: SourceLocation) =>
    new ParseError(message, ErrorCode.UNEXPECTED_TOKEN, loc),

  vectorArity: (tooMany: boolean, loc?: SourceLocation) =>
    new ParseError(
      tooMany ? "Vector has too many components (max 4)" : "Vector must have 2-4 components",
      ErrorCode.INVALID_VECTOR,
      loc
    ),

  tooMany: (what: "fields in component" | "components" | "child entities", loc?: SourceLocation) =>
    new ParseError(`Too many ${what}`, ErrorCode.LIMIT_EXCEEDED, loc),

  noEntities: (name: string, loc?: SourceLocation) =>
    new ParseError(`No entities found in '${name}'`, ErrorCode.NO_ENTITIES, loc),

  // Registry errors
  registryFull: (what: string, capacity: number) =>
    new RegistryError(`${what} is full (capacity ${capacity})`, ErrorCode.REGISTRY_FULL),

  duplicateComponent: (id: number, existing: string) =>
    new RegistryError(
      `Component id ${id} is already registered as '${existing}'`,
      ErrorCode.DUPLICATE_COMPONENT
    ),

  invalidComponent: (name: string, reason: string) =>
    new RegistryError(`Invalid component '${name}': ${reason}`, ErrorCode.INVALID_COMPONENT),

  cacheFull: (what: string, capacity: number) =>
    new RegistryError(`${what} cache is full (capacity ${capacity})`, ErrorCode.CACHE_FULL),

  strictViolation: (message: string) =>
    new KeystoneError(message, ErrorCode.STRICT_VIOLATION),

  // File system errors
  fileNotFound: (path: string) =>
    new FileSystemError(`File not found: ${path}`, ErrorCode.FILE_NOT_FOUND, path),

  notAFile: (path: string) =>
    new FileSystemError(`Not a file: ${path}`, ErrorCode.NOT_A_FILE, path),

  notADirectory: (path: string) =>
    new FileSystemError(`Not a directory: ${path}`, ErrorCode.NOT_A_DIRECTORY, path),

  pathExists: (path: string) =>
    new FileSystemError(`Path already exists: ${path}`, ErrorCode.PATH_EXISTS, path),

  invalidPath: (path: string) =>
    new FileSystemError(`Invalid path: ${path}`, ErrorCode.INVALID_PATH, path),

  ioError: (path: string, message: string) =>
    new FileSystemError(`Cannot access ${path}: ${message}`, ErrorCode.IO_ERROR, path),

  // Scene errors
  alreadyInstantiated: (scene: string) =>
    new SceneError(`Scene '${scene}' is already instantiated`, ErrorCode.ALREADY_INSTANTIATED, scene),

  sceneNotParsed: (scene: string) =>
    new SceneError(`Scene '${scene}' is not loaded`, ErrorCode.SCENE_NOT_PARSED, scene),

  notInstantiated: (scene: string) =>
    new SceneError(`Scene '${scene}' is not instantiated`, ErrorCode.NOT_INSTANTIATED, scene),

  instantiateFailed: (scene: string, root: string) =>
    new SceneError(
      `Failed to create entity for root '${root}' of scene '${scene}'`,
      ErrorCode.INSTANTIATE_FAILED,
      scene
    ),
};

// Error result type for recoverable errors
export type Result<T, E = KeystoneError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Single-line `file:line:col: message` form kept as a registry's latest error.
 * Errors without a location render as the bare message.
 */
export function describeError(error: KeystoneError): string {
  if (!error.location) return error.message;
  const file = error.location.file ?? "<source>";
  return `${file}:${error.location.line}:${error.location.column}: ${error.message}`;
}

// Normalize anything thrown by a collaborator into a KeystoneError
export function wrapError(error: unknown, path = ""): KeystoneError {
  if (error instanceof KeystoneError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return Errors.ioError(path, message);
}
