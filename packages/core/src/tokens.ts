// Token types for the prefab/scene lexer

export enum TokenType {
  // Literals
  IDENTIFIER = "IDENTIFIER", // Entity, ComponentName, true, false, enum tags
  STRING = "STRING",
  INT = "INT",
  FLOAT = "FLOAT",

  // Symbols
  AT = "AT", // @ before a position
  LEFT_PAREN = "LEFT_PAREN",
  RIGHT_PAREN = "RIGHT_PAREN",
  LEFT_BRACE = "LEFT_BRACE",
  RIGHT_BRACE = "RIGHT_BRACE",
  COLON = "COLON",
  COMMA = "COMMA",
  MINUS = "MINUS", // only when not directly followed by a digit

  // Special
  EOF = "EOF",
  ERROR = "ERROR",
}

export interface Token {
  type: TokenType;
  /** Source slice; for STRING the text between the quotes, for ERROR the message */
  lexeme: string;
  /** Parsed number for INT/FLOAT, decoded text for STRING */
  literal: number | string | null;
  line: number;
  column: number;
}

const DISPLAY_NAMES: Record<TokenType, string> = {
  [TokenType.IDENTIFIER]: "IDENTIFIER",
  [TokenType.STRING]: "STRING",
  [TokenType.INT]: "INT",
  [TokenType.FLOAT]: "FLOAT",
  [TokenType.AT]: "@",
  [TokenType.LEFT_PAREN]: "(",
  [TokenType.RIGHT_PAREN]: ")",
  [TokenType.LEFT_BRACE]: "{",
  [TokenType.RIGHT_BRACE]: "}",
  [TokenType.COLON]: ":",
  [TokenType.COMMA]: ",",
  [TokenType.MINUS]: "-",
  [TokenType.EOF]: "EOF",
  [TokenType.ERROR]: "ERROR",
};

export function tokenTypeName(type: TokenType): string {
  return DISPLAY_NAMES[type] ?? "UNKNOWN";
}

// Keyword that may introduce an entity block. Optional; kept for older files.
export const ENTITY_KEYWORD = "Entity";

// Body keyword for a base prefab reference: `prefab: "path"`
export const PREFAB_KEYWORD = "prefab";
