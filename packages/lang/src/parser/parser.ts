// Parser - builds prefab trees from prefab and scene sources

import {
  TokenType,
  ENTITY_KEYWORD,
  PREFAB_KEYWORD,
  SINGLE_VALUE_FIELD,
  DEFAULT_LIMITS,
  Errors,
  Ok,
  Err,
  ParseError,
  Bool,
  Ident,
  Int,
  Float,
  Str,
  vectorOf,
  createPrefab,
  type Token,
  type Prefab,
  type ComponentConfig,
  type PropValue,
  type PropInt,
  type PropFloat,
  type ParseLimits,
  type Result,
  type SourceLocation,
} from "@keystone/core";
import { Lexer } from "../lexer/lexer";

export interface ParseOptions {
  /** Source name used in error locations */
  name?: string;
  limits?: Partial<ParseLimits>;
}

export class Parser {
  private tokens: Token[];
  private current = 0;
  private limits: ParseLimits;
  private name?: string;
  private source?: string;

  constructor(tokens: Token[], options: ParseOptions & { source?: string } = {}) {
    this.tokens = tokens;
    this.limits = { ...DEFAULT_LIMITS, ...options.limits };
    this.name = options.name;
    this.source = options.source;
  }

  /**
   * Parses a single entity block starting at the current token.
   * Input after the closing brace is left unread.
   */
  parseEntity(): Prefab {
    this.matchEntityKeyword();
    return this.entity();
  }

  // One or more top-level entity blocks until EOF
  parseEntities(): Prefab[] {
    const roots: Prefab[] = [];
    while (!this.isAtEnd()) {
      if (!this.check(TokenType.IDENTIFIER) && !this.check(TokenType.AT) && !this.check(TokenType.LEFT_BRACE)) {
        throw this.error(this.peek(), "Expected entity name or 'Entity' keyword");
      }
      roots.push(this.parseEntity());
    }
    if (roots.length === 0) {
      throw Errors.noEntities(this.name ?? "<source>", this.location(this.peek()));
    }
    return roots;
  }

  // ============ Entities ============

  // Consumes a leading `Entity` when it introduces a header
  private matchEntityKeyword(): boolean {
    if (!this.checkIdentifier(ENTITY_KEYWORD)) return false;
    const next = this.peekNext();
    if (
      next.type === TokenType.IDENTIFIER ||
      next.type === TokenType.AT ||
      next.type === TokenType.LEFT_BRACE
    ) {
      this.advance();
      return true;
    }
    return false;
  }

  private entity(): Prefab {
    const prefab = createPrefab();

    if (this.match(TokenType.IDENTIFIER)) {
      prefab.name = this.previous().lexeme;
    }

    if (this.match(TokenType.AT)) {
      prefab.position = this.position();
    }

    this.consume(TokenType.LEFT_BRACE, "Expected '{' after entity header");
    this.body(prefab);
    this.consume(TokenType.RIGHT_BRACE, "Expected '}' after entity body");

    return prefab;
  }

  private position(): [number, number] {
    this.consume(TokenType.LEFT_PAREN, "Expected '(' after '@'");
    const x = this.number().value;
    this.consume(TokenType.COMMA, "Expected ',' in position");
    const y = this.number().value;
    this.consume(TokenType.RIGHT_PAREN, "Expected ')' after position");
    return [x, y];
  }

  private body(prefab: Prefab): void {
    while (!this.check(TokenType.RIGHT_BRACE) && !this.isAtEnd()) {
      // Anonymous child without the keyword
      if (this.check(TokenType.LEFT_BRACE) || this.check(TokenType.AT)) {
        this.addChild(prefab);
        continue;
      }
      if (!this.check(TokenType.IDENTIFIER)) {
        throw this.error(this.peek(), "Expected component name or 'Entity'");
      }

      const name = this.peek().lexeme;
      const next = this.peekNext().type;

      if (next === TokenType.COLON) {
        if (name === PREFAB_KEYWORD) {
          this.advance();
          this.advance();
          prefab.basePrefab = this.prefabReference();
          continue;
        }
        if (prefab.components.length >= this.limits.components) {
          throw Errors.tooMany("components", this.location(this.peek()));
        }
        prefab.components.push(this.component());
        continue;
      }

      const keyword = name === ENTITY_KEYWORD &&
        (next === TokenType.IDENTIFIER || next === TokenType.AT || next === TokenType.LEFT_BRACE);

      if (keyword || next === TokenType.AT || next === TokenType.LEFT_BRACE) {
        this.addChild(prefab);
        continue;
      }

      // Bare name followed by something else: report at the token after it
      this.advance();
      throw this.error(this.peek(), "Expected ':' after component name");
    }
  }

  private addChild(prefab: Prefab): void {
    if (prefab.children.length >= this.limits.children) {
      throw Errors.tooMany("child entities", this.location(this.peek()));
    }
    prefab.children.push(this.parseEntity());
  }

  private prefabReference(): string {
    if (!this.check(TokenType.STRING)) {
      throw this.error(this.peek(), "Expected string path after 'prefab:'");
    }
    return this.stringLiteral(this.advance());
  }

  // ============ Components ============

  private component(): ComponentConfig {
    const config: ComponentConfig = { name: this.advance().lexeme, fields: [] };
    this.consume(TokenType.COLON, "Expected ':' after component name");

    if (!this.match(TokenType.LEFT_BRACE)) {
      config.fields.push({ name: SINGLE_VALUE_FIELD, value: this.value() });
      return config;
    }

    while (!this.check(TokenType.RIGHT_BRACE) && !this.isAtEnd()) {
      if (config.fields.length >= this.limits.fields) {
        throw Errors.tooMany("fields in component", this.location(this.peek()));
      }
      if (!this.check(TokenType.IDENTIFIER)) {
        throw this.error(this.peek(), "Expected field name");
      }
      const name = this.advance().lexeme;
      this.consume(TokenType.COLON, "Expected ':' after field name");
      config.fields.push({ name, value: this.value() });

      // Commas between fields are optional
      this.match(TokenType.COMMA);
    }

    this.consume(TokenType.RIGHT_BRACE, "Expected '}' after component fields");
    return config;
  }

  // ============ Values ============

  private value(): PropValue {
    if (this.check(TokenType.STRING)) {
      return Str(this.stringLiteral(this.advance()));
    }

    if (this.match(TokenType.IDENTIFIER)) {
      const word = this.previous().lexeme;
      if (word === "true") return Bool(true);
      if (word === "false") return Bool(false);
      return Ident(word);
    }

    if (this.check(TokenType.MINUS) || this.check(TokenType.INT) || this.check(TokenType.FLOAT)) {
      return this.number();
    }

    if (this.match(TokenType.LEFT_PAREN)) {
      return this.vector();
    }

    throw this.error(this.peek(), "Expected value");
  }

  private vector(): PropValue {
    const components: number[] = [];
    do {
      if (components.length >= 4) {
        throw Errors.vectorArity(true, this.location(this.peek()));
      }
      components.push(this.number().value);
    } while (this.match(TokenType.COMMA));

    this.consume(TokenType.RIGHT_PAREN, "Expected ')' after vector");

    const vector = vectorOf(components);
    if (!vector) {
      throw Errors.vectorArity(false, this.location(this.previous()));
    }
    return vector;
  }

  private number(): PropInt | PropFloat {
    const negative = this.match(TokenType.MINUS);

    if (this.match(TokenType.INT) || this.match(TokenType.FLOAT)) {
      const token = this.previous();
      const literal = typeof token.literal === "number" ? token.literal : 0;
      const value = negative ? -literal : literal;
      return token.type === TokenType.INT ? Int(value) : Float(value);
    }

    throw this.error(this.peek(), "Expected number");
  }

  private stringLiteral(token: Token): string {
    return typeof token.literal === "string" ? token.literal : token.lexeme;
  }

  // ============ Helpers ============

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private check(type: TokenType): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === type;
  }

  private checkIdentifier(lexeme: string): boolean {
    return this.check(TokenType.IDENTIFIER) && this.peek().lexeme === lexeme;
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private peek(): Token {
    return this.tokens[Math.min(this.current, this.tokens.length - 1)];
  }

  private peekNext(): Token {
    return this.tokens[Math.min(this.current + 1, this.tokens.length - 1)];
  }

  private previous(): Token {
    return this.tokens[Math.max(0, this.current - 1)];
  }

  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw Errors.expected(message, this.location(this.peek()));
  }

  private location(token: Token): SourceLocation {
    return { line: token.line, column: token.column, file: this.name, source: this.source };
  }

  private error(token: Token, message: string): ParseError {
    return Errors.unexpectedToken(message, this.location(token));
  }
}

// ============ Entry points ============

function tokenize(source: string, name?: string): Result<Token[], ParseError> {
  const lexer = new Lexer(source, name);
  const tokens = lexer.tokenize();
  const lexError = lexer.lastError;
  return lexError ? Err(lexError) : Ok(tokens);
}

function run<T>(source: string, options: ParseOptions, body: (parser: Parser) => T): Result<T, ParseError> {
  const tokens = tokenize(source, options.name);
  if (!tokens.ok) return tokens;

  try {
    return Ok(body(new Parser(tokens.value, { ...options, source })));
  } catch (error) {
    if (error instanceof ParseError) return Err(error);
    throw error;
  }
}

/**
 * Parses the first entity block. Tokens after its closing brace are not
 * parsed, but the whole source is lexed first, so a lexical error anywhere
 * fails the parse.
 */
export function parsePrefab(source: string, options: ParseOptions = {}): Result<Prefab, ParseError> {
  return run(source, options, (parser) => parser.parseEntity());
}

/** Parses every top-level entity block of a scene source. */
export function parseScene(source: string, options: ParseOptions = {}): Result<Prefab[], ParseError> {
  return run(source, options, (parser) => parser.parseEntities());
}
