// Lexer - tokenizes prefab and scene sources

import { TokenType, Errors, describeError, type Token, type ParseError } from "@keystone/core";

interface LexerState {
  start: number;
  current: number;
  line: number;
  column: number;
}

export class Lexer {
  private source: string;
  private name?: string;
  private start = 0;
  private current = 0;
  private line = 1;
  private column = 1;
  private startLine = 1;
  private startColumn = 1;
  private firstError?: ParseError;

  constructor(source: string, name?: string) {
    this.source = source;
    this.name = name;
  }

  /** True once any error token has been produced */
  get hasError(): boolean {
    return this.firstError !== undefined;
  }

  /** First lexical error as `file:line:col: message`, or "" */
  get error(): string {
    return this.firstError ? describeError(this.firstError) : "";
  }

  get lastError(): ParseError | undefined {
    return this.firstError;
  }

  next(): Token {
    this.skipWhitespace();

    this.start = this.current;
    this.startLine = this.line;
    this.startColumn = this.column;

    if (this.isAtEnd()) return this.makeToken(TokenType.EOF);

    const c = this.advance();

    if (this.isAlpha(c)) return this.identifier();
    if (this.isDigit(c)) return this.number();

    switch (c) {
      case "@":
        return this.makeToken(TokenType.AT);
      case "(":
        return this.makeToken(TokenType.LEFT_PAREN);
      case ")":
        return this.makeToken(TokenType.RIGHT_PAREN);
      case "{":
        return this.makeToken(TokenType.LEFT_BRACE);
      case "}":
        return this.makeToken(TokenType.RIGHT_BRACE);
      case ":":
        return this.makeToken(TokenType.COLON);
      case ",":
        return this.makeToken(TokenType.COMMA);
      case "-":
        // Negative literal when a digit follows directly
        if (this.isDigit(this.peekChar())) return this.number();
        return this.makeToken(TokenType.MINUS);
      case '"':
        return this.string();
    }

    return this.errorToken(Errors.unexpectedCharacter(this.location()));
  }

  // Next token without consuming it
  peek(): Token {
    const saved = this.save();
    const token = this.next();
    this.restore(saved);
    return token;
  }

  // Remaining tokens up to and including EOF
  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const token = this.next();
      tokens.push(token);
      if (token.type === TokenType.EOF) return tokens;
    }
  }

  private skipWhitespace(): void {
    for (;;) {
      const c = this.peekChar();
      switch (c) {
        case " ":
        case "\t":
        case "\r":
        case "\n":
          this.advance();
          break;
        case "/":
          if (this.peekNext() !== "/") return;
          this.skipLine();
          break;
        case "#":
          this.skipLine();
          break;
        default:
          return;
      }
    }
  }

  private skipLine(): void {
    while (this.peekChar() !== "\n" && !this.isAtEnd()) {
      this.advance();
    }
  }

  private string(): Token {
    while (this.peekChar() !== '"' && !this.isAtEnd()) {
      if (this.peekChar() === "\\" && this.current + 1 < this.source.length) {
        this.advance();
      }
      this.advance();
    }

    if (this.isAtEnd()) {
      return this.errorToken(Errors.unterminatedString(this.location()));
    }

    this.advance(); // closing quote

    const raw = this.source.slice(this.start + 1, this.current - 1);
    return this.makeToken(TokenType.STRING, raw, this.unescapeString(raw));
  }

  private unescapeString(s: string): string {
    let result = "";
    let i = 0;
    while (i < s.length) {
      if (s[i] === "\\" && i + 1 < s.length) {
        switch (s[i + 1]) {
          case "n":
            result += "\n";
            i += 2;
            break;
          case "t":
            result += "\t";
            i += 2;
            break;
          case "r":
            result += "\r";
            i += 2;
            break;
          case '"':
            result += '"';
            i += 2;
            break;
          case "\\":
            result += "\\";
            i += 2;
            break;
          default:
            result += s[i];
            i++;
        }
      } else {
        result += s[i];
        i++;
      }
    }
    return result;
  }

  private number(): Token {
    let isFloat = false;

    while (this.isDigit(this.peekChar())) {
      this.advance();
    }

    if (this.peekChar() === "." && this.isDigit(this.peekNext())) {
      isFloat = true;
      this.advance(); // consume '.'
      while (this.isDigit(this.peekChar())) {
        this.advance();
      }
    }

    if (this.peekChar() === "e" || this.peekChar() === "E") {
      isFloat = true;
      this.advance();
      if (this.peekChar() === "+" || this.peekChar() === "-") {
        this.advance();
      }
      if (!this.isDigit(this.peekChar())) {
        return this.errorToken(Errors.invalidExponent(this.location()));
      }
      while (this.isDigit(this.peekChar())) {
        this.advance();
      }
    }

    const text = this.source.slice(this.start, this.current);
    const value = isFloat ? parseFloat(text) : parseInt(text, 10);
    // Ints must survive a write and re-read as ints, floats must stay finite
    if (isFloat ? !Number.isFinite(value) : !Number.isSafeInteger(value)) {
      return this.errorToken(Errors.numberOutOfRange(text, this.location()));
    }
    return this.makeToken(isFloat ? TokenType.FLOAT : TokenType.INT, text, value);
  }

  private identifier(): Token {
    while (this.isAlphaNumeric(this.peekChar())) {
      this.advance();
    }
    return this.makeToken(TokenType.IDENTIFIER);
  }

  private save(): LexerState {
    return { start: this.start, current: this.current, line: this.line, column: this.column };
  }

  private restore(state: LexerState): void {
    this.start = state.start;
    this.current = state.current;
    this.line = state.line;
    this.column = state.column;
  }

  private peekChar(): string {
    if (this.isAtEnd()) return "\0";
    return this.source[this.current];
  }

  private peekNext(): string {
    if (this.current + 1 >= this.source.length) return "\0";
    return this.source[this.current + 1];
  }

  private advance(): string {
    const c = this.source[this.current++];
    if (c === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  private isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  private isDigit(c: string): boolean {
    return c >= "0" && c <= "9";
  }

  private isAlpha(c: string): boolean {
    return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
  }

  private isAlphaNumeric(c: string): boolean {
    return this.isAlpha(c) || this.isDigit(c);
  }

  private location() {
    return { line: this.startLine, column: this.startColumn, file: this.name, source: this.source };
  }

  private makeToken(
    type: TokenType,
    lexeme = this.source.slice(this.start, this.current),
    literal: number | string | null = null
  ): Token {
    return { type, lexeme, literal, line: this.startLine, column: this.startColumn };
  }

  private errorToken(err: ParseError): Token {
    // Later calls keep working; only the first error is retained
    this.firstError ??= err;
    return {
      type: TokenType.ERROR,
      lexeme: err.message,
      literal: null,
      line: this.startLine,
      column: this.startColumn,
    };
  }
}
