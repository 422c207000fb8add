import { describe, it, expect } from "vitest";
import { TokenType } from "@keystone/core";
import { Lexer } from "./lexer";

const types = (source: string) => new Lexer(source).tokenize().map((t) => t.type);

describe("Lexer", () => {
  describe("basic tokens", () => {
    it("tokenizes integers and floats", () => {
      const tokens = new Lexer("42 3.5 1e3 2.5E-1").tokenize();

      expect(tokens[0].type).toBe(TokenType.INT);
      expect(tokens[0].literal).toBe(42);
      expect(tokens[1].type).toBe(TokenType.FLOAT);
      expect(tokens[1].literal).toBe(3.5);
      expect(tokens[2].type).toBe(TokenType.FLOAT);
      expect(tokens[2].literal).toBe(1000);
      expect(tokens[3].literal).toBe(0.25);
    });

    it("folds a minus directly before a digit into the number", () => {
      const tokens = new Lexer("-7 - 7 -0.5").tokenize();

      expect(tokens.map((t) => t.type)).toEqual([
        TokenType.INT,
        TokenType.MINUS,
        TokenType.INT,
        TokenType.FLOAT,
        TokenType.EOF,
      ]);
      expect(tokens[0].literal).toBe(-7);
      expect(tokens[3].literal).toBe(-0.5);
    });

    it("keeps a trailing dot out of the number", () => {
      const tokens = new Lexer("5.").tokenize();

      expect(tokens[0].type).toBe(TokenType.INT);
      expect(tokens[0].lexeme).toBe("5");
      expect(tokens[1].type).toBe(TokenType.ERROR);
    });

    it("tokenizes strings and decodes escapes", () => {
      const tokens = new Lexer('"hello" "a\\nb\\t\\"q\\"\\\\" "\\x"').tokenize();

      expect(tokens[0].type).toBe(TokenType.STRING);
      expect(tokens[0].lexeme).toBe("hello");
      expect(tokens[0].literal).toBe("hello");
      expect(tokens[1].literal).toBe('a\nb\t"q"\\');
      expect(tokens[2].literal).toBe("\\x");
    });

    it("tokenizes identifiers", () => {
      const tokens = new Lexer("Player _hidden C_Health2").tokenize();

      expect(tokens.slice(0, 3).map((t) => t.lexeme)).toEqual(["Player", "_hidden", "C_Health2"]);
      expect(tokens.slice(0, 3).every((t) => t.type === TokenType.IDENTIFIER)).toBe(true);
    });

    it("tokenizes symbols", () => {
      expect(types("@ ( ) { } : ,")).toEqual([
        TokenType.AT,
        TokenType.LEFT_PAREN,
        TokenType.RIGHT_PAREN,
        TokenType.LEFT_BRACE,
        TokenType.RIGHT_BRACE,
        TokenType.COLON,
        TokenType.COMMA,
        TokenType.EOF,
      ]);
    });
  });

  describe("comments and positions", () => {
    it("skips both comment styles", () => {
      expect(types("// line\nA # hash\n# full\nB")).toEqual([
        TokenType.IDENTIFIER,
        TokenType.IDENTIFIER,
        TokenType.EOF,
      ]);
    });

    it("reports 1-based line and column of the first character", () => {
      const tokens = new Lexer("Player {\n  Health: 5\n}").tokenize();
      const health = tokens[2];

      expect(health.lexeme).toBe("Health");
      expect(health.line).toBe(2);
      expect(health.column).toBe(3);
      expect(tokens[4].column).toBe(11);
    });
  });

  describe("peek", () => {
    it("does not consume input", () => {
      const lexer = new Lexer("A B");

      expect(lexer.peek().lexeme).toBe("A");
      expect(lexer.peek().lexeme).toBe("A");
      expect(lexer.next().lexeme).toBe("A");
      expect(lexer.next().lexeme).toBe("B");
      expect(lexer.next().type).toBe(TokenType.EOF);
    });
  });

  describe("errors", () => {
    it("reports an unterminated string", () => {
      const lexer = new Lexer('Name: "oops', "hero.prefab");
      const tokens = lexer.tokenize();

      expect(tokens[2].type).toBe(TokenType.ERROR);
      expect(tokens[2].lexeme).toBe("Unterminated string");
      expect(lexer.hasError).toBe(true);
      expect(lexer.error).toBe("hero.prefab:1:7: Unterminated string");
    });

    it("reports unexpected characters and keeps scanning", () => {
      const lexer = new Lexer("A $ B");
      const tokens = lexer.tokenize();

      expect(tokens.map((t) => t.type)).toEqual([
        TokenType.IDENTIFIER,
        TokenType.ERROR,
        TokenType.IDENTIFIER,
        TokenType.EOF,
      ]);
      expect(lexer.error).toBe("<source>:1:3: Unexpected character");
    });

    it("rejects an exponent without digits", () => {
      const lexer = new Lexer("1e+");
      const token = lexer.next();

      expect(token.type).toBe(TokenType.ERROR);
      expect(token.lexeme).toBe("Invalid number exponent");
    });

    it("rejects integers beyond the safe range and floats that overflow", () => {
      const big = new Lexer("1000000000000000000000");
      const huge = new Lexer("-1e400");

      expect(big.next().lexeme).toBe("Number '1000000000000000000000' is out of range");
      expect(huge.next().type).toBe(TokenType.ERROR);
      expect(huge.error).toBe("<source>:1:1: Number '-1e400' is out of range");
    });

    it("accepts the largest safe integer", () => {
      const token = new Lexer("9007199254740991").next();

      expect(token.type).toBe(TokenType.INT);
      expect(token.literal).toBe(9007199254740991);
    });

    it("keeps only the first error", () => {
      const lexer = new Lexer("$\n%");
      lexer.tokenize();

      expect(lexer.error).toBe("<source>:1:1: Unexpected character");
    });
  });
});
