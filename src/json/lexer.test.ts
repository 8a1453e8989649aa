import { describe, it, expect } from 'vitest';
import { JsonLexer } from './lexer';
import { ConvertError, JsonTokenType } from '../types';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('JsonLexer', () => {
  it('should tokenize literals', () => {
    const tokens = new JsonLexer('true false null 42 -3.14 1e5').tokenize();

    expect(tokens.map(t => t.type)).toEqual([
      JsonTokenType.BOOLEAN,
      JsonTokenType.BOOLEAN,
      JsonTokenType.NULL,
      JsonTokenType.NUMBER,
      JsonTokenType.NUMBER,
      JsonTokenType.NUMBER,
      JsonTokenType.EOF,
    ]);
    expect(tokens[4].value).toBe('-3.14');
    expect(tokens[5].value).toBe('1e5');
  });

  it('should tokenize delimiters', () => {
    const tokens = new JsonLexer('{"a": [1, 2]}').tokenize();

    expect(tokens.map(t => t.type)).toEqual([
      JsonTokenType.OPEN_BRACE,
      JsonTokenType.STRING,
      JsonTokenType.COLON,
      JsonTokenType.OPEN_BRACKET,
      JsonTokenType.NUMBER,
      JsonTokenType.COMMA,
      JsonTokenType.NUMBER,
      JsonTokenType.CLOSE_BRACKET,
      JsonTokenType.CLOSE_BRACE,
      JsonTokenType.EOF,
    ]);
  });

  it('should keep the raw text of strings', () => {
    const tokens = new JsonLexer('"say \\"hi\\""').tokenize();

    expect(tokens[0].type).toBe(JsonTokenType.STRING);
    expect(tokens[0].value).toBe('say "hi"');
    expect(tokens[0].raw).toBe('"say \\"hi\\""');
  });

  it('should decode unicode escapes', () => {
    const tokens = new JsonLexer('"caf\\u00e9"').tokenize();

    expect(tokens[0].value).toBe('café');
    expect(tokens[0].raw).toBe('"caf\\u00e9"');
    expect(() => new JsonLexer('"\\u12"').tokenize()).toThrow('Invalid unicode escape: \\u12"');
  });

  it('should track positions across lines', () => {
    const tokens = new JsonLexer('{\n  "a": 1\n}').tokenize();

    expect(tokens[1].position).toEqual({ line: 2, column: 3, offset: 4 });
    expect(tokens[4].position).toEqual({ line: 3, column: 1, offset: 11 });
  });

  it('should reject unterminated strings', () => {
    expect(() => new JsonLexer('"open').tokenize()).toThrow(ConvertError);
    expect(() => new JsonLexer('"open').tokenize()).toThrow('Unterminated string');
  });

  it('should reject unsupported literals', () => {
    const error = thrown(() => new JsonLexer('{"a": undefined}').tokenize());

    expect(error).toBeInstanceOf(ConvertError);
    if (error instanceof ConvertError) {
      expect(error.message).toBe('Unsupported literal: undefined');
      expect(error.code).toBe('SYNTAX');
      expect(error.offset).toBe(6);
      expect(error.column).toBe(7);
    }
  });

  it('should reject unexpected characters', () => {
    expect(() => new JsonLexer('{"a": 1;}').tokenize()).toThrow("Unexpected character: ';'");
  });
});
