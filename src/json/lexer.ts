/**
 * JSON Lexer - cursor-based tokenization of the restricted JSON grammar
 */

import { ConvertError, JsonTokenType } from '../types';
import type { JsonToken, Position } from '../types';

export class JsonLexer {
  private source: string;
  private position: number = 0;
  private line: number = 1;
  private column: number = 1;

  constructor(source: string) {
    this.source = source;
  }

  /**
   * Tokenize entire source into token array
   */
  public tokenize(): JsonToken[] {
    const tokens: JsonToken[] = [];

    for (;;) {
      const token = this.nextToken();
      tokens.push(token);
      if (token.type === JsonTokenType.EOF) break;
    }

    return tokens;
  }

  /**
   * Get next token from source
   */
  public nextToken(): JsonToken {
    this.skipWhitespace();

    const start = this.mark();
    if (this.isAtEnd()) {
      return this.createToken(JsonTokenType.EOF, '', start);
    }

    const char = this.peek();

    switch (char) {
      case '{':
        return this.createToken(JsonTokenType.OPEN_BRACE, this.advance(), start);
      case '}':
        return this.createToken(JsonTokenType.CLOSE_BRACE, this.advance(), start);
      case '[':
        return this.createToken(JsonTokenType.OPEN_BRACKET, this.advance(), start);
      case ']':
        return this.createToken(JsonTokenType.CLOSE_BRACKET, this.advance(), start);
      case ':':
        return this.createToken(JsonTokenType.COLON, this.advance(), start);
      case ',':
        return this.createToken(JsonTokenType.COMMA, this.advance(), start);
      case '"':
        return this.scanString(start);
    }

    if (this.isDigit(char) || (char === '-' && this.isDigit(this.peekNext()))) {
      return this.scanNumber(start);
    }

    if (this.isLetter(char)) {
      return this.scanKeyword(start);
    }

    throw this.error(`Unexpected character: '${char}'`, start);
  }

  private scanString(start: Position): JsonToken {
    this.advance(); // skip opening "
    let value = '';
    let raw = '"';

    while (!this.isAtEnd() && this.peek() !== '"') {
      if (this.peek() === '\\') {
        raw += this.advance();
        if (this.isAtEnd()) break;
        const escaped = this.advance();
        raw += escaped;
        if (escaped === 'u') {
          const hex = this.source.slice(this.position, this.position + 4);
          if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
            throw this.error(`Invalid unicode escape: \\u${hex}`, start);
          }
          for (let i = 0; i < 4; i++) raw += this.advance();
          value += String.fromCharCode(parseInt(hex, 16));
        } else {
          value += this.handleEscape(escaped);
        }
      } else if (this.peek() === '\n') {
        throw this.error('Unterminated string (newline in string)', start);
      } else {
        const char = this.advance();
        raw += char;
        value += char;
      }
    }

    if (this.isAtEnd()) {
      throw this.error('Unterminated string', start);
    }

    this.advance(); // skip closing "
    raw += '"';

    const token = this.createToken(JsonTokenType.STRING, value, start);
    token.raw = raw;
    return token;
  }

  private handleEscape(char: string): string {
    switch (char) {
      case 'n': return '\n';
      case 't': return '\t';
      case 'r': return '\r';
      case 'b': return '\b';
      case 'f': return '\f';
      default: return char;
    }
  }

  private scanNumber(start: Position): JsonToken {
    let text = '';

    if (this.peek() === '-') {
      text += this.advance();
    }

    while (this.isDigit(this.peek())) {
      text += this.advance();
    }

    if (this.peek() === '.' && this.isDigit(this.peekNext())) {
      text += this.advance(); // .
      while (this.isDigit(this.peek())) {
        text += this.advance();
      }
    }

    if (this.peek() === 'e' || this.peek() === 'E') {
      text += this.advance();
      if (this.peek() === '+' || this.peek() === '-') {
        text += this.advance();
      }
      if (!this.isDigit(this.peek())) {
        throw this.error(`Malformed number: ${text}`, start);
      }
      while (this.isDigit(this.peek())) {
        text += this.advance();
      }
    }

    if (this.isLetter(this.peek())) {
      throw this.error(`Malformed number: ${text}${this.peek()}`, start);
    }

    return this.createToken(JsonTokenType.NUMBER, text, start);
  }

  private scanKeyword(start: Position): JsonToken {
    let text = '';
    while (this.isLetter(this.peek())) {
      text += this.advance();
    }

    if (text === 'true' || text === 'false') {
      return this.createToken(JsonTokenType.BOOLEAN, text, start);
    }
    if (text === 'null') {
      return this.createToken(JsonTokenType.NULL, text, start);
    }

    throw this.error(`Unsupported literal: ${text}`, start);
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === '\n') {
        this.advance();
        this.line++;
        this.column = 1;
      } else if (char === ' ' || char === '\t' || char === '\r') {
        this.advance();
      } else {
        break;
      }
    }
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isLetter(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.source[this.position];
  }

  private peekNext(): string {
    if (this.position + 1 >= this.source.length) return '\0';
    return this.source[this.position + 1];
  }

  private advance(): string {
    const char = this.source[this.position];
    this.position++;
    this.column++;
    return char;
  }

  private isAtEnd(): boolean {
    return this.position >= this.source.length;
  }

  private mark(): Position {
    return { line: this.line, column: this.column, offset: this.position };
  }

  private createToken(type: JsonTokenType, value: string, position: Position): JsonToken {
    return { type, value, position };
  }

  private error(message: string, position: Position): ConvertError {
    return new ConvertError(message, 'SYNTAX', position, this.source);
  }
}
