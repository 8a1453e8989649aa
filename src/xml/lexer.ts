/**
 * XML Lexer - splits the restricted XML grammar into tag and text tokens
 */

import { ConvertError, XmlTokenType } from '../types';
import type { Attribute, Position, XmlToken } from '../types';

export class XmlLexer {
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
  public tokenize(): XmlToken[] {
    const tokens: XmlToken[] = [];

    for (;;) {
      const token = this.nextToken();
      if (token === null) continue;
      tokens.push(token);
      if (token.type === XmlTokenType.EOF) break;
    }

    return tokens;
  }

  /**
   * Get next token from source, or null for skipped markup (`<?...?>`)
   */
  public nextToken(): XmlToken | null {
    const start = this.mark();

    if (this.isAtEnd()) {
      return this.createToken(XmlTokenType.EOF, '', start);
    }

    if (this.peek() !== '<') {
      return this.scanText(start);
    }

    const next = this.peekNext();
    if (next === '?') {
      this.skipDeclaration(start);
      return null;
    }
    if (next === '!') {
      throw this.error('Comments, CDATA and doctype declarations are not supported', start);
    }
    if (next === '/') {
      return this.scanCloseTag(start);
    }
    return this.scanOpenTag(start);
  }

  private scanText(start: Position): XmlToken {
    let text = '';
    while (!this.isAtEnd() && this.peek() !== '<') {
      text += this.advance();
    }
    return this.createToken(XmlTokenType.TEXT, text, start);
  }

  private skipDeclaration(start: Position): void {
    const end = this.source.indexOf('?>', this.position + 2);
    if (end === -1) {
      throw this.error('Unterminated declaration', start);
    }
    while (this.position < end + 2) {
      this.advance();
    }
  }

  private scanCloseTag(start: Position): XmlToken {
    this.advance(); // <
    this.advance(); // /
    const name = this.scanName(start);
    this.skipWhitespace();
    this.expect('>', `Expected '>' to close </${name}`, start);
    return this.createToken(XmlTokenType.CLOSE_TAG, name, start);
  }

  private scanOpenTag(start: Position): XmlToken {
    this.advance(); // <
    const name = this.scanName(start);
    const attributes: Attribute[] = [];

    for (;;) {
      this.skipWhitespace();
      if (this.isAtEnd()) {
        throw this.error(`Unterminated tag <${name}`, start);
      }
      if (this.peek() === '/') {
        this.advance();
        this.expect('>', `Expected '>' after '/' in <${name}`, start);
        return this.createToken(XmlTokenType.SELF_CLOSING_TAG, name, start, attributes);
      }
      if (this.peek() === '>') {
        this.advance();
        return this.createToken(XmlTokenType.OPEN_TAG, name, start, attributes);
      }
      attributes.push(this.scanAttribute(name));
    }
  }

  /**
   * `key = "value"` or `key = 'value'`, whitespace around `=` optional
   */
  private scanAttribute(tagName: string): Attribute {
    const start = this.mark();
    const key = this.scanName(start);
    this.skipWhitespace();
    this.expect('=', `Expected '=' after attribute ${key} in <${tagName}>`, start);
    this.skipWhitespace();

    const quote = this.peek();
    if (quote !== '"' && quote !== "'") {
      throw this.error(`Attribute ${key} in <${tagName}> must be quoted`, this.mark());
    }
    this.advance();

    let value = '';
    while (!this.isAtEnd() && this.peek() !== quote) {
      value += this.advance();
    }
    if (this.isAtEnd()) {
      throw this.error(`Unterminated value for attribute ${key}`, start);
    }
    this.advance(); // closing quote

    return { key, value };
  }

  private scanName(start: Position): string {
    let name = '';
    while (this.isNameChar(this.peek())) {
      name += this.advance();
    }
    if (name === '') {
      const found = this.isAtEnd() ? 'end of input' : `'${this.peek()}'`;
      throw this.error(`Expected a name, found ${found}`, start);
    }
    return name;
  }

  private expect(char: string, message: string, start: Position): void {
    if (this.peek() !== char) {
      throw this.error(message, start);
    }
    this.advance();
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd() && /\s/.test(this.peek())) {
      this.advance();
    }
  }

  private isNameChar(char: string): boolean {
    return /[\w.-]/.test(char);
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
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private isAtEnd(): boolean {
    return this.position >= this.source.length;
  }

  private mark(): Position {
    return { line: this.line, column: this.column, offset: this.position };
  }

  private createToken(
    type: XmlTokenType,
    value: string,
    position: Position,
    attributes: Attribute[] = []
  ): XmlToken {
    return { type, value, position, attributes };
  }

  private error(message: string, position: Position): ConvertError {
    return new ConvertError(message, 'SYNTAX', position, this.source);
  }
}
