/**
 * JSON Parser - recursive descent over lexer tokens
 * Produces a syntax tree; mapping onto tree nodes happens in the reader
 */

import { ConvertError, JsonNodeType, JsonTokenType } from '../types';
import type {
  JsonArrayNode,
  JsonMemberNode,
  JsonObjectNode,
  JsonScalarNode,
  JsonToken,
  JsonValueNode,
  ParserOptions,
} from '../types';

export class JsonParser {
  private tokens: JsonToken[];
  private current: number = 0;
  private depth: number = 0;
  private options: Required<ParserOptions>;
  private source?: string;

  constructor(tokens: JsonToken[], options: ParserOptions = {}, source?: string) {
    this.tokens = tokens;
    this.source = source;
    this.options = {
      maxDepth: options.maxDepth ?? 100,
    };
  }

  /**
   * Parse a whole document: a single value, or a bare member list
   * (`"key": value, ...`) read as an object without braces
   */
  public parse(): JsonValueNode {
    const value =
      this.check(JsonTokenType.STRING) && this.checkNext(JsonTokenType.COLON)
        ? this.parseMemberList()
        : this.parseValue();

    if (!this.check(JsonTokenType.EOF)) {
      throw this.error(`Unexpected content after document: '${this.peek().value}'`, this.peek());
    }

    return value;
  }

  private parseValue(): JsonValueNode {
    const token = this.peek();

    switch (token.type) {
      case JsonTokenType.OPEN_BRACE:
        return this.parseObject();
      case JsonTokenType.OPEN_BRACKET:
        return this.parseArray();
      case JsonTokenType.STRING:
      case JsonTokenType.NUMBER:
      case JsonTokenType.BOOLEAN:
      case JsonTokenType.NULL:
        return this.parseScalar();
      case JsonTokenType.EOF:
        throw this.error('Unexpected end of input', token);
      default:
        throw this.error(`Unexpected token: '${token.value}'`, token);
    }
  }

  private parseObject(): JsonObjectNode {
    const open = this.advance(); // consume {
    this.enter(open);

    const members: JsonMemberNode[] = [];
    if (!this.check(JsonTokenType.CLOSE_BRACE)) {
      do {
        members.push(this.parseMember());
      } while (this.match(JsonTokenType.COMMA));
    }

    this.consume(JsonTokenType.CLOSE_BRACE, "Expected '}' to close object");
    this.depth--;

    return {
      type: JsonNodeType.OBJECT,
      position: open.position,
      members,
    };
  }

  private parseMemberList(): JsonObjectNode {
    const first = this.peek();
    const members: JsonMemberNode[] = [];
    do {
      members.push(this.parseMember());
    } while (this.match(JsonTokenType.COMMA));

    return {
      type: JsonNodeType.OBJECT,
      position: first.position,
      members,
    };
  }

  private parseMember(): JsonMemberNode {
    const keyToken = this.consume(JsonTokenType.STRING, 'Expected quoted key');
    this.consume(JsonTokenType.COLON, "Expected ':' after key");
    const value = this.parseValue();

    return {
      type: JsonNodeType.MEMBER,
      position: keyToken.position,
      key: keyToken.value,
      value,
    };
  }

  private parseArray(): JsonArrayNode {
    const open = this.advance(); // consume [
    this.enter(open);

    const elements: JsonValueNode[] = [];
    if (!this.check(JsonTokenType.CLOSE_BRACKET)) {
      do {
        elements.push(this.parseValue());
      } while (this.match(JsonTokenType.COMMA));
    }

    this.consume(JsonTokenType.CLOSE_BRACKET, "Expected ']' to close array");
    this.depth--;

    return {
      type: JsonNodeType.ARRAY,
      position: open.position,
      elements,
    };
  }

  private parseScalar(): JsonScalarNode {
    const token = this.advance();
    let valueType: JsonScalarNode['valueType'];

    switch (token.type) {
      case JsonTokenType.NULL:
        valueType = 'null';
        break;
      case JsonTokenType.BOOLEAN:
        valueType = 'boolean';
        break;
      case JsonTokenType.NUMBER:
        valueType = 'number';
        break;
      default:
        valueType = 'string';
        break;
    }

    return {
      type: JsonNodeType.SCALAR,
      position: token.position,
      raw: token.raw ?? token.value,
      value: token.value,
      valueType,
    };
  }

  private enter(token: JsonToken): void {
    this.depth++;
    if (this.depth > this.options.maxDepth) {
      throw new ConvertError(
        `Maximum nesting depth exceeded: ${this.options.maxDepth}`,
        'MAX_DEPTH',
        token.position,
        this.source
      );
    }
  }

  private consume(type: JsonTokenType, message: string): JsonToken {
    if (this.check(type)) return this.advance();
    const token = this.peek();
    const found = token.type === JsonTokenType.EOF ? 'end of input' : `'${token.value}'`;
    throw this.error(`${message}, found ${found}`, token);
  }

  private match(type: JsonTokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private check(type: JsonTokenType): boolean {
    return this.peek().type === type;
  }

  private checkNext(type: JsonTokenType): boolean {
    const next = this.tokens[this.current + 1];
    return next !== undefined && next.type === type;
  }

  private advance(): JsonToken {
    const token = this.peek();
    if (this.current < this.tokens.length) this.current++;
    return token;
  }

  private peek(): JsonToken {
    if (this.current >= this.tokens.length) {
      const last = this.tokens[this.tokens.length - 1];
      return {
        type: JsonTokenType.EOF,
        value: '',
        position: last ? last.position : { line: 1, column: 1, offset: 0 },
      };
    }
    return this.tokens[this.current];
  }

  private error(message: string, token: JsonToken): ConvertError {
    return new ConvertError(message, 'SYNTAX', token.position, this.source);
  }
}
