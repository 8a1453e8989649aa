/**
 * Core type definitions shared by the readers, the tree model and the serializer
 */

/**
 * Document formats understood by the converter
 */
export type InputFormat = 'json' | 'xml';

/**
 * Attribute attached to a tree node (value stored without quotes)
 */
export interface Attribute {
  key: string;
  value: string;
}

/**
 * Token types for JSON lexical analysis
 */
export enum JsonTokenType {
  // Literals
  NULL = 'NULL',
  BOOLEAN = 'BOOLEAN',
  NUMBER = 'NUMBER',
  STRING = 'STRING',

  // Delimiters
  COLON = 'COLON', // :
  COMMA = 'COMMA', // ,
  OPEN_BRACE = 'OPEN_BRACE', // {
  CLOSE_BRACE = 'CLOSE_BRACE', // }
  OPEN_BRACKET = 'OPEN_BRACKET', // [
  CLOSE_BRACKET = 'CLOSE_BRACKET', // ]

  EOF = 'EOF',
}

/**
 * Token types for XML lexical analysis
 */
export enum XmlTokenType {
  OPEN_TAG = 'OPEN_TAG', // <name attr="v">
  SELF_CLOSING_TAG = 'SELF_CLOSING_TAG', // <name attr="v"/>
  CLOSE_TAG = 'CLOSE_TAG', // </name>
  TEXT = 'TEXT',
  EOF = 'EOF',
}

/**
 * Position in source text
 */
export interface Position {
  line: number;
  column: number;
  offset: number;
}

/**
 * Token with position information for error reporting
 */
export interface Token<T> {
  type: T;
  value: string;
  position: Position;
  raw?: string; // Original text including quotes/escapes
}

export type JsonToken = Token<JsonTokenType>;

export interface XmlToken extends Token<XmlTokenType> {
  /** Parsed attributes of an opening or self-closing tag */
  attributes: Attribute[];
}

/**
 * JSON syntax tree node types
 */
export enum JsonNodeType {
  OBJECT = 'OBJECT',
  ARRAY = 'ARRAY',
  MEMBER = 'MEMBER',
  SCALAR = 'SCALAR',
}

export interface JsonObjectNode {
  type: JsonNodeType.OBJECT;
  position: Position;
  members: JsonMemberNode[];
}

export interface JsonArrayNode {
  type: JsonNodeType.ARRAY;
  position: Position;
  elements: JsonValueNode[];
}

export interface JsonMemberNode {
  type: JsonNodeType.MEMBER;
  position: Position;
  key: string;
  value: JsonValueNode;
}

export interface JsonScalarNode {
  type: JsonNodeType.SCALAR;
  position: Position;
  /** Scalar exactly as written, strings keep their quotes */
  raw: string;
  /** Scalar text with quotes and escapes resolved */
  value: string;
  valueType: 'null' | 'boolean' | 'number' | 'string';
}

export type JsonValueNode = JsonObjectNode | JsonArrayNode | JsonScalarNode;

/**
 * Parser options
 */
export interface ParserOptions {
  /** Maximum nesting depth */
  maxDepth?: number;
}

/**
 * Serializer options
 */
export interface SerializerOptions {
  /** Indentation unit written once per depth level */
  indent?: string;
}

/**
 * Options accepted by the conversion entry points
 */
export interface ConvertOptions extends ParserOptions, SerializerOptions {
  /** Skip detection and read the input as this format */
  format?: InputFormat;
}

export type ConvertErrorCode = 'EMPTY_INPUT' | 'UNKNOWN_FORMAT' | 'SYNTAX' | 'MAX_DEPTH';

/**
 * Conversion error with context
 */
export class ConvertError extends Error {
  constructor(
    message: string,
    public readonly code: ConvertErrorCode,
    public readonly position: Position = { line: 0, column: 0, offset: 0 },
    public readonly source?: string
  ) {
    super(message);
    this.name = 'ConvertError';
    Object.setPrototypeOf(this, ConvertError.prototype);
  }

  public get line(): number {
    return this.position.line;
  }

  public get column(): number {
    return this.position.column;
  }

  public get offset(): number {
    return this.position.offset;
  }

  public toString(): string {
    const location = `at line ${this.line}, column ${this.column}`;
    if (this.source && this.line > 0) {
      const lines = this.source.split('\n');
      const errorLine = lines[this.line - 1] ?? '';
      const pointer = ' '.repeat(Math.max(0, this.column - 1)) + '^';
      return `${this.name}: ${this.message} ${location}\n${errorLine}\n${pointer}`;
    }
    return `${this.name}: ${this.message} ${location}`;
  }
}
