/**
 * JSON ⇄ XML tree converter
 * Main API entry point
 */

import { JsonReader } from './json/reader';
import { XmlReader } from './xml/reader';
import { TreeSerializer } from './serializer';
import type { TreeNode } from './node';
import { ConvertError } from './types';
import type { ConvertOptions, InputFormat, ParserOptions, SerializerOptions } from './types';

export interface ConvertResult {
  /** Format the input was read as */
  format: InputFormat;
  output: string;
}

/**
 * Sniff the format from the first non-blank character
 */
export function detectFormat(source: string): InputFormat | undefined {
  const first = source.trimStart().charAt(0);
  if (first === '{' || first === '[') return 'json';
  if (first === '<') return 'xml';
  return undefined;
}

/**
 * Trim every line and join them, the way documents are read from files
 */
export function normalizeInput(source: string): string {
  return source
    .split(/\r?\n/)
    .map(line => line.trim())
    .join('');
}

/**
 * Parse JSON text into a tree
 */
export function parseJson(source: string, options?: ParserOptions): TreeNode {
  return new JsonReader(options).parse(source);
}

/**
 * Parse XML text into a tree
 */
export function parseXml(source: string, options?: ParserOptions): TreeNode {
  return new XmlReader(options).parse(source);
}

/**
 * Render a tree as JSON text
 */
export function toJson(root: TreeNode, options?: SerializerOptions): string {
  return new TreeSerializer(options).toJson(root);
}

/**
 * Render a tree as XML text
 */
export function toXml(root: TreeNode, options?: SerializerOptions): string {
  return new TreeSerializer(options).toXml(root);
}

/**
 * Parse text in either format, detecting it unless `options.format` is set
 */
export function parse(source: string, options: ConvertOptions = {}): { format: InputFormat; root: TreeNode } {
  if (source.trim() === '') {
    throw new ConvertError('Input is empty', 'EMPTY_INPUT');
  }

  const format = options.format ?? detectFormat(source);
  if (format === undefined) {
    const first = source.trimStart().charAt(0);
    throw new ConvertError(`Unknown input format starting with '${first}'`, 'UNKNOWN_FORMAT');
  }

  try {
    const root = format === 'json' ? parseJson(source, options) : parseXml(source, options);
    return { format, root };
  } catch (error) {
    if (error instanceof ConvertError) {
      throw error;
    }
    throw new ConvertError(
      error instanceof Error ? error.message : String(error),
      'SYNTAX',
      undefined,
      source
    );
  }
}

/**
 * Convert JSON to XML or XML to JSON
 */
export function convert(source: string, options: ConvertOptions = {}): ConvertResult {
  const { format, root } = parse(source, options);
  const output = format === 'json' ? toXml(root, options) : toJson(root, options);
  return { format, output };
}

/**
 * Check that text parses without converting it
 */
export function validate(
  source: string,
  options?: ConvertOptions
): { valid: boolean; format?: InputFormat; error?: ConvertError } {
  try {
    const { format } = parse(source, options);
    return { valid: true, format };
  } catch (error) {
    if (error instanceof ConvertError) {
      return { valid: false, error };
    }
    return {
      valid: false,
      error: new ConvertError(
        error instanceof Error ? error.message : String(error),
        'SYNTAX',
        undefined,
        source
      ),
    };
  }
}

// Re-export types and classes
export * from './types';
export { TreeNode, formatAttribute, formatValue } from './node';
export { JsonLexer } from './json/lexer';
export { JsonParser } from './json/parser';
export { JsonReader } from './json/reader';
export { XmlLexer } from './xml/lexer';
export { XmlReader } from './xml/reader';
export { TreeSerializer } from './serializer';
