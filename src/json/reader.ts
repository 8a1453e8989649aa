/**
 * JSON Reader - builds the intermediate tree from a JSON syntax tree
 * Resolves `@key` attributes and `#key` values against real child keys
 */

import { JsonLexer } from './lexer';
import { JsonParser } from './parser';
import { TreeNode, formatValue, isValidName } from '../node';
import { ConvertError, JsonNodeType } from '../types';
import type { JsonScalarNode, JsonValueNode, ParserOptions, Position } from '../types';

// key names share the XML name alphabet
const PREFIX_KEY = /^[@#][\w. -]+$/;
const VALUE_KEY = /^#[\w. -]+$/;
const PREFIXED_NAME = /^[@#][\w. -]+$/;
const BARE_PREFIX = /^[@#]?$/;
const ARRAY_ELEMENT_KEY = /^element\(\d+\)$/;

interface Entry {
  value: JsonValueNode;
  /** Position of the key, or of the element for arrays */
  position: Position;
}

type Entries = Map<string, Entry>;

export class JsonReader {
  private options: ParserOptions;
  private source: string | undefined;

  constructor(options: ParserOptions = {}) {
    this.options = options;
  }

  /**
   * Parse JSON text into a tree whose root has an empty name
   */
  public parse(source: string): TreeNode {
    const tokens = new JsonLexer(source).tokenize();
    const document = new JsonParser(tokens, this.options, source).parse();
    this.source = source;
    try {
      return this.read(document);
    } finally {
      this.source = undefined;
    }
  }

  /**
   * Build a tree from an already parsed syntax tree
   */
  public read(document: JsonValueNode): TreeNode {
    const root = TreeNode.root();
    this.readInto(root, document);
    return root;
  }

  private readInto(node: TreeNode, value: JsonValueNode): void {
    switch (value.type) {
      case JsonNodeType.SCALAR:
        this.checkText(value);
        node.setValue(formatValue(value.raw));
        return;

      case JsonNodeType.OBJECT: {
        if (value.members.length === 0) {
          node.setValue('""');
          return;
        }
        const entries: Entries = new Map();
        for (const member of value.members) {
          const previous = entries.get(member.key);
          entries.set(member.key, { value: member.value, position: previous?.position ?? member.position });
        }
        this.readEntries(node, entries);
        return;
      }

      case JsonNodeType.ARRAY: {
        const entries: Entries = new Map();
        value.elements.forEach((element, index) =>
          entries.set(`element(${index})`, { value: element, position: element.position })
        );
        this.readEntries(node, entries);
        return;
      }
    }
  }

  private readEntries(node: TreeNode, entries: Entries): void {
    const { attributes, corrected } = this.correctKeys(entries, node);

    if (attributes && corrected.size > 0) {
      for (const [key, { value, position }] of corrected) {
        if (key.startsWith('@')) {
          this.checkName(key.slice(1), position);
          node.addAttribute({ key: key.slice(1), value: this.attributeValue(value) });
        } else if (value.type === JsonNodeType.SCALAR) {
          this.checkText(value);
          node.setValue(value.raw);
        } else if (!isEmptyContainer(value)) {
          this.readInto(node, value);
        }
      }
      return;
    }

    for (const [key, { value, position }] of corrected) {
      if (!ARRAY_ELEMENT_KEY.test(key)) {
        this.checkName(key, position);
      }
      const child = new TreeNode(node, key, '', value.type === JsonNodeType.ARRAY);
      this.readInto(child, value);
      node.addChild(child);
    }
  }

  /**
   * Decide whether a key set describes the attributes and value of `node`
   * itself, and drop or strip prefixed keys accordingly
   */
  private correctKeys(entries: Entries, node: TreeNode): { attributes: boolean; corrected: Entries } {
    const keys = [...entries.keys()];
    let attributes = keys.every(k => PREFIX_KEY.test(k)) && keys.some(k => VALUE_KEY.test(k));

    for (const [key, { value }] of entries) {
      if (key.length < 2) continue;
      if (key.startsWith('#') && key !== `#${node.name}`) {
        attributes = false;
      }
      if (key.startsWith('@') && !(value.type === JsonNodeType.SCALAR || isEmptyContainer(value))) {
        attributes = false;
      }
    }

    const corrected: Entries = new Map();
    for (const [key, entry] of entries) {
      if (BARE_PREFIX.test(key)) continue;
      // a prefixed key loses to an unprefixed sibling of the same name
      if (PREFIXED_NAME.test(key) && entries.has(key.slice(1))) continue;

      corrected.set(attributes ? key : key.replace(/[@#]/g, ''), entry);
    }

    return { attributes, corrected };
  }

  private attributeValue(value: JsonValueNode): string {
    if (value.type !== JsonNodeType.SCALAR || value.valueType === 'null') {
      return '';
    }
    if (value.value.includes('"') && value.value.includes("'")) {
      throw this.error('Attribute values cannot hold both quote characters', value.position);
    }
    return value.value;
  }

  private checkName(name: string, position: Position): void {
    if (!isValidName(name)) {
      throw this.error(`Key '${name}' is not a valid element or attribute name`, position);
    }
  }

  private checkText(value: JsonScalarNode): void {
    if (value.valueType === 'string' && value.value.includes('<')) {
      throw this.error("Character '<' is not supported in values", value.position);
    }
  }

  private error(message: string, position: Position): ConvertError {
    return new ConvertError(message, 'SYNTAX', position, this.source);
  }
}

function isEmptyContainer(value: JsonValueNode): boolean {
  return (
    (value.type === JsonNodeType.OBJECT && value.members.length === 0) ||
    (value.type === JsonNodeType.ARRAY && value.elements.length === 0)
  );
}
