/**
 * Intermediate tree shared by the JSON and XML codecs
 */

import type { Attribute } from './types';

const ARRAY_ELEMENT_NAME = /^element\(\d+\)$/;
const QUOTED_OR_NULL = /^".*"$|^null$/s;
const QUOTED = /^"(.*)"$/s;
const NAME = /^[\w.-]+$/;
const ESCAPE = /\\(u[0-9a-fA-F]{4}|.)/gs;

/**
 * Wrap a raw scalar in double quotes unless it is already quoted or `null`
 */
export function formatValue(value: string): string {
  return QUOTED_OR_NULL.test(value) ? value : `"${value}"`;
}

/**
 * Store element text as a quoted string literal; `null` stays bare
 */
export function quoteText(text: string): string {
  return text === 'null' ? text : JSON.stringify(text);
}

/**
 * Recover the text of a stored value: quoted literals lose their quotes
 * and escapes, anything else is returned as written
 */
export function unquoteValue(value: string): string {
  const match = QUOTED.exec(value);
  if (match === null) return value;
  return match[1].replace(ESCAPE, (_, escape: string) => unescapeChar(escape));
}

function unescapeChar(escape: string): string {
  switch (escape[0]) {
    case 'n': return '\n';
    case 't': return '\t';
    case 'r': return '\r';
    case 'b': return '\b';
    case 'f': return '\f';
    case 'u': return escape.length === 5 ? String.fromCharCode(parseInt(escape.slice(1), 16)) : escape;
    default: return escape;
  }
}

/**
 * Whether a key can be written as an element or attribute name
 */
export function isValidName(name: string): boolean {
  return NAME.test(name);
}

/**
 * Render an attribute in its `key = "value"` text form
 */
export function formatAttribute(attribute: Attribute): string {
  return `${attribute.key} = "${attribute.value}"`;
}

export class TreeNode {
  public readonly name: string;
  public readonly path: string;
  private value: string | undefined;
  private readonly attributes: Attribute[] = [];
  private readonly children: TreeNode[] = [];
  private array: boolean;

  /**
   * @param parent - owner of the new node, used only to derive its path
   * @param name - key or tag name; `element(<n>)` placeholders collapse to `element`
   * @param value - raw scalar, quoted on the way in (see {@link formatValue})
   */
  constructor(parent: TreeNode | null, name: string, value?: string, isArray: boolean = false) {
    this.name = ARRAY_ELEMENT_NAME.test(name) ? 'element' : name;
    this.path = parent === null || parent.path === '' ? name : `${parent.path}, ${name}`;
    this.value = value === undefined ? undefined : formatValue(value);
    this.array = isArray;
  }

  /**
   * Create an empty-named document root
   */
  public static root(): TreeNode {
    return new TreeNode(null, '');
  }

  public getValue(): string | undefined {
    return this.value;
  }

  /**
   * Overwrite the value as given, without quoting
   */
  public setValue(value: string): void {
    this.value = value;
  }

  public getAttributes(): readonly Attribute[] {
    return this.attributes;
  }

  public addAttribute(attribute: Attribute): void {
    this.attributes.push(attribute);
  }

  public getChildren(): readonly TreeNode[] {
    return this.children;
  }

  public addChild(child: TreeNode): void {
    this.children.push(child);
    this.array =
      this.children.length > 1 && this.children.every(c => c.name === child.name);
  }

  public isLeaf(): boolean {
    return this.children.length === 0;
  }

  public isArray(): boolean {
    return this.array;
  }

  /**
   * Describe the node and its descendants, one `Element:` block per named node
   */
  public toString(): string {
    let result = '';
    if (this.path !== '') {
      result += 'Element:\n';
      result += `path = ${this.path}\n`;
      if (this.isLeaf()) {
        result += `value = ${this.value ?? 'null'}\n`;
      }
      if (this.attributes.length > 0) {
        result += 'attributes:\n';
        for (const attribute of this.attributes) {
          result += formatAttribute(attribute) + '\n';
        }
      }
      result += '\n';
    }
    for (const child of this.children) {
      result += child.toString();
    }
    return result;
  }
}
