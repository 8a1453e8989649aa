/**
 * Tree Serializer - renders the intermediate tree as JSON or XML text
 * Both renderings are indentation-aware and never re-parse anything
 */

import { unquoteValue } from './node';
import type { TreeNode } from './node';
import type { Attribute, SerializerOptions } from './types';

export class TreeSerializer {
  private options: Required<SerializerOptions>;

  constructor(options: SerializerOptions = {}) {
    this.options = {
      indent: options.indent ?? '\t',
    };
  }

  /**
   * Render a tree as JSON; the empty-named root is written without a key
   */
  public toJson(root: TreeNode): string {
    return this.buildJson(root, '', true, false);
  }

  /**
   * Render a tree as XML; an empty-named root is unwrapped when it holds
   * exactly one element and called `root` otherwise
   */
  public toXml(root: TreeNode): string {
    return this.buildXml(root, '');
  }

  private buildJson(node: TreeNode, tabs: string, isLast: boolean, isArrayElement: boolean): string {
    const attributes = node.getAttributes();
    let result = tabs;

    if (!isArrayElement && node.name.trim() !== '') {
      result += `"${node.name}": `;
    }

    if (attributes.length === 0) {
      if (node.isArray()) {
        result += '[' + this.buildJsonChildren(node, tabs, true);
      } else if (node.isLeaf()) {
        result += node.getValue() ?? 'null';
      } else {
        result += '{' + this.buildJsonChildren(node, tabs, false);
      }
    } else {
      const inner = tabs + this.options.indent;
      result += '{';
      for (const attribute of attributes) {
        result += `\n${inner}"@${attribute.key}": ${JSON.stringify(attribute.value)},`;
      }
      if (node.isLeaf()) {
        result += `\n${inner}"#${node.name}": ${node.getValue() ?? 'null'}`;
      } else {
        const isArray = node.isArray();
        result += `\n${inner}"#${node.name}": ${isArray ? '[' : '{'}`;
        result += this.buildJsonChildren(node, inner, isArray);
      }
      result += `\n${tabs}}`;
    }

    if (!isLast) result += ',';
    return result;
  }

  private buildJsonChildren(node: TreeNode, tabs: string, isArray: boolean): string {
    const children = node.getChildren();
    let result = '';
    children.forEach((child, i) => {
      result += '\n' + this.buildJson(child, tabs + this.options.indent, i === children.length - 1, isArray);
    });
    return result + `\n${tabs}${isArray ? ']' : '}'}`;
  }

  private buildXml(node: TreeNode, tabs: string): string {
    const children = node.getChildren();
    let name = node.name;

    if (name === '') {
      if (children.length === 1) {
        return this.buildXml(children[0], tabs);
      }
      name = 'root';
    }

    const attributes = node.getAttributes().map(a => ' ' + this.formatXmlAttribute(a)).join('');

    if (node.isLeaf()) {
      const stored = node.getValue();
      const value = stored === undefined ? 'null' : unquoteValue(stored);
      return value === 'null'
        ? `${tabs}<${name}${attributes}/>`
        : `${tabs}<${name}${attributes}>${value}</${name}>`;
    }

    let result = `${tabs}<${name}${attributes}>`;
    for (const child of children) {
      result += '\n' + this.buildXml(child, tabs + this.options.indent);
    }
    return result + `\n${tabs}</${name}>`;
  }

  private formatXmlAttribute(attribute: Attribute): string {
    const quote = attribute.value.includes('"') ? "'" : '"';
    return `${attribute.key}=${quote}${attribute.value}${quote}`;
  }
}
