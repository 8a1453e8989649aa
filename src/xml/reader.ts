/**
 * XML Reader - builds the intermediate tree from XML tag tokens
 * Each open tag is matched with its own close tag, so same-named
 * descendants nest correctly
 */

import { XmlLexer } from './lexer';
import { TreeNode, quoteText } from '../node';
import { ConvertError, XmlTokenType } from '../types';
import type { ParserOptions, XmlToken } from '../types';

export class XmlReader {
  private tokens: XmlToken[] = [];
  private current: number = 0;
  private depth: number = 0;
  private source: string = '';
  private options: Required<ParserOptions>;

  constructor(options: ParserOptions = {}) {
    this.options = {
      maxDepth: options.maxDepth ?? 100,
    };
  }

  /**
   * Parse XML text into a tree whose root has an empty name; every
   * top-level element becomes a child of that root
   */
  public parse(source: string): TreeNode {
    this.source = source;
    this.tokens = new XmlLexer(source).tokenize();
    this.current = 0;
    this.depth = 0;

    const root = TreeNode.root();

    while (!this.check(XmlTokenType.EOF)) {
      const token = this.peek();
      switch (token.type) {
        case XmlTokenType.TEXT:
          if (token.value.trim() !== '') {
            throw this.error(`Text outside of an element: '${token.value.trim()}'`, token);
          }
          this.advance();
          break;
        case XmlTokenType.CLOSE_TAG:
          throw this.error(`Unexpected closing tag </${token.value}>`, token);
        default:
          root.addChild(this.readElement(root));
      }
    }

    return root;
  }

  private readElement(parent: TreeNode): TreeNode {
    const open = this.advance();
    const name = open.value;

    if (open.type === XmlTokenType.SELF_CLOSING_TAG) {
      const leaf = new TreeNode(parent, name, 'null');
      open.attributes.forEach(attribute => leaf.addAttribute(attribute));
      return leaf;
    }

    this.enter(open);
    const node = new TreeNode(parent, name, '');
    open.attributes.forEach(attribute => node.addAttribute(attribute));

    let text = '';
    let strayText: XmlToken | undefined;

    while (!this.check(XmlTokenType.CLOSE_TAG)) {
      const token = this.peek();
      if (token.type === XmlTokenType.EOF) {
        throw this.error(`Unclosed element <${name}>`, open);
      }
      if (token.type === XmlTokenType.TEXT) {
        text += token.value;
        if (strayText === undefined && token.value.trim() !== '') {
          strayText = token;
        }
        this.advance();
        continue;
      }
      node.addChild(this.readElement(node));
    }

    const close = this.advance();
    if (close.value !== name) {
      throw this.error(`Mismatched closing tag </${close.value}>, expected </${name}>`, close);
    }
    this.depth--;

    if (node.isLeaf()) {
      node.setValue(quoteText(text));
    } else if (strayText !== undefined) {
      throw this.error(`Mixed text and elements in <${name}> are not supported`, strayText);
    }

    return node;
  }

  private enter(token: XmlToken): void {
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

  private check(type: XmlTokenType): boolean {
    return this.peek().type === type;
  }

  private advance(): XmlToken {
    const token = this.peek();
    if (this.current < this.tokens.length - 1) this.current++;
    return token;
  }

  private peek(): XmlToken {
    return this.tokens[this.current];
  }

  private error(message: string, token: XmlToken): ConvertError {
    return new ConvertError(message, 'SYNTAX', token.position, this.source);
  }
}
