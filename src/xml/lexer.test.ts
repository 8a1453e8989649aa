import { describe, it, expect } from 'vitest';
import { XmlLexer } from './lexer';
import { XmlTokenType } from '../types';

describe('XmlLexer', () => {
  it('should tokenize tags and text', () => {
    const tokens = new XmlLexer('<a><b>x</b><c/></a>').tokenize();

    expect(tokens.map(t => [t.type, t.value])).toEqual([
      [XmlTokenType.OPEN_TAG, 'a'],
      [XmlTokenType.OPEN_TAG, 'b'],
      [XmlTokenType.TEXT, 'x'],
      [XmlTokenType.CLOSE_TAG, 'b'],
      [XmlTokenType.SELF_CLOSING_TAG, 'c'],
      [XmlTokenType.CLOSE_TAG, 'a'],
      [XmlTokenType.EOF, ''],
    ]);
  });

  it('should parse attributes with either quote style', () => {
    const tokens = new XmlLexer(`<a id = "1" name='val' empty=""/>`).tokenize();

    expect(tokens[0].type).toBe(XmlTokenType.SELF_CLOSING_TAG);
    expect(tokens[0].attributes).toEqual([
      { key: 'id', value: '1' },
      { key: 'name', value: 'val' },
      { key: 'empty', value: '' },
    ]);
  });

  it('should keep text exactly as written', () => {
    const tokens = new XmlLexer('<a> two words </a>').tokenize();
    expect(tokens[1].value).toBe(' two words ');
  });

  it('should skip declarations', () => {
    const tokens = new XmlLexer('<?xml version="1.0"?><a/>').tokenize();

    expect(tokens.map(t => t.type)).toEqual([XmlTokenType.SELF_CLOSING_TAG, XmlTokenType.EOF]);
  });

  it('should track line and column of tags', () => {
    const tokens = new XmlLexer('<a>\n  <b/>\n</a>').tokenize();

    expect(tokens[2].type).toBe(XmlTokenType.SELF_CLOSING_TAG);
    expect(tokens[2].position).toEqual({ line: 2, column: 3, offset: 6 });
  });

  it('should reject unquoted attribute values', () => {
    expect(() => new XmlLexer('<a id=1/>').tokenize()).toThrow('Attribute id in <a> must be quoted');
  });

  it('should reject unterminated tags', () => {
    expect(() => new XmlLexer('<a id="1"').tokenize()).toThrow('Unterminated tag <a');
  });

  it('should reject comments', () => {
    expect(() => new XmlLexer('<!-- note --><a/>').tokenize()).toThrow(
      'Comments, CDATA and doctype declarations are not supported'
    );
  });
});
