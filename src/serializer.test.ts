import { describe, it, expect } from 'vitest';
import { TreeSerializer } from './serializer';
import { TreeNode } from './node';
import { JsonReader } from './json/reader';
import { XmlReader } from './xml/reader';

const serializer = new TreeSerializer();
const json = (source: string) => new JsonReader().parse(source);
const xml = (source: string) => new XmlReader().parse(source);

describe('TreeSerializer', () => {
  describe('toJson', () => {
    it('should render leaves with their stored values', () => {
      expect(serializer.toJson(xml('<a/>'))).toBe('{\n\t"a": null\n}');
      expect(serializer.toJson(xml('<a>Ann</a>'))).toBe('{\n\t"a": "Ann"\n}');
    });

    it('should render arrays without keys', () => {
      expect(serializer.toJson(json('{"list": [1, 2, 3]}'))).toBe(
        '{\n\t"list": [\n\t\t"1",\n\t\t"2",\n\t\t"3"\n\t]\n}'
      );
    });

    it('should render empty arrays', () => {
      expect(serializer.toJson(json('{"a": []}'))).toBe('{\n\t"a": [\n\t]\n}');
    });

    it('should render attributes and a # value for leaves', () => {
      expect(serializer.toJson(xml('<a x="1" y=\'2\'>t</a>'))).toBe(
        '{\n\t"a": {\n\t\t"@x": "1",\n\t\t"@y": "2",\n\t\t"#a": "t"\n\t}\n}'
      );
      expect(serializer.toJson(xml('<a x="1"/>'))).toBe('{\n\t"a": {\n\t\t"@x": "1",\n\t\t"#a": null\n\t}\n}');
    });

    it('should render attributes and # children for inner nodes', () => {
      expect(serializer.toJson(xml('<list kind="n"><i>1</i><i>2</i></list>'))).toBe(
        '{\n\t"list": {\n\t\t"@kind": "n",\n\t\t"#list": [\n\t\t\t"1",\n\t\t\t"2"\n\t\t]\n\t}\n}'
      );
      expect(serializer.toJson(xml('<p id="7"><a>1</a><b>2</b></p>'))).toBe(
        '{\n\t"p": {\n\t\t"@id": "7",\n\t\t"#p": {\n\t\t\t"a": "1",\n\t\t\t"b": "2"\n\t\t}\n\t}\n}'
      );
    });

    it('should escape attribute values', () => {
      const root = TreeNode.root();
      const node = new TreeNode(root, 'a', 'null');
      node.addAttribute({ key: 'q', value: 'say "hi" \\ bye' });
      root.addChild(node);

      expect(serializer.toJson(root)).toBe('{\n\t"a": {\n\t\t"@q": "say \\"hi\\" \\\\ bye",\n\t\t"#a": null\n\t}\n}');
    });

    it('should write element text as escaped string literals', () => {
      expect(serializer.toJson(xml('<a>say "hi"</a>'))).toBe('{\n\t"a": "say \\"hi\\""\n}');
    });

    it('should render a bare scalar document', () => {
      expect(serializer.toJson(json('"x"'))).toBe('"x"');
      expect(serializer.toJson(TreeNode.root())).toBe('null');
    });

    it('should honour a custom indent', () => {
      const spaced = new TreeSerializer({ indent: '  ' });
      expect(spaced.toJson(json('{"a": {"b": 1}}'))).toBe('{\n  "a": {\n    "b": "1"\n  }\n}');
    });
  });

  describe('toXml', () => {
    it('should unwrap a root with a single element', () => {
      expect(serializer.toXml(json('{"a": {"b": 1, "c": 2}}'))).toBe('<a>\n\t<b>1</b>\n\t<c>2</c>\n</a>');
    });

    it('should name a root with several elements', () => {
      expect(serializer.toXml(json('{"a": 1, "b": 2}'))).toBe('<root>\n\t<a>1</a>\n\t<b>2</b>\n</root>');
    });

    it('should render an empty root as a self-closing tag', () => {
      expect(serializer.toXml(TreeNode.root())).toBe('<root/>');
    });

    it('should render null leaves as self-closing tags', () => {
      expect(serializer.toXml(json('{"a": null}'))).toBe('<a/>');
      expect(serializer.toXml(json('{"a": {"@x": "1", "#a": null}}'))).toBe('<a x="1"/>');
    });

    it('should write values without their quotes', () => {
      expect(serializer.toXml(json('{"a": "text", "b": 3.5, "c": ""}'))).toBe(
        '<root>\n\t<a>text</a>\n\t<b>3.5</b>\n\t<c></c>\n</root>'
      );
    });

    it('should resolve escapes in values', () => {
      expect(serializer.toXml(json('{"a": "say \\"hi\\" caf\\u00e9 C:\\\\dir"}'))).toBe('<a>say "hi" café C:\\dir</a>');
      expect(serializer.toXml(json('{"a": {"@x": "1", "#a": 5}}'))).toBe('<a x="1">5</a>');
    });

    it('should render array elements with their placeholder name', () => {
      expect(serializer.toXml(json('{"list": [1, [2, 3]]}'))).toBe(
        '<list>\n\t<element>1</element>\n\t<element>\n\t\t<element>2</element>\n\t\t<element>3</element>\n\t</element>\n</list>'
      );
    });

    it('should switch to single quotes for values containing double quotes', () => {
      const root = TreeNode.root();
      const node = new TreeNode(root, 'a', 'null');
      node.addAttribute({ key: 'q', value: 'say "hi"' });
      root.addChild(node);

      expect(serializer.toXml(root)).toBe(`<a q='say "hi"'/>`);
    });
  });
});
