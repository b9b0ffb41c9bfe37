/**
 * Tests for xmlScanner
 *
 * Usage: npm test
 */

import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { MalformedDocumentError } from '../../errors.js';
import { ancestry, childElements, encodeAttribute, encodeText, getAttribute, scanXml } from '../xmlScanner.js';

describe('scanXml', () => {
  it('builds indexed element paths', () => {
    const tree = scanXml("<a><b/><c><b x='1'/></c><b/></a>");
    assert.deepStrictEqual(tree.elements.map(e => e.path), ['a', 'a/b[0]', 'a/c[0]', 'a/c[0]/b[0]', 'a/b[1]']);
    assert.strictEqual(tree.root.name, 'a');
    assert.deepStrictEqual(childElements(tree, tree.root, 'b').map(e => e.index), [1, 4]);
  });

  it('decodes attribute values and keeps their raw offsets', () => {
    const source = `<w f='[A] + &quot;x&quot;' g="1 &amp; 2"/>`;
    const tree = scanXml(source);
    const [f, g] = tree.root.attributes;
    assert.strictEqual(f?.value, '[A] + "x"');
    assert.strictEqual(f?.quote, "'");
    assert.strictEqual(source.slice(f?.rawStart, f?.rawEnd), '[A] + &quot;x&quot;');
    assert.strictEqual(g?.value, '1 & 2');
    assert.strictEqual(getAttribute(tree.root, 'g'), '1 & 2');
    assert.strictEqual(getAttribute(tree.root, 'missing'), undefined);
  });

  it('decodes numeric character references', () => {
    const tree = scanXml("<w v='a&#10;b&#x41;'/>");
    assert.strictEqual(getAttribute(tree.root, 'v'), 'a\nbA');
  });

  it('collects text and CDATA content', () => {
    const tree = scanXml('<r>[A] &lt; 2<![CDATA[<raw>]]></r>');
    assert.deepStrictEqual(tree.root.texts.map(t => [t.value, t.cdata]), [['[A] < 2', false], ['<raw>', true]]);
  });

  it('skips the prolog, comments, doctype and a BOM', () => {
    const tree = scanXml("\uFEFF<?xml version='1.0'?>\n<!DOCTYPE w>\n<!-- note -->\n<w><!-- inner --></w>\n");
    assert.strictEqual(tree.elements.length, 1);
    assert.strictEqual(tree.root.name, 'w');
  });

  it('lists ancestry from the root down', () => {
    const tree = scanXml('<a><b><c/></b></a>');
    const c = tree.elements[2];
    assert.ok(c);
    assert.deepStrictEqual(ancestry(tree, c), ['a', 'b', 'c']);
  });

  it('reports the position of mismatched tags', () => {
    assert.throws(() => scanXml('<a>\n  <b></a>'), (err: unknown) => {
      assert.ok(err instanceof MalformedDocumentError);
      assert.strictEqual(err.line, 2);
      assert.strictEqual(err.column, 6);
      assert.strictEqual(err.message, 'Closing tag </a> does not match <b> (line 2, column 6)');
      return true;
    });
  });

  it('rejects documents that are not well-formed', () => {
    const cases = [
      '<a>',
      '<a></a><b/>',
      '<a x="1" x="2"/>',
      '<a x="&bogus;"/>',
      '<a x=1/>',
      'text<a/>',
      '',
      '<a><!-- open</a>'
    ];
    for (const source of cases) {
      assert.throws(() => scanXml(source), MalformedDocumentError, source);
    }
  });
});

describe('encoding', () => {
  it('escapes attribute values for either quote style', () => {
    assert.strictEqual(encodeAttribute(`[a] & "b" <'c'>\n`), '[a] &amp; &quot;b&quot; &lt;&apos;c&apos;&gt;&#10;');
  });

  it('escapes text content', () => {
    assert.strictEqual(encodeText('a < b & "c"'), 'a &lt; b &amp; "c"');
  });
});
