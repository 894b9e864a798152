import { describe, it } from 'node:test';
import assert from 'node:assert';
import { escapeAttribute, escapeText, positionAt, scanXml, textContent, unescapeXml } from '../src/xml.js';
import { InvalidHostFormatError } from '../src/errors.js';

describe('xml', () => {
  it('should record element spans and attributes', () => {
    const text = '<?xml version="1.0"?>\n<svg w="1 &amp; 2"><g/><p>t</p></svg>';
    const doc = scanXml(text);
    assert.strictEqual(doc.root.name, 'svg');
    assert.strictEqual(doc.root.attributes.get('w'), '1 & 2');
    assert.deepStrictEqual(doc.elements.map(e => e.name), ['svg', 'g', 'p']);
    const p = doc.root.children[1];
    assert.strictEqual(text.slice(p.start, p.end), '<p>t</p>');
    assert.strictEqual(text.slice(doc.root.closeStart), '</svg>');
    assert.strictEqual(doc.root.children[0].selfClosing, true);
  });

  it('should skip comments, CDATA, PIs and a DOCTYPE with an internal subset', () => {
    const text = [
      '<!DOCTYPE svg [ <!ENTITY logo "x>y"> ]>',
      '<!-- <not-an-element> -->',
      '<svg><![CDATA[<b>]]><?pi <x> ?><!-- <c/> --></svg>',
    ].join('\n');
    const doc = scanXml(text);
    assert.deepStrictEqual(doc.elements.map(e => e.name), ['svg']);
  });

  it('should ignore apostrophes in comments and PIs inside the internal subset', () => {
    const text = [
      '<?xml version="1.0"?>',
      '<!DOCTYPE svg [',
      "  <!-- it's a comment -->",
      "  <?note don't ?>",
      '  <!ENTITY logo "x">',
      ']>',
      '<svg><g/></svg>',
    ].join('\n');
    const doc = scanXml(text);
    assert.deepStrictEqual(doc.elements.map(e => e.name), ['svg', 'g']);
    assert.strictEqual(text.slice(doc.root.start, doc.root.end), '<svg><g/></svg>');
  });

  it('should keep DTD-defined entities in attributes as written', () => {
    const doc = scanXml('<svg t="&logo;"/>');
    assert.strictEqual(doc.root.attributes.get('t'), '&logo;');
  });

  it('should report mismatched tags with a position', () => {
    assert.throws(
      () => scanXml('<svg>\n  <g></svg>'),
      (err: unknown) =>
        err instanceof InvalidHostFormatError &&
        err.line === 2 &&
        err.column === 6 &&
        /Expected <\/g> but found <\/svg>/.test(err.message),
    );
  });

  it('should reject malformed markup', () => {
    const cases: Array<[string, RegExp]> = [
      ['', /Document has no root element/],
      ['text<svg/>', /Text before the root element/],
      ['<svg/><svg/>', /Content after the root element/],
      ['<svg>', /Element <svg> is never closed/],
      ['<svg a=1/>', /Attribute value must be quoted/],
      ['<svg a="1" a="2"/>', /Duplicate attribute a/],
      ['<svg>&</svg>', /Bare "&" is not allowed/],
      ['<svg><!-- open</svg>', /Unterminated comment/],
    ];
    for (const [text, pattern] of cases) {
      assert.throws(() => scanXml(text), pattern, text);
    }
  });

  it('should compute 1-based line and column', () => {
    assert.deepStrictEqual(positionAt('ab\ncd', 4), { line: 2, column: 2 });
    assert.deepStrictEqual(positionAt('ab', 0), { line: 1, column: 1 });
  });

  it('should unescape entities and character references', () => {
    assert.strictEqual(unescapeXml('&lt;a&gt; &amp; &quot;&apos; &#65;&#x42;'), '<a> & "\' AB');
    assert.throws(() => unescapeXml('&nope;'), /Unknown entity &nope;/);
    assert.strictEqual(unescapeXml('&nope;', false), '&nope;');
    assert.throws(() => unescapeXml('&#x110000;'), /Invalid character reference/);
  });

  it('should read element text with CDATA verbatim', () => {
    const text = '<e>a &amp; <![CDATA[<raw>&amp;]]><!-- c -->b</e>';
    const doc = scanXml(text);
    assert.strictEqual(textContent(text, doc.root), 'a & <raw>&amp;b');
  });

  it('should refuse text of an element with children', () => {
    const text = '<e>a<b/></e>';
    assert.throws(() => textContent(text, scanXml(text).root), /<e> must not contain elements/);
  });

  it('should escape text and attributes', () => {
    assert.strictEqual(escapeText('a<b>&c\r\n"'), 'a&lt;b&gt;&amp;c&#13;\n"');
    assert.strictEqual(escapeAttribute('a"b\tc\nd<&'), 'a&quot;b&#9;c&#10;d&lt;&amp;');
  });

  it('should round-trip escaped text', () => {
    const value = 'x < y && z > "q"\r\n\ttab';
    const text = `<e>${escapeText(value)}</e>`;
    assert.strictEqual(textContent(text, scanXml(text).root), value);
  });
});
