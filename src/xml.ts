/**
 * Minimal XML well-formedness scanner with no dependencies.
 * Records element spans by offset so callers can splice the source text
 * without re-serializing markup they do not own.
 */

import { InvalidHostFormatError } from './errors.js';

export interface XmlElement {
  name: string;
  /** Unescaped attribute values */
  attributes: Map<string, string>;
  /** Offset of the opening `<` */
  start: number;
  /** Offset just past the start tag (`>` or `/>`) */
  openEnd: number;
  /** Offset of the end tag's `</`, or of `/>` when self-closing */
  closeStart: number;
  /** Offset just past the element */
  end: number;
  selfClosing: boolean;
  children: XmlElement[];
}

export interface XmlDocument {
  root: XmlElement;
  /** Every element, in document order */
  elements: XmlElement[];
}

const NAME = /[A-Za-z_:\u00C0-\uFFFF][\w.:\-\u00B7\u00C0-\uFFFF]*/y;
const REFERENCE = /&(?:#[0-9]+|#x[0-9a-fA-F]+|[A-Za-z_:][\w.:-]*);/y;

export function positionAt(text: string, offset: number): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1 };
}

class Scanner {
  pos = 0;
  readonly elements: XmlElement[] = [];

  constructor(readonly text: string) {}

  fail(message: string, at = this.pos): never {
    throw new InvalidHostFormatError(message, positionAt(this.text, at));
  }

  startsWith(s: string): boolean {
    return this.text.startsWith(s, this.pos);
  }

  skipSpace(): boolean {
    const from = this.pos;
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) this.pos++;
    return this.pos > from;
  }

  skipPast(terminator: string, what: string): void {
    const idx = this.text.indexOf(terminator, this.pos);
    if (idx === -1) this.fail(`Unterminated ${what}`);
    this.pos = idx + terminator.length;
  }

  name(): string {
    NAME.lastIndex = this.pos;
    const m = NAME.exec(this.text);
    if (!m) return this.fail('Expected a name');
    this.pos += m[0].length;
    return m[0];
  }

  reference(): void {
    REFERENCE.lastIndex = this.pos;
    const m = REFERENCE.exec(this.text);
    if (!m) return this.fail('Bare "&" is not allowed');
    this.pos += m[0].length;
  }

  doctype(): void {
    let depth = 0;
    let quote: string | null = null;
    this.pos += '<!DOCTYPE'.length;
    while (this.pos < this.text.length) {
      // Markup declarations in the internal subset may hold stray quotes.
      if (!quote && depth > 0 && this.startsWith('<!--')) {
        this.skipPast('-->', 'comment');
        continue;
      }
      if (!quote && depth > 0 && this.startsWith('<?')) {
        this.skipPast('?>', 'processing instruction');
        continue;
      }
      const ch = this.text[this.pos++];
      if (quote) {
        if (ch === quote) quote = null;
      } else if (ch === '"' || ch === "'") {
        quote = ch;
      } else if (ch === '[') {
        depth++;
      } else if (ch === ']') {
        depth--;
      } else if (ch === '>' && depth === 0) {
        return;
      }
    }
    this.fail('Unterminated DOCTYPE');
  }

  /** Comments, PIs and whitespace outside the root element. */
  misc(allowDoctype: boolean): void {
    for (;;) {
      this.skipSpace();
      if (this.startsWith('<!--')) {
        this.skipPast('-->', 'comment');
      } else if (this.startsWith('<?')) {
        this.skipPast('?>', 'processing instruction');
      } else if (allowDoctype && this.startsWith('<!DOCTYPE')) {
        this.doctype();
        allowDoctype = false;
      } else {
        return;
      }
    }
  }

  attributeValue(): string {
    const quote = this.text[this.pos];
    if (quote !== '"' && quote !== "'") this.fail('Attribute value must be quoted');
    const from = ++this.pos;
    while (this.pos < this.text.length && this.text[this.pos] !== quote) {
      const ch = this.text[this.pos];
      if (ch === '<') this.fail('"<" inside attribute value');
      if (ch === '&') this.reference();
      else this.pos++;
    }
    if (this.pos >= this.text.length) this.fail('Unterminated attribute value', from);
    const raw = this.text.slice(from, this.pos);
    this.pos++;
    return unescapeXml(raw, false, this.text, from);
  }

  element(): XmlElement {
    const start = this.pos;
    this.pos++; // <
    const name = this.name();
    const attributes = new Map<string, string>();

    for (;;) {
      const spaced = this.skipSpace();
      if (this.startsWith('/>')) {
        const el: XmlElement = {
          name, attributes, start,
          openEnd: this.pos + 2, closeStart: this.pos, end: this.pos + 2,
          selfClosing: true, children: [],
        };
        this.pos += 2;
        this.elements.push(el);
        return el;
      }
      if (this.startsWith('>')) break;
      if (this.pos >= this.text.length) this.fail(`Unterminated start tag <${name}>`, start);
      if (!spaced) this.fail('Expected whitespace before attribute');
      const attrStart = this.pos;
      const attr = this.name();
      this.skipSpace();
      if (this.text[this.pos] !== '=') this.fail(`Expected "=" after attribute ${attr}`);
      this.pos++;
      this.skipSpace();
      if (attributes.has(attr)) this.fail(`Duplicate attribute ${attr}`, attrStart);
      attributes.set(attr, this.attributeValue());
    }

    this.pos++; // >
    const el: XmlElement = {
      name, attributes, start,
      openEnd: this.pos, closeStart: -1, end: -1,
      selfClosing: false, children: [],
    };
    this.elements.push(el);
    this.content(el);
    return el;
  }

  content(el: XmlElement): void {
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === '&') {
        this.reference();
      } else if (ch !== '<') {
        this.pos++;
      } else if (this.startsWith('</')) {
        el.closeStart = this.pos;
        this.pos += 2;
        const closing = this.name();
        if (closing !== el.name) this.fail(`Expected </${el.name}> but found </${closing}>`, el.closeStart);
        this.skipSpace();
        if (this.text[this.pos] !== '>') this.fail(`Unterminated end tag </${closing}>`);
        this.pos++;
        el.end = this.pos;
        return;
      } else if (this.startsWith('<!--')) {
        this.skipPast('-->', 'comment');
      } else if (this.startsWith('<![CDATA[')) {
        this.skipPast(']]>', 'CDATA section');
      } else if (this.startsWith('<?')) {
        this.skipPast('?>', 'processing instruction');
      } else if (this.startsWith('<!')) {
        this.fail('Unexpected markup declaration');
      } else {
        el.children.push(this.element());
      }
    }
    this.fail(`Element <${el.name}> is never closed`, el.start);
  }

  document(): XmlDocument {
    if (this.text.charCodeAt(0) === 0xfeff) this.pos = 1;
    this.misc(true);
    if (this.text[this.pos] !== '<') {
      this.fail(this.pos >= this.text.length ? 'Document has no root element' : 'Text before the root element');
    }
    const root = this.element();
    this.misc(false);
    if (this.pos < this.text.length) this.fail('Content after the root element');
    return { root, elements: this.elements };
  }
}

/**
 * Scan a document; throws InvalidHostFormatError on malformed markup.
 */
export function scanXml(text: string): XmlDocument {
  return new Scanner(text).document();
}

const PREDEFINED: Record<string, string> = { amp: '&', lt: '<', gt: '>', quot: '"', apos: "'" };

/**
 * Resolve character references and the five predefined entities.
 * Strict mode rejects other entity names; lenient mode (used while
 * scanning host markup, which may declare its own) leaves them as written.
 * `source`/`offset` locate errors in the enclosing document.
 */
export function unescapeXml(raw: string, strict = true, source = raw, offset = 0): string {
  return raw.replace(/&([^;&]*);/g, (match, body: string, at: number) => {
    const fail = (why: string): never => {
      throw new InvalidHostFormatError(`${why} ${match}`, positionAt(source, offset + at));
    };
    if (body.startsWith('#')) {
      const code = body.startsWith('#x') ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
      if (Number.isNaN(code) || code > 0x10ffff) return fail('Invalid character reference');
      return String.fromCodePoint(code);
    }
    const value = PREDEFINED[body];
    if (value !== undefined) return value;
    return strict ? fail('Unknown entity') : match;
  });
}

/**
 * Character data of an element without child elements: text is unescaped,
 * CDATA kept verbatim, comments and PIs dropped.
 */
export function textContent(text: string, el: XmlElement): string {
  if (el.selfClosing) return '';
  if (el.children.length > 0) {
    throw new InvalidHostFormatError(`<${el.name}> must not contain elements`, positionAt(text, el.children[0].start));
  }
  let out = '';
  let pos = el.openEnd;
  const end = el.closeStart;
  while (pos < end) {
    const next = text.indexOf('<', pos);
    const stop = next === -1 || next > end ? end : next;
    out += unescapeXml(text.slice(pos, stop), true, text, pos);
    if (stop === end) break;
    if (text.startsWith('<![CDATA[', stop)) {
      const close = text.indexOf(']]>', stop);
      out += text.slice(stop + 9, close);
      pos = close + 3;
    } else if (text.startsWith('<!--', stop)) {
      pos = text.indexOf('-->', stop) + 3;
    } else {
      pos = text.indexOf('?>', stop) + 2;
    }
  }
  return out;
}

/** Characters XML 1.0 cannot carry, even escaped. */
export const XML_ILLEGAL = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/;

export function escapeText(value: string): string {
  return value.replace(/[&<>\r]/g, ch => (ch === '&' ? '&amp;' : ch === '<' ? '&lt;' : ch === '>' ? '&gt;' : '&#13;'));
}

const ATTR_ESCAPES: Record<string, string> = {
  '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;', '\t': '&#9;', '\n': '&#10;', '\r': '&#13;',
};

export function escapeAttribute(value: string): string {
  return value.replace(/[&<>"\t\n\r]/g, ch => ATTR_ESCAPES[ch] ?? ch);
}
