/**
 * Offset-preserving XML scanner.
 *
 * Lightweight regex/indexOf lexer in the spirit of a zero-dependency record
 * parser, but it keeps the raw offsets of every attribute value and text node
 * so edits can be spliced into the original source while all untouched bytes
 * stay exactly as they were. Also enforces well-formedness: balanced tags,
 * a single root, valid entity references, no duplicate attributes.
 */

import { MalformedDocumentError } from '../errors.js';

export interface XmlAttribute {
  name: string;
  value: string;              // entity-decoded
  rawStart: number;           // first character inside the quotes
  rawEnd: number;             // offset of the closing quote
  quote: '"' | "'";
}

export interface XmlText {
  value: string;              // entity-decoded (CDATA content verbatim)
  rawStart: number;
  rawEnd: number;
  cdata: boolean;
}

export interface XmlElement {
  index: number;
  name: string;
  parent: number;             // -1 for the root
  path: string;               // e.g. workbook/datasources[0]/datasource[1]/column[3]
  attributes: XmlAttribute[];
  texts: XmlText[];
  children: number[];
}

export interface XmlTree {
  source: string;
  elements: XmlElement[];
  root: XmlElement;
}

const NAME_PATTERN = /[A-Za-z_:\u00C0-\uFFFF][-A-Za-z0-9_:.\u00B7\u00C0-\uFFFF]*/y;
const ENTITY_PATTERN = /&(#x[0-9a-fA-F]+|#[0-9]+|amp|lt|gt|quot|apos);/y;
const WHITESPACE = /\s/;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'"
};

/**
 * Scan a complete XML document.
 *
 * @throws MalformedDocumentError when the text is not well-formed
 */
export function scanXml(source: string): XmlTree {
  const elements: XmlElement[] = [];
  const stack: XmlElement[] = [];
  const siblingCounts = new Map<number, Map<string, number>>();
  const len = source.length;
  let pos = source.charCodeAt(0) === 0xfeff ? 1 : 0;
  let rootClosed = false;

  const fail: (message: string, offset: number) => never = (message, offset) => {
    const { line, column } = positionOf(source, offset);
    throw new MalformedDocumentError(message, line, column);
  };

  const pathFor = (parent: XmlElement | undefined, name: string): string => {
    if (!parent) return name;
    let counts = siblingCounts.get(parent.index);
    if (!counts) {
      counts = new Map();
      siblingCounts.set(parent.index, counts);
    }
    const n = counts.get(name) ?? 0;
    counts.set(name, n + 1);
    return `${parent.path}/${name}[${n}]`;
  };

  const readName = (offset: number): string => {
    NAME_PATTERN.lastIndex = offset;
    const match = NAME_PATTERN.exec(source);
    if (!match) return fail('Expected a tag or attribute name', offset);
    return match[0];
  };

  const skipWhitespace = (offset: number): number => {
    let i = offset;
    while (i < len && WHITESPACE.test(source.charAt(i))) i++;
    return i;
  };

  while (pos < len) {
    const lt = source.indexOf('<', pos);
    const textEnd = lt === -1 ? len : lt;

    if (textEnd > pos) {
      const current = stack[stack.length - 1];
      if (!current) {
        if (source.slice(pos, textEnd).trim() !== '') {
          fail('Text outside the root element', pos);
        }
      } else {
        current.texts.push({
          value: decodeEntities(source, pos, textEnd, fail),
          rawStart: pos,
          rawEnd: textEnd,
          cdata: false
        });
      }
    }
    if (lt === -1) break;

    if (source.startsWith('<?', lt)) {
      const end = source.indexOf('?>', lt + 2);
      if (end === -1) fail('Unterminated processing instruction', lt);
      pos = end + 2;
      continue;
    }

    if (source.startsWith('<!--', lt)) {
      const end = source.indexOf('-->', lt + 4);
      if (end === -1) fail('Unterminated comment', lt);
      pos = end + 3;
      continue;
    }

    if (source.startsWith('<![CDATA[', lt)) {
      const current = stack[stack.length - 1];
      if (!current) fail('CDATA section outside the root element', lt);
      const start = lt + 9;
      const end = source.indexOf(']]>', start);
      if (end === -1) fail('Unterminated CDATA section', lt);
      current?.texts.push({ value: source.slice(start, end), rawStart: start, rawEnd: end, cdata: true });
      pos = end + 3;
      continue;
    }

    if (source.startsWith('<!', lt)) {
      if (stack.length > 0 || elements.length > 0) fail('Declaration inside the document body', lt);
      const bracket = source.indexOf('[', lt);
      const close = source.indexOf('>', lt);
      if (close === -1) fail('Unterminated declaration', lt);
      const end = bracket !== -1 && bracket < close ? source.indexOf(']>', bracket) + 1 : close;
      if (end === 0) fail('Unterminated declaration', lt);
      pos = end + 1;
      continue;
    }

    if (source.startsWith('</', lt)) {
      const name = readName(lt + 2);
      const after = skipWhitespace(lt + 2 + name.length);
      if (source.charAt(after) !== '>') fail(`Malformed closing tag </${name}>`, lt);
      const open = stack.pop();
      if (!open) return fail(`Unexpected closing tag </${name}>`, lt);
      if (open.name !== name) fail(`Closing tag </${name}> does not match <${open.name}>`, lt);
      if (stack.length === 0) rootClosed = true;
      pos = after + 1;
      continue;
    }

    // Start tag
    const name = readName(lt + 1);
    if (stack.length === 0 && (rootClosed || elements.length > 0)) {
      fail(`Second root element <${name}>`, lt);
    }
    const parent = stack[stack.length - 1];
    const element: XmlElement = {
      index: elements.length,
      name,
      parent: parent ? parent.index : -1,
      path: pathFor(parent, name),
      attributes: [],
      texts: [],
      children: []
    };
    elements.push(element);
    parent?.children.push(element.index);

    let cursor = lt + 1 + name.length;
    let selfClosing = false;
    for (;;) {
      const next = skipWhitespace(cursor);
      if (next >= len) fail(`Unterminated tag <${name}>`, lt);
      if (source.startsWith('/>', next)) {
        selfClosing = true;
        cursor = next + 2;
        break;
      }
      if (source.charAt(next) === '>') {
        cursor = next + 1;
        break;
      }
      if (next === cursor) fail(`Expected whitespace before attribute in <${name}>`, next);

      const attrName = readName(next);
      let i = skipWhitespace(next + attrName.length);
      if (source.charAt(i) !== '=') fail(`Attribute ${attrName} has no value`, i);
      i = skipWhitespace(i + 1);
      const quote = source.charAt(i);
      if (quote !== '"' && quote !== "'") return fail(`Attribute ${attrName} value is not quoted`, i);
      const valueStart = i + 1;
      const valueEnd = source.indexOf(quote, valueStart);
      if (valueEnd === -1) fail(`Unterminated value for attribute ${attrName}`, i);
      if (source.slice(valueStart, valueEnd).includes('<')) fail(`Attribute ${attrName} contains '<'`, valueStart);
      if (element.attributes.some(a => a.name === attrName)) fail(`Duplicate attribute ${attrName} on <${name}>`, next);

      element.attributes.push({
        name: attrName,
        value: decodeEntities(source, valueStart, valueEnd, fail),
        rawStart: valueStart,
        rawEnd: valueEnd,
        quote
      });
      cursor = valueEnd + 1;
    }

    if (selfClosing) {
      if (stack.length === 0) rootClosed = true;
    } else {
      stack.push(element);
    }
    pos = cursor;
  }

  const unclosed = stack[stack.length - 1];
  if (unclosed) fail(`Element <${unclosed.name}> is never closed`, len);
  const root = elements[0];
  if (!root) return fail('Document has no root element', 0);

  return { source, elements, root };
}

export function getAttribute(element: XmlElement, name: string): string | undefined {
  return element.attributes.find(a => a.name === name)?.value;
}

export function childElements(tree: XmlTree, element: XmlElement, name?: string): XmlElement[] {
  const result: XmlElement[] = [];
  for (const index of element.children) {
    const child = tree.elements[index];
    if (child && (name === undefined || child.name === name)) result.push(child);
  }
  return result;
}

/** Element names from the root down to (and including) the given element */
export function ancestry(tree: XmlTree, element: XmlElement): string[] {
  const names: string[] = [];
  let current: XmlElement | undefined = element;
  while (current) {
    names.unshift(current.name);
    current = current.parent >= 0 ? tree.elements[current.parent] : undefined;
  }
  return names;
}

/** Escape a value for a quoted attribute (both quote styles are escaped) */
export function encodeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
    .replace(/\n/g, '&#10;')
    .replace(/\r/g, '&#13;')
    .replace(/\t/g, '&#9;');
}

export function encodeText(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

function decodeEntities(
  source: string,
  start: number,
  end: number,
  fail: (message: string, offset: number) => never
): string {
  let out = '';
  let cursor = start;
  for (;;) {
    const amp = source.indexOf('&', cursor);
    if (amp === -1 || amp >= end) break;
    ENTITY_PATTERN.lastIndex = amp;
    const match = ENTITY_PATTERN.exec(source);
    if (!match || amp + match[0].length > end) fail('Invalid entity reference', amp);
    const body = match?.[1] ?? '';
    out += source.slice(cursor, amp) + decodeEntity(body);
    cursor = amp + (match?.[0].length ?? 1);
  }
  return out + source.slice(cursor, end);
}

function decodeEntity(body: string): string {
  if (body.startsWith('#x')) return String.fromCodePoint(parseInt(body.slice(2), 16));
  if (body.startsWith('#')) return String.fromCodePoint(parseInt(body.slice(1), 10));
  return NAMED_ENTITIES[body] ?? '';
}

function positionOf(source: string, offset: number): { line: number; column: number } {
  let line = 1;
  let lastBreak = -1;
  for (let i = 0; i < offset && i < source.length; i++) {
    if (source.charCodeAt(i) === 10) {
      line++;
      lastBreak = i;
    }
  }
  return { line, column: offset - lastBreak };
}
