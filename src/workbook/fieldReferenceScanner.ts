/**
 * Field reference tokenizer.
 *
 * Tableau writes field identifiers as bracket-delimited tokens: `[Sales]`,
 * with `]]` standing for a literal `]`. Column instances wrap the field name
 * in derivation and type codes (`[sum:Sales:qk]`) and references may be
 * qualified by their datasource (`[federated.1x2y].[Sales]`). Tokenizing on
 * those delimiters means renaming `Sales` can never touch `SalesTax`.
 */

export type TokenForm = 'bracket' | 'instance' | 'bare';

export type ScanMode = 'formula' | 'plain';

export interface FieldToken {
  name: string;               // unescaped field name
  start: number;              // offset of the whole token in the scanned text
  end: number;
  form: TokenForm;
  derivation?: string;        // instance tokens: "sum" in [sum:Sales:qk]
  suffix?: string;            // instance tokens: "qk" in [sum:Sales:qk]
}

export interface FieldReferenceScanner {
  /** Find every field token in a piece of text */
  scan(text: string, mode: ScanMode): FieldToken[];
  /** Token text for the same reference pointing at another field */
  render(token: FieldToken, name: string): string;
}

const INSTANCE_PATTERN = /^((?:[a-z][a-z0-9]*:)+)(.+):([a-z]{2}(?::\d+)?)$/;

export class BracketFieldReferenceScanner implements FieldReferenceScanner {
  scan(text: string, mode: ScanMode): FieldToken[] {
    const tokens: FieldToken[] = [];
    const len = text.length;
    let i = 0;

    while (i < len) {
      const c = text.charAt(i);

      if (mode === 'formula') {
        if (c === '"' || c === "'") {
          i = skipStringLiteral(text, i);
          continue;
        }
        if (c === '/' && text.charAt(i + 1) === '/') {
          const newline = text.indexOf('\n', i);
          i = newline === -1 ? len : newline + 1;
          continue;
        }
      }

      if (c !== '[') {
        i++;
        continue;
      }

      const close = findClosingBracket(text, i + 1);
      if (close === -1) {
        i++;
        continue;
      }

      const end = close + 1;
      const name = text.slice(i + 1, close).replace(/\]\]/g, ']');

      // [datasource].[field]: the qualifier is not a field
      if (text.charAt(end) === '.' && text.charAt(end + 1) === '[') {
        i = end;
        continue;
      }

      const token = toToken(name, i, end);
      if (token) tokens.push(token);
      i = end;
    }

    return tokens;
  }

  render(token: FieldToken, name: string): string {
    switch (token.form) {
      case 'bare':
        return name;
      case 'bracket':
        return `[${escapeName(name)}]`;
      case 'instance':
        return `[${token.derivation ?? 'none'}:${escapeName(name)}:${token.suffix ?? 'nk'}]`;
    }
  }
}

/**
 * Parse a value that should hold exactly one field identifier, such as the
 * `name` attribute of a catalog column. Unbracketed values are taken as-is.
 */
export function parseIdentifier(value: string): FieldToken {
  const close = value.startsWith('[') ? findClosingBracket(value, 1) : -1;
  if (close === value.length - 1) {
    return { name: value.slice(1, close).replace(/\]\]/g, ']'), start: 0, end: value.length, form: 'bracket' };
  }
  return { name: value, start: 0, end: value.length, form: 'bare' };
}

function toToken(name: string, start: number, end: number): FieldToken | undefined {
  const instance = INSTANCE_PATTERN.exec(name);
  const fieldName = instance?.[2] ?? name;

  // Empty brackets and Tableau's generated fields ([:Measure Names]) are not renamable
  if (fieldName === '' || fieldName.startsWith(':')) return undefined;

  if (instance) {
    return {
      name: fieldName,
      start,
      end,
      form: 'instance',
      derivation: (instance[1] ?? 'none:').slice(0, -1),
      suffix: instance[3]
    };
  }
  return { name, start, end, form: 'bracket' };
}

function findClosingBracket(text: string, from: number): number {
  let j = from;
  while (j < text.length) {
    if (text.charAt(j) === ']') {
      if (text.charAt(j + 1) === ']') {
        j += 2;
        continue;
      }
      return j;
    }
    j++;
  }
  return -1;
}

function skipStringLiteral(text: string, start: number): number {
  const quote = text.charAt(start);
  let j = start + 1;
  while (j < text.length) {
    if (text.charAt(j) === quote) {
      if (text.charAt(j + 1) === quote) {
        j += 2;
        continue;
      }
      return j + 1;
    }
    j++;
  }
  return text.length;
}

function escapeName(name: string): string {
  return name.replace(/\]/g, ']]');
}
