/**
 * Workbook Document
 *
 * Structural model of a Tableau workbook (.twb): the field catalog declared
 * by the datasources plus every place a field name occurs. The model owns its
 * source text and is never mutated; rename() splices the affected attribute
 * values and text nodes into a copy of the source and parses the result into
 * a new document.
 */

import { MalformedDocumentError, UnsupportedWorkbookError } from '../errors.js';
import {
  BracketFieldReferenceScanner,
  parseIdentifier,
  type FieldReferenceScanner,
  type FieldToken,
  type ScanMode
} from './fieldReferenceScanner.js';
import {
  ancestry,
  childElements,
  encodeAttribute,
  encodeText,
  getAttribute,
  scanXml,
  type XmlElement,
  type XmlTree
} from './xmlScanner.js';
import type {
  FieldDescriptor,
  FieldKind,
  FieldRole,
  ReferenceKind,
  RenameOutcome,
  StructuralLocationReference
} from './types.js';

const REQUIRED_SECTIONS = ['datasources', 'worksheets'];

// Attributes that hold data values or metadata, never field identifiers
const SKIPPED_ATTRIBUTES = new Set([
  'alias',
  'key',
  'locale',
  'member',
  'source-build',
  'source-platform',
  'table',
  'value',
  'version'
]);

// Physical-layer elements: custom SQL and source column names stay untouched
const SKIPPED_ELEMENTS = new Set(['connection', 'named-connection', 'parent-name', 'relation', 'remote-alias', 'remote-name']);

const FILTER_ELEMENTS = new Set(['filter', 'groupfilter']);
const SORT_ELEMENTS = new Set(['sort', 'computed-sort', 'natural-sort', 'manual-sort']);
const VIEW_ELEMENTS = new Set(['worksheet', 'dashboard', 'window']);

interface Slot {
  element: XmlElement;
  attribute?: string;
  value: string;
  rawStart: number;
  rawEnd: number;
  encoding: 'attribute' | 'text' | 'cdata';
}

interface SlotReferences {
  slot: Slot;
  references: StructuralLocationReference[];
}

interface DuplicateDeclaration {
  name: string;
  datasource: string;
  location: string;
}

export class WorkbookDocument {
  private readonly fields: FieldDescriptor[] = [];
  private readonly fieldsByName = new Map<string, FieldDescriptor>();
  private readonly slots: SlotReferences[] = [];
  private readonly allReferences: StructuralLocationReference[] = [];
  private readonly duplicates: DuplicateDeclaration[] = [];

  private constructor(
    private readonly tree: XmlTree,
    private readonly scanner: FieldReferenceScanner
  ) {
    const declarations = this.buildCatalog();
    this.collectReferences(declarations);

    for (const field of this.fields) {
      field.referencedIn = this.allReferences
        .filter(r => r.fieldName === field.name && r.kind !== 'catalog' && r.kind !== 'caption')
        .map(r => r.id);
    }
  }

  /**
   * Parse workbook XML.
   *
   * @throws MalformedDocumentError when the bytes are not well-formed XML
   * @throws UnsupportedWorkbookError when the workbook sections are missing
   */
  static parse(
    input: string | Buffer,
    scanner: FieldReferenceScanner = new BracketFieldReferenceScanner()
  ): WorkbookDocument {
    const source = typeof input === 'string' ? input : input.toString('utf-8');
    const tree = scanXml(source);

    if (tree.root.name !== 'workbook') {
      throw new UnsupportedWorkbookError(
        ['workbook'],
        `Root element is <${tree.root.name}>, expected <workbook>`
      );
    }
    const missing = REQUIRED_SECTIONS.filter(s => childElements(tree, tree.root, s).length === 0);
    if (missing.length > 0) {
      throw new UnsupportedWorkbookError(missing);
    }

    return new WorkbookDocument(tree, scanner);
  }

  get version(): string | undefined {
    return getAttribute(this.tree.root, 'version');
  }

  get datasourceNames(): string[] {
    return this.datasourceElements().map(ds => datasourceLabel(ds));
  }

  get worksheetNames(): string[] {
    const names: string[] = [];
    for (const section of childElements(this.tree, this.tree.root, 'worksheets')) {
      for (const sheet of childElements(this.tree, section, 'worksheet')) {
        const name = getAttribute(sheet, 'name');
        if (name) names.push(name);
      }
    }
    return names;
  }

  /** Declared fields in document order */
  catalog(): readonly FieldDescriptor[] {
    return this.fields;
  }

  getField(name: string): FieldDescriptor | undefined {
    return this.fieldsByName.get(name);
  }

  hasField(name: string): boolean {
    return this.fieldsByName.has(name);
  }

  /** True when some catalog field is named or captioned `name` */
  declares(name: string): boolean {
    return this.fieldsByName.has(name) || this.fields.some(f => f.caption === name);
  }

  references(): readonly StructuralLocationReference[] {
    return this.allReferences;
  }

  findReferences(fieldName: string): StructuralLocationReference[] {
    return this.allReferences.filter(r => r.fieldName === fieldName);
  }

  /** First reference of every name that is used but not declared */
  unresolvedReferences(): StructuralLocationReference[] {
    const seen = new Set<string>();
    const result: StructuralLocationReference[] = [];
    for (const ref of this.allReferences) {
      if (ref.kind === 'caption' || this.fieldsByName.has(ref.fieldName) || seen.has(ref.fieldName)) continue;
      seen.add(ref.fieldName);
      result.push(ref);
    }
    return result;
  }

  /** Declarations of a name already declared by an earlier datasource */
  duplicateDeclarations(): readonly DuplicateDeclaration[] {
    return this.duplicates;
  }

  /**
   * Rewrite every reference whose field name is a key of `renames`.
   *
   * Lookups always go against this document's names, so renames never chain:
   * with A → B and B → C, A becomes B and B becomes C.
   *
   * @throws MalformedDocumentError if the rewritten text does not parse
   */
  rename(renames: ReadonlyMap<string, string>): RenameOutcome<WorkbookDocument> {
    const edits: Array<{ start: number; end: number; text: string }> = [];
    const replacements = new Map<string, number>();

    for (const { slot, references } of this.slots) {
      let value = '';
      let cursor = 0;
      let touched = false;

      for (const ref of references) {
        const replacement = renames.get(ref.fieldName);
        if (replacement === undefined) continue;
        value += slot.value.slice(cursor, ref.start) + this.scanner.render(ref.token, replacement);
        cursor = ref.end;
        touched = true;
        replacements.set(ref.fieldName, (replacements.get(ref.fieldName) ?? 0) + 1);
      }
      if (!touched) continue;

      value += slot.value.slice(cursor);
      edits.push({ start: slot.rawStart, end: slot.rawEnd, text: encodeSlot(slot, value) });
    }

    edits.sort((a, b) => a.start - b.start);

    const source = this.tree.source;
    let output = '';
    let cursor = 0;
    for (const edit of edits) {
      output += source.slice(cursor, edit.start) + edit.text;
      cursor = edit.end;
    }
    output += source.slice(cursor);

    return {
      document: WorkbookDocument.parse(output, this.scanner),
      replacements
    };
  }

  serialize(): Buffer {
    return Buffer.from(this.tree.source, 'utf-8');
  }

  toString(): string {
    return this.tree.source;
  }

  private datasourceElements(): XmlElement[] {
    const result: XmlElement[] = [];
    for (const section of childElements(this.tree, this.tree.root, 'datasources')) {
      result.push(...childElements(this.tree, section, 'datasource'));
    }
    return result;
  }

  /**
   * Build the catalog from workbook/datasources/datasource/column.
   * Returns the element indexes of every declaration.
   */
  private buildCatalog(): Set<number> {
    const declarations = new Set<number>();

    for (const ds of this.datasourceElements()) {
      const datasource = getAttribute(ds, 'name') ?? '';

      for (const column of childElements(this.tree, ds, 'column')) {
        const rawName = getAttribute(column, 'name');
        if (rawName === undefined) continue;
        const { name } = parseIdentifier(rawName);
        if (name === '' || name.startsWith(':')) continue;

        declarations.add(column.index);
        if (this.fieldsByName.has(name)) {
          this.duplicates.push({ name, datasource, location: `${column.path}/@name` });
          continue;
        }

        const calculation = childElements(this.tree, column, 'calculation')[0];
        const formula = calculation ? getAttribute(calculation, 'formula') : undefined;
        const declaredRole = getAttribute(column, 'role');
        const field: FieldDescriptor = {
          name,
          caption: getAttribute(column, 'caption'),
          kind: classifyKind(column, declaredRole, formula),
          role: classifyRole(getAttribute(column, 'type')),
          referencedIn: [],
          datasource,
          declaredRole,
          datatype: getAttribute(column, 'datatype'),
          formula
        };
        this.fields.push(field);
        this.fieldsByName.set(name, field);
      }
    }

    return declarations;
  }

  private collectReferences(declarations: Set<number>): void {
    for (const element of this.tree.elements) {
      const lineage = ancestry(this.tree, element);
      if (SKIPPED_ELEMENTS.has(element.name) || lineage.includes('relation')) continue;
      const contextKind = classifyContext(lineage);

      for (const attribute of element.attributes) {
        const slot: Slot = {
          element,
          attribute: attribute.name,
          value: attribute.value,
          rawStart: attribute.rawStart,
          rawEnd: attribute.rawEnd,
          encoding: 'attribute'
        };

        if (attribute.name === 'caption') {
          if (element.name === 'column' && attribute.value !== '') {
            const token: FieldToken = { name: attribute.value, start: 0, end: attribute.value.length, form: 'bare' };
            this.addSlot(slot, [token], 'caption');
          }
          continue;
        }
        if (SKIPPED_ATTRIBUTES.has(attribute.name) || attribute.name.startsWith('xmlns')) continue;

        if (attribute.name === 'name' && declarations.has(element.index)) {
          this.addSlot(slot, [parseIdentifier(attribute.value)], 'catalog');
          continue;
        }

        const mode: ScanMode = attribute.name === 'formula' ? 'formula' : 'plain';
        this.addSlot(slot, this.scanner.scan(attribute.value, mode), mode === 'formula' ? 'formula' : contextKind);
      }

      element.texts.forEach((text, i) => {
        if (!text.value.includes('[')) return;
        const slot: Slot = {
          element,
          value: text.value,
          rawStart: text.rawStart,
          rawEnd: text.rawEnd,
          encoding: text.cdata ? 'cdata' : 'text'
        };
        this.addSlot(slot, this.scanner.scan(text.value, 'plain'), contextKind, i);
      });
    }
  }

  private addSlot(slot: Slot, tokens: FieldToken[], kind: ReferenceKind, textIndex = 0): void {
    if (tokens.length === 0) return;

    const location = slot.attribute !== undefined
      ? `${slot.element.path}/@${slot.attribute}`
      : `${slot.element.path}/text()[${textIndex}]`;

    const references = tokens.map((token): StructuralLocationReference => ({
      id: `${location}#${token.start}`,
      location,
      path: slot.element.path,
      attribute: slot.attribute,
      kind,
      fieldName: token.name,
      start: token.start,
      end: token.end,
      token
    }));

    this.slots.push({ slot, references });
    this.allReferences.push(...references);
  }
}

function classifyKind(column: XmlElement, declaredRole: string | undefined, formula: string | undefined): FieldKind {
  // Parameter defaults are stored as a calculation formula
  if (getAttribute(column, 'param-domain-type') !== undefined) return 'parameter';
  if (formula !== undefined) return 'calculated';
  if (declaredRole === 'measure') return 'measure';
  if (declaredRole === 'dimension') return 'dimension';
  return 'unknown';
}

function classifyRole(type: string | undefined): FieldRole {
  if (type === 'nominal' || type === 'ordinal') return 'discrete';
  if (type === 'quantitative') return 'continuous';
  return 'unknown';
}

function classifyContext(lineage: string[]): ReferenceKind {
  if (lineage.some(name => FILTER_ELEMENTS.has(name))) return 'filter';
  if (lineage.some(name => SORT_ELEMENTS.has(name))) return 'sort';
  if (lineage.some(name => VIEW_ELEMENTS.has(name))) return 'shelf';
  return 'other';
}

function datasourceLabel(ds: XmlElement): string {
  return getAttribute(ds, 'caption') ?? getAttribute(ds, 'name') ?? '';
}

function encodeSlot(slot: Slot, value: string): string {
  switch (slot.encoding) {
    case 'attribute':
      return encodeAttribute(value);
    case 'text':
      return encodeText(value);
    case 'cdata':
      if (value.includes(']]>')) {
        throw new MalformedDocumentError(`Renamed text in ${slot.element.path} cannot be stored as CDATA`);
      }
      return value;
  }
}
