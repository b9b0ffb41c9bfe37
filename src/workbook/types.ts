/**
 * Workbook model type definitions
 */

import type { FieldToken } from './fieldReferenceScanner.js';

export type FieldKind = 'dimension' | 'measure' | 'calculated' | 'parameter' | 'unknown';

export type FieldRole = 'discrete' | 'continuous' | 'unknown';

/**
 * Where a reference sits in the workbook
 *
 * catalog  - the `name` of a datasource column declaration
 * caption  - a column's display name
 * formula  - inside a calculated field formula
 * shelf    - worksheet/dashboard usage (rows, cols, encodings, instances)
 * filter   - filter definitions
 * sort     - sort definitions
 * other    - anywhere else (e.g. datasource metadata records)
 */
export type ReferenceKind = 'catalog' | 'caption' | 'formula' | 'shelf' | 'filter' | 'sort' | 'other';

/**
 * One textual occurrence of a field name
 */
export interface StructuralLocationReference {
  id: string;                 // unique within a parsed document
  location: string;           // path + attribute or text(), e.g. .../column[2]/@name
  path: string;               // element path
  attribute?: string;         // undefined for text content
  kind: ReferenceKind;
  fieldName: string;
  start: number;              // token offsets in the decoded value
  end: number;
  token: FieldToken;
}

/**
 * One field declared in the workbook's datasources
 */
export interface FieldDescriptor {
  name: string;               // internal identifier, without brackets
  caption?: string;           // display name
  kind: FieldKind;
  role: FieldRole;
  referencedIn: string[];     // ids of usage references (declaration and captions excluded)
  datasource: string;
  declaredRole?: string;      // raw role attribute: dimension | measure
  datatype?: string;
  formula?: string;
}

/**
 * Result of applying a rename snapshot to a document
 */
export interface RenameOutcome<TDocument> {
  document: TDocument;
  replacements: Map<string, number>;   // original name → occurrences rewritten
}
