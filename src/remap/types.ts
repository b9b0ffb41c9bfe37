/**
 * Remap Engine - Type Definitions
 */

import type { Logger } from '../logger.js';
import type { ValidationIssue } from '../types.js';
import type { WorkbookDocument } from '../workbook/workbookDocument.js';

/**
 * Run states: pending → validating → applying → serializing → done,
 * with failed reachable from every state.
 */
export type RemapState = 'pending' | 'validating' | 'applying' | 'serializing' | 'done' | 'failed';

export interface RemapOptions {
  strict?: boolean;           // unknown originals are fatal instead of warnings
  quiet?: boolean;            // ignored when a logger is given
  logger?: Logger;
}

export interface ReplacementCount {
  original: string;
  replacement: string;
  count: number;              // occurrences rewritten in the workbook
}

export interface RenamedField {
  from: string;
  to: string;
  target: 'name' | 'caption';
}

export interface RemapResult {
  output: Buffer;
  document: WorkbookDocument;
  issues: ValidationIssue[];
  replacements: ReplacementCount[];
  totalReplacements: number;
  renamedFields: RenamedField[];
  history: RemapState[];
}
