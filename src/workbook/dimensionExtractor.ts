/**
 * Dimension Extractor
 *
 * Selects the catalog entries that are candidates for renaming: discrete
 * dimensions, plus calculated fields unless the caller opts out of renaming
 * formula-derived names.
 */

import type { FieldDescriptor } from './types.js';
import type { WorkbookDocument } from './workbookDocument.js';

export interface ExtractOptions {
  includeCalculated?: boolean;   // default: true
}

export function extractDimensions(doc: WorkbookDocument, options: ExtractOptions = {}): FieldDescriptor[] {
  const includeCalculated = options.includeCalculated ?? true;
  return doc.catalog().filter(field => isCandidate(field, includeCalculated));
}

export function isCandidate(field: FieldDescriptor, includeCalculated = true): boolean {
  if (field.kind === 'calculated') return includeCalculated;
  return field.kind === 'dimension' && field.role === 'discrete';
}
