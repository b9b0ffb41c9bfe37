/**
 * Tool operation type definitions
 *
 * Result shapes of the five path-based operations. Validation tools always
 * return a report; transformation tools return a success or failure result.
 */

import type { MapperErrorCode } from '../errors.js';
import type { MappingEntry, MappingSummary } from '../mapping/types.js';
import type { RenamedField, ReplacementCount } from '../remap/types.js';
import type { ValidationIssue, ValidationReport } from '../types.js';
import type { FieldKind, FieldRole } from '../workbook/types.js';

export type MappingValidationReport = ValidationReport<MappingSummary>;

export interface WorkbookSummary {
  filePath: string;
  version?: string;
  datasources: number;
  worksheets: number;
  fields: number;
  references: number;
}

export type WorkbookValidationReport = ValidationReport<WorkbookSummary>;

export interface ToolFailure {
  success: false;
  error: {
    code: MapperErrorCode;
    message: string;
  };
  issues: ValidationIssue[];
}

export type ToolResult<T> = ({ success: true } & T) | ToolFailure;

export interface AnalyzedField {
  name: string;
  caption?: string;
  kind: FieldKind;
  role: FieldRole;
  datasource: string;
  references: number;         // usages outside the declaration
  candidate: boolean;         // selected by the dimension extractor
}

export interface NamingPattern {
  prefix: string;
  fields: string[];
}

export interface WorkbookAnalysis {
  filePath: string;
  version?: string;
  fields: AnalyzedField[];
  candidates: string[];
  worksheets: string[];
  namingPatterns: NamingPattern[];
  unresolved: string[];
}

export interface SuggestionReport {
  outputPath: string;
  count: number;
  entries: MappingEntry[];
}

export interface RemapReport {
  outputPath: string;
  replacements: ReplacementCount[];
  totalReplacements: number;
  renamedFields: RenamedField[];
  issues: ValidationIssue[];
}

export interface MappingToolOptions {
  skipHeader?: boolean;
}

export interface AnalyzeToolOptions {
  includeCalculated?: boolean;
}

export interface SuggestToolOptions extends AnalyzeToolOptions {
  reorderNameQualifiers?: boolean;
}

export interface RemapToolOptions extends MappingToolOptions {
  strict?: boolean;
  quiet?: boolean;
}
