/**
 * Tool operations
 *
 * The five path-based entry points used by the CLIs. Each call reads its
 * inputs, builds its own engine instances and writes at most one output file.
 *
 * - validateMappingFile / validateTableauWorkbook always return a report
 * - analyzeWorkbook / suggestMappings / remapDimensions return a ToolResult
 * - I/O failures throw IOFailure, as does a remap output path equal to its input
 */

import path from 'node:path';
import {
  DuplicateSourceError,
  IOFailure,
  MalformedDocumentError,
  MalformedRowError,
  UnsupportedWorkbookError,
  isMapperError,
  type MapperError
} from '../errors.js';
import { createLogger } from '../logger.js';
import { MappingTable } from '../mapping/mappingTable.js';
import { RemapEngine } from '../remap/remapEngine.js';
import type { RemapResult } from '../remap/types.js';
import { displayName, suggest } from '../suggest/suggestionEngine.js';
import { hasErrors, type ValidationIssue } from '../types.js';
import { extractDimensions } from '../workbook/dimensionExtractor.js';
import { WorkbookDocument } from '../workbook/workbookDocument.js';
import { hasExtension, readInput, writeOutputAtomic } from './fileIO.js';
import type {
  AnalyzeToolOptions,
  MappingToolOptions,
  MappingValidationReport,
  NamingPattern,
  RemapReport,
  RemapToolOptions,
  SuggestionReport,
  SuggestToolOptions,
  ToolFailure,
  ToolResult,
  WorkbookAnalysis,
  WorkbookValidationReport
} from './types.js';

export async function validateMappingFile(
  mappingFilePath: string,
  options: MappingToolOptions = {}
): Promise<MappingValidationReport> {
  const issues: ValidationIssue[] = [];
  if (!hasExtension(mappingFilePath, '.csv')) {
    issues.push(extensionWarning(mappingFilePath, '.csv'));
  }

  const bytes = await readInput(mappingFilePath);

  let table: MappingTable | undefined;
  try {
    table = MappingTable.parse(bytes, { skipHeader: options.skipHeader });
  } catch (err) {
    if (!(err instanceof MalformedRowError) && !(err instanceof DuplicateSourceError)) throw err;
    issues.push(...err.issues);
  }
  if (table) {
    issues.push(...table.validate());
  }

  return {
    valid: !hasErrors(issues),
    summary: {
      filePath: mappingFilePath,
      totalEntries: table?.size ?? 0,
      entries: table ? [...table.entries] : []
    },
    issues,
    timestamp: new Date().toISOString()
  };
}

export async function validateTableauWorkbook(workbookFilePath: string): Promise<WorkbookValidationReport> {
  const issues: ValidationIssue[] = [];
  if (!hasExtension(workbookFilePath, '.twb')) {
    issues.push(extensionWarning(workbookFilePath, '.twb'));
  }

  const bytes = await readInput(workbookFilePath);

  let doc: WorkbookDocument | undefined;
  try {
    doc = WorkbookDocument.parse(bytes);
  } catch (err) {
    if (err instanceof MalformedDocumentError) {
      issues.push({
        severity: 'error',
        ruleId: 'malformed-document',
        message: err.message,
        location: err.line !== undefined ? `line ${err.line}, column ${err.column ?? 1}` : undefined
      });
    } else if (err instanceof UnsupportedWorkbookError) {
      issues.push({ severity: 'error', ruleId: 'unsupported-workbook', message: err.message });
    } else {
      throw err;
    }
  }

  if (doc) {
    if (doc.catalog().length === 0) {
      issues.push({ severity: 'warning', ruleId: 'empty-catalog', message: 'Workbook declares no fields' });
    }
    for (const duplicate of doc.duplicateDeclarations()) {
      issues.push({
        severity: 'warning',
        ruleId: 'duplicate-declaration',
        field: duplicate.name,
        location: duplicate.location,
        message: `"${duplicate.name}" is declared again in datasource "${duplicate.datasource}"`
      });
    }
    for (const ref of doc.unresolvedReferences()) {
      issues.push({
        severity: 'warning',
        ruleId: 'unresolved-reference',
        field: ref.fieldName,
        location: ref.location,
        message: `[${ref.fieldName}] is referenced but not declared in any datasource`
      });
    }
  }

  return {
    valid: !hasErrors(issues),
    summary: {
      filePath: workbookFilePath,
      version: doc?.version,
      datasources: doc?.datasourceNames.length ?? 0,
      worksheets: doc?.worksheetNames.length ?? 0,
      fields: doc?.catalog().length ?? 0,
      references: doc?.references().length ?? 0
    },
    issues,
    timestamp: new Date().toISOString()
  };
}

export async function analyzeWorkbook(
  workbookFilePath: string,
  options: AnalyzeToolOptions = {}
): Promise<ToolResult<WorkbookAnalysis>> {
  const bytes = await readInput(workbookFilePath);

  try {
    const doc = WorkbookDocument.parse(bytes);
    const candidates = extractDimensions(doc, options);
    const candidateNames = new Set(candidates.map(f => f.name));

    return {
      success: true,
      filePath: workbookFilePath,
      version: doc.version,
      fields: doc.catalog().map(field => ({
        name: field.name,
        caption: field.caption,
        kind: field.kind,
        role: field.role,
        datasource: field.datasource,
        references: field.referencedIn.length,
        candidate: candidateNames.has(field.name)
      })),
      candidates: candidates.map(f => f.name),
      worksheets: doc.worksheetNames,
      namingPatterns: findNamingPatterns(doc.catalog().map(displayName)),
      unresolved: doc.unresolvedReferences().map(r => r.fieldName)
    };
  } catch (err) {
    return toFailure(err);
  }
}

export async function suggestMappings(
  workbookFilePath: string,
  outputFilePath: string,
  options: SuggestToolOptions = {}
): Promise<ToolResult<SuggestionReport>> {
  const bytes = await readInput(workbookFilePath);

  let table: MappingTable;
  try {
    const doc = WorkbookDocument.parse(bytes);
    table = suggest(extractDimensions(doc, options), {
      reorderNameQualifiers: options.reorderNameQualifiers
    });
  } catch (err) {
    return toFailure(err);
  }

  await writeOutputAtomic(outputFilePath, table.toCsv());

  return {
    success: true,
    outputPath: outputFilePath,
    count: table.size,
    entries: [...table.entries]
  };
}

export async function remapDimensions(
  mappingFilePath: string,
  workbookFilePath: string,
  outputFilePath: string,
  options: RemapToolOptions = {}
): Promise<ToolResult<RemapReport>> {
  if (path.resolve(outputFilePath) === path.resolve(workbookFilePath)) {
    throw new IOFailure(outputFilePath, 'write', new Error('output path is the input workbook'));
  }

  const extensionIssues: ValidationIssue[] = [];
  if (!hasExtension(mappingFilePath, '.csv')) extensionIssues.push(extensionWarning(mappingFilePath, '.csv'));
  if (!hasExtension(workbookFilePath, '.twb')) extensionIssues.push(extensionWarning(workbookFilePath, '.twb'));

  const mappingBytes = await readInput(mappingFilePath);
  const workbookBytes = await readInput(workbookFilePath);

  const logger = createLogger({ quiet: options.quiet });
  let result: RemapResult;
  try {
    const table = MappingTable.parse(mappingBytes, { skipHeader: options.skipHeader });
    const doc = WorkbookDocument.parse(workbookBytes);
    result = new RemapEngine({ strict: options.strict, logger }).run(table, doc);
  } catch (err) {
    return toFailure(err);
  }

  await writeOutputAtomic(outputFilePath, result.output);
  logger.log(`Wrote ${path.basename(outputFilePath)} (${result.totalReplacements} replacement(s))`);

  return {
    success: true,
    outputPath: outputFilePath,
    replacements: result.replacements,
    totalReplacements: result.totalReplacements,
    renamedFields: result.renamedFields,
    issues: [...extensionIssues, ...result.issues]
  };
}

/**
 * Group multi-word names by their first word; only prefixes shared by two
 * or more names are reported. Order follows first appearance.
 */
export function findNamingPatterns(names: readonly string[]): NamingPattern[] {
  const groups = new Map<string, string[]>();
  for (const name of names) {
    const words = name.trim().split(/\s+/);
    const prefix = words[0];
    if (words.length < 2 || prefix === undefined) continue;
    const group = groups.get(prefix) ?? [];
    if (!group.includes(name)) group.push(name);
    groups.set(prefix, group);
  }

  const patterns: NamingPattern[] = [];
  for (const [prefix, fields] of groups) {
    if (fields.length >= 2) patterns.push({ prefix, fields });
  }
  return patterns;
}

function extensionWarning(filePath: string, expected: string): ValidationIssue {
  return {
    severity: 'warning',
    ruleId: 'file-extension',
    message: `Expected a ${expected} file, got "${path.basename(filePath)}"`
  };
}

/**
 * Engine errors become a failure result; I/O and programming errors propagate.
 */
function toFailure(err: unknown): ToolFailure {
  if (!isMapperError(err) || err instanceof IOFailure) throw err;
  return {
    success: false,
    error: { code: err.code, message: err.message },
    issues: err.issues.length > 0 ? err.issues : [issueFor(err)]
  };
}

function issueFor(err: MapperError): ValidationIssue {
  return {
    severity: 'error',
    ruleId: err.code.toLowerCase().replace(/_/g, '-'),
    message: err.message
  };
}
