export * from './errors.js';
export * from './types.js';
export { createLogger, type Logger } from './logger.js';
export { DEFAULT_CONFIG, loadConfig, withOverrides, type MapperConfig } from './config.js';
export { MappingTable } from './mapping/mappingTable.js';
export type { MappingEntry, MappingParseOptions, MappingSummary } from './mapping/types.js';
export { WorkbookDocument } from './workbook/workbookDocument.js';
export { BracketFieldReferenceScanner, type FieldReferenceScanner, type FieldToken } from './workbook/fieldReferenceScanner.js';
export { extractDimensions, isCandidate } from './workbook/dimensionExtractor.js';
export type { FieldDescriptor, FieldKind, FieldRole, ReferenceKind, StructuralLocationReference } from './workbook/types.js';
export { normalizeFieldName, listSteps } from './suggest/normalizers.js';
export { suggest, displayName, type SuggestionOptions } from './suggest/suggestionEngine.js';
export { RemapEngine } from './remap/remapEngine.js';
export type { RemapOptions, RemapResult, RemapState } from './remap/types.js';
export * from './tools/index.js';
export type * from './tools/types.js';
