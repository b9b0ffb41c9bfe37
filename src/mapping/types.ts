/**
 * Mapping table type definitions
 */

/**
 * One rename rule: a field called `original` becomes `replacement`.
 */
export interface MappingEntry {
  readonly original: string;
  readonly replacement: string;
}

/**
 * Options for reading a mapping CSV
 */
export interface MappingParseOptions {
  skipHeader?: boolean;   // treat the first row as a header (off by default)
}

/**
 * Summary attached to a mapping file validation report
 */
export interface MappingSummary {
  filePath: string;
  totalEntries: number;
  entries: MappingEntry[];
}
