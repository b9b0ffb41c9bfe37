/**
 * Mapping Table
 *
 * Parses a two-column rename CSV (`original,replacement`, no header by
 * default) into an ordered, immutable table with an original → replacement
 * lookup. Parsing and validation are separate phases: parse() fails only on
 * rows that cannot become entries, validate() reports table-level problems
 * without throwing.
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { DuplicateSourceError, MalformedRowError } from '../errors.js';
import type { ValidationIssue } from '../types.js';
import type { MappingEntry, MappingParseOptions } from './types.js';

interface CsvRow {
  cells: string[];
  line: number;
}

interface RowProblem {
  message: string;
  rowIndex: number;
}

interface DuplicateProblem {
  original: string;
  replacements: [string, string];
  rowIndex: number;
}

export class MappingTable {
  private readonly rows: readonly MappingEntry[];
  private readonly lookup: ReadonlyMap<string, string>;
  private readonly rowIndexes: ReadonlyMap<string, number>;

  private constructor(rows: MappingEntry[], rowIndexes: Map<string, number>) {
    this.rows = rows;
    this.lookup = new Map(rows.map(e => [e.original, e.replacement]));
    this.rowIndexes = rowIndexes;
  }

  /**
   * Parse CSV text or bytes.
   *
   * @throws MalformedRowError when any row lacks two non-empty columns
   * @throws DuplicateSourceError when an original maps to two replacements
   */
  static parse(input: string | Buffer, options: MappingParseOptions = {}): MappingTable {
    const text = typeof input === 'string' ? input : input.toString('utf-8');
    const rows = readCsvRows(text);
    return MappingTable.build(options.skipHeader ? rows.slice(1) : rows);
  }

  /**
   * Build a table from entries produced in code (e.g. suggestions).
   * Same invariants as parse(); row numbers are 1-based entry positions.
   */
  static fromEntries(entries: Iterable<MappingEntry>): MappingTable {
    const rows: CsvRow[] = [];
    for (const entry of entries) {
      rows.push({ cells: [entry.original, entry.replacement], line: rows.length + 1 });
    }
    return MappingTable.build(rows);
  }

  private static build(rows: CsvRow[]): MappingTable {
    const issues: ValidationIssue[] = [];
    const entries: MappingEntry[] = [];
    const rowIndexes = new Map<string, number>();
    let malformed: RowProblem | undefined;
    let duplicate: DuplicateProblem | undefined;

    for (const row of rows) {
      const cells = row.cells.map(c => c.trim());
      if (cells.every(c => c === '')) continue;

      const problem = describeMalformedRow(cells);
      if (problem) {
        const message = `Line ${row.line}: ${problem}`;
        issues.push({ severity: 'error', ruleId: 'malformed-row', rowIndex: row.line, message });
        malformed ??= { message, rowIndex: row.line };
        continue;
      }

      const [original = '', replacement = ''] = cells;
      const existing = entries.find(e => e.original === original);
      if (existing) {
        // Identical rows collapse silently
        if (existing.replacement !== replacement) {
          issues.push({
            severity: 'error',
            ruleId: 'duplicate-source',
            rowIndex: row.line,
            field: original,
            message: `Line ${row.line}: "${original}" is already mapped to "${existing.replacement}", cannot also map to "${replacement}"`
          });
          duplicate ??= {
            original,
            replacements: [existing.replacement, replacement],
            rowIndex: row.line
          };
        }
        continue;
      }

      entries.push({ original, replacement });
      rowIndexes.set(original, row.line);
    }

    if (malformed) {
      throw new MalformedRowError(malformed.message, malformed.rowIndex, issues);
    }
    if (duplicate) {
      throw new DuplicateSourceError(duplicate.original, duplicate.replacements, duplicate.rowIndex, issues);
    }

    return new MappingTable(entries, rowIndexes);
  }

  get entries(): readonly MappingEntry[] {
    return this.rows;
  }

  get size(): number {
    return this.rows.length;
  }

  get(original: string): string | undefined {
    return this.lookup.get(original);
  }

  has(original: string): boolean {
    return this.lookup.has(original);
  }

  /** Lookup snapshot: original → replacement */
  toMap(): ReadonlyMap<string, string> {
    return new Map(this.lookup);
  }

  /**
   * Check table-level invariants. Never throws.
   */
  validate(): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    if (this.rows.length === 0) {
      issues.push({ severity: 'error', ruleId: 'empty-table', message: 'Mapping file is empty' });
      return issues;
    }

    const byReplacement = new Map<string, string[]>();
    for (const entry of this.rows) {
      const rowIndex = this.rowIndexes.get(entry.original);

      if (entry.original === entry.replacement) {
        issues.push({
          severity: 'warning',
          ruleId: 'identity-mapping',
          rowIndex,
          field: entry.original,
          message: `"${entry.original}" maps to itself`
        });
      }

      const originals = byReplacement.get(entry.replacement) ?? [];
      originals.push(entry.original);
      byReplacement.set(entry.replacement, originals);

      const next = this.lookup.get(entry.replacement);
      if (next !== undefined && entry.replacement !== entry.original) {
        issues.push({
          severity: 'warning',
          ruleId: 'chained-rename',
          rowIndex,
          field: entry.original,
          message: `"${entry.original}" → "${entry.replacement}" and "${entry.replacement}" → "${next}" are applied independently; renames do not cascade`
        });
      }
    }

    for (const [replacement, originals] of byReplacement) {
      if (originals.length > 1) {
        issues.push({
          severity: 'error',
          ruleId: 'duplicate-replacement',
          rowIndex: this.rowIndexes.get(originals[1] ?? ''),
          field: replacement,
          message: `${originals.map(o => `"${o}"`).join(' and ')} would all be renamed to "${replacement}"`
        });
      }
    }

    return issues;
  }

  /** Serialize back to headerless CSV */
  toCsv(): string {
    return stringify(this.rows.map(e => [e.original, e.replacement]));
  }
}

function describeMalformedRow(cells: string[]): string | undefined {
  if (cells.length < 2) {
    return `expected two columns (original,replacement), found ${cells.length}`;
  }
  if (cells[0] === '') return 'original name is empty';
  if (cells[1] === '') return 'replacement name is empty';
  if (cells.slice(2).some(c => c !== '')) {
    return `expected two columns (original,replacement), found ${cells.length}`;
  }
  return undefined;
}

/**
 * Run csv-parse and keep the source line of every record.
 *
 * @throws MalformedRowError for CSV syntax errors (e.g. an unclosed quote)
 */
function readCsvRows(text: string): CsvRow[] {
  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      info: true,
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true
    });
  } catch (err) {
    const line = lineOf(err);
    const reason = err instanceof Error ? err.message : String(err);
    const message = `Line ${line}: ${reason}`;
    throw new MalformedRowError(message, line, [
      { severity: 'error', ruleId: 'csv-syntax', rowIndex: line, message }
    ]);
  }

  if (!Array.isArray(records)) return [];

  const rows: CsvRow[] = [];
  for (const value of records) {
    const row = toCsvRow(value);
    if (row) rows.push(row);
  }
  return rows;
}

function toCsvRow(value: unknown): CsvRow | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  if (!('record' in value) || !('info' in value)) return undefined;
  const { record, info } = value;
  if (!Array.isArray(record)) return undefined;
  const line = typeof info === 'object' && info !== null && 'lines' in info && typeof info.lines === 'number'
    ? info.lines
    : 0;
  return { cells: record.map(cell => String(cell)), line };
}

function lineOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'lines' in err && typeof err.lines === 'number') {
    return err.lines;
  }
  return 1;
}
