/**
 * Remap Engine
 *
 * Applies a mapping table to a workbook as one all-or-nothing run:
 * - validating: cross-check originals against the catalog, detect collisions
 * - applying: rewrite every reference from a snapshot of the original names
 * - serializing: produce the output bytes and check they parse back
 *
 * Nothing is returned unless every phase succeeds.
 */

import { MalformedDocumentError, RenameCollisionError, UnknownFieldError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { MappingTable } from '../mapping/mappingTable.js';
import type { ValidationIssue } from '../types.js';
import { WorkbookDocument } from '../workbook/workbookDocument.js';
import type { RemapOptions, RemapResult, RemapState, RenamedField, ReplacementCount } from './types.js';

export class RemapEngine {
  private state: RemapState = 'pending';
  private readonly history: RemapState[] = ['pending'];
  private readonly strict: boolean;
  private readonly logger: Logger;

  constructor(options: RemapOptions = {}) {
    this.strict = options.strict ?? false;
    this.logger = options.logger ?? createLogger({ quiet: options.quiet });
  }

  get currentState(): RemapState {
    return this.state;
  }

  get transitions(): readonly RemapState[] {
    return this.history;
  }

  /**
   * Run the remap.
   *
   * @throws UnknownFieldError in strict mode when an original is not in the catalog
   * @throws RenameCollisionError when two fields would end up with one name
   * @throws MalformedDocumentError when the rewritten workbook does not parse back
   */
  run(table: MappingTable, doc: WorkbookDocument): RemapResult {
    if (this.state !== 'pending') {
      throw new Error(`RemapEngine already ran (state: ${this.state})`);
    }

    try {
      this.transition('validating');
      const renames = table.toMap();
      const issues = this.validate(table, doc, renames);

      this.transition('applying');
      const { document, replacements } = doc.rename(renames);
      const counts: ReplacementCount[] = table.entries.map(entry => ({
        original: entry.original,
        replacement: entry.replacement,
        count: replacements.get(entry.original) ?? 0
      }));
      for (const { original, replacement, count } of counts) {
        if (count > 0) {
          this.logger.replaced(original, replacement, count);
        } else {
          this.logger.skipped(original, 'no occurrences in workbook');
        }
      }

      this.transition('serializing');
      const output = document.serialize();
      verifyRoundTrip(doc, WorkbookDocument.parse(output), renames);

      this.transition('done');
      return {
        output,
        document,
        issues,
        replacements: counts,
        totalReplacements: counts.reduce((sum, c) => sum + c.count, 0),
        renamedFields: renamedFields(doc, renames),
        history: [...this.history]
      };
    } catch (err) {
      this.transition('failed');
      throw err;
    }
  }

  private validate(table: MappingTable, doc: WorkbookDocument, renames: ReadonlyMap<string, string>): ValidationIssue[] {
    // Table-level findings are advisory here; duplicate replacements fail in checkCollisions
    const issues: ValidationIssue[] = table.validate().map(issue => ({ ...issue, severity: 'warning' as const }));

    const unknown: string[] = [];
    const referencedUnknown: string[] = [];
    for (const { original } of table.entries) {
      if (doc.declares(original)) continue;
      unknown.push(original);
      const referenced = doc.findReferences(original).length > 0;
      if (referenced) referencedUnknown.push(original);
      issues.push({
        severity: this.strict ? 'error' : 'warning',
        ruleId: 'unknown-field',
        field: original,
        message: referenced
          ? `"${original}" is referenced but not declared in the workbook catalog`
          : `"${original}" is not a field in this workbook`
      });
    }
    if (this.strict && unknown.length > 0) {
      throw new UnknownFieldError(unknown, issues);
    }

    checkCollisions(table, doc, renames, referencedUnknown);

    for (const issue of issues) {
      this.logger.log(`⚠️  ${issue.message}`);
    }
    return issues;
  }

  private transition(next: RemapState): void {
    this.logger.transition(this.state, next);
    this.state = next;
    this.history.push(next);
  }
}

/**
 * Two fields may not share a final name or a final display name (the caption
 * when there is one). Display names that already clash are tolerated unless a
 * rename touches one of them.
 *
 * @throws RenameCollisionError on the first clash
 */
function checkCollisions(
  table: MappingTable,
  doc: WorkbookDocument,
  renames: ReadonlyMap<string, string>,
  referencedUnknown: readonly string[]
): void {
  const claimed = new Map<string, string>();
  for (const { original, replacement } of table.entries) {
    const other = claimed.get(replacement);
    if (other !== undefined) throw new RenameCollisionError(replacement, [other, original]);
    claimed.set(replacement, original);
  }

  const names = new Map<string, string>();
  const displays = new Map<string, { owner: string; renamed: boolean }>();
  for (const field of doc.catalog()) {
    const label = field.caption ?? field.name;
    const finalName = renames.get(field.name) ?? field.name;
    const finalCaption = field.caption !== undefined ? renames.get(field.caption) ?? field.caption : undefined;
    const finalDisplay = finalCaption ?? finalName;
    const renamed = finalDisplay !== label;

    const nameOwner = names.get(finalName);
    if (nameOwner !== undefined) throw new RenameCollisionError(finalName, [nameOwner, field.name]);
    names.set(finalName, field.name);

    const displayOwner = displays.get(finalDisplay);
    if (displayOwner !== undefined && (displayOwner.renamed || renamed)) {
      throw new RenameCollisionError(finalDisplay, [displayOwner.owner, label]);
    }
    if (displayOwner === undefined) displays.set(finalDisplay, { owner: label, renamed });
  }

  // Undeclared names still occur in formulas and shelves; merging them into a field is a collision
  for (const original of referencedUnknown) {
    const target = renames.get(original);
    if (target === undefined) continue;
    const owner = names.get(target) ?? displays.get(target)?.owner;
    if (owner !== undefined) throw new RenameCollisionError(target, [owner, original]);
  }
}

function renamedFields(doc: WorkbookDocument, renames: ReadonlyMap<string, string>): RenamedField[] {
  const result: RenamedField[] = [];
  for (const field of doc.catalog()) {
    const name = renames.get(field.name);
    if (name !== undefined) result.push({ from: field.name, to: name, target: 'name' });
    const caption = field.caption !== undefined ? renames.get(field.caption) : undefined;
    if (field.caption !== undefined && caption !== undefined) {
      result.push({ from: field.caption, to: caption, target: 'caption' });
    }
  }
  return result;
}

function verifyRoundTrip(before: WorkbookDocument, after: WorkbookDocument, renames: ReadonlyMap<string, string>): void {
  const expected = before.catalog().map(f => renames.get(f.name) ?? f.name);
  const actual = after.catalog().map(f => f.name);
  if (expected.length !== actual.length || expected.some((name, i) => name !== actual[i])) {
    throw new MalformedDocumentError(
      `Rewritten workbook catalog does not match the expected renames (expected ${expected.length} fields, found ${actual.length})`
    );
  }
}
