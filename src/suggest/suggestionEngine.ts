/**
 * Suggestion Engine
 *
 * Proposes a rename table for the candidate fields of a workbook by running
 * each display name through the normalization pipeline. Only real changes
 * are emitted, so running it over already-normalized names yields an empty
 * table.
 */

import { MappingTable } from '../mapping/mappingTable.js';
import type { MappingEntry } from '../mapping/types.js';
import type { FieldDescriptor } from '../workbook/types.js';
import { normalizeFieldName, type NormalizeOptions } from './normalizers.js';

export type SuggestionOptions = NormalizeOptions;

/** The name a user sees, and the one a suggestion renames */
export function displayName(field: FieldDescriptor): string {
  return field.caption ?? field.name;
}

export function suggest(candidates: readonly FieldDescriptor[], options: SuggestionOptions = {}): MappingTable {
  const entries: MappingEntry[] = [];
  const originals = new Set<string>();
  const targets = new Set<string>();

  for (const field of candidates) {
    const original = displayName(field);
    if (originals.has(original)) continue;
    originals.add(original);

    const replacement = normalizeFieldName(original, options);
    if (replacement === '' || replacement === original) continue;

    // Would collide with another field that already carries the name, or with an earlier suggestion
    if (targets.has(replacement) || isClaimed(replacement, field, candidates)) continue;

    targets.add(replacement);
    entries.push({ original, replacement });
  }

  return MappingTable.fromEntries(entries);
}

function isClaimed(name: string, field: FieldDescriptor, candidates: readonly FieldDescriptor[]): boolean {
  return candidates.some(other => other !== field && (other.name === name || displayName(other) === name));
}
