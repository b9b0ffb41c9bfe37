/**
 * Tests for summary rendering
 *
 * Usage: npm test
 */

import { before, describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { computeStatus, formatIssue, renderSummaryBox } from '../summary.js';
import type { RemapReport, ToolFailure } from '../tools/types.js';

const success: RemapReport = {
  outputPath: 'out.twb',
  replacements: [
    { original: 'A', replacement: 'B', count: 2 },
    { original: 'C', replacement: 'D', count: 0 }
  ],
  totalReplacements: 2,
  renamedFields: [{ from: 'A', to: 'B', target: 'name' }],
  issues: []
};

const failure: ToolFailure = {
  success: false,
  error: { code: 'RENAME_COLLISION', message: 'Renaming would give "A" and "C" the same name "B"' },
  issues: [{ severity: 'error', ruleId: 'rename-collision', message: 'Renaming would give "A" and "C" the same name "B"' }]
};

before(() => {
  process.env.NO_COLOR = '1';
});

describe('computeStatus', () => {
  it('distinguishes success, no-op and failure', () => {
    assert.strictEqual(computeStatus(success), 'Success');
    assert.strictEqual(computeStatus({ ...success, totalReplacements: 0 }), 'No changes');
    assert.strictEqual(computeStatus(failure), 'Failed');
  });
});

describe('formatIssue', () => {
  it('includes the row or location when known', () => {
    assert.strictEqual(
      formatIssue({ severity: 'error', ruleId: 'malformed-row', rowIndex: 3, message: 'Line 3: original name is empty' }),
      'ERROR [malformed-row] Line 3: original name is empty (row 3)'
    );
    assert.strictEqual(
      formatIssue({ severity: 'warning', ruleId: 'unresolved-reference', location: 'workbook/worksheets[0]', message: '[X] is undeclared' }),
      'WARN [unresolved-reference] [X] is undeclared (at workbook/worksheets[0])'
    );
    assert.strictEqual(formatIssue({ severity: 'warning', ruleId: 'empty-table', message: 'Mapping file is empty' }), 'WARN [empty-table] Mapping file is empty');
  });
});

describe('renderSummaryBox', () => {
  it('renders a padded box for a successful remap', () => {
    assert.strictEqual(renderSummaryBox(success), [
      '┌───────────────────────┐',
      '│ SUMMARY               │',
      '│ Status: Success       │',
      '│ Mappings applied: 1/2 │',
      '│ Replacements: 2       │',
      '│ Fields renamed: 1     │',
      '│ Warnings: 0           │',
      '│ Output: out.twb       │',
      '└───────────────────────┘'
    ].join('\n'));
  });

  it('shows the error code for a failed remap', () => {
    const lines = renderSummaryBox(failure).split('\n');
    assert.strictEqual(lines[2], '│ Status: Failed          │');
    assert.strictEqual(lines[3], '│ Error: RENAME_COLLISION │');
  });
});
