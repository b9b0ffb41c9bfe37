/**
 * Tests for dimensionExtractor
 *
 * Usage: npm test
 */

import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { extractDimensions, isCandidate } from '../dimensionExtractor.js';
import type { FieldDescriptor } from '../types.js';
import { WorkbookDocument } from '../workbookDocument.js';

const SALES_TWB = fileURLToPath(new URL('../../../examples/sales.twb', import.meta.url));

function field(overrides: Partial<FieldDescriptor>): FieldDescriptor {
  return { name: 'F', kind: 'unknown', role: 'unknown', referencedIn: [], datasource: 'ds', ...overrides };
}

describe('extractDimensions', () => {
  const doc = WorkbookDocument.parse(readFileSync(SALES_TWB));

  it('returns discrete dimensions and calculated fields in catalog order', () => {
    assert.deepStrictEqual(extractDimensions(doc).map(f => f.name), [
      'First name',
      'Last name',
      'Region',
      'Calculation_1',
      'Calculation_2'
    ]);
  });

  it('can leave calculated fields out', () => {
    assert.deepStrictEqual(extractDimensions(doc, { includeCalculated: false }).map(f => f.name), [
      'First name',
      'Last name',
      'Region'
    ]);
  });

  it('never returns a measure', () => {
    for (const includeCalculated of [true, false]) {
      for (const f of extractDimensions(doc, { includeCalculated })) {
        assert.notStrictEqual(f.kind, 'measure', f.name);
      }
    }
  });
});

describe('isCandidate', () => {
  it('needs both the dimension role and a discrete type', () => {
    assert.strictEqual(isCandidate(field({ kind: 'dimension', role: 'discrete' })), true);
    assert.strictEqual(isCandidate(field({ kind: 'dimension', role: 'continuous' })), false);
    assert.strictEqual(isCandidate(field({ kind: 'measure', role: 'discrete' })), false);
    assert.strictEqual(isCandidate(field({ kind: 'unknown', role: 'discrete' })), false);
  });

  it('follows the caller for calculated fields', () => {
    const calculated = field({ kind: 'calculated', role: 'continuous', formula: '[A] * 2' });
    assert.strictEqual(isCandidate(calculated), true);
    assert.strictEqual(isCandidate(calculated, false), false);
  });
});

describe('parameters', () => {
  const doc = WorkbookDocument.parse(`<workbook><datasources>
<datasource hasconnection='false' inline='true' name='Parameters'>
<column caption='Top N' datatype='integer' name='[Parameter 1]' param-domain-type='range' role='measure' type='quantitative' value='10'>
<calculation class='tableau' formula='10'/>
</column>
<column caption='Pick Region' datatype='string' name='[Parameter 2]' param-domain-type='list' role='dimension' type='nominal' value='"East"'>
<calculation class='tableau' formula='"East"'/>
</column>
</datasource>
<datasource name='d'><column name='[Region]' role='dimension' type='nominal'/></datasource>
</datasources><worksheets/></workbook>`);

  it('classifies parameter columns apart from calculated fields', () => {
    assert.deepStrictEqual(doc.catalog().map(f => [f.name, f.kind]), [
      ['Parameter 1', 'parameter'],
      ['Parameter 2', 'parameter'],
      ['Region', 'dimension']
    ]);
  });

  it('never offers a parameter for renaming', () => {
    assert.deepStrictEqual(extractDimensions(doc).map(f => f.name), ['Region']);
  });
});
