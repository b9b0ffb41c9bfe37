/**
 * Tests for BracketFieldReferenceScanner
 *
 * Usage: npm test
 */

import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { BracketFieldReferenceScanner, parseIdentifier } from '../fieldReferenceScanner.js';

const scanner = new BracketFieldReferenceScanner();

describe('scan', () => {
  it('finds whole bracket tokens only', () => {
    const tokens = scanner.scan('[Sales] - [SalesTax]', 'formula');
    assert.deepStrictEqual(tokens, [
      { name: 'Sales', start: 0, end: 7, form: 'bracket' },
      { name: 'SalesTax', start: 10, end: 20, form: 'bracket' }
    ]);
  });

  it('ignores string literals and comments in formulas', () => {
    const formula = `"[Not a field]" + '[Nor this]' // [Old]\n+ [Region]`;
    assert.deepStrictEqual(scanner.scan(formula, 'formula').map(t => t.name), ['Region']);
  });

  it('scans quoted text in plain mode', () => {
    assert.deepStrictEqual(scanner.scan('"[Region]"', 'plain').map(t => t.name), ['Region']);
  });

  it('unescapes doubled closing brackets', () => {
    const [token] = scanner.scan('[Profit ]] Ratio]', 'formula');
    assert.deepStrictEqual(token, { name: 'Profit ] Ratio', start: 0, end: 17, form: 'bracket' });
  });

  it('skips the datasource qualifier and parses column instances', () => {
    const tokens = scanner.scan('[federated.x].[none:Region:nk]', 'plain');
    assert.deepStrictEqual(tokens, [
      { name: 'Region', start: 14, end: 30, form: 'instance', derivation: 'none', suffix: 'nk' }
    ]);
  });

  it('parses instance suffixes with a pivot index and lowercase names', () => {
    const [dated] = scanner.scan('[yr:Order Date:ok:1]', 'plain');
    assert.strictEqual(dated?.name, 'Order Date');
    assert.strictEqual(dated?.derivation, 'yr');
    assert.strictEqual(dated?.suffix, 'ok:1');

    const [profit] = scanner.scan('[sum:profit:qk]', 'plain');
    assert.strictEqual(profit?.name, 'profit');
    assert.strictEqual(profit?.derivation, 'sum');
  });

  it('skips generated fields, empty brackets and unclosed brackets', () => {
    assert.deepStrictEqual(scanner.scan('[:Measure Names] [] a [b', 'plain'), []);
  });
});

describe('render', () => {
  it('keeps the token form', () => {
    const [bracket, instance] = scanner.scan('[Region] [none:Region:nk]', 'plain');
    assert.ok(bracket && instance);
    assert.strictEqual(scanner.render(bracket, 'Sales Region'), '[Sales Region]');
    assert.strictEqual(scanner.render(instance, 'Sales Region'), '[none:Sales Region:nk]');
    assert.strictEqual(scanner.render(bracket, 'A]B'), '[A]]B]');
    assert.strictEqual(scanner.render(parseIdentifier('Region'), 'Area'), 'Area');
  });
});

describe('parseIdentifier', () => {
  it('strips brackets from a single token', () => {
    assert.deepStrictEqual(parseIdentifier('[Sales]'), { name: 'Sales', start: 0, end: 7, form: 'bracket' });
    assert.deepStrictEqual(parseIdentifier('[A]]B]'), { name: 'A]B', start: 0, end: 6, form: 'bracket' });
  });

  it('takes anything else as-is', () => {
    assert.deepStrictEqual(parseIdentifier('Sales'), { name: 'Sales', start: 0, end: 5, form: 'bare' });
    assert.strictEqual(parseIdentifier('[a] [b]').form, 'bare');
  });
});
