/**
 * Tests for RemapEngine
 *
 * Usage: npm test
 */

import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { RenameCollisionError, UnknownFieldError } from '../../errors.js';
import { createLogger, type Logger } from '../../logger.js';
import { MappingTable } from '../../mapping/mappingTable.js';
import { WorkbookDocument } from '../../workbook/workbookDocument.js';
import { RemapEngine } from '../remapEngine.js';

const SALES_TWB = fileURLToPath(new URL('../../../examples/sales.twb', import.meta.url));
const salesBytes = readFileSync(SALES_TWB);

function engine(strict = false): RemapEngine {
  return new RemapEngine({ strict, logger: createLogger({ quiet: true }) });
}

function captureLogger(lines: string[]): Logger {
  return {
    log: (...args: unknown[]) => { lines.push(args.join(' ')); },
    warn: (...args: unknown[]) => { lines.push(args.join(' ')); },
    error: (...args: unknown[]) => { lines.push(args.join(' ')); },
    transition: (from: string, to: string) => { lines.push(`${from} → ${to}`); },
    replaced: (original: string, replacement: string, count: number) => { lines.push(`replaced ${original} → ${replacement} x${count}`); },
    skipped: (original: string, reason: string) => { lines.push(`skipped ${original} (${reason})`); }
  };
}

describe('RemapEngine', () => {
  it('renames first and last name everywhere they are used', () => {
    const table = MappingTable.parse('First name,name First\nLast name,name Last\n');
    const remap = engine();
    const result = remap.run(table, WorkbookDocument.parse(salesBytes));

    assert.strictEqual(remap.currentState, 'done');
    assert.deepStrictEqual(result.history, ['pending', 'validating', 'applying', 'serializing', 'done']);
    assert.deepStrictEqual(result.issues, []);
    assert.deepStrictEqual(result.replacements, [
      { original: 'First name', replacement: 'name First', count: 7 },
      { original: 'Last name', replacement: 'name Last', count: 3 }
    ]);
    assert.strictEqual(result.totalReplacements, 10);
    assert.deepStrictEqual(result.renamedFields, [
      { from: 'First name', to: 'name First', target: 'name' },
      { from: 'Last name', to: 'name Last', target: 'name' }
    ]);

    const output = WorkbookDocument.parse(result.output);
    assert.strictEqual(output.hasField('name First'), true);
    assert.strictEqual(output.hasField('name Last'), true);
    assert.strictEqual(output.hasField('First name'), false);
    assert.strictEqual(output.getField('Calculation_1')?.formula, '[name First] + " " + [name Last]');
  });

  it('logs each transition and mapping outcome', () => {
    const lines: string[] = [];
    const table = MappingTable.parse('First name,name First\nProfit,Gain\n');
    new RemapEngine({ logger: captureLogger(lines) }).run(table, WorkbookDocument.parse(salesBytes));

    assert.deepStrictEqual(lines, [
      'pending → validating',
      '⚠️  "Profit" is not a field in this workbook',
      'validating → applying',
      'replaced First name → name First x7',
      'skipped Profit (no occurrences in workbook)',
      'applying → serializing',
      'serializing → done'
    ]);
  });

  it('warns about unknown originals outside strict mode', () => {
    const table = MappingTable.parse('Profit,Gain\n');
    const result = engine().run(table, WorkbookDocument.parse(salesBytes));

    assert.deepStrictEqual(result.issues, [{
      severity: 'warning',
      ruleId: 'unknown-field',
      field: 'Profit',
      message: '"Profit" is not a field in this workbook'
    }]);
    assert.strictEqual(result.totalReplacements, 0);
    assert.ok(result.output.equals(salesBytes));
  });

  it('fails on unknown originals in strict mode', () => {
    const table = MappingTable.parse('First name,name First\nProfit,Gain\n');
    const remap = engine(true);

    assert.throws(() => remap.run(table, WorkbookDocument.parse(salesBytes)), (err: unknown) => {
      assert.ok(err instanceof UnknownFieldError);
      assert.deepStrictEqual(err.fields, ['Profit']);
      assert.strictEqual(err.issues[0]?.severity, 'error');
      return true;
    });
    assert.strictEqual(remap.currentState, 'failed');
    assert.deepStrictEqual(remap.transitions, ['pending', 'validating', 'failed']);
  });

  it('rewrites references to fields the catalog does not declare', () => {
    const doc = WorkbookDocument.parse(`<workbook><datasources><datasource name='d'>
<column name='[Region]' role='dimension' type='nominal'/>
</datasource></datasources><worksheets><worksheet name='S'><table><rows>[Ghost]</rows></table></worksheet></worksheets></workbook>`);
    const result = engine().run(MappingTable.parse('Ghost,Spirit\n'), doc);

    assert.strictEqual(result.issues[0]?.message, '"Ghost" is referenced but not declared in the workbook catalog');
    assert.strictEqual(result.replacements[0]?.count, 1);
    assert.ok(result.output.toString('utf-8').includes('<rows>[Spirit]</rows>'));
  });

  it('rejects a rename onto an existing field', () => {
    const table = MappingTable.parse('First name,Last name\n');
    const remap = engine();

    assert.throws(() => remap.run(table, WorkbookDocument.parse(salesBytes)), (err: unknown) => {
      assert.ok(err instanceof RenameCollisionError);
      assert.strictEqual(err.target, 'Last name');
      assert.strictEqual(err.message, 'Renaming would give "First name" and "Last name" the same name "Last name"');
      return true;
    });
    assert.strictEqual(remap.currentState, 'failed');
  });

  it('rejects two fields renamed to one name', () => {
    const table = MappingTable.parse('First name,Person\nLast name,Person\n');
    assert.throws(() => engine().run(table, WorkbookDocument.parse(salesBytes)), (err: unknown) => {
      assert.ok(err instanceof RenameCollisionError);
      assert.deepStrictEqual(err.originals, ['First name', 'Last name']);
      return true;
    });
  });

  it('rejects two captions renamed to one name', () => {
    const table = MappingTable.parse('Sales Region,Customer\nFull Name,Customer\n');
    const remap = engine();

    assert.throws(() => remap.run(table, WorkbookDocument.parse(salesBytes)), (err: unknown) => {
      assert.ok(err instanceof RenameCollisionError);
      assert.strictEqual(err.message, 'Renaming would give "Sales Region" and "Full Name" the same name "Customer"');
      return true;
    });
    assert.strictEqual(remap.currentState, 'failed');
  });

  it('rejects a rename onto the caption of another field', () => {
    const table = MappingTable.parse('Last name,Full Name\n');
    assert.throws(() => engine().run(table, WorkbookDocument.parse(salesBytes)), (err: unknown) => {
      assert.ok(err instanceof RenameCollisionError);
      assert.strictEqual(err.target, 'Full Name');
      assert.deepStrictEqual(err.originals, ['Last name', 'Full Name']);
      return true;
    });
  });

  it('rejects renaming an undeclared reference onto a field', () => {
    const doc = WorkbookDocument.parse(`<workbook><datasources><datasource name='d'>
<column name='[Region]' role='dimension' type='nominal'/>
</datasource></datasources><worksheets><worksheet name='S'><table><rows>[Ghost]</rows></table></worksheet></worksheets></workbook>`);

    assert.throws(() => engine().run(MappingTable.parse('Ghost,Region\n'), doc), (err: unknown) => {
      assert.ok(err instanceof RenameCollisionError);
      assert.deepStrictEqual(err.originals, ['Region', 'Ghost']);
      return true;
    });
  });

  it('tolerates captions that already clash when the rename leaves them alone', () => {
    const doc = WorkbookDocument.parse(`<workbook><datasources><datasource name='d'>
<column caption='X' name='[A]' role='dimension' type='nominal'/>
<column name='[X]' role='dimension' type='nominal'/>
</datasource></datasources><worksheets><worksheet name='S'><table><rows>[A]</rows></table></worksheet></worksheets></workbook>`);
    const result = engine().run(MappingTable.parse('A,B\n'), doc);

    assert.deepStrictEqual(result.document.catalog().map(f => f.name), ['B', 'X']);
    assert.ok(result.output.toString('utf-8').includes('<rows>[B]</rows>'));
  });

  it('does not chain renames', () => {
    const doc = WorkbookDocument.parse(`<workbook><datasources><datasource name='d'>
<column name='[A]' role='dimension' type='nominal'/>
<column name='[B]' role='dimension' type='nominal'/>
</datasource></datasources><worksheets><worksheet name='S'><table><rows>[A]</rows><cols>[B]</cols></table></worksheet></worksheets></workbook>`);
    const result = engine().run(MappingTable.parse('A,B\nB,C\n'), doc);

    assert.deepStrictEqual(result.document.catalog().map(f => f.name), ['B', 'C']);
    assert.ok(result.output.toString('utf-8').includes('<rows>[B]</rows><cols>[C]</cols>'));
    assert.deepStrictEqual(result.issues.map(i => [i.severity, i.ruleId]), [['warning', 'chained-rename']]);
  });

  it('renames captions', () => {
    const result = engine().run(MappingTable.parse('Sales Region,Area\n'), WorkbookDocument.parse(salesBytes));
    assert.deepStrictEqual(result.renamedFields, [{ from: 'Sales Region', to: 'Area', target: 'caption' }]);
    assert.strictEqual(result.totalReplacements, 1);
  });

  it('leaves the workbook unchanged for an empty table', () => {
    const result = engine().run(MappingTable.parse(''), WorkbookDocument.parse(salesBytes));
    assert.deepStrictEqual(result.issues, [{ severity: 'warning', ruleId: 'empty-table', message: 'Mapping file is empty' }]);
    assert.ok(result.output.equals(salesBytes));
  });

  it('runs only once', () => {
    const remap = engine();
    const table = MappingTable.parse('Region,Area\n');
    remap.run(table, WorkbookDocument.parse(salesBytes));
    assert.throws(() => remap.run(table, WorkbookDocument.parse(salesBytes)), {
      message: 'RemapEngine already ran (state: done)'
    });
  });
});
