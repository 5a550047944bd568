import * as XLSX from 'xlsx';
import { MalformedInputError } from '../reconciliation/reconciliation.errors';
import { LedgerColumns, LedgerSource } from '../reconciliation/reconciliation.types';
import { LedgerParserService } from './ledger-parser.service';

const columns: LedgerColumns = { identifier: 'sku', quantity: 'quantity' };

const csv = (...lines: string[]): Buffer => Buffer.from(`${lines.join('\n')}\n`, 'utf8');

function xlsx(sheet: XLSX.WorkSheet): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, 'Inventory');
  const bytes: ArrayBuffer = XLSX.write(workbook, { type: 'array', bookType: 'xlsx' });
  return Buffer.from(bytes);
}

function captureError(action: () => unknown): MalformedInputError {
  try {
    action();
  } catch (error: unknown) {
    if (error instanceof MalformedInputError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a MalformedInputError');
}

describe('LedgerParserService', () => {
  let parser: LedgerParserService;

  beforeEach(() => {
    parser = new LedgerParserService();
  });

  it('reads CSV rows in file order with their sheet row numbers', () => {
    const records = parser.parseLedger(
      csv('sku,quantity', 'abc-1,5', 'DEF-2,0'),
      LedgerSource.FBA,
      columns,
    );

    expect(records).toEqual([
      { key: 'abc-1', quantity: 5, source: LedgerSource.FBA, rowNumber: 2 },
      { key: 'DEF-2', quantity: 0, source: LedgerSource.FBA, rowNumber: 3 },
    ]);
  });

  it('matches header names ignoring case and surrounding spaces', () => {
    const records = parser.parseLedger(
      csv('Title, SKU ,QUANTITY', 'Blue mug,mug-1,3'),
      LedgerSource.STOREFRONT,
      columns,
    );

    expect(records).toEqual([
      { key: 'mug-1', quantity: 3, source: LedgerSource.STOREFRONT, rowNumber: 2 },
    ]);
  });

  it('keeps identifier text verbatim, leading zeros included', () => {
    const [record] = parser.parseLedger(csv('sku,quantity', '00123,7'), LedgerSource.FBA, columns);

    expect(record.key).toBe('00123');
  });

  it('accepts thousands separators in quantities', () => {
    const [record] = parser.parseLedger(
      csv('sku,quantity', 'bulk-1,"1,200"'),
      LedgerSource.FBA,
      columns,
    );

    expect(record.quantity).toBe(1200);
  });

  it('preserves duplicate identifiers as separate records', () => {
    const records = parser.parseLedger(
      csv('sku,quantity', 'dup,1', 'DUP,2'),
      LedgerSource.FBA,
      columns,
    );

    expect(records.map((record) => record.quantity)).toEqual([1, 2]);
  });

  it('skips blank rows without shifting row numbers', () => {
    const records = parser.parseLedger(
      csv('sku,quantity', 'a,1', ',', 'b,2'),
      LedgerSource.FBA,
      columns,
    );

    expect(records.map((record) => [record.key, record.rowNumber])).toEqual([
      ['a', 2],
      ['b', 4],
    ]);
  });

  it('reads the first sheet of an xlsx workbook', () => {
    const ledger = xlsx(
      XLSX.utils.aoa_to_sheet([
        ['SKU', 'Available'],
        ['00123', 4],
        ['tee-m', 1200],
      ]),
    );

    const records = parser.parseLedger(ledger, LedgerSource.STOREFRONT, {
      identifier: 'SKU',
      quantity: 'Available',
    });

    expect(records).toEqual([
      { key: '00123', quantity: 4, source: LedgerSource.STOREFRONT, rowNumber: 2 },
      { key: 'tee-m', quantity: 1200, source: LedgerSource.STOREFRONT, rowNumber: 3 },
    ]);
  });

  it('reads long numeric identifier cells by value, not by their General display', () => {
    const ledger = xlsx(
      XLSX.utils.aoa_to_sheet([
        ['SKU', 'Available'],
        [123456789012, 1],
        [123456789013, 2],
      ]),
    );

    const records = parser.parseLedger(ledger, LedgerSource.STOREFRONT, {
      identifier: 'SKU',
      quantity: 'Available',
    });

    expect(records.map((record) => record.key)).toEqual(['123456789012', '123456789013']);
  });

  it('accepts integer quantity cells carrying a decimal number format', () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ['SKU', 'Available'],
      ['mug-1', 5],
    ]);
    const formatted: XLSX.CellObject = { t: 'n', v: 5, z: '0.00' };
    sheet['B2'] = formatted;

    const [record] = parser.parseLedger(xlsx(sheet), LedgerSource.STOREFRONT, {
      identifier: 'SKU',
      quantity: 'Available',
    });

    expect(record.quantity).toBe(5);
  });

  it('rejects fractional numeric quantity cells', () => {
    const ledger = xlsx(
      XLSX.utils.aoa_to_sheet([
        ['SKU', 'Available'],
        ['mug-1', 2.5],
      ]),
    );

    expect(() =>
      parser.parseLedger(ledger, LedgerSource.STOREFRONT, { identifier: 'SKU', quantity: 'Available' }),
    ).toThrow('STOREFRONT ledger row 2: quantity "2.5" in column "Available" is not an integer');
  });

  it('names the missing quantity column', () => {
    const error = captureError(() =>
      parser.parseLedger(csv('sku,on_hand', 'abc-1,5'), LedgerSource.FBA, columns),
    );

    expect(error.message).toBe('FBA ledger is missing required column "quantity"');
    expect(error.column).toBe('quantity');
    expect(error.rowNumber).toBeUndefined();
  });

  it('names the missing identifier column', () => {
    const error = captureError(() =>
      parser.parseLedger(csv('item,quantity', 'abc-1,5'), LedgerSource.STOREFRONT, columns),
    );

    expect(error.message).toBe('STOREFRONT ledger is missing required column "sku"');
    expect(error.column).toBe('sku');
  });

  it('names the row of a non-integer quantity', () => {
    const error = captureError(() =>
      parser.parseLedger(csv('sku,quantity', 'a,1', 'b,abc'), LedgerSource.STOREFRONT, columns),
    );

    expect(error.message).toBe(
      'STOREFRONT ledger row 3: quantity "abc" in column "quantity" is not an integer',
    );
    expect(error.rowNumber).toBe(3);
    expect(error.column).toBe('quantity');
  });

  it('rejects fractional and blank quantities', () => {
    expect(() =>
      parser.parseLedger(csv('sku,quantity', 'a,2.5'), LedgerSource.FBA, columns),
    ).toThrow('FBA ledger row 2: quantity "2.5" in column "quantity" is not an integer');
    expect(() =>
      parser.parseLedger(csv('sku,quantity', 'a,'), LedgerSource.FBA, columns),
    ).toThrow('FBA ledger row 2: quantity "" in column "quantity" is not an integer');
  });

  it('rejects negative quantities', () => {
    const error = captureError(() =>
      parser.parseLedger(csv('sku,quantity', 'a,-4'), LedgerSource.FBA, columns),
    );

    expect(error.message).toBe('FBA ledger row 2: quantity -4 in column "quantity" is negative');
    expect(error.rowNumber).toBe(2);
  });

  it('rejects a row with a quantity but no identifier', () => {
    const error = captureError(() =>
      parser.parseLedger(csv('sku,quantity', ',5'), LedgerSource.FBA, columns),
    );

    expect(error.message).toBe('FBA ledger row 2: identifier column "sku" is blank');
    expect(error.column).toBe('sku');
  });

  it('rejects an empty upload', () => {
    expect(() => parser.parseLedger(Buffer.alloc(0), LedgerSource.FBA, columns)).toThrow(
      'FBA ledger is empty',
    );
  });
});
