import * as XLSX from 'xlsx';
import { SerializationError } from '../reconciliation.errors';
import { ReconciledRow, ReportFormat } from '../reconciliation.types';

export const REPORT_COLUMNS = [
  'identifier',
  'fba_quantity',
  'storefront_quantity',
  'status',
] as const;

export const REPORT_SHEET_NAME = 'Reconciliation';

type ReportCell = string | number | undefined;

/**
 * Serializes classified rows in the order given. Absent quantities become
 * blank cells. Nothing is returned unless every row carries a status.
 */
export function emitReport(rows: readonly ReconciledRow[], format: ReportFormat = 'csv'): Buffer {
  const table: ReportCell[][] = [[...REPORT_COLUMNS]];

  rows.forEach((row) => {
    if (row.status === undefined) {
      throw new SerializationError(`Row "${row.key}" reached the report without a status`, row.key);
    }

    table.push([row.displayKey, row.fbaQuantity, row.storefrontQuantity, row.status]);
  });

  const sheet = XLSX.utils.aoa_to_sheet(table);

  if (format === 'csv') {
    return Buffer.from(XLSX.utils.sheet_to_csv(sheet), 'utf8');
  }

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, REPORT_SHEET_NAME);
  const bytes: ArrayBuffer = XLSX.write(workbook, { type: 'array', bookType: 'xlsx' });
  return Buffer.from(bytes);
}
