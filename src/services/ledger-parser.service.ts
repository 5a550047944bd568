import { Injectable } from '@nestjs/common';
import * as XLSX from 'xlsx';
import { MalformedInputError } from '../reconciliation/reconciliation.errors';
import {
  InventoryRecord,
  LedgerColumns,
  LedgerSource,
} from '../reconciliation/reconciliation.types';

const INTEGER_PATTERN = /^[+-]?\d+$/;

@Injectable()
export class LedgerParserService {
  parseLedger(buffer: Buffer, source: LedgerSource, columns: LedgerColumns): InventoryRecord[] {
    const sheet = this.readFirstSheet(buffer, source);
    // Stored values, not display text: a General-format UPC would otherwise read as 1.23457E+11.
    // CSV cells are already plain strings, so leading zeros survive.
    const table = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      defval: '',
      raw: true,
      blankrows: true,
    });
    const firstRowNumber = sheet['!ref'] ? XLSX.utils.decode_range(sheet['!ref']).s.r + 1 : 1;

    const header = (table[0] ?? []).map((cell) => this.cellText(cell));
    const identifierIndex = this.requireColumn(header, columns.identifier, source);
    const quantityIndex = this.requireColumn(header, columns.quantity, source);

    const records: InventoryRecord[] = [];

    table.slice(1).forEach((cells, index) => {
      const rowNumber = firstRowNumber + index + 1;

      if (cells.every((cell) => this.cellText(cell).trim() === '')) {
        return;
      }

      const key = this.cellText(cells[identifierIndex]);

      if (!key.trim()) {
        throw new MalformedInputError(
          `${source} ledger row ${rowNumber}: identifier column "${columns.identifier}" is blank`,
          { column: columns.identifier, rowNumber },
        );
      }

      records.push({
        key,
        quantity: this.parseQuantity(cells[quantityIndex], rowNumber, source, columns.quantity),
        source,
        rowNumber,
      });
    });

    return records;
  }

  private readFirstSheet(buffer: Buffer, source: LedgerSource): XLSX.WorkSheet {
    if (!buffer.length) {
      throw new MalformedInputError(`${source} ledger is empty`);
    }

    let workbook: XLSX.WorkBook;
    try {
      // `raw: true` stops the CSV reader from coercing cell text to numbers or dates.
      workbook = XLSX.read(buffer, { type: 'buffer', raw: true });
    } catch (error: unknown) {
      throw new MalformedInputError(
        `${source} ledger could not be read: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const firstSheetName = workbook.SheetNames[0];
    const sheet = firstSheetName === undefined ? undefined : workbook.Sheets[firstSheetName];
    if (!sheet) {
      throw new MalformedInputError(`${source} ledger workbook has no sheets`);
    }

    return sheet;
  }

  private requireColumn(header: string[], column: string, source: LedgerSource): number {
    const wanted = column.trim().toLowerCase();
    const index = header.findIndex((name) => name.trim().toLowerCase() === wanted);

    if (index === -1) {
      throw new MalformedInputError(`${source} ledger is missing required column "${column}"`, {
        column,
      });
    }

    return index;
  }

  private parseQuantity(
    value: unknown,
    rowNumber: number,
    source: LedgerSource,
    column: string,
  ): number {
    let parsed: number;
    if (typeof value === 'number') {
      parsed = value;
    } else {
      const numericText = this.cellText(value).trim().replace(/,/g, '');
      parsed = INTEGER_PATTERN.test(numericText) ? Number(numericText) : Number.NaN;
    }

    if (!Number.isSafeInteger(parsed)) {
      throw new MalformedInputError(
        `${source} ledger row ${rowNumber}: quantity "${this.cellText(value)}" in column "${column}" is not an integer`,
        { column, rowNumber },
      );
    }

    if (parsed < 0) {
      throw new MalformedInputError(
        `${source} ledger row ${rowNumber}: quantity ${parsed} in column "${column}" is negative`,
        { column, rowNumber },
      );
    }

    return parsed;
  }

  private cellText(value: unknown): string {
    return value == null ? '' : String(value);
  }
}
