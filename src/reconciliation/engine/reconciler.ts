import { MalformedInputError } from '../reconciliation.errors';
import {
  DuplicatePolicy,
  InventoryRecord,
  KeyDisplay,
  LedgerSource,
  ReconciledRow,
} from '../reconciliation.types';
import { normalizeKey } from './key-normalizer';

export interface MergeOptions {
  duplicatePolicy: DuplicatePolicy;
  keyDisplay: KeyDisplay;
}

interface LedgerSlot {
  quantity: number;
  rawKey: string;
  rowNumbers: number[];
}

interface MergeEntry {
  fba?: LedgerSlot;
  storefront?: LedgerSlot;
}

type SlotName = keyof MergeEntry;

const SLOT_BY_SOURCE: Record<LedgerSource, SlotName> = {
  [LedgerSource.FBA]: 'fba',
  [LedgerSource.STOREFRONT]: 'storefront',
};

/**
 * Full outer join of both ledgers on the normalized key. Returns one row per
 * distinct key, ordered by key, with the status left unset.
 */
export function mergeLedgers(
  fbaRecords: readonly InventoryRecord[],
  storefrontRecords: readonly InventoryRecord[],
  options: MergeOptions,
): ReconciledRow[] {
  const entries = new Map<string, MergeEntry>();

  foldLedger(entries, fbaRecords, LedgerSource.FBA, options.duplicatePolicy);
  foldLedger(entries, storefrontRecords, LedgerSource.STOREFRONT, options.duplicatePolicy);

  return [...entries.keys()].sort(compareKeys).map((key) => {
    const entry = entries.get(key) ?? {};
    return {
      key,
      displayKey: resolveDisplayKey(key, entry, options.keyDisplay),
      fbaQuantity: entry.fba?.quantity,
      storefrontQuantity: entry.storefront?.quantity,
    };
  });
}

function foldLedger(
  entries: Map<string, MergeEntry>,
  records: readonly InventoryRecord[],
  source: LedgerSource,
  policy: DuplicatePolicy,
): void {
  const slotName = SLOT_BY_SOURCE[source];

  records.forEach((record, index) => {
    assertRecord(record, source, index);

    const key = normalizeKey(record.key);
    const entry = entries.get(key) ?? {};
    const rowNumber = record.rowNumber ?? index + 1;
    const existing = entry[slotName];

    if (!existing) {
      entry[slotName] = {
        quantity: record.quantity,
        rawKey: record.key,
        rowNumbers: [rowNumber],
      };
      entries.set(key, entry);
      return;
    }

    const rowNumbers = [...existing.rowNumbers, rowNumber];

    if (policy === 'reject') {
      throw new MalformedInputError(
        `Duplicate identifier "${key}" in ${source} ledger (rows ${rowNumbers.join(', ')})`,
        { key, rowNumber },
      );
    }

    if (policy === 'sum') {
      const quantity = existing.quantity + record.quantity;
      if (!Number.isSafeInteger(quantity)) {
        throw new MalformedInputError(
          `Summed quantity for "${key}" in ${source} ledger (rows ${rowNumbers.join(', ')}) exceeds the safe integer range`,
          { key, rowNumber },
        );
      }
      entry[slotName] = { quantity, rawKey: existing.rawKey, rowNumbers };
      return;
    }

    entry[slotName] = { quantity: record.quantity, rawKey: record.key, rowNumbers };
  });
}

function assertRecord(record: InventoryRecord, source: LedgerSource, index: number): void {
  const rowNumber = record.rowNumber ?? index + 1;

  if (record.source !== source) {
    throw new MalformedInputError(
      `Row ${rowNumber}: record from ${record.source} ledger passed as ${source}`,
      { rowNumber },
    );
  }

  if (!normalizeKey(record.key)) {
    throw new MalformedInputError(`Row ${rowNumber}: identifier is blank`, { rowNumber });
  }

  if (!Number.isSafeInteger(record.quantity) || record.quantity < 0) {
    throw new MalformedInputError(
      `Row ${rowNumber}: quantity ${record.quantity} must be a non-negative integer`,
      { rowNumber, key: record.key },
    );
  }
}

function resolveDisplayKey(key: string, entry: MergeEntry, keyDisplay: KeyDisplay): string {
  if (keyDisplay === 'normalized') {
    return key;
  }

  const preferred = keyDisplay === 'prefer-fba' ? entry.fba : entry.storefront;
  const fallback = keyDisplay === 'prefer-fba' ? entry.storefront : entry.fba;
  const raw = preferred?.rawKey ?? fallback?.rawKey;
  return raw === undefined ? key : raw.trim();
}

// Code-unit order keeps the report independent of the host locale.
function compareKeys(left: string, right: string): number {
  if (left < right) {
    return -1;
  }

  return left > right ? 1 : 0;
}
