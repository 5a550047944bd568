import {
  ClassifiedRow,
  ReconciledRow,
  ReconciliationStatus,
  ReconciliationSummary,
} from '../reconciliation.types';

// Missing on either side wins over a quantity comparison.
export function classifyRow(row: ReconciledRow): ReconciliationStatus {
  if (row.storefrontQuantity === undefined) {
    return ReconciliationStatus.MissingInStorefront;
  }

  if (row.fbaQuantity === undefined) {
    return ReconciliationStatus.MissingInFBA;
  }

  return row.fbaQuantity === row.storefrontQuantity
    ? ReconciliationStatus.Match
    : ReconciliationStatus.Mismatch;
}

export function classifyRows(rows: ReconciledRow[]): ClassifiedRow[] {
  return rows.map((row) => ({ ...row, status: classifyRow(row) }));
}

export function summarizeRows(rows: ClassifiedRow[]): ReconciliationSummary {
  const summary: ReconciliationSummary = {
    totalKeys: rows.length,
    match: 0,
    mismatch: 0,
    missingInFba: 0,
    missingInStorefront: 0,
  };

  rows.forEach((row) => {
    switch (row.status) {
      case ReconciliationStatus.Match:
        summary.match += 1;
        break;
      case ReconciliationStatus.Mismatch:
        summary.mismatch += 1;
        break;
      case ReconciliationStatus.MissingInFBA:
        summary.missingInFba += 1;
        break;
      case ReconciliationStatus.MissingInStorefront:
        summary.missingInStorefront += 1;
        break;
    }
  });

  return summary;
}
