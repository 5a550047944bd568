import {
  InventoryRecord,
  ReconcileOptions,
  ReconciliationOutcome,
} from '../reconciliation.types';
import { classifyRows, summarizeRows } from './classifier';
import { mergeLedgers } from './reconciler';
import { emitReport } from './report-emitter';

export { normalizeKey } from './key-normalizer';
export { mergeLedgers } from './reconciler';
export { classifyRow, classifyRows, summarizeRows } from './classifier';
export { emitReport, REPORT_COLUMNS } from './report-emitter';

export const DEFAULT_RECONCILE_OPTIONS: ReconcileOptions = {
  duplicatePolicy: 'last-write-wins',
  keyDisplay: 'normalized',
  format: 'csv',
};

export function buildReconciliation(
  fbaRecords: readonly InventoryRecord[],
  storefrontRecords: readonly InventoryRecord[],
  options: Partial<ReconcileOptions> = {},
): ReconciliationOutcome {
  const rows = classifyRows(
    mergeLedgers(fbaRecords, storefrontRecords, {
      duplicatePolicy: options.duplicatePolicy ?? DEFAULT_RECONCILE_OPTIONS.duplicatePolicy,
      keyDisplay: options.keyDisplay ?? DEFAULT_RECONCILE_OPTIONS.keyDisplay,
    }),
  );
  return { rows, summary: summarizeRows(rows) };
}

/**
 * Reconciles two materialized ledgers and returns the serialized audit
 * report. Pure: no I/O, no logging, no shared state.
 */
export function reconcile(
  fbaRecords: readonly InventoryRecord[],
  storefrontRecords: readonly InventoryRecord[],
  options: Partial<ReconcileOptions> = {},
): Buffer {
  const { rows } = buildReconciliation(fbaRecords, storefrontRecords, options);
  return emitReport(rows, options.format ?? DEFAULT_RECONCILE_OPTIONS.format);
}
