export enum LedgerSource {
  FBA = 'FBA',
  STOREFRONT = 'STOREFRONT',
}

export enum ReconciliationStatus {
  Match = 'Match',
  Mismatch = 'Mismatch',
  MissingInFBA = 'MissingInFBA',
  MissingInStorefront = 'MissingInStorefront',
}

export const DUPLICATE_POLICIES = ['last-write-wins', 'reject', 'sum'] as const;
export type DuplicatePolicy = (typeof DUPLICATE_POLICIES)[number];

export const KEY_DISPLAYS = ['normalized', 'prefer-storefront', 'prefer-fba'] as const;
export type KeyDisplay = (typeof KEY_DISPLAYS)[number];

export const REPORT_FORMATS = ['csv', 'xlsx'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface LedgerColumns {
  identifier: string;
  quantity: string;
}

export interface InventoryRecord {
  readonly key: string;
  readonly quantity: number;
  readonly source: LedgerSource;
  // 1-based sheet row, header included. Only used in error messages.
  readonly rowNumber?: number;
}

export interface ReconciledRow {
  key: string;
  displayKey: string;
  fbaQuantity?: number;
  storefrontQuantity?: number;
  status?: ReconciliationStatus;
}

export type ClassifiedRow = ReconciledRow & { status: ReconciliationStatus };

export interface ReconcileOptions {
  duplicatePolicy: DuplicatePolicy;
  keyDisplay: KeyDisplay;
  format: ReportFormat;
}

export interface ReconciliationSummary {
  totalKeys: number;
  match: number;
  mismatch: number;
  missingInFba: number;
  missingInStorefront: number;
}

export interface ReconciliationOutcome {
  rows: ClassifiedRow[];
  summary: ReconciliationSummary;
}

export interface ReconciliationReport extends ReconciliationOutcome {
  format: ReportFormat;
  report: Buffer;
}
