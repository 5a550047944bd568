import {
  DuplicatePolicy,
  KeyDisplay,
  LedgerColumns,
  ReportFormat,
} from '../reconciliation/reconciliation.types';

export interface ReconciliationConfig {
  fbaColumns: LedgerColumns;
  storefrontColumns: LedgerColumns;
  duplicatePolicy: DuplicatePolicy;
  keyDisplay: KeyDisplay;
  reportFormat: ReportFormat;
}

export interface AppConfig {
  port: number;
  openUiOnStart: boolean;
  maxUploadBytes: number;
  reconciliation: ReconciliationConfig;
}

// Runtime configuration.

export const APP_CONFIG: AppConfig = {
  port: 3000,
  openUiOnStart: false,
  maxUploadBytes: 10 * 1024 * 1024,
  reconciliation: {
    fbaColumns: {
      identifier: 'sku',
      quantity: 'afn-fulfillable-quantity',
    },
    storefrontColumns: {
      identifier: 'SKU',
      quantity: 'Available',
    },
    duplicatePolicy: 'last-write-wins',
    keyDisplay: 'normalized',
    reportFormat: 'csv',
  },
};
