import { Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, ReconciliationConfig } from '../config/reconciliation.config';
import { LedgerParserService } from '../services/ledger-parser.service';
import { buildReconciliation, emitReport } from './engine';
import { ReconciliationError } from './reconciliation.errors';
import {
  DuplicatePolicy,
  KeyDisplay,
  LedgerColumns,
  LedgerSource,
  ReconcileOptions,
  ReconciliationReport,
  ReportFormat,
} from './reconciliation.types';

export interface ReconciliationOverrides {
  fbaColumns?: Partial<LedgerColumns>;
  storefrontColumns?: Partial<LedgerColumns>;
  duplicatePolicy?: DuplicatePolicy;
  keyDisplay?: KeyDisplay;
  format?: ReportFormat;
}

@Injectable()
export class ReconciliationService {
  private readonly logger = new Logger(ReconciliationService.name);
  private readonly defaults: ReconciliationConfig;

  constructor(private readonly ledgerParser: LedgerParserService) {
    this.defaults = APP_CONFIG.reconciliation;
  }

  reconcileUploads(
    fbaBuffer: Buffer,
    storefrontBuffer: Buffer,
    overrides: ReconciliationOverrides = {},
  ): ReconciliationReport {
    const fbaColumns = this.resolveColumns(this.defaults.fbaColumns, overrides.fbaColumns);
    const storefrontColumns = this.resolveColumns(
      this.defaults.storefrontColumns,
      overrides.storefrontColumns,
    );
    const options: ReconcileOptions = {
      duplicatePolicy: overrides.duplicatePolicy ?? this.defaults.duplicatePolicy,
      keyDisplay: overrides.keyDisplay ?? this.defaults.keyDisplay,
      format: overrides.format ?? this.defaults.reportFormat,
    };

    try {
      const fbaRecords = this.ledgerParser.parseLedger(fbaBuffer, LedgerSource.FBA, fbaColumns);
      const storefrontRecords = this.ledgerParser.parseLedger(
        storefrontBuffer,
        LedgerSource.STOREFRONT,
        storefrontColumns,
      );
      this.logger.debug(
        `Loaded ${fbaRecords.length} FBA and ${storefrontRecords.length} storefront records`,
      );

      const { rows, summary } = buildReconciliation(fbaRecords, storefrontRecords, options);
      const report = emitReport(rows, options.format);

      this.logger.log(
        `Reconciliation complete. Keys=${summary.totalKeys}, Match=${summary.match}, Mismatch=${summary.mismatch}, MissingInFBA=${summary.missingInFba}, MissingInStorefront=${summary.missingInStorefront}`,
      );

      return { rows, summary, format: options.format, report };
    } catch (error: unknown) {
      if (error instanceof ReconciliationError) {
        this.logger.warn(`Reconciliation aborted (${error.name}): ${error.message}`);
      }
      throw error;
    }
  }

  private resolveColumns(
    defaults: LedgerColumns,
    override: Partial<LedgerColumns> | undefined,
  ): LedgerColumns {
    return {
      identifier: override?.identifier?.trim() || defaults.identifier,
      quantity: override?.quantity?.trim() || defaults.quantity,
    };
  }
}
