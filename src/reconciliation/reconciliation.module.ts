import { Module } from '@nestjs/common';
import { LedgerParserService } from '../services/ledger-parser.service';
import { ReconciliationController } from './reconciliation.controller';
import { ReconciliationService } from './reconciliation.service';

@Module({
  controllers: [ReconciliationController],
  providers: [LedgerParserService, ReconciliationService],
})
export class ReconciliationModule {}
