import { IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import {
  DUPLICATE_POLICIES,
  DuplicatePolicy,
  KEY_DISPLAYS,
  KeyDisplay,
  REPORT_FORMATS,
  ReportFormat,
} from './reconciliation.types';

// Text fields sent alongside the two ledger files.
export class ReconcileRequestDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  fbaIdentifierColumn?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  fbaQuantityColumn?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  storefrontIdentifierColumn?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  storefrontQuantityColumn?: string;

  @IsOptional()
  @IsIn(DUPLICATE_POLICIES)
  duplicatePolicy?: DuplicatePolicy;

  @IsOptional()
  @IsIn(KEY_DISPLAYS)
  keyDisplay?: KeyDisplay;

  @IsOptional()
  @IsIn(REPORT_FORMATS)
  format?: ReportFormat;
}
