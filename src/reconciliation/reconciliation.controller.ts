import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  InternalServerErrorException,
  Post,
  StreamableFile,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FileFieldsInterceptor } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { APP_CONFIG } from '../config/reconciliation.config';
import { ReconcileRequestDto } from './reconcile-request.dto';
import { MalformedInputError, SerializationError } from './reconciliation.errors';
import { ReconciliationOverrides, ReconciliationService } from './reconciliation.service';
import {
  ClassifiedRow,
  ReconciliationReport,
  ReconciliationSummary,
} from './reconciliation.types';
import { UPLOAD_UI_CLIENT_JS } from './upload-ui.client';
import { UPLOAD_UI_HTML } from './upload-ui.page';

export interface LedgerUploads {
  fba?: Express.Multer.File[];
  storefront?: Express.Multer.File[];
}

export interface ReconciliationRunResponse {
  summary: ReconciliationSummary;
  rows: ClassifiedRow[];
}

const ALLOWED_EXTENSIONS = ['.csv', '.xlsx', '.xls'];

const REPORT_CONTENT_TYPES = {
  csv: 'text/csv; charset=utf-8',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
} as const;

const ledgerUploadInterceptor = FileFieldsInterceptor(
  [
    { name: 'fba', maxCount: 1 },
    { name: 'storefront', maxCount: 1 },
  ],
  {
    storage: memoryStorage(),
    limits: {
      fileSize: APP_CONFIG.maxUploadBytes,
    },
    fileFilter: (_req, file, callback) => {
      const name = file.originalname.toLowerCase();
      const allowed = ALLOWED_EXTENSIONS.some((extension) => name.endsWith(extension));

      callback(
        allowed
          ? null
          : new BadRequestException('Only .xlsx, .xls, or .csv files are supported'),
        allowed,
      );
    },
  },
);

@Controller('reconciliation')
export class ReconciliationController {
  constructor(private readonly reconciliationService: ReconciliationService) {}

  @Get('upload-ui')
  @Header('Content-Type', 'text/html; charset=utf-8')
  getUploadUi(): string {
    return UPLOAD_UI_HTML;
  }

  @Get('upload-ui.js')
  @Header('Content-Type', 'application/javascript; charset=utf-8')
  getUploadUiScript(): string {
    return UPLOAD_UI_CLIENT_JS;
  }

  @Post('run')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(ledgerUploadInterceptor)
  runReconciliation(
    @UploadedFiles() files: LedgerUploads | undefined,
    @Body() body: ReconcileRequestDto,
  ): ReconciliationRunResponse {
    const { summary, rows } = this.execute(files, body);
    return { summary, rows };
  }

  @Post('report')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(ledgerUploadInterceptor)
  downloadReport(
    @UploadedFiles() files: LedgerUploads | undefined,
    @Body() body: ReconcileRequestDto,
  ): StreamableFile {
    const { format, report } = this.execute(files, body);

    return new StreamableFile(report, {
      type: REPORT_CONTENT_TYPES[format],
      disposition: `attachment; filename="inventory-reconciliation.${format}"`,
      length: report.length,
    });
  }

  private execute(
    files: LedgerUploads | undefined,
    body: ReconcileRequestDto,
  ): ReconciliationReport {
    const fba = files?.fba?.[0];
    const storefront = files?.storefront?.[0];

    if (!fba?.buffer) {
      throw new BadRequestException('No FBA ledger uploaded (field "fba")');
    }

    if (!storefront?.buffer) {
      throw new BadRequestException('No storefront ledger uploaded (field "storefront")');
    }

    try {
      return this.reconciliationService.reconcileUploads(
        fba.buffer,
        storefront.buffer,
        this.toOverrides(body),
      );
    } catch (error: unknown) {
      if (error instanceof MalformedInputError) {
        throw new BadRequestException(error.message);
      }

      if (error instanceof SerializationError) {
        throw new InternalServerErrorException(error.message);
      }

      throw error;
    }
  }

  private toOverrides(body: ReconcileRequestDto): ReconciliationOverrides {
    return {
      fbaColumns: {
        identifier: body.fbaIdentifierColumn,
        quantity: body.fbaQuantityColumn,
      },
      storefrontColumns: {
        identifier: body.storefrontIdentifierColumn,
        quantity: body.storefrontQuantityColumn,
      },
      duplicatePolicy: body.duplicatePolicy,
      keyDisplay: body.keyDisplay,
      format: body.format,
    };
  }
}
