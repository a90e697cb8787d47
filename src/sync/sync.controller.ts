import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  Post,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FileFieldsInterceptor } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { APP_CONFIG, mergeSyncConfig } from '../config/app.config';
import { SyncOptionsDto } from './dto/sync-options.dto';
import { ParseError } from './sync.errors';
import { SyncService } from './sync.service';
import { SyncStats } from './sync.types';
import { UPLOAD_UI_CLIENT_JS } from './upload-ui.client';
import { UPLOAD_UI_HTML } from './upload-ui.page';

const ALLOWED_EXTENSIONS = ['.csv', '.txt', '.xlsx', '.xls'];

interface UploadedSyncFiles {
  physical?: Express.Multer.File[];
  shopify?: Express.Multer.File[];
}

export interface SyncResponse {
  shopifyCsv: string;
  newProductsCsv: string;
  combinedCsv: string;
  inStockCsv: string;
  reportCsv: string;
  hasNewProducts: boolean;
  summary: string;
  stats: SyncStats;
}

@Controller('sync')
export class SyncController {
  constructor(private readonly syncService: SyncService) {}

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

  @Post('upload')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(
    FileFieldsInterceptor(
      [
        { name: 'physical', maxCount: 1 },
        { name: 'shopify', maxCount: 1 },
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
              : new BadRequestException('Only .csv, .txt, .xlsx, or .xls files are supported'),
            allowed,
          );
        },
      },
    ),
  )
  uploadStockFiles(
    @UploadedFiles() files: UploadedSyncFiles | undefined,
    @Body() options: SyncOptionsDto,
  ): SyncResponse {
    const physical = files?.physical?.[0];
    const shopify = files?.shopify?.[0];

    if (!physical?.buffer || !shopify?.buffer) {
      throw new BadRequestException(
        'Both files are required: "physical" (stock export) and "shopify" (product export)',
      );
    }

    const config = mergeSyncConfig(APP_CONFIG.sync, options);

    try {
      const result = this.syncService.run(physical.buffer, shopify.buffer, config);

      return {
        shopifyCsv: toBase64(result.shopifyCsv),
        newProductsCsv: toBase64(result.newProductsCsv),
        combinedCsv: toBase64(result.combinedCsv),
        inStockCsv: toBase64(result.inStockCsv),
        reportCsv: toBase64(result.reportCsv),
        hasNewProducts: result.newProductsCsv !== '',
        summary: result.report.summary,
        stats: result.report.stats,
      };
    } catch (error: unknown) {
      if (error instanceof ParseError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }
}

function toBase64(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64');
}
