import { Module } from '@nestjs/common';
import { TableReaderService } from '../services/table-reader.service';
import { TableWriterService } from '../services/table-writer.service';
import { CatalogNameService } from './catalog-name.service';
import { KeyBuilderService } from './key-builder.service';
import { NewProductsService } from './new-products.service';
import { ReconcilerService } from './reconciler.service';
import { ReportService } from './report.service';
import { SyncController } from './sync.controller';
import { SyncService } from './sync.service';

@Module({
  controllers: [SyncController],
  providers: [
    KeyBuilderService,
    CatalogNameService,
    TableReaderService,
    TableWriterService,
    ReconcilerService,
    NewProductsService,
    ReportService,
    SyncService,
  ],
})
export class SyncModule {}
