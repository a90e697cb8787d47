import { Injectable, Logger } from '@nestjs/common';
import { SyncConfig } from '../config/app.config';
import { TableReaderService } from '../services/table-reader.service';
import { TableWriterService } from '../services/table-writer.service';
import { NewProductsService } from './new-products.service';
import { ReconcilerService } from './reconciler.service';
import { ReportService } from './report.service';
import { NewProductResult, ReconciliationResult, SyncResult } from './sync.types';
import { padCells } from './table.utils';

@Injectable()
export class SyncService {
  private readonly logger = new Logger(SyncService.name);

  constructor(
    private readonly tableReader: TableReaderService,
    private readonly tableWriter: TableWriterService,
    private readonly reconciler: ReconcilerService,
    private readonly newProducts: NewProductsService,
    private readonly reports: ReportService,
  ) {}

  /**
   * One synchronisation: both files are parsed (structural errors abort
   * here), reconciled, and written back. Nothing outlives the call.
   */
  run(physicalFile: Buffer, shopifyFile: Buffer, config: SyncConfig): SyncResult {
    const physical = this.tableReader.readPhysicalStock(physicalFile, config);
    const shopify = this.tableReader.readShopifyExport(shopifyFile, config);

    const { rows, results } = this.reconciler.reconcile(physical.items, shopify, config);

    const created = this.newProducts.buildRows(
      results.filter(isNewProduct),
      shopify.table.headers,
      config,
    );
    const combined = {
      headers: created.headers,
      rows: [
        ...created.rows,
        ...rows.map((cells) => padCells(cells, created.headers.length)),
      ],
    };
    const inStock = this.newProducts.filterInStock(combined, config);
    const report = this.reports.build(results, physical, shopify.items.length);

    const { stats } = report;
    this.logger.log(
      `Sync complete. Matched=${stats.matched}, Zeroed=${stats.zeroed}, CarryOver=${stats.carryOver}, New=${stats.newProducts}, Warnings=${stats.warnings}`,
    );

    return {
      shopifyCsv: this.tableWriter.toCsv(shopify.table.headers, rows),
      newProductsCsv: created.rows.length
        ? this.tableWriter.toCsv(created.headers, created.rows)
        : '',
      combinedCsv: this.tableWriter.toCsv(combined.headers, combined.rows),
      inStockCsv: this.tableWriter.toCsv(inStock.headers, inStock.rows),
      reportCsv: this.tableWriter.toCsv(report.headers, report.rows),
      report,
      results,
    };
  }
}

function isNewProduct(result: ReconciliationResult): result is NewProductResult {
  return result.outcome === 'new_product';
}
