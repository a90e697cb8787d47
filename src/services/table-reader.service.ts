import { Injectable, Logger } from '@nestjs/common';
import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import { SyncConfig } from '../config/app.config';
import { KeyBuilderService } from '../sync/key-builder.service';
import { getErrorMessage, ParseError } from '../sync/sync.errors';
import {
  ParsedTable,
  PhysicalInput,
  PhysicalItem,
  ShopifyColumnIndexes,
  ShopifyInput,
  ShopifyItem,
  SkippedPhysicalRow,
  SyncWarning,
  TableRow,
} from '../sync/sync.types';
import {
  cellAt,
  padCells,
  parseDecimalText,
  parseQuantityText,
  resolveColumn,
} from '../sync/table.utils';

const ONE_SIZE_VARIANTS = new Set([
  'one size',
  'one-size',
  'onesize',
  'os',
  'o/s',
  'taille unique',
  'unique',
  'u',
  'tu',
  'ns',
  'no size',
]);

const CANDIDATE_DELIMITERS = [',', ';', '\t'];

interface ColumnResolver {
  require(candidates: string[]): number;
  optional(candidates: string[]): number;
  assertComplete(): void;
}

@Injectable()
export class TableReaderService {
  private readonly logger = new Logger(TableReaderService.name);

  constructor(private readonly keyBuilder: KeyBuilderService) {}

  readTable(buffer: Buffer, label: string, delimiter?: string): ParsedTable {
    const grid = this.isWorkbook(buffer)
      ? this.readWorkbook(buffer)
      : this.readDelimitedText(this.decode(buffer), delimiter);

    const [headerCells, ...dataCells] = grid;
    const headers = (headerCells ?? []).map((header) => header.trim());

    if (!headers.some((header) => header !== '')) {
      throw new ParseError(`The ${label} file has no header row`, label);
    }

    const rows: TableRow[] = [];
    dataCells.forEach((cells, index) => {
      // Separator-only lines (";;;;") carry nothing.
      if (cells.every((cell) => cell.trim() === '')) {
        return;
      }

      rows.push({ rowNumber: index + 2, cells: padCells(cells, headers.length) });
    });

    this.logger.log(`Read ${rows.length} rows from ${label} file`);
    return { headers, rows };
  }

  readPhysicalStock(buffer: Buffer, config: SyncConfig): PhysicalInput {
    const table = this.readTable(buffer, 'physical', config.physicalDelimiter);
    const columns = this.columnResolver(table, 'physical');
    const barcodeIndex = columns.require(config.physical.barcode);
    const nameIndex = columns.require(config.physical.name);
    const quantityIndex = columns.require(config.physical.quantity);
    const sizeIndex = columns.optional(config.physical.size);
    const purchasePriceIndex = columns.optional(config.physical.purchasePrice);
    const salePriceIndex = columns.optional(config.physical.salePrice);
    columns.assertComplete();

    const items: PhysicalItem[] = [];
    const skipped: SkippedPhysicalRow[] = [];

    table.rows.forEach(({ rowNumber, cells }) => {
      const barcode = cellAt(cells, barcodeIndex).trim();
      const name = this.stripQuotes(cellAt(cells, nameIndex));

      if (barcode.toUpperCase() === 'TOTAL') {
        skipped.push({ rowNumber, barcode, name, reason: 'Summary line' });
        return;
      }

      if (!barcode && !name) {
        skipped.push({
          rowNumber,
          barcode,
          name,
          reason: 'Missing identifiers: provide a barcode or a catalogue name',
        });
        return;
      }

      const warnings: SyncWarning[] = [];
      const quantityText = cellAt(cells, quantityIndex);
      const parsedQuantity = parseQuantityText(quantityText);
      if (parsedQuantity == null) {
        warnings.push({
          code: 'UNREADABLE_QUANTITY',
          message: `Quantity "${quantityText.trim()}" is not a number; using 0`,
        });
      }

      const rawParts = this.keyBuilder.splitBarcode(barcode);
      const keyParts = this.keyBuilder.fromParts(rawParts.productId, rawParts.variant);
      if (!keyParts.key) {
        warnings.push({
          code: 'MISSING_KEY',
          message: barcode
            ? `Barcode "${barcode}" has no product id`
            : 'No barcode; cannot be matched against Shopify',
        });
      }

      items.push({
        ...keyParts,
        rowNumber,
        barcode,
        rawProductId: rawParts.productId,
        rawVariant: rawParts.variant,
        name,
        size: this.normalizeSize(this.stripQuotes(cellAt(cells, sizeIndex)), config.oneSizeLabel),
        quantity: Math.max(0, parsedQuantity ?? 0),
        purchasePrice: this.normalizePrice(cellAt(cells, purchasePriceIndex)),
        salePrice: this.normalizePrice(cellAt(cells, salePriceIndex)),
        warnings,
      });
    });

    if (skipped.length) {
      this.logger.warn(`Skipped ${skipped.length} physical rows`);
    }

    return { items, skipped };
  }

  readShopifyExport(buffer: Buffer, config: SyncConfig): ShopifyInput {
    const table = this.readTable(buffer, 'Shopify', config.shopifyDelimiter);
    const columns = this.columnResolver(table, 'Shopify');
    const keyFromParts =
      config.shopify.productId.length > 0 && config.shopify.variant.length > 0;

    const indexes: ShopifyColumnIndexes = {
      barcode: keyFromParts
        ? columns.optional(config.shopify.barcode)
        : columns.require(config.shopify.barcode),
      productId: keyFromParts ? columns.require(config.shopify.productId) : -1,
      variant: keyFromParts ? columns.require(config.shopify.variant) : -1,
      quantity: columns.require(config.shopify.quantity),
      title: columns.optional(config.shopify.title),
      handle: columns.optional(config.shopify.handle),
      vendor: columns.optional(config.shopify.vendor),
    };
    columns.assertComplete();

    // Variant rows of a Shopify export leave Title blank; the product title
    // lives on the first row of the handle.
    const titleByHandle = new Map<string, string>();
    const items: ShopifyItem[] = table.rows.map(({ rowNumber, cells }, rowIndex) => {
      const handle = cellAt(cells, indexes.handle).trim();
      const ownTitle = cellAt(cells, indexes.title).trim();
      if (handle && ownTitle && !titleByHandle.has(handle)) {
        titleByHandle.set(handle, ownTitle);
      }

      const keyParts = keyFromParts
        ? this.keyBuilder.fromParts(
            cellAt(cells, indexes.productId),
            cellAt(cells, indexes.variant),
          )
        : this.keyBuilder.fromBarcode(cellAt(cells, indexes.barcode));

      return {
        ...keyParts,
        rowIndex,
        rowNumber,
        handle,
        title: ownTitle || titleByHandle.get(handle) || '',
        hasOwnTitle: ownTitle !== '',
        quantity: cellAt(cells, indexes.quantity).trim(),
      };
    });

    return { table, columns: indexes, items };
  }

  private columnResolver(table: ParsedTable, label: string): ColumnResolver {
    const missing: string[] = [];

    return {
      require: (candidates) => {
        const index = resolveColumn(table.headers, candidates);
        if (index < 0) {
          missing.push(candidates.join(' / ') || '(unnamed column)');
        }
        return index;
      },
      optional: (candidates) => resolveColumn(table.headers, candidates),
      assertComplete: () => {
        if (missing.length) {
          throw new ParseError(
            `The ${label} file is missing required column(s): ${missing.join(', ')}`,
            label,
            missing,
          );
        }
      },
    };
  }

  private isWorkbook(buffer: Buffer): boolean {
    const zip =
      buffer.length >= 4 &&
      buffer[0] === 0x50 &&
      buffer[1] === 0x4b &&
      buffer[2] === 0x03 &&
      buffer[3] === 0x04;
    const ole =
      buffer.length >= 4 &&
      buffer[0] === 0xd0 &&
      buffer[1] === 0xcf &&
      buffer[2] === 0x11 &&
      buffer[3] === 0xe0;
    return zip || ole;
  }

  private readWorkbook(buffer: Buffer): string[][] {
    // Only the first worksheet is read.
    const workbook = XLSX.read(buffer, { type: 'buffer' });
    const firstSheetName = workbook.SheetNames[0];
    const sheet = firstSheetName ? workbook.Sheets[firstSheetName] : undefined;
    if (!sheet) {
      return [];
    }

    // Raw values: formatted text would turn a 13-digit EAN into "3.61472E+12".
    // Blank rows are kept so that row numbers match the sheet.
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      defval: '',
      raw: true,
      blankrows: true,
    });
    return rows.map((row) => row.map((value) => (value == null ? '' : String(value))));
  }

  private readDelimitedText(text: string, delimiter?: string): string[][] {
    // Record delimiters (\n, \r\n, \r) are detected by the parser, so line
    // breaks inside quoted cells come through unchanged. Empty lines stay as
    // blank records to keep row numbers aligned with the file.
    const records: unknown = parse(text, {
      delimiter: delimiter || this.sniffDelimiter(text),
      bom: true,
      relax_column_count: true,
      relax_quotes: true,
    });

    if (!Array.isArray(records)) {
      return [];
    }

    return records.map((record: unknown) =>
      Array.isArray(record) ? record.map((value: unknown) => String(value ?? '')) : [],
    );
  }

  private sniffDelimiter(content: string): string {
    const headerLine = content.split(/\r\n|\r|\n/, 1)[0] ?? '';
    let best = ',';
    let bestCount = 0;

    for (const candidate of CANDIDATE_DELIMITERS) {
      const count = headerLine.split(candidate).length - 1;
      if (count > bestCount) {
        best = candidate;
        bestCount = count;
      }
    }

    return best;
  }

  private decode(buffer: Buffer): string {
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    } catch (error: unknown) {
      // Older POS exports are written in latin-1.
      this.logger.debug(`File is not valid UTF-8, reading as latin-1: ${getErrorMessage(error)}`);
      return buffer.toString('latin1');
    }
  }

  private stripQuotes(value: string): string {
    return value.trim().replace(/^"+|"+$/g, '').trim();
  }

  private normalizeSize(size: string, oneSizeLabel: string): string {
    return ONE_SIZE_VARIANTS.has(size.trim().toLowerCase()) ? oneSizeLabel : size;
  }

  private normalizePrice(value: string): string {
    const parsed = parseDecimalText(value);
    return parsed == null ? '' : String(parsed);
  }
}
