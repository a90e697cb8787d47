import { Injectable, Logger } from '@nestjs/common';
import { SyncConfig } from '../config/app.config';
import { NewProductResult } from './sync.types';
import { cellAt, parseQuantityText, resolveColumn } from './table.utils';

// Fixed column names of the Shopify product CSV format.
export const SHOPIFY_COLUMNS = {
  status: 'Status',
  published: 'Published',
  sku: 'Variant SKU',
  price: 'Variant Price',
  cost: 'Cost per item',
  option1Name: 'Option1 Name',
  option1Value: 'Option1 Value',
  inventoryTracker: 'Variant Inventory Tracker',
  inventoryPolicy: 'Variant Inventory Policy',
  fulfillmentService: 'Variant Fulfillment Service',
} as const;

export interface ProductRows {
  headers: string[];
  rows: string[][];
}

@Injectable()
export class NewProductsService {
  private readonly logger = new Logger(NewProductsService.name);

  /**
   * Output header for the combined file: the Shopify header, plus
   * "Cost per item" when the export does not carry it.
   */
  outputHeaders(shopifyHeaders: string[]): string[] {
    return resolveColumn(shopifyHeaders, [SHOPIFY_COLUMNS.cost]) >= 0
      ? [...shopifyHeaders]
      : [...shopifyHeaders, SHOPIFY_COLUMNS.cost];
  }

  /**
   * Shopify import rows for products found only in the physical stock.
   * Sizes of one product (same handle and SKU) become variants of it: the
   * first row carries the product fields, the following ones repeat Title.
   * Products are created as drafts for review before publishing.
   */
  buildRows(
    results: NewProductResult[],
    shopifyHeaders: string[],
    config: SyncConfig,
  ): ProductRows {
    const headers = this.outputHeaders(shopifyHeaders);
    const column = (candidates: string[]): number => resolveColumn(headers, candidates);
    const columns = {
      title: column(config.shopify.title),
      handle: column(config.shopify.handle),
      vendor: column(config.shopify.vendor),
      barcode: column(config.shopify.barcode),
      quantity: column(config.shopify.quantity),
      status: column([SHOPIFY_COLUMNS.status]),
      published: column([SHOPIFY_COLUMNS.published]),
      sku: column([SHOPIFY_COLUMNS.sku]),
      price: column([SHOPIFY_COLUMNS.price]),
      cost: column([SHOPIFY_COLUMNS.cost]),
      option1Name: column([SHOPIFY_COLUMNS.option1Name]),
      option1Value: column([SHOPIFY_COLUMNS.option1Value]),
      inventoryTracker: column([SHOPIFY_COLUMNS.inventoryTracker]),
      inventoryPolicy: column([SHOPIFY_COLUMNS.inventoryPolicy]),
      fulfillmentService: column([SHOPIFY_COLUMNS.fulfillmentService]),
    };

    const byProduct = new Map<string, NewProductResult[]>();
    results.forEach((result, index) => {
      const { handle, sku } = result.product;
      // Names that produced no handle cannot be grouped safely.
      const groupKey = handle ? `${handle}\u0000${sku}` : `\u0001${index}`;
      const group = byProduct.get(groupKey) ?? [];
      group.push(result);
      byProduct.set(groupKey, group);
    });

    const rows: string[][] = [];
    const { newProduct } = config;

    byProduct.forEach((variants) => {
      variants.forEach((variant, position) => {
        const row = new Array<string>(headers.length).fill('');
        const set = (index: number, value: string): void => {
          if (index >= 0) {
            row[index] = value;
          }
        };
        const item = variant.items[0];
        const product = variants[0].product;

        set(columns.title, product.shopifyTitle);
        set(columns.handle, product.handle);
        if (position === 0) {
          set(columns.vendor, product.vendor);
          set(columns.status, newProduct.status);
          set(columns.published, newProduct.published);
          set(columns.option1Name, newProduct.optionName);
        }

        set(columns.option1Value, item.size);
        set(columns.sku, variant.product.sku);
        set(columns.barcode, item.barcode);
        set(columns.quantity, String(variant.quantity));
        set(columns.cost, item.purchasePrice);
        set(columns.price, item.salePrice);
        set(columns.inventoryTracker, newProduct.inventoryTracker);
        set(columns.inventoryPolicy, newProduct.inventoryPolicy);
        set(columns.fulfillmentService, newProduct.fulfillmentService);

        rows.push(row);
      });
    });

    if (rows.length) {
      this.logger.log(`Prepared ${rows.length} new variant rows in ${byProduct.size} products`);
    }

    return { headers, rows };
  }

  /**
   * Drops products whose every variant is at 0. Products are grouped by
   * Handle, or by Title when the row has no handle; rows with neither stay.
   */
  filterInStock(table: ProductRows, config: SyncConfig): ProductRows {
    const quantityIndex = resolveColumn(table.headers, config.shopify.quantity);
    if (quantityIndex < 0) {
      return table;
    }

    const handleIndex = resolveColumn(table.headers, config.shopify.handle);
    const titleIndex = resolveColumn(table.headers, config.shopify.title);
    const identity = (cells: string[]): string =>
      cellAt(cells, handleIndex).trim() || cellAt(cells, titleIndex).trim();

    const hasStock = new Map<string, boolean>();
    table.rows.forEach((cells) => {
      const id = identity(cells);
      if (!id) {
        return;
      }

      const quantity = parseQuantityText(cellAt(cells, quantityIndex)) ?? 0;
      hasStock.set(id, (hasStock.get(id) ?? false) || quantity > 0);
    });

    return {
      headers: table.headers,
      rows: table.rows.filter((cells) => {
        const id = identity(cells);
        return !id || hasStock.get(id) === true;
      }),
    };
  }
}
