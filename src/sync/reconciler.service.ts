import { Injectable, Logger } from '@nestjs/common';
import { SyncConfig } from '../config/app.config';
import { CatalogNameService } from './catalog-name.service';
import {
  CarryOverResult,
  PhysicalItem,
  ReconciliationOutput,
  ReconciliationResult,
  ShopifyInput,
  ShopifyItem,
  SyncWarning,
} from './sync.types';
import { cellAt } from './table.utils';

interface PhysicalGroup {
  key: string | null;
  items: PhysicalItem[];
  quantity: number;
  warnings: SyncWarning[];
}

/**
 * Joins physical stock onto the Shopify export.
 *
 * Every keyed Shopify row ends up matched, carried over or zeroed; every
 * physical row ends up matched, carried over or new. Shopify rows without a
 * key pass through untouched.
 */
@Injectable()
export class ReconcilerService {
  private readonly logger = new Logger(ReconcilerService.name);

  constructor(private readonly catalogNames: CatalogNameService) {}

  reconcile(
    physical: PhysicalItem[],
    shopify: ShopifyInput,
    config: SyncConfig,
  ): ReconciliationOutput {
    const rows = shopify.table.rows.map((row) => [...row.cells]);
    const results: ReconciliationResult[] = [];
    const consumed = new Set<number>();

    const { byKey, superseded } = this.indexShopify(shopify.items);
    const groups = this.groupPhysical(physical);

    const unmatchedGroups: PhysicalGroup[] = [];
    for (const group of groups) {
      const target = group.key ? byKey.get(group.key) : undefined;
      if (!target) {
        unmatchedGroups.push(group);
        continue;
      }

      consumed.add(target.rowIndex);
      rows[target.rowIndex][shopify.columns.quantity] = String(group.quantity);
      results.push({
        outcome: 'matched',
        key: group.key,
        physicalRows: group.items.map((item) => item.rowNumber),
        shopifyRow: target.rowNumber,
        title: target.title,
        previousQuantity: target.quantity,
        quantity: group.quantity,
        warnings: group.warnings,
      });
    }

    const carried = this.carryOver(
      unmatchedGroups,
      physical,
      shopify,
      rows,
      consumed,
      superseded,
      config,
    );
    results.push(...carried.results);

    const vendors = this.catalogNames.buildVendorMap(
      shopify.table.rows.map((row) => cellAt(row.cells, shopify.columns.vendor)),
    );
    for (const group of carried.remaining) {
      const product = this.catalogNames.extract(group.items[0].name, vendors);
      results.push({
        outcome: 'new_product',
        key: group.key,
        physicalRows: group.items.map((item) => item.rowNumber),
        items: group.items,
        quantity: group.quantity,
        product,
        warnings: [...group.warnings, ...product.warnings],
      });
    }

    for (const item of shopify.items) {
      if (!item.key) {
        results.push({
          outcome: 'passthrough',
          key: null,
          physicalRows: [],
          shopifyRow: item.rowNumber,
          title: item.title,
          warnings: [],
        });
        continue;
      }

      if (consumed.has(item.rowIndex)) {
        continue;
      }

      rows[item.rowIndex][shopify.columns.quantity] = '0';
      const winner = superseded.has(item.rowIndex) ? byKey.get(item.key) : undefined;
      results.push({
        outcome: 'zeroed',
        key: item.key,
        physicalRows: [],
        shopifyRow: item.rowNumber,
        title: item.title,
        previousQuantity: item.quantity,
        quantity: 0,
        warnings: winner
          ? [
              {
                code: 'DUPLICATE_SHOPIFY_KEY',
                message: `Key ${item.key} also on row ${winner.rowNumber}; that row keeps the stock`,
              },
            ]
          : [],
      });
    }

    this.logger.log(
      `Reconciled ${physical.length} physical rows against ${shopify.items.length} Shopify rows`,
    );
    return { rows, results };
  }

  // Last row wins on duplicate keys; earlier rows are remembered so they can
  // be zeroed with a warning.
  private indexShopify(items: ShopifyItem[]): {
    byKey: Map<string, ShopifyItem>;
    superseded: Set<number>;
  } {
    const byKey = new Map<string, ShopifyItem>();
    const superseded = new Set<number>();

    items.forEach((item) => {
      if (!item.key) {
        return;
      }

      const previous = byKey.get(item.key);
      if (previous) {
        superseded.add(previous.rowIndex);
        this.logger.warn(
          `Duplicate Shopify key ${item.key} on rows ${previous.rowNumber} and ${item.rowNumber}`,
        );
      }
      byKey.set(item.key, item);
    });

    return { byKey, superseded };
  }

  // Same key listed more than once (several bins, several lines): one
  // location-level quantity.
  private groupPhysical(items: PhysicalItem[]): PhysicalGroup[] {
    const groups: PhysicalGroup[] = [];
    const byKey = new Map<string, PhysicalGroup>();

    items.forEach((item) => {
      const existing = item.key ? byKey.get(item.key) : undefined;
      if (existing) {
        existing.items.push(item);
        existing.quantity += item.quantity;
        existing.warnings.push(...item.warnings);
        return;
      }

      const group: PhysicalGroup = {
        key: item.key,
        items: [item],
        quantity: item.quantity,
        warnings: [...item.warnings],
      };
      groups.push(group);
      if (item.key) {
        byKey.set(item.key, group);
      }
    });

    groups
      .filter((group) => group.items.length > 1)
      .forEach((group) => {
        const rowNumbers = group.items.map((item) => item.rowNumber).join(', ');
        group.warnings.push({
          code: 'DUPLICATE_PHYSICAL_KEY',
          message: `Rows ${rowNumbers} share key ${group.key}; quantities were summed`,
        });
      });

    return groups;
  }

  private carryOver(
    groups: PhysicalGroup[],
    physical: PhysicalItem[],
    shopify: ShopifyInput,
    rows: string[][],
    consumed: Set<number>,
    superseded: Set<number>,
    config: SyncConfig,
  ): { results: CarryOverResult[]; remaining: PhysicalGroup[] } {
    const prefix = config.seasonPrefix;
    const lastSeason = new Map<string, number>();
    const assigned = new Map<string, number>();
    const candidates = new Map<string, ShopifyItem[]>();

    const seeSeason = (name: string): void => {
      const season = this.catalogNames.seasonOf(name, prefix);
      const base = this.catalogNames.baseName(name, prefix);
      if (season != null && base) {
        lastSeason.set(base, Math.max(lastSeason.get(base) ?? 0, season));
      }
    };

    physical.forEach((item) => seeSeason(item.name));
    shopify.items.forEach((item) => {
      seeSeason(item.title);

      const base = this.catalogNames.baseName(item.title, prefix);
      if (!item.key || !base || superseded.has(item.rowIndex)) {
        return;
      }

      const bucketKey = this.bucketKey(base, item.variant);
      const bucket = candidates.get(bucketKey) ?? [];
      bucket.push(item);
      candidates.set(bucketKey, bucket);
    });

    const results: CarryOverResult[] = [];
    const remaining: PhysicalGroup[] = [];
    // Handle → title written on the row that carries the product title.
    const renamedProducts = new Map<string, string>();
    const untitled: { result: CarryOverResult; handle: string }[] = [];

    groups.forEach((group) => {
      const lead = group.items[0];
      const base = group.key ? this.catalogNames.baseName(lead.name, prefix) : '';
      const candidate = base
        ? candidates
            .get(this.bucketKey(base, lead.variant))
            ?.find((item) => !consumed.has(item.rowIndex))
        : undefined;

      if (!candidate) {
        remaining.push(group);
        return;
      }

      consumed.add(candidate.rowIndex);

      // All variants of one previous-season product share a season number.
      const seasonKey = `${base}\u0000${candidate.productId}`;
      let season = assigned.get(seasonKey);
      if (season == null) {
        season = (lastSeason.get(base) ?? 0) + 1;
        lastSeason.set(base, season);
        assigned.set(seasonKey, season);
      }

      const title = `${this.catalogNames.stripSeason(candidate.title, prefix)} ${prefix}${season}`.trim();
      this.rewriteCarriedRow(rows[candidate.rowIndex], shopify, lead, group.quantity);
      if (candidate.hasOwnTitle && shopify.columns.title >= 0) {
        rows[candidate.rowIndex][shopify.columns.title] = title;
        if (candidate.handle) {
          renamedProducts.set(candidate.handle, title);
        }
      }

      const result: CarryOverResult = {
        outcome: 'carry_over',
        key: group.key,
        previousKey: candidate.key,
        physicalRows: group.items.map((item) => item.rowNumber),
        shopifyRow: candidate.rowNumber,
        previousTitle: candidate.title,
        title,
        season,
        renamed: candidate.hasOwnTitle,
        previousQuantity: candidate.quantity,
        quantity: group.quantity,
        warnings: [...group.warnings],
      };
      results.push(result);
      if (!result.renamed) {
        untitled.push({ result, handle: candidate.handle });
      }
    });

    // A variant row has no title of its own: it is renamed only if the row
    // holding its product title was carried to the same season.
    untitled.forEach(({ result, handle }) => {
      if (handle && renamedProducts.get(handle) === result.title) {
        result.renamed = true;
        return;
      }

      result.warnings.push({
        code: 'TITLE_NOT_RENAMED',
        message:
          `Row ${result.shopifyRow} has no title of its own; ` +
          `rename its product to "${result.title}" by hand`,
      });
      result.title = result.previousTitle;
    });

    return { results, remaining };
  }

  // The carried row now stands for the new season's item, so a second run
  // against the same stock matches it directly.
  private rewriteCarriedRow(
    cells: string[],
    shopify: ShopifyInput,
    item: PhysicalItem,
    quantity: number,
  ): void {
    const { columns } = shopify;
    cells[columns.quantity] = String(quantity);

    if (columns.barcode >= 0) {
      cells[columns.barcode] = item.barcode;
    }
    if (columns.productId >= 0) {
      cells[columns.productId] = item.rawProductId;
    }
    if (columns.variant >= 0) {
      cells[columns.variant] = item.rawVariant;
    }
  }

  private bucketKey(base: string, variant: string): string {
    return `${base}\u0000${variant}`;
  }
}
