import { Injectable } from '@nestjs/common';
import {
  PhysicalInput,
  ReconciliationOutcome,
  ReconciliationResult,
  SyncReport,
  SyncStats,
} from './sync.types';

export const REPORT_HEADERS = [
  'Outcome',
  'Key',
  'Previous Key',
  'Shopify Row',
  'Physical Rows',
  'Title',
  'Previous Title',
  'Previous Quantity',
  'Quantity',
  'Vendor',
  'SKU',
  'Needs Review',
  'Notes',
];

const OUTCOME_LABELS: Record<ReconciliationOutcome | 'skipped', string> = {
  matched: 'Matched',
  zeroed: 'Zeroed out',
  carry_over: 'Carry-over renamed',
  new_product: 'New product',
  passthrough: 'Untouched (no key)',
  skipped: 'Skipped physical row',
};

const RULE = '='.repeat(68);
const SECTION_RULE = '-'.repeat(68);

@Injectable()
export class ReportService {
  buildStats(
    results: ReconciliationResult[],
    physical: PhysicalInput,
    totalShopify: number,
  ): SyncStats {
    const count = (outcome: ReconciliationOutcome): number =>
      results.filter((result) => result.outcome === outcome).length;

    return {
      totalPhysical: physical.items.length + physical.skipped.length,
      skippedPhysical: physical.skipped.length,
      totalShopify,
      matched: count('matched'),
      quantityChanges: results.filter(
        (result) =>
          result.outcome === 'matched' && result.previousQuantity !== String(result.quantity),
      ).length,
      zeroed: count('zeroed'),
      carryOver: count('carry_over'),
      newProducts: count('new_product'),
      passthrough: count('passthrough'),
      warnings: results.reduce((total, result) => total + result.warnings.length, 0),
      needsReview: results.filter((result) => this.needsReview(result)).length,
    };
  }

  build(
    results: ReconciliationResult[],
    physical: PhysicalInput,
    totalShopify: number,
  ): SyncReport {
    const stats = this.buildStats(results, physical, totalShopify);
    const rows = [
      ...results.map((result) => this.toRow(result)),
      ...physical.skipped.map((row) => [
        OUTCOME_LABELS.skipped,
        '',
        '',
        '',
        String(row.rowNumber),
        row.name,
        '',
        '',
        '',
        '',
        '',
        '',
        row.reason,
      ]),
    ];

    return {
      stats,
      headers: [...REPORT_HEADERS],
      rows,
      summary: this.buildSummary(results, stats),
    };
  }

  private toRow(result: ReconciliationResult): string[] {
    const notes = result.warnings.map((warning) => warning.message).join(' | ');
    const physicalRows = result.physicalRows.join(' ');
    const label = OUTCOME_LABELS[result.outcome];

    switch (result.outcome) {
      case 'matched':
      case 'zeroed':
        return [
          label,
          result.key ?? '',
          '',
          String(result.shopifyRow),
          physicalRows,
          result.title,
          '',
          result.previousQuantity,
          String(result.quantity),
          '',
          '',
          '',
          notes,
        ];
      case 'carry_over':
        return [
          label,
          result.key ?? '',
          result.previousKey ?? '',
          String(result.shopifyRow),
          physicalRows,
          result.title,
          result.previousTitle,
          result.previousQuantity,
          String(result.quantity),
          '',
          '',
          this.needsReview(result) ? 'yes' : '',
          notes,
        ];
      case 'new_product':
        return [
          label,
          result.key ?? '',
          '',
          '',
          physicalRows,
          result.product.shopifyTitle,
          result.product.rawName,
          '',
          String(result.quantity),
          result.product.vendor,
          result.product.sku,
          this.needsReview(result) ? 'yes' : '',
          notes,
        ];
      case 'passthrough':
        return [
          label,
          '',
          '',
          String(result.shopifyRow),
          '',
          result.title,
          '',
          '',
          '',
          '',
          '',
          '',
          notes,
        ];
    }
  }

  private needsReview(result: ReconciliationResult): boolean {
    switch (result.outcome) {
      case 'new_product':
        return result.product.needsReview;
      case 'carry_over':
        return !result.renamed;
      default:
        return false;
    }
  }

  private buildSummary(results: ReconciliationResult[], stats: SyncStats): string {
    const lines = [
      RULE,
      '  SYNC REPORT',
      RULE,
      '',
      `  Physical stock rows      : ${stats.totalPhysical} (${stats.skippedPhysical} skipped)`,
      `  Shopify rows             : ${stats.totalShopify}`,
      '',
      `  Matched barcodes         : ${stats.matched}`,
      `  Quantities changed       : ${stats.quantityChanges}`,
      `  Zeroed (not in stock)    : ${stats.zeroed}`,
      `  New products             : ${stats.newProducts}`,
      `  Carry-over renamed       : ${stats.carryOver}`,
      `  Untouched (no key)       : ${stats.passthrough}`,
      `  Warnings                 : ${stats.warnings}`,
      '',
    ];

    const section = (title: string, body: string[]): void => {
      if (body.length) {
        lines.push(SECTION_RULE, title, SECTION_RULE, ...body, '');
      }
    };

    const changes: string[] = [];
    const zeroed: string[] = [];
    const created: string[] = [];
    const carried: string[] = [];

    results.forEach((result) => {
      switch (result.outcome) {
        case 'matched':
          if (result.previousQuantity !== String(result.quantity)) {
            changes.push(
              `  [${result.key}]  ${result.title.slice(0, 55)}`,
              `      ${result.previousQuantity || '(empty)'} -> ${result.quantity}`,
            );
          }
          break;
        case 'zeroed':
          zeroed.push(
            `  [${result.key}]  ${result.title.slice(0, 55)}  (was: ${
              result.previousQuantity || '(empty)'
            })`,
          );
          break;
        case 'new_product':
          created.push(
            `  [${result.key ?? 'no barcode'}]  ${result.product.shopifyTitle.slice(0, 45)}` +
              (result.product.sku ? `  SKU:${result.product.sku}` : '') +
              `  q:${result.quantity}` +
              (result.product.needsReview ? '  NEEDS REVIEW' : ''),
          );
          break;
        case 'carry_over':
          carried.push(
            `  [${result.previousKey} -> ${result.key}]`,
            `      Before : ${result.previousTitle}`,
            `      After  : ${result.title}` +
              (result.renamed ? '' : '  NEEDS REVIEW (title not renamed)'),
          );
          break;
        case 'passthrough':
          break;
      }
    });

    section('QUANTITY CHANGES', changes);
    section('ZEROED (missing from physical stock)', zeroed);
    section('NEW PRODUCTS (physical only, to import into Shopify)', created);
    section(
      'CARRY-OVER RENAMED',
      carried.length ? carried : ['  No carry-over detected in this file.'],
    );

    lines.push(RULE, '  END OF REPORT', RULE);
    return lines.join('\n');
  }
}
