import { REPORT_HEADERS, ReportService } from './report.service';
import { PhysicalInput, ReconciliationResult } from './sync.types';

describe('ReportService', () => {
  const reports = new ReportService();
  const physical: PhysicalInput = { items: [], skipped: [] };

  const results: ReconciliationResult[] = [
    {
      outcome: 'matched',
      key: '100-1',
      physicalRows: [2],
      shopifyRow: 2,
      title: 'Obey Tee Icon',
      previousQuantity: '3',
      quantity: 3,
      warnings: [],
    },
    {
      outcome: 'passthrough',
      key: null,
      physicalRows: [],
      shopifyRow: 3,
      title: 'Gift Card',
      warnings: [],
    },
    {
      outcome: 'new_product',
      key: null,
      physicalRows: [4],
      items: [],
      quantity: 1,
      product: {
        rawName: '???',
        vendor: '???',
        title: '',
        shopifyTitle: '???',
        sku: '',
        handle: '',
        needsReview: true,
        warnings: [],
      },
      warnings: [
        { code: 'MISSING_KEY', message: 'No barcode; cannot be matched against Shopify' },
        { code: 'EMPTY_TITLE', message: 'No product title left in "???" after removing vendor and SKU' },
      ],
    },
  ];

  it('counts unchanged matches apart from quantity changes', () => {
    const { stats } = reports.build(results, physical, 2);

    expect(stats).toMatchObject({
      matched: 1,
      quantityChanges: 0,
      passthrough: 1,
      newProducts: 1,
      warnings: 2,
      needsReview: 1,
    });
  });

  it('writes one row per result with joined notes', () => {
    const report = reports.build(results, physical, 2);

    expect(report.headers).toEqual(REPORT_HEADERS);
    expect(report.rows[1]).toEqual([
      'Untouched (no key)',
      '',
      '',
      '3',
      '',
      'Gift Card',
      '',
      '',
      '',
      '',
      '',
      '',
      '',
    ]);
    expect(report.rows[2]).toEqual([
      'New product',
      '',
      '',
      '',
      '4',
      '???',
      '???',
      '',
      '1',
      '???',
      '',
      'yes',
      'No barcode; cannot be matched against Shopify | No product title left in "???" after removing vendor and SKU',
    ]);
  });

  it('marks a carry-over that could not rename its product for review', () => {
    const carried: ReconciliationResult = {
      outcome: 'carry_over',
      key: '210-2',
      previousKey: '110-2',
      physicalRows: [2],
      shopifyRow: 3,
      previousTitle: 'Hoodie Logo',
      title: 'Hoodie Logo',
      season: 1,
      renamed: false,
      previousQuantity: '1',
      quantity: 5,
      warnings: [
        {
          code: 'TITLE_NOT_RENAMED',
          message: 'Row 3 has no title of its own; rename its product to "Hoodie Logo S1" by hand',
        },
      ],
    };

    const report = reports.build([carried], physical, 2);

    expect(report.stats.needsReview).toBe(1);
    expect(report.rows[0][11]).toBe('yes');
    expect(report.summary.split('\n')).toContain(
      '      After  : Hoodie Logo  NEEDS REVIEW (title not renamed)',
    );
  });

  it('says so when nothing was carried over', () => {
    const lines = reports.build(results, physical, 2).summary.split('\n');

    expect(lines).toContain('  [no barcode]  ???  q:1  NEEDS REVIEW');
    expect(lines).toContain('  No carry-over detected in this file.');
    expect(lines).not.toContain('QUANTITY CHANGES');
    expect(lines[lines.length - 2]).toBe('  END OF REPORT');
  });
});
