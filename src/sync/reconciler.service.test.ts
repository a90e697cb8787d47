import { DEFAULT_SYNC_CONFIG, SyncConfig } from '../config/app.config';
import { TableReaderService } from '../services/table-reader.service';
import { CatalogNameService } from './catalog-name.service';
import { KeyBuilderService } from './key-builder.service';
import { ReconcilerService } from './reconciler.service';
import { ReconciliationResult } from './sync.types';

const SHOPIFY_HEADER = 'Handle,Title,Vendor,Variant Barcode,Variant Inventory Qty';
const PHYSICAL_HEADER = 'Code_barre;Nom;Taille;Qte';

describe('ReconcilerService', () => {
  const reader = new TableReaderService(new KeyBuilderService());
  const reconciler = new ReconcilerService(new CatalogNameService());

  function reconcile(physicalLines: string[], shopifyLines: string[]) {
    const physical = reader.readPhysicalStock(
      Buffer.from([PHYSICAL_HEADER, ...physicalLines].join('\n')),
      DEFAULT_SYNC_CONFIG,
    );
    const shopify = reader.readShopifyExport(
      Buffer.from([SHOPIFY_HEADER, ...shopifyLines].join('\n')),
      DEFAULT_SYNC_CONFIG,
    );
    return reconciler.reconcile(physical.items, shopify, DEFAULT_SYNC_CONFIG);
  }

  function outcomes(results: ReconciliationResult[]): string[] {
    return results.map((result) => `${result.outcome}:${result.key ?? '-'}`);
  }

  it('overwrites matched quantities and zeroes rows missing from the stock', () => {
    const { rows, results } = reconcile(
      ['100-1;CARHARTT WIP JACKET DENIM;M;3', '200-1;VANS OLD SKOOL BLACK VN000D3HY28;42;2'],
      [
        'jacket-denim,Carhartt WIP Jacket Denim,Carhartt WIP,100-1,5',
        'beanie,Stussy Beanie,Stussy,300-1,4',
      ],
    );

    expect(rows.map((row) => row[4])).toEqual(['3', '0']);
    expect(outcomes(results)).toEqual(['matched:100-1', 'new_product:200-1', 'zeroed:300-1']);
    expect(results[0]).toEqual({
      outcome: 'matched',
      key: '100-1',
      physicalRows: [2],
      shopifyRow: 2,
      title: 'Carhartt WIP Jacket Denim',
      previousQuantity: '5',
      quantity: 3,
      warnings: [],
    });
    expect(results[2]).toMatchObject({ shopifyRow: 3, previousQuantity: '4', quantity: 0 });
  });

  it('extracts new products with known vendors', () => {
    const { results } = reconcile(['200-1;VANS OLD SKOOL BLACK VN000D3HY28;42;2'], []);

    const [result] = results;
    if (result.outcome !== 'new_product') {
      throw new Error(`unexpected outcome ${result.outcome}`);
    }
    expect(result.quantity).toBe(2);
    expect(result.product).toMatchObject({
      vendor: 'Vans',
      title: 'Old Skool Black',
      shopifyTitle: 'Vans Old Skool Black',
      sku: 'VN000D3HY28',
      handle: 'vans-old-skool-black',
      needsReview: false,
    });
  });

  it('renames a previous-season product onto the new barcode', () => {
    const { rows, results } = reconcile(
      ['200-1;JACKET DENIM S1;M;3'],
      ['jacket-denim,Jacket Denim,Carhartt WIP,100-1,0'],
    );

    expect(results).toEqual([
      {
        outcome: 'carry_over',
        key: '200-1',
        previousKey: '100-1',
        physicalRows: [2],
        shopifyRow: 2,
        previousTitle: 'Jacket Denim',
        title: 'Jacket Denim S2',
        season: 2,
        renamed: true,
        previousQuantity: '0',
        quantity: 3,
        warnings: [],
      },
    ]);
    expect(rows).toEqual([['jacket-denim', 'Jacket Denim S2', 'Carhartt WIP', '200-1', '3']]);
  });

  it('gives all variants of one carried product the same season', () => {
    const { rows, results } = reconcile(
      ['210-1;HOODIE LOGO;S;1', '210-2;HOODIE LOGO;M;2'],
      [
        'hoodie-logo,Hoodie Logo,Obey,110-1,1',
        'hoodie-logo,,,110-2,1',
        'hoodie-logo-old,Hoodie Logo,Obey,105-1,6',
      ],
    );

    expect(outcomes(results)).toEqual(['carry_over:210-1', 'carry_over:210-2', 'zeroed:105-1']);
    expect(
      results.map((result) => (result.outcome === 'carry_over' ? result.season : null)),
    ).toEqual([1, 1, null]);
    expect(results[1]).toMatchObject({ title: 'Hoodie Logo S1', renamed: true, warnings: [] });
    // The earliest candidate row is carried; variant rows keep a blank title.
    expect(rows).toEqual([
      ['hoodie-logo', 'Hoodie Logo S1', 'Obey', '210-1', '1'],
      ['hoodie-logo', '', '', '210-2', '2'],
      ['hoodie-logo-old', 'Hoodie Logo', 'Obey', '105-1', '0'],
    ]);
  });

  it('flags a carried variant row whose product title stays behind', () => {
    const { rows, results } = reconcile(
      ['210-2;HOODIE LOGO;M;5'],
      ['h,Hoodie Logo,Obey,110-1,1', 'h,,,110-2,1'],
    );

    expect(rows).toEqual([
      ['h', 'Hoodie Logo', 'Obey', '110-1', '0'],
      ['h', '', '', '210-2', '5'],
    ]);
    expect(results[0]).toEqual({
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
    });
    expect(outcomes(results)).toEqual(['carry_over:210-2', 'zeroed:110-1']);
  });

  it('writes key cells of a carried row as they appear in the stock file', () => {
    const config: SyncConfig = {
      ...DEFAULT_SYNC_CONFIG,
      shopify: { ...DEFAULT_SYNC_CONFIG.shopify, productId: ['Product ID'], variant: ['Variant'] },
    };
    const physical = reader.readPhysicalStock(
      Buffer.from('Code_barre;Nom;Taille;Qte\nab20-m;HOODIE LOGO;M;2\n'),
      config,
    );
    const shopify = reader.readShopifyExport(
      Buffer.from('Product ID,Variant,Title,Variant Inventory Qty\nab10,m,Hoodie Logo,1\n'),
      config,
    );

    const { rows, results } = reconciler.reconcile(physical.items, shopify, config);

    expect(outcomes(results)).toEqual(['carry_over:AB20-M']);
    expect(rows).toEqual([['ab20', 'm', 'Hoodie Logo S1', '2']]);
  });

  it('numbers successive carried products of the same name upwards', () => {
    const { results } = reconcile(
      ['300-1;CAP CLASSIC;One Size;1', '301-1;CAP CLASSIC;One Size;1'],
      ['cap-a,Cap Classic,Obey,150-1,0', 'cap-b,Cap Classic,Obey,151-1,0'],
    );

    expect(
      results.map((result) => (result.outcome === 'carry_over' ? result.title : result.outcome)),
    ).toEqual(['Cap Classic S1', 'Cap Classic S2']);
  });

  it('sums duplicate physical keys and keeps the last duplicate Shopify row', () => {
    const { rows, results } = reconcile(
      ['400-1;OBEY TEE A;M;1', '400-1;OBEY TEE A;M;2'],
      ['a,Tee A,Obey,400-1,2', 'b,Tee B,Obey,400-1,7'],
    );

    expect(rows.map((row) => row[4])).toEqual(['0', '3']);
    expect(results).toEqual([
      {
        outcome: 'matched',
        key: '400-1',
        physicalRows: [2, 3],
        shopifyRow: 3,
        title: 'Tee B',
        previousQuantity: '7',
        quantity: 3,
        warnings: [
          {
            code: 'DUPLICATE_PHYSICAL_KEY',
            message: 'Rows 2, 3 share key 400-1; quantities were summed',
          },
        ],
      },
      {
        outcome: 'zeroed',
        key: '400-1',
        physicalRows: [],
        shopifyRow: 2,
        title: 'Tee A',
        previousQuantity: '2',
        quantity: 0,
        warnings: [
          {
            code: 'DUPLICATE_SHOPIFY_KEY',
            message: 'Key 400-1 also on row 3; that row keeps the stock',
          },
        ],
      },
    ]);
  });

  it('passes keyless Shopify rows through and treats keyless stock as new', () => {
    const { rows, results } = reconcile([';???;;1'], ['gift-card,Gift Card,Shop,,9']);

    expect(rows).toEqual([['gift-card', 'Gift Card', 'Shop', '', '9']]);
    expect(outcomes(results)).toEqual(['new_product:-', 'passthrough:-']);

    const [product] = results;
    if (product.outcome !== 'new_product') {
      throw new Error(`unexpected outcome ${product.outcome}`);
    }
    expect(product.product.rawName).toBe('???');
    expect(product.product.needsReview).toBe(true);
    expect(product.warnings.map((warning) => warning.code)).toEqual([
      'MISSING_KEY',
      'UNKNOWN_VENDOR',
      'EMPTY_TITLE',
    ]);
  });

  it('accounts for every keyed Shopify row and every physical row exactly once', () => {
    const { results } = reconcile(
      [
        '100-1;JACKET DENIM;M;3',
        '500-1;JACKET DENIM S4;M;1',
        '600-1;NEW THING;L;2',
        '600-1;NEW THING;L;1',
      ],
      [
        'jacket-denim,Jacket Denim,Obey,100-1,1',
        'jacket-old,Jacket Denim S3,Obey,90-1,0',
        'gone,Gone Tee,Obey,700-1,5',
        'gift-card,Gift Card,Shop,,9',
      ],
    );

    const shopifyRows = results
      .filter((result) => result.outcome !== 'new_product' && result.outcome !== 'passthrough')
      .map((result) => ('shopifyRow' in result ? result.shopifyRow : 0))
      .sort((a, b) => a - b);
    const physicalRows = results.flatMap((result) => result.physicalRows).sort((a, b) => a - b);

    expect(shopifyRows).toEqual([2, 3, 4]);
    expect(physicalRows).toEqual([2, 3, 4, 5]);
    expect(outcomes(results)).toEqual([
      'matched:100-1',
      'carry_over:500-1',
      'new_product:600-1',
      'zeroed:700-1',
      'passthrough:-',
    ]);
  });
});
