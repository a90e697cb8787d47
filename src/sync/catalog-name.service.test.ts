import { CatalogNameService } from './catalog-name.service';

describe('CatalogNameService', () => {
  const catalogNames = new CatalogNameService();

  describe('splitSku', () => {
    it('separates a trailing manufacturer reference', () => {
      expect(
        catalogNames.splitSku('CARHARTT WIP COTTON TRUNKS WHITE + WHITE I029375.931.XX'),
      ).toEqual({ name: 'CARHARTT WIP COTTON TRUNKS WHITE + WHITE', sku: 'I029375.931.XX' });
      expect(catalogNames.splitSku('NIKE SB ZOOM BLAZER MID BLACK / WHITE 864349-007')).toEqual({
        name: 'NIKE SB ZOOM BLAZER MID BLACK / WHITE',
        sku: '864349-007',
      });
    });

    it('leaves names without a digit-bearing trailing code alone', () => {
      expect(catalogNames.splitSku('GX1000 FALL FLOWER COPPER PLANCHE')).toEqual({
        name: 'GX1000 FALL FLOWER COPPER PLANCHE',
        sku: '',
      });
      expect(catalogNames.splitSku('TEE BASIC XXXL').sku).toBe('');
    });
  });

  describe('seasons', () => {
    it('reads the season suffix with or without a dash', () => {
      expect(catalogNames.seasonOf('Jacket Denim S12', 'S')).toBe(12);
      expect(catalogNames.seasonOf('Jacket Denim - S2', 'S')).toBe(2);
      expect(catalogNames.seasonOf('Tee XS1', 'S')).toBeNull();
    });

    it('reduces names to the same base across seasons and SKUs', () => {
      expect(catalogNames.baseName('Jacket Denim S1', 'S')).toBe('jacket denim');
      expect(catalogNames.baseName('VESTE NOIRE - S2 I029375.932.XX', 'S')).toBe('veste noire');
      expect(catalogNames.baseName('Veste Noire', 'S')).toBe('veste noire');
    });

    it('normalises accents, quotes and spacing', () => {
      expect(catalogNames.normalizeName('  Hélas  "Café"   Tee ')).toBe('helas cafe tee');
    });
  });

  describe('extract', () => {
    it('extracts vendor, title, SKU and handle', () => {
      const product = catalogNames.extract(
        'CARHARTT WIP COTTON TRUNKS WHITE + WHITE I029375.931.XX',
        catalogNames.buildVendorMap([]),
      );

      expect(product).toEqual({
        rawName: 'CARHARTT WIP COTTON TRUNKS WHITE + WHITE I029375.931.XX',
        vendor: 'Carhartt WIP',
        title: 'Cotton Trunks White + White',
        shopifyTitle: 'Carhartt WIP Cotton Trunks White + White',
        sku: 'I029375.931.XX',
        handle: 'carhartt-wip-cotton-trunks-white-white',
        needsReview: false,
        warnings: [],
      });
    });

    it('prefers vendors already present in Shopify', () => {
      const vendors = catalogNames.buildVendorMap(['Gx1000', 'VANS', 'À corriger', '']);

      expect(vendors.get('VANS')).toBe('VANS');
      expect(vendors.has('À CORRIGER')).toBe(false);

      const product = catalogNames.extract('GX1000 FALL FLOWER COPPER PLANCHE', vendors);
      expect(product.vendor).toBe('Gx1000');
      expect(product.title).toBe('Fall Flower Copper Planche');
      expect(product.needsReview).toBe(false);
    });

    it('guesses the vendor from the first word when none is known', () => {
      const product = catalogNames.extract(
        'MYSTERYBRAND HOODIE BLACK',
        catalogNames.buildVendorMap([]),
      );

      expect(product.vendor).toBe('Mysterybrand');
      expect(product.title).toBe('Hoodie Black');
      expect(product.needsReview).toBe(true);
      expect(product.warnings.map((warning) => warning.code)).toEqual(['UNKNOWN_VENDOR']);
    });

    it('keeps the raw name of an unreadable catalogue entry without throwing', () => {
      const product = catalogNames.extract('???', catalogNames.buildVendorMap([]));

      expect(product.rawName).toBe('???');
      expect(product.shopifyTitle).toBe('???');
      expect(product.handle).toBe('');
      expect(product.needsReview).toBe(true);
      expect(product.warnings.map((warning) => warning.code)).toEqual([
        'UNKNOWN_VENDOR',
        'EMPTY_TITLE',
      ]);
    });
  });

  it('builds Shopify handles from titles', () => {
    expect(catalogNames.toHandle('Hélas Café Tee / Noir')).toBe('helas-cafe-tee-noir');
  });
});
