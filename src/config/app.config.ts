export interface PhysicalColumnsConfig {
  barcode: string[];
  name: string[];
  size: string[];
  quantity: string[];
  purchasePrice: string[];
  salePrice: string[];
}

export interface ShopifyColumnsConfig {
  barcode: string[];
  // When both are set, the key is read from these instead of the barcode.
  productId: string[];
  variant: string[];
  quantity: string[];
  title: string[];
  handle: string[];
  vendor: string[];
}

export interface NewProductDefaults {
  status: string;
  published: string;
  optionName: string;
  inventoryTracker: string;
  inventoryPolicy: string;
  fulfillmentService: string;
}

export interface SyncConfig {
  physicalDelimiter?: string;
  shopifyDelimiter?: string;
  physical: PhysicalColumnsConfig;
  shopify: ShopifyColumnsConfig;
  oneSizeLabel: string;
  seasonPrefix: string;
  newProduct: NewProductDefaults;
}

export interface AppConfig {
  port: number;
  openUiOnStart: boolean;
  maxUploadBytes: number;
  sync: SyncConfig;
}

export const DEFAULT_SYNC_CONFIG: SyncConfig = {
  physical: {
    barcode: ['Code_barre', 'Code barre', 'Barcode', 'EAN'],
    name: ['Nom', 'Nom_catalogue', 'Name', 'Catalogue Name'],
    size: ['Taille', 'Size'],
    quantity: ['Qte', 'Quantite', 'Quantity', 'Qty'],
    purchasePrice: ['Prix_achat', 'Purchase Price', 'Cost'],
    salePrice: ['Prix_vente', 'Sale Price', 'Price'],
  },
  shopify: {
    barcode: ['Variant Barcode'],
    productId: [],
    variant: [],
    quantity: ['Variant Inventory Qty', 'Variant Quantity'],
    title: ['Title'],
    handle: ['Handle'],
    vendor: ['Vendor'],
  },
  oneSizeLabel: 'One Size',
  seasonPrefix: 'S',
  newProduct: {
    status: 'draft',
    published: 'FALSE',
    optionName: 'Size',
    inventoryTracker: 'shopify',
    inventoryPolicy: 'deny',
    fulfillmentService: 'manual',
  },
};

// Runtime configuration.

export const APP_CONFIG: AppConfig = {
  port: readNumber(process.env.PORT, 3000),
  openUiOnStart: process.env.OPEN_UI_ON_START === 'true',
  maxUploadBytes: readNumber(process.env.MAX_UPLOAD_BYTES, 10 * 1024 * 1024),
  sync: DEFAULT_SYNC_CONFIG,
};

export interface SyncConfigOverrides {
  physicalDelimiter?: string;
  shopifyDelimiter?: string;
  physicalBarcodeColumn?: string;
  physicalNameColumn?: string;
  physicalQuantityColumn?: string;
  shopifyBarcodeColumn?: string;
  shopifyQuantityColumn?: string;
  shopifyProductIdColumn?: string;
  shopifyVariantColumn?: string;
  oneSizeLabel?: string;
}

/**
 * Returns a new config with request overrides applied. A column override
 * replaces the candidate list for that column.
 */
export function mergeSyncConfig(
  base: SyncConfig,
  overrides: SyncConfigOverrides = {},
): SyncConfig {
  const pick = (value: string | undefined, fallback: string[]): string[] =>
    value && value.trim() ? [value.trim()] : [...fallback];

  return {
    physicalDelimiter: overrides.physicalDelimiter || base.physicalDelimiter,
    shopifyDelimiter: overrides.shopifyDelimiter || base.shopifyDelimiter,
    physical: {
      ...base.physical,
      barcode: pick(overrides.physicalBarcodeColumn, base.physical.barcode),
      name: pick(overrides.physicalNameColumn, base.physical.name),
      quantity: pick(overrides.physicalQuantityColumn, base.physical.quantity),
    },
    shopify: {
      ...base.shopify,
      barcode: pick(overrides.shopifyBarcodeColumn, base.shopify.barcode),
      quantity: pick(overrides.shopifyQuantityColumn, base.shopify.quantity),
      productId: pick(overrides.shopifyProductIdColumn, base.shopify.productId),
      variant: pick(overrides.shopifyVariantColumn, base.shopify.variant),
    },
    oneSizeLabel: overrides.oneSizeLabel?.trim() || base.oneSizeLabel,
    seasonPrefix: base.seasonPrefix,
    newProduct: { ...base.newProduct },
  };
}

function readNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) ? parsed : fallback;
}
