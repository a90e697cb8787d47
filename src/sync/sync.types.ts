export interface TableRow {
  rowNumber: number;
  cells: string[];
}

export interface ParsedTable {
  headers: string[];
  rows: TableRow[];
}

export interface MatchKeyParts {
  productId: string;
  variant: string;
  key: string | null;
}

export type SyncWarningCode =
  | 'DUPLICATE_SHOPIFY_KEY'
  | 'DUPLICATE_PHYSICAL_KEY'
  | 'UNREADABLE_QUANTITY'
  | 'MISSING_KEY'
  | 'UNKNOWN_VENDOR'
  | 'EMPTY_TITLE'
  | 'TITLE_NOT_RENAMED';

export interface SyncWarning {
  code: SyncWarningCode;
  message: string;
}

export interface PhysicalItem extends MatchKeyParts {
  rowNumber: number;
  barcode: string;
  // Barcode parts as written in the file, for cells rewritten on carry-over.
  rawProductId: string;
  rawVariant: string;
  name: string;
  size: string;
  quantity: number;
  purchasePrice: string;
  salePrice: string;
  warnings: SyncWarning[];
}

export interface SkippedPhysicalRow {
  rowNumber: number;
  barcode: string;
  name: string;
  reason: string;
}

export interface ShopifyItem extends MatchKeyParts {
  rowIndex: number;
  rowNumber: number;
  handle: string;
  title: string;
  // The row has a Title cell of its own (variant rows usually do not).
  hasOwnTitle: boolean;
  quantity: string;
}

export interface ShopifyColumnIndexes {
  barcode: number;
  productId: number;
  variant: number;
  quantity: number;
  title: number;
  handle: number;
  vendor: number;
}

export interface ShopifyInput {
  table: ParsedTable;
  columns: ShopifyColumnIndexes;
  items: ShopifyItem[];
}

export interface PhysicalInput {
  items: PhysicalItem[];
  skipped: SkippedPhysicalRow[];
}

export interface ExtractedProduct {
  rawName: string;
  vendor: string;
  title: string;
  shopifyTitle: string;
  sku: string;
  handle: string;
  needsReview: boolean;
  warnings: SyncWarning[];
}

interface ResultBase {
  key: string | null;
  physicalRows: number[];
  warnings: SyncWarning[];
}

export interface MatchedResult extends ResultBase {
  outcome: 'matched';
  shopifyRow: number;
  title: string;
  previousQuantity: string;
  quantity: number;
}

export interface ZeroedResult extends ResultBase {
  outcome: 'zeroed';
  shopifyRow: number;
  title: string;
  previousQuantity: string;
  quantity: 0;
}

export interface CarryOverResult extends ResultBase {
  outcome: 'carry_over';
  previousKey: string | null;
  shopifyRow: number;
  previousTitle: string;
  title: string;
  season: number;
  // False when the product title could not be rewritten; title then stays previousTitle.
  renamed: boolean;
  previousQuantity: string;
  quantity: number;
}

export interface NewProductResult extends ResultBase {
  outcome: 'new_product';
  items: PhysicalItem[];
  quantity: number;
  product: ExtractedProduct;
}

export interface PassthroughResult extends ResultBase {
  outcome: 'passthrough';
  shopifyRow: number;
  title: string;
}

export type ReconciliationResult =
  | MatchedResult
  | ZeroedResult
  | CarryOverResult
  | NewProductResult
  | PassthroughResult;

export type ReconciliationOutcome = ReconciliationResult['outcome'];

export interface ReconciliationOutput {
  // Shopify cells after quantity, key and title updates, same order as input.
  rows: string[][];
  results: ReconciliationResult[];
}

export interface SyncStats {
  totalPhysical: number;
  skippedPhysical: number;
  totalShopify: number;
  matched: number;
  quantityChanges: number;
  zeroed: number;
  carryOver: number;
  newProducts: number;
  passthrough: number;
  warnings: number;
  needsReview: number;
}

export interface SyncReport {
  stats: SyncStats;
  headers: string[];
  rows: string[][];
  summary: string;
}

export interface SyncResult {
  shopifyCsv: string;
  newProductsCsv: string;
  combinedCsv: string;
  inStockCsv: string;
  reportCsv: string;
  report: SyncReport;
  results: ReconciliationResult[];
}
