import { Injectable } from '@nestjs/common';
import knownBrands from './data/known-brands.json';
import { ExtractedProduct, SyncWarning } from './sync.types';

// Trailing manufacturer reference, e.g. I029375.931.XX, DB0490-010, 864349-007.
const SKU_PATTERN = /\s+([A-Z0-9][A-Z0-9.-]{3,})$/;
const SIZE_WORDS = new Set(['XS', 'S', 'M', 'L', 'XL', 'XXL', 'XXXL', 'SIZE', 'TAILLE']);
const QUOTES_PATTERN = /["'‘’“”]+/g;

/** Vendor lookup: upper-cased name → display casing, longest names first. */
export type VendorMap = Map<string, string>;

/**
 * Reads the structure packed into a POS catalogue name:
 *
 *   "CARHARTT WIP COTTON TRUNKS WHITE + WHITE I029375.931.XX"
 *    vendor       title                     SKU
 *
 * and the season suffix ("S2", "- S2") carried by re-issued products.
 */
@Injectable()
export class CatalogNameService {
  splitSku(catalogName: string): { name: string; sku: string } {
    const name = catalogName.trim();
    const match = SKU_PATTERN.exec(name);

    if (match) {
      const candidate = match[1];
      if (/\d/.test(candidate) && !SIZE_WORDS.has(candidate.toUpperCase())) {
        return { name: name.slice(0, match.index).trim(), sku: candidate };
      }
    }

    return { name, sku: '' };
  }

  seasonOf(name: string, prefix: string): number | null {
    const match = this.seasonPattern(prefix).exec(this.splitSku(name).name);
    return match ? Number(match[1]) : null;
  }

  stripSeason(name: string, prefix: string): string {
    return name.trim().replace(this.seasonPattern(prefix), '').trim();
  }

  /** Identity of a product across seasons: no SKU, no season, no accents. */
  baseName(name: string, prefix: string): string {
    return this.normalizeName(this.stripSeason(this.splitSku(name).name, prefix));
  }

  normalizeName(name: string): string {
    return this.removeAccents(name)
      .toLowerCase()
      .replace(QUOTES_PATTERN, '')
      .replace(/\s+/g, ' ')
      .trim();
  }

  /**
   * Known brands, overridden by the vendors already present in Shopify so
   * that the shop's casing wins ("Nike SB" over "Nike Sb").
   */
  buildVendorMap(shopifyVendors: string[]): VendorMap {
    const merged = new Map<string, string>();
    knownBrands.forEach((brand) => merged.set(brand.toUpperCase(), brand));

    shopifyVendors.forEach((rawVendor) => {
      const vendor = rawVendor.trim();
      if (!vendor || this.isPlaceholderVendor(vendor)) {
        return;
      }
      merged.set(vendor.toUpperCase(), vendor);
    });

    return new Map([...merged.entries()].sort((a, b) => b[0].length - a[0].length));
  }

  extract(rawName: string, vendors: VendorMap): ExtractedProduct {
    const { name, sku } = this.splitSku(rawName);
    const upper = name.replace(/\s+/g, ' ').toUpperCase();
    const warnings: SyncWarning[] = [];

    let vendor = '';
    let title = '';
    let vendorFound = false;

    for (const [vendorUpper, display] of vendors) {
      if (upper === vendorUpper || upper.startsWith(`${vendorUpper} `)) {
        vendor = display;
        title = this.toTitleCase(upper.slice(vendorUpper.length).trim());
        vendorFound = true;
        break;
      }
    }

    if (!vendorFound) {
      const separator = upper.indexOf(' ');
      vendor = this.toTitleCase(separator < 0 ? upper : upper.slice(0, separator));
      title = separator < 0 ? '' : this.toTitleCase(upper.slice(separator + 1));
      warnings.push({
        code: 'UNKNOWN_VENDOR',
        message: `No known vendor in "${rawName}"; guessed "${vendor}" from the first word`,
      });
    }

    if (!title) {
      warnings.push({
        code: 'EMPTY_TITLE',
        message: `No product title left in "${rawName}" after removing vendor and SKU`,
      });
    }

    const shopifyTitle = `${vendor} ${title}`.trim();

    return {
      rawName,
      vendor,
      title,
      shopifyTitle,
      sku,
      handle: this.toHandle(shopifyTitle),
      needsReview: warnings.length > 0,
      warnings,
    };
  }

  /** "COTTON TRUNKS WHITE + WHITE" → "Cotton Trunks White + White" */
  toTitleCase(text: string): string {
    return text.toLowerCase().replace(/(?<!\p{L})\p{L}/gu, (letter) => letter.toUpperCase());
  }

  /** Shopify handle: "Cotton Trunks White + White" → "cotton-trunks-white-white" */
  toHandle(title: string): string {
    return this.removeAccents(title.toLowerCase())
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-+|-+$/g, '');
  }

  private seasonPattern(prefix: string): RegExp {
    const escaped = prefix.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    return new RegExp(`(?:\\s+-)?\\s+${escaped}(\\d+)$`, 'i');
  }

  private removeAccents(text: string): string {
    return text.normalize('NFD').replace(/\p{M}/gu, '');
  }

  private isPlaceholderVendor(vendor: string): boolean {
    const lower = vendor.toLowerCase();
    return vendor.startsWith('À') || lower === 'a corriger' || lower === 'à corriger';
  }
}
