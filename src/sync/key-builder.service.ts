import { Injectable } from '@nestjs/common';
import { MatchKeyParts } from './sync.types';

/**
 * Builds the `{product_id}-{variant}` key both files are joined on.
 * Parts are stripped of whitespace and upper-cased so that "65368-2 " and
 * "65368-2" meet; the cells themselves keep their original text.
 */
@Injectable()
export class KeyBuilderService {
  fromBarcode(barcode: string): MatchKeyParts {
    const { productId, variant } = this.splitBarcode(barcode);
    return this.fromParts(productId, variant);
  }

  /** Splits at the first dash; the parts keep their original text. */
  splitBarcode(barcode: string): { productId: string; variant: string } {
    const trimmed = barcode.trim();
    const separator = trimmed.indexOf('-');

    if (separator < 0) {
      return { productId: trimmed, variant: '' };
    }

    return {
      productId: trimmed.slice(0, separator).trim(),
      variant: trimmed.slice(separator + 1).trim(),
    };
  }

  fromParts(productId: string, variant: string): MatchKeyParts {
    const normalizedProductId = this.normalizePart(productId);
    const normalizedVariant = this.normalizePart(variant);

    return {
      productId: normalizedProductId,
      variant: normalizedVariant,
      key: this.buildKey(normalizedProductId, normalizedVariant),
    };
  }

  buildKey(productId: string, variant: string): string | null {
    const id = this.normalizePart(productId);
    if (!id) {
      return null;
    }

    const variantPart = this.normalizePart(variant);
    return variantPart ? `${id}-${variantPart}` : id;
  }

  private normalizePart(value: string): string {
    return value.replace(/\s+/g, '').toUpperCase();
  }
}
