// Header lookups ignore case and surrounding whitespace, as exports differ.
export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase();
}

export function resolveColumn(headers: string[], candidates: string[]): number {
  const normalized = headers.map(normalizeHeader);

  for (const candidate of candidates) {
    const index = normalized.indexOf(normalizeHeader(candidate));
    if (index >= 0) {
      return index;
    }
  }

  return -1;
}

export function cellAt(cells: string[], index: number): string {
  return index >= 0 ? cells[index] ?? '' : '';
}

// Plain decimals only; Number() would also take "0x10" or "1e3".
const DECIMAL_PATTERN = /^-?\d+(?:[.,]\d+)?$/;

/** "25,50" → 25.5; null when the text is not a plain decimal number. */
export function parseDecimalText(text: string): number | null {
  const raw = text.trim();
  if (!DECIMAL_PATTERN.test(raw)) {
    return null;
  }

  return Number(raw.replace(',', '.'));
}

/**
 * Reads a stock quantity the way POS exports write it: "3", "3,0", "2.5"
 * (truncated to 2). Returns null when the text is not a number.
 */
export function parseQuantityText(text: string): number | null {
  const parsed = parseDecimalText(text);
  return parsed == null ? null : Math.trunc(parsed);
}

export function padCells(cells: string[], length: number): string[] {
  if (cells.length >= length) {
    return [...cells];
  }

  return [...cells, ...new Array<string>(length - cells.length).fill('')];
}
