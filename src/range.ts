import { InvalidRangeError } from './errors';

const INTEGER_TOKEN = /^\+?\d+$/;

/**
 * Parse a 1-based sheet range expression into zero-based sheet indices.
 *
 * `"2-4"` selects a contiguous block, `"1,3,5"` an explicit list kept in the
 * given order (duplicates allowed). The dash form is chosen whenever the text
 * contains `-`, so negative numbers are never valid list entries.
 *
 * @param rangeText - Expression as typed by the user
 * @param sheetCount - Number of sheets in the workbook
 * @throws InvalidRangeError on malformed input or sheet numbers outside 1..sheetCount
 */
export function parseSheetRange(rangeText: string, sheetCount: number): number[] {
  const fail = (): never => {
    throw new InvalidRangeError(rangeText, sheetCount);
  };

  const toSheetNumber = (token: string): number => {
    const trimmed = token.trim();
    if (!INTEGER_TOKEN.test(trimmed)) {
      return fail();
    }
    const value = Number(trimmed);
    return value >= 1 && value <= sheetCount ? value : fail();
  };

  if (rangeText.includes('-')) {
    const bounds = rangeText.split('-');
    if (bounds.length !== 2) {
      return fail();
    }
    const start = toSheetNumber(bounds[0]);
    const end = toSheetNumber(bounds[1]);
    if (start > end) {
      return fail();
    }
    return Array.from({ length: end - start + 1 }, (_, offset) => start - 1 + offset);
  }

  return rangeText.split(',').map(token => toSheetNumber(token) - 1);
}
