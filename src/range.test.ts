import { InvalidRangeError } from './errors';
import { parseSheetRange } from './range';

describe('parseSheetRange', () => {
  describe('dash form', () => {
    test('returns a contiguous zero-based block', () => {
      expect(parseSheetRange('2-5', 10)).toEqual([1, 2, 3, 4]);
    });

    test('accepts a single-sheet block and the full workbook', () => {
      expect(parseSheetRange('3-3', 3)).toEqual([2]);
      expect(parseSheetRange('1-4', 4)).toEqual([0, 1, 2, 3]);
    });

    test('tolerates spaces around the bounds', () => {
      expect(parseSheetRange(' 1 - 2 ', 2)).toEqual([0, 1]);
    });

    test('length is b - a + 1 for every valid pair', () => {
      const sheetCount = 6;
      for (let a = 1; a <= sheetCount; a++) {
        for (let b = a; b <= sheetCount; b++) {
          const indices = parseSheetRange(`${a}-${b}`, sheetCount);
          expect(indices).toHaveLength(b - a + 1);
          expect(indices[0]).toBe(a - 1);
          expect(indices[indices.length - 1]).toBe(b - 1);
        }
      }
    });
  });

  describe('comma form', () => {
    test('keeps the given order', () => {
      expect(parseSheetRange('5,1,3', 5)).toEqual([4, 0, 2]);
    });

    test('allows duplicates', () => {
      expect(parseSheetRange('2,2', 3)).toEqual([1, 1]);
    });

    test('accepts a single sheet number', () => {
      expect(parseSheetRange('4', 4)).toEqual([3]);
    });

    test('trims tokens', () => {
      expect(parseSheetRange('1, 3 ,2', 3)).toEqual([0, 2, 1]);
    });
  });

  describe('rejects', () => {
    test.each([
      ['0-3', 10],
      ['1-100', 10],
      ['3-1', 10],
      ['abc', 10],
      ['1-2-3', 10],
      ['1-', 10],
      ['1,,2', 10],
      ['0', 10],
      ['11', 10],
      ['1.5', 10],
      ['', 10],
      ['1', 0]
    ])('%s with %d sheets', (rangeText, sheetCount) => {
      expect(() => parseSheetRange(rangeText, sheetCount)).toThrow(InvalidRangeError);
    });

    test('error carries the range text and sheet count', () => {
      try {
        parseSheetRange('1-100', 10);
        throw new Error('expected parseSheetRange to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidRangeError);
        if (error instanceof InvalidRangeError) {
          expect(error.rangeText).toBe('1-100');
          expect(error.sheetCount).toBe(10);
          expect(error.message).toContain('between 1 and 10');
        }
      }
    });
  });
});
