/**
 * Type definitions for the sheet consolidator
 */

/**
 * Normalised value of a single worksheet cell
 */
export type CellValue = string | number | boolean | Date | null;

/**
 * One table row keyed by column name
 */
export type Row = Record<string, CellValue>;

/**
 * In-memory table loaded from (or written to) a worksheet
 */
export interface Table {
  columns: string[];
  rows: Row[];
  /** Finite value domain of every column coerced to `category` */
  categories: Record<string, CellValue[]>;
}

export interface ReadSheetOptions {
  /** Stop after this many data rows (the header row is not counted) */
  maxRows?: number;
}

/**
 * Read access to an opened workbook
 */
export interface WorkbookReader {
  listSheetNames(): string[];
  readSheet(sheetName: string, options?: ReadSheetOptions): Promise<Table>;
}

export type WorkbookOpener = (filePath: string) => Promise<WorkbookReader>;

/**
 * Options for Excel worksheet creation
 */
export interface ExcelWriteOptions {
  sheetName: string;
  columnWidth?: number;
  boldHeaders?: boolean;
}

/**
 * A targeted sheet that could not be read or transformed
 */
export interface SheetFailure {
  sheetName: string;
  message: string;
}

/**
 * Outcome of a successful consolidation run
 */
export interface ConsolidationResult {
  outputFile: string;
  processedSheets: string[];
  failedSheets: SheetFailure[];
  rowCount: number;
  columns: string[];
}

export type ConsolidationState =
  | { stage: 'idle' }
  | { stage: 'validating' }
  | { stage: 'resolving-range' }
  | { stage: 'processing'; position: number; sheetName: string }
  | { stage: 'combining' }
  | { stage: 'writing' }
  | { stage: 'done'; result: ConsolidationResult }
  | { stage: 'failed'; error: Error }
  | { stage: 'interrupted' };
