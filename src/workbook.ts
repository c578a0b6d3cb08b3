/**
 * Workbook reading and writing on top of ExcelJS
 */

import * as fs from 'fs';
import ExcelJS from 'exceljs';
import { COLUMN_WIDTH } from './constants';
import { OutputWriteError, WorkbookReadError, describeError } from './errors';
import { toText } from './transforms';
import { CellValue, ExcelWriteOptions, ReadSheetOptions, Row, Table, WorkbookReader } from './types';
import { ensureParentDirectory } from './utils';

// Excel rejects list validations whose inline formula exceeds this length
const MAX_LIST_VALIDATION_LENGTH = 255;

/**
 * Convert an ExcelJS cell value to a plain scalar.
 * Rich text is joined, formulas yield their cached result, hyperlinks their
 * display text and error cells null.
 */
export function extractCellValue(cellValue: ExcelJS.CellValue): CellValue {
  if (cellValue === null || cellValue === undefined) {
    return null;
  }
  if (
    typeof cellValue === 'string' ||
    typeof cellValue === 'number' ||
    typeof cellValue === 'boolean' ||
    cellValue instanceof Date
  ) {
    return cellValue;
  }

  // Handle richText objects (formatted cells in Excel)
  if ('richText' in cellValue) {
    return cellValue.richText.map(rt => rt.text || '').join('');
  }
  if ('hyperlink' in cellValue) {
    return extractCellValue(cellValue.text);
  }
  if ('error' in cellValue) {
    return null;
  }
  return cellValue.result === undefined ? null : extractCellValue(cellValue.result);
}

/**
 * Build unique column names from a header row.
 * Blank headers become "Unnamed: <index>" and repeats get ".1", ".2", ... suffixes.
 */
export function buildHeaders(rawHeaders: CellValue[]): string[] {
  const used = new Set<string>();

  return rawHeaders.map((raw, index) => {
    const label = toText(raw).trim();
    const base = label === '' ? `Unnamed: ${index}` : label;

    let candidate = base;
    for (let suffix = 1; used.has(candidate); suffix++) {
      candidate = `${base}.${suffix}`;
    }
    used.add(candidate);
    return candidate;
  });
}

/**
 * Read data from an Excel worksheet.
 * The first row holds the headers; fully empty rows are skipped.
 */
export function readExcelData(worksheet: ExcelJS.Worksheet, options: ReadSheetOptions = {}): Table {
  const maxCol = worksheet.columnCount;
  const headerRow = worksheet.getRow(1);
  const rawHeaders: CellValue[] = [];
  for (let colIdx = 1; colIdx <= maxCol; colIdx++) {
    rawHeaders.push(extractCellValue(headerRow.getCell(colIdx).value));
  }
  const columns = buildHeaders(rawHeaders);

  const rows: Row[] = [];
  const maxRows = options.maxRows ?? Number.POSITIVE_INFINITY;

  worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1 || rows.length >= maxRows) return;

    const rowData: Row = {};
    let hasValue = false;
    // Iterate over every column index so that empty cells are kept as null
    columns.forEach((column, index) => {
      const value = extractCellValue(row.getCell(index + 1).value);
      rowData[column] = value;
      hasValue = hasValue || value !== null;
    });

    if (hasValue) {
      rows.push(rowData);
    }
  });

  return { columns, rows, categories: {} };
}

/**
 * An .xlsx workbook loaded into memory for reading
 */
export class ExcelWorkbookReader implements WorkbookReader {
  private constructor(
    private readonly filePath: string,
    private readonly workbook: ExcelJS.Workbook
  ) {}

  static async open(filePath: string): Promise<ExcelWorkbookReader> {
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.readFile(filePath);
    } catch (error) {
      throw new WorkbookReadError(filePath, describeError(error), undefined, { cause: error });
    }
    return new ExcelWorkbookReader(filePath, workbook);
  }

  listSheetNames(): string[] {
    return this.workbook.worksheets.map(worksheet => worksheet.name);
  }

  async readSheet(sheetName: string, options: ReadSheetOptions = {}): Promise<Table> {
    const worksheet = this.workbook.getWorksheet(sheetName);
    if (!worksheet) {
      throw new WorkbookReadError(this.filePath, 'sheet does not exist', sheetName);
    }
    try {
      return readExcelData(worksheet, options);
    } catch (error) {
      throw new WorkbookReadError(this.filePath, describeError(error), sheetName, { cause: error });
    }
  }
}

export function openWorkbook(filePath: string): Promise<ExcelWorkbookReader> {
  return ExcelWorkbookReader.open(filePath);
}

export async function listSheetNames(filePath: string): Promise<string[]> {
  const reader = await openWorkbook(filePath);
  return reader.listSheetNames();
}

export async function readSheet(filePath: string, sheetName: string, options?: ReadSheetOptions): Promise<Table> {
  const reader = await openWorkbook(filePath);
  return reader.readSheet(sheetName, options);
}

/**
 * Inline list formula for a categorical column, or undefined when Excel cannot hold it
 */
function listValidationFormula(domain: CellValue[]): string | undefined {
  const labels = domain.map(toText);
  if (labels.length === 0 || labels.some(label => label.includes(',') || label.includes('"'))) {
    return undefined;
  }
  const formula = `"${labels.join(',')}"`;
  return formula.length - 2 <= MAX_LIST_VALIDATION_LENGTH ? formula : undefined;
}

/**
 * Write a table to a new single-sheet workbook
 * @returns ExcelJS workbook
 */
export function writeExcelData(table: Table, options: ExcelWriteOptions): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(options.sheetName);

  // Add header row with optional formatting
  worksheet.columns = table.columns.map(header => ({
    header: header,
    key: header,
    width: options.columnWidth || COLUMN_WIDTH
  }));

  // Apply bold formatting to headers if requested
  if (options.boldHeaders !== false) {
    const headerRow = worksheet.getRow(1);
    headerRow.font = { bold: true };
    headerRow.commit();
  }

  table.rows.forEach(row => {
    worksheet.addRow(row);
  });

  // Offer the category domain as an in-cell dropdown
  table.columns.forEach((column, index) => {
    const domain = table.categories[column];
    const formula = domain ? listValidationFormula(domain) : undefined;
    if (!formula) return;

    for (let rowNumber = 2; rowNumber <= table.rows.length + 1; rowNumber++) {
      worksheet.getCell(rowNumber, index + 1).dataValidation = {
        type: 'list',
        allowBlank: true,
        formulae: [formula]
      };
    }
  });

  return workbook;
}

/**
 * Serialise a table as the only sheet of a new workbook at `filePath`.
 * The workbook is rendered in memory first, so a failed render leaves any
 * existing file untouched.
 */
export async function writeTable(table: Table, filePath: string, sheetName: string): Promise<void> {
  try {
    const workbook = writeExcelData(table, { sheetName, boldHeaders: true });
    const buffer = await workbook.xlsx.writeBuffer();

    ensureParentDirectory(filePath);
    await fs.promises.writeFile(filePath, Buffer.from(buffer));
  } catch (error) {
    throw new OutputWriteError(filePath, describeError(error), { cause: error });
  }
}
