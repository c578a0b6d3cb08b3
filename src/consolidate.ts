/**
 * Sheet consolidation: resolve the range, read and transform each sheet,
 * tag rows with their origin and write one combined sheet
 */

import * as fs from 'fs';
import { setImmediate } from 'timers/promises';
import type { ColumnConfig } from './config';
import { OUTPUT_SHEET_NAME, SOURCE_COLUMN } from './constants';
import {
  InputNotFoundError,
  NoDataProcessedError,
  UserInterruptedError,
  describeError
} from './errors';
import { parseSheetRange } from './range';
import { applyColumnProperties } from './transforms';
import {
  CellValue,
  ConsolidationResult,
  ConsolidationState,
  Row,
  SheetFailure,
  Table,
  WorkbookOpener
} from './types';
import { ensureParentDirectory, reportSummary } from './utils';
import { openWorkbook, writeTable } from './workbook';

export interface ConsolidatorOptions {
  columnConfig?: ColumnConfig;
  /** Checked before each sheet and before writing; once aborted the run ends without output */
  signal?: AbortSignal;
  openWorkbook?: WorkbookOpener;
}

/**
 * Append the source sheet column to every row
 */
export function tagSourceSheet(table: Table, sheetName: string): Table {
  return {
    columns: table.columns.includes(SOURCE_COLUMN) ? [...table.columns] : [...table.columns, SOURCE_COLUMN],
    rows: table.rows.map(row => ({ ...row, [SOURCE_COLUMN]: sheetName })),
    categories: { ...table.categories }
  };
}

/**
 * Union-concatenate tables.
 * Columns keep first-seen order with the source column last; cells of columns
 * a table does not have are null.
 */
export function concatTables(tables: Table[]): Table {
  const columns: string[] = [];
  const seen = new Set<string>();
  let hasSource = false;

  for (const table of tables) {
    for (const column of table.columns) {
      if (column === SOURCE_COLUMN) {
        hasSource = true;
      } else if (!seen.has(column)) {
        seen.add(column);
        columns.push(column);
      }
    }
  }
  if (hasSource) {
    columns.push(SOURCE_COLUMN);
  }

  const rows: Row[] = [];
  const categories: Record<string, CellValue[]> = {};

  for (const table of tables) {
    for (const row of table.rows) {
      const combined: Row = {};
      for (const column of columns) {
        combined[column] = row[column] ?? null;
      }
      rows.push(combined);
    }

    for (const [column, domain] of Object.entries(table.categories)) {
      const existing = categories[column] ?? [];
      categories[column] = [...existing, ...domain.filter(value => !existing.includes(value))];
    }
  }

  return { columns, rows, categories };
}

export class SheetConsolidator {
  private currentState: ConsolidationState = { stage: 'idle' };
  private readonly columnConfig: ColumnConfig;
  private readonly open: WorkbookOpener;

  constructor(private readonly options: ConsolidatorOptions = {}) {
    this.columnConfig = options.columnConfig ?? {};
    this.open = options.openWorkbook ?? openWorkbook;
  }

  get state(): ConsolidationState {
    return this.currentState;
  }

  private get interrupted(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  private get hasColumnConfig(): boolean {
    return Object.keys(this.columnConfig).length > 0;
  }

  /**
   * Consolidate the selected sheets of `inputFile` into `outputFile`
   * @throws ConsolidatorError subclasses for every fatal condition
   */
  async consolidate(inputFile: string, outputFile: string, sheetRange: string): Promise<ConsolidationResult> {
    try {
      const result = await this.run(inputFile, outputFile, sheetRange);
      this.currentState = { stage: 'done', result };
      return result;
    } catch (error) {
      if (error instanceof UserInterruptedError) {
        this.currentState = { stage: 'interrupted' };
      } else {
        this.currentState = {
          stage: 'failed',
          error: error instanceof Error ? error : new Error(describeError(error))
        };
      }
      throw error;
    }
  }

  private async run(inputFile: string, outputFile: string, sheetRange: string): Promise<ConsolidationResult> {
    console.log('\n🚀  Starting Sheet Consolidation');
    console.log(`📁  Input: ${inputFile}`);
    console.log(`💾  Output: ${outputFile}`);
    console.log(`📄  Sheet Range: ${sheetRange}`);
    console.log(
      this.hasColumnConfig ? '⚙️  Column Properties: ENABLED' : '⚙️  Column Properties: DISABLED (using raw data)'
    );
    console.log('═'.repeat(60));

    this.currentState = { stage: 'validating' };
    if (!fs.existsSync(inputFile)) {
      throw new InputNotFoundError(inputFile);
    }
    ensureParentDirectory(outputFile);

    this.currentState = { stage: 'resolving-range' };
    const reader = await this.open(inputFile);
    const sheetNames = reader.listSheetNames();
    console.log(`🗒️  Total sheets found: ${sheetNames.length}`);

    const targetSheets = parseSheetRange(sheetRange, sheetNames.length).map(index => sheetNames[index]);
    console.log(`🎯  Processing ${targetSheets.length} sheets: ${targetSheets.join(', ')}`);
    console.log('─'.repeat(60));

    const tables: Table[] = [];
    const processedSheets: string[] = [];
    const failedSheets: SheetFailure[] = [];

    for (const [position, sheetName] of targetSheets.entries()) {
      // Let a pending SIGINT handler run before deciding to continue
      await setImmediate();
      if (this.interrupted) {
        break;
      }
      this.currentState = { stage: 'processing', position, sheetName };
      const progress = `[${position + 1}/${targetSheets.length}]`;

      try {
        let table = await reader.readSheet(sheetName);

        if (this.hasColumnConfig) {
          const transformed = applyColumnProperties(table, this.columnConfig);
          for (const warning of transformed.warnings) {
            console.log(`⚠️  ${progress} ${sheetName} - Warning: ${warning.message}`);
          }
          table = transformed.table;
        }

        tables.push(tagSourceSheet(table, sheetName));
        processedSheets.push(sheetName);
        console.log(`✅ ${progress} ${sheetName} (${table.rows.length} rows)`);
      } catch (error) {
        failedSheets.push({ sheetName, message: describeError(error) });
        console.log(`⚠️  ${progress} ${sheetName} - Warning: Failed to process sheet '${sheetName}': ${describeError(error)}`);
      }
    }

    await setImmediate();
    if (this.interrupted) {
      throw new UserInterruptedError();
    }

    this.currentState = { stage: 'combining' };
    if (tables.length === 0) {
      throw new NoDataProcessedError(failedSheets);
    }
    console.log('─'.repeat(60));
    console.log(`🗃️  Combining data from ${processedSheets.length} sheets...`);
    const combined = concatTables(tables);

    await setImmediate();
    if (this.interrupted) {
      throw new UserInterruptedError();
    }

    this.currentState = { stage: 'writing' };
    console.log(`📥  Saving to ${outputFile}...`);
    await writeTable(combined, outputFile, OUTPUT_SHEET_NAME);

    const result: ConsolidationResult = {
      outputFile,
      processedSheets,
      failedSheets,
      rowCount: combined.rows.length,
      columns: combined.columns
    };
    reportSummary(result, fs.statSync(outputFile).size);
    return result;
  }
}
