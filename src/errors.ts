/**
 * Error taxonomy shared by the consolidator, its loaders and the CLI
 */

import { SheetFailure } from './types';

export class ConsolidatorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InputNotFoundError extends ConsolidatorError {
  constructor(readonly filePath: string) {
    super(`Input file not found: ${filePath}`);
  }
}

export class WorkbookReadError extends ConsolidatorError {
  constructor(
    readonly filePath: string,
    reason: string,
    readonly sheetName?: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to read ${sheetName ? `sheet '${sheetName}' of ${filePath}` : filePath}: ${reason}`, options);
  }
}

export class InvalidRangeError extends ConsolidatorError {
  constructor(readonly rangeText: string, readonly sheetCount: number) {
    super(
      `Invalid sheet range format: ${rangeText}. Use format like '1-5' or '1,3,5' ` +
        `with sheet numbers between 1 and ${sheetCount}`
    );
  }
}

export class ConfigLoadError extends ConsolidatorError {
  constructor(readonly configPath: string, reason: string, options?: { cause?: unknown }) {
    super(`Could not load column configuration ${configPath}: ${reason}`, options);
  }
}

export class ColumnTransformError extends ConsolidatorError {
  constructor(readonly column: string, reason: string) {
    super(`Could not apply properties to column '${column}': ${reason}`);
  }
}

export class NoDataProcessedError extends ConsolidatorError {
  constructor(readonly failures: SheetFailure[]) {
    super(
      failures.length > 0
        ? `No data was processed successfully (${failures.length} sheet(s) failed)`
        : 'No data was processed successfully'
    );
  }
}

export class OutputWriteError extends ConsolidatorError {
  constructor(readonly filePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to write ${filePath}: ${reason}`, options);
  }
}

export class UserInterruptedError extends ConsolidatorError {
  constructor() {
    super('Operation interrupted by user');
  }
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
