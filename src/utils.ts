/**
 * Utility functions for file operations and console reporting
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { ConsolidationResult } from './types';

/**
 * Create a directory (and its parents) if it doesn't exist
 * @returns The directory path
 */
export function ensureDirectory(dirPath: string): string {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
  return dirPath;
}

/**
 * Create the directory that will hold `filePath`
 */
export function ensureParentDirectory(filePath: string): string {
  return ensureDirectory(path.dirname(filePath));
}

/**
 * Format file size in bytes to KB string
 * @param bytes - Size in bytes
 * @returns Formatted string (e.g., "1.23 KB")
 */
export function formatSize(bytes: number): string {
  return (bytes / 1024).toFixed(2) + ' KB';
}

/**
 * Report consolidation summary to console
 * @param result - Outcome of the run
 * @param outputSize - Size of the written workbook in bytes
 */
export function reportSummary(result: ConsolidationResult, outputSize: number): void {
  console.log('─'.repeat(60));
  console.log(`\n📈 Summary:`);
  console.log(`   ✅ Processed: ${result.processedSheets.length} sheet(s)`);
  console.log(`   ❌ Failed: ${result.failedSheets.length} sheet(s)`);
  for (const failure of result.failedSheets) {
    console.log(`      • ${failure.sheetName}: ${failure.message}`);
  }
  console.log(`   📊 Rows: ${result.rowCount}, Columns: ${result.columns.length}`);
  console.log(`   📁 Output: ${result.outputFile} (${formatSize(outputSize)})\n`);
}

/**
 * Command and arguments that open a file with the OS default application
 */
export function openCommand(filePath: string, platform: NodeJS.Platform = process.platform): [string, string[]] {
  if (platform === 'darwin') {
    return ['open', [filePath]];
  }
  if (platform === 'win32') {
    return ['cmd', ['/c', 'start', '', filePath]];
  }
  return ['xdg-open', [filePath]];
}

/**
 * Open a file with the system default application
 * Resolves once the opener has started; rejects if it cannot be launched.
 */
export function openFile(filePath: string): Promise<void> {
  const [command, args] = openCommand(filePath);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}
