#!/usr/bin/env node

import { program } from 'commander';
import {
  ColumnConfig,
  createConfigTemplate,
  describeColumnConfig,
  loadColumnConfig
} from './config';
import { SheetConsolidator } from './consolidate';
import { UserInterruptedError, describeError } from './errors';
import { openFile } from './utils';

export interface CliOptions {
  config?: string;
  createTemplate?: boolean;
  /** Set to false by --no-open */
  open: boolean;
}

const EPILOG = `
Examples:
  $ consolidate-sheets input.xlsx output.xlsx 1-5
  $ consolidate-sheets data.xlsx consolidated.xlsx 1,3,5,7 --config columns.json
  $ consolidate-sheets input.xlsx output.xlsx 1-3 --create-template
  $ consolidate-sheets "input file.xlsx" "output file.xlsx" 2-8 --no-open

Column Configuration JSON Format:
{
  "ColumnName1": { "word_count": true, "dtype": "string" },
  "ColumnName2": { "word_count": false, "dtype": "int" }
}

Supported Data Types: string, int, float, bool, date, category`;

/**
 * Write a configuration template for the first sheet in the range
 * @returns Process exit code
 */
async function createTemplate(inputFile: string, sheetRange: string): Promise<number> {
  try {
    const { filePath } = await createConfigTemplate(inputFile, sheetRange);
    console.log(`\n✨  Created column configuration template: ${filePath}`);
    console.log('ℹ️  Edit this file and use it with --config option');
    return 0;
  } catch (error) {
    console.error(`❌ Failed to create config template: ${describeError(error)}`);
    return 1;
  }
}

/**
 * Run the consolidator, cancelling cooperatively on Ctrl+C
 * @returns Process exit code
 */
export async function main(
  inputFile: string,
  outputFile: string,
  sheetRange: string,
  options: CliOptions
): Promise<number> {
  if (options.createTemplate) {
    return createTemplate(inputFile, sheetRange);
  }

  let columnConfig: ColumnConfig = {};
  if (options.config) {
    try {
      columnConfig = loadColumnConfig(options.config);
    } catch (error) {
      console.error(`❌ ${describeError(error)}`);
      return 1;
    }
    console.log(`⚙️  Loaded column configuration from: ${options.config}`);
    if (Object.keys(columnConfig).length > 0) {
      console.log('📋  Column Configuration:');
      describeColumnConfig(columnConfig).forEach(line => console.log(`    ${line}`));
    }
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    console.log('\n\n⚠️  Operation interrupted by user!');
    console.log('⏳  Finishing the current sheet before stopping...');
    controller.abort();
  };
  // A second Ctrl+C falls through to Node's default handler
  process.once('SIGINT', onInterrupt);

  try {
    const consolidator = new SheetConsolidator({ columnConfig, signal: controller.signal });
    const result = await consolidator.consolidate(inputFile, outputFile, sheetRange);

    console.log('\n🎉  SUCCESS!');
    console.log(`✅  Consolidated ${result.processedSheets.length} sheets into: ${result.outputFile}`);

    if (options.open) {
      try {
        await openFile(result.outputFile);
        console.log('👀  Opening output file...');
      } catch (error) {
        console.log(`⚠️  Note: Could not open file automatically: ${describeError(error)}`);
        console.log(`📁 File saved at: ${result.outputFile}`);
      }
    } else {
      console.log(`📁  Output saved to: ${result.outputFile}`);
    }

    console.log('\n📊  Task completed successfully!');
    return 0;
  } catch (error) {
    if (error instanceof UserInterruptedError) {
      console.error('\n⚠️  Consolidation cancelled, no output was written.');
    } else {
      console.error(`\n❌ Error: ${describeError(error)}`);
      console.error('\n❌  FAILED!');
    }
    return 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

// Configure CLI
program
  .name('consolidate-sheets')
  .description('📊 Sheet Consolidator - Convert multiple sheets to a single consolidated sheet')
  .version('1.0.0')
  .argument('<input_file>', '📁 Path to input Excel file')
  .argument('<output_file>', '💾 Path to output Excel file')
  .argument('<sheet_range>', '🔢 Sheet range (e.g., 1-5, 1,3,5)')
  .option('--config <path>', '⚙️  Path to column configuration JSON file')
  .option('--create-template', '📝 Create a template column configuration file')
  .option('--no-open', "👀 Don't open the file after completion")
  .addHelpText('after', EPILOG)
  .action(async (inputFile: string, outputFile: string, sheetRange: string, options: CliOptions) => {
    process.exitCode = await main(inputFile, outputFile, sheetRange, options);
  });

// Only run CLI if this is the main module
if (require.main === module) {
  program.parseAsync(process.argv).catch(error => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
