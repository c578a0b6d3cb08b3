/**
 * Column configuration: loading, display and template generation
 */

import * as fs from 'fs';
import * as path from 'path';
import { format } from 'date-fns';
import { z } from 'zod';
import { TEMPLATE_SAMPLE_ROWS } from './constants';
import { ConfigLoadError, InputNotFoundError, WorkbookReadError, describeError } from './errors';
import { parseSheetRange } from './range';
import { WorkbookOpener } from './types';
import { ensureDirectory } from './utils';
import { openWorkbook } from './workbook';

const columnPropertiesSchema = z.object({
  word_count: z.boolean().optional().default(false),
  dtype: z.string().optional(),
  description: z.string().optional()
});

const columnConfigSchema = z.record(columnPropertiesSchema);

export type ColumnConfig = z.infer<typeof columnConfigSchema>;

export interface TemplateEntry {
  word_count: false;
  dtype: 'auto';
  description: string;
}

export interface CreateTemplateOptions {
  /** Directory the template is written to (defaults to the working directory) */
  outputDir?: string;
  now?: Date;
  openWorkbook?: WorkbookOpener;
}

export interface CreatedTemplate {
  filePath: string;
  template: Record<string, TemplateEntry>;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate a parsed configuration object
 * @param configPath - Used in error messages only
 */
export function parseColumnConfig(raw: unknown, configPath: string): ColumnConfig {
  const parsed = columnConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigLoadError(configPath, `invalid column configuration (${formatIssues(parsed.error)})`);
  }
  return parsed.data;
}

/**
 * Load column configuration from a JSON file
 * @throws ConfigLoadError if the file is missing, not JSON or structurally invalid
 */
export function loadColumnConfig(configPath: string): ColumnConfig {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    const reason = fs.existsSync(configPath) ? describeError(error) : 'file not found';
    throw new ConfigLoadError(configPath, reason, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigLoadError(configPath, `invalid JSON (${describeError(error)})`, { cause: error });
  }

  return parseColumnConfig(raw, configPath);
}

/**
 * One display line per configured column
 */
export function describeColumnConfig(config: ColumnConfig): string[] {
  return Object.entries(config).map(([column, properties]) => {
    const props: string[] = [];
    if (properties.word_count) {
      props.push('word_count');
    }
    if (properties.dtype) {
      props.push(`dtype=${properties.dtype}`);
    }
    return `📊 ${column}: ${props.length > 0 ? props.join(', ') : 'no transformations'}`;
  });
}

export function buildConfigTemplate(columns: string[]): Record<string, TemplateEntry> {
  const template: Record<string, TemplateEntry> = {};
  for (const column of columns) {
    template[column] = {
      word_count: false,
      dtype: 'auto',
      description: `Column: ${column}`
    };
  }
  return template;
}

export function templateFileName(now: Date): string {
  return `column_config_template_${format(now, 'yyyyMMdd_HHmmss')}.json`;
}

/**
 * Create a configuration template from the columns of the first sheet in the range
 * @returns Path of the written template and its content
 */
export async function createConfigTemplate(
  inputFile: string,
  sheetRange: string,
  options: CreateTemplateOptions = {}
): Promise<CreatedTemplate> {
  if (!fs.existsSync(inputFile)) {
    throw new InputNotFoundError(inputFile);
  }

  const open = options.openWorkbook ?? openWorkbook;
  const reader = await open(inputFile);
  const sheetNames = reader.listSheetNames();
  if (sheetNames.length === 0) {
    throw new WorkbookReadError(inputFile, 'workbook contains no sheets');
  }

  const [firstIndex] = parseSheetRange(sheetRange, sheetNames.length);
  const sample = await reader.readSheet(sheetNames[firstIndex], { maxRows: TEMPLATE_SAMPLE_ROWS });
  const template = buildConfigTemplate(sample.columns);

  const outputDir = ensureDirectory(options.outputDir ?? process.cwd());
  const filePath = path.join(outputDir, templateFileName(options.now ?? new Date()));
  fs.writeFileSync(filePath, JSON.stringify(template, null, 2), 'utf-8');

  return { filePath, template };
}
