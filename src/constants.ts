/**
 * Fixed names and defaults used across the consolidator
 */

export const OUTPUT_SHEET_NAME = 'Consolidated_Data';
export const SOURCE_COLUMN = '_Source_Sheet';

/** Rows sampled from the first target sheet when building a config template */
export const TEMPLATE_SAMPLE_ROWS = 5;

export const COLUMN_WIDTH = 20;
