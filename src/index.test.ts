import * as fs from 'fs';
import * as path from 'path';
import ExcelJS from 'exceljs';
import { main } from './index';
import { readSheet } from './workbook';

const testDir = path.join(__dirname, '../test_temp/cli');

let inputFile: string;
let logSpy: jest.SpyInstance;
let errorSpy: jest.SpyInstance;

beforeAll(async () => {
  fs.mkdirSync(testDir, { recursive: true });

  const workbook = new ExcelJS.Workbook();
  const q1 = workbook.addWorksheet('Q1');
  q1.addRow(['Region', 'Sales']);
  q1.addRow(['North', '10']);
  const q2 = workbook.addWorksheet('Q2');
  q2.addRow(['Region', 'Sales']);
  q2.addRow(['South', '12']);
  inputFile = path.join(testDir, 'sales.xlsx');
  await workbook.xlsx.writeFile(inputFile);
});

afterAll(() => {
  fs.rmSync(testDir, { recursive: true, force: true });
});

beforeEach(() => {
  logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  logSpy.mockRestore();
  errorSpy.mockRestore();
});

describe('main', () => {
  test('returns 0 and writes the consolidated workbook', async () => {
    const outputFile = path.join(testDir, 'all.xlsx');

    const code = await main(inputFile, outputFile, '1-2', { open: false });

    expect(code).toBe(0);
    const written = await readSheet(outputFile, 'Consolidated_Data');
    expect(written.rows).toEqual([
      { Region: 'North', Sales: '10', _Source_Sheet: 'Q1' },
      { Region: 'South', Sales: '12', _Source_Sheet: 'Q2' }
    ]);
    expect(logSpy).toHaveBeenCalledWith(`📁  Output saved to: ${outputFile}`);
  });

  test('applies a configuration file', async () => {
    const configPath = path.join(testDir, 'columns.json');
    fs.writeFileSync(configPath, JSON.stringify({ Sales: { word_count: false, dtype: 'float' } }), 'utf-8');
    const outputFile = path.join(testDir, 'typed.xlsx');

    const code = await main(inputFile, outputFile, '2', { config: configPath, open: false });

    expect(code).toBe(0);
    const written = await readSheet(outputFile, 'Consolidated_Data');
    expect(written.rows).toEqual([{ Region: 'South', Sales: 12, _Source_Sheet: 'Q2' }]);
    expect(logSpy).toHaveBeenCalledWith('    📊 Sales: dtype=float');
  });

  test('returns 1 when the configuration cannot be loaded', async () => {
    const outputFile = path.join(testDir, 'never.xlsx');

    const code = await main(inputFile, outputFile, '1', { config: path.join(testDir, 'missing.json'), open: false });

    expect(code).toBe(1);
    expect(fs.existsSync(outputFile)).toBe(false);
  });

  test('returns 1 for an invalid range', async () => {
    const code = await main(inputFile, path.join(testDir, 'range.xlsx'), '2-1', { open: false });

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(
      "\n❌ Error: Invalid sheet range format: 2-1. Use format like '1-5' or '1,3,5' with sheet numbers between 1 and 2"
    );
  });

  test('removes its interrupt handler when done', async () => {
    const before = process.listenerCount('SIGINT');

    await main(inputFile, path.join(testDir, 'listeners.xlsx'), '1', { open: false });

    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
