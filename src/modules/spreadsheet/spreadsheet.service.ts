/**
 * =============================================================================
 * SPREADSHEET SERVICE - Tabular File Reader / Writer
 * =============================================================================
 *
 * Row-oriented access to .xlsx and .csv files through ExcelJS.
 *
 * - readTable(): first worksheet, row 1 = headers, blank rows ignored;
 *   rowNumber is the row's position in the sheet (header excluded)
 * - writeTable(): headers then each row at its rowNumber, so blank rows
 *   survive; over an existing .xlsx only the first worksheet is replaced
 *
 * =============================================================================
 */

import fs from 'fs';
import path from 'path';
import { CellValue, Workbook, Worksheet } from 'exceljs';
import { logger } from '../../shared/services/logger.service';
import {
  ErrorCode,
  REQUIRED_INPUT_COLUMNS,
  SUPPORTED_SHEET_EXTENSIONS,
} from '../../core/constants';
import {
  ConfigurationError,
  InputFileNotFoundError,
  MalformedInputError,
  describeError,
} from '../../core/errors/AppError';
import { SheetCell, SheetRow, SheetTable } from './spreadsheet.schema';

type SheetFormat = 'xlsx' | 'csv';

export interface WriteTableOptions {
  /** Sheet row (1-based, header excluded) of each record; defaults to consecutive rows */
  rowNumbers?: readonly number[];
  /** Existing workbook whose first worksheet is replaced; its other worksheets are kept */
  baseWorkbookPath?: string;
}

const DEFAULT_SHEET_NAME = 'Distances';

/**
 * Resolve the file format from the extension
 */
export function sheetFormat(filePath: string): SheetFormat {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.xlsx') return 'xlsx';
  if (extension === '.csv') return 'csv';
  throw new ConfigurationError(
    `Unsupported spreadsheet type "${extension || filePath}" (expected ${SUPPORTED_SHEET_EXTENSIONS.join(' or ')})`,
    ErrorCode.CONFIG_UNSUPPORTED_FILE_TYPE,
    { filePath }
  );
}

export class SpreadsheetService {

  // ===========================================================================
  // READ
  // ===========================================================================

  async readTable(filePath: string): Promise<SheetTable> {
    const format = sheetFormat(filePath);
    const resolvedPath = path.resolve(filePath);

    if (!fs.existsSync(resolvedPath)) {
      throw new InputFileNotFoundError(filePath);
    }

    const worksheet = await this.loadWorksheet(resolvedPath, format);
    const headers = this.readHeaders(worksheet);

    const missing = REQUIRED_INPUT_COLUMNS.filter(column => !headers.includes(column));
    if (missing.length > 0) {
      throw new MalformedInputError(
        `Input file is missing required column(s): ${missing.join(', ')}`,
        { filePath, missing, headers }
      );
    }

    const rows: SheetRow[] = [];
    for (let rowIndex = 2; rowIndex <= worksheet.rowCount; rowIndex++) {
      const row = worksheet.getRow(rowIndex);
      if (!row.hasValues) {
        continue;
      }

      const cells: Record<string, SheetCell> = {};
      headers.forEach((header, index) => {
        const cell = row.getCell(index + 1);
        cells[header] = toSheetCell(cell.value, cell.text);
      });
      rows.push({ rowNumber: rowIndex - 1, cells });
    }

    logger.info(`📄 Loaded ${rows.length} row(s) from ${filePath}`);
    return { headers, rows };
  }

  // ===========================================================================
  // WRITE
  // ===========================================================================

  async writeTable(
    filePath: string,
    headers: readonly string[],
    rows: ReadonlyArray<Record<string, SheetCell>>,
    options: WriteTableOptions = {}
  ): Promise<void> {
    const format = sheetFormat(filePath);
    const resolvedPath = path.resolve(filePath);

    const { workbook, worksheet } = await this.prepareWorkbook(format, options.baseWorkbookPath);
    worksheet.columns = headers.map(header => ({
      header,
      key: header,
      width: Math.max(12, header.length + 2),
    }));

    rows.forEach((row, index) => {
      const rowNumber = options.rowNumbers?.[index] ?? index + 1;
      worksheet.getRow(rowNumber + 1).values = headers.map(header => row[header] ?? null);
    });

    fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });

    if (format === 'csv') {
      await workbook.csv.writeFile(resolvedPath);
    } else {
      await workbook.xlsx.writeFile(resolvedPath);
    }

    logger.info(`💾 Results saved to ${filePath} (${rows.length} row(s))`);
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  /**
   * Fresh single-sheet workbook, or the base .xlsx with its first worksheet emptied
   */
  private async prepareWorkbook(
    format: SheetFormat,
    baseWorkbookPath: string | undefined
  ): Promise<{ workbook: Workbook; worksheet: Worksheet }> {
    const workbook = new Workbook();

    if (format === 'xlsx' && baseWorkbookPath !== undefined && fs.existsSync(path.resolve(baseWorkbookPath))) {
      const worksheet = await this.loadWorksheet(path.resolve(baseWorkbookPath), format, workbook);
      worksheet.spliceRows(1, worksheet.rowCount);
      return { workbook, worksheet };
    }

    return { workbook, worksheet: workbook.addWorksheet(DEFAULT_SHEET_NAME) };
  }

  private async loadWorksheet(
    resolvedPath: string,
    format: SheetFormat,
    workbook: Workbook = new Workbook()
  ): Promise<Worksheet> {
    try {
      if (format === 'csv') {
        return await workbook.csv.readFile(resolvedPath);
      }
      await workbook.xlsx.readFile(resolvedPath);
    } catch (error: unknown) {
      throw new MalformedInputError(`Could not read ${resolvedPath}: ${describeError(error)}`, {
        filePath: resolvedPath,
      });
    }

    const worksheet = workbook.worksheets[0];
    if (!worksheet) {
      throw new MalformedInputError(`Workbook ${resolvedPath} has no worksheets`, { filePath: resolvedPath });
    }
    return worksheet;
  }

  /**
   * Header texts; blank header cells get a positional name so data is not lost
   */
  private readHeaders(worksheet: Worksheet): string[] {
    const headerRow = worksheet.getRow(1);
    const headers: string[] = [];
    for (let column = 1; column <= worksheet.columnCount; column++) {
      const text = headerRow.getCell(column).text.trim();
      headers.push(text || `Column_${column}`);
    }
    return headers;
  }
}

/**
 * Keep plain values as-is; render formulas, rich text and hyperlinks as text
 */
function toSheetCell(value: CellValue, text: string): SheetCell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) return value;
  return text;
}

// =============================================================================
// SINGLETON EXPORT
// =============================================================================

export const spreadsheetService = new SpreadsheetService();
