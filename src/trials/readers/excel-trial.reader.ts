import { Injectable, Logger } from '@nestjs/common';
import { Readable } from 'node:stream';
import * as ExcelJS from 'exceljs';
import {
  ITrialReader,
  TrialReadOptions,
  TrialReaderError,
  TrialTable,
  TrialTableRow,
} from '../interfaces/trial-reader.interface';
import { CellValue, RawTrialRow } from '../trial.types';

/**
 * Reduce an exceljs cell to a plain value: formulas to their cached result,
 * rich text and hyperlinks to their text, error cells to null
 */
export function normalizeCell(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  if ('error' in value) return null;
  if ('richText' in value) return value.richText.map((r) => r.text).join('');
  if ('hyperlink' in value) return value.text;
  return normalizeCell(value.result ?? null);
}

/**
 * Trial table in an .xlsx workbook
 *
 * The first row of the sheet is the header. Rows without any value are
 * skipped.
 */
@Injectable()
export class ExcelTrialReader implements ITrialReader {
  private readonly logger = new Logger(ExcelTrialReader.name);

  readonly name = 'excel';
  readonly description = 'Excel workbook (.xlsx) trial sheet';

  canHandle(filename: string): boolean {
    return /\.xlsx$/i.test(filename);
  }

  async read(
    fileBuffer: Buffer,
    options: TrialReadOptions = {},
  ): Promise<TrialTable> {
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.read(Readable.from([fileBuffer]));
    } catch (error) {
      throw new TrialReaderError(
        this.name,
        `Cannot open workbook: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }

    const sheet = options.sheetName
      ? workbook.getWorksheet(options.sheetName)
      : workbook.worksheets[0];
    if (!sheet) {
      throw new TrialReaderError(
        this.name,
        options.sheetName
          ? `Worksheet '${options.sheetName}' not found`
          : 'Workbook has no worksheets',
      );
    }

    const columns = new Map<number, string>();
    sheet.getRow(1).eachCell((cell, colNumber) => {
      const header = normalizeCell(cell.value);
      const name = header === null ? '' : String(header).trim();
      if (name) columns.set(colNumber, name);
    });

    if (columns.size === 0) {
      throw new TrialReaderError(
        this.name,
        `No header row found in worksheet '${sheet.name}'`,
      );
    }

    const rows: TrialTableRow[] = [];
    sheet.eachRow((row, rowNumber) => {
      if (rowNumber === 1) return;

      const record: RawTrialRow = {};
      let hasValue = false;
      for (const [colNumber, name] of columns) {
        const value = normalizeCell(row.getCell(colNumber).value);
        const cell = typeof value === 'string' && value.trim() === '' ? null : value;
        if (cell !== null) hasValue = true;
        record[name] = cell;
      }
      // Row 1 is the header, so sheet row N is data row N - 1
      if (hasValue) rows.push({ rowNumber: rowNumber - 1, cells: record });
    });

    this.logger.log(
      `Read ${rows.length} row(s) from worksheet '${sheet.name}'`,
    );
    return { headers: [...columns.values()], rows };
  }
}
