import { Inject, Injectable, Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { InputValidationError, formatErrorMessage } from '../common/errors';
import {
  EXTRACTOR_SETTINGS,
  ExtractorSettings,
} from '../config/extractor-settings';
import {
  ITrialReader,
  TrialReaderError,
  TrialTable,
} from './interfaces/trial-reader.interface';
import { CsvTrialReader } from './readers/csv-trial.reader';
import { ExcelTrialReader } from './readers/excel-trial.reader';
import { CellValue, RawTrialRow, TrialRecord } from './trial.types';

/**
 * A row that could not become a {@link TrialRecord}
 */
export interface InvalidTrialRow {
  rowNumber: number;
  id: string | null;
  error: string;
}

export interface TrialLoadResult {
  records: TrialRecord[];
  invalid: InvalidTrialRow[];
}

/** A single decimal comma, as written in semicolon-separated files */
const DECIMAL_COMMA = /^([+-]?\d+),(\d+)$/;

function cellText(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

/**
 * TrialLoaderService - reads the input table and binds its columns
 *
 * Missing columns fail the whole batch; a bad cell only rejects its row.
 */
@Injectable()
export class TrialLoaderService {
  private readonly logger = new Logger(TrialLoaderService.name);
  private readonly readers: ITrialReader[];

  constructor(
    @Inject(EXTRACTOR_SETTINGS) private readonly settings: ExtractorSettings,
    private readonly excelReader: ExcelTrialReader,
    private readonly csvReader: CsvTrialReader,
  ) {
    this.readers = [this.excelReader, this.csvReader];
  }

  /**
   * Load the configured input file
   */
  async load(): Promise<TrialLoadResult> {
    const { directory, filename } = this.settings.input;
    const filePath = join(directory, filename);

    let fileBuffer: Buffer;
    try {
      fileBuffer = await readFile(filePath);
    } catch (error) {
      throw new InputValidationError(
        `Cannot read input file ${filePath}: ${formatErrorMessage(error)}`,
      );
    }

    return this.loadBuffer(filename, fileBuffer);
  }

  /**
   * Read and bind an input table already in memory
   *
   * @throws InputValidationError if no reader handles the file or a
   * configured column is missing
   */
  async loadBuffer(
    filename: string,
    fileBuffer: Buffer,
  ): Promise<TrialLoadResult> {
    const reader = this.readers.find((r) => r.canHandle(filename));
    if (!reader) {
      throw new InputValidationError(
        `No reader for input file ${filename}. Supported formats: ${this.readers.map((r) => r.description).join(', ')}`,
      );
    }

    let table: TrialTable;
    try {
      table = await reader.read(fileBuffer, {
        sheetName: this.settings.input.sheetName,
      });
    } catch (error) {
      if (error instanceof TrialReaderError) {
        throw new InputValidationError(error.message);
      }
      throw error;
    }

    this.validateColumns(table.headers);

    const result: TrialLoadResult = { records: [], invalid: [] };
    for (const { rowNumber, cells } of table.rows) {
      try {
        result.records.push(this.toRecord(cells, rowNumber));
      } catch (error) {
        if (!(error instanceof InputValidationError)) throw error;
        const id = cellText(cells[this.settings.columns.id]);
        result.invalid.push({
          rowNumber,
          id: id || null,
          error: error.message,
        });
        this.logger.warn(`Skipping input row: ${error.message}`);
      }
    }

    this.logger.log(
      `Loaded ${result.records.length} record(s) from ${filename} using '${reader.name}' reader (${result.invalid.length} invalid)`,
    );
    return result;
  }

  private validateColumns(headers: readonly string[]): void {
    const { columns } = this.settings;
    const required = [
      columns.id,
      columns.latitude,
      columns.longitude,
      ...(columns.countryCode ? [columns.countryCode] : []),
      ...columns.dates,
    ];

    const present = new Set(headers);
    const missing = required.filter((c) => !present.has(c));
    if (missing.length > 0) {
      throw new InputValidationError(
        `Input file is missing column(s): ${missing.join(', ')}`,
      );
    }
  }

  private toRecord(row: RawTrialRow, rowNumber: number): TrialRecord {
    const { columns, fallbackCountryCode } = this.settings;

    const id = cellText(row[columns.id]);
    if (!id) {
      throw new InputValidationError(
        `Empty value in column '${columns.id}'`,
        rowNumber,
      );
    }

    const countryCell = columns.countryCode
      ? cellText(row[columns.countryCode])
      : '';

    const dates: Record<string, CellValue> = {};
    for (const column of columns.dates) {
      dates[column] = row[column] ?? null;
    }

    return {
      rowNumber,
      id,
      latitude: this.parseCoordinate(row, columns.latitude, 90, rowNumber),
      longitude: this.parseCoordinate(row, columns.longitude, 180, rowNumber),
      countryCode: countryCell || fallbackCountryCode || '',
      dates,
    };
  }

  private parseCoordinate(
    row: RawTrialRow,
    column: string,
    limit: number,
    rowNumber: number,
  ): number {
    const value = row[column];
    const parsed =
      typeof value === 'number'
        ? value
        : typeof value === 'string' && value.trim() !== ''
          ? Number(value.trim().replace(DECIMAL_COMMA, '$1.$2'))
          : Number.NaN;

    if (!Number.isFinite(parsed)) {
      throw new InputValidationError(
        `Non-numeric value in column '${column}': '${cellText(value)}'`,
        rowNumber,
      );
    }
    if (Math.abs(parsed) > limit) {
      throw new InputValidationError(
        `Value out of range in column '${column}': ${parsed}`,
        rowNumber,
      );
    }
    return parsed;
  }
}
