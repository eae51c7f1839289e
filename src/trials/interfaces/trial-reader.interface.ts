import { RawTrialRow } from '../trial.types';

/**
 * Header and rows of an input table, in file order
 */
export interface TrialTable {
  headers: string[];
  rows: TrialTableRow[];
}

export interface TrialTableRow {
  /** 1-based data row number in the file (header excluded) */
  rowNumber: number;
  cells: RawTrialRow;
}

export interface TrialReadOptions {
  /** Worksheet to read; the first one when absent. Ignored by CSV. */
  sheetName?: string;
}

/**
 * ITrialReader Interface - Strategy Pattern for Trial Input Files
 *
 * Each supported file format implements this interface to turn the file
 * into a plain header + rows table. Column binding and record validation
 * happen afterwards, independently of the format.
 */
export interface ITrialReader {
  /**
   * Unique identifier for this reader, used in logs and errors.
   * Examples: 'csv', 'excel'
   */
  readonly name: string;

  /** Human-readable description of the format */
  readonly description: string;

  /**
   * Determine if this reader can handle the given file, from its name only
   */
  canHandle(filename: string): boolean;

  /**
   * Read the whole table.
   *
   * Cells are reduced to {@link CellValue}s; header names are trimmed and
   * blank headers dropped.
   *
   * @throws TrialReaderError if the file cannot be read as this format
   */
  read(fileBuffer: Buffer, options?: TrialReadOptions): Promise<TrialTable>;
}

/**
 * Custom error for reader-specific failures.
 */
export class TrialReaderError extends Error {
  constructor(
    public readonly readerName: string,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`[${readerName}] ${message}`);
    this.name = 'TrialReaderError';
  }
}
