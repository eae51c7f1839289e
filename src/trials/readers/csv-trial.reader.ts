import { Injectable, Logger } from '@nestjs/common';
import { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import {
  ITrialReader,
  TrialReaderError,
  TrialTable,
  TrialTableRow,
} from '../interfaces/trial-reader.interface';
import { RawTrialRow } from '../trial.types';

const BOM = '\uFEFF';

/**
 * Trial table in CSV
 *
 * - Separator: `;` when the header line has more semicolons than commas,
 *   `,` otherwise
 * - Cells are kept as strings; empty cells become null
 */
@Injectable()
export class CsvTrialReader implements ITrialReader {
  private readonly logger = new Logger(CsvTrialReader.name);

  readonly name = 'csv';
  readonly description = 'Comma or semicolon separated trial table';

  canHandle(filename: string): boolean {
    return /\.(csv|txt)$/i.test(filename);
  }

  async read(fileBuffer: Buffer): Promise<TrialTable> {
    const separator = this.detectSeparator(
      fileBuffer.toString('utf-8', 0, 2048),
    );
    let headers: string[] = [];
    const rows: TrialTableRow[] = [];

    const stream = Readable.from(fileBuffer).pipe(
      csvParser({
        separator,
        mapHeaders: ({ header }) => {
          const name = header.replace(BOM, '').trim();
          return name ? name : null;
        },
      }),
    );
    stream.on('headers', (names: (string | null)[]) => {
      headers = names.filter((n): n is string => n !== null);
    });

    try {
      for await (const row of stream) {
        rows.push({
          rowNumber: rows.length + 1,
          cells: this.toTrialRow(row as Record<string, string>),
        });
      }
    } catch (error) {
      throw new TrialReaderError(
        this.name,
        `Cannot parse CSV: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }

    if (headers.length === 0) {
      throw new TrialReaderError(this.name, 'No header row found in CSV file');
    }

    this.logger.log(`Read ${rows.length} row(s) with ${headers.length} column(s)`);
    return { headers, rows };
  }

  private detectSeparator(snippet: string): string {
    const headerLine = snippet.split(/\r?\n/, 1)[0];
    const semicolons = headerLine.split(';').length - 1;
    const commas = headerLine.split(',').length - 1;
    return semicolons > commas ? ';' : ',';
  }

  private toTrialRow(row: Record<string, string>): RawTrialRow {
    const result: RawTrialRow = {};
    for (const [key, value] of Object.entries(row)) {
      const trimmed = value.trim();
      result[key] = trimmed === '' ? null : trimmed;
    }
    return result;
  }
}
