import { Inject, Injectable, Logger } from '@nestjs/common';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  DataCategory,
  EXTRACTOR_SETTINGS,
  ExtractorSettings,
} from '../config/extractor-settings';
import { ResultRow } from '../response/response-flattener';
import { InvalidTrialRow } from '../trials/trial-loader.service';
import {
  UTF8_BOM,
  collectColumns,
  dedupeRows,
  formatCsv,
} from './csv-format';

const CATEGORY_SUFFIXES: Record<DataCategory, string> = {
  weather: '_weather_data_only_best_domains',
  soil: '_soil_data_only',
};

export const FAILED_SUFFIX = '_failed';
export const INVALID_INPUT_SUFFIX = '_invalid_input';
export const ROW_COLUMN = 'Row';
export const ERROR_COLUMN = 'Error';

/**
 * Name of the results file (or failed file) of a category
 */
export function categoryFileName(
  baseName: string,
  category: DataCategory,
  failed = false,
): string {
  return `${baseName}${CATEGORY_SUFFIXES[category]}${failed ? FAILED_SUFFIX : ''}.csv`;
}

/**
 * Writes result tables under the output directory
 *
 * Empty tables are not written. Identical rows are written once.
 */
@Injectable()
export class ResultWriterService {
  private readonly logger = new Logger(ResultWriterService.name);

  constructor(
    @Inject(EXTRACTOR_SETTINGS) private readonly settings: ExtractorSettings,
  ) {}

  /**
   * Write the result and failed tables of one category
   *
   * @returns Paths of the files written
   */
  async writeCategory(
    baseName: string,
    category: DataCategory,
    results: readonly ResultRow[],
    failed: readonly ResultRow[],
  ): Promise<string[]> {
    const written: string[] = [];
    const resultsPath = await this.writeTable(
      categoryFileName(baseName, category),
      results,
    );
    if (resultsPath) written.push(resultsPath);

    const failedPath = await this.writeTable(
      categoryFileName(baseName, category, true),
      failed,
    );
    if (failedPath) written.push(failedPath);

    return written;
  }

  /**
   * Write the rows that were skipped before any request
   */
  async writeInvalidInput(
    baseName: string,
    invalid: readonly InvalidTrialRow[],
  ): Promise<string | null> {
    const idColumn = this.settings.columns.id;
    const rows = invalid.map(
      (entry): ResultRow => ({
        [ROW_COLUMN]: entry.rowNumber,
        [idColumn]: entry.id,
        [ERROR_COLUMN]: entry.error,
      }),
    );
    return this.writeTable(`${baseName}${INVALID_INPUT_SUFFIX}.csv`, rows);
  }

  private async writeTable(
    fileName: string,
    rows: readonly ResultRow[],
  ): Promise<string | null> {
    if (rows.length === 0) return null;

    const columns = collectColumns(rows);
    const unique = dedupeRows(rows, columns);
    const filePath = join(this.settings.outputDirectory, fileName);

    await mkdir(this.settings.outputDirectory, { recursive: true });
    await writeFile(filePath, UTF8_BOM + formatCsv(unique, columns), 'utf-8');

    this.logger.log(`Wrote ${unique.length} row(s) to ${filePath}`);
    return filePath;
  }
}
