import { Inject, Injectable, Logger } from '@nestjs/common';
import { parse as parsePath } from 'node:path';
import { InputValidationError, formatErrorMessage } from '../common/errors';
import { VariableCatalog } from '../catalog/variable-catalog';
import {
  DataCategory,
  EXTRACTOR_SETTINGS,
  ExtractorSettings,
} from '../config/extractor-settings';
import {
  ERROR_COLUMN,
  ResultWriterService,
} from '../output/result-writer.service';
import { loadQueryFile } from '../query/query-file';
import { QueryBlock } from '../query/query.types';
import { buildSoilQueries } from '../query/soil-query.builder';
import { buildWeatherQuery } from '../query/weather-query.builder';
import { mapProviderResponse } from '../response/provider-response.mapper';
import {
  FlattenContext,
  ResultRow,
  flattenSoilResponse,
  flattenWeatherResponse,
} from '../response/response-flattener';
import { TimeWindow, deriveRecordWindow } from '../time-window/time-window';
import { MeteoblueClient } from '../transport/meteoblue.client';
import { TrialLoaderService } from '../trials/trial-loader.service';
import { TrialRecord } from '../trials/trial.types';
import {
  CategoryResult,
  ExtractionReport,
  ExtractionTask,
  PreparedTasks,
} from './extraction.types';
import { runWithConcurrency } from './task-pool';

export const START_DATE_COLUMN = 'Start_Date';
export const END_DATE_COLUMN = 'End_Date';
export const DEFAULT_COUNTRY_COLUMN = 'Country_Code';

type QueryOverrides = Partial<Record<DataCategory, QueryBlock[]>>;

type TaskOutcome = { row: ResultRow } | { failed: ResultRow };

/**
 * ExtractionService - runs one extraction over the configured input file
 *
 * Responsibilities:
 * 1. Task preparation: one request window per record, identical tasks merged
 * 2. Per-category loop: build queries, call the provider, flatten the answer
 * 3. Failure isolation: a failed task becomes a failed row, the batch goes on
 * 4. Output: result, failed and invalid-input tables
 */
@Injectable()
export class ExtractionService {
  private readonly logger = new Logger(ExtractionService.name);

  constructor(
    @Inject(EXTRACTOR_SETTINGS) private readonly settings: ExtractorSettings,
    private readonly catalog: VariableCatalog,
    private readonly trialLoader: TrialLoaderService,
    private readonly client: MeteoblueClient,
    private readonly writer: ResultWriterService,
  ) {}

  /**
   * Load the input file, extract every enabled category and write the tables
   */
  async run(): Promise<ExtractionReport> {
    const startTime = Date.now();
    const inputFile = this.settings.input.filename;
    const baseName = parsePath(inputFile).name;

    const loaded = await this.trialLoader.load();
    const queryOverrides = await this.loadQueryOverrides();
    const prepared = this.prepareTasks(loaded.records);
    const invalid = [...loaded.invalid, ...prepared.invalid].sort(
      (a, b) => a.rowNumber - b.rowNumber,
    );

    this.logger.log(
      `Prepared ${prepared.tasks.length} task(s) from ${loaded.records.length + loaded.invalid.length} row(s): ${invalid.length} invalid, ${prepared.duplicates} duplicate(s)`,
    );

    const report: ExtractionReport = {
      inputFile,
      totalRecords: loaded.records.length + loaded.invalid.length,
      tasks: prepared.tasks.length,
      duplicates: prepared.duplicates,
      invalid,
      categories: [],
      files: [],
      durationMs: 0,
    };

    for (const category of this.settings.categories) {
      const result = await this.extractCategory(
        category,
        prepared.tasks,
        queryOverrides[category],
      );
      report.categories.push({
        category,
        succeeded: result.rows.length,
        failed: result.failed.length,
      });
      report.files.push(
        ...(await this.writer.writeCategory(
          baseName,
          category,
          result.rows,
          result.failed,
        )),
      );
    }

    const invalidPath = await this.writer.writeInvalidInput(baseName, invalid);
    if (invalidPath) report.files.push(invalidPath);

    report.durationMs = Date.now() - startTime;
    return report;
  }

  /**
   * Derive each record's window and merge identical tasks.
   * Records whose dates cannot be read are set aside as invalid.
   */
  prepareTasks(records: readonly TrialRecord[]): PreparedTasks {
    const prepared: PreparedTasks = { tasks: [], invalid: [], duplicates: 0 };
    const seen = new Set<string>();

    for (const record of records) {
      let timeWindow: TimeWindow;
      try {
        timeWindow = deriveRecordWindow(
          record,
          this.settings.columns.dates,
          this.settings.offsets,
          this.settings.dateFormats,
        );
      } catch (error) {
        if (!(error instanceof InputValidationError)) throw error;
        prepared.invalid.push({
          rowNumber: record.rowNumber,
          id: record.id,
          error: error.message,
        });
        this.logger.warn(`Skipping record ${record.id}: ${error.message}`);
        continue;
      }

      const task: ExtractionTask = {
        id: record.id,
        latitude: record.latitude,
        longitude: record.longitude,
        countryCode: record.countryCode,
        startDate: timeWindow.startDate,
        endDate: timeWindow.endDate,
      };

      const key = JSON.stringify([
        task.id,
        task.latitude,
        task.longitude,
        task.countryCode,
        task.startDate,
        task.endDate,
      ]);
      if (seen.has(key)) {
        prepared.duplicates++;
        continue;
      }
      seen.add(key);
      prepared.tasks.push(task);
    }

    return prepared;
  }

  /**
   * Extract one category for every task.
   *
   * @param queries - Query blocks sent for every task instead of the built ones
   */
  async extractCategory(
    category: DataCategory,
    tasks: readonly ExtractionTask[],
    queries?: QueryBlock[],
  ): Promise<CategoryResult> {
    this.logger.log(
      `Extracting ${category} data for ${tasks.length} task(s)`,
    );

    const soilQueries =
      category === 'soil'
        ? (queries ?? buildSoilQueries(this.settings.soilDepthBands))
        : undefined;

    const outcomes = await runWithConcurrency(
      tasks,
      this.settings.concurrency,
      async (task, index): Promise<TaskOutcome> => {
        const progress = `[${index + 1}/${tasks.length}]`;
        try {
          const blocks =
            soilQueries ?? queries ?? this.buildWeatherBlocks(task.countryCode);
          const row = await this.extractTask(category, task, blocks);
          this.logger.log(`${progress} ${category} ${task.id}: ok`);
          return { row };
        } catch (error) {
          const message = formatErrorMessage(error);
          this.logger.warn(`${progress} ${category} ${task.id}: ${message}`);
          return { failed: this.toFailedRow(task, message) };
        }
      },
    );

    const result: CategoryResult = { category, rows: [], failed: [] };
    for (const outcome of outcomes) {
      if ('row' in outcome) result.rows.push(outcome.row);
      else result.failed.push(outcome.failed);
    }

    this.logger.log(
      `${category}: ${result.rows.length} succeeded, ${result.failed.length} failed`,
    );
    return result;
  }

  private buildWeatherBlocks(countryCode: string): QueryBlock[] {
    const { domains } = this.settings;
    return buildWeatherQuery(
      countryCode,
      domains.precipitation,
      domains.temperature,
      domains.wind,
    );
  }

  private async extractTask(
    category: DataCategory,
    task: ExtractionTask,
    queries: QueryBlock[],
  ): Promise<ResultRow> {
    const raw = await this.client.fetchLocation(
      { id: task.id, latitude: task.latitude, longitude: task.longitude },
      { startDate: task.startDate, endDate: task.endDate },
      queries,
    );
    const response = mapProviderResponse(raw, this.catalog);

    const context: FlattenContext = {
      recordId: task.id,
      columns: this.settings.columns,
      dataPointPolicy: this.settings.dataPointPolicy,
    };
    return category === 'weather'
      ? flattenWeatherResponse(response, context)
      : flattenSoilResponse(response, context);
  }

  private toFailedRow(task: ExtractionTask, error: string): ResultRow {
    const { columns } = this.settings;
    return {
      [columns.id]: task.id,
      [columns.latitude]: task.latitude,
      [columns.longitude]: task.longitude,
      [columns.countryCode ?? DEFAULT_COUNTRY_COLUMN]: task.countryCode,
      [START_DATE_COLUMN]: task.startDate,
      [END_DATE_COLUMN]: task.endDate,
      [ERROR_COLUMN]: error,
    };
  }

  private async loadQueryOverrides(): Promise<QueryOverrides> {
    const overrides: QueryOverrides = {};
    const { queryFiles } = this.settings;

    if (queryFiles.weather) {
      overrides.weather = await loadQueryFile(queryFiles.weather);
      this.logger.log(`Using weather queries from ${queryFiles.weather}`);
    }
    if (queryFiles.soil) {
      overrides.soil = await loadQueryFile(queryFiles.soil);
      this.logger.log(`Using soil queries from ${queryFiles.soil}`);
    }
    return overrides;
  }
}
