import { ConfigurationError } from '../common/errors';
import { DomainMap } from '../domains/domain-map';
import { DayOffsets, clampOffsets } from '../time-window/time-window';
import {
  DEFAULT_SOIL_DEPTH_BANDS,
  SoilDepthBand,
} from '../query/soil-query.builder';
import { DataPointPolicy } from '../response/response-flattener';
import { TrialColumns } from '../trials/trial.types';
import { extractorConfigSchema } from './extractor-config.schema';

/** Injection token for the validated {@link ExtractorSettings} */
export const EXTRACTOR_SETTINGS = Symbol('EXTRACTOR_SETTINGS');

export type DataCategory = 'weather' | 'soil';

export interface WeatherDomains {
  precipitation: DomainMap;
  temperature: DomainMap;
  wind: DomainMap;
}

/**
 * Everything the extractor needs, resolved once at startup and never mutated
 */
export interface ExtractorSettings {
  readonly apiKey: string;
  readonly apiUrl: string;
  readonly input: {
    readonly directory: string;
    readonly filename: string;
    readonly sheetName?: string;
  };
  readonly outputDirectory: string;
  readonly columns: TrialColumns;
  readonly fallbackCountryCode: string | null;
  readonly offsets: DayOffsets;
  readonly dateFormats: readonly string[];
  readonly domains: WeatherDomains;
  readonly soilDepthBands: readonly SoilDepthBand[];
  readonly categories: readonly DataCategory[];
  readonly queryFiles: {
    readonly weather?: string;
    readonly soil?: string;
  };
  readonly concurrency: number;
  readonly retryDelayMs: number;
  readonly timeIntervalOffset: string;
  readonly dataPointPolicy: DataPointPolicy;
}

function splitColumnList(value: string | string[]): string[] {
  const list = typeof value === 'string' ? value.split(',') : value;
  return list.map((c) => c.trim()).filter((c) => c.length > 0);
}

/**
 * Validate raw configuration into immutable settings.
 *
 * Offsets outside their allowed sign are clamped to 0 and reported through
 * `warn`.
 *
 * @throws ConfigurationError on any invalid or missing value
 */
export function buildExtractorSettings(
  raw: unknown,
  warn: (message: string) => void,
): ExtractorSettings {
  const parsed = extractorConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || 'config'}: ${i.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  const config = parsed.data;

  const dates = splitColumnList(config.columns.dates);
  if (dates.length === 0) {
    throw new ConfigurationError(
      'At least one date column is required',
      'columns.dates',
    );
  }

  const countryCodeColumn = config.columns.countryCode || undefined;
  const fallbackCountryCode = config.fallbackCountryCode ?? null;
  if (!countryCodeColumn && !fallbackCountryCode) {
    throw new ConfigurationError(
      'Configure either a country code column or fallbackCountryCode',
      'columns.countryCode',
    );
  }

  const domains: WeatherDomains = {
    precipitation: DomainMap.fromGroups(
      'precipitation',
      config.domains.precipitation,
    ),
    temperature: DomainMap.fromGroups(
      'temperature',
      config.domains.temperature,
    ),
    wind: DomainMap.fromGroups('wind', config.domains.wind),
  };

  const settings: ExtractorSettings = {
    apiKey: config.apiKey,
    apiUrl: config.apiUrl,
    input: {
      directory: config.input.directory,
      filename: config.input.filename,
      sheetName: config.input.sheetName || undefined,
    },
    outputDirectory: config.output.directory,
    columns: {
      id: config.columns.id,
      latitude: config.columns.latitude,
      longitude: config.columns.longitude,
      countryCode: countryCodeColumn,
      dates,
    },
    fallbackCountryCode,
    offsets: clampOffsets(config.offsets, warn),
    dateFormats: config.dateFormats,
    domains,
    soilDepthBands: config.soilDepthBands ?? DEFAULT_SOIL_DEPTH_BANDS,
    categories: [...new Set(config.categories)],
    queryFiles: config.queryFiles,
    concurrency: config.concurrency,
    retryDelayMs: config.retryDelayMs,
    timeIntervalOffset: config.timeIntervalOffset,
    dataPointPolicy: config.dataPointPolicy,
  };

  return Object.freeze(settings);
}
