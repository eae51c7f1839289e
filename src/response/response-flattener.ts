import { ExtractionError } from '../common/errors';
import {
  DATES_COLUMN,
  soilColumnName,
  weatherColumnName,
} from './column-name';
import { CodeSeries, LocationResponse } from './response.types';

/**
 * How many points a series may carry.
 *
 * - `first`: take the first point; later points are ignored
 * - `strict`: more than one point is an extraction error
 *
 * Rows hold one value per column, so a genuine time series cannot be
 * represented either way.
 */
export type DataPointPolicy = 'first' | 'strict';

export const DEFAULT_DATA_POINT_POLICY: DataPointPolicy = 'first';

export type ResultValue = string | number | null;

export type ResultRow = Record<string, ResultValue>;

export interface FlattenContext {
  /** Identifier used when the response does not echo a location name */
  recordId: string;
  columns: {
    id: string;
    latitude: string;
    longitude: string;
  };
  dataPointPolicy?: DataPointPolicy;
}

function pickDataPoint(
  series: CodeSeries,
  column: string,
  policy: DataPointPolicy,
): number | null {
  if (series.values.length === 0) {
    throw new ExtractionError(`No data returned for ${column}`);
  }
  if (policy === 'strict' && series.values.length > 1) {
    throw new ExtractionError(
      `${column} returned ${series.values.length} data points, expected 1`,
    );
  }
  return series.values[0];
}

function flatten(
  response: LocationResponse,
  context: FlattenContext,
  nameColumn: (series: CodeSeries) => string,
  withDates: boolean,
): ResultRow {
  if (response.blocks.length === 0) {
    throw new ExtractionError('Provider response contains no data blocks');
  }

  const policy = context.dataPointPolicy ?? DEFAULT_DATA_POINT_POLICY;
  const { columns } = context;
  const row: ResultRow = {};

  for (const block of response.blocks) {
    row[columns.id] = block.geometry.locationName ?? context.recordId;
    row[columns.latitude] = block.geometry.latitude;
    row[columns.longitude] = block.geometry.longitude;

    if (withDates) {
      if (block.timeLabels.length === 0) {
        throw new ExtractionError('Provider response has no time intervals');
      }
      row[DATES_COLUMN] = block.timeLabels[0];
    }

    for (const series of block.series) {
      const column = nameColumn(series);
      row[column] = pickDataPoint(series, column, policy);
    }
  }

  return row;
}

/**
 * Flatten a weather response into one row: id, coordinates, `Dates` and one
 * column per variable/aggregation/unit
 */
export function flattenWeatherResponse(
  response: LocationResponse,
  context: FlattenContext,
): ResultRow {
  return flatten(response, context, weatherColumnName, true);
}

/**
 * Flatten a soil response into one row: id, coordinates and one column per
 * variable/depth band (or level)/unit
 */
export function flattenSoilResponse(
  response: LocationResponse,
  context: FlattenContext,
): ResultRow {
  return flatten(response, context, soilColumnName, false);
}
