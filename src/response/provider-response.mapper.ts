import { z } from 'zod';
import { ExtractionError } from '../common/errors';
import { VariableCatalog } from '../catalog/variable-catalog';
import { NO_AGGREGATION } from '../catalog/variable-codes';
import {
  CodeSeries,
  GeometryInfo,
  LocationResponse,
  ResponseBlock,
} from './response.types';

const dataValueSchema = z.number().nullable();

const codeSchema = z.object({
  code: z.number().int(),
  variable: z.string().optional(),
  level: z.string(),
  aggregation: z.string().nullable().optional(),
  unit: z.string().optional(),
  startDepth: z.number().optional(),
  endDepth: z.number().optional(),
  dataPerTimeInterval: z
    .array(
      z.object({
        // Either one series per location or a single flat series
        data: z.union([
          z.array(z.array(dataValueSchema)),
          z.array(dataValueSchema),
        ]),
      }),
    )
    .min(1),
});

const geometrySchema = z.object({
  type: z.string().optional(),
  coordinates: z.array(z.array(z.number()).min(2)).min(1),
  locationNames: z.array(z.string()).optional(),
});

const blockSchema = z.object({
  geometry: geometrySchema,
  timeIntervals: z
    .array(z.union([z.string(), z.array(z.string())]))
    .optional(),
  codes: z.array(codeSchema).min(1),
});

/**
 * Raw JSON shape of a dataset API response: one block per query
 */
export const providerResponseSchema = z.array(blockSchema).min(1);

type RawBlock = z.infer<typeof blockSchema>;
type RawCode = z.infer<typeof codeSchema>;
type RawData = RawCode['dataPerTimeInterval'][number]['data'];

/**
 * Series of the first location, whether the provider nested it or not
 */
function firstLocationSeries(data: RawData): (number | null)[] {
  const first = data[0];
  if (Array.isArray(first)) {
    return first;
  }
  const flat: (number | null)[] = [];
  for (const value of data) {
    if (!Array.isArray(value)) flat.push(value);
  }
  return flat;
}

function mapGeometry(geometry: RawBlock['geometry']): GeometryInfo {
  const [longitude, latitude] = geometry.coordinates[0];
  const name = geometry.locationNames?.[0];
  return {
    locationName: name ? name : null,
    latitude,
    longitude,
  };
}

function mapTimeLabels(timeIntervals: RawBlock['timeIntervals']): string[] {
  const first = timeIntervals?.[0];
  if (first === undefined) return [];
  return typeof first === 'string' ? [first] : first;
}

function mapCode(raw: RawCode, catalog: VariableCatalog): CodeSeries {
  const variable = raw.variable || catalog.lookupVariable(raw.code);
  if (!variable) {
    throw new ExtractionError(`Unknown variable code ${raw.code}`);
  }

  const unit = raw.unit ?? catalog.lookupUnit(raw.code);
  if (unit === undefined) {
    throw new ExtractionError(`No unit for variable code ${raw.code}`);
  }

  return {
    code: raw.code,
    variable,
    level: raw.level,
    aggregation:
      raw.aggregation && raw.aggregation !== NO_AGGREGATION
        ? raw.aggregation
        : null,
    unit,
    startDepth: raw.startDepth ?? null,
    endDepth: raw.endDepth ?? null,
    values: firstLocationSeries(raw.dataPerTimeInterval[0].data),
  };
}

function mapBlock(raw: RawBlock, catalog: VariableCatalog): ResponseBlock {
  return {
    geometry: mapGeometry(raw.geometry),
    timeLabels: mapTimeLabels(raw.timeIntervals),
    series: raw.codes.map((c) => mapCode(c, catalog)),
  };
}

/**
 * Validate a raw provider response and map it to typed blocks.
 *
 * @throws ExtractionError when the payload does not have the expected shape
 */
export function mapProviderResponse(
  raw: unknown,
  catalog: VariableCatalog,
): LocationResponse {
  const parsed = providerResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'response';
    throw new ExtractionError(
      `Unexpected provider response at ${where}: ${issue.message}`,
    );
  }

  return { blocks: parsed.data.map((b) => mapBlock(b, catalog)) };
}
