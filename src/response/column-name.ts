import { ExtractionError } from '../common/errors';
import { Level } from '../catalog/variable-codes';

/** Column holding the representative timestamp of a weather row */
export const DATES_COLUMN = 'Dates';

export interface WeatherColumnSource {
  variable: string;
  aggregation: string | null;
  level: string;
  unit: string;
}

export interface SoilColumnSource {
  variable: string;
  level: string;
  startDepth: number | null;
  endDepth: number | null;
  unit: string;
}

function columnName(variable: string, middle: string, unit: string): string {
  return `${variable.replace(/ /g, '_')}_(${middle})_(${unit})`;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * `Temperature_(Mean)_(°C)`; variables without aggregation use their level,
 * e.g. `Wind_Direction_Dominant_(10 m above gnd)_(°)`
 */
export function weatherColumnName(source: WeatherColumnSource): string {
  const middle = source.aggregation
    ? capitalize(source.aggregation)
    : source.level;
  return columnName(source.variable, middle, source.unit);
}

/**
 * `Clay_content_(0-30)_(g/kg)` for depth-aggregated codes, otherwise the
 * level: `Organic_carbon_stocks_(0-30 cm)_(t/ha)`
 */
export function soilColumnName(source: SoilColumnSource): string {
  if (source.level !== Level.AGGREGATED) {
    return columnName(source.variable, source.level, source.unit);
  }

  if (source.startDepth === null || source.endDepth === null) {
    throw new ExtractionError(
      `Aggregated soil variable '${source.variable}' has no depth range`,
    );
  }
  return columnName(
    source.variable,
    `${source.startDepth}-${source.endDepth}`,
    source.unit,
  );
}
