import { DomainMap } from '../domains/domain-map';
import { Domain, Level, WeatherCode } from '../catalog/variable-codes';
import { CodeRequest, QueryBlock } from './query.types';

/**
 * General atmosphere variables, always read from the global NEMS model
 * whatever the country
 */
export const GENERAL_ATMOSPHERE_CODES: readonly CodeRequest[] = [
  { code: WeatherCode.HUMIDITY, level: Level.TWO_M_ABOVE_GROUND, aggregation: 'max' },
  { code: WeatherCode.HUMIDITY, level: Level.TWO_M_ABOVE_GROUND, aggregation: 'min' },
  { code: WeatherCode.HUMIDITY, level: Level.TWO_M_ABOVE_GROUND, aggregation: 'mean' },
  { code: WeatherCode.CLOUDS_TOTAL, level: Level.SURFACE, aggregation: 'mean' },
  { code: WeatherCode.CLOUDS_HIGH, level: Level.HIGH_CLOUD_LAYER, aggregation: 'mean' },
  { code: WeatherCode.CLOUDS_MEDIUM, level: Level.MID_CLOUD_LAYER, aggregation: 'mean' },
  { code: WeatherCode.CLOUDS_LOW, level: Level.LOW_CLOUD_LAYER, aggregation: 'mean' },
  { code: WeatherCode.SUNSHINE_DURATION, level: Level.SURFACE, aggregation: 'sum' },
  { code: WeatherCode.SHORTWAVE_RADIATION_TOTAL, level: Level.SURFACE, aggregation: 'mean' },
  { code: WeatherCode.SHORTWAVE_RADIATION_DIRECT, level: Level.SURFACE, aggregation: 'mean' },
  { code: WeatherCode.SHORTWAVE_RADIATION_DIFFUSE, level: Level.SURFACE, aggregation: 'mean' },
  { code: WeatherCode.EVAPOTRANSPIRATION, level: Level.SURFACE, aggregation: 'sum' },
  { code: WeatherCode.SOIL_TEMPERATURE, level: Level.TOP_SOIL_10CM, aggregation: 'max' },
  { code: WeatherCode.SOIL_TEMPERATURE, level: Level.TOP_SOIL_10CM, aggregation: 'min' },
  { code: WeatherCode.SOIL_TEMPERATURE, level: Level.TOP_SOIL_10CM, aggregation: 'mean' },
  { code: WeatherCode.SOIL_MOISTURE, level: Level.TOP_SOIL_10CM, aggregation: 'max' },
  { code: WeatherCode.SOIL_MOISTURE, level: Level.TOP_SOIL_10CM, aggregation: 'min' },
  { code: WeatherCode.SOIL_MOISTURE, level: Level.TOP_SOIL_10CM, aggregation: 'mean' },
  { code: WeatherCode.VAPOR_PRESSURE_DEFICIT, level: Level.TWO_M_ABOVE_GROUND, aggregation: 'max' },
  { code: WeatherCode.VAPOR_PRESSURE_DEFICIT, level: Level.TWO_M_ABOVE_GROUND, aggregation: 'min' },
  { code: WeatherCode.VAPOR_PRESSURE_DEFICIT, level: Level.TWO_M_ABOVE_GROUND, aggregation: 'mean' },
];

export const TEMPERATURE_CODES: readonly CodeRequest[] = [
  { code: WeatherCode.TEMPERATURE, level: Level.TWO_M_ELEVATION_CORRECTED, aggregation: 'max' },
  { code: WeatherCode.TEMPERATURE, level: Level.TWO_M_ELEVATION_CORRECTED, aggregation: 'min' },
  { code: WeatherCode.TEMPERATURE, level: Level.TWO_M_ELEVATION_CORRECTED, aggregation: 'mean' },
];

export const PRECIPITATION_CODES: readonly CodeRequest[] = [
  { code: WeatherCode.PRECIPITATION, level: Level.SURFACE, aggregation: 'sum' },
];

export const WIND_CODES: readonly CodeRequest[] = [
  { code: WeatherCode.WIND_SPEED, level: Level.TEN_M_ABOVE_GROUND, aggregation: 'max' },
  { code: WeatherCode.WIND_SPEED, level: Level.TEN_M_ABOVE_GROUND, aggregation: 'min' },
  { code: WeatherCode.WIND_SPEED, level: Level.TEN_M_ABOVE_GROUND, aggregation: 'mean' },
  // Direction has no aggregation; its column is named after the level
  { code: WeatherCode.WIND_DIRECTION, level: Level.TEN_M_ABOVE_GROUND },
];

/** ERA5 has no daily UV product, so hourly values are averaged per day */
export const UV_CODES: readonly CodeRequest[] = [
  { code: WeatherCode.UV_MEAN, level: Level.SURFACE },
];

function copyCodes(codes: readonly CodeRequest[]): CodeRequest[] {
  return codes.map((c) => ({ ...c }));
}

/**
 * Build the five-block weather query for a country.
 *
 * Blocks 1 and 5 are fixed; blocks 2-4 read temperature, precipitation and
 * wind from the data source each family recommends for the country.
 */
export function buildWeatherQuery(
  countryCode: string,
  precipitationDomains: DomainMap,
  temperatureDomains: DomainMap,
  windDomains: DomainMap,
): QueryBlock[] {
  return [
    {
      domain: Domain.NEMSGLOBAL,
      timeResolution: 'daily',
      codes: copyCodes(GENERAL_ATMOSPHERE_CODES),
    },
    {
      domain: temperatureDomains.resolve(countryCode),
      timeResolution: 'daily',
      codes: copyCodes(TEMPERATURE_CODES),
    },
    {
      domain: precipitationDomains.resolve(countryCode),
      timeResolution: 'daily',
      codes: copyCodes(PRECIPITATION_CODES),
    },
    {
      domain: windDomains.resolve(countryCode),
      timeResolution: 'daily',
      codes: copyCodes(WIND_CODES),
    },
    {
      domain: Domain.ERA5,
      gapFillDomain: null,
      timeResolution: 'hourly',
      codes: copyCodes(UV_CODES),
      transformations: [{ type: 'aggregateDaily', aggregation: 'mean' }],
    },
  ];
}
