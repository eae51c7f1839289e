/**
 * meteoblue dataset API identifiers used by the extractor.
 */

export const Domain = {
  NEMSGLOBAL: 'NEMSGLOBAL',
  ERA5: 'ERA5',
  SOILGRIDS2: 'SOILGRIDS2',
} as const;

export const WeatherCode = {
  TEMPERATURE: 11,
  PRECIPITATION: 61,
  HUMIDITY: 52,
  WIND_SPEED: 32,
  WIND_DIRECTION: 735,
  CLOUDS_TOTAL: 71,
  CLOUDS_HIGH: 75,
  CLOUDS_MEDIUM: 74,
  CLOUDS_LOW: 73,
  SUNSHINE_DURATION: 191,
  SHORTWAVE_RADIATION_TOTAL: 204,
  SHORTWAVE_RADIATION_DIRECT: 258,
  SHORTWAVE_RADIATION_DIFFUSE: 256,
  EVAPOTRANSPIRATION: 261,
  SOIL_TEMPERATURE: 85,
  SOIL_MOISTURE: 144,
  VAPOR_PRESSURE_DEFICIT: 56,
  UV_MEAN: 721,
} as const;

export const SoilCode = {
  BULK_DENSITY: 808,
  CATION_EXCHANGE_CAPACITY: 809,
  CLAY_CONTENT: 803,
  COARSE_FRAGMENTS: 807,
  ORGANIC_CARBON_CONTENT: 811,
  ORGANIC_CARBON_DENSITY: 838,
  ORGANIC_CARBON_STOCKS: 837,
  SAND_CONTENT: 805,
  SILT_CONTENT: 804,
  TOTAL_NITROGEN: 817,
  PH_IN_H2O: 812,
} as const;

export const Level = {
  TWO_M_ELEVATION_CORRECTED: '2 m elevation corrected',
  TWO_M_ABOVE_GROUND: '2 m above gnd',
  SURFACE: 'sfc',
  HIGH_CLOUD_LAYER: 'high cld lay',
  MID_CLOUD_LAYER: 'mid cld lay',
  LOW_CLOUD_LAYER: 'low cld lay',
  TOP_SOIL_10CM: '0-10 cm down',
  TEN_M_ABOVE_GROUND: '10 m above gnd',
  AGGREGATED: 'aggregated',
} as const;

/** Aggregation reported for codes requested without one */
export const NO_AGGREGATION = 'none';

/**
 * Organic carbon stocks are only published for the 0-30 cm band, so the soil
 * query requests this level regardless of the depth band being built.
 */
export const ORGANIC_CARBON_STOCKS_LEVEL = '0-30 cm';
