import { ConfigurationError } from '../common/errors';
import {
  Domain,
  Level,
  ORGANIC_CARBON_STOCKS_LEVEL,
  SoilCode,
} from '../catalog/variable-codes';
import { CodeRequest, QueryBlock } from './query.types';

export interface SoilDepthBand {
  startDepth: number;
  endDepth: number;
}

export const DEFAULT_SOIL_DEPTH_BANDS: readonly SoilDepthBand[] = [
  { startDepth: 0, endDepth: 30 },
  { startDepth: 0, endDepth: 60 },
];

/**
 * Soil property codes in request order. Codes with `depthScaled: false` are
 * requested at a fixed level instead of the caller's depth band.
 */
export const SOIL_CODES: readonly {
  code: number;
  depthScaled: boolean;
}[] = [
  { code: SoilCode.BULK_DENSITY, depthScaled: true },
  { code: SoilCode.CATION_EXCHANGE_CAPACITY, depthScaled: true },
  { code: SoilCode.CLAY_CONTENT, depthScaled: true },
  { code: SoilCode.COARSE_FRAGMENTS, depthScaled: true },
  { code: SoilCode.ORGANIC_CARBON_CONTENT, depthScaled: true },
  { code: SoilCode.ORGANIC_CARBON_DENSITY, depthScaled: true },
  { code: SoilCode.ORGANIC_CARBON_STOCKS, depthScaled: false },
  { code: SoilCode.SAND_CONTENT, depthScaled: true },
  { code: SoilCode.SILT_CONTENT, depthScaled: true },
  { code: SoilCode.TOTAL_NITROGEN, depthScaled: true },
  { code: SoilCode.PH_IN_H2O, depthScaled: true },
];

function validateBand(startDepth: number, endDepth: number): void {
  if (
    !Number.isInteger(startDepth) ||
    !Number.isInteger(endDepth) ||
    startDepth < 0 ||
    endDepth <= startDepth
  ) {
    throw new ConfigurationError(
      `Invalid soil depth band ${startDepth}-${endDepth}: expected integers with 0 <= start < end`,
      'soilDepthBands',
    );
  }
}

/**
 * Build one SoilGrids query block for the `[startDepth, endDepth)` band.
 * Organic carbon stocks always come from the fixed 0-30 cm level.
 */
export function buildSoilQuery(startDepth: number, endDepth: number): QueryBlock {
  validateBand(startDepth, endDepth);

  const codes: CodeRequest[] = SOIL_CODES.map(({ code, depthScaled }) =>
    depthScaled
      ? { code, level: Level.AGGREGATED, startDepth, endDepth }
      : { code, level: ORGANIC_CARBON_STOCKS_LEVEL },
  );

  return { domain: Domain.SOILGRIDS2, codes };
}

/**
 * One block per depth band, concatenated into a single request
 */
export function buildSoilQueries(
  bands: readonly SoilDepthBand[] = DEFAULT_SOIL_DEPTH_BANDS,
): QueryBlock[] {
  return bands.map((band) => buildSoilQuery(band.startDepth, band.endDepth));
}
