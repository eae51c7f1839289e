/**
 * Typed view of a provider response for one location.
 *
 * The raw JSON is validated and mapped into these types at the boundary
 * (provider-response.mapper.ts) so flattening never touches untyped data.
 */

export interface GeometryInfo {
  /** Location name echoed back from the request, when the provider sends one */
  locationName: string | null;
  latitude: number;
  longitude: number;
}

/**
 * Values returned for one requested code, for the first time interval and
 * the first (only) location
 */
export interface CodeSeries {
  code: number;
  variable: string;
  level: string;
  /** null for variables requested without aggregation (`none`) */
  aggregation: string | null;
  unit: string;
  startDepth: number | null;
  endDepth: number | null;
  values: (number | null)[];
}

/**
 * One entry of the response array: the result of one query block
 */
export interface ResponseBlock {
  geometry: GeometryInfo;
  /** Timestamps of the first returned time interval */
  timeLabels: string[];
  series: CodeSeries[];
}

export interface LocationResponse {
  blocks: ResponseBlock[];
}
