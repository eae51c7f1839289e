export type Aggregation = 'max' | 'min' | 'mean' | 'sum';

export type TimeResolution = 'daily' | 'hourly';

/**
 * One requested measurement: a variable code at a level, optionally
 * aggregated (weather) or banded by depth (soil)
 */
export interface CodeRequest {
  code: number;
  level: string;
  aggregation?: Aggregation;
  startDepth?: number;
  endDepth?: number;
}

export interface QueryTransformation {
  type: 'aggregateDaily';
  aggregation: Aggregation;
}

/**
 * One entry of the provider's `queries` array: a set of codes read from a
 * single domain
 */
export interface QueryBlock {
  domain: string;
  gapFillDomain?: string | null;
  timeResolution?: TimeResolution;
  codes: CodeRequest[];
  transformations?: QueryTransformation[];
}
