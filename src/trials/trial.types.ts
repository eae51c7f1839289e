/**
 * Plain value of one input table cell, after reader normalization
 */
export type CellValue = string | number | boolean | Date | null;

/**
 * One input table row keyed by header name
 */
export type RawTrialRow = Record<string, CellValue>;

/**
 * Column bindings for the input table
 */
export interface TrialColumns {
  id: string;
  latitude: string;
  longitude: string;
  /** Absent when every record uses the configured fallback country */
  countryCode?: string;
  /** Dates of interest; the request window spans all of them */
  dates: readonly string[];
}

/**
 * One trial location read from the input table
 */
export interface TrialRecord {
  /** 1-based data row number in the input file (header excluded) */
  rowNumber: number;
  id: string;
  latitude: number;
  longitude: number;
  countryCode: string;
  dates: Record<string, CellValue>;
}
