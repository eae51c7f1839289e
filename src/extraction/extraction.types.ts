import { DataCategory } from '../config/extractor-settings';
import { ResultRow } from '../response/response-flattener';
import { InvalidTrialRow } from '../trials/trial-loader.service';

/**
 * One unit of remote work: a location over a time window.
 * Identical tasks are sent once.
 */
export interface ExtractionTask {
  id: string;
  latitude: number;
  longitude: number;
  countryCode: string;
  startDate: string;
  endDate: string;
}

export interface PreparedTasks {
  tasks: ExtractionTask[];
  invalid: InvalidTrialRow[];
  duplicates: number;
}

export interface CategoryResult {
  category: DataCategory;
  rows: ResultRow[];
  failed: ResultRow[];
}

/**
 * Summary of one extraction run
 */
export interface ExtractionReport {
  inputFile: string;
  totalRecords: number;
  tasks: number;
  duplicates: number;
  invalid: InvalidTrialRow[];
  categories: {
    category: DataCategory;
    succeeded: number;
    failed: number;
  }[];
  files: string[];
  durationMs: number;
}
