// Re-export public API
export { AppModule } from './app.module';
export { ExtractionModule } from './extraction/extraction.module';
export { ExtractionService } from './extraction/extraction.service';
export type {
  ExtractionReport,
  ExtractionTask,
} from './extraction/extraction.types';
export {
  ConfigurationError,
  ExtractionError,
  InputValidationError,
  TransportError,
} from './common/errors';
export { DomainMap, resolveDomain } from './domains/domain-map';
export { buildWeatherQuery } from './query/weather-query.builder';
export { buildSoilQuery, buildSoilQueries } from './query/soil-query.builder';
export { buildRequestPayload } from './query/request-payload';
export {
  clampOffsets,
  deriveRecordWindow,
  deriveTimeWindow,
} from './time-window/time-window';
export type { DayOffsets, TimeWindow } from './time-window/time-window';
export { mapProviderResponse } from './response/provider-response.mapper';
export {
  flattenSoilResponse,
  flattenWeatherResponse,
} from './response/response-flattener';
export type { ResultRow } from './response/response-flattener';
export { soilColumnName, weatherColumnName } from './response/column-name';
export { VariableCatalog } from './catalog/variable-catalog';
export { buildExtractorSettings } from './config/extractor-settings';
export type { ExtractorSettings } from './config/extractor-settings';
