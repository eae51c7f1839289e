import { QueryBlock } from './query.types';
import { TimeWindow } from '../time-window/time-window';

/** Zone suffix appended to both ends of the request interval */
export const DEFAULT_TIME_INTERVAL_OFFSET = '+10:00';

export interface RequestLocation {
  id: string;
  latitude: number;
  longitude: number;
}

/**
 * Body of a meteoblue dataset API query for a single location
 */
export interface ProviderRequest {
  units: {
    temperature: 'CELSIUS';
    velocity: 'KILOMETER_PER_HOUR';
    length: 'metric';
    energy: 'watts';
  };
  geometry: {
    type: 'MultiPoint';
    coordinates: [number, number][];
    locationNames: string[];
    mode: 'preferLandWithMatchingElevation';
  };
  format: 'json';
  timeIntervals: string[];
  timeIntervalsAlignment: 'none';
  queries: QueryBlock[];
}

export function formatTimeInterval(
  window: TimeWindow,
  offset: string = DEFAULT_TIME_INTERVAL_OFFSET,
): string {
  return `${window.startDate}T${offset}/${window.endDate}T${offset}`;
}

/**
 * Wrap query blocks into a full request for one location and time window.
 * Coordinates are GeoJSON ordered: longitude first.
 */
export function buildRequestPayload(
  location: RequestLocation,
  window: TimeWindow,
  queries: QueryBlock[],
  timeIntervalOffset: string = DEFAULT_TIME_INTERVAL_OFFSET,
): ProviderRequest {
  return {
    units: {
      temperature: 'CELSIUS',
      velocity: 'KILOMETER_PER_HOUR',
      length: 'metric',
      energy: 'watts',
    },
    geometry: {
      type: 'MultiPoint',
      coordinates: [[location.longitude, location.latitude]],
      locationNames: [location.id],
      mode: 'preferLandWithMatchingElevation',
    },
    format: 'json',
    timeIntervals: [formatTimeInterval(window, timeIntervalOffset)],
    timeIntervalsAlignment: 'none',
    queries,
  };
}
