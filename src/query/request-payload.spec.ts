import { buildRequestPayload, formatTimeInterval } from './request-payload';
import { QueryBlock } from './query.types';

describe('request payload', () => {
  const window = { startDate: '2023-02-24', endDate: '2023-03-30' };

  describe('formatTimeInterval', () => {
    it('should use the +10:00 offset by default', () => {
      expect(formatTimeInterval(window)).toBe(
        '2023-02-24T+10:00/2023-03-30T+10:00',
      );
    });

    it('should use a configured offset', () => {
      expect(formatTimeInterval(window, '-03:00')).toBe(
        '2023-02-24T-03:00/2023-03-30T-03:00',
      );
    });
  });

  describe('buildRequestPayload', () => {
    const queries: QueryBlock[] = [
      { domain: 'SOILGRIDS2', codes: [{ code: 837, level: '0-30 cm' }] },
    ];

    it('should wrap queries for a single location', () => {
      const payload = buildRequestPayload(
        { id: 'T-01', latitude: -15.5, longitude: -47.9 },
        window,
        queries,
      );

      expect(payload).toEqual({
        units: {
          temperature: 'CELSIUS',
          velocity: 'KILOMETER_PER_HOUR',
          length: 'metric',
          energy: 'watts',
        },
        geometry: {
          type: 'MultiPoint',
          coordinates: [[-47.9, -15.5]],
          locationNames: ['T-01'],
          mode: 'preferLandWithMatchingElevation',
        },
        format: 'json',
        timeIntervals: ['2023-02-24T+10:00/2023-03-30T+10:00'],
        timeIntervalsAlignment: 'none',
        queries,
      });
    });

    it('should put longitude before latitude', () => {
      const payload = buildRequestPayload(
        { id: 'T-02', latitude: 10, longitude: 20 },
        window,
        queries,
      );
      expect(payload.geometry.coordinates).toEqual([[20, 10]]);
    });
  });
});
