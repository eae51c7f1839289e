import { ConfigurationError } from '../common/errors';
import { DomainMap, resolveDomain } from './domain-map';

describe('DomainMap', () => {
  describe('fromEntries', () => {
    const map = DomainMap.fromEntries('precipitation', {
      DEFAULT: 'ERA5T',
      BR: 'CHIRPS2',
    });

    it('should resolve a listed country', () => {
      expect(resolveDomain('BR', map)).toBe('CHIRPS2');
    });

    it('should fall back to DEFAULT for unlisted countries', () => {
      expect(resolveDomain('FR', map)).toBe('ERA5T');
      expect(resolveDomain('', map)).toBe('ERA5T');
    });

    it('should be case-sensitive', () => {
      expect(map.resolve('br')).toBe('ERA5T');
    });

    it('should expose the DEFAULT domain', () => {
      expect(map.defaultDomain).toBe('ERA5T');
    });

    it('should refuse a map without DEFAULT', () => {
      expect(() =>
        DomainMap.fromEntries('wind', { BR: 'NEMSGLOBAL' }),
      ).toThrow('[wind] No DEFAULT domain configured');
    });

    it('should refuse empty domains', () => {
      expect(() =>
        DomainMap.fromEntries('wind', { DEFAULT: 'ERA5T', BR: ' ' }),
      ).toThrow(ConfigurationError);
    });
  });

  describe('fromGroups', () => {
    it('should invert array and comma-separated groups', () => {
      const map = DomainMap.fromGroups('temperature', {
        ERA5T: ['DEFAULT'],
        CHIRPS2: 'BR, AR ,KE',
      });

      expect(map.resolve('BR')).toBe('CHIRPS2');
      expect(map.resolve('AR')).toBe('CHIRPS2');
      expect(map.resolve('KE')).toBe('CHIRPS2');
      expect(map.resolve('US')).toBe('ERA5T');
    });

    it('should ignore empty entries in comma lists', () => {
      const map = DomainMap.fromGroups('temperature', {
        ERA5T: 'DEFAULT,,',
      });
      expect(map.resolve('')).toBe('ERA5T');
      expect(map.defaultDomain).toBe('ERA5T');
    });

    it('should reject a country listed under two domains', () => {
      expect(() =>
        DomainMap.fromGroups('precipitation', {
          ERA5T: ['DEFAULT', 'BR'],
          CHIRPS2: ['BR'],
        }),
      ).toThrow(
        "[precipitation] Country 'BR' is assigned to both 'ERA5T' and 'CHIRPS2'",
      );
    });

    it('should refuse a blank domain name', () => {
      expect(() =>
        DomainMap.fromGroups('wind', { DEFAULT: 'ERA5T', ' ': ['BR'] }),
      ).toThrow('[wind] Empty country code or domain in wind domains');
    });

    it('should require a DEFAULT group member', () => {
      expect(() =>
        DomainMap.fromGroups('precipitation', { CHIRPS2: ['BR'] }),
      ).toThrow(ConfigurationError);
    });
  });
});
