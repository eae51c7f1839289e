import { ConfigurationError } from '../common/errors';

/** Key of the entry used for every country without its own entry */
export const DEFAULT_DOMAIN_KEY = 'DEFAULT';

export type VariableFamily = 'precipitation' | 'temperature' | 'wind';

/**
 * Domain groups as written in configuration: each data source lists the
 * countries it is recommended for, either as an array or a comma-separated
 * string (`{ "CHIRPS2": "BR,AR", "ERA5T": ["DEFAULT"] }`).
 */
export type DomainGroups = Readonly<Record<string, string | readonly string[]>>;

/**
 * Immutable country code -> data source mapping for one variable family.
 *
 * Lookups are case-sensitive. A map cannot be built without a DEFAULT entry,
 * so resolution never fails once configuration has loaded.
 */
export class DomainMap {
  private constructor(
    readonly family: VariableFamily,
    private readonly entries: ReadonlyMap<string, string>,
    readonly defaultDomain: string,
  ) {}

  /**
   * Build from a country -> domain record
   */
  static fromEntries(
    family: VariableFamily,
    entries: Readonly<Record<string, string>>,
  ): DomainMap {
    const map = new Map<string, string>();
    for (const [country, domain] of Object.entries(entries)) {
      const key = country.trim();
      const value = domain.trim();
      if (!key || !value) {
        throw new ConfigurationError(
          `Empty country code or domain in ${family} domains`,
          family,
        );
      }
      map.set(key, value);
    }
    return DomainMap.create(family, map);
  }

  /**
   * Build from domain -> countries groups, inverting them into country -> domain
   */
  static fromGroups(family: VariableFamily, groups: DomainGroups): DomainMap {
    const map = new Map<string, string>();

    for (const [rawDomain, countries] of Object.entries(groups)) {
      const domain = rawDomain.trim();
      const codes = typeof countries === 'string' ? countries.split(',') : countries;

      for (const rawCode of codes) {
        const code = rawCode.trim();
        if (!code) continue;

        const existing = map.get(code);
        if (existing !== undefined && existing !== domain) {
          throw new ConfigurationError(
            `Country '${code}' is assigned to both '${existing}' and '${domain}'`,
            family,
          );
        }
        map.set(code, domain);
      }
    }

    return DomainMap.fromEntries(family, Object.fromEntries(map));
  }

  private static create(
    family: VariableFamily,
    map: Map<string, string>,
  ): DomainMap {
    const defaultDomain = map.get(DEFAULT_DOMAIN_KEY);
    if (defaultDomain === undefined) {
      throw new ConfigurationError(
        `No ${DEFAULT_DOMAIN_KEY} domain configured`,
        family,
      );
    }
    return new DomainMap(family, map, defaultDomain);
  }

  /**
   * Recommended data source for a country, or the DEFAULT one
   */
  resolve(countryCode: string): string {
    return this.entries.get(countryCode) ?? this.defaultDomain;
  }
}

/**
 * Functional form of {@link DomainMap.resolve}
 */
export function resolveDomain(countryCode: string, domainMap: DomainMap): string {
  return domainMap.resolve(countryCode);
}
