import { z } from 'zod';
import { ConfigurationError } from '../common/errors';
import bundledCatalog from './variable-codes.json';

const catalogEntrySchema = z.object({
  code: z.number().int(),
  variable: z.string().min(1),
  unit: z.string(),
});

export type VariableCatalogEntry = z.infer<typeof catalogEntrySchema>;

/**
 * Code -> variable name/unit lookup.
 *
 * Provider responses normally carry the variable name next to the code; the
 * catalog names the codes that come back without one.
 */
export class VariableCatalog {
  private readonly entries: ReadonlyMap<number, VariableCatalogEntry>;

  constructor(entries: readonly VariableCatalogEntry[]) {
    const map = new Map<number, VariableCatalogEntry>();
    for (const entry of entries) {
      if (map.has(entry.code)) {
        throw new ConfigurationError(
          `Duplicate variable code ${entry.code} in catalog`,
        );
      }
      map.set(entry.code, entry);
    }
    this.entries = map;
  }

  /**
   * Build the catalog shipped with the package (variable-codes.json)
   */
  static bundled(): VariableCatalog {
    const parsed = z.array(catalogEntrySchema).safeParse(bundledCatalog);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid bundled variable catalog: ${parsed.error.message}`,
      );
    }
    return new VariableCatalog(parsed.data);
  }

  get size(): number {
    return this.entries.size;
  }

  lookupVariable(code: number): string | undefined {
    return this.entries.get(code)?.variable;
  }

  lookupUnit(code: number): string | undefined {
    return this.entries.get(code)?.unit;
  }
}
