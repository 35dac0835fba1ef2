import { ConfigurationError, UnsupportedVersionError } from './errors.js';
import { containsVersion, Ordering, sortVersions, Version, type VersionFormat } from './version.js';

export type NegotiationMatch = 'exact' | 'compatible' | 'default';

export interface Negotiation {
  version: Version;
  match: NegotiationMatch;
}

/**
 * Direct-entry compatibility relation: each version maps to the versions
 * that may stand in for it, most preferred first. Entries are never chained,
 * so 2.5 -> 2.1 and 2.1 -> 2.0 does not make 2.0 a fallback for 2.5.
 */
export class CompatibilityMatrix {
  private readonly entries: ReadonlyMap<string, { version: Version; fallbacks: readonly Version[] }>;

  private constructor(entries: Map<string, { version: Version; fallbacks: readonly Version[] }>) {
    this.entries = entries;
    Object.freeze(this);
  }

  static empty(): CompatibilityMatrix {
    return new CompatibilityMatrix(new Map());
  }

  static fromEntries(entries: Iterable<readonly [Version, readonly Version[]]>): CompatibilityMatrix {
    const map = new Map<string, { version: Version; fallbacks: readonly Version[] }>();

    for (const [version, fallbacks] of entries) {
      const key = version.toString();
      if (map.has(key)) {
        throw new ConfigurationError(`Compatibility entry for ${key} is declared more than once.`, { version: key });
      }
      for (const fallback of fallbacks) {
        // Throws IncomparableVersionError on mixed formats.
        if (version.compare(fallback) === Ordering.EQUAL) {
          throw new ConfigurationError(`Version ${key} cannot fall back to itself.`, { version: key });
        }
      }
      map.set(key, { version, fallbacks: Object.freeze([...fallbacks]) });
    }

    const formats = new Set([...map.values()].map((entry) => entry.version.format));
    if (formats.size > 1) {
      throw new ConfigurationError('Compatibility entries mix version formats.', { formats: [...formats] });
    }

    return new CompatibilityMatrix(map);
  }

  static fromRecord(record: Readonly<Record<string, readonly string[]>>, format: VersionFormat): CompatibilityMatrix {
    return CompatibilityMatrix.fromEntries(
      Object.entries(record).map(([version, fallbacks]) => [
        Version.parse(version, format),
        fallbacks.map((fallback) => Version.parse(fallback, format))
      ])
    );
  }

  get size(): number {
    return this.entries.size;
  }

  fallbacksFor(version: Version): readonly Version[] {
    return this.entries.get(version.toString())?.fallbacks ?? [];
  }

  canStandIn(requested: Version, candidate: Version): boolean {
    return requested.equals(candidate) || containsVersion(this.fallbacksFor(requested), candidate);
  }

  /**
   * Exact match first, then the first direct fallback that is available,
   * then the default version when it is available.
   */
  negotiate(requested: Version, available: readonly Version[], defaultVersion: Version | null = null): Negotiation {
    if (containsVersion(available, requested)) {
      return { version: requested, match: 'exact' };
    }

    for (const fallback of this.fallbacksFor(requested)) {
      if (containsVersion(available, fallback)) {
        return { version: fallback, match: 'compatible' };
      }
    }

    if (defaultVersion !== null && containsVersion(available, defaultVersion)) {
      return { version: defaultVersion, match: 'default' };
    }

    throw new UnsupportedVersionError(requested, sortVersions(available));
  }

  versions(): Version[] {
    const all = new Map<string, Version>();
    for (const entry of this.entries.values()) {
      all.set(entry.version.toString(), entry.version);
      for (const fallback of entry.fallbacks) {
        all.set(fallback.toString(), fallback);
      }
    }
    return sortVersions(all.values());
  }

  toJSON(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const [key, entry] of this.entries) {
      result[key] = entry.fallbacks.map((fallback) => fallback.toString());
    }
    return result;
  }
}
