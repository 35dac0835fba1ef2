import type { CompatibilityMatrix } from './compatibility.js';
import type { DeprecationInfo, DeprecationRegistry, DeprecationStatus, WarningLevel } from './deprecation.js';
import type { HttpMethod, VersionRouteTable } from './route-table.js';
import type { ExtractionStrategy, StrategyDescriptor } from './strategies/types.js';
import { latestVersion, sortVersions, type Version, type VersionFormat } from './version.js';

export interface DiscoveryEndpoint {
  method: HttpMethod;
  path: string;
  status: DeprecationStatus;
}

export interface DiscoveryDeprecation {
  sunsetDate: string | null;
  warningLevel: WarningLevel;
  replacement: string | null;
  reason: string | null;
  migrationGuide: string | null;
}

export interface DiscoveryVersion {
  version: string;
  isDeprecated: boolean;
  isSunset: boolean;
  deprecation: DiscoveryDeprecation | null;
  endpoints: DiscoveryEndpoint[];
}

export interface DiscoveryDocument {
  format: VersionFormat;
  defaultVersion: string | null;
  latestVersion: string | null;
  strictVersioning: boolean;
  strategies: StrategyDescriptor[];
  compatibility: Record<string, string[]>;
  versions: DiscoveryVersion[];
}

export interface DiscoverySource<THandler> {
  table: VersionRouteTable<THandler>;
  deprecations: DeprecationRegistry;
  strategies: readonly ExtractionStrategy[];
  matrix: CompatibilityMatrix;
  defaultVersion: Version | null;
  strictVersioning: boolean;
}

/** Earliest sunset wins; open-ended deprecations come last. */
function summarize(infos: readonly DeprecationInfo[]): DiscoveryDeprecation | null {
  let chosen: DeprecationInfo | null = null;
  for (const info of infos) {
    if (chosen === null) {
      chosen = info;
      continue;
    }
    const current = chosen.sunsetDate?.getTime() ?? Number.POSITIVE_INFINITY;
    const candidate = info.sunsetDate?.getTime() ?? Number.POSITIVE_INFINITY;
    if (candidate < current) chosen = info;
  }

  if (chosen === null) return null;
  return {
    sunsetDate: chosen.sunsetDate?.toISOString() ?? null,
    warningLevel: chosen.warningLevel,
    replacement: chosen.replacement,
    reason: chosen.reason,
    migrationGuide: chosen.migrationGuide
  };
}

export function buildDiscoveryDocument<THandler>(source: DiscoverySource<THandler>, now: Date = new Date()): DiscoveryDocument {
  const specs = source.table.specs();

  const versions = sortVersions(source.table.versions()).map((version): DiscoveryVersion => {
    const forVersion = specs
      .filter((spec) => spec.version.equals(version))
      .sort((left, right) => left.pathTemplate.localeCompare(right.pathTemplate) || left.method.localeCompare(right.method));

    const endpoints = forVersion.map((spec) => ({
      method: spec.method,
      path: spec.pathTemplate,
      status: source.deprecations.evaluate(spec, now).status
    }));
    const infos = forVersion
      .map((spec) => source.deprecations.get(spec))
      .filter((info): info is DeprecationInfo => info !== null);

    return {
      version: version.toString(),
      isDeprecated: endpoints.some((endpoint) => endpoint.status !== 'active'),
      isSunset: endpoints.length > 0 && endpoints.every((endpoint) => endpoint.status === 'sunset'),
      deprecation: summarize(infos),
      endpoints
    };
  });

  return {
    format: source.table.format,
    defaultVersion: source.defaultVersion?.toString() ?? null,
    latestVersion: latestVersion(source.table.versions())?.toString() ?? null,
    strictVersioning: source.strictVersioning,
    strategies: source.strategies.map((strategy) => strategy.describe()),
    compatibility: source.matrix.toJSON(),
    versions
  };
}
