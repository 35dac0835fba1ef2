/**
 * Deprecation metadata and per-request lifecycle evaluation.
 *
 * Outcomes are computed from the supplied clock on every call and never
 * cached: a version flips from DEPRECATED to SUNSET the moment `now`
 * reaches its sunset date.
 */

import { ConfigurationError } from './errors.js';
import type { VersionSpec } from './route-table.js';

export const WARNING_LEVELS = ['info', 'warning', 'critical'] as const;
export type WarningLevel = (typeof WARNING_LEVELS)[number];

export const DEPRECATION_STATUSES = ['active', 'deprecated', 'sunset'] as const;
export type DeprecationStatus = (typeof DEPRECATION_STATUSES)[number];

export interface DeprecationInfo {
  readonly sunsetDate: Date | null;
  readonly warningLevel: WarningLevel;
  readonly replacement: string | null;
  readonly reason: string | null;
  readonly migrationGuide: string | null;
}

export interface DeprecationInput {
  sunsetDate?: Date | string | null;
  warningLevel?: WarningLevel;
  replacement?: string | null;
  reason?: string | null;
  migrationGuide?: string | null;
}

export interface DeprecationHeaderNames {
  deprecation: string;
  sunset: string;
  link: string;
  warning: string;
}

export const DEFAULT_DEPRECATION_HEADERS: Readonly<DeprecationHeaderNames> = Object.freeze({
  deprecation: 'Deprecation',
  sunset: 'Sunset',
  link: 'Link',
  warning: 'Warning'
});

export interface DeprecationOutcome {
  readonly status: DeprecationStatus;
  readonly headers: Readonly<Record<string, string>>;
  readonly message: string | null;
}

const ACTIVE: DeprecationOutcome = Object.freeze({ status: 'active', headers: Object.freeze({}), message: null });

function toDate(value: Date | string | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  const date = value instanceof Date ? new Date(value.getTime()) : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ConfigurationError(`Invalid sunset date '${String(value)}'.`, { sunsetDate: String(value) });
  }
  return date;
}

export function normalizeDeprecation(input: DeprecationInput = {}): DeprecationInfo {
  return Object.freeze({
    sunsetDate: toDate(input.sunsetDate),
    warningLevel: input.warningLevel ?? 'warning',
    replacement: input.replacement ?? null,
    reason: input.reason ?? null,
    migrationGuide: input.migrationGuide ?? null
  });
}

/** Shorthand for a critical deprecation with a fixed retirement date. */
export function sunsetOn(
  date: Date | string,
  options: Omit<DeprecationInput, 'sunsetDate' | 'warningLevel'> = {}
): DeprecationInfo {
  return normalizeDeprecation({ ...options, sunsetDate: date, warningLevel: 'critical' });
}

export function isSunset(info: DeprecationInfo, now: Date): boolean {
  return info.sunsetDate !== null && now.getTime() >= info.sunsetDate.getTime();
}

function calendarDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function deprecationMessage(info: DeprecationInfo, now: Date): string {
  const parts: string[] = [];

  if (info.sunsetDate === null) {
    parts.push('This endpoint is deprecated.');
  } else if (isSunset(info, now)) {
    parts.push(`This endpoint was sunset on ${calendarDay(info.sunsetDate)}.`);
  } else {
    parts.push(`This endpoint is deprecated and will be sunset on ${calendarDay(info.sunsetDate)}.`);
  }

  if (info.replacement) parts.push(`Use ${info.replacement} instead.`);
  if (info.reason) parts.push(`Reason: ${info.reason}`);

  return parts.join(' ');
}

function linkHeader(info: DeprecationInfo): string | null {
  const links: string[] = [];
  if (info.replacement) links.push(`<${info.replacement}>; rel="successor-version"`);
  if (info.migrationGuide) links.push(`<${info.migrationGuide}>; rel="deprecation"`);
  return links.length > 0 ? links.join(', ') : null;
}

export function evaluateDeprecation(
  info: DeprecationInfo | null,
  now: Date,
  names: DeprecationHeaderNames = DEFAULT_DEPRECATION_HEADERS
): DeprecationOutcome {
  if (info === null) return ACTIVE;

  const headers: Record<string, string> = { [names.deprecation]: 'true' };
  const message = deprecationMessage(info, now);
  const sunset = isSunset(info, now);

  if (!sunset) {
    const code = info.warningLevel === 'critical' ? 199 : 299;
    headers[names.warning] = `${code} - "${message.replaceAll('"', '\\"')}"`;
  }
  if (info.sunsetDate !== null) {
    headers[names.sunset] = info.sunsetDate.toUTCString();
  }
  const link = linkHeader(info);
  if (link !== null) {
    headers[names.link] = link;
  }

  return Object.freeze({
    status: sunset ? 'sunset' : 'deprecated',
    headers: Object.freeze(headers),
    message
  });
}

/**
 * Deprecation metadata keyed by VersionSpec. Filled while the route table
 * is being built, then sealed.
 */
export class DeprecationRegistry {
  readonly headerNames: Readonly<DeprecationHeaderNames>;
  private readonly entries = new Map<string, DeprecationInfo>();
  private sealed = false;

  constructor(headerNames: Partial<DeprecationHeaderNames> = {}) {
    this.headerNames = Object.freeze({ ...DEFAULT_DEPRECATION_HEADERS, ...headerNames });
  }

  attach(spec: Pick<VersionSpec<unknown>, 'id'>, info: DeprecationInfo): void {
    if (this.sealed) {
      throw new ConfigurationError('Deprecation registry is sealed; attach metadata before the route table is built.', {
        spec: spec.id
      });
    }
    if (this.entries.has(spec.id)) {
      throw new ConfigurationError(`Deprecation for ${spec.id} is already set.`, { spec: spec.id });
    }
    this.entries.set(spec.id, info);
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get(spec: Pick<VersionSpec<unknown>, 'id'>): DeprecationInfo | null {
    return this.entries.get(spec.id) ?? null;
  }

  evaluate(spec: Pick<VersionSpec<unknown>, 'id'>, now: Date = new Date()): DeprecationOutcome {
    return evaluateDeprecation(this.get(spec), now, this.headerNames);
  }
}
