import { IncomparableVersionError, InvalidVersionError } from './errors.js';

export const VERSION_FORMATS = ['semantic', 'simple', 'date'] as const;

export type VersionFormat = (typeof VERSION_FORMATS)[number];

export const Ordering = {
  LESS: -1,
  EQUAL: 0,
  GREATER: 1
} as const;

export type Ordering = (typeof Ordering)[keyof typeof Ordering];

const SEMANTIC_PATTERN = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:-([A-Za-z0-9.]+))?$/;
const SIMPLE_PATTERN = /^(\d+)(?:\.(\d+))?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

interface VersionParts {
  major: number;
  minor: number;
  patch: number | null;
  label: string | null;
}

function toComponent(value: string | undefined, fallback: number | null): number | null {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

const NUMERIC_IDENTIFIER = /^\d+$/;

function stripLeadingZeros(digits: string): string {
  return digits.replace(/^0+(?=\d)/, '');
}

/** Numeric label identifiers lose their leading zeros: `rc.01` reads as `rc.1`. */
function canonicalLabel(label: string): string {
  return label
    .split('.')
    .map((part) => (NUMERIC_IDENTIFIER.test(part) ? stripLeadingZeros(part) : part))
    .join('.');
}

function parseSemantic(raw: string): VersionParts | null {
  const match = SEMANTIC_PATTERN.exec(raw);
  if (!match) return null;

  const major = toComponent(match[1], null);
  const minor = toComponent(match[2], 0);
  const patch = toComponent(match[3], null);
  const label = match[4] ?? null;

  if (major === null || minor === null) return null;
  if (match[3] !== undefined && patch === null) return null;
  // Reject empty identifiers such as "rc..1".
  if (label !== null && label.split('.').some((part) => part.length === 0)) return null;

  return { major, minor, patch, label: label === null ? null : canonicalLabel(label) };
}

function parseSimple(raw: string): VersionParts | null {
  const match = SIMPLE_PATTERN.exec(raw);
  if (!match) return null;

  const major = toComponent(match[1], null);
  const minor = toComponent(match[2], 0);
  if (major === null || minor === null) return null;

  return { major, minor, patch: null, label: null };
}

function parseDate(raw: string): VersionParts | null {
  const match = DATE_PATTERN.exec(raw);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return { major: year, minor: month, patch: day, label: null };
}

const PARSERS: Record<VersionFormat, (raw: string) => VersionParts | null> = {
  semantic: parseSemantic,
  simple: parseSimple,
  date: parseDate
};

function sign(value: number): Ordering {
  if (value < 0) return Ordering.LESS;
  if (value > 0) return Ordering.GREATER;
  return Ordering.EQUAL;
}

function compareIdentifiers(left: string, right: string): Ordering {
  const leftNumeric = NUMERIC_IDENTIFIER.test(left);
  const rightNumeric = NUMERIC_IDENTIFIER.test(right);

  // Digit strings of any length compare exactly: longer is larger, then lexicographic.
  if (leftNumeric && rightNumeric) {
    const leftDigits = stripLeadingZeros(left);
    const rightDigits = stripLeadingZeros(right);
    if (leftDigits.length !== rightDigits.length) return sign(leftDigits.length - rightDigits.length);
    if (leftDigits === rightDigits) return Ordering.EQUAL;
    return leftDigits < rightDigits ? Ordering.LESS : Ordering.GREATER;
  }
  if (leftNumeric) return Ordering.LESS;
  if (rightNumeric) return Ordering.GREATER;
  if (left === right) return Ordering.EQUAL;
  return left < right ? Ordering.LESS : Ordering.GREATER;
}

function compareLabels(left: string | null, right: string | null): Ordering {
  if (left === right) return Ordering.EQUAL;
  // A release outranks any of its pre-releases.
  if (left === null) return Ordering.GREATER;
  if (right === null) return Ordering.LESS;

  const leftParts = left.split('.');
  const rightParts = right.split('.');
  const length = Math.max(leftParts.length, rightParts.length);

  for (let index = 0; index < length; index += 1) {
    const leftPart = leftParts[index];
    const rightPart = rightParts[index];
    if (leftPart === undefined) return Ordering.LESS;
    if (rightPart === undefined) return Ordering.GREATER;

    const ordering = compareIdentifiers(leftPart, rightPart);
    if (ordering !== Ordering.EQUAL) return ordering;
  }

  return Ordering.EQUAL;
}

function comparePatch(left: number | null, right: number | null): Ordering {
  if (left === right) return Ordering.EQUAL;
  if (left === null) return Ordering.LESS;
  if (right === null) return Ordering.GREATER;
  return sign(left - right);
}

/**
 * An API version in one of three formats. Instances are frozen. Two versions
 * of one format compare EQUAL exactly when their canonical text is the same.
 */
export class Version {
  private constructor(
    readonly format: VersionFormat,
    readonly major: number,
    readonly minor: number,
    readonly patch: number | null,
    readonly label: string | null,
    readonly raw: string
  ) {
    Object.freeze(this);
  }

  static parse(raw: string, format: VersionFormat): Version {
    const parts = PARSERS[format](raw);
    if (!parts) {
      throw new InvalidVersionError(raw, format);
    }
    return new Version(format, parts.major, parts.minor, parts.patch, parts.label, raw);
  }

  static isValid(raw: string, format: VersionFormat): boolean {
    return PARSERS[format](raw) !== null;
  }

  compare(other: Version): Ordering {
    if (this.format !== other.format) {
      throw new IncomparableVersionError(this, other);
    }

    if (this.major !== other.major) return sign(this.major - other.major);
    if (this.minor !== other.minor) return sign(this.minor - other.minor);

    const patch = comparePatch(this.patch, other.patch);
    if (patch !== Ordering.EQUAL) return patch;

    return compareLabels(this.label, other.label);
  }

  /** Format-aware equality; versions of different formats are never equal. */
  equals(other: Version): boolean {
    return this.format === other.format && this.compare(other) === Ordering.EQUAL;
  }

  toString(): string {
    switch (this.format) {
      case 'date':
        return [
          String(this.major).padStart(4, '0'),
          String(this.minor).padStart(2, '0'),
          String(this.patch ?? 1).padStart(2, '0')
        ].join('-');
      case 'simple':
        return `${this.major}.${this.minor}`;
      case 'semantic': {
        const core = this.patch === null ? `${this.major}.${this.minor}` : `${this.major}.${this.minor}.${this.patch}`;
        return this.label === null ? core : `${core}-${this.label}`;
      }
    }
  }

  toJSON(): string {
    return this.toString();
  }
}

export function compareVersions(left: Version, right: Version): Ordering {
  return left.compare(right);
}

export function sortVersions(versions: Iterable<Version>): Version[] {
  return [...versions].sort(compareVersions);
}

export function latestVersion(versions: Iterable<Version>): Version | null {
  let latest: Version | null = null;
  for (const version of versions) {
    if (latest === null || version.compare(latest) === Ordering.GREATER) {
      latest = version;
    }
  }
  return latest;
}

export function containsVersion(versions: Iterable<Version>, candidate: Version): boolean {
  for (const version of versions) {
    if (version.compare(candidate) === Ordering.EQUAL) {
      return true;
    }
  }
  return false;
}
