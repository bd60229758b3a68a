/**
 * Immutable semantic version value type.
 *
 * Parsing is strict: only `MAJOR.MINOR.PATCH[-PRERELEASE][+BUILD]` is accepted
 * (no leading `v`, no surrounding whitespace, no leading zeros). Ordering
 * follows semver precedence; build metadata never affects ordering.
 */

import semver from 'semver';
import { ParseError } from '../../utils/errors.js';

const NUMERIC = '0|[1-9]\\d*';
const PRERELEASE_ID = `(?:${NUMERIC}|\\d*[a-zA-Z-][0-9a-zA-Z-]*)`;
const BUILD_ID = '[0-9a-zA-Z-]+';

const VERSION_PATTERN = new RegExp(
  `^(${NUMERIC})\\.(${NUMERIC})\\.(${NUMERIC})` +
  `(?:-(${PRERELEASE_ID}(?:\\.${PRERELEASE_ID})*))?` +
  `(?:\\+(${BUILD_ID}(?:\\.${BUILD_ID})*))?$`
);

export type VersionParseOutcome =
  | { ok: true; version: SemanticVersion }
  | { ok: false; error: ParseError };

export class SemanticVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly prerelease?: string;
  readonly build?: string;

  private constructor(major: number, minor: number, patch: number, prerelease?: string, build?: string) {
    this.major = major;
    this.minor = minor;
    this.patch = patch;
    this.prerelease = prerelease;
    this.build = build;
    Object.freeze(this);
  }

  /**
   * Parse a version string, throwing ParseError on anything outside the grammar.
   */
  static parse(input: string): SemanticVersion {
    const outcome = SemanticVersion.safeParse(input);
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.version;
  }

  static safeParse(input: string): VersionParseOutcome {
    const match = VERSION_PATTERN.exec(input);
    if (!match) {
      return {
        ok: false,
        error: new ParseError(input, 'expected MAJOR.MINOR.PATCH[-PRERELEASE][+BUILD]')
      };
    }

    const [, major, minor, patch, prerelease, build] = match;
    const numbers = [Number(major), Number(minor), Number(patch)];
    if (numbers.some(n => !Number.isSafeInteger(n))) {
      return { ok: false, error: new ParseError(input, 'version component is too large') };
    }

    return {
      ok: true,
      version: new SemanticVersion(numbers[0], numbers[1], numbers[2], prerelease, build)
    };
  }

  static isValid(input: string): boolean {
    return SemanticVersion.safeParse(input).ok;
  }

  static of(major: number, minor: number, patch: number): SemanticVersion {
    return SemanticVersion.parse(`${major}.${minor}.${patch}`);
  }

  get isPrerelease(): boolean {
    return this.prerelease !== undefined;
  }

  /**
   * Semver precedence over the parsed fields. Prerelease identifiers go
   * through semver's identifier ordering, so input length is unbounded.
   */
  compareTo(other: SemanticVersion): -1 | 0 | 1 {
    const core =
      compareNumbers(this.major, other.major) ||
      compareNumbers(this.minor, other.minor) ||
      compareNumbers(this.patch, other.patch);
    if (core !== 0) {
      return core;
    }
    return comparePrerelease(this.prerelease, other.prerelease);
  }

  equals(other: SemanticVersion): boolean {
    return this.compareTo(other) === 0;
  }

  greaterThan(other: SemanticVersion): boolean {
    return this.compareTo(other) > 0;
  }

  lessThan(other: SemanticVersion): boolean {
    return this.compareTo(other) < 0;
  }

  incrementMajor(): SemanticVersion {
    return SemanticVersion.of(this.major + 1, 0, 0);
  }

  incrementMinor(): SemanticVersion {
    return SemanticVersion.of(this.major, this.minor + 1, 0);
  }

  incrementPatch(): SemanticVersion {
    return SemanticVersion.of(this.major, this.minor, this.patch + 1);
  }

  toString(): string {
    let formatted = `${this.major}.${this.minor}.${this.patch}`;
    if (this.prerelease !== undefined) {
      formatted += `-${this.prerelease}`;
    }
    if (this.build !== undefined) {
      formatted += `+${this.build}`;
    }
    return formatted;
  }

  toJSON(): string {
    return this.toString();
  }
}

function compareNumbers(a: number, b: number): -1 | 0 | 1 {
  return a === b ? 0 : a < b ? -1 : 1;
}

function comparePrerelease(a: string | undefined, b: string | undefined): -1 | 0 | 1 {
  if (a === b) {
    return 0;
  }
  // A release outranks any prerelease of the same core.
  if (a === undefined) {
    return 1;
  }
  if (b === undefined) {
    return -1;
  }

  const left = a.split('.');
  const right = b.split('.');
  const shared = Math.min(left.length, right.length);
  for (let i = 0; i < shared; i++) {
    const order = semver.compareIdentifiers(left[i], right[i]);
    if (order !== 0) {
      return order;
    }
  }
  return compareNumbers(left.length, right.length);
}

/**
 * Sort versions ascending without mutating the input.
 */
export function sortVersions(versions: readonly SemanticVersion[]): SemanticVersion[] {
  return [...versions].sort((a, b) => a.compareTo(b));
}
