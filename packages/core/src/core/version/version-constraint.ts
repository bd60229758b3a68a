/**
 * Version constraints as a tagged union of pure predicates.
 *
 * Supported syntax:
 *   1.2.3 | =1.2.3        exact
 *   ^1.2.3                compatible (same major; minor pinned when major is 0)
 *   ~1.2.3                tilde (same major.minor)
 *   >=1.0.0 <2.0.0        range from comparators (>, >=, <, <=)
 *   1.0.0 - 2.0.0         inclusive hyphen range
 *   *                     any version
 */

import { ParseError } from '../../utils/errors.js';
import { SemanticVersion } from './semantic-version.js';

export type VersionConstraint =
  | { readonly kind: 'exact'; readonly version: SemanticVersion }
  | { readonly kind: 'compatible'; readonly version: SemanticVersion }
  | { readonly kind: 'tilde'; readonly version: SemanticVersion }
  | {
      readonly kind: 'range';
      readonly min?: SemanticVersion;
      readonly max?: SemanticVersion;
      readonly inclusiveMin: boolean;
      readonly inclusiveMax: boolean;
    };

export type RangeConstraint = Extract<VersionConstraint, { kind: 'range' }>;

export const exact = (version: SemanticVersion): VersionConstraint =>
  Object.freeze<VersionConstraint>({ kind: 'exact', version });

export const compatible = (version: SemanticVersion): VersionConstraint =>
  Object.freeze<VersionConstraint>({ kind: 'compatible', version });

export const tilde = (version: SemanticVersion): VersionConstraint =>
  Object.freeze<VersionConstraint>({ kind: 'tilde', version });

export function range(bounds: {
  min?: SemanticVersion;
  max?: SemanticVersion;
  inclusiveMin?: boolean;
  inclusiveMax?: boolean;
}): VersionConstraint {
  return Object.freeze<VersionConstraint>({
    kind: 'range',
    min: bounds.min,
    max: bounds.max,
    inclusiveMin: bounds.inclusiveMin ?? true,
    inclusiveMax: bounds.inclusiveMax ?? false
  });
}

export const ANY_VERSION: VersionConstraint = range({});

/**
 * Does the constraint admit this version?
 */
export function allows(constraint: VersionConstraint, version: SemanticVersion): boolean {
  switch (constraint.kind) {
    case 'exact':
      return version.equals(constraint.version);

    case 'compatible': {
      const base = constraint.version;
      if (version.major !== base.major || version.lessThan(base)) {
        return false;
      }
      return base.major !== 0 || version.minor === base.minor;
    }

    case 'tilde': {
      const base = constraint.version;
      return (
        version.major === base.major &&
        version.minor === base.minor &&
        version.patch >= base.patch
      );
    }

    case 'range': {
      const { min, max, inclusiveMin, inclusiveMax } = constraint;
      if (min) {
        const cmp = version.compareTo(min);
        if (cmp < 0 || (cmp === 0 && !inclusiveMin)) {
          return false;
        }
      }
      if (max) {
        const cmp = version.compareTo(max);
        if (cmp > 0 || (cmp === 0 && !inclusiveMax)) {
          return false;
        }
      }
      return true;
    }
  }
}

export function formatConstraint(constraint: VersionConstraint): string {
  switch (constraint.kind) {
    case 'exact':
      return constraint.version.toString();
    case 'compatible':
      return `^${constraint.version}`;
    case 'tilde':
      return `~${constraint.version}`;
    case 'range': {
      const parts: string[] = [];
      if (constraint.min) {
        parts.push(`${constraint.inclusiveMin ? '>=' : '>'}${constraint.min}`);
      }
      if (constraint.max) {
        parts.push(`${constraint.inclusiveMax ? '<=' : '<'}${constraint.max}`);
      }
      return parts.length > 0 ? parts.join(' ') : '*';
    }
  }
}

export type ConstraintParseOutcome =
  | { ok: true; constraint: VersionConstraint }
  | { ok: false; error: ParseError };

const COMPARATOR_PATTERN = /^(>=|<=|>|<)\s*(\S+)$/;
const HYPHEN_PATTERN = /^(\S+)\s+-\s+(\S+)$/;

/**
 * Parse a constraint expression. Throws ParseError when the expression or any
 * version inside it is malformed.
 */
export function parseConstraint(expression: string): VersionConstraint {
  const expr = expression.trim();
  if (expr === '') {
    throw new ParseError(expression, 'empty version constraint');
  }

  if (expr === '*') {
    return ANY_VERSION;
  }

  const versionIn = (raw: string): SemanticVersion => {
    const outcome = SemanticVersion.safeParse(raw);
    if (!outcome.ok) {
      throw new ParseError(expression, `'${raw}' is not a valid version`);
    }
    return outcome.version;
  };

  if (expr.startsWith('^')) {
    return compatible(versionIn(expr.slice(1)));
  }
  if (expr.startsWith('~')) {
    return tilde(versionIn(expr.slice(1)));
  }
  if (expr.startsWith('=') && !expr.startsWith('==')) {
    return exact(versionIn(expr.slice(1).trim()));
  }

  const hyphen = HYPHEN_PATTERN.exec(expr);
  if (hyphen) {
    const min = versionIn(hyphen[1]);
    const max = versionIn(hyphen[2]);
    return checkedRange(expression, { min, max, inclusiveMin: true, inclusiveMax: true });
  }

  if (/^[<>]/.test(expr)) {
    return parseComparatorSet(expression, expr, versionIn);
  }

  return exact(versionIn(expr));
}

export function safeParseConstraint(expression: string): ConstraintParseOutcome {
  try {
    return { ok: true, constraint: parseConstraint(expression) };
  } catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}

function parseComparatorSet(
  expression: string,
  expr: string,
  versionIn: (raw: string) => SemanticVersion
): VersionConstraint {
  // ">= 1.0.0" is accepted: operators are glued to their operand before splitting
  const tokens = expr.replace(/(>=|<=|>|<)\s+/g, '$1').split(/\s+/);
  if (tokens.length > 2) {
    throw new ParseError(expression, 'a range takes at most one lower and one upper bound');
  }

  let min: SemanticVersion | undefined;
  let max: SemanticVersion | undefined;
  let inclusiveMin = true;
  let inclusiveMax = false;

  for (const token of tokens) {
    const match = COMPARATOR_PATTERN.exec(token);
    if (!match) {
      throw new ParseError(expression, `'${token}' is not a comparator`);
    }
    const [, operator, raw] = match;
    const version = versionIn(raw);
    if (operator.startsWith('>')) {
      if (min) {
        throw new ParseError(expression, 'duplicate lower bound');
      }
      min = version;
      inclusiveMin = operator === '>=';
    } else {
      if (max) {
        throw new ParseError(expression, 'duplicate upper bound');
      }
      max = version;
      inclusiveMax = operator === '<=';
    }
  }

  return checkedRange(expression, { min, max, inclusiveMin, inclusiveMax });
}

function checkedRange(
  expression: string,
  bounds: { min?: SemanticVersion; max?: SemanticVersion; inclusiveMin: boolean; inclusiveMax: boolean }
): VersionConstraint {
  if (bounds.min && bounds.max && bounds.min.greaterThan(bounds.max)) {
    throw new ParseError(expression, `lower bound ${bounds.min} is above upper bound ${bounds.max}`);
  }
  return range(bounds);
}

/**
 * Highest candidate admitted by every constraint, or null.
 */
export function highestSatisfying(
  candidates: readonly SemanticVersion[],
  constraints: readonly VersionConstraint[]
): SemanticVersion | null {
  let best: SemanticVersion | null = null;
  for (const candidate of candidates) {
    if (!constraints.every(constraint => allows(constraint, candidate))) {
      continue;
    }
    if (best === null || candidate.greaterThan(best)) {
      best = candidate;
    }
  }
  return best;
}
