import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SemanticVersion } from '../../../packages/core/src/core/version/semantic-version.js';
import {
  ANY_VERSION,
  allows,
  formatConstraint,
  highestSatisfying,
  parseConstraint,
  safeParseConstraint
} from '../../../packages/core/src/core/version/version-constraint.js';
import { ParseError } from '../../../packages/core/src/utils/errors.js';

const v = (input: string) => SemanticVersion.parse(input);

function admits(expression: string, version: string): boolean {
  return allows(parseConstraint(expression), v(version));
}

describe('parseConstraint', () => {
  it('parses each constraint form', () => {
    assert.equal(parseConstraint('1.2.3').kind, 'exact');
    assert.equal(parseConstraint('=1.2.3').kind, 'exact');
    assert.equal(parseConstraint('^1.2.3').kind, 'compatible');
    assert.equal(parseConstraint('~1.2.3').kind, 'tilde');
    assert.equal(parseConstraint('>=1.0.0 <2.0.0').kind, 'range');
    assert.equal(parseConstraint('1.0.0 - 2.0.0').kind, 'range');
    assert.equal(parseConstraint('*'), ANY_VERSION);
  });

  it('accepts whitespace between an operator and its version', () => {
    assert.equal(formatConstraint(parseConstraint('>= 1.0.0 < 2.0.0')), '>=1.0.0 <2.0.0');
  });

  it('rejects an empty expression', () => {
    assert.throws(() => parseConstraint('   '), { message: "Cannot parse '   ': empty version constraint" });
  });

  it('rejects malformed versions', () => {
    assert.throws(() => parseConstraint('^1.2'), { message: "Cannot parse '^1.2': '1.2' is not a valid version" });
  });

  it('rejects inverted and over-specified ranges', () => {
    assert.throws(
      () => parseConstraint('>=2.0.0 <1.0.0'),
      { message: "Cannot parse '>=2.0.0 <1.0.0': lower bound 2.0.0 is above upper bound 1.0.0" }
    );
    assert.throws(() => parseConstraint('>=1.0.0 >=1.1.0'), { message: /duplicate lower bound/ });
    assert.throws(() => parseConstraint('>1.0.0 <2.0.0 <3.0.0'), ParseError);
  });

  it('safeParseConstraint reports failures without throwing', () => {
    const outcome = safeParseConstraint('~banana');
    assert.equal(outcome.ok, false);
    if (!outcome.ok) {
      assert.ok(outcome.error instanceof ParseError);
    }
  });
});

describe('allows', () => {
  it('exact matches only the same version', () => {
    assert.equal(admits('1.2.3', '1.2.3'), true);
    assert.equal(admits('1.2.3', '1.2.4'), false);
  });

  it('caret keeps the major version', () => {
    assert.equal(admits('^1.2.3', '1.2.3'), true);
    assert.equal(admits('^1.2.3', '1.9.0'), true);
    assert.equal(admits('^1.2.3', '1.2.2'), false);
    assert.equal(admits('^1.2.3', '2.0.0'), false);
  });

  it('caret pins the minor version below 1.0.0', () => {
    assert.equal(admits('^0.2.3', '0.2.9'), true);
    assert.equal(admits('^0.2.3', '0.3.0'), false);
    assert.equal(admits('^0.2.3', '0.2.2'), false);
  });

  it('tilde keeps major and minor', () => {
    assert.equal(admits('~1.2.3', '1.2.9'), true);
    assert.equal(admits('~1.2.3', '1.3.0'), false);
    assert.equal(admits('~1.2.3', '1.2.2'), false);
  });

  it('comparator ranges honour inclusiveness', () => {
    assert.equal(admits('>=1.0.0 <2.0.0', '1.0.0'), true);
    assert.equal(admits('>=1.0.0 <2.0.0', '2.0.0'), false);
    assert.equal(admits('>1.0.0 <=2.0.0', '1.0.0'), false);
    assert.equal(admits('>1.0.0 <=2.0.0', '2.0.0'), true);
    assert.equal(admits('<1.0.0', '0.9.9'), true);
  });

  it('hyphen ranges include both ends', () => {
    assert.equal(admits('1.0.0 - 2.0.0', '1.0.0'), true);
    assert.equal(admits('1.0.0 - 2.0.0', '2.0.0'), true);
    assert.equal(admits('1.0.0 - 2.0.0', '2.0.1'), false);
  });

  it('any admits everything', () => {
    assert.equal(allows(ANY_VERSION, v('0.0.1')), true);
    assert.equal(allows(ANY_VERSION, v('99.0.0-rc.1')), true);
  });
});

describe('formatConstraint', () => {
  it('renders each form', () => {
    assert.equal(formatConstraint(parseConstraint('=1.2.3')), '1.2.3');
    assert.equal(formatConstraint(parseConstraint('^1.2.3')), '^1.2.3');
    assert.equal(formatConstraint(parseConstraint('~0.4.0')), '~0.4.0');
    assert.equal(formatConstraint(parseConstraint('1.0.0 - 2.0.0')), '>=1.0.0 <=2.0.0');
    assert.equal(formatConstraint(parseConstraint('>1.0.0')), '>1.0.0');
    assert.equal(formatConstraint(ANY_VERSION), '*');
  });
});

describe('highestSatisfying', () => {
  const candidates = ['1.0.0', '1.1.0', '1.2.0', '2.0.0'].map(v);

  it('picks the highest version admitted by every constraint', () => {
    const best = highestSatisfying(candidates, [parseConstraint('^1.0.0'), parseConstraint('^1.1.0')]);
    assert.equal(best?.toString(), '1.2.0');
  });

  it('returns null when the constraints exclude every candidate', () => {
    assert.equal(highestSatisfying(candidates, [parseConstraint('^1.0.0'), parseConstraint('^2.0.0')]), null);
  });

  it('treats no constraints as any version', () => {
    assert.equal(highestSatisfying(candidates, [])?.toString(), '2.0.0');
  });
});
