import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { VersionSolver } from '../../../packages/core/src/core/dependencies/version-solver.js';
import { parseConstraint } from '../../../packages/core/src/core/version/version-constraint.js';
import { registryOf } from '../../test-helpers.js';

function solverWith(entries: Array<[name: string, expression: string, requestedBy: string]>): VersionSolver {
  const solver = new VersionSolver();
  for (const [name, expression, requestedBy] of entries) {
    solver.addConstraint(name, parseConstraint(expression), expression, requestedBy);
  }
  return solver;
}

describe('VersionSolver', () => {
  const catalog = registryOf([], {
    'shared-lib': ['1.0.0', '1.1.0', '1.2.0', '2.0.0'],
    logger: ['0.9.0']
  });

  it('selects the highest version satisfying every constraint', () => {
    const solution = solverWith([
      ['shared-lib', '^1.0.0', 'base'],
      ['shared-lib', '^1.1.0', 'child']
    ]).solve(catalog);

    assert.equal(solution.resolved.get('shared-lib')?.toString(), '1.2.0');
    assert.deepEqual(solution.conflicts, []);
  });

  it('reports every constraint and requester of a conflicting name', () => {
    const solution = solverWith([
      ['shared-lib', '^1.0.0', 'base'],
      ['shared-lib', '>=2.0.0', 'child'],
      ['shared-lib', '<1.1.0', 'plugin']
    ]).solve(catalog);

    assert.equal(solution.resolved.has('shared-lib'), false);
    assert.deepEqual(solution.conflicts, [{
      name: 'shared-lib',
      constraints: ['^1.0.0', '>=2.0.0', '<1.1.0'],
      requestedBy: ['base', 'child', 'plugin'],
      availableVersions: ['1.0.0', '1.1.0', '1.2.0', '2.0.0'],
      reason: 'unsatisfiable'
    }]);
  });

  it('distinguishes names with no candidates at all', () => {
    const solution = solverWith([['unknown', '*', 'app']]).solve(catalog);
    assert.equal(solution.conflicts[0].reason, 'no-candidates');
    assert.deepEqual(solution.conflicts[0].availableVersions, []);
  });

  it('solves names independently', () => {
    const solution = solverWith([
      ['shared-lib', '^3.0.0', 'app'],
      ['logger', '~0.9.0', 'app']
    ]).solve(catalog);

    assert.equal(solution.resolved.get('logger')?.toString(), '0.9.0');
    assert.deepEqual(solution.conflicts.map(conflict => conflict.name), ['shared-lib']);
  });

  it('exposes accumulated constraints per name', () => {
    const solver = solverWith([['logger', '~0.9.0', 'app']]);
    assert.equal(solver.hasConstraints('logger'), true);
    assert.equal(solver.hasConstraints('shared-lib'), false);
    assert.deepEqual(solver.getConstraintsFor('logger'), { expressions: ['~0.9.0'], requestedBy: ['app'] });
  });
});
