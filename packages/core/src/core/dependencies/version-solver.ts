/**
 * Version constraint solver.
 * Accumulates constraints per dependency name across the whole graph
 * and finds the highest candidate version satisfying all of them.
 */

import type { VersionCatalog } from '../store/types.js';
import { sortVersions, type SemanticVersion } from '../version/semantic-version.js';
import { highestSatisfying, type VersionConstraint } from '../version/version-constraint.js';
import type { DependencyConflict } from './types.js';

interface ConstraintEntry {
  constraints: VersionConstraint[];
  expressions: string[];
  requestedBy: string[];
}

export interface VersionSolution {
  resolved: Map<string, SemanticVersion>;
  conflicts: DependencyConflict[];
}

export class VersionSolver {
  private constraints: Map<string, ConstraintEntry> = new Map();

  /**
   * Add a parsed constraint for a dependency name.
   *
   * @param expression - The constraint as declared, kept for reporting
   * @param requestedBy - templateId of the declaring template
   */
  addConstraint(name: string, constraint: VersionConstraint, expression: string, requestedBy: string): void {
    let entry = this.constraints.get(name);
    if (!entry) {
      entry = { constraints: [], expressions: [], requestedBy: [] };
      this.constraints.set(name, entry);
    }

    entry.constraints.push(constraint);
    entry.expressions.push(expression);
    entry.requestedBy.push(requestedBy);
  }

  /**
   * Solve every constrained name independently. Names are processed in the
   * order their first constraint arrived, so conflicts are reported in a
   * stable order.
   */
  solve(catalog: VersionCatalog): VersionSolution {
    const resolved = new Map<string, SemanticVersion>();
    const conflicts: DependencyConflict[] = [];

    for (const [name, entry] of this.constraints) {
      const candidates = catalog.candidateVersions(name);
      const selected = highestSatisfying(candidates, entry.constraints);

      if (selected) {
        resolved.set(name, selected);
        continue;
      }

      conflicts.push({
        name,
        constraints: [...entry.expressions],
        requestedBy: [...entry.requestedBy],
        availableVersions: sortVersions(candidates).map(v => v.toString()),
        reason: candidates.length === 0 ? 'no-candidates' : 'unsatisfiable'
      });
    }

    return { resolved, conflicts };
  }

  /**
   * Retrieve the accumulated constraints for one name.
   * Useful for debugging and logging.
   */
  getConstraintsFor(name: string): { expressions: string[]; requestedBy: string[] } | undefined {
    const entry = this.constraints.get(name);
    return entry ? { expressions: [...entry.expressions], requestedBy: [...entry.requestedBy] } : undefined;
  }

  hasConstraints(name: string): boolean {
    return this.constraints.has(name);
  }
}
