/**
 * Types for dependency resolution.
 * Used by dependency-graph, version-solver and dependency-resolver.
 */

import type { Dependency, LayerkitError } from '../../types/index.js';
import type { SemanticVersion } from '../version/semantic-version.js';
import type { DependencyGraph } from './dependency-graph.js';

/**
 * A template in the dependency graph.
 */
export interface DependencyNode {
  /** Unique within a graph */
  templateId: string;
  name: string;
  /** Set by the resolver once a version is selected */
  version?: SemanticVersion;
  /** Dependencies declared by this template's manifest */
  dependencies: Dependency[];
  resolved: boolean;
  /** Discovery index; breaks ties in topological order */
  order: number;
}

export type ConflictReason = 'unsatisfiable' | 'no-candidates' | 'invalid-constraint';

/**
 * A dependency name whose collected constraints no candidate satisfies.
 */
export interface DependencyConflict {
  name: string;
  /** Every constraint declared against the name, as written */
  constraints: string[];
  /** Declaring templateId for each entry of `constraints` */
  requestedBy: string[];
  availableVersions: string[];
  reason: ConflictReason;
}

export interface ResolutionResult {
  /** True when there are no conflicts and no fatal errors */
  success: boolean;
  resolvedVersions: Map<string, SemanticVersion>;
  conflicts: DependencyConflict[];
  /** Dependencies before dependents; empty when resolution was fatal */
  order: string[];
  /** Every cycle found, each as a closed path */
  cycles: string[][];
  /** Fatal problems (cycles, malformed root constraints, safety valve) */
  errors: LayerkitError[];
  warnings: string[];
  /** Milliseconds spent resolving */
  resolutionTime: number;
  /** Absent when resolution was fatal */
  graph?: DependencyGraph;
}

export interface DependencyResolverOptions {
  /** Expand dev dependencies declared by root requests (default: true) */
  includeDev?: boolean;
  /** Safety valve: maximum number of graph nodes (default: 10_000) */
  maxNodes?: number;
}
