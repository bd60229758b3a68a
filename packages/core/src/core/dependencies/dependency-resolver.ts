import { performance } from 'node:perf_hooks';
import type { Dependency, LayerkitError } from '../../types/index.js';
import { DEFAULT_MAX_NODES, ROOT_REQUESTER } from '../../constants/index.js';
import { CycleError, UnsatisfiableConstraintError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { TemplateStore, VersionCatalog } from '../store/types.js';
import { sortVersions } from '../version/semantic-version.js';
import { safeParseConstraint, type VersionConstraint } from '../version/version-constraint.js';
import { DependencyGraph } from './dependency-graph.js';
import { VersionSolver } from './version-solver.js';
import type { DependencyConflict, DependencyResolverOptions, ResolutionResult } from './types.js';

interface PendingDependency {
  dependency: Dependency;
  constraint: VersionConstraint;
  requester: string;
}

/**
 * Resolves a set of requested dependencies into one version per name and an
 * installation order.
 *
 * The graph is expanded breadth-first from the requests: each newly seen name
 * is looked up in the template store and its own declared dependencies are
 * queued. Constraints are collected for every name across the whole graph and
 * solved once expansion is complete, so one unsatisfiable name never hides
 * another. A resolver instance holds no state between resolve() calls.
 */
export class DependencyResolver {
  private readonly includeDev: boolean;
  private readonly maxNodes: number;

  constructor(
    private readonly store: TemplateStore,
    private readonly catalog: VersionCatalog,
    options: DependencyResolverOptions = {}
  ) {
    this.includeDev = options.includeDev ?? true;
    this.maxNodes = options.maxNodes ?? DEFAULT_MAX_NODES;
  }

  resolve(rootDependencies: Dependency[]): ResolutionResult {
    const startTime = performance.now();
    const errors: LayerkitError[] = [];
    const warnings: string[] = [];
    const invalidDeclarations: DependencyConflict[] = [];

    // 1. Root requests: a malformed constraint here is fatal
    const queue: PendingDependency[] = [];
    for (const dependency of rootDependencies) {
      const requester = dependency.declaredBy ?? ROOT_REQUESTER;
      if (dependency.kind === 'dev' && !this.includeDev) {
        logger.debug(`Skipping dev dependency '${dependency.name}' requested by '${requester}'`);
        continue;
      }
      const parsed = safeParseConstraint(dependency.constraint);
      if (!parsed.ok) {
        errors.push(parsed.error);
        continue;
      }
      queue.push({ dependency, constraint: parsed.constraint, requester });
    }

    if (errors.length > 0) {
      logger.debug('Dependency resolution aborted: malformed root constraint', { errors: errors.map(e => e.message) });
      return failedResult(errors, warnings, startTime);
    }

    // 2. Breadth-first expansion
    const graph = new DependencyGraph();
    const solver = new VersionSolver();
    const peers: PendingDependency[] = [];

    for (let head = 0; head < queue.length; head++) {
      const pending = queue[head];
      const { dependency, constraint, requester } = pending;
      const name = dependency.name;

      // Peers only constrain; they are checked once the graph is complete
      if (dependency.kind === 'peer') {
        peers.push(pending);
        continue;
      }

      if (graph.hasNode(name)) {
        solver.addConstraint(name, constraint, dependency.constraint, requester);
        linkRequester(graph, requester, name);
        continue;
      }

      const manifest = this.store.loadManifest(name);
      if (dependency.optional && !manifest && this.catalog.candidateVersions(name).length === 0) {
        warnings.push(
          `Optional dependency '${name}@${dependency.constraint}' requested by '${requester}' is not available; skipped`
        );
        continue;
      }

      if (graph.size >= this.maxNodes) {
        errors.push(new ValidationError(
          `Dependency graph exceeds ${this.maxNodes} templates while adding '${name}' (requested by '${requester}')`,
          { maxNodes: this.maxNodes, name, requester }
        ));
        return failedResult(errors, warnings, startTime);
      }

      graph.addNode(name, manifest?.name ?? name, manifest?.dependencies ?? []);
      solver.addConstraint(name, constraint, dependency.constraint, requester);
      linkRequester(graph, requester, name);

      if (!manifest) {
        logger.debug(`No manifest for '${name}'; treating it as a leaf`);
        continue;
      }

      for (const child of manifest.dependencies) {
        // Dev dependencies only matter to the template being generated
        if (child.kind === 'dev') continue;

        const parsed = safeParseConstraint(child.constraint);
        if (!parsed.ok) {
          logger.warn(`Ignoring dependency '${child.name}' of '${name}': ${parsed.error.message}`);
          invalidDeclarations.push({
            name: child.name,
            constraints: [child.constraint],
            requestedBy: [name],
            availableVersions: sortVersions(this.catalog.candidateVersions(child.name)).map(v => v.toString()),
            reason: 'invalid-constraint'
          });
          continue;
        }
        queue.push({ dependency: child, constraint: parsed.constraint, requester: name });
      }
    }

    // 3. Peer constraints apply only to templates something else brought in
    for (const peer of peers) {
      const name = peer.dependency.name;
      if (graph.hasNode(name)) {
        solver.addConstraint(name, peer.constraint, peer.dependency.constraint, peer.requester);
      } else {
        warnings.push(`Unmet peer dependency '${name}@${peer.dependency.constraint}' requested by '${peer.requester}'`);
      }
    }

    // 4. Highest version satisfying every constraint, per name
    const solution = solver.solve(this.catalog);
    for (const [name, version] of solution.resolved) {
      const node = graph.getNode(name);
      if (node) {
        node.version = version;
        node.resolved = true;
      }
    }
    const conflicts = [...solution.conflicts, ...invalidDeclarations];

    // 5. Cycles abort ordering
    const cycles = graph.detectCycles();
    for (const cycle of cycles) {
      errors.push(new CycleError('dependency', cycle));
    }

    // 6. Installation order
    const fatal = errors.length > 0;
    const order = fatal ? [] : graph.topologicalOrder();
    const resolutionTime = performance.now() - startTime;

    logger.info(
      `Dependency resolution complete: ${graph.size} templates, ${conflicts.length} conflicts, ${cycles.length} cycles`
    );

    return {
      success: !fatal && conflicts.length === 0,
      resolvedVersions: solution.resolved,
      conflicts,
      order,
      cycles,
      errors,
      warnings,
      resolutionTime,
      graph: fatal ? undefined : graph
    };
  }
}

/**
 * Build the error describing a conflict, for reporting layers.
 */
export function conflictToError(conflict: DependencyConflict): UnsatisfiableConstraintError {
  return new UnsatisfiableConstraintError(conflict.name, {
    constraints: conflict.constraints,
    requestedBy: conflict.requestedBy,
    availableVersions: conflict.availableVersions
  });
}

function linkRequester(graph: DependencyGraph, requester: string, name: string): void {
  if (graph.hasNode(requester)) {
    graph.addEdge(requester, name);
  }
}

function failedResult(errors: LayerkitError[], warnings: string[], startTime: number): ResolutionResult {
  return {
    success: false,
    resolvedVersions: new Map(),
    conflicts: [],
    order: [],
    cycles: [],
    errors,
    warnings,
    resolutionTime: performance.now() - startTime
  };
}
