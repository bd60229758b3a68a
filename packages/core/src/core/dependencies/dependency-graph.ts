import type { Dependency } from '../../types/index.js';
import { CycleError, ValidationError } from '../../utils/errors.js';
import type { DependencyNode } from './types.js';

/**
 * Directed graph of templates and their ordering edges.
 *
 * Edges point from a dependent to its dependency. Inserting an edge never
 * checks for cycles: cycles are found (all of them) by detectCycles(), and
 * topologicalOrder() refuses to produce an order while any exist.
 */
export class DependencyGraph {
  private readonly nodes = new Map<string, DependencyNode>();
  private readonly edges = new Map<string, string[]>();
  private readonly dependents = new Map<string, string[]>();

  addNode(templateId: string, name: string, dependencies: Dependency[] = []): DependencyNode {
    if (this.nodes.has(templateId)) {
      throw new ValidationError(`Dependency graph already contains '${templateId}'`, { templateId });
    }

    const node: DependencyNode = {
      templateId,
      name,
      dependencies,
      resolved: false,
      order: this.nodes.size
    };
    this.nodes.set(templateId, node);
    this.edges.set(templateId, []);
    this.dependents.set(templateId, []);
    return node;
  }

  /**
   * Record that `fromId` depends on `toId`. Both nodes must exist; repeated
   * edges are ignored.
   */
  addEdge(fromId: string, toId: string): void {
    const targets = this.edges.get(fromId);
    const sources = this.dependents.get(toId);
    if (!targets || !sources) {
      throw new ValidationError(`Cannot add edge ${fromId} -> ${toId}: unknown node`, { fromId, toId });
    }
    if (!targets.includes(toId)) {
      targets.push(toId);
      sources.push(fromId);
    }
  }

  hasNode(templateId: string): boolean {
    return this.nodes.has(templateId);
  }

  getNode(templateId: string): DependencyNode | undefined {
    return this.nodes.get(templateId);
  }

  /** Nodes in discovery order */
  getNodes(): DependencyNode[] {
    return Array.from(this.nodes.values());
  }

  get size(): number {
    return this.nodes.size;
  }

  dependenciesOf(templateId: string): string[] {
    return [...(this.edges.get(templateId) ?? [])];
  }

  dependentsOf(templateId: string): string[] {
    return [...(this.dependents.get(templateId) ?? [])];
  }

  /**
   * Find every cycle reachable by depth-first search, each reported as a closed
   * path such as [A, B, C, A]. A cycle reached from several entry points is
   * reported once.
   */
  detectCycles(): string[][] {
    const visited = new Set<string>();
    const visiting = new Set<string>();
    const cycles: string[][] = [];
    const seen = new Set<string>();

    for (const start of this.nodes.keys()) {
      if (visited.has(start)) continue;

      const path: string[] = [start];
      const stack: Array<{ id: string; next: number }> = [{ id: start, next: 0 }];
      visiting.add(start);

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        const targets = this.edges.get(frame.id) ?? [];

        if (frame.next >= targets.length) {
          stack.pop();
          path.pop();
          visiting.delete(frame.id);
          visited.add(frame.id);
          continue;
        }

        const target = targets[frame.next];
        frame.next++;

        if (visiting.has(target)) {
          const cycle = [...path.slice(path.indexOf(target)), target];
          const key = canonicalCycleKey(cycle);
          if (!seen.has(key)) {
            seen.add(key);
            cycles.push(cycle);
          }
        } else if (!visited.has(target)) {
          visiting.add(target);
          path.push(target);
          stack.push({ id: target, next: 0 });
        }
      }
    }

    return cycles;
  }

  /**
   * Kahn's algorithm, dependencies first. Among nodes that are ready at the
   * same time the earliest discovered goes first, so the same graph always
   * yields the same order.
   */
  topologicalOrder(): string[] {
    const cycles = this.detectCycles();
    if (cycles.length > 0) {
      throw new CycleError('dependency', cycles[0]);
    }

    const remaining = new Map<string, number>();
    const ready: DependencyNode[] = [];
    for (const node of this.nodes.values()) {
      const count = this.edges.get(node.templateId)?.length ?? 0;
      remaining.set(node.templateId, count);
      if (count === 0) {
        ready.push(node);
      }
    }

    const order: string[] = [];
    while (ready.length > 0) {
      ready.sort((a, b) => a.order - b.order);
      const next = ready.shift();
      if (!next) break;
      order.push(next.templateId);

      for (const dependentId of this.dependents.get(next.templateId) ?? []) {
        const left = (remaining.get(dependentId) ?? 0) - 1;
        remaining.set(dependentId, left);
        if (left === 0) {
          const dependent = this.nodes.get(dependentId);
          if (dependent) {
            ready.push(dependent);
          }
        }
      }
    }

    return order;
  }
}

/**
 * Rotation-independent key for a closed cycle path.
 */
function canonicalCycleKey(cycle: string[]): string {
  const members = cycle.slice(0, -1);
  let best = 0;
  for (let i = 1; i < members.length; i++) {
    if (members[i] < members[best]) {
      best = i;
    }
  }
  return [...members.slice(best), ...members.slice(0, best)].join('\u0000');
}
