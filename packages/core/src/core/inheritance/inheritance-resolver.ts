import type { LayerkitError, StrategyName, TemplateManifest } from '../../types/index.js';
import { DEFAULT_CONFIG } from '../../constants/index.js';
import { CycleError, DepthExceededError, TemplateNotFoundError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { TemplateStore } from '../store/types.js';
import type { InheritanceNode, InheritanceResult } from './types.js';

/**
 * Walks `extends` references from a leaf template up to its root.
 *
 * The walk stops successfully at a template that extends nothing. It fails on
 * a repeated templateId (cycle), on a parent that would sit deeper than
 * `maxDepth`, or on a reference the store cannot satisfy. Nothing is cached:
 * every call walks the store afresh.
 */
export class InheritanceResolver {
  constructor(private readonly store: TemplateStore) {}

  resolveChain(
    leafTemplateId: string,
    maxDepth: number = DEFAULT_CONFIG.maxDepth,
    strategy: StrategyName = DEFAULT_CONFIG.defaultStrategy
  ): InheritanceResult {
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      return failure(strategy, [], new ValidationError(`maxDepth must be a non-negative integer, got ${maxDepth}`));
    }

    const visited: TemplateManifest[] = [];
    const path: string[] = [];
    let currentId = leafTemplateId;
    let referencedBy: string | undefined;

    for (;;) {
      const depth = path.length;

      const seenAt = path.indexOf(currentId);
      if (seenAt >= 0) {
        const cycle = [...path.slice(seenAt), currentId];
        return failure(strategy, path, new CycleError('inheritance', cycle));
      }

      if (depth > maxDepth) {
        return failure(strategy, path, new DepthExceededError(depth, maxDepth, [...path, currentId]));
      }

      const manifest = this.store.loadManifest(currentId);
      if (!manifest) {
        return failure(strategy, path, new TemplateNotFoundError(currentId, referencedBy));
      }

      visited.push(manifest);
      path.push(currentId);

      if (!manifest.extends) break;

      logger.debug(`Inheritance: '${currentId}' extends '${manifest.extends}' (depth ${depth})`);
      referencedBy = currentId;
      currentId = manifest.extends;
    }

    const chain: InheritanceNode[] = visited
      .map((template, depth) => ({
        template,
        depth,
        parentId: template.extends
      }))
      .reverse();

    logger.info(`Inheritance chain for '${leafTemplateId}': ${chain.map(n => n.template.id).join(' -> ')}`);

    return {
      success: true,
      chain,
      strategy,
      path,
      errors: [],
      warnings: []
    };
  }
}

function failure(strategy: StrategyName, path: string[], error: LayerkitError): InheritanceResult {
  logger.debug(`Inheritance resolution failed: ${error.message}`);
  return {
    success: false,
    chain: [],
    strategy,
    path: [...path],
    errors: [error],
    warnings: []
  };
}

// ---------------------------------------------------------------------------
// Chain lookups (parents are referenced by id)
// ---------------------------------------------------------------------------

export function findNode(chain: readonly InheritanceNode[], templateId: string): InheritanceNode | undefined {
  return chain.find(node => node.template.id === templateId);
}

export function parentOf(chain: readonly InheritanceNode[], node: InheritanceNode): InheritanceNode | undefined {
  return node.parentId === undefined ? undefined : findNode(chain, node.parentId);
}

export function isRoot(node: InheritanceNode): boolean {
  return node.parentId === undefined;
}

/** A leaf is a node no other node in the chain extends. */
export function isLeaf(chain: readonly InheritanceNode[], node: InheritanceNode): boolean {
  return !chain.some(other => other.parentId === node.template.id);
}

/** templateIds from root to leaf */
export function chainIds(chain: readonly InheritanceNode[]): string[] {
  return chain.map(node => node.template.id);
}
