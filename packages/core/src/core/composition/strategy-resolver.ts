import { minimatch } from 'minimatch';
import type { StrategyName, TemplateManifest } from '../../types/index.js';
import { StrategyConflictError } from '../../utils/errors.js';
import type { CompositionConfig, PositionedFragment, StrategySource } from './types.js';

export type StrategyResolution =
  | { ok: true; strategy: StrategyName; source: StrategySource }
  | { ok: false; error: StrategyConflictError };

/**
 * Decide the strategy for one output path.
 *
 * Precedence: explicit strategy on a fragment > template-level strategy of the
 * leaf-most contributing template > first matching `fileStrategies` pattern >
 * `defaultStrategy`. Two different explicit strategies on the same path
 * cannot be ordered and are reported as a conflict.
 */
export function resolveFileStrategy(
  filePath: string,
  entries: readonly PositionedFragment[],
  templates: readonly TemplateManifest[],
  config: CompositionConfig
): StrategyResolution {
  const explicit: Array<{ templateId: string; strategy: StrategyName }> = [];
  for (const { fragment } of entries) {
    if (fragment.strategy && !explicit.some(d => d.strategy === fragment.strategy)) {
      explicit.push({ templateId: fragment.templateId, strategy: fragment.strategy });
    }
  }

  if (explicit.length > 1) {
    return { ok: false, error: new StrategyConflictError(filePath, explicit) };
  }
  if (explicit.length === 1) {
    return { ok: true, strategy: explicit[0].strategy, source: 'explicit' };
  }

  for (let i = entries.length - 1; i >= 0; i--) {
    const template = templates[entries[i].position];
    if (template?.strategy) {
      return { ok: true, strategy: template.strategy, source: 'template' };
    }
  }

  const patterned = matchFileStrategy(filePath, config.fileStrategies);
  if (patterned) {
    return { ok: true, strategy: patterned, source: 'pattern' };
  }

  return { ok: true, strategy: config.defaultStrategy, source: 'default' };
}

/**
 * First pattern (in declaration order) matching the path. Patterns without a
 * slash match the file name anywhere in the tree.
 */
export function matchFileStrategy(
  filePath: string,
  fileStrategies: Record<string, StrategyName> | undefined
): StrategyName | undefined {
  if (!fileStrategies) return undefined;
  for (const [pattern, strategy] of Object.entries(fileStrategies)) {
    if (minimatch(filePath, pattern, { dot: true, matchBase: !pattern.includes('/') })) {
      return strategy;
    }
  }
  return undefined;
}
