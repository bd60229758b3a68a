import type { LayerkitError, StrategyName } from '../../types/index.js';
import { DEFAULT_CONFIG, SLOTS } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { InheritanceNode } from '../inheritance/types.js';
import { collectDependencies, mergeParameters } from './parameter-merger.js';
import { mergeWithSlots } from './slot-system.js';
import { resolveFileStrategy } from './strategy-resolver.js';
import type {
  ComposedFile,
  CompositionConfig,
  CompositionResult,
  PositionedFragment,
  ShadowedFragment
} from './types.js';

interface AppliedFile {
  file: ComposedFile;
  shadowed: ShadowedFragment[];
  warnings: string[];
}

/**
 * Folds a root-first inheritance chain into one composed template.
 *
 * Fragments are grouped by output path; each path gets exactly one strategy
 * and the strategy decides how its fragments combine. A strategy conflict on
 * one path skips that path and the rest still compose. Inputs are only read.
 */
export class CompositionEngine {
  compose(
    chain: readonly InheritanceNode[],
    config: CompositionConfig = { defaultStrategy: DEFAULT_CONFIG.defaultStrategy }
  ): CompositionResult {
    const result: CompositionResult = {
      success: true,
      appliedStrategies: new Map(),
      processedFiles: [],
      shadowedFragments: [],
      errors: [],
      warnings: []
    };

    if (chain.length === 0) {
      result.success = false;
      result.errors.push(new ValidationError('Cannot compose an empty inheritance chain'));
      return result;
    }

    const templates = chain.map(node => node.template);
    const leaf = templates[templates.length - 1];
    const byPath = groupByPath(chain);
    const files: ComposedFile[] = [];
    const errors: LayerkitError[] = [];

    for (const [filePath, entries] of byPath) {
      const resolution = resolveFileStrategy(filePath, entries, templates, config);
      if (!resolution.ok) {
        logger.warn(resolution.error.message);
        errors.push(resolution.error);
        continue;
      }

      logger.debug(`Composing '${filePath}' with '${resolution.strategy}' (${resolution.source})`);
      const applied = this.applyStrategy(resolution.strategy, filePath, entries, config);

      files.push(applied.file);
      result.appliedStrategies.set(filePath, resolution.strategy);
      result.processedFiles.push(filePath);
      result.shadowedFragments.push(...applied.shadowed);
      result.warnings.push(...applied.warnings);
    }

    const { parameters, sources } = mergeParameters(chain);

    result.errors = errors;
    result.success = errors.length === 0;
    result.composedTemplate = {
      id: leaf.id,
      name: leaf.name,
      version: leaf.version,
      ...(leaf.description !== undefined ? { description: leaf.description } : {}),
      chain: templates.map(t => t.id),
      files,
      parameters,
      parameterSources: sources,
      dependencies: collectDependencies(chain)
    };

    logger.info(
      `Composed '${leaf.id}': ${files.length} file(s), ${result.shadowedFragments.length} shadowed, ${errors.length} conflict(s)`
    );

    return result;
  }

  private applyStrategy(
    strategy: StrategyName,
    filePath: string,
    entries: readonly PositionedFragment[],
    config: CompositionConfig
  ): AppliedFile {
    switch (strategy) {
      case 'replace':
      case 'override': {
        const survivor = entries[entries.length - 1];
        const shadowed: ShadowedFragment[] = entries.slice(0, -1).map(({ fragment }) => ({
          filePath,
          templateId: fragment.templateId,
          shadowedBy: survivor.fragment.templateId,
          strategy
        }));
        const warnings =
          strategy === 'override'
            ? shadowed.map(s => `'${filePath}' from '${s.shadowedBy}' overrides the version from '${s.templateId}'`)
            : [];
        return {
          file: {
            path: filePath,
            content: survivor.fragment.content,
            strategy,
            contributors: [survivor.fragment.templateId]
          },
          shadowed,
          warnings
        };
      }
      case 'merge': {
        const merged = mergeWithSlots(filePath, entries, config.slotSeparator ?? SLOTS.SEPARATOR);
        return {
          file: { path: filePath, content: merged.content, strategy, contributors: merged.contributors },
          shadowed: [],
          warnings: merged.warnings
        };
      }
    }
  }
}

/**
 * Fragments grouped by output path, paths in first-declaration order and
 * fragments in chain order (root first).
 */
function groupByPath(chain: readonly InheritanceNode[]): Map<string, PositionedFragment[]> {
  const byPath = new Map<string, PositionedFragment[]>();
  chain.forEach(({ template }, position) => {
    for (const fragment of template.files) {
      const entries = byPath.get(fragment.filePath) ?? [];
      entries.push({ fragment, position });
      byPath.set(fragment.filePath, entries);
    }
  });
  return byPath;
}
