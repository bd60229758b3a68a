/**
 * Types for template composition.
 */

import type {
  CompositionFragment,
  Dependency,
  LayerkitError,
  ParameterDefinition,
  StrategyName
} from '../../types/index.js';

export interface CompositionConfig {
  /** Strategy for paths with no explicit, template-level or pattern strategy */
  defaultStrategy: StrategyName;
  /** Glob pattern (matched against the output path) -> strategy */
  fileStrategies?: Record<string, StrategyName>;
  /** Joins slot contributions under the merge strategy (default: newline) */
  slotSeparator?: string;
}

/** Where the strategy applied to a path came from, most specific first. */
export type StrategySource = 'explicit' | 'template' | 'pattern' | 'default';

/** A fragment together with its position in the root-first chain. */
export interface PositionedFragment {
  fragment: CompositionFragment;
  position: number;
}

export interface ComposedFile {
  path: string;
  content: string;
  strategy: StrategyName;
  /** templateIds whose fragments ended up in the content, root first */
  contributors: string[];
}

export interface ComposedTemplate {
  /** The leaf templateId */
  id: string;
  name: string;
  version: string;
  description?: string;
  /** templateIds from root to leaf */
  chain: string[];
  files: ComposedFile[];
  parameters: Record<string, ParameterDefinition>;
  /** Parameter name -> templateId whose definition won */
  parameterSources: Record<string, string>;
  /** Every dependency declared anywhere in the chain, root first */
  dependencies: Dependency[];
}

/**
 * A fragment that did not reach the output because a later template's
 * fragment for the same path replaced or overrode it.
 */
export interface ShadowedFragment {
  filePath: string;
  templateId: string;
  shadowedBy: string;
  strategy: Extract<StrategyName, 'replace' | 'override'>;
}

export interface CompositionResult {
  success: boolean;
  /** Absent only when there was nothing to compose */
  composedTemplate?: ComposedTemplate;
  appliedStrategies: Map<string, StrategyName>;
  processedFiles: string[];
  shadowedFragments: ShadowedFragment[];
  errors: LayerkitError[];
  warnings: string[];
}
