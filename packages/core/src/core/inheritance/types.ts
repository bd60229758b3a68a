/**
 * Types for inheritance chain resolution and validation.
 */

import type { LayerkitError, StrategyName, TemplateManifest } from '../../types/index.js';

/**
 * One template in an inheritance chain. The parent is referenced by id and
 * looked up in the owning chain; nodes never point at each other.
 */
export interface InheritanceNode {
  template: TemplateManifest;
  /** Distance from the requested leaf (leaf = 0, root = largest) */
  depth: number;
  /** templateId this template extends; absent on the root */
  parentId?: string;
}

export interface InheritanceResult {
  success: boolean;
  /** Root first, leaf last; empty when resolution failed */
  chain: InheritanceNode[];
  /** Default strategy for files and parameters with no explicit override */
  strategy: StrategyName;
  /** templateIds visited from the leaf, in walk order (kept on failure) */
  path: string[];
  errors: LayerkitError[];
  warnings: string[];
}

export type ValidationSeverity = 'error' | 'warning' | 'info';

export type ValidationRule =
  | 'chain-integrity'
  | 'parameter-type'
  | 'parameter-required'
  | 'parameter-default'
  | 'duplicate-file';

export interface ValidationIssue {
  rule: ValidationRule;
  severity: ValidationSeverity;
  templateId: string;
  message: string;
}

export interface InheritanceValidationResult {
  isValid: boolean;
  issues: ValidationIssue[];
}
