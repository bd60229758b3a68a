/**
 * Generation pipeline: inheritance -> validation -> dependencies -> composition.
 *
 * Produces a GenerationPlan describing everything `generate` would write,
 * without touching disk. A failed inheritance stage stops the pipeline;
 * later stages always run so every problem is reported in one pass.
 */

import type { LayerkitConfig, LayerkitError } from '../../types/index.js';
import { DEFAULT_CONFIG } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { CompositionEngine } from '../composition/composition-engine.js';
import { collectDependencies } from '../composition/parameter-merger.js';
import type { CompositionResult } from '../composition/types.js';
import { DependencyResolver, conflictToError } from '../dependencies/dependency-resolver.js';
import type { ResolutionResult } from '../dependencies/types.js';
import { InheritanceResolver } from '../inheritance/inheritance-resolver.js';
import { validateInheritanceChain } from '../inheritance/inheritance-validator.js';
import type { InheritanceResult, InheritanceValidationResult } from '../inheritance/types.js';
import type { ProgressPort } from '../ports/progress.js';
import { progressEvent } from '../ports/progress.js';
import { resolveProgress } from '../ports/resolve.js';
import type { TemplateStore, VersionCatalog } from '../store/types.js';

export interface GenerationPlan {
  templateId: string;
  /** True when every stage succeeded */
  success: boolean;
  inheritance: InheritanceResult;
  /** Absent when inheritance failed */
  validation?: InheritanceValidationResult;
  resolution?: ResolutionResult;
  composition?: CompositionResult;
  /** Every error from every stage, in stage order */
  errors: LayerkitError[];
  /** Every warning from every stage, in stage order */
  warnings: string[];
}

export interface GenerationPipelineOptions {
  config?: Partial<LayerkitConfig>;
  progress?: ProgressPort;
}

export function generatePlan(
  templateId: string,
  source: TemplateStore & VersionCatalog,
  options: GenerationPipelineOptions = {}
): GenerationPlan {
  const config: LayerkitConfig = { ...DEFAULT_CONFIG, ...options.config };
  const progress = resolveProgress(options);
  progress.emit(progressEvent({ type: 'pipeline:start', template: templateId }));

  const errors: LayerkitError[] = [];
  const warnings: string[] = [];

  // Stage diagnostics go into the plan and out through the progress log
  const record = (stageErrors: readonly LayerkitError[], stageWarnings: readonly string[]): void => {
    for (const warning of stageWarnings) {
      warnings.push(warning);
      progress.log('warn', warning);
    }
    for (const error of stageErrors) {
      errors.push(error);
      progress.log('error', error.message);
    }
  };

  // 1. Inheritance
  progress.emit(progressEvent({ type: 'pipeline:stage', stage: 'inheritance', status: 'started' }));
  const inheritance = new InheritanceResolver(source).resolveChain(templateId, config.maxDepth, config.defaultStrategy);
  record(inheritance.errors, inheritance.warnings);

  if (!inheritance.success) {
    progress.emit(progressEvent({
      type: 'pipeline:stage',
      stage: 'inheritance',
      status: 'failed',
      detail: inheritance.errors[0]?.message
    }));
    progress.emit(progressEvent({ type: 'pipeline:complete', template: templateId, success: false }));
    return { templateId, success: false, inheritance, errors, warnings };
  }
  progress.emit(progressEvent({
    type: 'pipeline:stage',
    stage: 'inheritance',
    status: 'completed',
    detail: `${inheritance.chain.length} template(s)`
  }));

  // 2. Validation (only chain-integrity errors fail the plan)
  progress.emit(progressEvent({ type: 'pipeline:stage', stage: 'validation', status: 'started' }));
  const validation = validateInheritanceChain(inheritance.chain);
  record(
    validation.issues
      .filter(issue => issue.severity === 'error')
      .map(issue => new ValidationError(issue.message, { rule: issue.rule, templateId: issue.templateId })),
    validation.issues.filter(issue => issue.severity !== 'error').map(issue => issue.message)
  );
  progress.emit(progressEvent({
    type: 'pipeline:stage',
    stage: 'validation',
    status: validation.isValid ? 'completed' : 'failed',
    detail: `${validation.issues.length} issue(s)`
  }));

  // 3. Dependencies declared anywhere in the chain
  progress.emit(progressEvent({ type: 'pipeline:stage', stage: 'dependencies', status: 'started' }));
  const resolution = new DependencyResolver(source, source, { includeDev: config.includeDev })
    .resolve(collectDependencies(inheritance.chain));
  record([...resolution.errors, ...resolution.conflicts.map(conflictToError)], resolution.warnings);
  progress.emit(progressEvent({
    type: 'pipeline:stage',
    stage: 'dependencies',
    status: resolution.success ? 'completed' : 'failed',
    detail: `${resolution.resolvedVersions.size} resolved, ${resolution.conflicts.length} conflict(s)`
  }));

  // 4. Composition; the inheritance strategy is the default for every file
  progress.emit(progressEvent({ type: 'pipeline:stage', stage: 'composition', status: 'started' }));
  const composition = new CompositionEngine().compose(inheritance.chain, {
    defaultStrategy: inheritance.strategy,
    fileStrategies: config.fileStrategies
  });
  record(composition.errors, composition.warnings);
  progress.emit(progressEvent({
    type: 'pipeline:stage',
    stage: 'composition',
    status: composition.success ? 'completed' : 'failed',
    detail: `${composition.processedFiles.length} file(s)`
  }));

  const success = validation.isValid && resolution.success && composition.success;
  logger.info(`Plan for '${templateId}': ${success ? 'ok' : 'failed'}`, { errors: errors.length, warnings: warnings.length });
  progress.emit(progressEvent({ type: 'pipeline:complete', template: templateId, success }));

  return { templateId, success, inheritance, validation, resolution, composition, errors, warnings };
}
