/**
 * @layerkit/core - template resolution, inheritance and composition engine.
 *
 * Has no terminal/UI dependencies: all user-facing output goes through the
 * OutputPort and ProgressPort interfaces, so the same engine drives the CLI,
 * CI jobs and tests.
 */

// ============================================================================
// Port Interfaces
// ============================================================================

export * from './core/ports/index.js';

// ============================================================================
// Execution Context & Configuration
// ============================================================================

export type { ExecutionContext } from './types/execution-context.js';
export { createExecutionContext, type ExecutionOptions } from './core/execution-context.js';
export { loadConfig, parseConfig, findConfigFile, type LoadedConfig } from './core/config.js';

// ============================================================================
// Versions
// ============================================================================

export { SemanticVersion, sortVersions, type VersionParseOutcome } from './core/version/semantic-version.js';
export {
  type VersionConstraint,
  type RangeConstraint,
  type ConstraintParseOutcome,
  exact,
  compatible,
  tilde,
  range,
  ANY_VERSION,
  allows,
  formatConstraint,
  parseConstraint,
  safeParseConstraint,
  highestSatisfying,
} from './core/version/version-constraint.js';

// ============================================================================
// Dependencies
// ============================================================================

export { DependencyGraph } from './core/dependencies/dependency-graph.js';
export { VersionSolver } from './core/dependencies/version-solver.js';
export { DependencyResolver, conflictToError } from './core/dependencies/dependency-resolver.js';
export type {
  DependencyNode,
  DependencyConflict,
  ConflictReason,
  ResolutionResult,
  DependencyResolverOptions,
} from './core/dependencies/types.js';

// ============================================================================
// Inheritance
// ============================================================================

export {
  InheritanceResolver,
  findNode,
  parentOf,
  isRoot,
  isLeaf,
  chainIds,
} from './core/inheritance/inheritance-resolver.js';
export { validateInheritanceChain } from './core/inheritance/inheritance-validator.js';
export type {
  InheritanceNode,
  InheritanceResult,
  InheritanceValidationResult,
  ValidationIssue,
  ValidationRule,
  ValidationSeverity,
} from './core/inheritance/types.js';

// ============================================================================
// Composition
// ============================================================================

export { CompositionEngine } from './core/composition/composition-engine.js';
export { SlotSystem, mergeWithSlots, findSlotMarkers, hasSlotMarkers } from './core/composition/slot-system.js';
export { mergeParameters, collectDependencies, type MergedParameters } from './core/composition/parameter-merger.js';
export { resolveFileStrategy, matchFileStrategy, type StrategyResolution } from './core/composition/strategy-resolver.js';
export type {
  CompositionConfig,
  CompositionResult,
  ComposedTemplate,
  ComposedFile,
  ShadowedFragment,
  StrategySource,
} from './core/composition/types.js';

// ============================================================================
// Template Store
// ============================================================================

export type { TemplateStore, VersionCatalog } from './core/store/types.js';
export { TemplateRegistry, createFragment, type FragmentInput } from './core/store/template-registry.js';
export { parseManifest, buildManifest, parseDependencyString } from './core/store/manifest-parser.js';
export { loadTemplateRepository, parseCatalog } from './core/store/template-repository.js';

// ============================================================================
// Pipeline & Emission
// ============================================================================

export { generatePlan, type GenerationPlan, type GenerationPipelineOptions } from './core/pipeline/generation-pipeline.js';
export { emitComposedTemplate, type EmitOptions, type EmitResult, type EmittedFile } from './core/emission/emitter.js';

// ============================================================================
// Types, Errors & Logging
// ============================================================================

export * from './types/index.js';
export * from './utils/errors.js';
export { logger, ConsoleLogger } from './utils/logger.js';
export { FILE_PATTERNS, TEMPLATE_DIRS, SLOTS, DEFAULT_CONFIG, ROOT_REQUESTER } from './constants/index.js';
