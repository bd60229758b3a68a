// Core types for the layerkit template engine

/**
 * How a dependency participates in resolution.
 * - runtime: expanded transitively and ordered before its dependents
 * - dev: expanded only when declared by a root template
 * - peer: constrains the version of a template someone else brings in
 */
export type DependencyKind = 'runtime' | 'dev' | 'peer';

export const DEPENDENCY_KINDS: readonly DependencyKind[] = ['runtime', 'dev', 'peer'];

/**
 * A dependency declared by a template (or requested directly by the caller).
 * The constraint is kept in its declared textual form; the resolver parses it.
 */
export interface Dependency {
  name: string;
  constraint: string;
  kind: DependencyKind;
  optional: boolean;
  /** templateId of the declaring template; absent for caller-supplied roots */
  declaredBy?: string;
}

/** File merge strategies, applied per output path during composition. */
export type StrategyName = 'replace' | 'override' | 'merge';

export const STRATEGY_NAMES: readonly StrategyName[] = ['replace', 'override', 'merge'];

export function isStrategyName(value: unknown): value is StrategyName {
  return typeof value === 'string' && (STRATEGY_NAMES as readonly string[]).includes(value);
}

export type ParameterType = 'string' | 'number' | 'boolean' | 'enum' | 'list';

export const PARAMETER_TYPES: readonly ParameterType[] = ['string', 'number', 'boolean', 'enum', 'list'];

export type ParameterValue = string | number | boolean | string[];

export interface ParameterDefinition {
  type: ParameterType;
  description?: string;
  default?: ParameterValue;
  required?: boolean;
  /** Allowed values for `enum` parameters */
  choices?: string[];
  /** Regular expression a `string` value must match */
  pattern?: string;
}

/**
 * One template's contribution to one output file.
 * Fragments are frozen when created and never mutated by composition.
 */
export interface CompositionFragment {
  readonly templateId: string;
  readonly filePath: string;
  readonly content: string;
  readonly priority: number;
  /** Explicit per-file strategy; wins over every default */
  readonly strategy?: StrategyName;
  /** Named slot this fragment fills under the merge strategy */
  readonly slot?: string;
}

/**
 * A template definition as supplied by the template store.
 */
export interface TemplateManifest {
  id: string;
  name: string;
  version: string;
  description?: string;
  /** templateId of the parent template */
  extends?: string;
  /** Template-level default strategy for the files it contributes */
  strategy?: StrategyName;
  dependencies: Dependency[];
  files: CompositionFragment[];
  parameters: Record<string, ParameterDefinition>;
}

export interface LayerkitConfig {
  /** Templates directory, relative to the working directory unless absolute */
  templatesDir: string;
  maxDepth: number;
  defaultStrategy: StrategyName;
  /** Glob pattern (matched against the output path) -> strategy */
  fileStrategies: Record<string, StrategyName>;
  includeDev: boolean;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class LayerkitError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'LayerkitError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  PARSE_ERROR = 'PARSE_ERROR',
  CYCLE_DETECTED = 'CYCLE_DETECTED',
  DEPTH_EXCEEDED = 'DEPTH_EXCEEDED',
  UNSATISFIABLE_CONSTRAINT = 'UNSATISFIABLE_CONSTRAINT',
  STRATEGY_CONFLICT = 'STRATEGY_CONFLICT',
  TEMPLATE_NOT_FOUND = 'TEMPLATE_NOT_FOUND',
  INVALID_TEMPLATE = 'INVALID_TEMPLATE',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
