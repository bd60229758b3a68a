import { LayerkitError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the layerkit engine and CLI
 */

export class ParseError extends LayerkitError {
  readonly reason: string;

  constructor(input: string, reason: string) {
    super(`Cannot parse '${input}': ${reason}`, ErrorCodes.PARSE_ERROR, { input, reason });
    this.name = 'ParseError';
    this.reason = reason;
  }
}

/**
 * A dependency or inheritance cycle. `path` is closed: it starts and ends
 * with the same templateId.
 */
export class CycleError extends LayerkitError {
  readonly path: string[];

  constructor(kind: 'dependency' | 'inheritance', path: string[]) {
    super(`Circular ${kind} detected: ${path.join(' -> ')}`, ErrorCodes.CYCLE_DETECTED, { kind, path });
    this.name = 'CycleError';
    this.path = path;
  }
}

export class DepthExceededError extends LayerkitError {
  readonly depth: number;
  readonly maxDepth: number;
  readonly path: string[];

  constructor(depth: number, maxDepth: number, path: string[]) {
    super(
      `Inheritance depth ${depth} exceeds maximum of ${maxDepth}: ${path.join(' -> ')}`,
      ErrorCodes.DEPTH_EXCEEDED,
      { depth, maxDepth, path }
    );
    this.name = 'DepthExceededError';
    this.depth = depth;
    this.maxDepth = maxDepth;
    this.path = path;
  }
}

export class UnsatisfiableConstraintError extends LayerkitError {
  constructor(
    name: string,
    details: {
      constraints: string[];
      requestedBy: string[];
      availableVersions?: string[];
    }
  ) {
    const requests = details.constraints
      .map((constraint, i) => `${constraint} (from ${details.requestedBy[i] ?? 'unknown'})`)
      .join(', ');
    const msg = `No version of '${name}' satisfies ${requests}${details.availableVersions?.length ? `. Available: ${details.availableVersions.join(', ')}` : '. No versions available'}`;
    super(msg, ErrorCodes.UNSATISFIABLE_CONSTRAINT, { name, ...details });
    this.name = 'UnsatisfiableConstraintError';
  }
}

export class StrategyConflictError extends LayerkitError {
  readonly filePath: string;
  readonly templates: string[];
  readonly strategies: string[];

  constructor(filePath: string, declarations: Array<{ templateId: string; strategy: string }>) {
    const listed = declarations.map(d => `'${d.strategy}' (${d.templateId})`).join(' vs ');
    super(
      `Conflicting explicit strategies for '${filePath}': ${listed}`,
      ErrorCodes.STRATEGY_CONFLICT,
      { filePath, declarations }
    );
    this.name = 'StrategyConflictError';
    this.filePath = filePath;
    this.templates = declarations.map(d => d.templateId);
    this.strategies = declarations.map(d => d.strategy);
  }
}

export class TemplateNotFoundError extends LayerkitError {
  constructor(templateId: string, referencedBy?: string) {
    super(
      referencedBy
        ? `Template '${templateId}' not found (extended by '${referencedBy}')`
        : `Template '${templateId}' not found`,
      ErrorCodes.TEMPLATE_NOT_FOUND,
      { templateId, referencedBy }
    );
    this.name = 'TemplateNotFoundError';
  }
}

export class InvalidTemplateError extends LayerkitError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid template: ${reason}`, ErrorCodes.INVALID_TEMPLATE, details);
    this.name = 'InvalidTemplateError';
  }
}

export class FileSystemError extends LayerkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends LayerkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends LayerkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof LayerkitError) {
    // Details only surface in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Normalize a caught value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
