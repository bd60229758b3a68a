import * as yaml from 'js-yaml';
import type {
  CompositionFragment,
  Dependency,
  DependencyKind,
  ParameterDefinition,
  ParameterType,
  ParameterValue,
  StrategyName,
  TemplateManifest
} from '../../types/index.js';
import { DEPENDENCY_KINDS, PARAMETER_TYPES, isStrategyName } from '../../types/index.js';
import { InvalidTemplateError } from '../../utils/errors.js';
import { SemanticVersion } from '../version/semantic-version.js';
import { createFragment } from './template-registry.js';

/**
 * Parsing and validation of template.yml.
 *
 * ```yaml
 * name: Web App
 * version: 1.2.0
 * extends: base
 * strategy: override
 * dependencies:
 *   - shared-lib@^1.0.0
 *   - { name: lint-rules, version: "~2.1.0", kind: dev, optional: true }
 * parameters:
 *   projectName: { type: string, required: true, pattern: "^[a-z-]+$" }
 * files:
 *   - path: README.md
 *     source: README.usage.md
 *     slot: usage
 *     priority: 10
 * ```
 *
 * File content lives under the template's files/ directory; a `files` entry
 * only adds options (or inline `content`) to an output path.
 */

/** A `files` entry before its content is attached. */
export interface FileDeclaration {
  path: string;
  /** File under files/ holding the content; defaults to `path` */
  source?: string;
  /** Inline content; wins over `source` */
  content?: string;
  priority: number;
  strategy?: StrategyName;
  slot?: string;
}

export interface ManifestDocument {
  manifest: Omit<TemplateManifest, 'files'>;
  files: FileDeclaration[];
}

type RawRecord = Record<string, unknown>;

export function parseManifest(text: string, templateId: string, sourcePath: string = 'template.yml'): ManifestDocument {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.reason : String(error);
    throw new InvalidTemplateError(`${sourcePath}: ${reason}`, { templateId });
  }

  const fail = (reason: string): never => {
    throw new InvalidTemplateError(`${sourcePath}: ${reason}`, { templateId });
  };

  if (!isRecord(raw)) {
    return fail('expected a mapping at the top level');
  }

  const version = raw.version;
  if (typeof version !== 'string') {
    return fail(`'version' must be a semantic version string (got ${JSON.stringify(version ?? null)})`);
  }
  const parsedVersion = SemanticVersion.safeParse(version);
  if (!parsedVersion.ok) {
    return fail(`'version' ${JSON.stringify(version)} is not a semantic version: ${parsedVersion.error.reason}`);
  }

  const name = optionalString(raw, 'name', fail) ?? templateId;
  const description = optionalString(raw, 'description', fail);
  const parent = optionalString(raw, 'extends', fail);

  let strategy: StrategyName | undefined;
  if (raw.strategy !== undefined) {
    if (!isStrategyName(raw.strategy)) {
      return fail(`'strategy' must be one of replace, override, merge`);
    }
    strategy = raw.strategy;
  }

  if (parent === templateId) {
    return fail(`template cannot extend itself`);
  }

  return {
    manifest: {
      id: templateId,
      name,
      version,
      ...(description !== undefined ? { description } : {}),
      ...(parent !== undefined ? { extends: parent } : {}),
      ...(strategy !== undefined ? { strategy } : {}),
      dependencies: parseDependencies(raw.dependencies, templateId, fail),
      parameters: parseParameters(raw.parameters, fail)
    },
    files: parseFileDeclarations(raw.files, fail)
  };
}

/**
 * Parse `name` or `name@constraint`. A bare name accepts
 * any version.
 */
export function parseDependencyString(entry: string): { name: string; constraint: string } {
  const trimmed = entry.trim();
  const at = trimmed.lastIndexOf('@');
  if (at <= 0) {
    return { name: trimmed, constraint: '*' };
  }
  return { name: trimmed.slice(0, at), constraint: trimmed.slice(at + 1).trim() || '*' };
}

function parseDependencies(value: unknown, templateId: string, fail: (reason: string) => never): Dependency[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) return fail(`'dependencies' must be a list`);

  return value.map((entry: unknown, index): Dependency => {
    if (typeof entry === 'string') {
      const { name, constraint } = parseDependencyString(entry);
      if (!name) fail(`dependencies[${index}] has no name`);
      return { name, constraint, kind: 'runtime', optional: false, declaredBy: templateId };
    }

    if (!isRecord(entry)) return fail(`dependencies[${index}] must be a string or a mapping`);

    const name = entry.name;
    if (typeof name !== 'string' || name.trim() === '') {
      return fail(`dependencies[${index}] requires a 'name'`);
    }

    const constraint = entry.version ?? entry.constraint ?? '*';
    if (typeof constraint !== 'string') {
      return fail(`dependencies[${index}] ('${name}'): version constraint must be a string`);
    }

    const kind = entry.kind ?? 'runtime';
    if (!isDependencyKind(kind)) {
      return fail(`dependencies[${index}] ('${name}'): kind must be one of ${DEPENDENCY_KINDS.join(', ')}`);
    }

    const optional = entry.optional ?? false;
    if (typeof optional !== 'boolean') {
      return fail(`dependencies[${index}] ('${name}'): optional must be a boolean`);
    }

    return { name: name.trim(), constraint, kind, optional, declaredBy: templateId };
  });
}

function parseParameters(
  value: unknown,
  fail: (reason: string) => never
): Record<string, ParameterDefinition> {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) return fail(`'parameters' must be a mapping`);

  const parameters: Record<string, ParameterDefinition> = {};
  for (const [paramName, rawDefinition] of Object.entries(value)) {
    const label = `parameters.${paramName}`;
    if (!isRecord(rawDefinition)) return fail(`${label} must be a mapping`);

    const type = rawDefinition.type ?? 'string';
    if (!isParameterType(type)) {
      return fail(`${label}.type must be one of ${PARAMETER_TYPES.join(', ')}`);
    }

    const definition: ParameterDefinition = { type };

    const description = optionalString(rawDefinition, 'description', fail, label);
    if (description !== undefined) definition.description = description;

    if (rawDefinition.required !== undefined) {
      if (typeof rawDefinition.required !== 'boolean') return fail(`${label}.required must be a boolean`);
      definition.required = rawDefinition.required;
    }

    if (rawDefinition.choices !== undefined) {
      if (!isStringArray(rawDefinition.choices)) return fail(`${label}.choices must be a list of strings`);
      definition.choices = [...rawDefinition.choices];
    }
    if (type === 'enum' && !definition.choices?.length) {
      return fail(`${label}: enum parameters need 'choices'`);
    }

    const pattern = optionalString(rawDefinition, 'pattern', fail, label);
    if (pattern !== undefined) {
      try {
        new RegExp(pattern);
      } catch {
        return fail(`${label}.pattern is not a valid regular expression`);
      }
      definition.pattern = pattern;
    }

    if (rawDefinition.default !== undefined) {
      if (!isParameterValue(rawDefinition.default)) {
        return fail(`${label}.default must be a string, number, boolean or list of strings`);
      }
      definition.default = rawDefinition.default;
    }

    parameters[paramName] = definition;
  }

  return parameters;
}

function parseFileDeclarations(value: unknown, fail: (reason: string) => never): FileDeclaration[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) return fail(`'files' must be a list`);

  return value.map((entry: unknown, index): FileDeclaration => {
    const label = `files[${index}]`;
    if (!isRecord(entry)) return fail(`${label} must be a mapping`);

    const path = entry.path;
    if (typeof path !== 'string' || path.trim() === '') return fail(`${label} requires a 'path'`);
    if (!isSafeRelativePath(path)) return fail(`${label}.path must stay inside the output directory`);

    const priority = entry.priority ?? 0;
    if (typeof priority !== 'number' || !Number.isFinite(priority)) {
      return fail(`${label}.priority must be a number`);
    }

    const declaration: FileDeclaration = { path, priority };

    const source = optionalString(entry, 'source', fail, label);
    if (source !== undefined) declaration.source = source;

    const content = optionalString(entry, 'content', fail, label);
    if (content !== undefined) declaration.content = content;

    if (entry.strategy !== undefined) {
      if (!isStrategyName(entry.strategy)) return fail(`${label}.strategy must be one of replace, override, merge`);
      declaration.strategy = entry.strategy;
    }

    const slot = optionalString(entry, 'slot', fail, label);
    if (slot !== undefined) declaration.slot = slot;

    return declaration;
  });
}

/**
 * Attach content to a parsed manifest.
 *
 * Every file under files/ becomes a fragment at its own path unless a
 * declaration claims it: by naming it as `source`, or by declaring the
 * same path without a source or inline content.
 */
export function buildManifest(document: ManifestDocument, fileContents: ReadonlyMap<string, string>): TemplateManifest {
  const templateId = document.manifest.id;
  const claimed = new Set<string>();
  const declared: CompositionFragment[] = [];

  for (const declaration of document.files) {
    let content = declaration.content;
    if (content === undefined) {
      const source = declaration.source ?? declaration.path;
      content = fileContents.get(source);
      if (content === undefined) {
        throw new InvalidTemplateError(`'${templateId}' declares '${declaration.path}' but files/${source} does not exist`, {
          templateId,
          source
        });
      }
      claimed.add(source);
    }

    declared.push(
      createFragment({
        templateId,
        filePath: declaration.path,
        content,
        priority: declaration.priority,
        strategy: declaration.strategy,
        slot: declaration.slot
      })
    );
  }

  const discovered = Array.from(fileContents.entries())
    .filter(([path]) => !claimed.has(path))
    .map(([path, content]) => createFragment({ templateId, filePath: path, content }));

  return { ...document.manifest, files: [...discovered, ...declared] };
}

function optionalString(
  record: RawRecord,
  key: string,
  fail: (reason: string) => never,
  label?: string
): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') return fail(`${label ? `${label}.` : ''}${key} must be a string`);
  return value;
}

function isSafeRelativePath(path: string): boolean {
  if (path.startsWith('/') || /^[A-Za-z]:/.test(path)) return false;
  return !path.split(/[\\/]/).includes('..');
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isParameterValue(value: unknown): value is ParameterValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || isStringArray(value);
}

function isParameterType(value: unknown): value is ParameterType {
  return PARAMETER_TYPES.some(type => type === value);
}

function isDependencyKind(value: unknown): value is DependencyKind {
  return DEPENDENCY_KINDS.some(kind => kind === value);
}
