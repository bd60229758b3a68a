import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type {
  CompositionFragment,
  Dependency,
  DependencyKind,
  ParameterDefinition,
  StrategyName,
  TemplateManifest
} from '../packages/core/src/types/index.js';
import { TemplateRegistry, createFragment, type FragmentInput } from '../packages/core/src/core/store/template-registry.js';
import { InheritanceResolver } from '../packages/core/src/core/inheritance/inheritance-resolver.js';
import type { InheritanceNode } from '../packages/core/src/core/inheritance/types.js';
import type { ProgressEvent, ProgressPort } from '../packages/core/src/core/ports/progress.js';

export interface TemplateOptions {
  version?: string;
  extends?: string;
  strategy?: StrategyName;
  dependencies?: Dependency[];
  files?: Array<Omit<FragmentInput, 'templateId'>>;
  parameters?: Record<string, ParameterDefinition>;
}

/**
 * Build a manifest whose fragments carry its own id.
 */
export function template(id: string, options: TemplateOptions = {}): TemplateManifest {
  const files: CompositionFragment[] = (options.files ?? []).map(file => createFragment({ ...file, templateId: id }));
  return {
    id,
    name: id,
    version: options.version ?? '1.0.0',
    ...(options.extends !== undefined ? { extends: options.extends } : {}),
    ...(options.strategy !== undefined ? { strategy: options.strategy } : {}),
    dependencies: (options.dependencies ?? []).map(d => ({ ...d, declaredBy: d.declaredBy ?? id })),
    files,
    parameters: options.parameters ?? {}
  };
}

export function dep(
  name: string,
  constraint: string,
  options: { kind?: DependencyKind; optional?: boolean; declaredBy?: string } = {}
): Dependency {
  return {
    name,
    constraint,
    kind: options.kind ?? 'runtime',
    optional: options.optional ?? false,
    ...(options.declaredBy !== undefined ? { declaredBy: options.declaredBy } : {})
  };
}

export function registryOf(
  templates: TemplateManifest[],
  catalog: Record<string, string[]> = {}
): TemplateRegistry {
  const registry = new TemplateRegistry();
  for (const manifest of templates) {
    registry.add(manifest);
  }
  for (const [name, versions] of Object.entries(catalog)) {
    registry.addVersions(name, versions);
  }
  return registry;
}

/**
 * Resolve the chain ending at the last template given. Throws when the
 * templates do not form a valid chain.
 */
export function chainOf(...templates: TemplateManifest[]): InheritanceNode[] {
  const leaf = templates[templates.length - 1];
  const result = new InheritanceResolver(registryOf(templates)).resolveChain(leaf.id);
  if (!result.success) {
    throw new Error(`Invalid test chain: ${result.errors.map(error => error.message).join('; ')}`);
  }
  return result.chain;
}

/**
 * A ProgressPort that keeps every event it receives.
 */
export function recordingProgress(): ProgressPort & { events: ProgressEvent[]; logs: string[] } {
  const events: ProgressEvent[] = [];
  const logs: string[] = [];
  return {
    events,
    logs,
    emit(event) {
      events.push(event);
    },
    log(level, message) {
      logs.push(`${level}: ${message}`);
    }
  };
}

export async function makeTempDir(prefix: string = 'layerkit-test-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write a tree of files (relative path -> content) under a root directory.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = path.join(root, relativePath);
    await mkdir(path.dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content, 'utf8');
  }
}
