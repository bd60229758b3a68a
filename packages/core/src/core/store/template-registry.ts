import type { CompositionFragment, StrategyName, TemplateManifest } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';
import { SemanticVersion, sortVersions } from '../version/semantic-version.js';
import type { TemplateStore, VersionCatalog } from './types.js';

/**
 * In-memory template store and version catalog.
 *
 * Candidate versions for a name are the catalog entries registered for it
 * plus the version of the manifest registered under the same id.
 */
export class TemplateRegistry implements TemplateStore, VersionCatalog {
  private manifests = new Map<string, TemplateManifest>();
  private catalog = new Map<string, SemanticVersion[]>();

  add(manifest: TemplateManifest): this {
    if (this.manifests.has(manifest.id)) {
      throw new ValidationError(`Template '${manifest.id}' is already registered`);
    }
    this.manifests.set(manifest.id, manifest);
    return this;
  }

  /** Register published versions for a name; strings are parsed strictly. */
  addVersions(name: string, versions: ReadonlyArray<string | SemanticVersion>): this {
    const known = this.catalog.get(name) ?? [];
    for (const entry of versions) {
      const version = typeof entry === 'string' ? SemanticVersion.parse(entry) : entry;
      if (!known.some(existing => existing.equals(version))) {
        known.push(version);
      }
    }
    this.catalog.set(name, known);
    return this;
  }

  loadManifest(templateId: string): TemplateManifest | undefined {
    return this.manifests.get(templateId);
  }

  candidateVersions(name: string): SemanticVersion[] {
    const versions = [...(this.catalog.get(name) ?? [])];
    const manifest = this.manifests.get(name);
    if (manifest) {
      const own = SemanticVersion.safeParse(manifest.version);
      if (own.ok && !versions.some(existing => existing.equals(own.version))) {
        versions.push(own.version);
      }
    }
    return sortVersions(versions);
  }

  templateIds(): string[] {
    return Array.from(this.manifests.keys()).sort();
  }

  has(templateId: string): boolean {
    return this.manifests.has(templateId);
  }

  get size(): number {
    return this.manifests.size;
  }
}

export interface FragmentInput {
  templateId: string;
  filePath: string;
  content: string;
  priority?: number;
  strategy?: StrategyName;
  slot?: string;
}

/** Build a frozen fragment; priority defaults to 0. */
export function createFragment(input: FragmentInput): CompositionFragment {
  return Object.freeze({
    templateId: input.templateId,
    filePath: input.filePath,
    content: input.content,
    priority: input.priority ?? 0,
    ...(input.strategy !== undefined ? { strategy: input.strategy } : {}),
    ...(input.slot !== undefined ? { slot: input.slot } : {})
  });
}
