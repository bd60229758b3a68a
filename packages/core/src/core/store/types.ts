/**
 * Collaborator interfaces the engine consumes.
 *
 * Both are synchronous: anything that needs I/O (reading manifests from disk,
 * fetching a registry index) happens before resolution starts, and the engine
 * only sees already-loaded data.
 */

import type { TemplateManifest } from '../../types/index.js';
import type { SemanticVersion } from '../version/semantic-version.js';

export interface TemplateStore {
  /** Manifest for a templateId, or undefined when the store has none */
  loadManifest(templateId: string): TemplateManifest | undefined;
}

export interface VersionCatalog {
  /** Every version known to exist for a dependency name */
  candidateVersions(name: string): SemanticVersion[];
}
