import { join } from 'path';
import * as yaml from 'js-yaml';
import { FILE_PATTERNS, TEMPLATE_DIRS } from '../../constants/index.js';
import { exists, isDirectory, listDirectories, readTextFile, walkFiles } from '../../utils/fs.js';
import { FileSystemError, InvalidTemplateError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { SemanticVersion } from '../version/semantic-version.js';
import { buildManifest, parseManifest } from './manifest-parser.js';
import { TemplateRegistry } from './template-registry.js';

/**
 * Loads a templates directory into a TemplateRegistry.
 *
 * ```
 * templates/
 *   catalog.yml          # optional: { name: [versions] }
 *   base/
 *     template.yml
 *     files/**
 *   web-app/
 *     template.yml
 *     files/**
 * ```
 *
 * The directory name is the templateId. Directories without a manifest are
 * skipped. Everything is read up front; the engine itself never touches disk.
 */
export async function loadTemplateRepository(templatesDir: string): Promise<TemplateRegistry> {
  if (!(await isDirectory(templatesDir))) {
    throw new FileSystemError(`Templates directory not found: ${templatesDir}`, { templatesDir });
  }

  const registry = new TemplateRegistry();

  for (const templateId of await listDirectories(templatesDir)) {
    const templateRoot = join(templatesDir, templateId);
    const manifestPath = await findManifestFile(templateRoot);
    if (!manifestPath) {
      logger.debug(`Skipping '${templateId}': no ${FILE_PATTERNS.TEMPLATE_YML}`);
      continue;
    }

    const document = parseManifest(await readTextFile(manifestPath), templateId, manifestPath);
    const fileContents = await readTemplateFiles(join(templateRoot, TEMPLATE_DIRS.FILES));
    registry.add(buildManifest(document, fileContents));
    logger.debug(`Loaded template '${templateId}'`, { files: fileContents.size });
  }

  const catalogPath = join(templatesDir, FILE_PATTERNS.CATALOG_YML);
  if (await exists(catalogPath)) {
    for (const [name, versions] of Object.entries(parseCatalog(await readTextFile(catalogPath), catalogPath))) {
      registry.addVersions(name, versions);
    }
  }

  logger.info(`Loaded ${registry.size} template(s) from ${templatesDir}`);
  return registry;
}

/**
 * Parse catalog.yml: a mapping of dependency name to published versions.
 */
export function parseCatalog(text: string, sourcePath: string = FILE_PATTERNS.CATALOG_YML): Record<string, string[]> {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.reason : String(error);
    throw new InvalidTemplateError(`${sourcePath}: ${reason}`);
  }

  if (raw === undefined || raw === null) return {};
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new InvalidTemplateError(`${sourcePath}: expected a mapping of name to version list`);
  }

  const catalog: Record<string, string[]> = {};
  for (const [name, versions] of Object.entries(raw)) {
    if (!Array.isArray(versions)) {
      throw new InvalidTemplateError(`${sourcePath}: versions of '${name}' must be a list`);
    }
    catalog[name] = versions.map((version: unknown) => {
      const text = typeof version === 'number' ? String(version) : version;
      if (typeof text !== 'string') {
        throw new InvalidTemplateError(`${sourcePath}: '${name}' lists invalid version ${JSON.stringify(version)}`);
      }
      const parsed = SemanticVersion.safeParse(text);
      if (!parsed.ok) {
        throw new InvalidTemplateError(
          `${sourcePath}: '${name}' lists invalid version ${JSON.stringify(version)}: ${parsed.error.reason}`
        );
      }
      return text;
    });
  }
  return catalog;
}

async function findManifestFile(templateRoot: string): Promise<string | undefined> {
  for (const fileName of [FILE_PATTERNS.TEMPLATE_YML, FILE_PATTERNS.TEMPLATE_YAML]) {
    const path = join(templateRoot, fileName);
    if (await exists(path)) return path;
  }
  return undefined;
}

async function readTemplateFiles(filesRoot: string): Promise<Map<string, string>> {
  const contents = new Map<string, string>();
  if (!(await isDirectory(filesRoot))) return contents;

  for await (const relativePath of walkFiles(filesRoot)) {
    contents.set(relativePath, await readTextFile(join(filesRoot, relativePath)));
  }
  return contents;
}
