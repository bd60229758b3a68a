import { isAbsolute, relative, resolve } from 'path';
import { exists, writeTextFile } from '../../utils/fs.js';
import { FileSystemError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ComposedTemplate } from '../composition/types.js';
import type { ProgressPort } from '../ports/progress.js';
import { progressEvent } from '../ports/progress.js';
import { resolveProgress } from '../ports/resolve.js';

export interface EmitOptions {
  /** Report what would be written without writing */
  dryRun?: boolean;
  /** Overwrite files that already exist */
  force?: boolean;
  progress?: ProgressPort;
}

export interface EmittedFile {
  /** Output path relative to the target directory */
  path: string;
  absolutePath: string;
  status: 'written' | 'planned';
  /** The file existed before emission */
  existed: boolean;
}

export interface EmitResult {
  targetDir: string;
  dryRun: boolean;
  files: EmittedFile[];
}

/**
 * Write a composed template's files under `targetDir`.
 *
 * Every path is checked before anything is written: a path escaping the
 * target directory is a ValidationError, and an existing file without
 * `force` is a FileSystemError listing every such file. A dry run performs
 * the same checks for escaping paths but reports existing files instead of
 * refusing them.
 */
export async function emitComposedTemplate(
  composed: ComposedTemplate,
  targetDir: string,
  options: EmitOptions = {}
): Promise<EmitResult> {
  const root = resolve(targetDir);
  const progress = resolveProgress(options);
  const dryRun = options.dryRun ?? false;

  const planned: EmittedFile[] = [];
  for (const file of composed.files) {
    const absolutePath = resolve(root, file.path);
    if (!isInside(root, absolutePath)) {
      throw new ValidationError(`Refusing to write '${file.path}' outside ${root}`, { path: file.path, targetDir: root });
    }
    planned.push({ path: file.path, absolutePath, status: 'planned', existed: await exists(absolutePath) });
  }

  const existing = planned.filter(file => file.existed);
  if (!dryRun && !options.force && existing.length > 0) {
    throw new FileSystemError(
      `Refusing to overwrite ${existing.length} existing file(s) in ${root}: ${existing.map(f => f.path).join(', ')} (use --force)`,
      { targetDir: root, files: existing.map(f => f.path) }
    );
  }

  if (dryRun) {
    for (const file of planned) {
      progress.emit(progressEvent({ type: 'emit:file', path: file.path, status: 'planned' }));
    }
    logger.info(`Dry run: ${planned.length} file(s) would be written to ${root}`);
    return { targetDir: root, dryRun, files: planned };
  }

  const written: EmittedFile[] = [];
  for (const [index, file] of planned.entries()) {
    await writeTextFile(file.absolutePath, composed.files[index].content);
    written.push({ ...file, status: 'written' });
    progress.emit(progressEvent({ type: 'emit:file', path: file.path, status: 'written' }));
  }

  progress.emit(progressEvent({ type: 'emit:complete', summary: { written: written.length } }));
  logger.info(`Wrote ${written.length} file(s) to ${root}`);
  return { targetDir: root, dryRun, files: written };
}

function isInside(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
}
