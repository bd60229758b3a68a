import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { emitComposedTemplate } from '../../../packages/core/src/core/emission/emitter.js';
import type { ComposedFile, ComposedTemplate } from '../../../packages/core/src/core/composition/types.js';
import { FileSystemError, ValidationError } from '../../../packages/core/src/utils/errors.js';
import { exists } from '../../../packages/core/src/utils/fs.js';
import { makeTempDir, recordingProgress, removeDir, writeTree } from '../../test-helpers.js';

function composedWith(files: Array<Pick<ComposedFile, 'path' | 'content'>>): ComposedTemplate {
  return {
    id: 'web-app',
    name: 'web-app',
    version: '1.0.0',
    chain: ['base', 'web-app'],
    files: files.map(file => ({ ...file, strategy: 'merge', contributors: ['base', 'web-app'] })),
    parameters: {},
    parameterSources: {},
    dependencies: []
  };
}

const composed = composedWith([
  { path: 'README.md', content: '# Web app\n' },
  { path: 'src/app/main.ts', content: 'export const main = () => 1;\n' }
]);

describe('emitComposedTemplate', () => {
  let target: string;

  beforeEach(async () => {
    target = await makeTempDir('layerkit-emit-');
  });

  afterEach(async () => {
    await removeDir(target);
  });

  it('writes every file, creating directories', async () => {
    const result = await emitComposedTemplate(composed, target);

    assert.equal(result.targetDir, path.resolve(target));
    assert.equal(result.dryRun, false);
    assert.deepEqual(result.files.map(f => [f.path, f.status, f.existed]), [
      ['README.md', 'written', false],
      ['src/app/main.ts', 'written', false]
    ]);
    assert.equal(await readFile(path.join(target, 'src/app/main.ts'), 'utf8'), 'export const main = () => 1;\n');
  });

  it('reports emission progress', async () => {
    const progress = recordingProgress();
    await emitComposedTemplate(composed, target, { progress });

    assert.deepEqual(
      progress.events.map(event => (event.type === 'emit:file' ? `${event.path}:${event.status}` : event.type)),
      ['README.md:written', 'src/app/main.ts:written', 'emit:complete']
    );
  });

  it('writes nothing on a dry run', async () => {
    await writeTree(target, { 'README.md': 'mine' });

    const result = await emitComposedTemplate(composed, target, { dryRun: true });

    assert.deepEqual(result.files.map(f => [f.path, f.status, f.existed]), [
      ['README.md', 'planned', true],
      ['src/app/main.ts', 'planned', false]
    ]);
    assert.equal(await readFile(path.join(target, 'README.md'), 'utf8'), 'mine');
    assert.equal(await exists(path.join(target, 'src')), false);
  });

  it('refuses to overwrite existing files before writing anything', async () => {
    await writeTree(target, { 'README.md': 'mine' });
    const root = path.resolve(target);

    await assert.rejects(emitComposedTemplate(composed, target), (error: unknown) => {
      assert.ok(error instanceof FileSystemError);
      assert.equal(
        error.message,
        `File system error: Refusing to overwrite 1 existing file(s) in ${root}: README.md (use --force)`
      );
      return true;
    });
    assert.equal(await exists(path.join(target, 'src/app/main.ts')), false);
  });

  it('overwrites with force', async () => {
    await writeTree(target, { 'README.md': 'mine' });

    const result = await emitComposedTemplate(composed, target, { force: true });

    assert.equal(result.files[0].existed, true);
    assert.equal(await readFile(path.join(target, 'README.md'), 'utf8'), '# Web app\n');
  });

  it('refuses paths that leave the target directory', async () => {
    const escaping = composedWith([{ path: '../outside.txt', content: 'x' }]);
    const root = path.resolve(target);

    await assert.rejects(emitComposedTemplate(escaping, target), (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.equal(error.message, `Validation error: Refusing to write '../outside.txt' outside ${root}`);
      return true;
    });
    assert.equal(await exists(path.join(target, '..', 'outside.txt')), false);
  });
});
