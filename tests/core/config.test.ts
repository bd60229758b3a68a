import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { findConfigFile, loadConfig, parseConfig } from '../../packages/core/src/core/config.js';
import { createExecutionContext } from '../../packages/core/src/core/execution-context.js';
import { DEFAULT_CONFIG } from '../../packages/core/src/constants/index.js';
import { ConfigError } from '../../packages/core/src/utils/errors.js';
import { makeTempDir, removeDir, writeTree } from '../test-helpers.js';

describe('parseConfig', () => {
  it('fills every missing key with its default', () => {
    assert.deepEqual(parseConfig({}), DEFAULT_CONFIG);
  });

  it('accepts every known key', () => {
    const config = parseConfig({
      templatesDir: 'scaffolds',
      maxDepth: '3',
      defaultStrategy: 'override',
      fileStrategies: { '*.lock': 'replace' },
      includeDev: false
    });

    assert.deepEqual(config, {
      templatesDir: 'scaffolds',
      maxDepth: 3,
      defaultStrategy: 'override',
      fileStrategies: { '*.lock': 'replace' },
      includeDev: false
    });
  });

  it('ignores unknown keys', () => {
    assert.equal(parseConfig({ colour: 'blue' }).templatesDir, 'templates');
  });

  const rejected: Array<[label: string, raw: unknown, message: string]> = [
    ['a non-object', [], 'config: configuration must be an object'],
    ['an empty templatesDir', { templatesDir: ' ' }, "config: 'templatesDir' must be a non-empty string"],
    ['a negative maxDepth', { maxDepth: -1 }, "config: 'maxDepth' must be a non-negative integer (got -1)"],
    ['a fractional maxDepth', { maxDepth: '2.5' }, "config: 'maxDepth' must be a non-negative integer (got \"2.5\")"],
    [
      'an unknown default strategy',
      { defaultStrategy: 'append' },
      "config: 'defaultStrategy' must be one of replace, override, merge (got \"append\")"
    ],
    [
      'an unknown file strategy',
      { fileStrategies: { '*.md': 'zip' } },
      "config: 'fileStrategies.*.md' must be one of replace, override, merge (got \"zip\")"
    ],
    ['a non-boolean includeDev', { includeDev: 'yes' }, "config: 'includeDev' must be a boolean"]
  ];

  for (const [label, raw, message] of rejected) {
    it(`rejects ${label}`, () => {
      assert.throws(() => parseConfig(raw), (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.equal(error.message, message);
        return true;
      });
    });
  }
});

describe('loadConfig', () => {
  let dir: string;

  before(async () => {
    dir = await makeTempDir('layerkit-config-');
  });

  after(async () => {
    await removeDir(dir);
  });

  it('returns defaults without a config file', async () => {
    const empty = path.join(dir, 'empty');
    await writeTree(empty, { '.keep': '' });

    assert.deepEqual(await loadConfig(empty), { config: DEFAULT_CONFIG });
    assert.equal(await findConfigFile(empty), undefined);
  });

  it('reads JSONC with comments and trailing commas, preferring it over JSON', async () => {
    const project = path.join(dir, 'project');
    await writeTree(project, {
      'layerkit.jsonc': '{\n  // local scaffolds\n  "templatesDir": "scaffolds",\n  "maxDepth": 2,\n}\n',
      'layerkit.json': '{ "templatesDir": "ignored" }'
    });

    const loaded = await loadConfig(project);
    assert.equal(loaded.path, path.join(project, 'layerkit.jsonc'));
    assert.equal(loaded.config.templatesDir, 'scaffolds');
    assert.equal(loaded.config.maxDepth, 2);
  });

  it('reports syntax errors as configuration errors', async () => {
    const broken = path.join(dir, 'broken');
    await writeTree(broken, { 'layerkit.json': '{ "maxDepth": }' });

    await assert.rejects(loadConfig(broken), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.match(error.message, /^Failed to load configuration: File system error: Failed to parse JSONC file: /);
      return true;
    });
  });

  it('names the config file in validation errors', async () => {
    const invalid = path.join(dir, 'invalid');
    await writeTree(invalid, { 'layerkit.json': '{ "includeDev": 1 }' });

    await assert.rejects(loadConfig(invalid), {
      message: `${path.join(invalid, 'layerkit.json')}: 'includeDev' must be a boolean`
    });
  });
});

describe('createExecutionContext', () => {
  let dir: string;

  before(async () => {
    dir = await makeTempDir('layerkit-context-');
    await writeTree(dir, { 'layerkit.json': '{ "templatesDir": "scaffolds", "defaultStrategy": "override" }' });
  });

  after(async () => {
    await removeDir(dir);
  });

  it('resolves the templates directory against the working directory', async () => {
    const ctx = await createExecutionContext({ cwd: dir });

    assert.equal(ctx.cwd, path.resolve(dir));
    assert.equal(ctx.templatesDir, path.resolve(dir, 'scaffolds'));
    assert.equal(ctx.config.defaultStrategy, 'override');
  });

  it('lets command-line options win over the config file', async () => {
    const absolute = path.resolve(dir, 'elsewhere');
    const ctx = await createExecutionContext({
      cwd: dir,
      templates: absolute,
      maxDepth: '2',
      strategy: 'replace',
      includeDev: false
    });

    assert.equal(ctx.templatesDir, absolute);
    assert.equal(ctx.config.maxDepth, 2);
    assert.equal(ctx.config.defaultStrategy, 'replace');
    assert.equal(ctx.config.includeDev, false);
  });

  it('rejects invalid overrides', async () => {
    await assert.rejects(
      createExecutionContext({ cwd: dir, strategy: 'bogus' }),
      { message: '--strategy must be one of replace, override, merge (got "bogus")' }
    );
    await assert.rejects(
      createExecutionContext({ cwd: dir, maxDepth: 'deep' }),
      { message: '--max-depth must be a non-negative integer (got "deep")' }
    );
  });

  it('rejects a missing working directory', async () => {
    const missing = path.join(dir, 'missing');
    await assert.rejects(createExecutionContext({ cwd: missing }), {
      message: `Working directory does not exist: ${missing}`
    });
  });
});
