import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DependencyResolver, conflictToError } from '../../../packages/core/src/core/dependencies/dependency-resolver.js';
import type { TemplateRegistry } from '../../../packages/core/src/core/store/template-registry.js';
import type { DependencyResolverOptions } from '../../../packages/core/src/core/dependencies/types.js';
import { CycleError, ParseError, ValidationError } from '../../../packages/core/src/utils/errors.js';
import { dep, registryOf, template } from '../../test-helpers.js';

function resolverFor(registry: TemplateRegistry, options?: DependencyResolverOptions): DependencyResolver {
  return new DependencyResolver(registry, registry, options);
}

function versionsOf(resolved: Map<string, { toString(): string }>): Record<string, string> {
  return Object.fromEntries(Array.from(resolved, ([name, version]) => [name, version.toString()]));
}

describe('DependencyResolver', () => {
  it('intersects constraints declared by different templates', () => {
    const registry = registryOf([], { 'shared-lib': ['1.0.0', '1.1.0', '1.2.0', '2.0.0'] });

    const result = resolverFor(registry).resolve([
      dep('shared-lib', '^1.0.0', { declaredBy: 'base' }),
      dep('shared-lib', '^1.1.0', { declaredBy: 'child' })
    ]);

    assert.equal(result.success, true);
    assert.deepEqual(versionsOf(result.resolvedVersions), { 'shared-lib': '1.2.0' });
    assert.deepEqual(result.conflicts, []);
    assert.deepEqual(result.order, ['shared-lib']);
  });

  it('expands transitive dependencies and orders them dependencies-first', () => {
    const registry = registryOf(
      [
        template('web', { dependencies: [dep('http', '^2.0.0')] }),
        template('http', { version: '2.1.0', dependencies: [dep('log', '~1.0.0')] })
      ],
      { log: ['1.0.0', '1.0.5', '1.1.0'] }
    );

    const result = resolverFor(registry).resolve([dep('web', '^1.0.0', { declaredBy: 'app' })]);

    assert.equal(result.success, true);
    assert.deepEqual(versionsOf(result.resolvedVersions), { web: '1.0.0', http: '2.1.0', log: '1.0.5' });
    assert.deepEqual(result.order, ['log', 'http', 'web']);
    assert.deepEqual(result.graph?.dependenciesOf('web'), ['http']);
    assert.equal(result.graph?.getNode('log')?.version?.toString(), '1.0.5');
    assert.equal(result.graph?.getNode('log')?.resolved, true);
  });

  it('reports an unsatisfiable name without hiding the others', () => {
    const registry = registryOf([], { a: ['1.0.0', '2.0.0'], b: ['1.0.0'] });

    const result = resolverFor(registry).resolve([
      dep('a', '^1.0.0', { declaredBy: 'x' }),
      dep('b', '^1.0.0', { declaredBy: 'x' }),
      dep('a', '^2.0.0', { declaredBy: 'y' })
    ]);

    assert.equal(result.success, false);
    assert.deepEqual(versionsOf(result.resolvedVersions), { b: '1.0.0' });
    assert.deepEqual(result.conflicts, [{
      name: 'a',
      constraints: ['^1.0.0', '^2.0.0'],
      requestedBy: ['x', 'y'],
      availableVersions: ['1.0.0', '2.0.0'],
      reason: 'unsatisfiable'
    }]);
    assert.equal(
      conflictToError(result.conflicts[0]).message,
      "No version of 'a' satisfies ^1.0.0 (from x), ^2.0.0 (from y). Available: 1.0.0, 2.0.0"
    );
  });

  it('attributes caller-supplied requests to <root>', () => {
    const result = resolverFor(registryOf([])).resolve([dep('ghost', '^1.0.0')]);

    assert.equal(result.conflicts[0].reason, 'no-candidates');
    assert.deepEqual(result.conflicts[0].requestedBy, ['<root>']);
    assert.equal(
      conflictToError(result.conflicts[0]).message,
      "No version of 'ghost' satisfies ^1.0.0 (from <root>). No versions available"
    );
  });

  it('fails fast on a malformed root constraint', () => {
    const result = resolverFor(registryOf([])).resolve([dep('web', 'not-a-version', { declaredBy: 'app' })]);

    assert.equal(result.success, false);
    assert.equal(result.errors.length, 1);
    assert.ok(result.errors[0] instanceof ParseError);
    assert.equal(result.errors[0].message, "Cannot parse 'not-a-version': 'not-a-version' is not a valid version");
    assert.deepEqual(result.order, []);
    assert.equal(result.graph, undefined);
  });

  it('turns a malformed transitive constraint into a conflict', () => {
    const registry = registryOf([template('web', { dependencies: [dep('http', '^two')] })]);

    const result = resolverFor(registry).resolve([dep('web', '*', { declaredBy: 'app' })]);

    assert.equal(result.success, false);
    assert.deepEqual(result.errors, []);
    assert.deepEqual(result.conflicts, [{
      name: 'http',
      constraints: ['^two'],
      requestedBy: ['web'],
      availableVersions: [],
      reason: 'invalid-constraint'
    }]);
    assert.deepEqual(result.order, ['web']);
  });

  it('reports dependency cycles and withholds the order', () => {
    const registry = registryOf([
      template('a', { dependencies: [dep('b', '^1.0.0')] }),
      template('b', { dependencies: [dep('a', '^1.0.0')] })
    ]);

    const result = resolverFor(registry).resolve([dep('a', '^1.0.0', { declaredBy: 'app' })]);

    assert.equal(result.success, false);
    assert.deepEqual(result.cycles, [['a', 'b', 'a']]);
    assert.equal(result.errors.length, 1);
    assert.ok(result.errors[0] instanceof CycleError);
    assert.equal(result.errors[0].message, 'Circular dependency detected: a -> b -> a');
    assert.deepEqual(result.order, []);
    assert.deepEqual(versionsOf(result.resolvedVersions), { a: '1.0.0', b: '1.0.0' });
  });

  describe('dependency kinds', () => {
    it('includes root dev dependencies unless disabled', () => {
      const registry = registryOf([], { lint: ['1.0.0'] });
      const request = [dep('lint', '^1.0.0', { kind: 'dev', declaredBy: 'app' })];

      assert.deepEqual(versionsOf(resolverFor(registry).resolve(request).resolvedVersions), { lint: '1.0.0' });
      assert.deepEqual(versionsOf(resolverFor(registry, { includeDev: false }).resolve(request).resolvedVersions), {});
    });

    it('never expands dev dependencies of transitive templates', () => {
      const registry = registryOf(
        [template('web', { dependencies: [dep('test-kit', '^1.0.0', { kind: 'dev' })] })],
        { 'test-kit': ['1.0.0'] }
      );

      const result = resolverFor(registry).resolve([dep('web', '*', { declaredBy: 'app' })]);

      assert.deepEqual(result.order, ['web']);
      assert.equal(result.resolvedVersions.has('test-kit'), false);
    });

    it('applies peer constraints to templates brought in by others', () => {
      const registry = registryOf(
        [template('web', { dependencies: [dep('http', '^2.0.0')] })],
        { http: ['2.0.0', '2.0.3', '2.1.0'] }
      );

      const result = resolverFor(registry).resolve([
        dep('web', '^1.0.0', { declaredBy: 'app' }),
        dep('http', '~2.0.0', { kind: 'peer', declaredBy: 'app' })
      ]);

      assert.equal(result.resolvedVersions.get('http')?.toString(), '2.0.3');
      assert.deepEqual(result.warnings, []);
    });

    it('warns about a peer nothing else brings in', () => {
      const result = resolverFor(registryOf([])).resolve([
        dep('react', '^18.0.0', { kind: 'peer', declaredBy: 'app' })
      ]);

      assert.equal(result.success, true);
      assert.equal(result.resolvedVersions.size, 0);
      assert.deepEqual(result.warnings, ["Unmet peer dependency 'react@^18.0.0' requested by 'app'"]);
    });

    it('skips an unavailable optional dependency with a warning', () => {
      const result = resolverFor(registryOf([])).resolve([
        dep('extras', '^1.0.0', { optional: true, declaredBy: 'app' })
      ]);

      assert.equal(result.success, true);
      assert.deepEqual(result.warnings, [
        "Optional dependency 'extras@^1.0.0' requested by 'app' is not available; skipped"
      ]);
    });
  });

  it('stops at the node limit', () => {
    const registry = registryOf([], { a: ['1.0.0'], b: ['1.0.0'] });

    const result = resolverFor(registry, { maxNodes: 1 }).resolve([dep('a', '*'), dep('b', '*')]);

    assert.equal(result.success, false);
    assert.ok(result.errors[0] instanceof ValidationError);
    assert.equal(
      result.errors[0].message,
      "Validation error: Dependency graph exceeds 1 templates while adding 'b' (requested by '<root>')"
    );
  });

  it('produces the same order on every run of a graph with ties', () => {
    const registry = registryOf(
      [
        template('web', { dependencies: [dep('http', '^2.0.0'), dep('log', '^1.0.0'), dep('cache', '^1.0.0')] }),
        template('http', { version: '2.0.0', dependencies: [dep('log', '^1.0.0')] })
      ],
      { log: ['1.0.0'], cache: ['1.0.0'] }
    );
    const roots = [dep('web', '*', { declaredBy: 'app' })];

    const first = resolverFor(registry).resolve(roots);
    assert.deepEqual(first.order, ['log', 'http', 'cache', 'web']);

    for (let run = 0; run < 5; run++) {
      assert.deepEqual(resolverFor(registry).resolve(roots).order, first.order);
      assert.deepEqual(versionsOf(resolverFor(registry).resolve(roots).resolvedVersions), versionsOf(first.resolvedVersions));
    }
  });

  it('handles catalog versions with long prerelease tags', () => {
    const long = `1.1.0-${'x'.repeat(300)}`;
    const registry = registryOf([], { lib: ['1.0.0', long] });

    const result = resolverFor(registry).resolve([dep('lib', '>=1.0.0', { declaredBy: 'app' })]);

    assert.equal(result.success, true);
    assert.equal(result.resolvedVersions.get('lib')?.toString(), long);
  });

  it('keeps no state between calls', () => {
    const registry = registryOf([], { a: ['1.0.0', '2.0.0'] });
    const resolver = resolverFor(registry);

    const first = resolver.resolve([dep('a', '^1.0.0')]);
    const second = resolver.resolve([dep('a', '^2.0.0')]);

    assert.equal(first.resolvedVersions.get('a')?.toString(), '1.0.0');
    assert.equal(second.resolvedVersions.get('a')?.toString(), '2.0.0');
    assert.equal(second.success, true);
  });
});
