import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DependencyGraph } from '../../../packages/core/src/core/dependencies/dependency-graph.js';
import { CycleError, ValidationError } from '../../../packages/core/src/utils/errors.js';

function graphOf(ids: string[], edges: Array<[string, string]>): DependencyGraph {
  const graph = new DependencyGraph();
  for (const id of ids) {
    graph.addNode(id, id);
  }
  for (const [from, to] of edges) {
    graph.addEdge(from, to);
  }
  return graph;
}

describe('DependencyGraph', () => {
  it('tracks nodes in discovery order', () => {
    const graph = graphOf(['app', 'lib'], []);
    assert.equal(graph.size, 2);
    assert.deepEqual(graph.getNodes().map(node => node.order), [0, 1]);
    assert.equal(graph.getNode('lib')?.resolved, false);
    assert.equal(graph.hasNode('missing'), false);
  });

  it('rejects duplicate nodes and edges to unknown nodes', () => {
    const graph = graphOf(['app'], []);
    assert.throws(() => graph.addNode('app', 'app'), ValidationError);
    assert.throws(
      () => graph.addEdge('app', 'ghost'),
      { message: 'Validation error: Cannot add edge app -> ghost: unknown node' }
    );
  });

  it('records both directions of an edge once', () => {
    const graph = graphOf(['app', 'lib'], [['app', 'lib'], ['app', 'lib']]);
    assert.deepEqual(graph.dependenciesOf('app'), ['lib']);
    assert.deepEqual(graph.dependentsOf('lib'), ['app']);
  });

  describe('detectCycles', () => {
    it('returns nothing for an acyclic graph', () => {
      const graph = graphOf(['a', 'b', 'c'], [['a', 'b'], ['b', 'c'], ['a', 'c']]);
      assert.deepEqual(graph.detectCycles(), []);
    });

    it('reports a cycle as a closed path', () => {
      const graph = graphOf(['a', 'b', 'c'], [['a', 'b'], ['b', 'c'], ['c', 'a']]);
      assert.deepEqual(graph.detectCycles(), [['a', 'b', 'c', 'a']]);
    });

    it('reports every independent cycle', () => {
      const graph = graphOf(['a', 'b', 'c', 'd'], [['a', 'b'], ['b', 'a'], ['c', 'd'], ['d', 'c']]);
      assert.deepEqual(graph.detectCycles(), [['a', 'b', 'a'], ['c', 'd', 'c']]);
    });

    it('reports a self-dependency', () => {
      const graph = graphOf(['solo'], [['solo', 'solo']]);
      assert.deepEqual(graph.detectCycles(), [['solo', 'solo']]);
    });
  });

  describe('topologicalOrder', () => {
    it('puts dependencies first and breaks ties by discovery order', () => {
      const graph = graphOf(
        ['app', 'lib', 'util', 'log'],
        [['app', 'lib'], ['app', 'log'], ['lib', 'util']]
      );
      assert.deepEqual(graph.topologicalOrder(), ['util', 'lib', 'log', 'app']);
    });

    it('refuses to order a cyclic graph', () => {
      const graph = graphOf(['a', 'b'], [['a', 'b'], ['b', 'a']]);
      assert.throws(
        () => graph.topologicalOrder(),
        (error: unknown) => {
          assert.ok(error instanceof CycleError);
          assert.deepEqual(error.path, ['a', 'b', 'a']);
          assert.equal(error.message, 'Circular dependency detected: a -> b -> a');
          return true;
        }
      );
    });
  });
});
