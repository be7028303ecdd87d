import * as test from 'node:test';
import * as assert from 'node:assert';
import { buildGraph, neighbors, referenceTarget } from '../graph.js';
import { makeRecord } from './helpers.js';

const { describe, it } = test;

describe('referenceTarget', () => {
  it('strips a trailing .md', () => {
    assert.strictEqual(referenceTarget('adr-0002.md'), 'adr-0002');
    assert.strictEqual(referenceTarget('adr-0002'), 'adr-0002');
    assert.strictEqual(referenceTarget('notes.md.bak'), 'notes.md.bak');
    assert.strictEqual(referenceTarget('ADR.MD'), 'ADR.MD');
  });
});

describe('buildGraph', () => {
  it('creates one node per record and one edge per reference', () => {
    const records = [
      makeRecord('a.md', { title: 'A', status: 'accepted', related: ['b.md'] }),
      makeRecord('b.md', { title: 'B', related: ['a', 'a.md'] })
    ];

    const graph = buildGraph(records);

    assert.deepStrictEqual(graph.nodes, [
      { id: 'a', status: 'accepted', title: 'A' },
      { id: 'b', status: 'proposed', title: 'B' }
    ]);
    assert.deepStrictEqual(graph.edges, [
      { source: 'a', target: 'b', type: 'related' },
      { source: 'b', target: 'a', type: 'related' },
      { source: 'b', target: 'a', type: 'related' }
    ]);
  });

  it('adds one placeholder per dangling target', () => {
    const records = [
      makeRecord('a.md', { title: 'A', related: ['missing.md'] }),
      makeRecord('b.md', { title: 'B', related: ['missing'] })
    ];

    const graph = buildGraph(records);

    assert.deepStrictEqual(graph.nodes, [
      { id: 'a', status: 'proposed', title: 'A' },
      { id: 'b', status: 'proposed', title: 'B' },
      { id: 'missing', status: 'proposed' }
    ]);
    assert.strictEqual(graph.edges.length, 2);
  });

  it('keeps the first node when identifiers collide', () => {
    const records = [
      makeRecord('one/a.md', { title: 'First', status: 'accepted' }),
      makeRecord('two/a.md', { title: 'Second', status: 'deprecated' })
    ];

    const graph = buildGraph(records);

    assert.deepStrictEqual(graph.nodes, [{ id: 'a', status: 'accepted', title: 'First' }]);
  });

  it('allows self references and cycles', () => {
    const graph = buildGraph([makeRecord('a.md', { title: 'A', related: ['a'] })]);

    assert.strictEqual(graph.nodes.length, 1);
    assert.deepStrictEqual(graph.edges, [{ source: 'a', target: 'a', type: 'related' }]);
  });

  it('is empty for an empty batch', () => {
    assert.deepStrictEqual(buildGraph([]), { nodes: [], edges: [] });
  });
});

describe('neighbors', () => {
  it('splits edges by direction', () => {
    const graph = buildGraph([
      makeRecord('a.md', { title: 'A', related: ['b'] }),
      makeRecord('b.md', { title: 'B', related: ['c'] })
    ]);

    assert.deepStrictEqual(neighbors(graph, 'b'), {
      outgoing: [{ source: 'b', target: 'c', type: 'related' }],
      incoming: [{ source: 'a', target: 'b', type: 'related' }]
    });
  });
});
