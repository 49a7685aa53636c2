import { describe, it, expect } from 'vitest';
import { ReferenceGraph } from '../src/graph.js';

describe('ReferenceGraph', () => {
  it('ignores self references', () => {
    const graph = new ReferenceGraph();
    graph.addEdge('/d/a.md', '/d/a.md');
    expect(graph.edgeCount()).toBe(0);
    expect(graph.nodes()).toEqual([]);
  });

  it('tracks incoming and outgoing edges', () => {
    const graph = new ReferenceGraph();
    graph.addEdge('/d/a.md', '/d/b.md');
    graph.addEdge('/d/a.md', '/d/c.md');
    graph.addEdge('/d/a.md', '/d/b.md');
    expect(graph.edgeCount()).toBe(2);
    expect(graph.outgoing('/d/a.md')).toEqual(['/d/b.md', '/d/c.md']);
    expect(graph.incoming('/d/b.md')).toEqual(['/d/a.md']);
  });

  it('lists files nothing links to as orphans', () => {
    const graph = new ReferenceGraph();
    graph.addNode('/d/lonely.md');
    graph.addEdge('/d/a.md', '/d/b.md');
    expect(graph.orphans()).toEqual(['/d/a.md', '/d/lonely.md']);
  });

  it('finds groups of mutually reachable files', () => {
    const graph = new ReferenceGraph();
    graph.addEdge('/d/a.md', '/d/b.md');
    graph.addEdge('/d/b.md', '/d/c.md');
    graph.addEdge('/d/c.md', '/d/a.md');
    graph.addEdge('/d/c.md', '/d/d.md');
    graph.addEdge('/d/x.md', '/d/y.md');
    graph.addEdge('/d/y.md', '/d/x.md');
    expect(graph.cycles()).toEqual([
      ['/d/a.md', '/d/b.md', '/d/c.md'],
      ['/d/x.md', '/d/y.md'],
    ]);
  });

  it('reports no cycles for an acyclic graph', () => {
    const graph = new ReferenceGraph();
    graph.addEdge('/d/a.md', '/d/b.md');
    graph.addEdge('/d/b.md', '/d/c.md');
    expect(graph.cycles()).toEqual([]);
  });
});
