/**
 * Lineage Graph Tests
 */

import { describe, it, expect } from 'vitest';
import { LineageGraph, type LineageSource } from './LineageGraph.js';
import { IntegrityError, NotFoundError } from '../core/errors.js';
import type { Analysis } from '../core/types.js';
import { makeAnalysis, makeSnapshot } from '../testing/fixtures.js';

/** In-memory stand-in for the store */
class MapSource implements LineageSource {
  private analyses = new Map<string, Analysis>();

  add(...analyses: Analysis[]): void {
    for (const analysis of analyses) this.analyses.set(analysis.analysisId, analysis);
  }

  getAnalysis(analysisId: string): Analysis | null {
    return this.analyses.get(analysisId) ?? null;
  }

  listChildren(analysisId: string): Analysis[] {
    return [...this.analyses.values()].filter((analysis) => analysis.parentAnalysisId === analysisId);
  }

  listRoots(): Analysis[] {
    return [...this.analyses.values()].filter((analysis) => analysis.parentAnalysisId === null);
  }
}

describe('LineageGraph', () => {
  const snapshot = makeSnapshot();
  const root = makeAnalysis([snapshot], { label: 'root', createdAt: '2024-02-29T19:00:00.000Z' });
  const left = makeAnalysis([snapshot], { label: 'left', parentAnalysisId: root.analysisId, createdAt: '2024-02-29T19:05:00.000Z' });
  const right = makeAnalysis([snapshot], { label: 'right', parentAnalysisId: root.analysisId, createdAt: '2024-02-29T19:06:00.000Z' });
  const leaf = makeAnalysis([snapshot], { label: 'leaf', parentAnalysisId: left.analysisId, createdAt: '2024-02-29T19:10:00.000Z' });

  const source = new MapSource();
  source.add(root, left, right, leaf);
  const graph = new LineageGraph(source);

  it('walks to the root nearest first', () => {
    expect(graph.pathToRoot(leaf.analysisId).map((a) => a.analysisId)).toEqual([leaf.analysisId, left.analysisId, root.analysisId]);
  });

  it('orders lineage paths root first', () => {
    expect(graph.lineagePath(leaf.analysisId).map((a) => a.analysisId)).toEqual([root.analysisId, left.analysisId, leaf.analysisId]);
    expect(graph.depth(leaf.analysisId)).toBe(2);
    expect(graph.root(leaf.analysisId).analysisId).toBe(root.analysisId);
  });

  it('lists descendants breadth first', () => {
    expect(graph.descendants(root.analysisId).map((a) => a.analysisId)).toEqual([left.analysisId, right.analysisId, leaf.analysisId]);
    expect(graph.descendants(leaf.analysisId)).toEqual([]);
  });

  it('builds the subtree', () => {
    const tree = graph.tree(root.analysisId);
    expect(tree.children.map((child) => child.analysis.analysisId)).toEqual([left.analysisId, right.analysisId]);
    expect(tree.children[0].children[0].depth).toBe(2);
  });

  it('reports unknown ids', () => {
    expect(() => graph.pathToRoot('missing')).toThrow(NotFoundError);
    expect(() => graph.tree('missing')).toThrow(NotFoundError);
  });

  it('stops on a loop instead of walking forever', () => {
    const a = makeAnalysis([snapshot], { label: 'a' });
    const b = makeAnalysis([snapshot], { label: 'b', parentAnalysisId: a.analysisId });
    const looped: Analysis = { ...a, parentAnalysisId: b.analysisId };
    const broken = new MapSource();
    broken.add(looped, b);
    expect(() => new LineageGraph(broken).pathToRoot(b.analysisId)).toThrow(IntegrityError);
  });
});

describe('LineageGraph.findAnomalies', () => {
  const snapshot = makeSnapshot();

  it('finds nothing in a healthy forest', () => {
    const root = makeAnalysis([snapshot], { label: 'root' });
    const child = makeAnalysis([snapshot], { label: 'child', parentAnalysisId: root.analysisId, createdAt: '2024-02-29T20:00:00.000Z' });
    expect(LineageGraph.findAnomalies([root, child])).toEqual([]);
  });

  it('flags missing parents, late parents and cycles', () => {
    const orphan = makeAnalysis([snapshot], { label: 'orphan', parentAnalysisId: 'gone' });
    const parent = makeAnalysis([snapshot], { label: 'parent', createdAt: '2024-02-29T21:00:00.000Z' });
    const early = makeAnalysis([snapshot], { label: 'early', parentAnalysisId: parent.analysisId, createdAt: '2024-02-29T20:00:00.000Z' });
    const a = makeAnalysis([snapshot], { label: 'a' });
    const b = makeAnalysis([snapshot], { label: 'b', parentAnalysisId: a.analysisId });
    const looped: Analysis = { ...a, parentAnalysisId: b.analysisId };

    const anomalies = LineageGraph.findAnomalies([orphan, parent, early, looped, b]);
    const kinds = anomalies.map((anomaly) => `${anomaly.kind}:${anomaly.analysisId}`).sort();

    expect(kinds).toEqual([
      `cycle:${a.analysisId}`,
      `cycle:${b.analysisId}`,
      `missing_parent:${orphan.analysisId}`,
      `parent_created_later:${early.analysisId}`
    ].sort());
  });
});
