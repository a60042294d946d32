/**
 * Lineage Graph
 *
 * Parent/child structure over analyses. Each analysis names at most one
 * parent, so lineage is a forest: walking parents from any node reaches
 * exactly one root. Works against the storage layer for reads.
 */

import { IntegrityError, NotFoundError } from '../core/errors.js';
import type { Analysis } from '../core/types.js';

/** Read side of the store that lineage walks need */
export interface LineageSource {
  getAnalysis(analysisId: string): Analysis | null;
  listChildren(analysisId: string): Analysis[];
  listRoots(): Analysis[];
}

export interface LineageNode {
  analysis: Analysis;
  depth: number;
  children: LineageNode[];
}

export type LineageAnomalyKind = 'missing_parent' | 'cycle' | 'parent_created_later';

export interface LineageAnomaly {
  analysisId: string;
  kind: LineageAnomalyKind;
  detail: string;
}

/** Guard against walking a corrupted chain forever */
const MAX_LINEAGE_DEPTH = 10_000;

export class LineageGraph {
  private source: LineageSource;

  constructor(source: LineageSource) {
    this.source = source;
  }

  /**
   * The analysis itself followed by each ancestor up to its root
   */
  pathToRoot(analysisId: string): Analysis[] {
    const path: Analysis[] = [];
    const seen = new Set<string>();
    let currentId: string | null = analysisId;

    while (currentId !== null) {
      if (seen.has(currentId)) {
        throw new IntegrityError(`Lineage of analysis ${analysisId} loops back to ${currentId}`);
      }
      if (path.length >= MAX_LINEAGE_DEPTH) {
        throw new IntegrityError(`Lineage of analysis ${analysisId} exceeds ${MAX_LINEAGE_DEPTH} levels`);
      }
      seen.add(currentId);

      const analysis = this.source.getAnalysis(currentId);
      if (!analysis) {
        throw new NotFoundError('analysis', currentId);
      }
      path.push(analysis);
      currentId = analysis.parentAnalysisId;
    }

    return path;
  }

  /**
   * Root first, ending with the given analysis
   */
  lineagePath(analysisId: string): Analysis[] {
    return this.pathToRoot(analysisId).reverse();
  }

  depth(analysisId: string): number {
    return this.pathToRoot(analysisId).length - 1;
  }

  root(analysisId: string): Analysis {
    const path = this.pathToRoot(analysisId);
    return path[path.length - 1];
  }

  /**
   * Every analysis derived from the given one, breadth first
   */
  descendants(analysisId: string): Analysis[] {
    if (!this.source.getAnalysis(analysisId)) {
      throw new NotFoundError('analysis', analysisId);
    }

    const result: Analysis[] = [];
    const seen = new Set<string>([analysisId]);
    const queue: string[] = [analysisId];

    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined) break;
      for (const child of this.source.listChildren(next)) {
        if (seen.has(child.analysisId)) continue;
        seen.add(child.analysisId);
        result.push(child);
        queue.push(child.analysisId);
      }
    }

    return result;
  }

  /**
   * Subtree rooted at the given analysis
   */
  tree(analysisId: string): LineageNode {
    const analysis = this.source.getAnalysis(analysisId);
    if (!analysis) {
      throw new NotFoundError('analysis', analysisId);
    }
    return this.buildNode(analysis, 0, new Set());
  }

  private buildNode(analysis: Analysis, depth: number, seen: Set<string>): LineageNode {
    seen.add(analysis.analysisId);
    const children = this.source.listChildren(analysis.analysisId)
      .filter((child) => !seen.has(child.analysisId))
      .map((child) => this.buildNode(child, depth + 1, seen));
    return { analysis, depth, children };
  }

  roots(): Analysis[] {
    return this.source.listRoots();
  }

  /**
   * Structural problems in a set of analyses. Works on plain records so the
   * integrity verifier can run it over rows that failed their hash check.
   */
  static findAnomalies(analyses: readonly Analysis[]): LineageAnomaly[] {
    const byId = new Map(analyses.map((analysis) => [analysis.analysisId, analysis]));
    const anomalies: LineageAnomaly[] = [];

    for (const analysis of analyses) {
      const parentId = analysis.parentAnalysisId;
      if (parentId === null) continue;

      const parent = byId.get(parentId);
      if (!parent) {
        anomalies.push({ analysisId: analysis.analysisId, kind: 'missing_parent', detail: `parent ${parentId} is not stored` });
        continue;
      }
      if (parent.createdAt > analysis.createdAt) {
        anomalies.push({
          analysisId: analysis.analysisId,
          kind: 'parent_created_later',
          detail: `parent ${parentId} was created at ${parent.createdAt}, after ${analysis.createdAt}`
        });
      }
    }

    // A cycle never reaches a root; report each member once
    const reported = new Set<string>();
    for (const analysis of analyses) {
      const trail: string[] = [];
      const onTrail = new Set<string>();
      let current: Analysis | undefined = analysis;
      while (current && !reported.has(current.analysisId)) {
        if (onTrail.has(current.analysisId)) {
          const start = trail.indexOf(current.analysisId);
          const cycle = trail.slice(start);
          for (const memberId of cycle) {
            reported.add(memberId);
            anomalies.push({ analysisId: memberId, kind: 'cycle', detail: `lineage loops through ${cycle.join(' -> ')}` });
          }
          break;
        }
        onTrail.add(current.analysisId);
        trail.push(current.analysisId);
        current = current.parentAnalysisId === null ? undefined : byId.get(current.parentAnalysisId);
      }
    }

    return anomalies;
  }
}
