import {
  AXES,
  AnalysisReport,
  AnalysisResult,
  CommandCounts,
  Issue,
  ProgramStructure,
  TravelRanges
} from '../types';

// Depth-first, parent before its subprograms
export function flattenResults(root: AnalysisResult): AnalysisResult[] {
  return [root, ...root.subprograms.flatMap(flattenResults)];
}

// Stable: issues on the same line keep the order they were reported in
export function sortIssues(issues: readonly Issue[]): Issue[] {
  return issues
    .map((issue, index) => ({ issue, index }))
    .sort((a, b) => a.issue.line - b.issue.line || a.index - b.index)
    .map(({ issue }) => issue);
}

function union<T>(lists: readonly (readonly T[])[]): T[] {
  const seen: T[] = [];
  for (const list of lists) {
    for (const item of list) {
      if (!seen.includes(item)) seen.push(item);
    }
  }
  return seen;
}

export function mergeRanges(all: readonly TravelRanges[]): TravelRanges {
  const merged: TravelRanges = {};
  for (const ranges of all) {
    for (const axis of AXES) {
      const range = ranges[axis];
      if (!range) continue;

      const current = merged[axis];
      merged[axis] = current
        ? { min: Math.min(current.min, range.min), max: Math.max(current.max, range.max) }
        : { ...range };
    }
  }
  return merged;
}

export function mergeStructures(all: readonly ProgramStructure[]): ProgramStructure {
  return {
    declared: union(all.map(structure => structure.declared)),
    called: union(all.map(structure => structure.called)),
    terminators: union(all.map(structure => structure.terminators)),
    returns: union(all.map(structure => structure.returns))
  };
}

export function sumCounts(all: readonly CommandCounts[]): CommandCounts {
  const total: CommandCounts = { total: 0, motion: 0, rapid: 0, linear: 0, arc: 0, calls: 0 };
  for (const counts of all) {
    total.total += counts.total;
    total.motion += counts.motion;
    total.rapid += counts.rapid;
    total.linear += counts.linear;
    total.arc += counts.arc;
    total.calls += counts.calls;
  }
  return total;
}

export class AnalysisAggregator {
  aggregate(root: AnalysisResult): AnalysisReport {
    const results = flattenResults(root);

    const issues = results.flatMap(result => sortIssues(result.issues));
    const errorCount = issues.filter(issue => issue.severity === 'error').length;
    const warningCount = issues.length - errorCount;
    const passed = errorCount === 0;

    return {
      file: root.file,
      positions: root.positions.map(position => ({ ...position })),
      result: root,
      issues,
      ranges: mergeRanges(results.map(result => result.ranges)),
      structure: mergeStructures(results.map(result => result.structure)),
      counts: sumCounts(results.map(result => result.counts)),
      errorCount,
      warningCount,
      passed,
      verdict: passed ? 'PASS' : 'FAIL'
    };
  }
}
