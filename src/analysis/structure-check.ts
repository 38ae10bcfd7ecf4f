import { ProgramReference } from '../state/program-state';
import { AnalysisResult, Issue } from '../types';

export interface FileNode {
  result: AnalysisResult;
  declarations: ProgramReference[];
  unresolved: ProgramReference[];
}

/**
 * Cross-file program structure checks, run once the whole call graph is known.
 *
 * A call is satisfied when any file of the graph declares the number or a
 * subprogram file was found for it. A declaration other than the first of its
 * file must be called from somewhere in the graph.
 */
export function checkProgramStructure(nodes: readonly FileNode[]): void {
  const declared = new Set<string>();
  const called = new Set<string>();
  for (const node of nodes) {
    node.result.structure.declared.forEach(program => declared.add(program));
    node.result.structure.called.forEach(program => called.add(program));
  }

  for (const node of nodes) {
    const { file } = node.result;
    const issues: Issue[] = [];

    for (const call of node.unresolved) {
      if (declared.has(call.program)) continue;
      issues.push({
        severity: 'warning',
        message: `Subprogram P${call.program} called but not defined`,
        line: call.line,
        file
      });
    }

    for (const declaration of node.declarations.slice(1)) {
      if (called.has(declaration.program)) continue;
      issues.push({
        severity: 'warning',
        message: `Subprogram O${declaration.program} defined but never called`,
        line: declaration.line,
        file
      });
    }

    node.result.issues.push(...issues);
  }
}
