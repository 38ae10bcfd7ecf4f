import path from 'path';
import { CheckerSettings } from '../config/settings';
import { GCodeTokenizer } from '../gcode/GCodeTokenizer';
import { ProgramReference, ProgramState } from '../state/program-state';
import { AnalysisResult, Diagnostic, Issue } from '../types';
import { runValidationRules } from '../validation/rules';

// Result of one file before its subprogram calls are resolved
export interface ProgramAnalysis {
  result: AnalysisResult;
  calls: ProgramReference[];
  declarations: ProgramReference[];
}

export function toIssue(file: string, diagnostic: Diagnostic): Issue {
  return { ...diagnostic, file };
}

export function checkFileFormat(file: string, settings: CheckerSettings): Diagnostic[] {
  const extension = path.extname(file).toLowerCase();
  if (settings.supportedExtensions.includes(extension)) {
    return [];
  }
  return [{
    severity: 'warning',
    message: `File extension '${extension}' may not be standard G-code format`,
    line: 0
  }];
}

export class ProgramAnalyzer {
  private tokenizer = new GCodeTokenizer();

  constructor(private settings: CheckerSettings) {}

  analyze(source: string, file: string, filePath: string = file): ProgramAnalysis {
    const state = new ProgramState();
    const diagnostics: Diagnostic[] = [...checkFileFormat(file, this.settings)];

    const lines = source.split('\n');
    for (let i = 0; i < lines.length; i++) {
      const { line, diagnostics: tokenDiagnostics } = this.tokenizer.tokenize(lines[i], i + 1);
      diagnostics.push(...tokenDiagnostics);

      if (line.tokens.length === 0) continue;

      diagnostics.push(...runValidationRules(line, state, this.settings));
      diagnostics.push(...state.apply(line));
    }

    return {
      result: {
        file,
        path: filePath,
        positions: state.getHistory(),
        ranges: state.getRanges(),
        issues: diagnostics.map(diagnostic => toIssue(file, diagnostic)),
        structure: state.getStructure(),
        counts: state.getCounts(),
        subprograms: []
      },
      calls: state.getCalls(),
      declarations: state.getDeclarations()
    };
  }
}
