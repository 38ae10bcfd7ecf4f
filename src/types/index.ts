// Shared types for the checker

export type Axis = 'x' | 'y' | 'z';

export const AXES: readonly Axis[] = ['x', 'y', 'z'];

export interface Position {
  x: number;
  y: number;
  z: number;
}

export interface TravelRange {
  min: number;
  max: number;
}

// An axis stays undefined until a coordinate on it has been seen
export interface TravelRanges {
  x?: TravelRange;
  y?: TravelRange;
  z?: TravelRange;
}

export type Severity = 'error' | 'warning';

// What a tokenizer pass or a validation rule reports for one line
export interface Diagnostic {
  severity: Severity;
  message: string;
  line: number; // 0 for file-level findings
  code?: string; // source line text
}

export interface Issue extends Diagnostic {
  file: string;
}

export interface ProgramStructure {
  declared: string[];
  called: string[];
  terminators: string[];
  returns: string[];
}

export interface CommandCounts {
  total: number;
  motion: number;
  rapid: number;
  linear: number;
  arc: number;
  calls: number;
}

export interface AnalysisResult {
  file: string;
  path: string;
  positions: Position[];
  ranges: TravelRanges;
  issues: Issue[];
  structure: ProgramStructure;
  counts: CommandCounts;
  subprograms: AnalysisResult[];
}

export type Verdict = 'PASS' | 'FAIL';

export interface AnalysisReport {
  file: string;
  positions: Position[];
  result: AnalysisResult;
  issues: Issue[];
  ranges: TravelRanges;
  structure: ProgramStructure;
  counts: CommandCounts;
  errorCount: number;
  warningCount: number;
  passed: boolean;
  verdict: Verdict;
}

// Error types
export enum ErrorCode {
  FileNotFound = 'FILE_NOT_FOUND',
  FileUnreadable = 'FILE_UNREADABLE',
  InvalidSettings = 'INVALID_SETTINGS'
}
