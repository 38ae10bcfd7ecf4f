// Types for the G-code line tokenizer
import { Diagnostic } from '../types';

export type TokenKind = 'command' | 'axis' | 'arc' | 'program' | 'parameter' | 'unknown';

export interface Token {
  readonly letter: string;
  readonly value?: number; // absent for a bare program marker
  readonly raw: string;
  readonly kind: TokenKind;
}

export interface ParsedLine {
  readonly lineNumber: number;
  readonly original: string;
  readonly tokens: readonly Token[];
}

export interface TokenizeResult {
  line: ParsedLine;
  diagnostics: Diagnostic[];
}
