import { CheckerSettings } from '../config/settings';
import { ParsedLine } from '../gcode/types';
import { ProgramState, codesOf, findToken, programNumber } from '../state/program-state';
import { Diagnostic, Severity } from '../types';

export type ValidationRule = (
  line: ParsedLine,
  state: ProgramState,
  settings: CheckerSettings
) => Diagnostic[];

const TERMINATOR_CODES = [2, 30];
const RETURN_CODE = 99;
const CALL_CODE = 98;
const SPINDLE_START_CODE = 3;

function diagnostic(line: ParsedLine, severity: Severity, message: string): Diagnostic {
  return { severity, message, line: line.lineNumber, code: line.original.trim() };
}

function formatCode(letter: string, value: number): string {
  return Number.isInteger(value) ? `${letter}${String(value).padStart(2, '0')}` : `${letter}${value}`;
}

export const checkSyntax: ValidationRule = (line, _state, settings) => {
  const diagnostics: Diagnostic[] = [];

  for (const token of line.tokens) {
    if (token.kind === 'unknown') {
      diagnostics.push(diagnostic(line, 'warning', `Unknown address "${token.raw}"`));
      continue;
    }
    if (token.value === undefined) continue;

    if (token.letter === 'G' && !settings.supportedGCodes.includes(token.value)) {
      diagnostics.push(diagnostic(line, 'warning', `Unsupported command ${formatCode('G', token.value)}`));
    }
    if (token.letter === 'M' && !settings.supportedMCodes.includes(token.value)) {
      diagnostics.push(diagnostic(line, 'warning', `Unsupported command ${formatCode('M', token.value)}`));
    }
  }

  if (codesOf(line, 'M').includes(CALL_CODE) && findToken(line, 'P')?.value === undefined) {
    diagnostics.push(diagnostic(line, 'warning', 'M98 without program number (P)'));
  }

  return diagnostics;
};

export const checkCoordinates: ValidationRule = (line, _state, settings) => {
  const diagnostics: Diagnostic[] = [];

  for (const token of line.tokens) {
    if (token.kind !== 'axis' || token.value === undefined) continue;

    if (Math.abs(token.value) > settings.maxTravel) {
      diagnostics.push(diagnostic(
        line,
        'warning',
        `${token.letter} coordinate ${token.value} exceeds typical travel range (${settings.maxTravel} mm)`
      ));
    }
  }

  return diagnostics;
};

export const checkFeedRate: ValidationRule = (line, _state, settings) => {
  const feed = findToken(line, 'F');
  if (feed?.value === undefined) return [];

  if (feed.value <= 0) {
    return [diagnostic(line, 'error', `Invalid feed rate F${feed.value}: feed rate must be positive`)];
  }
  if (feed.value > settings.maxFeedRate) {
    return [diagnostic(line, 'warning', `High feed rate: ${feed.value} mm/min`)];
  }
  return [];
};

export const checkSpindleAndTool: ValidationRule = (line, state, settings) => {
  const diagnostics: Diagnostic[] = [];
  const spindle = findToken(line, 'S');
  const tool = findToken(line, 'T');

  if (spindle?.value !== undefined) {
    if (spindle.value < 0) {
      diagnostics.push(diagnostic(line, 'error', `Invalid spindle speed S${spindle.value}: must not be negative`));
    } else if (spindle.value > settings.maxSpindleSpeed) {
      diagnostics.push(diagnostic(line, 'warning', `High spindle speed: ${spindle.value} rpm`));
    }
  }

  if (
    codesOf(line, 'M').includes(SPINDLE_START_CODE) &&
    spindle?.value === undefined &&
    state.getSpindleSpeed() === undefined
  ) {
    diagnostics.push(diagnostic(line, 'warning', 'Spindle started without speed (S)'));
  }

  if (tool?.value !== undefined && (tool.value < 0 || !Number.isInteger(tool.value))) {
    diagnostics.push(diagnostic(line, 'error', `Invalid tool number T${tool.value}`));
  }

  return diagnostics;
};

// Records program markers only; structural problems are reported once the call graph is known
export const recordStructuralMarkers: ValidationRule = (line, state) => {
  const program = programNumber(findToken(line, 'O'));
  if (program !== undefined) {
    state.declareProgram(program, line.lineNumber);
  }

  for (const code of codesOf(line, 'M')) {
    if (code === CALL_CODE) {
      const target = programNumber(findToken(line, 'P'));
      if (target !== undefined) {
        state.recordCall(target, line.lineNumber);
      }
    } else if (code === RETURN_CODE) {
      state.recordReturn(code);
    } else if (TERMINATOR_CODES.includes(code)) {
      state.recordTerminator(code);
    }
  }

  return [];
};

// Run in this order on every line
export const VALIDATION_RULES: readonly ValidationRule[] = [
  checkSyntax,
  checkCoordinates,
  checkFeedRate,
  checkSpindleAndTool,
  recordStructuralMarkers
];

export function runValidationRules(
  line: ParsedLine,
  state: ProgramState,
  settings: CheckerSettings,
  rules: readonly ValidationRule[] = VALIDATION_RULES
): Diagnostic[] {
  return rules.flatMap(rule => rule(line, state, settings));
}
