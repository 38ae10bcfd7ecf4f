import { ParsedLine, Token } from '../gcode/types';
import {
  AXES,
  Axis,
  CommandCounts,
  Diagnostic,
  Position,
  ProgramStructure,
  TravelRanges
} from '../types';

export type MotionMode = 0 | 1 | 2 | 3;

// A program number, as written, together with the line it appears on
export interface ProgramReference {
  program: string;
  line: number;
}

const PROGRAM_DIGITS = /^\d+$/;

const MOTION_CODES: readonly number[] = [0, 1, 2, 3];

function isMotionMode(value: number): value is MotionMode {
  return MOTION_CODES.includes(value);
}

export function formatMCode(code: number): string {
  return `M${String(code).padStart(2, '0')}`;
}

export function findToken(line: ParsedLine, letter: string): Token | undefined {
  return line.tokens.find(token => token.letter === letter);
}

// Digits of an O or P word exactly as written, so O0100 stays "0100"
export function programNumber(token: Token | undefined): string | undefined {
  if (!token) return undefined;
  const digits = token.raw.substring(token.letter.length);
  return PROGRAM_DIGITS.test(digits) ? digits : undefined;
}

export function codesOf(line: ParsedLine, letter: 'G' | 'M'): number[] {
  const codes: number[] = [];
  for (const token of line.tokens) {
    if (token.letter === letter && token.value !== undefined) {
      codes.push(token.value);
    }
  }
  return codes;
}

// Modal machine state carried across the lines of one program file
export class ProgramState {
  private position: Position = { x: 0, y: 0, z: 0 };
  private history: Position[] = [];
  private ranges: TravelRanges = {};
  private motionMode?: MotionMode;
  private feedRate?: number;
  private spindleSpeed?: number;
  private counts: CommandCounts = { total: 0, motion: 0, rapid: 0, linear: 0, arc: 0, calls: 0 };
  private structure: ProgramStructure = { declared: [], called: [], terminators: [], returns: [] };
  private calls: ProgramReference[] = [];
  private declarations: ProgramReference[] = [];

  getPosition(): Position {
    return { ...this.position };
  }

  getHistory(): Position[] {
    return this.history.map(position => ({ ...position }));
  }

  getRanges(): TravelRanges {
    const copy: TravelRanges = {};
    for (const axis of AXES) {
      const range = this.ranges[axis];
      if (range) copy[axis] = { ...range };
    }
    return copy;
  }

  getMotionMode(): MotionMode | undefined {
    return this.motionMode;
  }

  getFeedRate(): number | undefined {
    return this.feedRate;
  }

  getSpindleSpeed(): number | undefined {
    return this.spindleSpeed;
  }

  getCounts(): CommandCounts {
    return { ...this.counts };
  }

  getStructure(): ProgramStructure {
    return {
      declared: [...this.structure.declared],
      called: [...this.structure.called],
      terminators: [...this.structure.terminators],
      returns: [...this.structure.returns]
    };
  }

  // First call site of every called program, in call order
  getCalls(): ProgramReference[] {
    return this.calls.map(call => ({ ...call }));
  }

  getDeclarations(): ProgramReference[] {
    return this.declarations.map(declaration => ({ ...declaration }));
  }

  declareProgram(program: string, line: number): void {
    if (!this.structure.declared.includes(program)) {
      this.structure.declared.push(program);
      this.declarations.push({ program, line });
    }
  }

  recordCall(program: string, line: number): void {
    this.counts.calls++;
    if (!this.structure.called.includes(program)) {
      this.structure.called.push(program);
      this.calls.push({ program, line });
    }
  }

  recordTerminator(code: number): void {
    const name = formatMCode(code);
    if (!this.structure.terminators.includes(name)) {
      this.structure.terminators.push(name);
    }
  }

  recordReturn(code: number): void {
    const name = formatMCode(code);
    if (!this.structure.returns.includes(name)) {
      this.structure.returns.push(name);
    }
  }

  // Applies one validated line: modal values, motion and extents
  apply(line: ParsedLine): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    if (line.tokens.length === 0) return diagnostics;

    this.counts.total++;

    let explicitMotion: MotionMode | undefined;
    for (const code of codesOf(line, 'G')) {
      if (isMotionMode(code)) explicitMotion = code;
    }
    if (explicitMotion !== undefined) {
      this.motionMode = explicitMotion;
    }

    const feed = findToken(line, 'F');
    if (feed?.value !== undefined) this.feedRate = feed.value;

    const spindle = findToken(line, 'S');
    if (spindle?.value !== undefined) this.spindleSpeed = spindle.value;

    const target: Partial<Position> = {};
    for (const token of line.tokens) {
      if (token.kind === 'axis' && token.value !== undefined) {
        target[this.axisOf(token.letter)] = token.value;
      }
    }
    const movesAxes = Object.keys(target).length > 0;

    const isArc = this.motionMode === 2 || this.motionMode === 3;
    if (isArc && (explicitMotion !== undefined || movesAxes)) {
      const hasCenter = line.tokens.some(token => token.kind === 'arc');
      if (!hasCenter) {
        diagnostics.push({
          severity: 'warning',
          message: `Arc command without center/radius (G0${this.motionMode})`,
          line: line.lineNumber,
          code: line.original.trim()
        });
      }
    }

    if (movesAxes) {
      this.move(target);
    }

    return diagnostics;
  }

  private move(target: Partial<Position>): void {
    this.position = { ...this.position, ...target };
    this.history.push({ ...this.position });

    this.counts.motion++;
    switch (this.motionMode) {
      case 0:
        this.counts.rapid++;
        break;
      case 1:
        this.counts.linear++;
        break;
      case 2:
      case 3:
        this.counts.arc++;
        break;
    }

    for (const axis of AXES) {
      const value = target[axis];
      if (value === undefined) continue;

      const range = this.ranges[axis];
      this.ranges[axis] = range
        ? { min: Math.min(range.min, value), max: Math.max(range.max, value) }
        : { min: value, max: value };
    }
  }

  private axisOf(letter: string): Axis {
    switch (letter) {
      case 'X':
        return 'x';
      case 'Y':
        return 'y';
      default:
        return 'z';
    }
  }
}
