import fs from 'fs';
import { z } from 'zod';
import { ErrorCode } from '../types';
import { ErrorHandler } from '../utils/error-handler';

export interface CheckerSettings {
  maxTravel: number; // mm
  maxFeedRate: number; // mm/min
  maxSpindleSpeed: number; // rpm
  supportedExtensions: string[];
  subprogramPrefixes: string[];
  subprogramExtensions: string[];
  supportedGCodes: number[];
  supportedMCodes: number[];
}

export const DEFAULT_SETTINGS: Readonly<CheckerSettings> = Object.freeze({
  maxTravel: 1000,
  maxFeedRate: 10000,
  maxSpindleSpeed: 30000,
  supportedExtensions: ['.nc', '.txt', '.gcode', '.cnc'],
  // Candidate subprogram file names are prefix-major: O<n>.txt, O<n>.nc, o<n>.txt, ...
  subprogramPrefixes: ['O', 'o', ''],
  subprogramExtensions: ['.txt', '.nc'],
  supportedGCodes: [0, 1, 2, 3],
  supportedMCodes: [2, 3, 5, 30, 98, 99]
});

const extension = z.string().regex(/^\.[A-Za-z0-9]+$/, 'extension must look like ".nc"');

export const settingsSchema = z.object({
  maxTravel: z.number().positive(),
  maxFeedRate: z.number().positive(),
  maxSpindleSpeed: z.number().positive(),
  supportedExtensions: z.array(extension),
  subprogramPrefixes: z.array(z.string().regex(/^[A-Za-z]*$/)).nonempty(),
  subprogramExtensions: z.array(extension).nonempty(),
  supportedGCodes: z.array(z.number().nonnegative()),
  supportedMCodes: z.array(z.number().int().nonnegative())
}).strict();

export type SettingsOverrides = Partial<CheckerSettings>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function createSettings(overrides: SettingsOverrides = {}): CheckerSettings {
  const merged = {
    ...DEFAULT_SETTINGS,
    ...Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined))
  };

  const parsed = settingsSchema.safeParse(merged);
  if (!parsed.success) {
    throw ErrorHandler.createError(
      ErrorCode.InvalidSettings,
      `Invalid settings: ${describeIssues(parsed.error)}`,
      parsed.error.issues
    );
  }
  return parsed.data;
}

// Reads a JSON file holding any subset of CheckerSettings
export function loadSettingsFile(filePath: string): SettingsOverrides {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw ErrorHandler.createError(
      ErrorCode.InvalidSettings,
      `Cannot read settings file ${filePath}: ${ErrorHandler.formatError(error)}`,
      error
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw ErrorHandler.createError(
      ErrorCode.InvalidSettings,
      `Settings file ${filePath} is not valid JSON`,
      error
    );
  }

  const parsed = settingsSchema.partial().safeParse(json);
  if (!parsed.success) {
    throw ErrorHandler.createError(
      ErrorCode.InvalidSettings,
      `Invalid settings in ${filePath}: ${describeIssues(parsed.error)}`,
      parsed.error.issues
    );
  }
  return parsed.data;
}
