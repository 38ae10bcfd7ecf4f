// Types
export * from './types';
export * from './gcode/types';

// Engine
export { GCodeTokenizer, classifyLetter } from './gcode/GCodeTokenizer';
export {
  ValidationRule,
  VALIDATION_RULES,
  runValidationRules,
  checkSyntax,
  checkCoordinates,
  checkFeedRate,
  checkSpindleAndTool,
  recordStructuralMarkers
} from './validation/rules';
export { ProgramState, ProgramReference, MotionMode } from './state/program-state';
export { SubprogramResolver } from './resolver/SubprogramResolver';
export { ProgramAnalyzer, ProgramAnalysis } from './analysis/ProgramAnalyzer';
export { GCodeAnalyzer, AnalyzerOptions } from './analysis/GCodeAnalyzer';
export { AnalysisAggregator } from './analysis/AnalysisAggregator';
export { readSourceFile, decodeSource } from './analysis/source-reader';

// Report
export { ReportFormatter, ReportOptions } from './report/ReportFormatter';

// Settings and utilities
export {
  CheckerSettings,
  SettingsOverrides,
  DEFAULT_SETTINGS,
  createSettings,
  loadSettingsFile
} from './config/settings';
export { Logger } from './utils/logger';
export { ErrorHandler, CheckerError } from './utils/error-handler';
