#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { GCodeAnalyzer } from './analysis/GCodeAnalyzer';
import { SettingsOverrides, loadSettingsFile } from './config/settings';
import { ReportFormatter } from './report/ReportFormatter';
import { ErrorHandler } from './utils/error-handler';
import { Logger } from './utils/logger';

export const EXIT_PASS = 0;
export const EXIT_FAIL = 1;
export const EXIT_FATAL = 2;

interface CliOptions {
  maxTravel?: number;
  maxFeed?: number;
  maxSpindle?: number;
  config?: string;
  json?: boolean;
  color: boolean;
  verbose?: boolean;
}

function positiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

export function runCheck(file: string, options: CliOptions): number {
  const logger = new Logger('gcode-check', { quiet: options.json, verbose: options.verbose });

  try {
    // Command-line thresholds win over the settings file
    const settings: SettingsOverrides = options.config ? loadSettingsFile(options.config) : {};
    if (options.maxTravel !== undefined) settings.maxTravel = options.maxTravel;
    if (options.maxFeed !== undefined) settings.maxFeedRate = options.maxFeed;
    if (options.maxSpindle !== undefined) settings.maxSpindleSpeed = options.maxSpindle;

    const analyzer = new GCodeAnalyzer({ settings, logger: logger.child('analyzer') });
    logger.info(`Analyzing G-code file: ${file}`);
    const report = analyzer.analyzeFile(file);

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log(new ReportFormatter({ color: options.color }).format(report));
    }

    return report.passed ? EXIT_PASS : EXIT_FAIL;
  } catch (error) {
    if (ErrorHandler.isFatalInputError(error) || ErrorHandler.isSettingsError(error)) {
      console.error(chalk.red(`Error: ${ErrorHandler.formatError(error)}`));
      return EXIT_FATAL;
    }
    throw error;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('gcode-check')
    .description('Validate a CNC G-code program and the subprogram files it calls')
    .version('0.1.0')
    .argument('<file>', 'G-code file (.nc, .txt, .gcode, .cnc)')
    .option('--max-travel <mm>', 'Warn about coordinates beyond this distance', positiveNumber)
    .option('--max-feed <mm/min>', 'Warn about feed rates above this value', positiveNumber)
    .option('--max-spindle <rpm>', 'Warn about spindle speeds above this value', positiveNumber)
    .option('-c, --config <path>', 'JSON settings file')
    .option('--json', 'Print the report as JSON')
    .option('--no-color', 'Disable colored output')
    .option('-v, --verbose', 'Log subprogram resolution')
    .action((file: string, options: CliOptions) => {
      process.exitCode = runCheck(file, options);
    });

  return program;
}

if (require.main === module) {
  createProgram().parse();
}
