import chalk from 'chalk';
import { flattenResults } from '../analysis/AnalysisAggregator';
import { AXES, AnalysisReport, Issue } from '../types';

export interface ReportOptions {
  color?: boolean;
}

const RULE = '='.repeat(60);

function location(issue: Issue): string {
  return issue.line > 0 ? `${issue.file}:${issue.line}` : issue.file;
}

export class ReportFormatter {
  private chalk: InstanceType<typeof chalk.Instance>;

  constructor(options: ReportOptions = {}) {
    this.chalk = new chalk.Instance({ level: options.color === false ? 0 : chalk.level });
  }

  format(report: AnalysisReport): string {
    const c = this.chalk;
    const lines: string[] = [];

    lines.push(RULE, c.bold('G-CODE ANALYSIS REPORT'), RULE);
    lines.push(`File: ${report.file}`);
    lines.push(`Total Commands Processed: ${report.counts.total}`);
    lines.push(
      `Motion Commands: ${report.counts.motion} ` +
      `(rapid ${report.counts.rapid}, linear ${report.counts.linear}, arc ${report.counts.arc})`
    );

    const { declared, called } = report.structure;
    if (declared.length > 0 || called.length > 0) {
      lines.push('', 'Program Structure:');
      if (declared.length > 0) {
        lines.push(`  Programs: ${declared.map(program => `O${program}`).join(', ')}`);
      }
      if (called.length > 0) {
        lines.push(`  Subprogram Calls: ${called.map(program => `P${program}`).join(', ')}`);
      }
    }

    const subprograms = flattenResults(report.result).slice(1);
    if (subprograms.length > 0) {
      lines.push('', 'Subprogram Files:');
      for (const result of subprograms) {
        const errors = result.issues.filter(issue => issue.severity === 'error').length;
        const warnings = result.issues.length - errors;
        lines.push(
          `  ${result.file}: ${result.counts.total} commands, ${errors} errors, ${warnings} warnings`
        );
      }
    }

    const axes = AXES.filter(axis => report.ranges[axis] !== undefined);
    if (axes.length > 0) {
      lines.push('', 'Travel Ranges:');
      for (const axis of axes) {
        const range = report.ranges[axis];
        if (!range) continue;
        lines.push(`  ${axis.toUpperCase()}: ${range.min.toFixed(2)} to ${range.max.toFixed(2)} mm`);
      }
    }

    lines.push('', 'Validation Results:');
    lines.push(`  Errors: ${report.errorCount}`);
    lines.push(`  Warnings: ${report.warningCount}`);

    const errors = report.issues.filter(issue => issue.severity === 'error');
    if (errors.length > 0) {
      lines.push('', c.red('ERRORS:'));
      errors.forEach(issue => lines.push(c.red(`  ✗ ${location(issue)} ${issue.message}`)));
    }

    const warnings = report.issues.filter(issue => issue.severity === 'warning');
    if (warnings.length > 0) {
      lines.push('', c.yellow('WARNINGS:'));
      warnings.forEach(issue => lines.push(c.yellow(`  ⚠ ${location(issue)} ${issue.message}`)));
    }

    const status = report.passed ? c.green('PASS') : c.red('FAIL');
    lines.push('', `FINAL STATUS: ${status}`, RULE);

    return lines.join('\n');
  }
}
