import path from 'path';
import { GCodeAnalyzer } from '../src/analysis/GCodeAnalyzer';
import { ReportFormatter } from '../src/report/ReportFormatter';
import { Logger } from '../src/utils/logger';
import { GCODE_FIXTURES } from './fixtures/gcode-fixtures';
import { createProject, removeProject } from './helpers/temp-project';

const RULE = '='.repeat(60);

describe('ReportFormatter', () => {
  const analyzer = new GCodeAnalyzer({ logger: new Logger('test', { quiet: true }) });
  const formatter = new ReportFormatter({ color: false });

  test('should render the full report for a failing program', () => {
    const report = analyzer.analyzeSource('O1000\nG00 X0 Y0 Z5\nG01 X60.5 Y-3 F0\nM30', 'part.nc');

    expect(formatter.format(report).split('\n')).toEqual([
      RULE,
      'G-CODE ANALYSIS REPORT',
      RULE,
      'File: part.nc',
      'Total Commands Processed: 4',
      'Motion Commands: 2 (rapid 1, linear 1, arc 0)',
      '',
      'Program Structure:',
      '  Programs: O1000',
      '',
      'Travel Ranges:',
      '  X: 0.00 to 60.50 mm',
      '  Y: -3.00 to 0.00 mm',
      '  Z: 5.00 to 5.00 mm',
      '',
      'Validation Results:',
      '  Errors: 1',
      '  Warnings: 0',
      '',
      'ERRORS:',
      '  ✗ part.nc:3 Invalid feed rate F0: feed rate must be positive',
      '',
      'FINAL STATUS: FAIL',
      RULE
    ]);
  });

  test('should omit travel ranges when nothing moved', () => {
    const lines = formatter.format(analyzer.analyzeSource('M05', 'idle.tap')).split('\n');

    expect(lines).not.toContain('Travel Ranges:');
    expect(lines).toContain('  ⚠ idle.tap File extension \'.tap\' may not be standard G-code format');
    expect(lines).toContain('FINAL STATUS: PASS');
  });

  test('should list subprogram files', () => {
    const directory = createProject({
      'main.nc': GCODE_FIXTURES.callsSibling,
      'O2000.nc': GCODE_FIXTURES.subprogramWithError
    });

    try {
      const report = analyzer.analyzeFile(path.join(directory, 'main.nc'));
      const lines = formatter.format(report).split('\n');

      expect(lines).toContain('  Programs: O1000, O2000');
      expect(lines).toContain('  Subprogram Calls: P2000');
      expect(lines).toContain('Subprogram Files:');
      expect(lines).toContain('  O2000.nc: 4 commands, 1 errors, 0 warnings');
      expect(lines).toContain('  ✗ O2000.nc:2 Invalid feed rate F0: feed rate must be positive');
    } finally {
      removeProject(directory);
    }
  });
});
