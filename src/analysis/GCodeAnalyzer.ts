import path from 'path';
import { CheckerSettings, SettingsOverrides, createSettings } from '../config/settings';
import { SubprogramResolver } from '../resolver/SubprogramResolver';
import { ProgramReference } from '../state/program-state';
import { AnalysisReport, AnalysisResult } from '../types';
import { ErrorHandler } from '../utils/error-handler';
import { Logger } from '../utils/logger';
import { AnalysisAggregator, sortIssues } from './AnalysisAggregator';
import { ProgramAnalyzer } from './ProgramAnalyzer';
import { readSourceFile } from './source-reader';
import { FileNode, checkProgramStructure } from './structure-check';

interface ResolutionContext {
  nodes: FileNode[];
  analyzed: Set<string>;
}

export interface AnalyzerOptions {
  settings?: SettingsOverrides;
  logger?: Logger;
}

/**
 * Analyzes a main program and every subprogram file it reaches.
 *
 * Files are processed depth first: a file is fully validated before its calls
 * are resolved. Each file is analyzed at most once per run, and a call back
 * into a file that is still on the current call chain is reported instead of
 * followed.
 */
export class GCodeAnalyzer {
  private settings: CheckerSettings;
  private programAnalyzer: ProgramAnalyzer;
  private resolver: SubprogramResolver;
  private aggregator = new AnalysisAggregator();
  private logger: Logger;

  constructor(options: AnalyzerOptions = {}) {
    this.settings = createSettings(options.settings);
    this.programAnalyzer = new ProgramAnalyzer(this.settings);
    this.resolver = new SubprogramResolver(this.settings);
    this.logger = options.logger ?? new Logger('GCodeAnalyzer');
  }

  getSettings(): CheckerSettings {
    return {
      ...this.settings,
      supportedExtensions: [...this.settings.supportedExtensions],
      subprogramPrefixes: [...this.settings.subprogramPrefixes],
      subprogramExtensions: [...this.settings.subprogramExtensions],
      supportedGCodes: [...this.settings.supportedGCodes],
      supportedMCodes: [...this.settings.supportedMCodes]
    };
  }

  // Throws a CheckerError when the main file cannot be read
  analyzeFile(filePath: string): AnalysisReport {
    const absolute = path.resolve(filePath);
    const source = readSourceFile(absolute);
    return this.run(source, absolute, true);
  }

  // Subprogram files are looked up next to `directory` when it is given
  analyzeSource(source: string, fileName = 'program.nc', directory?: string): AnalysisReport {
    const filePath = directory === undefined ? fileName : path.resolve(directory, fileName);
    return this.run(source, filePath, directory !== undefined);
  }

  private run(source: string, filePath: string, resolveFiles: boolean): AnalysisReport {
    const context: ResolutionContext = { nodes: [], analyzed: new Set() };
    const root = this.analyzeNode(source, filePath, [], context, resolveFiles);

    checkProgramStructure(context.nodes);
    for (const node of context.nodes) {
      node.result.issues = sortIssues(node.result.issues);
    }

    return this.aggregator.aggregate(root);
  }

  private analyzeNode(
    source: string,
    filePath: string,
    chain: readonly string[],
    context: ResolutionContext,
    resolveFiles: boolean
  ): AnalysisResult {
    const file = path.basename(filePath);
    const { result, calls, declarations } = this.programAnalyzer.analyze(source, file, filePath);

    const node: FileNode = { result, declarations, unresolved: [] };
    context.nodes.push(node);
    context.analyzed.add(filePath);

    const callChain = [...chain, filePath];
    const directory = path.dirname(filePath);

    for (const call of calls) {
      if (result.structure.declared.includes(call.program)) continue;

      const found = resolveFiles ? this.resolver.locate(directory, call.program) : undefined;
      if (!found) {
        node.unresolved.push(call);
        continue;
      }

      if (callChain.includes(found)) {
        this.warn(node, call, `Circular subprogram reference: ${path.basename(found)}`);
        continue;
      }

      if (context.analyzed.has(found)) {
        this.logger.debug(`Subprogram already analyzed: ${found}`);
        continue;
      }

      let subSource: string;
      try {
        subSource = readSourceFile(found);
      } catch (error) {
        if (!ErrorHandler.isFatalInputError(error)) throw error;
        this.warn(
          node,
          call,
          `Subprogram file ${path.basename(found)} could not be read: ${ErrorHandler.formatError(error)}`
        );
        node.unresolved.push(call);
        continue;
      }

      this.logger.debug(`Found subprogram: ${found}`);
      const child = this.analyzeNode(subSource, found, callChain, context, resolveFiles);
      result.subprograms.push(child);
      this.logger.debug(
        `Analyzed subprogram ${child.file}: ${child.counts.total} commands, ${child.issues.length} issues`
      );
    }

    return result;
  }

  private warn(node: FileNode, call: ProgramReference, message: string): void {
    node.result.issues.push({
      severity: 'warning',
      message,
      line: call.line,
      file: node.result.file
    });
  }
}
