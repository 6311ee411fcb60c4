import { mkdirSync, writeFileSync } from 'fs';
import { analyzeScripts } from '../server/analyzeScripts';
import { discoverScripts } from '../server/discoverScripts';
import { outputPaths, type DialectSpec, type OutputPaths } from '../server/config';
import { describeGraph, generateDialectSummary, generateMermaidCode } from '../server/generateMermaid';
import type { DependencyGraphs, ScriptFile } from '../shared/types/dependencyGraph';
import * as output from './output';

export interface AnalyzeCommandOptions {
  sqlDir: string;
  outPrefix: string;
  outDir: string;
  dialects: DialectSpec[];
}

export interface AnalysisRun {
  files: ScriptFile[];
  graphs: DependencyGraphs;
  written: OutputPaths;
}

/**
 * Scans the SQL folder, builds both graphs and writes the diagram and
 * dialect files. Scripts that fail to parse are reported and kept as "unknown".
 * Throws when the folder is missing.
 */
export function runAnalysis(options: AnalyzeCommandOptions): AnalysisRun {
  const sources = discoverScripts(options.sqlDir);
  output.info(`Scanning SQL folder: ${options.sqlDir} (${sources.length} scripts)`);

  const { files, ...graphs } = analyzeScripts(sources, {
    dialects: options.dialects,
    onDiagnostic: output.warn,
  });

  output.header('Table-level dependencies');
  output.list(describeGraph(graphs.tables));

  output.header('Script-level dependencies (execution order)');
  output.list(describeGraph(graphs.scripts));

  output.header('Dialects detected');
  output.list(Array.from(graphs.dialects, ([path, dialect]) => `${path}: ${dialect}`));

  const written = outputPaths(options.outPrefix, options.outDir);
  mkdirSync(options.outDir, { recursive: true });
  writeFileSync(written.tables, generateMermaidCode(graphs.tables), 'utf-8');
  writeFileSync(written.scripts, generateMermaidCode(graphs.scripts), 'utf-8');
  writeFileSync(written.dialects, generateDialectSummary(graphs.dialects), 'utf-8');

  output.blank();
  output.success('Mermaid diagrams saved:');
  output.keyValue('  Tables', written.tables);
  output.keyValue('  Scripts', written.scripts);
  output.success('Dialect summary saved:');
  output.keyValue('  Dialects', written.dialects);

  return { files, graphs, written };
}
