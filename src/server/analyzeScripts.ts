import type { DependencyGraphs, ScriptFile, ScriptSource } from '../shared/types/dependencyGraph';
import { buildGraphs } from './buildGraphs';
import { createParserStrategies, resolveDialect, type DiagnosticSink, type ParseStrategy } from './resolveDialect';
import { extractDependencies } from './extractDependencies';
import type { DialectSpec } from './config';

export interface AnalyzeOptions {
  dialects?: readonly DialectSpec[]; // Ordered candidates, defaults to trino/postgresql/mysql
  onDiagnostic?: DiagnosticSink;
}

function strategiesFor(options: AnalyzeOptions): ParseStrategy[] | undefined {
  return options.dialects ? createParserStrategies(options.dialects) : undefined;
}

export function analyzeScript(source: ScriptSource, options: AnalyzeOptions = {}): ScriptFile {
  return analyzeWith(source, strategiesFor(options), options.onDiagnostic);
}

function analyzeWith(source: ScriptSource, strategies: ParseStrategy[] | undefined, onDiagnostic?: DiagnosticSink): ScriptFile {
  const resolution = resolveDialect(source.sql, { strategies, onDiagnostic, source: source.path });
  return { path: source.path, ...extractDependencies(resolution) };
}

/**
 * Each script is analyzed on its own; the graphs are built in one pass
 * once every script has been analyzed.
 */
export function analyzeScripts(sources: readonly ScriptSource[], options: AnalyzeOptions = {}): DependencyGraphs & { files: ScriptFile[] } {
  const strategies = strategiesFor(options);
  const files = sources.map(source => analyzeWith(source, strategies, options.onDiagnostic));
  return { files, ...buildGraphs(files) };
}
