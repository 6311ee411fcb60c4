export { resolveDialect, createParserStrategy, createParserStrategies, defaultStrategies } from './resolveDialect';
export type { DialectResolution, DiagnosticSink, ParseStrategy, ResolveOptions } from './resolveDialect';
export { extractDependencies, findTableReferences, statementTargets } from './extractDependencies';
export { buildGraphs, buildTableGraph, buildScriptGraph, buildDialectReport } from './buildGraphs';
export { analyzeScript, analyzeScripts } from './analyzeScripts';
export type { AnalyzeOptions } from './analyzeScripts';
export { discoverScripts } from './discoverScripts';
export { generateMermaidCode, generateDialectSummary, describeGraph, escapeMermaidText } from './generateMermaid';
export { normalizeTableIdentity, stripQuotes } from './utils/canonicalize';
export {
  DEFAULT_DIALECTS,
  DEFAULT_OUT_PREFIX,
  SUPPORTED_DIALECTS,
  outputPaths,
  parseDialectList,
  toDialectSpecs,
} from './config';
export type { DialectSpec, OutputPaths } from './config';
export { ConfigurationError, SqlDirectoryError } from './errors';
export * from '../shared/types/dependencyGraph';
