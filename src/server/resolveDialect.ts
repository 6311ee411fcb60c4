import { Parser } from 'node-sql-parser';
import { UNKNOWN_DIALECT } from '../shared/types/dependencyGraph';
import { DEFAULT_DIALECTS, toDialectSpecs, type DialectSpec } from './config';
import { isSyntaxNode, type SyntaxNode } from './utils/syntaxTree';

export type DiagnosticSink = (message: string) => void;

export interface ParseStrategy {
  name: string;
  /** Parses the whole text or throws */
  parse(sqlText: string): SyntaxNode[];
}

export interface DialectResolution {
  statements: SyntaxNode[];
  dialect: string;
}

export interface ResolveOptions {
  strategies?: ParseStrategy[];
  onDiagnostic?: DiagnosticSink;
  source?: string; // Used to label diagnostics, usually the script path
}

const parser = new Parser();

export function createParserStrategy(dialect: DialectSpec): ParseStrategy {
  return {
    name: dialect.name,
    parse(sqlText: string): SyntaxNode[] {
      const ast = parser.astify(sqlText, { database: dialect.database });
      // astify returns a bare statement for single-statement input
      const statements: unknown[] = Array.isArray(ast) ? ast : [ast];
      return statements.filter(isSyntaxNode);
    },
  };
}

export function createParserStrategies(dialects: readonly DialectSpec[]): ParseStrategy[] {
  return dialects.map(createParserStrategy);
}

export const defaultStrategies: readonly ParseStrategy[] = createParserStrategies(toDialectSpecs(DEFAULT_DIALECTS));

const defaultDiagnosticSink: DiagnosticSink = message => console.error(message);

/**
 * Tries each strategy in order and returns the first one that parses the
 * whole text into at least one statement. Never throws.
 */
export function resolveDialect(sqlText: string, options: ResolveOptions = {}): DialectResolution {
  const strategies = options.strategies ?? defaultStrategies;
  const report = options.onDiagnostic ?? defaultDiagnosticSink;
  const label = options.source ? `${options.source}: ` : '';
  const failures: string[] = [];

  if (sqlText.trim().length > 0) {
    for (const strategy of strategies) {
      try {
        const statements = strategy.parse(sqlText);
        if (statements.length > 0) {
          return { statements, dialect: strategy.name };
        }
        failures.push(`${strategy.name}: no statements`);
      } catch (err) {
        failures.push(`${strategy.name}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  } else {
    failures.push('empty script');
  }

  const tried = strategies.map(s => s.name).join('/') || 'no dialects';
  report(`[WARN] ${label}Could not parse SQL under ${tried}.`);
  for (const failure of failures) {
    report(`  ${failure.split('\n')[0]}`);
  }

  return { statements: [], dialect: UNKNOWN_DIALECT };
}
