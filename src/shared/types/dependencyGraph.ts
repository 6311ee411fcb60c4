// Shapes shared by the extraction core, the renderer and the CLI

export const UNKNOWN_DIALECT = 'unknown';

/** Canonical `catalog.schema.table` key, with absent parts omitted */
export type TableIdentity = string;

export interface ScriptSource {
  path: string; // Relative to the scanned directory, always with "/" separators
  sql: string;
}

export interface TableDependencies {
  inputs: TableIdentity[];  // Tables read, first-seen order, no duplicates
  outputs: TableIdentity[]; // Targets of CREATE / INSERT
  dialect: string;          // Winning dialect label, or "unknown"
}

export interface ScriptFile extends TableDependencies {
  path: string;
}

/** output table -> tables it is built from */
export type TableGraph = Map<TableIdentity, TableIdentity[]>;

/** downstream script -> scripts whose outputs it reads */
export type ScriptGraph = Map<string, string[]>;

/** script -> detected dialect */
export type DialectReport = Map<string, string>;

export interface DependencyGraphs {
  tables: TableGraph;
  scripts: ScriptGraph;
  dialects: DialectReport;
}
