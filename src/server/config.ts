import path from 'path';
import { ConfigurationError } from './errors';

export const DEFAULT_OUT_PREFIX = 'dependencies';

/**
 * Dialect label -> node-sql-parser `database` option.
 */
export const SUPPORTED_DIALECTS: Readonly<Record<string, string>> = {
  trino: 'Trino',
  postgresql: 'PostgresQL',
  mysql: 'MySQL',
  mariadb: 'MariaDB',
  bigquery: 'BigQuery',
  snowflake: 'Snowflake',
  redshift: 'Redshift',
  hive: 'Hive',
  sqlite: 'Sqlite',
  transactsql: 'TransactSQL',
  db2: 'DB2',
  flinksql: 'FlinkSQL',
  athena: 'Athena',
};

// Most specific grammar first, most permissive last
export const DEFAULT_DIALECTS: readonly string[] = ['trino', 'postgresql', 'mysql'];

export interface DialectSpec {
  name: string;     // Label written to the dialect report
  database: string; // Grammar name understood by the parser
}

export function toDialectSpecs(names: readonly string[]): DialectSpec[] {
  return names.map(name => {
    const database = SUPPORTED_DIALECTS[name];
    if (!database) {
      throw new ConfigurationError(
        `Unsupported dialect "${name}". Choose from: ${Object.keys(SUPPORTED_DIALECTS).join(', ')}`
      );
    }
    return { name, database };
  });
}

/**
 * Parses a comma separated dialect list such as "trino, MySQL".
 */
export function parseDialectList(text: string): DialectSpec[] {
  const names = text
    .split(',')
    .map(item => item.trim().toLowerCase())
    .filter(item => item.length > 0);

  if (names.length === 0) {
    throw new ConfigurationError('At least one dialect is required');
  }

  return toDialectSpecs(Array.from(new Set(names)));
}

export interface OutputPaths {
  tables: string;
  scripts: string;
  dialects: string;
}

export function outputPaths(prefix: string, outDir = '.'): OutputPaths {
  return {
    tables: path.join(outDir, `${prefix}_tables.mmd`),
    scripts: path.join(outDir, `${prefix}_scripts.mmd`),
    dialects: path.join(outDir, `${prefix}_dialects.txt`),
  };
}
