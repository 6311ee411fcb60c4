/**
 * Helpers to turn node-sql-parser table references into graph keys
 */
import type { TableIdentity } from '../../shared/types/dependencyGraph';
import { isSyntaxNode, type SyntaxNode } from './syntaxTree';

const QUOTE_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ['"', '"'],
  ['`', '`'],
  ['[', ']'],
];

/**
 * Removes one layer of identifier quoting and unescapes doubled quotes.
 */
export function stripQuotes(s: string): string {
  const v = s.trim();
  for (const [open, close] of QUOTE_PAIRS) {
    if (v.length >= 2 && v.startsWith(open) && v.endsWith(close)) {
      return v.slice(1, -1).split(close + close).join(close);
    }
  }
  return v;
}

/**
 * Identifier parts come through either as plain strings or as `{ value }` wrappers
 */
export function identifierPart(value: unknown): string | null {
  if (typeof value === 'string') {
    const part = stripQuotes(value);
    return part.length > 0 ? part : null;
  }
  if (isSyntaxNode(value)) return identifierPart(value.value);
  return null;
}

/**
 * Builds `catalog.schema.table` from whichever parts the reference carries.
 * No case folding: identities compare as plain strings.
 */
export function normalizeTableIdentity(node: SyntaxNode): TableIdentity | null {
  const table = identifierPart(node.table) ?? identifierPart(node.view);
  if (!table) return null;

  const parts: string[] = [];
  const catalog = identifierPart(node.db);
  const schema = identifierPart(node.schema);
  if (catalog) parts.push(catalog);
  if (schema) parts.push(schema);
  parts.push(table);
  return parts.join('.');
}
