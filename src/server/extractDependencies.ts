import type { TableDependencies, TableIdentity } from '../shared/types/dependencyGraph';
import type { DialectResolution } from './resolveDialect';
import { identifierPart, normalizeTableIdentity } from './utils/canonicalize';
import { asNodeList, walkSyntaxTree, type SyntaxNode } from './utils/syntaxTree';

/**
 * A table reference is any node naming a table that is not a column
 * reference. Column refs also carry a `table` qualifier, so they are excluded.
 */
function isTableReference(node: SyntaxNode): boolean {
  if (node.type === 'column_ref' || 'column' in node) return false;
  return identifierPart(node.table) !== null;
}

/**
 * Every table reference in the tree, in walk order, statement targets included.
 */
export function findTableReferences(tree: unknown): SyntaxNode[] {
  const found: SyntaxNode[] = [];
  walkSyntaxTree(tree, node => {
    if (isTableReference(node)) found.push(node);
  });
  return found;
}

/**
 * Tables written by a statement. Only creation and insertion count as writes.
 */
export function statementTargets(statement: SyntaxNode): SyntaxNode[] {
  switch (statement.type) {
    case 'create':
      if (statement.keyword === 'table') return asNodeList(statement.table);
      if (statement.keyword === 'view') return asNodeList(statement.view);
      return [];
    case 'insert':
    case 'replace':
      return asNodeList(statement.table);
    default:
      return [];
  }
}

/**
 * Classifies the table references of parsed statements into reads and writes.
 * A target is not a read just because it is named as the target; reading the
 * same table elsewhere in the statement keeps it an input.
 */
export function extractDependencies(resolution: DialectResolution): TableDependencies {
  const inputs = new Set<TableIdentity>();
  const outputs = new Set<TableIdentity>();

  for (const stmt of resolution.statements) {
    const targets = statementTargets(stmt);

    for (const target of targets) {
      const identity = normalizeTableIdentity(target);
      if (identity) outputs.add(identity);
    }

    const targetNodes = new Set<SyntaxNode>(targets);
    for (const ref of findTableReferences(stmt)) {
      if (targetNodes.has(ref)) continue;
      const identity = normalizeTableIdentity(ref);
      if (identity) inputs.add(identity);
    }
  }

  return {
    inputs: Array.from(inputs),
    outputs: Array.from(outputs),
    dialect: resolution.dialect,
  };
}
