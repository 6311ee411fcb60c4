/**
 * Minimal view over the plain-object trees node-sql-parser produces.
 * Nothing here depends on a particular statement shape.
 */
export type SyntaxNode = Readonly<Record<string, unknown>>;

export function isSyntaxNode(value: unknown): value is SyntaxNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Depth-first, pre-order walk over every object node reachable from `tree`.
 * Returning `false` from `visit` skips that node's children.
 */
export function walkSyntaxTree(tree: unknown, visit: (node: SyntaxNode) => boolean | void): void {
  const seen = new Set<object>();

  function walk(value: unknown): void {
    if (Array.isArray(value)) {
      for (const item of value) walk(item);
      return;
    }
    if (!isSyntaxNode(value) || seen.has(value)) return;
    seen.add(value);

    if (visit(value) === false) return;
    for (const key of Object.keys(value)) {
      walk(value[key]);
    }
  }

  walk(tree);
}

/** Accepts `x` or `[x, ...]`, as node-sql-parser uses both for statement targets */
export function asNodeList(value: unknown): SyntaxNode[] {
  const items: unknown[] = Array.isArray(value) ? value : [value];
  return items.filter(isSyntaxNode);
}
