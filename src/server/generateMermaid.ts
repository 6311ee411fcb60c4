import type { DialectReport } from '../shared/types/dependencyGraph';

/**
 * Escapes text for use inside a quoted Mermaid label
 */
export function escapeMermaidText(text: string): string {
  return text
    .replace(/"/g, '#quot;') // Quotes end the label
    .replace(/\n/g, ' ')     // Replace newlines with spaces
    .replace(/\r/g, '');     // Remove carriage returns
}

/**
 * Generates Mermaid flowchart code from a dependency graph.
 * Each key is drawn as the target of an arrow from each of its sources;
 * self edges are left out. Nodes get ids n0, n1, ... in order of first
 * appearance and always carry their name as a quoted label.
 */
export function generateMermaidCode(graph: ReadonlyMap<string, readonly string[]>, header = 'graph TD'): string {
  const lines: string[] = [header];
  const nodeIds = new Map<string, string>();

  const node = (name: string): string => {
    let id = nodeIds.get(name);
    if (!id) {
      id = `n${nodeIds.size}`;
      nodeIds.set(name, id);
    }
    return `${id}["${escapeMermaidText(name)}"]`;
  };

  for (const [target, sources] of graph) {
    for (const source of sources) {
      if (source !== target) {
        const from = node(source);
        lines.push(`  ${from} --> ${node(target)}`);
      }
    }
  }

  return lines.join('\n') + '\n';
}

/**
 * One `<path>: <dialect>` line per scanned script
 */
export function generateDialectSummary(report: DialectReport): string {
  const lines: string[] = [];
  for (const [path, dialect] of report) {
    lines.push(`${path}: ${dialect}`);
  }
  return lines.map(line => line + '\n').join('');
}

export function describeGraph(graph: ReadonlyMap<string, readonly string[]>): string[] {
  return Array.from(graph, ([target, sources]) => `${target} <- ${sources.join(', ')}`);
}
