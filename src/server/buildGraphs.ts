import type {
  DependencyGraphs,
  DialectReport,
  ScriptFile,
  ScriptGraph,
  TableGraph,
  TableIdentity,
} from '../shared/types/dependencyGraph';

function appendUnique<K, V>(map: Map<K, V[]>, key: K, values: Iterable<V>): void {
  let list = map.get(key);
  if (!list) {
    list = [];
    map.set(key, list);
  }
  for (const value of values) {
    if (!list.includes(value)) list.push(value);
  }
}

/**
 * output table -> inputs of every script that writes it.
 * Tables that are only ever read never become keys.
 */
export function buildTableGraph(files: readonly ScriptFile[]): TableGraph {
  const graph: TableGraph = new Map();
  for (const file of files) {
    for (const output of file.outputs) {
      appendUnique(graph, output, file.inputs);
    }
  }
  return graph;
}

/**
 * Every script producing a table is a candidate upstream of every other
 * script reading it. No self-loops, no duplicate edges.
 */
export function buildScriptGraph(files: readonly ScriptFile[]): ScriptGraph {
  const producers = new Map<TableIdentity, string[]>();
  for (const file of files) {
    for (const output of file.outputs) {
      appendUnique(producers, output, [file.path]);
    }
  }

  const graph: ScriptGraph = new Map();
  for (const file of files) {
    const upstream = new Set<string>();
    for (const input of file.inputs) {
      for (const producer of producers.get(input) ?? []) {
        if (producer !== file.path) upstream.add(producer);
      }
    }
    if (upstream.size > 0) graph.set(file.path, Array.from(upstream));
  }
  return graph;
}

export function buildDialectReport(files: readonly ScriptFile[]): DialectReport {
  return new Map(files.map(file => [file.path, file.dialect] as const));
}

export function buildGraphs(files: readonly ScriptFile[]): DependencyGraphs {
  return {
    tables: buildTableGraph(files),
    scripts: buildScriptGraph(files),
    dialects: buildDialectReport(files),
  };
}
