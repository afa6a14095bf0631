import type { EdgeKind, EdgeRecord, GraphModel, NodeRecord, NodeShape } from '../types.js';

export function node(id: string, label = id, shape: NodeShape = 'rectangle'): NodeRecord {
  return { id, label, shape };
}

export function edge(from: string, to: string, kind: EdgeKind = 'arrow', extra: Partial<EdgeRecord> = {}): EdgeRecord {
  return { from, to, kind, ...extra };
}

/** Graph from `a>b` style pairs; nodes are declared in order of first mention. */
export function chain(pairs: string[], direction: GraphModel['direction'] = 'TD'): GraphModel {
  const ids: string[] = [];
  const edges = pairs.map((p) => {
    const [from, to] = p.split('>');
    for (const id of [from, to]) if (!ids.includes(id)) ids.push(id);
    return edge(from, to);
  });
  return { direction, nodes: ids.map((id) => node(id)), edges };
}
