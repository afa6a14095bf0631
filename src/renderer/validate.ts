import { z } from 'zod';
import { DanglingReferenceError, DuplicateNodeError, InvalidGraphError } from '../core/errors.js';
import { DIRECTIONS, EDGE_KINDS, EDGE_MARKERS, NODE_SHAPES, type GraphModel } from './types.js';

const NodeSchema = z.object({
  id: z.string().min(1),
  label: z.string(),
  shape: z.enum(NODE_SHAPES),
  compartments: z.array(z.string()).optional(),
  fill: z.string().optional(),
});

const EdgeSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  kind: z.enum(EDGE_KINDS),
  label: z.string().optional(),
  markerStart: z.enum(EDGE_MARKERS).optional(),
  markerEnd: z.enum(EDGE_MARKERS).optional(),
});

const GroupSchema = z.object({
  id: z.string().min(1),
  label: z.string(),
  members: z.array(z.string()),
});

export const GraphModelSchema = z.object({
  direction: z.enum(DIRECTIONS),
  nodes: z.array(NodeSchema),
  edges: z.array(EdgeSchema),
  groups: z.array(GroupSchema).optional(),
});

/**
 * Check the structure of an untrusted graph and its referential integrity.
 * Throws before any layout work happens.
 */
export function validateGraph(input: unknown): GraphModel {
  const parsed = GraphModelSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidGraphError(parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`));
  }
  const graph = parsed.data;

  const ids = new Set<string>();
  for (const node of graph.nodes) {
    if (ids.has(node.id)) throw new DuplicateNodeError(node.id);
    ids.add(node.id);
  }

  graph.edges.forEach((edge, edgeIndex) => {
    const missing = !ids.has(edge.from) ? edge.from : !ids.has(edge.to) ? edge.to : undefined;
    if (missing !== undefined) {
      throw new DanglingReferenceError(missing, { edgeIndex, from: edge.from, to: edge.to });
    }
  });

  for (const group of graph.groups ?? []) {
    const missing = group.members.find((m) => !ids.has(m));
    if (missing !== undefined) throw new DanglingReferenceError(missing, { groupId: group.id });
  }

  return graph;
}
