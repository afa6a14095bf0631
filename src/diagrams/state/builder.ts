import type { CstNode, IToken } from 'chevrotain';
import type { ValidationError } from '../../core/types.js';
import { warningAt } from '../../core/errorBuilder.js';
import type { Direction, EdgeRecord, GraphModel, GroupRecord, NodeRecord, NodeShape } from '../../renderer/types.js';
import { cleanLabel, nodesOf, tokensOf } from '../cst-utils.js';

const MARKER_SHAPES: Record<string, NodeShape> = {
  choice: 'diamond',
  fork: 'rectangle',
  join: 'rectangle',
};

function toDirection(image: string | undefined): Direction {
  switch (image?.toUpperCase()) {
    case 'BT': return 'BT';
    case 'LR': return 'LR';
    case 'RL': return 'RL';
    default: return 'TD';
  }
}

function colonText(tok: IToken | undefined): string | undefined {
  if (!tok) return undefined;
  const label = cleanLabel(tok.image.slice(1));
  return label === '' ? undefined : label;
}

interface Scope {
  /** Prefix for the pseudo-state ids of this scope; '' at the top level. */
  prefix: string;
  group?: GroupRecord;
  /** Composite states enclosing this scope, outermost first. */
  owners: string[];
}

/**
 * Builds a graph from a state diagram CST. `[*]` becomes one start and one
 * end pseudo-state per scope; composite states become groups, nested ones
 * folded into the outermost.
 */
export class StateBuilder {
  private nodes = new Map<string, NodeRecord>();
  private edges: EdgeRecord[] = [];
  private groups: GroupRecord[] = [];
  private grouped = new Set<string>();
  private described = new Set<string>();
  /** Composite id to the states drawn inside it. */
  private composites = new Map<string, string[]>();
  private diagnostics: ValidationError[] = [];
  private direction: Direction = 'TD';

  build(cst: CstNode): { graph: GraphModel; diagnostics: ValidationError[] } {
    this.nodes = new Map();
    this.edges = [];
    this.groups = [];
    this.grouped = new Set();
    this.described = new Set();
    this.composites = new Map();
    this.diagnostics = [];
    this.direction = 'TD';

    for (const stmt of nodesOf(cst, 'statement')) this.processStatement(stmt, { prefix: '', owners: [] }, 0);
    this.redirectCompositeEdges();

    const graph: GraphModel = { direction: this.direction, nodes: [...this.nodes.values()], edges: this.edges };
    if (this.groups.length > 0) graph.groups = this.groups;
    return { graph, diagnostics: this.diagnostics };
  }

  private processStatement(stmt: CstNode, scope: Scope, depth: number) {
    const direction = nodesOf(stmt, 'directionStmt')[0];
    if (direction) {
      if (depth === 0) this.direction = toDirection(tokensOf(direction, 'Direction')[0]?.image);
      return;
    }
    const transition = nodesOf(stmt, 'transitionStmt')[0];
    if (transition) {
      this.processTransition(transition, scope);
      return;
    }
    const state = nodesOf(stmt, 'stateStmt')[0];
    if (state) {
      this.processState(state, scope, depth);
      return;
    }
    const description = nodesOf(stmt, 'stateDescriptionStmt')[0];
    if (description) {
      const idTok = tokensOf(description, 'id')[0];
      if (!idTok) return;
      this.ensureNode(idTok.image, scope);
      const text = colonText(tokensOf(description, 'ColonLabel')[0]);
      if (text) this.describe(idTok.image, text);
    }
  }

  private processTransition(cst: CstNode, scope: Scope) {
    const from = nodesOf(cst, 'from')[0];
    const to = nodesOf(cst, 'to')[0];
    if (!from || !to) return;
    const edge: EdgeRecord = {
      from: this.resolveRef(from, scope, 'start'),
      to: this.resolveRef(to, scope, 'end'),
      kind: 'arrow',
    };
    const label = colonText(tokensOf(cst, 'ColonLabel')[0]);
    if (label) edge.label = label;
    this.edges.push(edge);
  }

  private resolveRef(ref: CstNode, scope: Scope, pseudo: 'start' | 'end'): string {
    if (tokensOf(ref, 'Start').length > 0) {
      const id = `${scope.prefix}[*]${pseudo}`;
      if (!this.nodes.has(id)) {
        this.nodes.set(id, { id, label: pseudo, shape: 'circle' });
        this.join(id, scope);
      }
      return id;
    }
    const id = tokensOf(ref, 'Identifier')[0]?.image ?? '';
    this.ensureNode(id, scope);
    return id;
  }

  private processState(cst: CstNode, scope: Scope, depth: number) {
    const idTok = tokensOf(cst, 'id')[0];
    if (!idTok) return;
    const id = idTok.image;
    const node = this.ensureNode(id, scope);

    const quoted = tokensOf(cst, 'description')[0];
    if (quoted) this.describe(id, cleanLabel(quoted.image));
    const text = colonText(tokensOf(cst, 'ColonLabel')[0]);
    if (text) this.describe(id, text);

    const marker = tokensOf(cst, 'marker')[0];
    if (marker) {
      const shape = MARKER_SHAPES[marker.image.toLowerCase()];
      if (shape) node.shape = shape;
      else {
        this.diagnostics.push(
          warningAt(marker.startLine, marker.startColumn, `Unknown state marker <<${marker.image}>>; drawn as a plain state`, {
            code: 'ST-MARKER-UNKNOWN',
            length: marker.image.length,
          }),
        );
      }
    }

    const body = nodesOf(cst, 'statement');
    if (tokensOf(cst, 'LCurly').length === 0) return;

    // The composite itself is drawn as the group frame, not as a node
    this.nodes.delete(id);
    this.grouped.delete(id);
    for (const owner of scope.owners) this.removeFrom(owner, id);
    if (!this.composites.has(id)) this.composites.set(id, []);
    let group = scope.group;
    if (!group) {
      group = { id, label: node.label, members: [] };
      this.groups.push(group);
    } else {
      group.members = group.members.filter((m) => m !== id);
    }
    const inner: Scope = { prefix: `${id}/`, group, owners: [...scope.owners, id] };
    for (const stmt of body) this.processStatement(stmt, inner, depth + 1);
  }

  private removeFrom(owner: string, id: string) {
    const inner = this.composites.get(owner);
    if (inner) this.composites.set(owner, inner.filter((m) => m !== id));
  }

  /**
   * Transitions naming a composite attach to its inner start (incoming) or
   * end (outgoing) pseudo-state, else to its first or last inner state. An
   * empty composite is drawn as an ordinary state.
   */
  private redirectCompositeEdges() {
    for (const [id, inner] of this.composites) {
      if (inner.length === 0) this.nodes.set(id, { id, label: this.groups.find((g) => g.id === id)?.label ?? id, shape: 'rounded' });
    }
    for (const edge of this.edges) {
      const into = this.composites.get(edge.to);
      if (into && into.length > 0) {
        edge.to = into.find((m) => m === `${edge.to}/[*]start`) ?? into[0];
      }
      const out = this.composites.get(edge.from);
      if (out && out.length > 0) {
        edge.from = out.find((m) => m === `${edge.from}/[*]end`) ?? out[out.length - 1];
      }
    }
  }

  private ensureNode(id: string, scope: Scope): NodeRecord {
    let node = this.nodes.get(id);
    // A composite referenced after its block: the record is a stand-in, edges are redirected later
    if (!node && this.composites.has(id)) {
      return { id, label: this.groups.find((g) => g.id === id)?.label ?? id, shape: 'rounded' };
    }
    if (!node) {
      node = { id, label: id, shape: 'rounded' };
      this.nodes.set(id, node);
    }
    this.join(id, scope);
    return node;
  }

  private join(id: string, scope: Scope) {
    if (this.composites.has(id)) return;
    if (scope.group && !this.grouped.has(id)) {
      scope.group.members.push(id);
      this.grouped.add(id);
    }
    for (const owner of scope.owners) {
      const inner = this.composites.get(owner);
      if (inner && !inner.includes(id)) inner.push(id);
    }
  }

  /** The first description replaces the id; later ones add lines. */
  private describe(id: string, text: string) {
    const group = this.groups.find((g) => g.id === id);
    if (group && this.composites.has(id)) {
      group.label = text;
      return;
    }
    const node = this.nodes.get(id);
    if (!node) return;
    node.label = this.described.has(id) ? `${node.label}\n${text}` : text;
    this.described.add(id);
  }
}
