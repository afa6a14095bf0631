import type { CstNode, IToken, TokenType } from 'chevrotain';
import type { ValidationError } from '../../core/types.js';
import { errorAtToken } from '../../core/errorBuilder.js';
import type {
  Direction,
  EdgeKind,
  EdgeMarker,
  EdgeRecord,
  GraphModel,
  GroupRecord,
  NodeRecord,
  NodeShape,
} from '../../renderer/types.js';
import { cleanLabel, nodesOf, sliceBetween, sliceSpan, tokensOf, unquote } from '../cst-utils.js';
import * as t from './lexer.js';

interface ShapeSpec {
  close: TokenType[];
  shape: NodeShape;
}

const SHAPE_BY_OPENER = new Map<TokenType, ShapeSpec>([
  [t.SquareOpen, { close: [t.SquareClose], shape: 'rectangle' }],
  [t.RoundOpen, { close: [t.RoundClose], shape: 'rounded' }],
  [t.StadiumOpen, { close: [t.StadiumClose], shape: 'terminal' }],
  [t.DoubleSquareOpen, { close: [t.DoubleSquareClose], shape: 'subroutine' }],
  [t.DoubleRoundOpen, { close: [t.DoubleRoundClose], shape: 'circle' }],
  [t.DiamondOpen, { close: [t.DiamondClose], shape: 'diamond' }],
  [t.HexagonOpen, { close: [t.HexagonClose], shape: 'hexagon' }],
  [t.CylinderOpen, { close: [t.CylinderClose], shape: 'cylinder' }],
  [t.AngleOpen, { close: [t.SquareClose], shape: 'asymmetric' }],
  [t.SlashOpen, { close: [t.SlashClose, t.BackslashClose], shape: 'parallelogram' }],
  [t.BackslashOpen, { close: [t.BackslashClose, t.SlashClose], shape: 'parallelogram' }],
]);

interface LinkSpec {
  kind: EdgeKind;
  markerStart?: EdgeMarker;
  markerEnd?: EdgeMarker;
}

const LINKS = new Map<TokenType, LinkSpec>([
  [t.Arrow, { kind: 'arrow' }],
  [t.Line, { kind: 'line' }],
  [t.DottedArrow, { kind: 'dotted' }],
  [t.DottedLine, { kind: 'dotted', markerEnd: 'none' }],
  [t.ThickArrow, { kind: 'thick' }],
  [t.ThickLine, { kind: 'thick', markerEnd: 'none' }],
  [t.Invisible, { kind: 'invisible' }],
  [t.BiArrow, { kind: 'arrow', markerStart: 'arrow' }],
  [t.BiThickArrow, { kind: 'thick', markerStart: 'arrow' }],
  [t.BiDottedArrow, { kind: 'dotted', markerStart: 'arrow' }],
  [t.CircleEnd, { kind: 'line', markerEnd: 'circle' }],
  [t.CrossEnd, { kind: 'line', markerEnd: 'cross' }],
]);

/** `fill:` entry of a style list such as `fill:#f9f,stroke:#333`. */
function fillOf(styles: string): string | undefined {
  for (const part of styles.split(',')) {
    const [key, value] = part.split(':');
    if (key?.trim() === 'fill' && value?.trim()) return value.trim();
  }
  return undefined;
}

function toDirection(image: string | undefined): Direction {
  switch (image?.toUpperCase()) {
    case 'BT': return 'BT';
    case 'LR': return 'LR';
    case 'RL': return 'RL';
    default: return 'TD';
  }
}

/**
 * Transforms a flowchart CST into a graph model suitable for layout.
 * Nested subgraphs are folded into their outermost group.
 */
export class GraphBuilder {
  private nodes = new Map<string, NodeRecord>();
  private edges: EdgeRecord[] = [];
  private groups: GroupRecord[] = [];
  private grouped = new Set<string>();
  private diagnostics: ValidationError[] = [];
  private direction: Direction = 'TD';
  private text = '';
  /** Class name to fill, node id to class name, node id to inline fill. */
  private classFills = new Map<string, string>();
  private nodeClasses = new Map<string, string>();
  private nodeFills = new Map<string, string>();

  build(cst: CstNode, text: string): { graph: GraphModel; diagnostics: ValidationError[] } {
    this.reset(text);

    const header = nodesOf(cst, 'header')[0];
    if (header) this.direction = toDirection(tokensOf(header, 'DirectionValue')[0]?.image);

    for (const stmt of nodesOf(cst, 'statement')) this.processStatement(stmt, undefined, 0);
    this.applyFills();

    const graph: GraphModel = {
      direction: this.direction,
      nodes: [...this.nodes.values()],
      edges: this.edges,
    };
    if (this.groups.length > 0) graph.groups = this.groups;
    return { graph, diagnostics: this.diagnostics };
  }

  private reset(text: string) {
    this.nodes = new Map();
    this.edges = [];
    this.groups = [];
    this.grouped = new Set();
    this.diagnostics = [];
    this.direction = 'TD';
    this.text = text;
    this.classFills = new Map();
    this.nodeClasses = new Map();
    this.nodeFills = new Map();
  }

  // An inline `style` wins over the node's class.
  private applyFills() {
    for (const node of this.nodes.values()) {
      const className = this.nodeClasses.get(node.id);
      const fill = this.nodeFills.get(node.id) ?? (className === undefined ? undefined : this.classFills.get(className));
      if (fill) node.fill = fill;
    }
  }

  private processStyleLine(image: string) {
    const [keyword = '', target = '', ...rest] = image.trim().split(/\s+/);
    const names = target.split(',').filter((n) => n !== '');
    switch (keyword) {
      case 'classDef': {
        const fill = fillOf(rest.join(' '));
        if (fill) for (const name of names) this.classFills.set(name, fill);
        return;
      }
      case 'class':
        if (rest[0]) for (const id of names) this.nodeClasses.set(id, rest[0]);
        return;
      case 'style': {
        const fill = fillOf(rest.join(' '));
        if (fill) for (const id of names) this.nodeFills.set(id, fill);
        return;
      }
      default:
        // linkStyle and click have no effect on the drawing
        return;
    }
  }

  /** `group` is the outermost enclosing subgraph, if any; `depth` its nesting level. */
  private processStatement(stmt: CstNode, group: GroupRecord | undefined, depth: number) {
    const nodeStatement = nodesOf(stmt, 'nodeStatement')[0];
    if (nodeStatement) {
      this.processNodeStatement(nodeStatement, group);
      return;
    }
    const subgraph = nodesOf(stmt, 'subgraph')[0];
    if (subgraph) {
      this.processSubgraph(subgraph, group, depth);
      return;
    }
    const style = tokensOf(stmt, 'StyleLine')[0];
    if (style) {
      this.processStyleLine(style.image);
      return;
    }
    const direction = nodesOf(stmt, 'directionStatement')[0];
    // Inside a subgraph the direction has no effect: groups are laid out with the graph
    if (direction && depth === 0) {
      this.direction = toDirection(tokensOf(direction, 'DirectionValue')[0]?.image);
    }
  }

  private processSubgraph(cst: CstNode, outer: GroupRecord | undefined, depth: number) {
    let group = outer;
    if (!group) {
      const title = nodesOf(cst, 'subgraphTitle')[0];
      const raw = title ? sliceSpan(this.text, tokensOf(title, 'part')).trim() : '';
      const { id, label } = this.parseTitle(raw);
      group = { id, label, members: [] };
      this.groups.push(group);
    }
    for (const stmt of nodesOf(cst, 'statement')) this.processStatement(stmt, group, depth + 1);
  }

  private parseTitle(raw: string): { id: string; label: string } {
    const bracketed = /^([^\s[]+)\s*\[(.*)\]$/.exec(raw);
    if (bracketed) return { id: bracketed[1], label: cleanLabel(bracketed[2]) };
    if (raw === '') {
      const id = `subgraph${this.groups.length + 1}`;
      return { id, label: '' };
    }
    return { id: unquote(raw), label: cleanLabel(raw) };
  }

  private processNodeStatement(stmt: CstNode, group: GroupRecord | undefined) {
    const groups = nodesOf(stmt, 'nodeGroup').map((g) => this.processNodeGroup(g, group));
    const links = nodesOf(stmt, 'link');

    links.forEach((link, i) => {
      const sources = groups[i] ?? [];
      const targets = groups[i + 1] ?? [];
      const info = this.extractLinkInfo(link);
      for (const from of sources) {
        for (const to of targets) {
          const edge: EdgeRecord = { from, to, kind: info.kind };
          if (info.label) edge.label = info.label;
          if (info.markerStart) edge.markerStart = info.markerStart;
          if (info.markerEnd) edge.markerEnd = info.markerEnd;
          this.edges.push(edge);
        }
      }
    });
  }

  private processNodeGroup(cst: CstNode, group: GroupRecord | undefined): string[] {
    return nodesOf(cst, 'node').flatMap((node) => {
      const idTok = tokensOf(node, 'nodeId')[0];
      if (!idTok) return [];
      const id = idTok.image;
      const shape = nodesOf(node, 'shape')[0];
      const decl = shape ? this.extractShape(shape) : undefined;

      const existing = this.nodes.get(id);
      if (existing) {
        // A later declaration with a shape redefines the node
        if (decl) Object.assign(existing, decl);
      } else {
        this.nodes.set(id, { id, label: decl?.label ?? id, shape: decl?.shape ?? 'rectangle' });
      }

      const className = tokensOf(node, 'className')[0];
      if (className) this.nodeClasses.set(id, className.image);

      if (group && !this.grouped.has(id)) {
        group.members.push(id);
        this.grouped.add(id);
      }
      return [id];
    });
  }

  private extractShape(cst: CstNode): { label: string; shape: NodeShape } | undefined {
    const open = tokensOf(cst, 'open')[0];
    const close = tokensOf(cst, 'close')[0];
    if (!open || !close) return undefined;
    const known = SHAPE_BY_OPENER.get(open.tokenType);
    if (!known || !known.close.includes(close.tokenType)) {
      this.diagnostics.push(
        errorAtToken(close, `Node shape opened with "${open.image}" cannot be closed with "${close.image}"`, {
          code: 'FL-SHAPE-MISMATCH',
          length: close.image.length,
        }),
      );
      return undefined;
    }
    let shape = known.shape;
    // [/ text \] and [\ text /] are trapezoids
    if (open.tokenType === t.SlashOpen && close.tokenType === t.BackslashClose) shape = 'trapezoid';
    if (open.tokenType === t.BackslashOpen && close.tokenType === t.SlashClose) shape = 'trapezoid';
    return { label: cleanLabel(sliceBetween(this.text, open, close)), shape };
  }

  private extractLinkInfo(link: CstNode): LinkSpec & { label?: string } {
    const end: IToken | undefined = tokensOf(link, 'linkEnd')[0];
    const known: LinkSpec = (end && LINKS.get(end.tokenType)) ?? { kind: 'arrow' };
    const open = tokensOf(link, 'open')[0];
    const close = tokensOf(link, 'close')[0];

    let label: string | undefined;
    if (open && close) label = cleanLabel(sliceBetween(this.text, open, close));
    else if (open && end) label = cleanLabel(sliceBetween(this.text, open, end));
    return label ? { ...known, label } : { ...known };
  }
}
