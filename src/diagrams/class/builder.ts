import type { CstNode, IToken } from 'chevrotain';
import type { ValidationError } from '../../core/types.js';
import {
  defaultMarkerEnd,
  type Direction,
  type EdgeMarker,
  type EdgeRecord,
  type GraphModel,
  type NodeRecord,
} from '../../renderer/types.js';
import { cleanLabel, nodesOf, tokensOf, unquote } from '../cst-utils.js';

interface ClassInfo {
  name: string;
  generic?: string;
  annotation?: string;
  attributes: string[];
  methods: string[];
}

// Ends that mark the parent or owner of a relation.
const STRUCTURAL = new Set<EdgeMarker>(['triangle', 'diamond', 'hollowDiamond']);

function markerOf(end: string | undefined): EdgeMarker {
  switch (end) {
    case '<|':
    case '|>':
      return 'triangle';
    case '*': return 'diamond';
    case 'o': return 'hollowDiamond';
    case '<':
    case '>':
      return 'arrow';
    default: return 'none';
  }
}

function toDirection(image: string | undefined): Direction {
  switch (image) {
    case 'BT': return 'BT';
    case 'LR': return 'LR';
    case 'RL': return 'RL';
    default: return 'TD';
  }
}

/** `List~int~` reads as `List<int>`. */
function generics(text: string): string {
  return text.replace(/~([^~]+)~/g, '<$1>');
}

/**
 * Builds one box per class, with attribute and method compartments, and one
 * edge per relation. A relation whose only decorated end is on the right is
 * turned around so the parent or owner is the source and lands above.
 */
export class ClassBuilder {
  private classes = new Map<string, ClassInfo>();
  private edges: EdgeRecord[] = [];
  private direction: Direction = 'TD';

  build(cst: CstNode): { graph: GraphModel; diagnostics: ValidationError[] } {
    this.classes = new Map();
    this.edges = [];
    this.direction = 'TD';

    for (const stmt of nodesOf(cst, 'statement')) this.processStatement(stmt);

    const nodes = [...this.classes.values()].map((c) => this.toNode(c));
    return { graph: { direction: this.direction, nodes, edges: this.edges }, diagnostics: [] };
  }

  private processStatement(stmt: CstNode) {
    const cls = nodesOf(stmt, 'classStmt')[0];
    if (cls) {
      this.processClass(cls);
      return;
    }
    const annotation = nodesOf(stmt, 'annotationStmt')[0];
    if (annotation) {
      const name = tokensOf(annotation, 'name')[0];
      const tag = tokensOf(annotation, 'Annotation')[0];
      if (name && tag) this.ensure(name.image).annotation = tag.image.slice(2, -2).trim();
      return;
    }
    const direction = nodesOf(stmt, 'directionStmt')[0];
    if (direction) {
      this.direction = toDirection(tokensOf(direction, 'Direction')[0]?.image);
      return;
    }
    const ref = nodesOf(stmt, 'classRefStmt')[0];
    if (ref) this.processClassRef(ref);
  }

  private ensure(name: string, generic?: IToken): ClassInfo {
    let info = this.classes.get(name);
    if (!info) {
      info = { name, attributes: [], methods: [] };
      this.classes.set(name, info);
    }
    if (generic) info.generic = generic.image.slice(1, -1);
    return info;
  }

  private addMember(info: ClassInfo, raw: string) {
    const member = generics(raw.trim());
    if (member === '') return;
    const annotation = /^<<(.+)>>$/.exec(member);
    if (annotation) {
      info.annotation = annotation[1].trim();
      return;
    }
    if (member.includes('(')) info.methods.push(member);
    else info.attributes.push(member);
  }

  private processClass(cst: CstNode) {
    const name = tokensOf(cst, 'name')[0];
    if (!name) return;
    const info = this.ensure(name.image, tokensOf(cst, 'Generic')[0]);
    const tag = tokensOf(cst, 'Annotation')[0];
    if (tag) info.annotation = tag.image.slice(2, -2).trim();
    const body = tokensOf(cst, 'Body')[0];
    if (body) {
      for (const line of body.image.slice(1, -1).split(/\r?\n/)) this.addMember(info, line);
    }
  }

  private processClassRef(cst: CstNode) {
    const from = tokensOf(cst, 'from')[0];
    if (!from) return;
    const source = this.ensure(from.image, tokensOf(cst, 'fromGeneric')[0]);
    const member = tokensOf(cst, 'member')[0];
    if (member) {
      this.addMember(source, member.image.slice(1));
      return;
    }
    const tail = nodesOf(cst, 'relationTail')[0];
    if (tail) this.processRelation(source.name, tail);
  }

  private processRelation(fromName: string, tail: CstNode) {
    const to = tokensOf(tail, 'to')[0];
    const relation = tokensOf(tail, 'Relation')[0];
    if (!to || !relation) return;
    this.ensure(to.image, tokensOf(tail, 'toGeneric')[0]);

    const parts = /^(<\||\*|o|<)?(--|\.\.)(\|>|\*|o|>)?$/.exec(relation.image);
    const kind = parts?.[2] === '..' ? 'dotted' : 'line';
    let start = markerOf(parts?.[1]);
    let end = markerOf(parts?.[3]);
    let from = fromName;
    let target = to.image;
    let fromCard = tokensOf(tail, 'fromCard')[0];
    let toCard = tokensOf(tail, 'toCard')[0];
    if (STRUCTURAL.has(end) && !STRUCTURAL.has(start)) {
      [from, target] = [target, from];
      [start, end] = [end, start];
      [fromCard, toCard] = [toCard, fromCard];
    }

    const colon = tokensOf(tail, 'label')[0];
    const label = [
      fromCard ? unquote(fromCard.image) : '',
      colon ? cleanLabel(colon.image.slice(1)) : '',
      toCard ? unquote(toCard.image) : '',
    ].filter((p) => p !== '').join(' ');

    const edge: EdgeRecord = { from, to: target, kind };
    if (label) edge.label = label;
    if (start !== 'none') edge.markerStart = start;
    if (end !== defaultMarkerEnd(kind)) edge.markerEnd = end;
    this.edges.push(edge);
  }

  private toNode(info: ClassInfo): NodeRecord {
    const name = info.generic ? `${info.name}<${info.generic}>` : info.name;
    const label = info.annotation ? `<<${info.annotation}>>\n${name}` : name;
    const node: NodeRecord = { id: info.name, label, shape: 'rectangle' };
    if (info.attributes.length > 0 || info.methods.length > 0) {
      node.compartments = [info.attributes.join('\n'), info.methods.join('\n')];
    }
    return node;
  }
}
