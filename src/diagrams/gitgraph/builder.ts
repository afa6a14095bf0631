import type { CstNode, IToken } from 'chevrotain';
import type { ValidationError } from '../../core/types.js';
import { errorAtToken, warningAt } from '../../core/errorBuilder.js';
import type { Direction, EdgeRecord, GraphModel, NodeRecord, NodeShape } from '../../renderer/types.js';
import { cleanLabel, nodesOf, tokensOf } from '../cst-utils.js';

const COMMIT_SHAPES: Record<string, NodeShape> = {
  NORMAL: 'circle',
  HIGHLIGHT: 'hexagon',
  REVERSE: 'subroutine',
};

function toDirection(image: string | undefined): Direction {
  switch (image?.slice(0, 2)) {
    case 'BT': return 'BT';
    case 'LR': return 'LR';
    case 'RL': return 'RL';
    default: return 'TD';
  }
}

interface Branch {
  name: string;
  /** Latest commit; a new branch starts at the head it was created from. */
  head?: string;
  /** No commit made on the branch itself yet. */
  fresh: boolean;
}

interface CommitAttrs {
  id?: IToken;
  tag?: string;
  type?: string;
}

/**
 * Builds a commit graph. Each branch tracks its head; a commit links to the
 * head of the checked-out branch, a merge commit also to the merged head.
 */
export class GitGraphBuilder {
  private nodes = new Map<string, NodeRecord>();
  private edges: EdgeRecord[] = [];
  private branches = new Map<string, Branch>();
  private current = 'main';
  private counter = 0;
  private diagnostics: ValidationError[] = [];

  build(cst: CstNode): { graph: GraphModel; diagnostics: ValidationError[] } {
    this.nodes = new Map();
    this.edges = [];
    this.branches = new Map([['main', { name: 'main', fresh: false }]]);
    this.current = 'main';
    this.counter = 0;
    this.diagnostics = [];

    for (const stmt of nodesOf(cst, 'statement')) this.processStatement(stmt);

    const direction = toDirection(tokensOf(cst, 'HeaderDirection')[0]?.image);
    return { graph: { direction, nodes: [...this.nodes.values()], edges: this.edges }, diagnostics: this.diagnostics };
  }

  private processStatement(stmt: CstNode) {
    const commit = nodesOf(stmt, 'commitStmt')[0];
    if (commit) {
      this.commit(this.attrsOf(commit), tokensOf(commit, 'Commit')[0]);
      return;
    }
    const branch = nodesOf(stmt, 'branchStmt')[0];
    if (branch) {
      this.branch(branch);
      return;
    }
    const checkout = nodesOf(stmt, 'checkoutStmt')[0];
    if (checkout) {
      const ref = this.branchRef(checkout);
      if (ref && this.known(ref)) this.current = ref.name;
      return;
    }
    const merge = nodesOf(stmt, 'mergeStmt')[0];
    if (merge) this.merge(merge);
  }

  private attrsOf(cst: CstNode): CommitAttrs {
    const attrs: CommitAttrs = {};
    for (const attr of nodesOf(cst, 'commitAttr')) {
      const id = tokensOf(attr, 'id')[0];
      if (id) attrs.id = id;
      const tag = tokensOf(attr, 'tag')[0];
      if (tag) attrs.tag = cleanLabel(tag.image);
      const type = tokensOf(attr, 'CommitType')[0];
      if (type) attrs.type = type.image;
    }
    return attrs;
  }

  private branchRef(cst: CstNode): { name: string; token: IToken } | undefined {
    const ref = nodesOf(cst, 'branchName')[0];
    const token = ref ? (tokensOf(ref, 'Identifier')[0] ?? tokensOf(ref, 'QuotedString')[0]) : undefined;
    return token ? { name: cleanLabel(token.image), token } : undefined;
  }

  private known(ref: { name: string; token: IToken }): boolean {
    if (this.branches.has(ref.name)) return true;
    this.diagnostics.push(
      warningAt(ref.token.startLine, ref.token.startColumn, `Branch "${ref.name}" does not exist; the statement is ignored`, {
        code: 'GG-UNKNOWN-BRANCH',
        hint: `Create it first with 'branch ${ref.name}'.`,
        length: ref.token.image.length,
      }),
    );
    return false;
  }

  private branch(cst: CstNode) {
    const ref = this.branchRef(cst);
    if (!ref) return;
    if (this.branches.has(ref.name)) {
      this.diagnostics.push(
        warningAt(ref.token.startLine, ref.token.startColumn, `Branch "${ref.name}" already exists; checking it out instead`, {
          code: 'GG-BRANCH-EXISTS',
          length: ref.token.image.length,
        }),
      );
    } else {
      this.branches.set(ref.name, { name: ref.name, head: this.branches.get(this.current)?.head, fresh: true });
    }
    this.current = ref.name;
  }

  private nextId(): string {
    let id: string;
    do {
      this.counter += 1;
      id = `c${this.counter}`;
    } while (this.nodes.has(id));
    return id;
  }

  /** Adds the commit node; undefined when its id is already taken. */
  private addCommit(attrs: CommitAttrs, at: IToken | undefined): string | undefined {
    const id = attrs.id ? cleanLabel(attrs.id.image) : this.nextId();
    if (this.nodes.has(id)) {
      this.diagnostics.push(
        errorAtToken(attrs.id ?? at, `Commit id "${id}" is used twice`, {
          code: 'GG-DUPLICATE-COMMIT',
          length: attrs.id?.image.length,
        }),
      );
      return undefined;
    }
    const label = attrs.tag ? `${id}\n${attrs.tag}` : id;
    this.nodes.set(id, { id, label, shape: COMMIT_SHAPES[attrs.type ?? 'NORMAL'] ?? 'circle' });
    return id;
  }

  private commit(attrs: CommitAttrs, at: IToken | undefined) {
    const branch = this.branches.get(this.current);
    const id = this.addCommit(attrs, at);
    if (!branch || !id) return;
    if (branch.head) {
      const edge: EdgeRecord = { from: branch.head, to: id, kind: 'line' };
      if (branch.fresh) edge.label = branch.name;
      this.edges.push(edge);
    }
    branch.head = id;
    branch.fresh = false;
  }

  private merge(cst: CstNode) {
    const ref = this.branchRef(cst);
    if (!ref || !this.known(ref)) return;
    const source = this.branches.get(ref.name);
    const target = this.branches.get(this.current);
    if (!source || !target) return;
    if (source.name === target.name) {
      this.diagnostics.push(
        warningAt(ref.token.startLine, ref.token.startColumn, `Cannot merge branch "${ref.name}" into itself`, {
          code: 'GG-MERGE-SELF',
          length: ref.token.image.length,
        }),
      );
      return;
    }
    if (!source.head || source.head === target.head) {
      this.diagnostics.push(
        warningAt(ref.token.startLine, ref.token.startColumn, `Branch "${ref.name}" has no commits to merge`, {
          code: 'GG-MERGE-EMPTY',
          length: ref.token.image.length,
        }),
      );
      return;
    }
    const from = source.head;
    const parent = target.head;
    const id = this.addCommit(this.attrsOf(cst), tokensOf(cst, 'Merge')[0]);
    if (!id) return;
    if (parent) this.edges.push({ from: parent, to: id, kind: 'line' });
    this.edges.push({ from, to: id, kind: 'dotted' });
    target.head = id;
    target.fresh = false;
  }
}
