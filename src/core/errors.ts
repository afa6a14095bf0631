/**
 * Typed failures raised by the layout and rendering engine.
 *
 * Every error carries a stable `code` so callers (CLI, MCP server, the
 * orchestrating renderer) can map it onto a `ValidationError` entry without
 * matching on messages.
 */
export type DiagramErrorCode =
  | 'DANGLING_REFERENCE'
  | 'DUPLICATE_NODE'
  | 'INVALID_GRAPH'
  | 'INVALID_CONFIG'
  | 'GLYPH_UNMAPPED'
  | 'UNSUPPORTED_TYPE';

export class DiagramError extends Error {
  readonly code: DiagramErrorCode;

  constructor(code: DiagramErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** An edge or group names a node id that the graph does not contain. */
export class DanglingReferenceError extends DiagramError {
  constructor(
    readonly missingId: string,
    readonly ref: { edgeIndex: number; from: string; to: string } | { groupId: string },
  ) {
    super(
      'DANGLING_REFERENCE',
      'edgeIndex' in ref
        ? `Edge #${ref.edgeIndex} (${ref.from} -> ${ref.to}) references unknown node "${missingId}"`
        : `Group "${ref.groupId}" references unknown node "${missingId}"`,
    );
  }
}

export class DuplicateNodeError extends DiagramError {
  constructor(readonly nodeId: string) {
    super('DUPLICATE_NODE', `Node id "${nodeId}" is declared more than once`);
  }
}

export class InvalidGraphError extends DiagramError {
  constructor(readonly issues: string[]) {
    super('INVALID_GRAPH', `Invalid graph model: ${issues.join('; ')}`);
  }
}

export class InvalidConfigError extends DiagramError {
  constructor(readonly issues: string[]) {
    super('INVALID_CONFIG', `Invalid options: ${issues.join('; ')}`);
  }
}

export class GlyphUnmappedError extends DiagramError {
  constructor(readonly role: string, readonly style: string) {
    super('GLYPH_UNMAPPED', `Character set "${style}" has no glyph for role "${role}"`);
  }
}

export class UnsupportedDiagramError extends DiagramError {
  constructor(readonly header: string | undefined) {
    super(
      'UNSUPPORTED_TYPE',
      header ? `Unsupported diagram header: "${header}"` : 'Empty input: no diagram header found',
    );
  }
}

export function isDiagramError(value: unknown): value is DiagramError {
  return value instanceof DiagramError;
}
