import type { DiagramType } from './types.js';
import type { ParseOutcome } from './pipeline.js';
import { UnsupportedDiagramError } from './errors.js';
import { parseFlowchart } from '../diagrams/flowchart/index.js';
import { parseState } from '../diagrams/state/index.js';
import { parseClass } from '../diagrams/class/index.js';
import { parseGitGraph } from '../diagrams/gitgraph/index.js';

export type SupportedType = Exclude<DiagramType, 'unknown'>;

export interface DiagramKind {
  type: SupportedType;
  parse: (text: string) => ParseOutcome;
}

export function firstNonCommentLine(text: string): string | undefined {
  const lines = text.split(/\r?\n/);
  for (const line of lines) {
    const t = line.trim();
    if (!t) continue;
    if (t.startsWith('%%')) continue; // Mermaid comment
    return t;
  }
  return undefined;
}

export function detectDiagramType(text: string): DiagramType {
  const header = firstNonCommentLine(text);
  if (!header) return 'unknown';

  if (/^(flowchart|graph)\b/i.test(header)) return 'flowchart';
  if (/^stateDiagram(?:-v2)?\b/.test(header)) return 'state';
  if (/^classDiagram(?:-v2)?\b/.test(header)) return 'class';
  if (/^gitGraph\b/.test(header)) return 'gitgraph';
  return 'unknown';
}

const KINDS: Record<SupportedType, DiagramKind> = {
  flowchart: { type: 'flowchart', parse: parseFlowchart },
  state: { type: 'state', parse: parseState },
  class: { type: 'class', parse: parseClass },
  gitgraph: { type: 'gitgraph', parse: parseGitGraph },
};

export function diagramKind(type: DiagramType): DiagramKind | undefined {
  return type === 'unknown' ? undefined : KINDS[type];
}

/** Parse with the front end named by `type`, or by the header when omitted. */
export function parseDiagram(text: string, type?: SupportedType): ParseOutcome & { type: DiagramType } {
  const detected = type ?? detectDiagramType(text);
  const kind = diagramKind(detected);
  if (!kind) {
    const header = firstNonCommentLine(text);
    const error = new UnsupportedDiagramError(header);
    return {
      type: detected,
      errors: [
        {
          line: 1,
          column: 1,
          severity: 'error',
          code: error.code,
          message: error.message,
          hint: "Start with 'flowchart TD', 'stateDiagram-v2', 'classDiagram' or 'gitGraph'.",
          length: header ? Math.max(1, header.length) : 1,
        },
      ],
      warnings: [],
    };
  }
  return { type: detected, ...kind.parse(text) };
}
