export interface ValidationError {
  line: number;
  column: number;
  message: string;
  severity: 'error' | 'warning';
  code?: string;
  hint?: string;
  length?: number;
}

export type DiagramType = 'flowchart' | 'state' | 'class' | 'gitgraph' | 'unknown';

export const SUPPORTED_DIAGRAM_TYPES = ['flowchart', 'state', 'class', 'gitgraph'] as const satisfies readonly DiagramType[];
