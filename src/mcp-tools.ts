import { z } from 'zod';
import { detectDiagramType } from './core/router.js';
import { extractDiagramBlocks } from './core/markdown.js';
import type { EngineLogger } from './core/logger.js';
import { DIRECTIONS } from './renderer/types.js';
import { CHARACTER_SET_NAMES } from './renderer/charset.js';
import { renderDiagram } from './renderer/index.js';

export const RenderDiagramSchema = z.object({
  text: z.string().describe('Diagram text (e.g. "flowchart TD\\nA-->B")'),
  style: z.enum(CHARACTER_SET_NAMES).optional().describe('Character set'),
  direction: z.enum(DIRECTIONS).optional().describe('Direction override'),
});

export const DetectDiagramSchema = z.object({
  text: z.string().describe('Diagram text or Markdown with ```mermaid blocks'),
});

export function renderDiagramTool(args: unknown, logger?: EngineLogger) {
  const { text, style, direction } = RenderDiagramSchema.parse(args);
  const result = renderDiagram(text, { style, direction, logger });
  return {
    valid: result.errors.length === 0,
    diagramType: result.type,
    output: result.output,
    errorCount: result.errors.length,
    warningCount: result.warnings.length,
    errors: result.errors,
    warnings: result.warnings,
  };
}

export function detectDiagramTool(args: unknown) {
  const { text } = DetectDiagramSchema.parse(args);
  const blocks = extractDiagramBlocks(text);
  if (blocks.length === 0) return { diagramType: detectDiagramType(text) };
  return { diagramTypes: blocks.map((b) => ({ line: b.startLine, diagramType: detectDiagramType(b.content) })) };
}
