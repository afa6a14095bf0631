import { CliOptionsSchema, parseOptions, type CliOptions } from './config.js';
import { InvalidGraphError } from './errors.js';
import { extractDiagramBlocks, isMarkdownFile } from './markdown.js';
import { validateGraph } from '../renderer/validate.js';
import type { GraphModel } from '../renderer/types.js';

export interface ParsedArgs {
  positionals: string[];
  options: CliOptions;
  /** `types --json` */
  json: boolean;
  help: boolean;
}

const VALUE_FLAGS: Record<string, string> = {
  '--output': 'output',
  '-o': 'output',
  '--style': 'style',
  '-s': 'style',
  '--direction': 'direction',
  '-d': 'direction',
  '--format': 'format',
  '-f': 'format',
  '--type': 'type',
  '-t': 'type',
  '--log-level': 'logLevel',
};

const LAYOUT_FLAGS: Record<string, string> = {
  '--node-sep': 'nodeSep',
  '--rank-sep': 'rankSep',
  '--padding': 'padding',
  '--passes': 'orderingPasses',
};

/**
 * Hand-rolled flag loop; values are checked afterwards by the options schema,
 * so a bad `--style` surfaces as an `InvalidConfigError`.
 */
export function parseCliArgs(args: string[]): ParsedArgs {
  const raw: Record<string, unknown> = {};
  const layout: Record<string, unknown> = {};
  const positionals: string[] = [];
  let json = false;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    const eq = a.startsWith('--') ? a.indexOf('=') : -1;
    const flag = eq > 0 ? a.slice(0, eq) : a;
    const inline = eq > 0 ? a.slice(eq + 1) : undefined;
    const key = VALUE_FLAGS[flag];
    const layoutKey = LAYOUT_FLAGS[flag];
    if (flag === '--diamond') {
      const v = inline ?? args[++i];
      if (v !== undefined) layout.diamondStyle = v;
      continue;
    }
    if (key || layoutKey) {
      const v = inline ?? args[i + 1];
      if (inline === undefined) i++;
      if (v === undefined) continue;
      if (key) raw[key] = key === 'direction' ? v.toUpperCase() : v;
      else layout[layoutKey] = Number(v);
      continue;
    }
    if (a === '--json') { json = true; continue; }
    if (a === '--color') { raw.color = true; continue; }
    if (a === '--help' || a === '-h') { help = true; continue; }
    if (a === '-' || !a.startsWith('-')) positionals.push(a);
  }
  if (Object.keys(layout).length > 0) raw.layout = layout;
  if (raw.direction === 'TB') raw.direction = 'TD';

  return { positionals, options: parseOptions(CliOptionsSchema, raw), json, help };
}

export interface DiagramSource {
  content: string;
  /** Added to reported line numbers so they point into the enclosing file. */
  lineOffset: number;
}

/** Markdown files contribute each fenced block; anything else is one diagram. */
export function diagramsIn(filename: string, content: string): DiagramSource[] {
  if (!isMarkdownFile(filename)) return [{ content, lineOffset: 0 }];
  return extractDiagramBlocks(content).map((b) => ({ content: b.content, lineOffset: b.startLine - 1 }));
}

export function isGraphFile(filename: string): boolean {
  return /\.json$/i.test(filename);
}

/** Read a serialized `GraphModel`; malformed JSON is reported as an invalid graph. */
export function readGraphJson(text: string): GraphModel {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new InvalidGraphError([`not valid JSON (${error instanceof Error ? error.message : String(error)})`]);
  }
  return validateGraph(data);
}
