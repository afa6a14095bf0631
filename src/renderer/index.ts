import { resolveRenderSettings, type RenderSettings, type RenderSettingsInput } from '../core/config.js';
import { isDiagramError } from '../core/errors.js';
import type { EngineLogger } from '../core/logger.js';
import { parseDiagram, type SupportedType } from '../core/router.js';
import type { DiagramType, ValidationError } from '../core/types.js';
import { getCharacterSet, type CharacterSet } from './charset.js';
import { JsonRenderer } from './json-renderer.js';
import { GridLayoutEngine } from './layout.js';
import { TextRenderer } from './text-renderer.js';
import type { ILayoutEngine, IRenderer } from './interfaces.js';
import type { GraphModel, LayoutResult, LayoutWarning } from './types.js';

export interface GraphRenderOptions extends RenderSettingsInput {
  /** Custom glyph table; takes precedence over `style`. */
  charset?: CharacterSet;
  logger?: EngineLogger;
}

export interface RenderOptions extends GraphRenderOptions {
  /** Skip header detection */
  type?: SupportedType;
  /** Custom layout engine (defaults to GridLayoutEngine) */
  layoutEngine?: ILayoutEngine;
  /** Custom renderer (defaults to TextRenderer, or JsonRenderer for `format: 'json'`) */
  renderer?: IRenderer;
}

export interface RenderResult {
  /** The drawing, or '' when anything failed. */
  output: string;
  type: DiagramType;
  graph?: GraphModel;
  layout?: LayoutResult;
  errors: ValidationError[];
  warnings: ValidationError[];
}

function settingsOf(options: GraphRenderOptions): RenderSettings {
  const { style, direction, format, layout, color } = options;
  return resolveRenderSettings({ style, direction, format, layout, color });
}

function rendererFor(settings: RenderSettings): IRenderer {
  if (settings.format === 'json') return new JsonRenderer();
  return new TextRenderer(undefined, { diamondStyle: settings.layout.diamondStyle, color: settings.color });
}

function engineFor(options: { layoutEngine?: ILayoutEngine; logger?: EngineLogger }, fallback: ILayoutEngine): ILayoutEngine {
  if (options.layoutEngine) return options.layoutEngine;
  return options.logger ? new GridLayoutEngine({ logger: options.logger }) : fallback;
}

function warningEntry(w: LayoutWarning): ValidationError {
  return { line: 1, column: 1, severity: 'warning', code: w.code, message: w.message };
}

function failureEntry(error: unknown): ValidationError {
  if (isDiagramError(error)) return { line: 1, column: 1, severity: 'error', code: error.code, message: error.message };
  throw error;
}

/**
 * Main renderer class that orchestrates the pipeline: detect, parse, build,
 * lay out, draw. Failures come back as error entries with an empty output.
 */
export class DiagramRenderer {
  private layoutEngine: ILayoutEngine;
  private renderer?: IRenderer;

  constructor(layoutEngine?: ILayoutEngine, renderer?: IRenderer) {
    this.layoutEngine = layoutEngine || new GridLayoutEngine();
    this.renderer = renderer;
  }

  render(text: string, options: RenderOptions = {}): RenderResult {
    let settings: RenderSettings;
    try {
      settings = settingsOf(options);
    } catch (error) {
      return { output: '', type: 'unknown', errors: [failureEntry(error)], warnings: [] };
    }

    const parsed = parseDiagram(text, options.type);
    const result: RenderResult = { output: '', type: parsed.type, errors: parsed.errors, warnings: parsed.warnings };
    if (!parsed.graph) return result;
    result.graph = parsed.graph;

    const layoutEngine = engineFor(options, this.layoutEngine);
    const renderer = options.renderer || (settings.format !== 'json' && this.renderer) || rendererFor(settings);

    try {
      const layout = layoutEngine.layout(parsed.graph, settings.direction, settings.layout);
      result.layout = layout;
      result.warnings = [...result.warnings, ...layout.warnings.map(warningEntry)];
      result.output = renderer.render(layout, options.charset ?? getCharacterSet(settings.style));
    } catch (error) {
      result.errors = [...result.errors, failureEntry(error)];
      result.output = '';
    }
    return result;
  }
}

/** Lay out a graph model; typed errors propagate. */
export function layoutGraph(graph: GraphModel, options: GraphRenderOptions = {}): LayoutResult {
  const settings = settingsOf(options);
  const engine = new GridLayoutEngine({ logger: options.logger });
  return engine.layout(graph, settings.direction, settings.layout);
}

/** Lay out and draw a graph model; typed errors propagate. */
export function renderGraph(graph: GraphModel, options: GraphRenderOptions = {}): string {
  const settings = settingsOf(options);
  const layout = new GridLayoutEngine({ logger: options.logger }).layout(graph, settings.direction, settings.layout);
  return rendererFor(settings).render(layout, options.charset ?? getCharacterSet(settings.style));
}

/**
 * Convenience function for one-off rendering
 */
export function renderDiagram(text: string, options: RenderOptions = {}): RenderResult {
  return new DiagramRenderer().render(text, options);
}

export type { ILayoutEngine, IRenderer } from './interfaces.js';
export type {
  DiamondStyle,
  Direction,
  EdgeKind,
  EdgeMarker,
  EdgeRecord,
  GraphModel,
  GroupRecord,
  LayoutResult,
  LayoutWarning,
  NodeRecord,
  NodeShape,
  Point,
  PositionedEdge,
  PositionedGroup,
  PositionedNode,
} from './types.js';
export { GridLayoutEngine } from './layout.js';
export { TextRenderer, type TextRendererOptions } from './text-renderer.js';
export { JsonRenderer } from './json-renderer.js';
