// Public SDK surface for programmatic use
export type { ValidationError, DiagramType } from './core/types.js';
export { SUPPORTED_DIAGRAM_TYPES } from './core/types.js';

// Diagram detection and front ends
export type { DiagramKind, SupportedType } from './core/router.js';
export { detectDiagramType, diagramKind, parseDiagram } from './core/router.js';
export type { ParseOutcome } from './core/pipeline.js';
export { parseFlowchart } from './diagrams/flowchart/index.js';
export { parseState } from './diagrams/state/index.js';
export { parseClass } from './diagrams/class/index.js';
export { parseGitGraph } from './diagrams/gitgraph/index.js';

// Rendering pipeline
export type { RenderOptions, RenderResult, GraphRenderOptions } from './renderer/index.js';
export { DiagramRenderer, renderDiagram, renderGraph, layoutGraph } from './renderer/index.js';
export type { ILayoutEngine, IRenderer } from './renderer/interfaces.js';
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
} from './renderer/types.js';
export { NODE_SHAPES, EDGE_KINDS, EDGE_MARKERS, DIRECTIONS, DIAMOND_STYLES } from './renderer/types.js';
export type { GridLayoutOptions } from './renderer/layout.js';
export { GridLayoutEngine } from './renderer/layout.js';
export type { TextRendererOptions } from './renderer/text-renderer.js';
export { TextRenderer } from './renderer/text-renderer.js';
export { JsonRenderer } from './renderer/json-renderer.js';
export { validateGraph } from './renderer/validate.js';

// Character sets and the canvas
export type { CharacterSet, CharacterSetName, GlyphRole, GlyphTable } from './renderer/charset.js';
export { CHARACTER_SET_NAMES, GLYPH_ROLES, defineCharacterSet, getCharacterSet, missingRoles } from './renderer/charset.js';
export { Canvas } from './renderer/canvas.js';

// Configuration, logging and errors
export type { LayoutConfig, LayoutConfigInput, RenderSettings, RenderSettingsInput } from './core/config.js';
export { resolveLayoutConfig, resolveRenderSettings } from './core/config.js';
export type { EngineLogger, LogMode } from './core/logger.js';
export { createLogger, silentLogger } from './core/logger.js';
export {
  DiagramError,
  DanglingReferenceError,
  DuplicateNodeError,
  InvalidGraphError,
  InvalidConfigError,
  GlyphUnmappedError,
  UnsupportedDiagramError,
  isDiagramError,
} from './core/errors.js';
export type { DiagramErrorCode } from './core/errors.js';

// Markdown utilities and reports
export type { DiagramBlock } from './core/markdown.js';
export { extractDiagramBlocks, offsetErrors } from './core/markdown.js';
export { textReport, toJsonResult } from './core/format.js';
