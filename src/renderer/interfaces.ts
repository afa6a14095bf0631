import type { LayoutConfigInput } from '../core/config.js';
import type { CharacterSet } from './charset.js';
import type { Direction, GraphModel, LayoutResult } from './types.js';

/**
 * Interface for layout engines that place nodes and route edges on a grid
 */
export interface ILayoutEngine {
  /**
   * Calculate cell positions for a graph
   * @param direction Overrides the graph's own direction
   * @param config Merged over the engine's configuration
   */
  layout(graph: GraphModel, direction?: Direction, config?: LayoutConfigInput): LayoutResult;
}

/**
 * Interface for renderers that turn a laid-out graph into output
 */
export interface IRenderer {
  /**
   * @param charset Glyph table for text output; ignored by non-text renderers
   * @returns String representation (text drawing, JSON, etc.)
   */
  render(layout: LayoutResult, charset?: CharacterSet): string;
}
