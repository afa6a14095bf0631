import type { LayoutResult } from './types.js';
import type { IRenderer } from './interfaces.js';

/**
 * Serializes the computed geometry for consumers that draw it themselves.
 * Demonstrates the pluggability of the renderer architecture.
 */
export class JsonRenderer implements IRenderer {
  constructor(private readonly indent = 2) {}

  render(layout: LayoutResult): string {
    return JSON.stringify(
      {
        direction: layout.direction,
        width: layout.width,
        height: layout.height,
        nodes: layout.nodes.map((n) => ({
          id: n.id,
          label: n.label,
          shape: n.shape,
          ...(n.compartments ? { compartments: n.compartments } : {}),
          ...(n.fill ? { fill: n.fill } : {}),
          layer: n.layer,
          order: n.order,
          x: n.x,
          y: n.y,
          width: n.width,
          height: n.height,
        })),
        edges: layout.edges,
        groups: layout.groups,
        warnings: layout.warnings,
      },
      null,
      this.indent,
    );
  }
}
