import { charWidth } from '../core/text.js';
import { glyph, type CharacterSet, type GlyphRole } from './charset.js';
import { paint } from './color.js';

/** Direction bits of a stroke passing through a cell. */
export const UP = 1;
export const DOWN = 2;
export const LEFT = 4;
export const RIGHT = 8;

export type LineStyle = 'solid' | 'dotted' | 'thick';

const STYLE_CODES: Record<LineStyle, number> = { solid: 0, dotted: 1, thick: 2 };

const STRAIGHT_ROLES: Record<LineStyle, { horizontal: GlyphRole; vertical: GlyphRole }> = {
  solid: { horizontal: 'line.horizontal', vertical: 'line.vertical' },
  dotted: { horizontal: 'line.dottedHorizontal', vertical: 'line.dottedVertical' },
  thick: { horizontal: 'line.thickHorizontal', vertical: 'line.thickVertical' },
};

function styleOf(code: number): LineStyle {
  return code === 1 ? 'dotted' : code === 2 ? 'thick' : 'solid';
}

/**
 * Glyph role for a set of stroke directions. Straight runs keep the line
 * style; bends and junctions always use the solid glyphs.
 */
export function roleForMask(mask: number, style: LineStyle = 'solid'): GlyphRole | undefined {
  const vertical = (mask & (UP | DOWN)) !== 0;
  const horizontal = (mask & (LEFT | RIGHT)) !== 0;
  if (!vertical && !horizontal) return undefined;
  if (!horizontal) return STRAIGHT_ROLES[style].vertical;
  if (!vertical) return STRAIGHT_ROLES[style].horizontal;
  switch (mask) {
    case DOWN | RIGHT: return 'corner.downRight';
    case DOWN | LEFT: return 'corner.downLeft';
    case UP | RIGHT: return 'corner.upRight';
    case UP | LEFT: return 'corner.upLeft';
    case LEFT | RIGHT | DOWN: return 'junction.teeDown';
    case LEFT | RIGHT | UP: return 'junction.teeUp';
    case UP | DOWN | RIGHT: return 'junction.teeRight';
    case UP | DOWN | LEFT: return 'junction.teeLeft';
    default: return 'junction.cross';
  }
}

/**
 * Character grid backed by flat row-major buffers. A wide glyph occupies its
 * cell plus an empty continuation cell to its right.
 */
export class Canvas {
  private readonly cells: string[];
  private readonly reserved: Uint8Array;
  private readonly links: Uint8Array;
  private readonly styles: Uint8Array;
  /** SGR code per cell; empty until something is painted. */
  private readonly paints = new Map<number, string>();

  constructor(readonly width: number, readonly height: number, private readonly charset: CharacterSet) {
    const size = Math.max(0, width) * Math.max(0, height);
    this.cells = new Array<string>(size).fill(' ');
    this.reserved = new Uint8Array(size);
    this.links = new Uint8Array(size);
    this.styles = new Uint8Array(size);
  }

  inBounds(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  private index(x: number, y: number): number {
    return y * this.width + x;
  }

  get(x: number, y: number): string {
    return this.inBounds(x, y) ? (this.cells[this.index(x, y)] ?? ' ') : ' ';
  }

  put(x: number, y: number, ch: string): void {
    if (!this.inBounds(x, y)) return;
    this.cells[this.index(x, y)] = ch;
  }

  draw(x: number, y: number, role: GlyphRole): void {
    this.put(x, y, glyph(this.charset, role));
  }

  reserve(x: number, y: number, width: number, height: number): void {
    for (let row = y; row < y + height; row++) {
      for (let col = x; col < x + width; col++) {
        if (this.inBounds(col, row)) this.reserved[this.index(col, row)] = 1;
      }
    }
  }

  isReserved(x: number, y: number): boolean {
    return this.inBounds(x, y) && this.reserved[this.index(x, y)] === 1;
  }

  /**
   * Write text starting at (x, y). Wide characters take two cells. With
   * `skipReserved`, cells inside node boxes are left untouched.
   */
  text(x: number, y: number, value: string, opts: { skipReserved?: boolean; paint?: string } = {}): void {
    let col = x;
    for (const char of Array.from(value)) {
      const w = charWidth(char);
      if (w === 0) continue;
      const blocked = opts.skipReserved && (this.isReserved(col, y) || (w === 2 && this.isReserved(col + 1, y)));
      if (!blocked && this.inBounds(col, y) && (w === 1 || this.inBounds(col + 1, y))) {
        this.put(col, y, char);
        if (w === 2) this.put(col + 1, y, '');
        if (opts.paint) this.paints.set(this.index(col, y), opts.paint);
      }
      col += w;
    }
  }

  /** Record stroke directions through a cell; reserved cells are skipped. */
  link(x: number, y: number, mask: number, style: LineStyle): void {
    if (!this.inBounds(x, y) || this.isReserved(x, y)) return;
    const i = this.index(x, y);
    this.links[i] = (this.links[i] ?? 0) | mask;
    this.styles[i] = STYLE_CODES[style];
  }

  linkMask(x: number, y: number): number {
    return this.inBounds(x, y) ? (this.links[this.index(x, y)] ?? 0) : 0;
  }

  /** Replace every linked cell with the line, corner or junction glyph for its mask. */
  resolveLinks(): void {
    for (let i = 0; i < this.links.length; i++) {
      const role = roleForMask(this.links[i] ?? 0, styleOf(this.styles[i] ?? 0));
      if (role) this.cells[i] = glyph(this.charset, role);
    }
  }

  rows(): string[] {
    const out: string[] = [];
    for (let y = 0; y < this.height; y++) {
      out.push(this.cells.slice(y * this.width, (y + 1) * this.width).join(''));
    }
    return out;
  }

  /**
   * Rows are right-trimmed, blank rows at either end dropped and the common
   * indentation removed. Joined with `\n`, without a trailing newline.
   * Painted cells are wrapped in ANSI escapes after trimming.
   */
  toString(): string {
    const rows = this.rows().map((r) => r.replace(/ +$/, ''));
    let start = 0;
    let end = rows.length;
    while (start < end && rows[start] === '') start++;
    while (end > start && rows[end - 1] === '') end--;
    const body = rows.slice(start, end);
    const indents = body.filter((r) => r !== '').map((r) => r.length - r.trimStart().length);
    const indent = indents.length > 0 ? Math.min(...indents) : 0;
    if (this.paints.size === 0) return body.map((r) => r.slice(indent)).join('\n');
    return body.map((r, k) => (r === '' ? '' : this.paintedRow(start + k, indent))).join('\n');
  }

  private paintedRow(y: number, indent: number): string {
    const first = y * this.width + indent;
    let last = (y + 1) * this.width;
    while (last > first && this.cells[last - 1] === ' ') last--;

    let out = '';
    let run = '';
    let code: string | undefined;
    for (let i = first; i < last; i++) {
      const next = this.paints.get(i);
      if (next !== code) {
        out += code ? paint(code, run) : run;
        run = '';
        code = next;
      }
      run += this.cells[i] ?? ' ';
    }
    return out + (code ? paint(code, run) : run);
  }
}
