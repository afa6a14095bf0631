import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { GlyphUnmappedError } from '../core/errors.js';
import { displayWidth } from '../core/text.js';

/**
 * Semantic glyph roles. Drawing code only ever asks for a role; the character
 * set decides which character appears in the cell.
 */
export const GLYPH_ROLES = [
  'box.topLeft', 'box.topRight', 'box.bottomLeft', 'box.bottomRight', 'box.horizontal', 'box.vertical',
  'box.separatorLeft', 'box.separatorRight',
  'round.topLeft', 'round.topRight', 'round.bottomLeft', 'round.bottomRight',
  'double.topLeft', 'double.topRight', 'double.bottomLeft', 'double.bottomRight', 'double.horizontal', 'double.vertical',
  'group.topLeft', 'group.topRight', 'group.bottomLeft', 'group.bottomRight', 'group.horizontal', 'group.vertical',
  'diamond.topLeft', 'diamond.topRight', 'diamond.bottomLeft', 'diamond.bottomRight', 'diamond.left', 'diamond.right',
  'diamond.corner',
  'circle.left', 'circle.right',
  'slant.forward', 'slant.back',
  'asymmetric.left',
  'line.horizontal', 'line.vertical',
  'line.dottedHorizontal', 'line.dottedVertical',
  'line.thickHorizontal', 'line.thickVertical',
  'corner.downRight', 'corner.downLeft', 'corner.upRight', 'corner.upLeft',
  'junction.teeDown', 'junction.teeUp', 'junction.teeRight', 'junction.teeLeft', 'junction.cross',
  'arrow.up', 'arrow.down', 'arrow.left', 'arrow.right',
  'marker.circle', 'marker.cross',
  'marker.triangleUp', 'marker.triangleDown', 'marker.triangleLeft', 'marker.triangleRight',
  'marker.diamond', 'marker.hollowDiamond',
] as const;

export type GlyphRole = (typeof GLYPH_ROLES)[number];

export const CHARACTER_SET_NAMES = ['ascii', 'unicode', 'unicode-math', 'compact'] as const;

export type CharacterSetName = (typeof CHARACTER_SET_NAMES)[number];

export type GlyphTable = Partial<Record<GlyphRole, string>>;

export interface CharacterSet {
  name: string;
  glyphs: GlyphTable;
}

const GlyphSchema = z.string().refine(
  (g) => Array.from(g).length === 1 && displayWidth(g) === 1,
  { message: 'glyph must be a single one-cell character' },
);

const GlyphTableSchema = z.record(z.enum(GLYPH_ROLES), GlyphSchema);

const CompleteTableSchema = GlyphTableSchema.superRefine((table, ctx) => {
  for (const role of GLYPH_ROLES) {
    if (table[role] === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [role], message: 'missing glyph' });
    }
  }
});

const BuiltinSetsSchema = z.object({
  ascii: CompleteTableSchema,
  unicode: CompleteTableSchema,
  'unicode-math': CompleteTableSchema,
  compact: CompleteTableSchema,
});

// Resolves from both src/renderer and dist/renderer.
const TABLE_URL = new URL('../../data/charsets.json', import.meta.url);

let builtins: Record<CharacterSetName, CharacterSet> | undefined;

function loadBuiltins(): Record<CharacterSetName, CharacterSet> {
  if (builtins) return builtins;
  const tables = BuiltinSetsSchema.parse(JSON.parse(readFileSync(TABLE_URL, 'utf8')));
  builtins = {
    ascii: { name: 'ascii', glyphs: tables.ascii },
    unicode: { name: 'unicode', glyphs: tables.unicode },
    'unicode-math': { name: 'unicode-math', glyphs: tables['unicode-math'] },
    compact: { name: 'compact', glyphs: tables.compact },
  };
  return builtins;
}

export function isCharacterSetName(value: string): value is CharacterSetName {
  return CHARACTER_SET_NAMES.some((n) => n === value);
}

export function getCharacterSet(name: CharacterSetName): CharacterSet {
  return loadBuiltins()[name];
}

/**
 * Build a custom set. `glyphs` may be partial; roles it does not cover fall
 * back to `base` when one is given, otherwise they stay unmapped.
 */
export function defineCharacterSet(name: string, glyphs: GlyphTable, base?: CharacterSetName): CharacterSet {
  const checked = GlyphTableSchema.parse(glyphs);
  return { name, glyphs: base ? { ...getCharacterSet(base).glyphs, ...checked } : checked };
}

export function glyph(set: CharacterSet, role: GlyphRole): string {
  const g = set.glyphs[role];
  if (g === undefined) throw new GlyphUnmappedError(role, set.name);
  return g;
}

export function missingRoles(set: CharacterSet): GlyphRole[] {
  return GLYPH_ROLES.filter((role) => set.glyphs[role] === undefined);
}
