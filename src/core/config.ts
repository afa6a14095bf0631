import { z } from 'zod';
import { InvalidConfigError } from './errors.js';
import { LOG_MODES } from './logger.js';
import { SUPPORTED_DIAGRAM_TYPES } from './types.js';
import { DIAMOND_STYLES, DIRECTIONS } from '../renderer/types.js';
import { CHARACTER_SET_NAMES } from '../renderer/charset.js';

/**
 * Spacing and sizing knobs of the grid layout, in character cells.
 */
export const LayoutConfigSchema = z.object({
  /** Gap between neighbouring nodes of one layer (cross axis). */
  nodeSep: z.number().int().min(0).default(1),
  /** Gap between consecutive layers (flow axis). */
  rankSep: z.number().int().min(3).default(4),
  minNodeWidth: z.number().int().min(1).default(5),
  minNodeHeight: z.number().int().min(1).default(3),
  /** Blank margin around the whole drawing. */
  padding: z.number().int().min(0).default(1),
  /** Barycenter sweeps; each pass is one down and one up sweep. */
  orderingPasses: z.number().int().min(0).max(32).default(4),
  /** Decision nodes: slanted `tall`, three-row `box`, or one-row `inline`. */
  diamondStyle: z.enum(DIAMOND_STYLES).default('tall'),
}).strict();

export type LayoutConfig = z.output<typeof LayoutConfigSchema>;
export type LayoutConfigInput = z.input<typeof LayoutConfigSchema>;

export const RenderOptionsSchema = z.object({
  style: z.enum(CHARACTER_SET_NAMES).default('unicode'),
  direction: z.enum(DIRECTIONS).optional(),
  format: z.enum(['text', 'json']).default('text'),
  layout: LayoutConfigSchema.partial().default({}),
  /** Paint labels of filled nodes with ANSI colours. */
  color: z.boolean().default(false),
}).strict();

export type RenderSettings = z.output<typeof RenderOptionsSchema>;
export type RenderSettingsInput = z.input<typeof RenderOptionsSchema>;

export const CliOptionsSchema = RenderOptionsSchema.extend({
  type: z.enum(SUPPORTED_DIAGRAM_TYPES).optional(),
  logLevel: z.enum(LOG_MODES).default('error'),
  output: z.string().optional(),
});

export type CliOptions = z.output<typeof CliOptionsSchema>;

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
}

/** Parse `input` against `schema`, raising `InvalidConfigError` with readable issue paths. */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) throw new InvalidConfigError(issuesOf(result.error));
  return result.data;
}

export function resolveLayoutConfig(input: LayoutConfigInput = {}): LayoutConfig {
  return parseOptions(LayoutConfigSchema, input);
}

export function resolveRenderSettings(input: RenderSettingsInput = {}): RenderSettings {
  return parseOptions(RenderOptionsSchema, input);
}
