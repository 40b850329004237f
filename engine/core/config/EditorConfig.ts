/**
 * Editor configuration with validated defaults.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/EditorErrors.js';

export const MIN_MIRROR_TOLERANCE = 1e-3;

export const mirrorAxisSchema = z.enum(['x', 'y', 'z']);
export const slabOptionSchema = z.enum(['closestPoint', 'nearestNeighbour', 'alongNormal']);
export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const unitAmount = z.number().min(0).max(1);

export const editorConfigSchema = z.object({
  /** Multi-select editing with auto-selection mirroring disabled */
  precision: z.boolean().default(false),
  /** Label column searched by pattern filtering */
  searchColumn: z.number().int().nonnegative().default(0),
  /** Decimals shown in the weight list */
  weightDecimals: z.number().int().min(0).max(10).default(3),
  presets: z.array(unitAmount).default([0, 0.1, 0.25, 0.5, 0.75, 0.9, 1]),
  setAmount: unitAmount.default(0.05),
  incrementAmount: unitAmount.default(0.05),
  scalePercent: unitAmount.default(0.1),
  mirrorAxis: mirrorAxisSchema.default('x'),
  mirrorTolerance: z.number().min(MIN_MIRROR_TOLERANCE).default(MIN_MIRROR_TOLERANCE),
  slabOption: slabOptionSchema.default('closestPoint'),
  blendByDistance: z.boolean().default(false),
  resetActiveSelection: z.boolean().default(false),
  logLevel: logLevelSchema.default('info'),
});

export type EditorConfig = z.infer<typeof editorConfigSchema>;
export type EditorConfigInput = z.input<typeof editorConfigSchema>;
export type MirrorAxis = z.infer<typeof mirrorAxisSchema>;
export type SlabOption = z.infer<typeof slabOptionSchema>;

/**
 * Merge user settings with defaults.
 * @throws ValidationError when any field is out of range or mistyped
 */
export function resolveEditorConfig(input: EditorConfigInput = {}): EditorConfig {
  const result = editorConfigSchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod('resolveEditorConfig', result.error);
  }
  return result.data;
}
