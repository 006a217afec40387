import { z } from 'zod';
import { InvalidParameters } from './errors';
import type { RegionName } from './regions';
import { clamp01 } from './utils';

export const DEFAULT_COLOR_MATCH_STRENGTH = 0.4;
export const DEFAULT_CONTRAST_ENHANCEMENT = 1.1;

const strength = z.number().finite();

const CAMEL_KEYS = {
  face_blend_strength: 'faceBlendStrength',
  eye_blend_strength: 'eyeBlendStrength',
  mouth_blend_strength: 'mouthBlendStrength',
  nose_blend_strength: 'noseBlendStrength',
  color_match_strength: 'colorMatchStrength',
  contrast_enhancement: 'contrastEnhancement',
} as const;

export const generationParametersSchema = z
  .object({
    faceBlendStrength: strength.optional(),
    eyeBlendStrength: strength.optional(),
    mouthBlendStrength: strength.optional(),
    noseBlendStrength: strength.optional(),
    colorMatchStrength: strength.optional(),
    contrastEnhancement: z.number().finite().positive().optional(),
  })
  .strict();

export type GenerationParameters = z.infer<typeof generationParametersSchema>;

/** Every value filled in: what a generation actually ran with. */
export type ResolvedParameters = Required<GenerationParameters>;

// Wire-style keys become camelCase; an explicit camelCase key wins.
function normalizeKeys(input: unknown): unknown {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) return input;
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (key in CAMEL_KEYS) continue;
    out[key] = value;
  }
  for (const [snake, camel] of Object.entries(CAMEL_KEYS)) {
    const value: unknown = Reflect.get(input, snake);
    if (value !== undefined && out[camel] === undefined) out[camel] = value;
  }
  return out;
}

/**
 * Validate caller-supplied parameters. Region strengths left out fall back to
 * the template's default weight for that region (0 when the template has no
 * such region); colour and contrast use the global defaults.
 */
export function resolveParameters(
  input: unknown,
  regionWeights: Partial<Record<RegionName, number>> = {},
): ResolvedParameters {
  const parsed = generationParametersSchema.safeParse(normalizeKeys(input ?? {}));
  if (!parsed.success) throw new InvalidParameters(parsed.error.issues);
  const p = parsed.data;
  return {
    faceBlendStrength: p.faceBlendStrength ?? regionWeights.face ?? 0,
    eyeBlendStrength: p.eyeBlendStrength ?? regionWeights.left_eye ?? regionWeights.right_eye ?? 0,
    mouthBlendStrength: p.mouthBlendStrength ?? regionWeights.mouth ?? 0,
    noseBlendStrength: p.noseBlendStrength ?? regionWeights.nose ?? 0,
    colorMatchStrength: p.colorMatchStrength ?? DEFAULT_COLOR_MATCH_STRENGTH,
    contrastEnhancement: p.contrastEnhancement ?? DEFAULT_CONTRAST_ENHANCEMENT,
  };
}

/** Blend strength for a region, clamped to 0..1. */
export function regionStrength(params: ResolvedParameters, region: RegionName): number {
  switch (region) {
    case 'face':
      return clamp01(params.faceBlendStrength);
    case 'left_eye':
    case 'right_eye':
      return clamp01(params.eyeBlendStrength);
    case 'nose':
      return clamp01(params.noseBlendStrength);
    case 'mouth':
      return clamp01(params.mouthBlendStrength);
  }
}
