import { z } from 'zod';
import { LANDMARK_NAMES, REGION_NAMES } from './regions';

const pointSchema = z.object({ x: z.number(), y: z.number() });

const ellipseSchema = z.object({
  cx: z.number(),
  cy: z.number(),
  rx: z.number().positive(),
  ry: z.number().positive(),
});

export const maskShapeSchema = z.discriminatedUnion('type', [
  ellipseSchema.extend({ type: z.literal('ellipse') }),
  z.object({ type: z.literal('polygon'), points: z.array(pointSchema).min(3) }),
]);

export const regionSchema = z.object({
  name: z.enum(REGION_NAMES),
  anchors: z.array(z.enum(LANDMARK_NAMES)).min(1).optional(),
  outlineAnchors: z.boolean().default(false),
  mask: maskShapeSchema,
  feather: z.number().min(0).default(4),
  weight: z.number().min(0).max(1),
});

export const geometrySchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  landmarks: z.record(z.enum(LANDMARK_NAMES), pointSchema),
  outline: ellipseSchema,
  regions: z
    .array(regionSchema)
    .min(1)
    .refine((regions) => new Set(regions.map((r) => r.name)).size === regions.length, {
      message: 'region names must be unique',
    }),
});

const paint = {
  fill: z.string().optional(),
  stroke: z.string().optional(),
  strokeWidth: z.number().nonnegative().optional(),
};

export const placeholderShapeSchema = z.discriminatedUnion('type', [
  ellipseSchema.extend({ type: z.literal('ellipse'), ...paint }),
  z.object({ type: z.literal('path'), d: z.string().min(1), ...paint }),
  z.object({
    type: z.literal('line'),
    x1: z.number(),
    y1: z.number(),
    x2: z.number(),
    y2: z.number(),
    ...paint,
  }),
]);

export const placeholderSchema = z.object({
  background: z.string(),
  shapes: z.array(placeholderShapeSchema),
});

export const templateEntrySchema = geometrySchema.extend({
  id: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'ids use lowercase letters, digits, _ and -'),
  displayName: z.string().min(1),
  description: z.string().default(''),
  placeholder: placeholderSchema.optional(),
});

export const manifestSchema = z.object({
  version: z.literal(1),
  defaults: geometrySchema.extend({ placeholder: placeholderSchema }),
  templates: z.array(templateEntrySchema),
});

export type MaskShape = z.infer<typeof maskShapeSchema>;
export type TemplateGeometry = z.infer<typeof geometrySchema>;
export type PlaceholderShape = z.infer<typeof placeholderShapeSchema>;
export type PlaceholderSpec = z.infer<typeof placeholderSchema>;
export type TemplateManifest = z.infer<typeof manifestSchema>;
