// Deterministic stand-in artwork for templates whose image file is missing.
import { LANDMARK_NAMES } from './regions';
import { rasterizeSvg, type RasterImage } from './image';
import type { PlaceholderShape, PlaceholderSpec, TemplateGeometry } from './template-schema';

function escapeAttr(value: string) {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;');
}

function paintAttrs(shape: PlaceholderShape) {
  const attrs = [`fill="${escapeAttr(shape.fill ?? 'none')}"`];
  if (shape.stroke) attrs.push(`stroke="${escapeAttr(shape.stroke)}"`);
  if (shape.strokeWidth !== undefined) attrs.push(`stroke-width="${shape.strokeWidth}"`);
  return attrs.join(' ');
}

function shapeTag(shape: PlaceholderShape): string {
  switch (shape.type) {
    case 'ellipse':
      return `<ellipse cx="${shape.cx}" cy="${shape.cy}" rx="${shape.rx}" ry="${shape.ry}" ${paintAttrs(shape)} />`;
    case 'path':
      return `<path d="${escapeAttr(shape.d)}" ${paintAttrs(shape)} />`;
    case 'line':
      return `<line x1="${shape.x1}" y1="${shape.y1}" x2="${shape.x2}" y2="${shape.y2}" stroke-linecap="round" ${paintAttrs(shape)} />`;
  }
}

export function placeholderSvg(width: number, height: number, spec: PlaceholderSpec): string {
  const body = spec.shapes.map(shapeTag).join('\n  ');
  return `<?xml version="1.0" encoding="UTF-8"?>
<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">
  <rect x="0" y="0" width="${width}" height="${height}" fill="${escapeAttr(spec.background)}" />
  ${body}
</svg>`;
}

export async function renderPlaceholder(width: number, height: number, spec: PlaceholderSpec): Promise<RasterImage> {
  return rasterizeSvg(placeholderSvg(width, height, spec));
}

/**
 * Scale authored geometry to another canvas size. Used for template images
 * that ship without their own manifest entry.
 */
export function scaleGeometry(geometry: TemplateGeometry, width: number, height: number): TemplateGeometry {
  const sx = width / geometry.width;
  const sy = height / geometry.height;
  const sr = Math.min(sx, sy);
  const pt = (p: { x: number; y: number }) => ({ x: p.x * sx, y: p.y * sy });
  const landmarks: TemplateGeometry['landmarks'] = {};
  for (const name of LANDMARK_NAMES) {
    const p = geometry.landmarks[name];
    if (p) landmarks[name] = pt(p);
  }
  return {
    width,
    height,
    landmarks,
    outline: {
      cx: geometry.outline.cx * sx,
      cy: geometry.outline.cy * sy,
      rx: geometry.outline.rx * sx,
      ry: geometry.outline.ry * sy,
    },
    regions: geometry.regions.map((r) => ({
      ...r,
      feather: r.feather * sr,
      mask:
        r.mask.type === 'ellipse'
          ? { ...r.mask, cx: r.mask.cx * sx, cy: r.mask.cy * sy, rx: r.mask.rx * sx, ry: r.mask.ry * sy }
          : { ...r.mask, points: r.mask.points.map(pt) },
    })),
  };
}
