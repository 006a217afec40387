import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import { channelStats, type ChannelStats } from './color';
import { DEFAULT_TEMPLATE_DIR, env, traceEnabled } from './config';
import { TemplateLoadError, TemplateNotFound, errorMessage } from './errors';
import { decodeImage, encodeThumbnail, type RasterImage } from './image';
import { isCompleteLandmarks, type Landmark, type LandmarkSet } from './landmarks';
import { ellipsePolygon, rasterizeMask, type RegionMask } from './mask';
import { renderPlaceholder, scaleGeometry } from './placeholder';
import type { Pt } from './points';
import { DEFAULT_REGION_ANCHORS, FACE_OUTLINE_SIZE, type LandmarkName, type RegionName } from './regions';
import {
  manifestSchema,
  type MaskShape,
  type PlaceholderSpec,
  type TemplateGeometry,
  type TemplateManifest,
} from './template-schema';

export const MANIFEST_FILE = 'manifest.json';
export const THUMBNAIL_SIZE = 150;
const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp'];

export type TemplateRegion = {
  readonly name: RegionName;
  readonly anchors: readonly LandmarkName[];
  readonly useOutline: boolean;
  readonly weight: number;
  readonly feather: number;
  readonly polygon: readonly Pt[];
  readonly mask: RegionMask;
  // Color statistics of the template's own pixels under the mask
  readonly palette: ChannelStats | null;
};

export type Template = {
  readonly id: string;
  readonly displayName: string;
  readonly description: string;
  readonly image: RasterImage;
  readonly landmarks: LandmarkSet;
  readonly regions: readonly TemplateRegion[];
  readonly thumbnail: Buffer;
  readonly source: 'file' | 'placeholder';
};

export type TemplateSummary = {
  id: string;
  displayName: string;
  description: string;
  thumbnail: Buffer;
};

export type TemplateMeta = Pick<Template, 'id' | 'displayName' | 'description'>;

function outlineFromEllipse(e: TemplateGeometry['outline']): Landmark[] {
  // Clockwise from the top, matching the detector's face oval order
  const pts: Landmark[] = [];
  for (let k = 0; k < FACE_OUTLINE_SIZE; k++) {
    const t = -Math.PI / 2 + (2 * Math.PI * k) / FACE_OUTLINE_SIZE;
    pts.push({ x: e.cx + e.rx * Math.cos(t), y: e.cy + e.ry * Math.sin(t) });
  }
  return pts;
}

function polygonFromShape(shape: MaskShape): Pt[] {
  return shape.type === 'ellipse' ? ellipsePolygon(shape.cx, shape.cy, shape.rx, shape.ry) : shape.points;
}

function titleCase(id: string) {
  return id
    .split(/[_-]+/)
    .filter(Boolean)
    .map((w) => w[0].toUpperCase() + w.slice(1))
    .join(' ');
}

/**
 * Resolve authored geometry against a concrete image: rasterize masks, sample
 * palettes and render the thumbnail. The result is frozen.
 */
export async function buildTemplate(
  meta: TemplateMeta,
  authored: TemplateGeometry,
  image: RasterImage,
  source: Template['source'],
): Promise<Template> {
  const geometry =
    authored.width === image.width && authored.height === image.height
      ? authored
      : scaleGeometry(authored, image.width, image.height);

  const points = { ...geometry.landmarks };
  if (!isCompleteLandmarks(points)) {
    throw new TemplateLoadError(`Template '${meta.id}' does not declare every landmark`);
  }
  const landmarks: LandmarkSet = Object.freeze({
    points: Object.freeze(points),
    outline: Object.freeze(outlineFromEllipse(geometry.outline)),
    confidence: 1,
  });

  const regions = geometry.regions.map((entry): TemplateRegion => {
    const polygon = polygonFromShape(entry.mask);
    const mask = rasterizeMask(polygon, entry.feather, image.width, image.height);
    return Object.freeze({
      name: entry.name,
      anchors: Object.freeze(entry.anchors ?? DEFAULT_REGION_ANCHORS[entry.name]),
      useOutline: entry.outlineAnchors,
      weight: entry.weight,
      feather: entry.feather,
      polygon: Object.freeze(polygon),
      mask,
      palette: channelStats(image, mask),
    });
  });

  const thumbnail = await encodeThumbnail(image, THUMBNAIL_SIZE);
  return Object.freeze({
    ...meta,
    image,
    landmarks,
    regions: Object.freeze(regions),
    thumbnail,
    source,
  });
}

async function readManifest(directory: string): Promise<TemplateManifest> {
  let raw: string;
  try {
    raw = await readFile(path.join(directory, MANIFEST_FILE), 'utf8');
  } catch (err) {
    if (directory === DEFAULT_TEMPLATE_DIR) {
      throw new TemplateLoadError(`Bundled template manifest is missing: ${errorMessage(err)}`, err);
    }
    // No manifest of its own: the bundled templates still apply.
    return readManifest(DEFAULT_TEMPLATE_DIR);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new TemplateLoadError(`${MANIFEST_FILE} in ${directory} is not valid JSON`, err);
  }
  const parsed = manifestSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new TemplateLoadError(`${MANIFEST_FILE} in ${directory} is invalid: ${detail}`, parsed.error);
  }
  return parsed.data;
}

// id -> file name, preferring extensions in IMAGE_EXTENSIONS order
async function scanImageFiles(directory: string): Promise<Map<string, string>> {
  let names: string[];
  try {
    names = await readdir(directory);
  } catch (err) {
    throw new TemplateLoadError(`Template directory ${directory} cannot be read`, err);
  }
  const found = new Map<string, string>();
  const rank = (file: string) => IMAGE_EXTENSIONS.indexOf(path.extname(file).toLowerCase());
  for (const file of names.sort()) {
    const r = rank(file);
    if (r < 0) continue;
    const id = path.basename(file, path.extname(file));
    const existing = found.get(id);
    if (existing === undefined || r < rank(existing)) found.set(id, file);
  }
  return found;
}

async function loadImageFile(file: string): Promise<RasterImage> {
  try {
    return await decodeImage(await readFile(file));
  } catch (err) {
    throw new TemplateLoadError(`Template image ${file} cannot be loaded: ${errorMessage(err)}`, err);
  }
}

/**
 * Process-wide, read-only set of templates. Construct once at startup with
 * `TemplateRegistry.load`; there is no way to add or replace entries later.
 */
export class TemplateRegistry {
  private readonly templates: ReadonlyMap<string, Template>;

  private constructor(templates: Template[]) {
    const map = new Map<string, Template>();
    for (const t of templates) {
      if (map.has(t.id)) throw new TemplateLoadError(`Duplicate template id '${t.id}'`);
      map.set(t.id, t);
    }
    this.templates = map;
    Object.freeze(this);
  }

  /**
   * Load `manifest.json` entries in manifest order, then any image files the
   * manifest does not mention in file-name order. Entries without an image
   * file get placeholder artwork.
   */
  static async load(directory: string = env.TEMPLATE_DIR): Promise<TemplateRegistry> {
    const manifest = await readManifest(directory);
    const files = await scanImageFiles(directory);
    const templates: Template[] = [];
    let placeholders = 0;

    for (const entry of manifest.templates) {
      const meta = { id: entry.id, displayName: entry.displayName, description: entry.description };
      const file = files.get(entry.id);
      if (file) {
        const image = await loadImageFile(path.join(directory, file));
        templates.push(await buildTemplate(meta, entry, image, 'file'));
        continue;
      }
      const spec: PlaceholderSpec = entry.placeholder ?? manifest.defaults.placeholder;
      const image = await renderPlaceholder(entry.width, entry.height, spec);
      templates.push(await buildTemplate(meta, entry, image, 'placeholder'));
      placeholders++;
    }

    const known = new Set(manifest.templates.map((t) => t.id));
    for (const [id, file] of files) {
      if (known.has(id)) continue;
      const image = await loadImageFile(path.join(directory, file));
      const displayName = titleCase(id) || id;
      const meta = { id, displayName, description: `${displayName} variant` };
      templates.push(await buildTemplate(meta, manifest.defaults, image, 'file'));
    }

    if (traceEnabled()) {
      console.info(`[registry] loaded ${templates.length} templates from ${directory} (${placeholders} placeholders)`);
    }
    return new TemplateRegistry(templates);
  }

  has(id: string): boolean {
    return this.templates.has(id);
  }

  ids(): string[] {
    return [...this.templates.keys()];
  }

  get(id: string): Template {
    const t = this.templates.get(id);
    if (!t) throw new TemplateNotFound(id, this.ids());
    return t;
  }

  list(): TemplateSummary[] {
    return [...this.templates.values()].map((t) => ({
      id: t.id,
      displayName: t.displayName,
      description: t.description,
      thumbnail: t.thumbnail,
    }));
  }
}
