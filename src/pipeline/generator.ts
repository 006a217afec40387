import { alignRegions } from '@/lib/alignment';
import { blendRegions, blendSteps, type BlendPlan } from '@/lib/blend';
import { enhanceContrast, matchColor } from '@/lib/color';
import { traceEnabled } from '@/lib/config';
import { cloneImage, decodeImage, encodePng, type RasterImage } from '@/lib/image';
import { resolveParameters } from '@/lib/params';
import type { RegionName } from '@/lib/regions';
import type { Template } from '@/lib/template-registry';
import { validate } from '@/lib/validation';
import { createLandmarkDetector } from '@/models/detector';
import type {
  GenerateOptions,
  GenerationDiagnostics,
  GenerationResult,
  GenerationStage,
  Generator,
  GeneratorDeps,
} from './types';

function regionWeights(template: Template) {
  const weights: Partial<Record<RegionName, number>> = {};
  for (const r of template.regions) weights[r.name] = r.weight;
  return weights;
}

function colorMatch(image: RasterImage, template: Template, regions: RegionName[], strength: number) {
  let out = image;
  for (const name of regions) {
    const region = template.regions.find((r) => r.name === name);
    if (region?.palette) out = matchColor(out, region.palette, strength, region.mask);
  }
  return out;
}

/**
 * Build the compositing pipeline around a loaded registry. The generator
 * holds no per-request state, so one instance serves concurrent calls.
 */
export function createGenerator({ registry, detector = createLandmarkDetector() }: GeneratorDeps): Generator {
  async function generate(
    bytes: Uint8Array,
    templateId: string,
    input?: unknown,
    options: GenerateOptions = {},
  ): Promise<GenerationResult> {
    const t0 = performance.now();
    const stages: GenerationStage[] = [];
    const enter = (stage: GenerationStage) => {
      stages.push(stage);
      const elapsedMs = performance.now() - t0;
      if (traceEnabled()) console.info(`[generator] ${templateId} ${stage} +${elapsedMs.toFixed(0)}ms`);
      options.onStage?.({ stage, templateId, elapsedMs });
    };

    enter('idle');
    const template = registry.get(templateId);
    const params = resolveParameters(input, regionWeights(template));

    enter('detecting');
    const { source, detection } = await (async () => {
      const decoded = await decodeImage(bytes);
      return { source: decoded, detection: await detector.inspect(decoded) };
    })().catch((err: unknown) => {
      enter('failed');
      throw err;
    });

    enter('validating');
    const report = validate(detection.landmarks, source, template.regions, {
      faceDetected: detection.faceCount > 0,
    });
    const diagnostics: GenerationDiagnostics = {
      stages,
      faceCount: detection.faceCount,
      alignment: {},
      blendedRegions: [],
    };

    if (!detection.landmarks) {
      // Nothing to transfer: hand back the template as it is.
      const raster = cloneImage(template.image);
      const image = await encodePng(raster);
      enter('done');
      return { image, raster, report, params, diagnostics };
    }

    enter('aligning');
    const alignment = alignRegions(detection.landmarks, template);
    const plan: BlendPlan = {};
    for (const region of template.regions) {
      const fit = alignment[region.name];
      const eligibility = report.regions[region.name];
      if (fit) {
        diagnostics.alignment[region.name] = { kind: fit.kind, rmse: fit.rmse, scale: fit.scale, rotation: fit.rotation };
      }
      if (eligibility?.status === 'excluded') {
        plan[region.name] = { kind: 'excluded', reason: eligibility.reason };
      } else if (fit) {
        plan[region.name] = { kind: 'eligible', transform: fit.transform };
      }
    }

    enter('blending');
    const blended = blendRegions(source, template, plan, params);
    diagnostics.blendedRegions = blendSteps(template.regions, plan, params).map((s) => s.region.name);

    enter('color-matching');
    const matched = colorMatch(blended, template, diagnostics.blendedRegions, params.colorMatchStrength);
    const raster = enhanceContrast(matched, params.contrastEnhancement);
    const image = await encodePng(raster);

    enter('done');
    return { image, raster, report, params, diagnostics };
  }

  return {
    generate,
    listTemplates: () => registry.list(),
  };
}
