import type { AlignmentKind } from '@/lib/alignment';
import type { RasterImage } from '@/lib/image';
import type { ResolvedParameters } from '@/lib/params';
import type { RegionName } from '@/lib/regions';
import type { TemplateRegistry, TemplateSummary } from '@/lib/template-registry';
import type { ValidationReport } from '@/lib/validation';
import type { LandmarkDetector } from '@/models/detector-types';

export type GenerationStage =
  | 'idle'
  | 'detecting'
  | 'validating'
  | 'aligning'
  | 'blending'
  | 'color-matching'
  | 'done'
  | 'failed';

export type StageEvent = {
  stage: GenerationStage;
  templateId: string;
  elapsedMs: number;
};

export type GenerateOptions = {
  onStage?: (event: StageEvent) => void;
};

export type RegionAlignmentSummary = {
  kind: AlignmentKind;
  rmse: number;
  scale: number;
  rotation: number; // radians
};

export type GenerationDiagnostics = {
  stages: GenerationStage[];
  faceCount: number;
  alignment: Partial<Record<RegionName, RegionAlignmentSummary>>;
  blendedRegions: RegionName[];
};

export type GenerationResult = {
  /** PNG-encoded composite */
  image: Buffer;
  raster: RasterImage;
  report: ValidationReport;
  params: ResolvedParameters;
  diagnostics: GenerationDiagnostics;
};

export type GeneratorDeps = {
  registry: TemplateRegistry;
  detector?: LandmarkDetector;
};

export interface Generator {
  generate(source: Uint8Array, templateId: string, params?: unknown, options?: GenerateOptions): Promise<GenerationResult>;
  listTemplates(): TemplateSummary[];
}
