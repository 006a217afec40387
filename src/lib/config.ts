import { config as loadEnv } from 'dotenv';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

loadEnv();

const boolFromString = (value: string): boolean =>
  ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());

export const DEFAULT_TEMPLATE_DIR = fileURLToPath(new URL('../../templates', import.meta.url));

const environmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  TEMPLATE_DIR: z.string().min(1).default(DEFAULT_TEMPLATE_DIR),
  FACE_DETECTOR: z.enum(['facemesh']).default('facemesh'),
  FACE_MAX_FACES: z.coerce.number().int().min(1).max(16).default(4),
  GENERATOR_TRACE: z.string().default('false').transform(boolFromString),
  // Self-hosted FaceMesh weights (model.json URLs); unset means the public hosted models
  FACE_DETECTOR_MODEL_URL: z.string().url().optional(),
  FACE_LANDMARK_MODEL_URL: z.string().url().optional(),
});

export type Environment = z.infer<typeof environmentSchema>;

export const parseEnvironment = (rawEnv: NodeJS.ProcessEnv = process.env): Environment =>
  environmentSchema.parse(rawEnv);

export const env = parseEnvironment();

export function traceEnabled(environment: Environment = env): boolean {
  return environment.GENERATOR_TRACE;
}

export function isDev(environment: Environment = env): boolean {
  return environment.NODE_ENV !== 'production';
}

export type ModelUrls = { detectorModelUrl?: string; landmarkModelUrl?: string };

export function modelUrls(environment: Environment = env): ModelUrls {
  const urls: ModelUrls = {};
  if (environment.FACE_DETECTOR_MODEL_URL) urls.detectorModelUrl = environment.FACE_DETECTOR_MODEL_URL;
  if (environment.FACE_LANDMARK_MODEL_URL) urls.landmarkModelUrl = environment.FACE_LANDMARK_MODEL_URL;
  return urls;
}
