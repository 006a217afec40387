import type { ZodIssue } from 'zod';

export type GenerationErrorCode =
  | 'DECODE_ERROR'
  | 'IMAGE_TOO_SMALL'
  | 'TEMPLATE_NOT_FOUND'
  | 'INVALID_PARAMETERS'
  | 'TEMPLATE_LOAD_ERROR';

export type FailureStage = 'idle' | 'detecting' | 'startup';

export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly code: GenerationErrorCode,
    public readonly stage: FailureStage,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'GenerationError';
  }
}

export class DecodeError extends GenerationError {
  constructor(message = 'Image could not be decoded', cause?: unknown) {
    super(message, 'DECODE_ERROR', 'detecting', cause);
    this.name = 'DecodeError';
  }
}

export class ImageTooSmall extends GenerationError {
  constructor(
    public readonly width: number,
    public readonly height: number,
    public readonly minimum: number,
  ) {
    super(
      `Image is ${width}x${height}; at least ${minimum}x${minimum} pixels are needed to find a face`,
      'IMAGE_TOO_SMALL',
      'detecting',
    );
    this.name = 'ImageTooSmall';
  }
}

export class TemplateNotFound extends GenerationError {
  constructor(public readonly templateId: string, available: readonly string[] = []) {
    const hint = available.length ? ` (available: ${available.join(', ')})` : '';
    super(`Template '${templateId}' not found${hint}`, 'TEMPLATE_NOT_FOUND', 'idle');
    this.name = 'TemplateNotFound';
  }
}

export class InvalidParameters extends GenerationError {
  constructor(public readonly issues: ZodIssue[]) {
    const detail = issues.map((i) => `${i.path.join('.') || 'params'}: ${i.message}`).join('; ');
    super(`Invalid generation parameters: ${detail}`, 'INVALID_PARAMETERS', 'idle');
    this.name = 'InvalidParameters';
  }
}

export class TemplateLoadError extends GenerationError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TEMPLATE_LOAD_ERROR', 'startup', cause);
    this.name = 'TemplateLoadError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
