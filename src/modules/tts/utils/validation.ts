/**
 * Generation Parameter Validation
 * Runs before any network I/O; the first failing rule wins
 */

import { InvalidRequestError } from '@/modules/errors';
import { TTS_CONSTANTS, TTS_MODELS, ttsDefaults } from '../config';
import type { GenerateParams, ResolvedGenerateParams } from '../types';

const INVALID_REQUEST = { code: 'invalid_request', statusCode: 400 } as const;

/**
 * Length in characters (code points), so astral symbols count once
 */
export function countCharacters(text: string): number {
  let count = 0;
  for (const _char of text) {
    count++;
  }
  return count;
}

export function resolveGenerateParams(params: GenerateParams): ResolvedGenerateParams {
  return {
    text: params.text,
    model: params.model ?? ttsDefaults.model,
    voice: params.voice ?? ttsDefaults.voice,
    language: params.language ?? ttsDefaults.language,
    format: params.format ?? ttsDefaults.format,
    speed: params.speed ?? ttsDefaults.speed,
    exaggeration: params.exaggeration ?? ttsDefaults.exaggeration,
  };
}

function isKnownModel(model: string): boolean {
  return TTS_MODELS.some((known) => known === model);
}

export function validateGenerateParams(params: ResolvedGenerateParams): void {
  const { text, model, speed, exaggeration } = params;

  if (!text) {
    throw new InvalidRequestError('Text cannot be empty', INVALID_REQUEST);
  }

  const length = countCharacters(text);
  if (length > TTS_CONSTANTS.MAX_TEXT_LENGTH) {
    throw new InvalidRequestError(
      `Text exceeds maximum of 10,000 characters (got ${length}, ${length - TTS_CONSTANTS.MAX_TEXT_LENGTH} over)`,
      INVALID_REQUEST
    );
  }

  if (!isKnownModel(model)) {
    throw new InvalidRequestError(`Model must be 'standard' or 'pro', got '${model}'`, INVALID_REQUEST);
  }

  // Written as a negated range check so NaN is rejected too
  if (!(speed >= TTS_CONSTANTS.MIN_SPEED && speed <= TTS_CONSTANTS.MAX_SPEED)) {
    throw new InvalidRequestError(`Speed must be between 0.5 and 2.0, got ${speed}`, INVALID_REQUEST);
  }

  if (model === 'standard' && exaggeration !== ttsDefaults.exaggeration) {
    throw new InvalidRequestError(
      "exaggeration is only supported on the 'pro' model. Use model='pro' or remove the exaggeration parameter.",
      INVALID_REQUEST
    );
  }

  if (!(exaggeration >= TTS_CONSTANTS.MIN_EXAGGERATION && exaggeration <= TTS_CONSTANTS.MAX_EXAGGERATION)) {
    throw new InvalidRequestError(
      `Exaggeration must be between 0.0 and 1.0, got ${exaggeration}`,
      INVALID_REQUEST
    );
  }
}

/**
 * JSON body for generate, stream and generate-async
 */
export function buildGenerateBody(params: ResolvedGenerateParams): Record<string, unknown> {
  const body: Record<string, unknown> = {
    text: params.text,
    model: params.model,
    language: params.language,
    format: params.format,
    speed: params.speed,
  };
  if (params.voice) {
    body.voice = params.voice;
  }
  if (params.model === 'pro') {
    body.exaggeration = params.exaggeration;
  }
  return body;
}
