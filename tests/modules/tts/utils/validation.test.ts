/**
 * Generation Parameter Validation Tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidRequestError } from '@/modules/errors';
import {
  buildGenerateBody,
  countCharacters,
  resolveGenerateParams,
  validateGenerateParams,
  type GenerateParams,
} from '@/modules/tts';

const validate = (params: GenerateParams): void => validateGenerateParams(resolveGenerateParams(params));

const messageOf = (params: GenerateParams): string => {
  try {
    validate(params);
  } catch (error) {
    if (error instanceof InvalidRequestError) return error.message;
    throw error;
  }
  return '';
};

describe('countCharacters', () => {
  it('should count code points rather than UTF-16 units', () => {
    expect(countCharacters('abc')).toBe(3);
    expect(countCharacters('🎙️')).toBe(2);
    expect(countCharacters('𝄞𝄞')).toBe(2);
  });
});

describe('resolveGenerateParams', () => {
  it('should fill in the defaults', () => {
    expect(resolveGenerateParams({ text: 'Hello' })).toEqual({
      text: 'Hello',
      model: 'standard',
      voice: '',
      language: 'en',
      format: 'mp3',
      speed: 1.0,
      exaggeration: 0.5,
    });
  });
});

describe('validateGenerateParams', () => {
  it('should accept defaults and the range boundaries', () => {
    expect(() => validate({ text: 'Hello' })).not.toThrow();
    expect(() => validate({ text: 'x'.repeat(10000) })).not.toThrow();
    expect(() => validate({ text: 'Hi', speed: 0.5 })).not.toThrow();
    expect(() => validate({ text: 'Hi', speed: 2.0 })).not.toThrow();
    expect(() => validate({ text: 'Hi', model: 'pro', exaggeration: 0 })).not.toThrow();
    expect(() => validate({ text: 'Hi', model: 'pro', exaggeration: 1 })).not.toThrow();
  });

  it('should reject empty text', () => {
    expect(messageOf({ text: '' })).toBe('Text cannot be empty');
  });

  it('should report length and overflow for long text', () => {
    expect(messageOf({ text: 'x'.repeat(10001) })).toBe(
      'Text exceeds maximum of 10,000 characters (got 10001, 1 over)'
    );
  });

  it('should reject unknown models', () => {
    expect(messageOf({ text: 'Hi', model: 'turbo' })).toBe("Model must be 'standard' or 'pro', got 'turbo'");
  });

  it('should reject speeds outside 0.5 to 2.0', () => {
    expect(messageOf({ text: 'Hi', speed: 0.4 })).toBe('Speed must be between 0.5 and 2.0, got 0.4');
    expect(messageOf({ text: 'Hi', speed: 2.1 })).toBe('Speed must be between 0.5 and 2.0, got 2.1');
    expect(messageOf({ text: 'Hi', speed: Number.NaN })).toBe('Speed must be between 0.5 and 2.0, got NaN');
  });

  it('should reject exaggeration on the standard model', () => {
    expect(messageOf({ text: 'Hi', exaggeration: 0.8 })).toBe(
      "exaggeration is only supported on the 'pro' model. Use model='pro' or remove the exaggeration parameter."
    );
  });

  it('should reject exaggeration outside 0.0 to 1.0 on pro', () => {
    expect(messageOf({ text: 'Hi', model: 'pro', exaggeration: 1.5 })).toBe(
      'Exaggeration must be between 0.0 and 1.0, got 1.5'
    );
  });

  it('should report the first failing rule', () => {
    expect(messageOf({ text: '', model: 'turbo', speed: 9 })).toBe('Text cannot be empty');
    expect(messageOf({ text: 'Hi', model: 'turbo', speed: 9 })).toBe("Model must be 'standard' or 'pro', got 'turbo'");
    expect(messageOf({ text: 'Hi', speed: 9, exaggeration: 0.9 })).toBe('Speed must be between 0.5 and 2.0, got 9');
  });

  it('should tag validation errors as invalid_request with status 400', () => {
    let caught: unknown;
    try {
      validate({ text: '' });
    } catch (error) {
      caught = error;
    }

    expect(caught instanceof InvalidRequestError && caught.code).toBe('invalid_request');
    expect(caught instanceof InvalidRequestError && caught.statusCode).toBe(400);
  });
});

describe('buildGenerateBody', () => {
  it('should omit an empty voice and the exaggeration on standard', () => {
    expect(buildGenerateBody(resolveGenerateParams({ text: 'Hello' }))).toEqual({
      text: 'Hello',
      model: 'standard',
      language: 'en',
      format: 'mp3',
      speed: 1.0,
    });
  });

  it('should include the voice and the exaggeration on pro', () => {
    expect(
      buildGenerateBody(resolveGenerateParams({ text: 'Hello', model: 'pro', voice: 'narrator', exaggeration: 0.7 }))
    ).toEqual({
      text: 'Hello',
      model: 'pro',
      voice: 'narrator',
      language: 'en',
      format: 'mp3',
      speed: 1.0,
      exaggeration: 0.7,
    });
  });
});
