/**
 * Resource Endpoints
 */

const encode = encodeURIComponent;

export const voiceEndpoints = {
  list: '/v1/voices',
  curated: '/v1/voices/curated',
  clone: '/v1/voices/clone',
  design: '/v1/voices/design',
  designs: '/v1/voices/designs',
  voice: (id: string): string => `/v1/voices/${encode(id)}`,
  unlock: (id: string): string => `/v1/voices/${encode(id)}/unlock`,
} as const;

export const fileEndpoints = {
  extractText: '/v1/files/extract-text',
} as const;

export const generationEndpoints = {
  list: '/v1/generations',
  generation: (id: string): string => `/v1/generations/${encode(id)}`,
  audio: (id: string): string => `/v1/generations/${encode(id)}/audio`,
} as const;

export const accountEndpoints = {
  balance: '/v1/account/balance',
  usage: '/v1/account/usage',
  checkout: '/v1/billing/checkout',
} as const;

export const resourceDefaults = {
  cloneFilename: 'audio.wav',
  cloneContentType: 'audio/wav',
  uploadFilename: 'upload',
  generationsLimit: 20,
  generationsOffset: 0,
  usageDays: 30,
  usageLimit: 100,
} as const;
