/**
 * Resource Types
 * Wire schemas (snake_case) and the camelCase models they map to
 */

import { z } from 'zod';
import {
  wireArray,
  wireBoolean,
  wireNumber,
  wireRecord,
  wireString,
} from '@/shared/utils';

// --- Voices ---

export const VoiceSchema = z
  .object({
    voice_id: z.string(),
    name: wireString,
    model: wireString.transform((value) => value || 'standard'),
    language: wireString.transform((value) => value || 'en'),
    status: wireString.transform((value) => value || 'active'),
    description: wireString,
    preview_url: wireString,
    unlock_cost_cents: wireNumber,
  })
  .transform((voice) => ({
    voiceId: voice.voice_id,
    name: voice.name,
    model: voice.model,
    language: voice.language,
    status: voice.status,
    description: voice.description,
    previewUrl: voice.preview_url,
    unlockCostCents: voice.unlock_cost_cents,
  }));

export type Voice = z.output<typeof VoiceSchema>;

export const VoiceListSchema = z
  .object({
    standard_voices: wireArray(VoiceSchema),
    pro_voices: wireArray(VoiceSchema),
    cloned_voices: wireArray(VoiceSchema),
  })
  .transform((list) => ({
    standardVoices: list.standard_voices,
    proVoices: list.pro_voices,
    clonedVoices: list.cloned_voices,
  }));

export type VoiceList = z.output<typeof VoiceListSchema>;

export const CuratedVoicesSchema = z
  .object({ voices: wireArray(VoiceSchema) })
  .transform((list) => list.voices);

export const VoiceDesignSchema = z
  .object({
    id: z.string(),
    name: wireString,
    status: wireString,
    cost_cents: wireNumber,
  })
  .transform((design) => ({
    id: design.id,
    name: design.name,
    status: design.status,
    costCents: design.cost_cents,
  }));

export type VoiceDesign = z.output<typeof VoiceDesignSchema>;

export const VoiceDesignListSchema = z
  .object({ designs: wireArray(VoiceDesignSchema) })
  .transform((list) => list.designs);

export interface CloneVoiceOptions {
  description?: string;
  /** Unlock the clone right away when the API reports it pending_unlock */
  autoUnlock?: boolean;
}

export interface DesignVoiceOptions {
  language?: string;
  description?: string;
}

// --- Files ---

export const FileExtractResultSchema = z
  .object({
    text: wireString,
    filename: wireString,
    char_count: wireNumber,
    truncated: wireBoolean,
  })
  .transform((result) => ({
    text: result.text,
    filename: result.filename,
    charCount: result.char_count,
    truncated: result.truncated,
  }));

export type FileExtractResult = z.output<typeof FileExtractResultSchema>;

// --- Generations ---

export const GenerationSchema = z
  .object({
    id: z.string(),
    audio_url: wireString,
    model: wireString,
    voice: wireString,
    characters: wireNumber,
    cost_cents: wireNumber,
    created_at: wireString,
  })
  .transform((generation) => ({
    id: generation.id,
    audioUrl: generation.audio_url,
    model: generation.model,
    voice: generation.voice,
    characters: generation.characters,
    costCents: generation.cost_cents,
    createdAt: generation.created_at,
  }));

export type Generation = z.output<typeof GenerationSchema>;

export const GenerationListSchema = z.object({
  generations: wireArray(GenerationSchema),
  total: wireNumber,
});

export type GenerationList = z.output<typeof GenerationListSchema>;

export interface ListGenerationsOptions {
  limit?: number;
  offset?: number;
}

// --- Account ---

export const AccountBalanceSchema = z
  .object({
    balance_cents: wireNumber,
    total_spent_cents: wireNumber,
  })
  .transform((balance) => ({
    balanceCents: balance.balance_cents,
    totalSpentCents: balance.total_spent_cents,
  }));

export type AccountBalance = z.output<typeof AccountBalanceSchema>;

export const AccountUsageSchema = z.object({
  entries: wireArray(wireRecord),
});

export type AccountUsage = z.output<typeof AccountUsageSchema>;

export interface UsageOptions {
  days?: number;
  model?: string;
  limit?: number;
}

/** Checkout session as returned by the billing API */
export const CheckoutSessionSchema = wireRecord;

export type CheckoutSession = z.output<typeof CheckoutSessionSchema>;
