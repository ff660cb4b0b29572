export {
  VoiceSchema,
  VoiceListSchema,
  CuratedVoicesSchema,
  VoiceDesignSchema,
  VoiceDesignListSchema,
  FileExtractResultSchema,
  GenerationSchema,
  GenerationListSchema,
  AccountBalanceSchema,
  AccountUsageSchema,
  CheckoutSessionSchema,
  type Voice,
  type VoiceList,
  type VoiceDesign,
  type CloneVoiceOptions,
  type DesignVoiceOptions,
  type FileExtractResult,
  type Generation,
  type GenerationList,
  type ListGenerationsOptions,
  type AccountBalance,
  type AccountUsage,
  type UsageOptions,
  type CheckoutSession,
} from './resource.types';
