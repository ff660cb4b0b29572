/**
 * Resources Module Exports
 */

export { VoicesService, FilesService, GenerationsService, AccountService } from './services';
export type {
  Voice,
  VoiceList,
  VoiceDesign,
  CloneVoiceOptions,
  DesignVoiceOptions,
  FileExtractResult,
  Generation,
  GenerationList,
  ListGenerationsOptions,
  AccountBalance,
  AccountUsage,
  UsageOptions,
  CheckoutSession,
} from './types';
