export {
  GenerationService,
  isTerminalJobStatus,
  type GenerationServiceConfig,
} from './generation.service';
