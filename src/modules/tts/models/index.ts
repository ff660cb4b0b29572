export { GenerateResult, type GenerateResultData, type AudioDownloader } from './generate-result';
