export {
  countCharacters,
  resolveGenerateParams,
  validateGenerateParams,
  buildGenerateBody,
} from './validation';
