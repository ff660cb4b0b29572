export {
  voiceEndpoints,
  fileEndpoints,
  generationEndpoints,
  accountEndpoints,
  resourceDefaults,
} from './resource.endpoints';
