export {
  FileArtifactStore,
  cleanFileStem,
  type ArtifactStore,
  type FileArtifactStoreOptions,
} from './artifact-store.js';
