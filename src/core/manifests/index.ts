export {
  type LoadDirectoryOptions,
  type LoadManifestOptions,
  loadManifestDirectory,
  loadManifestFile,
  loadManifests,
  type ManifestRenderer,
  parseManifests,
  type RenderContext,
  renderTemplate,
} from './loader.js';
