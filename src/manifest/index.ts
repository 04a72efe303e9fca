/**
 * Manifest module.
 * Finds, parses and checks a project's toolkit manifest.
 * Pure logic over the FileSystem collaborator — no process IO.
 */

export {
  InvalidManifestError,
  ManifestNotFoundError,
  locateManifest,
  parseManifestText,
} from './locate.js';
export { checkManifest } from './check.js';
export type { ManifestCheckOptions } from './check.js';
