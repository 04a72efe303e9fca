/**
 * Report generation module.
 * Deterministic — transforms check results into the JSON contract.
 */

export { generateManifestReport, serializeJSON } from './reporter.js';
export type { ManifestReport, ManifestReportInput } from './reporter.js';
