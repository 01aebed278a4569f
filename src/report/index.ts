/**
 * Report generation module.
 * Transforms a workflow run into markdown + JSON artifacts.
 */

export { generateMarkdown, generateJSON, serializeJSON, exitCodeFor } from './reporter.js';
export type { JsonOutput, JsonOutputStep } from './reporter.js';
