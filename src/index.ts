/**
 * Library entry point. The CLI in ./cli is built on the same exports.
 */

export * from './schema/index.js';
export * from './config/index.js';
export * from './selector/index.js';
export * from './stealth/index.js';
export * from './browser/index.js';
export * from './core/index.js';
export { generateMarkdown, generateJSON, serializeJSON, exitCodeFor } from './report/index.js';
