/**
 * chatbook - ChatGPT export converter
 * Main library entry point
 */

// Re-export modules for programmatic use
export * from './config/index.js';
export * from './ingest/chatgpt/index.js';
export * from './export/index.js';
export * from './pipeline/index.js';
export * from './split/index.js';
export * from './utils/index.js';
export { version } from './version.js';
