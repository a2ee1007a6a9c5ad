/**
 * Export module
 * Transcript, book, and master book renderers
 */

export * from './transcript.js';
export * from './book.js';
export * from './master.js';
