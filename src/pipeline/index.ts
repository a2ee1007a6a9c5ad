/**
 * Conversion pipelines
 * JSON exports -> transcripts, transcripts -> books
 */

import { convertTranscriptFile } from '../export/transcript.js';
import { convertBookFile } from '../export/book.js';
import { runBatch, type BatchOptions, type BatchResult, type BatchConverter } from './batch.js';

export {
  collectFiles,
  mirrorPath,
  runBatch,
  type BatchConverter,
  type BatchOptions,
  type BatchProgress,
  type BatchResult,
} from './batch.js';

export const TRANSCRIPT_BATCH: BatchConverter = {
  name: 'convert',
  extension: '.json',
  outputExtension: '.txt',
  convertFile: async (inputPath, outputPath) => {
    await convertTranscriptFile(inputPath, outputPath);
    return true;
  },
};

export const BOOK_BATCH: BatchConverter = {
  name: 'book',
  extension: '.txt',
  outputExtension: '.txt',
  convertFile: async (inputPath, outputPath) => {
    const result = await convertBookFile(inputPath, outputPath);
    return result.written;
  },
};

/**
 * Convert JSON exports (a file or a directory tree) into transcripts
 */
export function convertTranscripts(
  input: string,
  output: string,
  options?: BatchOptions
): Promise<BatchResult> {
  return runBatch(input, output, TRANSCRIPT_BATCH, options);
}

/**
 * Convert transcripts (a file or a directory tree) into books
 */
export function convertBooks(
  input: string,
  output: string,
  options?: BatchOptions
): Promise<BatchResult> {
  return runBatch(input, output, BOOK_BATCH, options);
}
