/**
 * Export splitter
 * Breaks one large conversations export into smaller JSON files
 */

import { getConfig, type SplitMode } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import { groupConversations, loadConversations } from './bucket.js';
import { writeBuckets, type WriteBucketsResult } from './writer.js';

export * from './bucket.js';
export * from './writer.js';

/**
 * Options for splitting an export
 */
export interface SplitOptions {
  mode?: SplitMode;
  prefix?: string;
  /** Bucket keys to leave out, e.g. ["2024-01"] */
  exclude?: string[];
}

/**
 * Split result
 */
export interface SplitResult extends WriteBucketsResult {
  mode: SplitMode;
  conversationCount: number;
  bucketCount: number;
}

/**
 * Load an export, group its conversations, and write one file per bucket
 * @throws ExportFormatError when the export has no conversations list
 */
export async function splitExport(
  input: string,
  outputDir: string,
  options: SplitOptions = {}
): Promise<SplitResult> {
  const log = createLogger({ module: 'split' });
  const mode = options.mode ?? getConfig().splitMode;
  const prefix = options.prefix ?? getConfig().filePrefix;

  log.info(`Loading conversations from ${input}...`);
  const conversations = await loadConversations(input);
  log.info(`Loaded ${conversations.length} conversations.`);

  log.info(`Grouping by mode: ${mode}`);
  const buckets = groupConversations(conversations, mode);

  log.info(`Writing ${buckets.size} bucket files into ${outputDir}...`);
  const written = await writeBuckets(buckets, outputDir, {
    prefix,
    mode,
    exclude: options.exclude,
  });
  log.info('Done.');

  return {
    ...written,
    mode,
    conversationCount: conversations.length,
    bucketCount: buckets.size,
  };
}
