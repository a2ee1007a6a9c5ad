/**
 * Split output writer
 * Writes each bucket of conversations as its own JSON file
 */

import { mkdir } from 'fs/promises';
import { join } from 'path';
import type { SplitMode } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import { writeTextFile } from '../utils/index.js';
import { titleKey, type Buckets, type RawConversation } from './bucket.js';

/**
 * Options for writing buckets
 */
export interface WriteBucketsOptions {
  prefix: string;
  mode: SplitMode;
  /** Bucket keys (or date folders in date_title mode) to leave out */
  exclude?: string[];
}

/**
 * One written split file
 */
export interface WrittenBucket {
  key: string;
  path: string;
  conversationCount: number;
}

/**
 * Write buckets result
 */
export interface WriteBucketsResult {
  written: WrittenBucket[];
  excluded: Array<{ key: string; conversationCount: number }>;
}

/**
 * Serialize conversations as indented JSON; non-ASCII stays as written
 */
export function toJson(conversations: RawConversation[]): string {
  return JSON.stringify(conversations, null, 2);
}

function sortedEntries<T>(map: Map<string, T>): Array<[string, T]> {
  return [...map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Regroup one date bucket's conversations by sanitized title
 */
export function groupByTitle(conversations: RawConversation[]): Map<string, RawConversation[]> {
  const groups = new Map<string, RawConversation[]>();
  for (const conversation of conversations) {
    const key = titleKey(conversation);
    const group = groups.get(key);
    if (group) {
      group.push(conversation);
    } else {
      groups.set(key, [conversation]);
    }
  }
  return groups;
}

/**
 * Write each bucket as a separate JSON file in outputDir
 *
 * Files are named `<prefix>_<key>.json` and written in sorted key order.
 * In date_title mode every date gets a folder holding one file per title.
 */
export async function writeBuckets(
  buckets: Buckets,
  outputDir: string,
  options: WriteBucketsOptions
): Promise<WriteBucketsResult> {
  const log = createLogger({ module: 'split' });
  const exclude = new Set(options.exclude ?? []);
  const result: WriteBucketsResult = { written: [], excluded: [] };

  await mkdir(outputDir, { recursive: true });

  const write = async (key: string, dir: string, conversations: RawConversation[]): Promise<void> => {
    const path = join(dir, `${options.prefix}_${key}.json`);
    await writeTextFile(path, toJson(conversations));
    result.written.push({ key, path, conversationCount: conversations.length });
    log.info(`Wrote ${String(conversations.length).padStart(4)} conversations to ${path}`);
  };

  for (const [key, conversations] of sortedEntries(buckets)) {
    if (exclude.has(key)) {
      result.excluded.push({ key, conversationCount: conversations.length });
      log.info(`Skipping ${key} (${conversations.length} conversations) - excluded month`);
      continue;
    }

    if (options.mode === 'date_title') {
      const dateDir = join(outputDir, key);
      await mkdir(dateDir, { recursive: true });

      for (const [title, titled] of sortedEntries(groupByTitle(conversations))) {
        await write(title, dateDir, titled);
      }
    } else {
      await write(key, outputDir, conversations);
    }
  }

  return result;
}
