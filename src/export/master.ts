/**
 * Master book module
 * Combines book files into one document, ordered by month with chapter headers
 */

import { readFile } from 'fs/promises';
import { basename, dirname, resolve } from 'path';
import { getConfig } from '../config/index.js';
import { collectFiles } from '../pipeline/batch.js';
import { createLogger } from '../utils/logger.js';
import { getPathKind, rule, writeTextFile } from '../utils/index.js';

export const UNKNOWN_DATE = 'Unknown Date';

/**
 * A book file placed in the master book
 */
export interface BookSection {
  filename: string;
  /** Month parsed from the parent directory; null when unknown */
  date: Date | null;
  content: string;
}

/**
 * Master book progress
 */
export interface MasterBookProgress {
  processed: number;
  total: number;
}

/**
 * Options for assembling the master book
 */
export interface MasterBookOptions {
  title?: string;
  progressInterval?: number;
  onProgress?: (progress: MasterBookProgress) => void;
}

/**
 * Master book result
 */
export interface MasterBookResult {
  outputPath: string;
  written: boolean;
  conversationCount: number;
  chapters: string[];
  bytesWritten: number;
}

/**
 * Parse the month from a file's parent directory name (e.g. "2024-01")
 * Returns null when the directory name is not a YYYY-MM month
 */
export function parseDateFromPath(filePath: string): Date | null {
  const dirName = basename(dirname(filePath));
  const match = /^(\d{4})-(1[0-2]|0[1-9]|[1-9])$/.exec(dirName);
  if (!match) return null;

  const year = Number(match[1]);
  if (year < 1) return null;

  const date = new Date(0);
  date.setUTCFullYear(year, Number(match[2]) - 1, 1);
  return date;
}

/**
 * Chapter label for a month, e.g. "January 2024"
 */
export function monthLabel(date: Date | null): string {
  if (!date) return UNKNOWN_DATE;
  const month = date.toLocaleString('en-US', { month: 'long', timeZone: 'UTC' });
  return `${month} ${date.getUTCFullYear()}`;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sort sections by month (unknown first), then by filename
 */
export function sortBookSections<T extends Pick<BookSection, 'filename' | 'date'>>(sections: T[]): T[] {
  return [...sections].sort((a, b) => {
    const timeA = a.date ? a.date.getTime() : Number.NEGATIVE_INFINITY;
    const timeB = b.date ? b.date.getTime() : Number.NEGATIVE_INFINITY;
    if (timeA !== timeB) return timeA < timeB ? -1 : 1;
    return compareStrings(a.filename, b.filename);
  });
}

/**
 * Assemble the master book document
 */
export function assembleMasterBook(
  sections: BookSection[],
  options: MasterBookOptions = {}
): { content: string; chapters: string[] } {
  const title = options.title ?? getConfig().bookTitle;
  const interval = options.progressInterval ?? getConfig().progressInterval;
  const parts: string[] = [`${rule('=', 80)}\n${title}\n${rule('=', 80)}\n\n`];
  const chapters: string[] = [];

  let currentMonth: string | null = null;
  let processed = 0;

  const sorted = sortBookSections(sections);
  for (const section of sorted) {
    const label = monthLabel(section.date);
    if (label !== currentMonth) {
      currentMonth = label;
      chapters.push(label);
      parts.push(`\n${rule('=', 60)}\nCHAPTER: ${label.toUpperCase()}\n${rule('=', 60)}\n\n`);
    }

    parts.push(`${section.content}\n\n${rule('=', 80)}\n\n`);

    processed++;
    if (processed % interval === 0) {
      options.onProgress?.({ processed, total: sorted.length });
    }
  }

  parts.push(`\n${rule('=', 80)}\nEND OF BOOK - TOTAL CONVERSATIONS: ${processed}\n${rule('=', 80)}\n`);

  return { content: parts.join(''), chapters };
}

/**
 * Create a master book from every .txt file under inputDir
 */
export async function createMasterBook(
  inputDir: string,
  outputPath: string,
  options: MasterBookOptions = {}
): Promise<MasterBookResult> {
  const log = createLogger({ module: 'master' });

  if ((await getPathKind(inputDir)) !== 'directory') {
    log.error(`Input directory does not exist: ${inputDir}`);
    return { outputPath, written: false, conversationCount: 0, chapters: [], bytesWritten: 0 };
  }

  // A previous master book written inside the input tree is not a chapter
  const target = resolve(outputPath);
  const files = (await collectFiles(inputDir, '.txt')).filter((file) => resolve(file) !== target);

  const sections: BookSection[] = [];
  for (const file of files) {
    sections.push({
      filename: basename(file),
      date: parseDateFromPath(file),
      content: await readFile(file, 'utf-8'),
    });
  }

  const { content, chapters } = assembleMasterBook(sections, {
    ...options,
    onProgress: (progress) => {
      log.info(`Processed ${progress.processed} conversations...`);
      options.onProgress?.(progress);
    },
  });
  const bytesWritten = await writeTextFile(outputPath, content);

  log.info(`Master book created: ${outputPath}`);
  log.info(`Total conversations: ${sections.length}`);

  return { outputPath, written: true, conversationCount: sections.length, chapters, bytesWritten };
}
