/**
 * Conversation bucketing
 * Derives month, ISO week and title keys and groups an export by them
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { SplitMode } from '../config/index.js';
import { isZipFile, readConversationsJson } from '../ingest/chatgpt/zip.js';

/**
 * A conversation kept exactly as it was read, so split files hold the
 * original JSON
 */
export type RawConversation = Record<string, unknown>;

export type Buckets = Map<string, RawConversation[]>;

export const UNKNOWN_KEY = 'unknown';
export const UNTITLED_KEY = 'untitled';
export const MAX_TITLE_LENGTH = 100;

/**
 * Keys that may hold the conversation list, checked in order
 */
export const CONVERSATION_LIST_KEYS = ['conversations', 'items', 'data'] as const;

const ConversationListSchema = z.array(z.record(z.unknown()));

/**
 * The export file does not have a recognised shape
 */
export class ExportFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExportFormatError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toConversationList(value: unknown[]): RawConversation[] {
  const result = ConversationListSchema.safeParse(value);
  if (!result.success) {
    throw new ExportFormatError('Every entry of the conversations list must be an object.');
  }
  return result.data;
}

/**
 * Find the conversations list in a decoded export
 * @throws ExportFormatError when neither shape matches
 */
export function extractConversationList(data: unknown): RawConversation[] {
  if (Array.isArray(data)) {
    return toConversationList(data);
  }

  if (isRecord(data)) {
    for (const key of CONVERSATION_LIST_KEYS) {
      const value = data[key];
      if (Array.isArray(value)) {
        return toConversationList(value);
      }
    }
  }

  throw new ExportFormatError(
    'Could not find conversations list in JSON file. ' +
    "Root must be a list or contain a 'conversations' list."
  );
}

/**
 * Load the conversations list from a JSON export or an export ZIP
 */
export async function loadConversations(path: string): Promise<RawConversation[]> {
  const content = isZipFile(path)
    ? await readConversationsJson(path)
    : await readFile(path, 'utf-8');
  return extractConversationList(JSON.parse(content));
}

// Decimal only: hex, octal and binary literals are not timestamps
const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function toSeconds(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && DECIMAL_NUMBER.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Extract a Unix timestamp (seconds) from a conversation
 *
 * create_time is tried first, then update_time; numeric strings count.
 * Returns 0 when neither holds a number, which files the conversation
 * under "unknown".
 */
export function getTimestamp(conversation: RawConversation): number {
  for (const key of ['create_time', 'update_time']) {
    const seconds = toSeconds(conversation[key]);
    if (seconds !== null) return seconds;
  }
  return 0;
}

const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;
const WHITESPACE_RUN = /[<>:"/\\|?*]*\s+[<>:"/\\|?*]*/g;

/**
 * Make a title safe to use in a filename
 * e.g. "A/B: Test?" -> "A_B_Test_"
 */
export function sanitizeTitle(title: string): string {
  const sanitized = title
    .trim()
    .replace(WHITESPACE_RUN, '_')
    .replace(INVALID_FILENAME_CHARS, '_');

  // Truncate by code point so surrogate pairs stay whole
  return Array.from(sanitized).slice(0, MAX_TITLE_LENGTH).join('');
}

/**
 * Title bucket key for a conversation
 */
export function titleKey(conversation?: RawConversation): string {
  const title = conversation?.title;
  return typeof title === 'string' ? sanitizeTitle(title) : UNTITLED_KEY;
}

/**
 * ISO 8601 week-numbering year and week of a UTC date
 */
export function isoWeek(date: Date): { year: number; week: number } {
  const thursday = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
  const weekday = thursday.getUTCDay() || 7;
  thursday.setUTCDate(thursday.getUTCDate() + 4 - weekday);

  const year = thursday.getUTCFullYear();
  const yearStart = new Date(0);
  yearStart.setUTCFullYear(year, 0, 1);
  const dayOfYear = Math.floor((thursday.getTime() - yearStart.getTime()) / 86_400_000);

  return { year, week: Math.floor(dayOfYear / 7) + 1 };
}

/**
 * Turn a timestamp or conversation into a bucket key
 * - month, date_title -> "YYYY-MM"
 * - week -> "YYYY-Www" (ISO week, e.g. 2025-W03)
 * - title -> sanitized title
 */
export function makeBucketKey(
  timestamp: number,
  mode: SplitMode,
  conversation?: RawConversation
): string {
  if (mode === 'title') {
    return titleKey(conversation);
  }

  if (!(timestamp > 0)) return UNKNOWN_KEY;

  const date = new Date(timestamp * 1000);
  if (Number.isNaN(date.getTime()) || date.getUTCFullYear() > 9999) return UNKNOWN_KEY;

  if (mode === 'week') {
    const { year, week } = isoWeek(date);
    return `${year}-W${String(week).padStart(2, '0')}`;
  }

  return date.toISOString().slice(0, 7);
}

/**
 * Group conversations into buckets by month, week, title, or date_title
 * Buckets and the conversations in them keep input order
 */
export function groupConversations(conversations: RawConversation[], mode: SplitMode): Buckets {
  const buckets: Buckets = new Map();

  for (const conversation of conversations) {
    const key = mode === 'title'
      ? makeBucketKey(0, mode, conversation)
      : makeBucketKey(getTimestamp(conversation), mode);

    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(conversation);
    } else {
      buckets.set(key, [conversation]);
    }
  }

  return buckets;
}
