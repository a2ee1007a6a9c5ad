/**
 * Book export module
 * Parses transcripts back into entries and renders them as a flowing book
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import { rule, writeTextFile } from '../utils/index.js';
import { ROLE_LABELS } from './transcript.js';

const TIME_PREFIX = '**Time:** ';
const HEADER_PREFIX = '## ';
const CONTENT_PREFIX = '**Content:** ';

/**
 * One message recovered from a transcript
 */
export interface BookEntry {
  time: string | null;
  role: string;
  content: string;
}

/**
 * Parser states
 * - idle: no role header seen yet
 * - in-header: a role is open but has no content yet
 * - accumulating-content: the open role has content lines
 */
export type TranscriptParserState = 'idle' | 'in-header' | 'accumulating-content';

/**
 * Lines that carry layout or metadata rather than message text
 */
export function isMetadataLine(line: string): boolean {
  return (
    (line.startsWith('**') && !line.includes('Content:')) ||
    line.startsWith('Created:') ||
    line.startsWith('Updated:') ||
    line.startsWith('=') ||
    line.startsWith('-') ||
    line.startsWith('# ') ||
    !line.trim()
  );
}

/**
 * Line-oriented state machine over a transcript
 *
 * Precedence per line: time, role header, metadata (discarded), content
 * marker, then free text appended to the open role.
 */
export class TranscriptParser {
  private entries: BookEntry[] = [];
  private time: string | null = null;
  private role: string | null = null;
  private content: string[] = [];

  get state(): TranscriptParserState {
    if (this.role === null) return 'idle';
    return this.content.length > 0 ? 'accumulating-content' : 'in-header';
  }

  /**
   * Feed one line (without its line terminator)
   */
  feed(line: string): void {
    if (line.startsWith(TIME_PREFIX)) {
      this.time = line.slice(TIME_PREFIX.length);
      return;
    }

    if (line.startsWith(HEADER_PREFIX)) {
      this.flush();
      // A bare "## " opens no role
      this.role = line.slice(HEADER_PREFIX.length) || null;
      this.content = [];
      return;
    }

    if (isMetadataLine(line)) return;

    if (line.startsWith(CONTENT_PREFIX)) {
      const first = line.slice(CONTENT_PREFIX.length);
      if (first) {
        this.content.push(first);
      }
      return;
    }

    if (this.role !== null) {
      this.content.push(line);
    }
  }

  /**
   * Flush the open entry and return everything parsed so far
   */
  finish(): BookEntry[] {
    this.flush();
    this.role = null;
    this.content = [];
    return this.entries;
  }

  private flush(): void {
    if (this.state !== 'accumulating-content' || this.role === null) return;

    const content = this.content.join('\n').trim();
    if (content) {
      this.entries.push({ time: this.time, role: this.role, content });
    }
  }
}

/**
 * Parse a transcript into (time, role, content) entries
 */
export function parseTranscript(text: string): BookEntry[] {
  const parser = new TranscriptParser();
  const lines = text.split('\n');

  // A trailing newline does not start another line
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  for (const line of lines) {
    parser.feed(line.endsWith('\r') ? line.slice(0, -1) : line);
  }
  return parser.finish();
}

/**
 * Derive a book title from a transcript filename
 * e.g. "conversations_2024-01_My_Chat.txt" -> "2024-01 My Chat"
 */
export function titleFromFilename(filePath: string): string {
  let name = basename(filePath);
  if (name.startsWith('conversations_')) {
    name = name.slice('conversations_'.length);
  }
  if (name.endsWith('.txt')) {
    name = name.slice(0, -'.txt'.length);
  }
  return name.replace(/_/g, ' ');
}

/**
 * Render entries as a book
 * Only user prompts and assistant responses are printed
 */
export function toBook(entries: BookEntry[], title: string): string {
  const output: string[] = [rule('=', 80), title.toUpperCase(), rule('=', 80), ''];

  entries.forEach((entry, i) => {
    const stamp = `[${entry.time ?? 'Unknown time'}]`;

    if (entry.role === ROLE_LABELS.user) {
      output.push(stamp, `You: ${entry.content}`, '');
    } else if (entry.role === ROLE_LABELS.assistant) {
      output.push(stamp, `Assistant: ${entry.content}`, '');

      const next = entries[i + 1];
      if (next && next.role === ROLE_LABELS.user) {
        output.push(rule('-', 40), '');
      }
    }
  });

  return output.join('\n');
}

/**
 * Book conversion result
 * `written` is false when the transcript held no entries
 */
export interface BookFileResult {
  inputPath: string;
  outputPath: string;
  entryCount: number;
  written: boolean;
  bytesWritten: number;
}

/**
 * Convert a transcript file into a book file
 */
export async function convertBookFile(
  inputPath: string,
  outputPath: string
): Promise<BookFileResult> {
  const entries = parseTranscript(await readFile(inputPath, 'utf-8'));

  if (entries.length === 0) {
    return { inputPath, outputPath, entryCount: 0, written: false, bytesWritten: 0 };
  }

  const content = toBook(entries, titleFromFilename(inputPath));
  const bytesWritten = await writeTextFile(outputPath, content);

  return { inputPath, outputPath, entryCount: entries.length, written: true, bytesWritten };
}
