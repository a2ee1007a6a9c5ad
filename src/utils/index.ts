/**
 * Utility functions
 */

import { mkdir, stat, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * What a path on disk points at
 */
export type PathKind = 'file' | 'directory' | 'missing';

/**
 * Get the message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Check whether a path is a file, a directory, or absent
 */
export async function getPathKind(path: string): Promise<PathKind> {
  try {
    const stats = await stat(path);
    if (stats.isDirectory()) return 'directory';
    return 'file';
  } catch (err) {
    if (isMissingPathError(err)) return 'missing';
    throw err;
  }
}

function isMissingPathError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Write a UTF-8 text file, creating parent directories first
 * Returns the number of bytes written
 */
export async function writeTextFile(filePath: string, content: string): Promise<number> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf-8');
  return Buffer.byteLength(content, 'utf-8');
}

/**
 * Build a separator line of a repeated character
 */
export function rule(char: string, width: number): string {
  return char.repeat(width);
}

/**
 * Format a Unix timestamp (seconds) as "YYYY-MM-DD HH:MM:SS UTC"
 * Returns null when the value cannot be placed on the calendar
 */
export function formatUtcSeconds(seconds: number): string | null {
  const date = new Date(seconds * 1000);
  if (Number.isNaN(date.getTime()) || date.getUTCFullYear() > 9999) return null;
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}
