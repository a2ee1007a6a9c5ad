/**
 * Batch conversion pipeline
 * Converts a single file, or mirrors a directory tree converting every match
 */

import { mkdir, readdir } from 'fs/promises';
import type { Dirent } from 'fs';
import { join, relative } from 'path';
import { createLogger } from '../utils/logger.js';
import { errorMessage, getPathKind, type PathKind } from '../utils/index.js';

/**
 * How one kind of file is converted
 */
export interface BatchConverter {
  /** Name used in log records */
  name: string;
  /** Extension of the files picked up from a directory, e.g. ".json" */
  extension: string;
  /** Extension given to mirrored output files, e.g. ".txt" */
  outputExtension: string;
  /**
   * Convert one file. Resolves false when the input held nothing to write.
   */
  convertFile: (inputPath: string, outputPath: string) => Promise<boolean>;
}

/**
 * Batch progress
 */
export interface BatchProgress {
  current: number;
  total: number;
  currentFile: string;
}

/**
 * Batch options
 */
export interface BatchOptions {
  onProgress?: (progress: BatchProgress) => void;
}

/**
 * Batch result
 */
export interface BatchResult {
  inputKind: PathKind;
  converted: Array<{ inputPath: string; outputPath: string }>;
  skipped: string[];
  errors: Array<{ path: string; error: string }>;
}

/**
 * Regular files, and symlinks that do not resolve to a directory. A broken
 * link is kept so its conversion error gets reported.
 */
async function isFileEntry(entry: Dirent, fullPath: string): Promise<boolean> {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  return (await getPathKind(fullPath)) !== 'directory';
}

/**
 * Collect files with an extension under a directory, in sorted order
 * Hidden entries are included; a symlink counts when it is not a directory
 * and is not followed when it points at one
 */
export async function collectFiles(dir: string, extension: string): Promise<string[]> {
  const files: string[] = [];

  async function walk(currentDir: string): Promise<void> {
    const entries = await readdir(currentDir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = join(currentDir, entry.name);

      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.name.endsWith(extension) && (await isFileEntry(entry, fullPath))) {
        files.push(fullPath);
      }
    }
  }

  await walk(dir);
  return files;
}

/**
 * Map a file under inputDir to the same relative path under outputDir,
 * swapping its extension
 */
export function mirrorPath(
  filePath: string,
  inputDir: string,
  outputDir: string,
  extension: string,
  outputExtension: string
): string {
  let rel = relative(inputDir, filePath);
  if (rel.endsWith(extension)) {
    rel = rel.slice(0, rel.length - extension.length) + outputExtension;
  }
  return join(outputDir, rel);
}

/**
 * Convert input to output
 *
 * A file converts to the output path as given. A directory is walked and
 * each matching file converts into the mirrored tree under output. A
 * failing file is logged and recorded; the rest of the batch continues.
 */
export async function runBatch(
  input: string,
  output: string,
  converter: BatchConverter,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const log = createLogger({ module: 'batch', batch: converter.name });
  const inputKind = await getPathKind(input);
  const result: BatchResult = { inputKind, converted: [], skipped: [], errors: [] };

  if (inputKind === 'missing') {
    log.error(`Input path does not exist: ${input}`);
    return result;
  }

  let jobs: Array<{ inputPath: string; outputPath: string }>;
  if (inputKind === 'file') {
    jobs = [{ inputPath: input, outputPath: output }];
  } else {
    await mkdir(output, { recursive: true });
    const files = await collectFiles(input, converter.extension);
    jobs = files.map((inputPath) => ({
      inputPath,
      outputPath: mirrorPath(inputPath, input, output, converter.extension, converter.outputExtension),
    }));
  }

  for (const [index, job] of jobs.entries()) {
    options.onProgress?.({ current: index + 1, total: jobs.length, currentFile: job.inputPath });

    try {
      const written = await converter.convertFile(job.inputPath, job.outputPath);
      if (written) {
        result.converted.push(job);
        log.info(`Converted: ${job.inputPath} -> ${job.outputPath}`);
      } else {
        result.skipped.push(job.inputPath);
        log.warn(`No conversations found in ${job.inputPath}`);
      }
    } catch (err) {
      const error = errorMessage(err);
      result.errors.push({ path: job.inputPath, error });
      log.error({ path: job.inputPath }, `Error converting ${job.inputPath}: ${error}`);
    }
  }

  return result;
}
