/**
 * Core CLI commands
 * convert, book, master, split
 */

import { Command, Option } from 'commander';
import { resolve } from 'path';
import { getConfig, SplitModeSchema, type SplitMode } from '../../config/index.js';
import { convertTranscripts, convertBooks, type BatchResult } from '../../pipeline/index.js';
import { createMasterBook } from '../../export/index.js';
import { splitExport } from '../../split/index.js';
import { errorMessage } from '../../utils/index.js';

/** Options for the master command */
export interface MasterOptions {
  title?: string;
}

/** Options for the split command */
export interface SplitCommandOptions {
  mode: SplitMode;
  prefix: string;
  /** true when the flag is given without keys */
  outMonths?: string[] | true;
}

/**
 * Print a batch summary and its per-file errors
 */
function printBatchResult(result: BatchResult, noun: string): void {
  if (result.inputKind === 'missing') {
    console.log('Nothing converted: input path does not exist.');
    return;
  }

  console.log(`Converted ${result.converted.length} ${noun}`);

  if (result.skipped.length > 0) {
    console.log(`Skipped ${result.skipped.length} files with no conversation data`);
  }

  if (result.errors.length > 0) {
    console.log(`\nErrors (${result.errors.length}):`);
    for (const err of result.errors) {
      console.log(`  ! ${err.path}: ${err.error}`);
    }
  }
}

/**
 * Register core commands on the program
 */
export function registerCoreCommands(program: Command): void {
  const config = getConfig();

  // Convert command
  program
    .command('convert <input> <output>')
    .description('Convert ChatGPT JSON exports (file or directory) into readable transcripts')
    .action(async (input: string, output: string) => {
      try {
        const result = await convertTranscripts(resolve(input), resolve(output));
        printBatchResult(result, 'exports');
      } catch (err) {
        console.error('Failed to convert exports:', errorMessage(err));
        process.exitCode = 1;
      }
    });

  // Book command
  program
    .command('book <input> <output>')
    .description('Reformat transcripts (file or directory) into book-style text')
    .action(async (input: string, output: string) => {
      try {
        const result = await convertBooks(resolve(input), resolve(output));
        printBatchResult(result, 'transcripts');
      } catch (err) {
        console.error('Failed to build books:', errorMessage(err));
        process.exitCode = 1;
      }
    });

  // Master command
  program
    .command('master <input> <output>')
    .description('Combine a directory of book files into one master book')
    .option('--title <title>', 'Banner title', config.bookTitle)
    .action(async (input: string, output: string, options: MasterOptions) => {
      try {
        const result = await createMasterBook(resolve(input), resolve(output), {
          title: options.title,
        });

        if (!result.written) {
          console.log('Nothing written: input directory does not exist.');
          return;
        }

        console.log(`Master book created: ${result.outputPath}`);
        console.log(`  Conversations: ${result.conversationCount}`);
        console.log(`  Chapters: ${result.chapters.length}`);
      } catch (err) {
        console.error('Failed to create master book:', errorMessage(err));
        process.exitCode = 1;
      }
    });

  // Split command
  program
    .command('split <input> <outputDir>')
    .description('Split a large conversations export (.json or .zip) into smaller JSON files')
    .addOption(
      new Option('--mode <mode>', 'How to group conversations')
        .choices(SplitModeSchema.options)
        .default(config.splitMode)
    )
    .option('--prefix <prefix>', 'Prefix for output filenames', config.filePrefix)
    .option('--out-months [keys...]', 'Bucket keys to skip, e.g. 2024-01 2024-02')
    .action(async (input: string, outputDir: string, options: SplitCommandOptions) => {
      try {
        const result = await splitExport(resolve(input), resolve(outputDir), {
          mode: options.mode,
          prefix: options.prefix,
          exclude: Array.isArray(options.outMonths) ? options.outMonths : [],
        });

        console.log(`Split ${result.conversationCount} conversations into ${result.written.length} files`);
        for (const { key, conversationCount } of result.excluded) {
          console.log(`  - skipped ${key} (${conversationCount} conversations)`);
        }
      } catch (err) {
        console.error('Failed to split export:', errorMessage(err));
        process.exitCode = 1;
      }
    });
}
