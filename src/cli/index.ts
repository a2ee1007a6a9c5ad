#!/usr/bin/env node
/**
 * chatbook CLI - Main entry point
 */

import { Command } from 'commander';
import { version } from '../version.js';
import { registerCoreCommands, registerAdminCommands } from './commands/index.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('chatbook')
    .description('Turn ChatGPT conversation exports into transcripts, books, and split archives')
    .version(version);

  // Register command groups
  registerCoreCommands(program);
  registerAdminCommands(program);

  return program;
}

// Run CLI when executed directly (not when imported as module)
if (process.argv[1]?.includes('cli/index') || process.argv[1]?.includes('cli\\index')) {
  try {
    await createProgram().parseAsync();
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
}
