#!/usr/bin/env node
/**
 * Dossier CLI - Main entry point
 */

import { Command } from 'commander';
import { version } from '../version.js';
import { registerDossierCommands } from './commands/index.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('dossier')
    .description('Build navigable dossiers from exported chat conversations')
    .version(version);

  registerDossierCommands(program);

  return program;
}

// Run CLI when executed directly (not when imported as module)
const entry = process.argv[1] ?? '';
if (entry.includes('cli/index') || entry.includes('cli\\index') || /[\\/]dossier$/.test(entry)) {
  const program = createProgram();
  program.parseAsync().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}
