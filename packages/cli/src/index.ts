#!/usr/bin/env tsx
import { readFileSync } from 'fs';
import { Command } from 'commander';
import { logger, LogLevel } from '@pkgformula/core';
import { withErrorHandling } from './utils/error-handling.js';
import type { ResolveCommandOptions } from './commands/resolve.js';
import type { ParseCommandOptions } from './commands/parse.js';
import type { ListOptions } from './commands/list.js';

/**
 * pkgformula CLI - Main entry point
 *
 * Commands are lazily loaded via dynamic import() so only the invoked
 * command's module tree is loaded.
 */

function getVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  const version: unknown = typeof manifest === 'object' && manifest !== null ? Reflect.get(manifest, 'version') : undefined;
  return typeof version === 'string' ? version : '0.0.0';
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name('pkgformula')
  .description('Resolve package dependency formulas against a package repository')
  .version(getVersion())
  .option('--verbose', 'enable debug logging')
  // Root options come before the command, so `resolve --version <v>` reaches resolve
  .enablePositionalOptions()
  .configureHelp({ sortSubcommands: true })
  .hook('preAction', thisCommand => {
    if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }
  });

program
  .command('resolve')
  .argument('<package>', 'package to resolve')
  .description('Find a set of package versions that satisfies every dependency formula')
  .option('--version <version>', 'pin the root package to this version')
  .option('-c, --constraint <constraint>', 'constraint on the root package, e.g. \'>= "1.0"\' (repeatable)', collect)
  .option('--repo <dir>', 'repository directory (default: $PKGFORMULA_REPO or the working directory)')
  .option('--max-steps <n>', 'give up after this many search steps')
  .option('--trace', 'print every search step')
  .action(withErrorHandling(async (packageName: string, options: ResolveCommandOptions) => {
    const { setupResolveCommand } = await import('./commands/resolve.js');
    await setupResolveCommand(packageName, options);
  }));

program
  .command('parse')
  .argument('<formula>', 'formula text, e.g. \'"A" {>= "1.0"} | "B"\'')
  .description('Parse a formula and print it in canonical form')
  .option('--tree', 'also print the formula as a tree')
  .action(withErrorHandling(async (text: string, options: ParseCommandOptions) => {
    const { setupParseCommand } = await import('./commands/parse.js');
    await setupParseCommand(text, options);
  }));

program
  .command('list')
  .alias('ls')
  .argument('[package]', 'show the versions and formulas of one package')
  .description('List packages in the repository')
  .option('--repo <dir>', 'repository directory (default: $PKGFORMULA_REPO or the working directory)')
  .action(withErrorHandling(async (packageName: string | undefined, options: ListOptions) => {
    const { setupListCommand } = await import('./commands/list.js');
    await setupListCommand(packageName, options);
  }));

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

// Only run main if this file is executed directly
if (process.argv[1] && (process.argv[1].endsWith('index.js') || process.argv[1].endsWith('index.ts') || process.argv[1].endsWith('pkgformula'))) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', error);
    console.error('Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
