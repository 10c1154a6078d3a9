#!/usr/bin/env node
/**
 * comment-speller - Entry Point
 *
 * Fixes spelling and grammar inside source code comments and leaves every
 * other byte of the file untouched.
 *
 * Usage:
 *   comment-speller --lang python main.py > fixed.py
 *   cat main.c | comment-speller --lang c
 *   comment-speller --lang rust --write src/lib.rs
 *   comment-speller --list-languages
 *   comment-speller --help
 */

import { runCLI } from './cli/commands.js';

function logCrash(error: unknown): void {
  const errorMsg = error instanceof Error ? `${error.message}\n${error.stack ?? ''}` : String(error);
  process.stderr.write(`comment-speller crashed: ${errorMsg}\n`);
}

process.on('uncaughtException', (error) => {
  logCrash(error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logCrash(reason instanceof Error ? reason : new Error(String(reason)));
  process.exit(1);
});

async function main(): Promise<void> {
  await runCLI(process.argv);
}

main().catch((error: unknown) => {
  logCrash(error);
  process.exit(1);
});
