/**
 * CLI Commands Module
 *
 * Command-line surface of comment-speller:
 *
 *   comment-speller --lang python main.py > fixed.py
 *   cat main.c | comment-speller --lang c
 *   comment-speller --lang rust --write src/lib.rs
 *   comment-speller --lang go --dry-run main.go
 *
 * stdout carries only the rebuilt source (or JSON for --dry-run and
 * --list-languages). Spinner, summaries and errors go to stderr so the tool
 * can sit in a pipe.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as fs from 'node:fs';
import * as path from 'node:path';

import { listLanguages, lookupLanguage, type LanguageDescriptor } from '../engines/languageRegistry.js';
import { extractComments, toCommentPayload } from '../engines/commentExtractor.js';
import { checkSource } from '../engines/pipeline.js';
import { OpenAICorrector, type CommentCorrector } from '../engines/correctionClient.js';
import { decodeSource, toServiceText } from '../engines/sourceText.js';
import {
  applyEnvOverrides,
  generateDefaultConfig,
  loadConfig,
  resolveConfigPath,
  type Config,
} from '../storage/config.js';
import { inputNotFound, invalidArguments, isSpellerError } from '../errors/index.js';
import { atomicWrite } from '../utils/atomicWrite.js';
import { createLogger, getDefaultLogDir, getLogger, LogLevel } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface CLIOptions {
  lang?: string;
  output?: string;
  write?: boolean;
  dryRun?: boolean;
  listLanguages?: boolean;
  initConfig?: boolean;
  config?: string;
  /** Directory, or true for the default log directory */
  logDir?: string | boolean;
  verbose?: boolean;
}

/**
 * Seams for tests; production uses the defaults
 */
export interface CommandDeps {
  stdin?: NodeJS.ReadableStream;
  createCorrector?: (language: LanguageDescriptor, config: Config) => CommentCorrector;
}

// ============================================================================
// Output Helpers
// ============================================================================

function printError(text: string): void {
  process.stderr.write(chalk.red('Error: ' + text) + '\n');
}

function printInfo(text: string): void {
  process.stderr.write(chalk.gray(text) + '\n');
}

function writeStdout(data: string | Buffer): void {
  process.stdout.write(data);
}

/**
 * Report an error on stderr and mark the process as failed
 */
function handleError(error: unknown, verbose: boolean = false): void {
  if (isSpellerError(error)) {
    printError(error.userMessage);
    if (verbose) {
      printInfo('  Developer: ' + error.developerMessage);
    }
  } else if (error instanceof Error) {
    printError(error.message);
    if (verbose && error.stack) {
      printInfo('  Stack: ' + error.stack);
    }
  } else {
    printError(String(error));
  }

  if (!verbose) {
    printInfo('  For more details, run with --verbose');
  }

  process.exitCode = 1;
}

// ============================================================================
// Input
// ============================================================================

/**
 * Read a whole stream into memory; sources are never scanned while streaming
 */
export async function readStream(stream: NodeJS.ReadableStream): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks);
}

async function readInput(file: string | undefined, stdin: NodeJS.ReadableStream): Promise<Buffer> {
  if (file === undefined) {
    return readStream(stdin);
  }
  try {
    return await fs.promises.readFile(file);
  } catch (error) {
    throw inputNotFound(file, error instanceof Error ? error : undefined);
  }
}

// ============================================================================
// Commands
// ============================================================================

function configureLogging(options: CLIOptions): void {
  if (options.logDir) {
    createLogger(options.logDir === true ? getDefaultLogDir() : options.logDir);
  }
  const logger = getLogger();
  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
}

/**
 * Print registered languages, one per line: id, name, aliases
 */
function listLanguagesCommand(): void {
  const lines = listLanguages().map((language) => {
    const aliases = language.aliases.length > 0 ? ` (${language.aliases.join(', ')})` : '';
    return `${language.id.padEnd(12)}${language.name}${aliases}`;
  });
  writeStdout(lines.join('\n') + '\n');
}

async function initConfigCommand(options: CLIOptions): Promise<void> {
  const configPath = resolveConfigPath(options.config);
  await generateDefaultConfig(configPath);
  printInfo(`Wrote default config to ${configPath}`);
}

function defaultCorrector(language: LanguageDescriptor, config: Config): CommentCorrector {
  return new OpenAICorrector({ languageName: language.name, config });
}

/**
 * Check the comments of one input and emit the rebuilt source
 */
export async function checkCommand(
  file: string | undefined,
  options: CLIOptions,
  deps: CommandDeps = {}
): Promise<void> {
  const verbose = options.verbose ?? false;

  try {
    configureLogging(options);

    if (options.listLanguages) {
      listLanguagesCommand();
      return;
    }
    if (options.initConfig) {
      await initConfigCommand(options);
      return;
    }

    // Language is validated before any input is read
    const language = lookupLanguage(options.lang ?? '');

    if (options.write && file === undefined) {
      throw invalidArguments('--write needs a file argument.');
    }
    if (options.write && options.output) {
      throw invalidArguments('Use either --write or --output, not both.');
    }

    const input = await readInput(file, deps.stdin ?? process.stdin);

    if (options.dryRun) {
      const text = decodeSource(input);
      const payload = toCommentPayload(text, extractComments(text, language), toServiceText);
      writeStdout(JSON.stringify({ language: language.id, comments: payload }, null, 2) + '\n');
      return;
    }

    const config = applyEnvOverrides(await loadConfig(resolveConfigPath(options.config)));
    const corrector = (deps.createCorrector ?? defaultCorrector)(language, config);

    if (!verbose) {
      getLogger().setSilentConsole(true);
    }
    const spinner = ora({ text: 'Checking comments...', stream: process.stderr }).start();

    const target = options.write ? file : options.output;
    const result = await checkSource(input, { language, corrector })
      .then(async (checked) => {
        if (target !== undefined) {
          await atomicWrite(path.resolve(target), checked.output);
        } else {
          writeStdout(checked.output);
        }
        return checked;
      })
      .catch((error: unknown) => {
        spinner.fail('Comment check failed');
        throw error;
      })
      .finally(() => getLogger().setSilentConsole(false));

    spinner.succeed(
      `${result.changed} of ${result.corrected.length} comment(s) corrected` +
        (target !== undefined ? ` -> ${target}` : '')
    );
  } catch (error) {
    handleError(error, verbose);
  }
}

// ============================================================================
// CLI Program
// ============================================================================

/**
 * Create and configure the CLI program
 */
export function createCLI(deps: CommandDeps = {}): Command {
  const program = new Command();

  program
    .name('comment-speller')
    .description('Fix spelling and grammar in source code comments without touching the code')
    .version(getVersion(), '-v, --version', 'Show version number')
    .argument('[file]', 'Source file to check (reads stdin when omitted)')
    .option('-l, --lang <tag>', 'Language of the source (see --list-languages)')
    .option('-o, --output <file>', 'Write the result to a file instead of stdout')
    .option('-w, --write', 'Rewrite the input file in place')
    .option('--dry-run', 'Print the extracted comments as JSON without correcting them')
    .option('--list-languages', 'List supported languages and exit')
    .option('-c, --config <path>', 'Config file (default: ./.comment-speller.json)')
    .option('--init-config', 'Write a documented default config file and exit')
    .option('--log-dir [dir]', 'Also write logs to a file (default dir: ~/.comment-speller/logs)')
    .option('--verbose', 'Show debug logging and developer error details')
    .action((file: string | undefined, options: CLIOptions) => checkCommand(file, options, deps));

  return program;
}

/**
 * Get package version
 */
function getVersion(): string {
  try {
    const packageJsonPath = new URL('../../package.json', import.meta.url);
    const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[], deps: CommandDeps = {}): Promise<void> {
  const program = createCLI(deps);
  await program.parseAsync(args, { from: 'node' });
}

export { handleError };
