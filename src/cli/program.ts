/**
 * Command-line front end: flags, usage and exit codes
 */

import yargs from 'yargs';
import chalk from 'chalk';
import type { CaesarConfig, CipherMode } from '../types/index.js';
import type { IStdio } from '../types/interfaces.js';
import { runCipher } from '../index.js';
import { parseKey } from './key.js';
import { UsageError } from './errors.js';

// Kept in step with package.json by hand; the bin runs without reading it
export const VERSION = '0.1.0';

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_IO = 2;

const DESCRIPTION =
  'Encrypt or decrypt the supplied message with a given key. The key should be\n' +
  'a non-negative integer. It is used to either right-shift (encrypt) or\n' +
  'left-shift (decrypt) the ASCII letters in the message.\n\n' +
  'Any other characters are left unchanged. Without a message, standard input\n' +
  'is read until end of file. The result is written to standard output.';

interface ParsedArgs {
  mode: CipherMode;
  key: number;
  message?: string;
}

function createParser(args: string[]) {
  return yargs(args)
    .scriptName('caesar')
    .help(false)
    .version(false)
    .usage(`$0 [-h] (-d key | -e key) [msg]\n\n${DESCRIPTION}`)
    .parserConfiguration({
      'parse-numbers': false,
      'parse-positional-numbers': false,
      'duplicate-arguments-array': false,
    })
    .option('decrypt', { alias: 'd', type: 'string', requiresArg: true, describe: 'Decrypt message using the given key' })
    .option('encrypt', { alias: 'e', type: 'string', requiresArg: true, describe: 'Encrypt message using the given key' })
    .option('help', { alias: 'h', type: 'boolean', describe: 'Display program usage' })
    .option('version', { type: 'boolean', describe: 'Show version number' })
    .strictOptions()
    .exitProcess(false)
    .fail((msg, err) => {
      throw err ?? new UsageError(msg);
    });
}

function resolveArgs(argv: { decrypt?: string; encrypt?: string; _: Array<string | number> }): ParsedArgs {
  if (argv.decrypt !== undefined && argv.encrypt !== undefined) {
    throw new UsageError('only -d or -e may be specified');
  }

  const mode: CipherMode | undefined =
    argv.encrypt !== undefined ? 'encrypt' : argv.decrypt !== undefined ? 'decrypt' : undefined;
  const rawKey = argv.encrypt ?? argv.decrypt;
  if (mode === undefined || rawKey === undefined) {
    throw new UsageError('either -d or -e are required');
  }

  const [message, ...extra] = argv._.map(String);
  if (extra.length > 0) {
    throw new UsageError(`unexpected argument: ${extra[0]} (quote the message to pass spaces)`);
  }

  return { mode, key: parseKey(rawKey), message };
}

function writeLine(stream: IStdio['stderr'] | IStdio['stdout'], text: string): void {
  stream.write(`${text}\n`);
}

/**
 * Parse `args` (without the node/script prefix), run the cipher and
 * return the process exit code. Never calls process.exit itself.
 */
export async function runCli(args: string[], stdio: IStdio, config: CaesarConfig): Promise<number> {
  if (!config.color) {
    chalk.level = 0;
  }

  const parser = createParser(args);

  let parsed: ParsedArgs;
  try {
    const argv = await parser.parseAsync();
    if (argv.help) {
      writeLine(stdio.stdout, await parser.getHelp());
      return EXIT_OK;
    }
    if (argv.version) {
      writeLine(stdio.stdout, VERSION);
      return EXIT_OK;
    }
    parsed = resolveArgs(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    writeLine(stdio.stderr, chalk.red(`caesar: ${message}`));
    writeLine(stdio.stderr, chalk.gray(await parser.getHelp()));
    return EXIT_USAGE;
  }

  try {
    await runCipher(parsed, config, stdio);
    return EXIT_OK;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    writeLine(stdio.stderr, chalk.red(`caesar: ${message}`));
    return EXIT_IO;
  }
}
