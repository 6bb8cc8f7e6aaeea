/**
 * caesar-stream: Caesar cipher over messages and byte streams
 */

import type { CaesarConfig, CipherRequest } from './types/index.js';
import type { IStdio } from './types/interfaces.js';
import { applyShift } from './cipher/stream.js';
import { resolveShift } from './cli/key.js';

export * from './cipher/shift.js';
export * from './cipher/stream.js';
export { parseKey, resolveShift } from './cli/key.js';
export { KeyError, UsageError } from './cli/errors.js';
export { ConfigManager, getConfig } from './config/index.js';
export type * from './types/index.js';

export function shouldAppendNewline(config: Pick<CaesarConfig, 'newline'>, stdio: Pick<IStdio, 'stdout'>): boolean {
  if (config.newline === 'always') return true;
  if (config.newline === 'never') return false;
  return stdio.stdout.isTTY === true;
}

/**
 * Run one encrypt/decrypt pass: the message argument when given,
 * otherwise stdin until end of stream. Output goes to stdout unframed,
 * except for the optional trailing newline.
 */
export async function runCipher(
  request: CipherRequest,
  config: Pick<CaesarConfig, 'newline'>,
  stdio: IStdio
): Promise<void> {
  const shift = resolveShift(request.mode, request.key);
  const source = request.message !== undefined ? request.message : stdio.stdin;

  await applyShift(shift, source, stdio.stdout, { end: false });

  if (shouldAppendNewline(config, stdio)) {
    await new Promise<void>((resolve, reject) => {
      stdio.stdout.write('\n', (error) => (error ? reject(error) : resolve()));
    });
  }
}
