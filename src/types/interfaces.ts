/**
 * Injectable seams for the CLI runtime
 */

import type { Readable, Writable } from 'stream';

export interface IEnvironment {
  get(key: string): string | undefined;
}

/**
 * The process streams the cipher reads from and writes to.
 */
export interface IStdio {
  stdin: Readable;
  stdout: Writable & { isTTY?: boolean };
  stderr: Writable;
}
