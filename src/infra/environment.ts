import type { IEnvironment, IStdio } from '../types/interfaces.js';

export class SystemEnvironment implements IEnvironment {
  get(key: string): string | undefined {
    return process.env[key];
  }
}

/**
 * The real process streams. Resolved on call so that importing the
 * library never touches process.stdin.
 */
export function getSystemStdio(): IStdio {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  };
}
