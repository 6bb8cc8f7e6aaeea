/**
 * TypeScript type definitions
 */

export * from './interfaces.js';

export type CipherMode = 'encrypt' | 'decrypt';

/**
 * When to end the output with a newline.
 * - 'auto' (default): only when stdout is a terminal.
 * - 'always' / 'never': regardless of where stdout goes.
 */
export type NewlineMode = 'auto' | 'always' | 'never';

export interface CaesarConfig {
  newline: NewlineMode;
  color: boolean;
}

export interface CipherRequest {
  mode: CipherMode;
  key: number;
  /**
   * Message given on the command line. When omitted, stdin is read
   * until end of stream.
   */
  message?: string;
}
