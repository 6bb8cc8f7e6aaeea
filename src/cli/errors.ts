/**
 * Errors raised while validating command-line input
 */

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type KeyErrorReason = 'format' | 'range' | 'negative';

export class KeyError extends UsageError {
  readonly reason: KeyErrorReason;
  readonly input: string;

  constructor(reason: KeyErrorReason, input: string) {
    super(`${KeyError.describe(reason)}: ${input}`);
    this.name = 'KeyError';
    this.reason = reason;
    this.input = input;
  }

  private static describe(reason: KeyErrorReason): string {
    switch (reason) {
      case 'range':
        return 'key is too large';
      case 'negative':
      case 'format':
        return 'key must be a positive base 10 integer';
    }
  }
}
