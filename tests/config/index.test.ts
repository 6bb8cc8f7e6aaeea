/**
 * Tests for ConfigManager
 */

import { ConfigManager } from '../../src/config/index.js';
import type { IEnvironment } from '../../src/types/interfaces.js';

function createMockEnv(values: Record<string, string> = {}): IEnvironment {
  return {
    get: vi.fn((key: string) => values[key]),
  };
}

describe('ConfigManager', () => {
  it('defaults to auto newline and colour on', () => {
    const manager = new ConfigManager(createMockEnv());
    expect(manager.config).toEqual({ newline: 'auto', color: true });
  });

  it('reads CAESAR_NEWLINE and CAESAR_COLOR', () => {
    const manager = new ConfigManager(createMockEnv({ CAESAR_NEWLINE: 'Never', CAESAR_COLOR: '0' }));
    expect(manager.config).toEqual({ newline: 'never', color: false });
  });

  it('falls back to defaults for unknown values', () => {
    const manager = new ConfigManager(createMockEnv({ CAESAR_NEWLINE: 'sometimes', CAESAR_COLOR: 'maybe' }));
    expect(manager.config).toEqual({ newline: 'auto', color: true });
  });

  it('caches the config until reset', () => {
    const env = createMockEnv({ CAESAR_NEWLINE: 'always' });
    const manager = new ConfigManager(env);

    expect(manager.config.newline).toBe('always');
    expect(manager.config.color).toBe(true);
    expect(env.get).toHaveBeenCalledTimes(2);

    manager.resetConfig();
    expect(manager.config.newline).toBe('always');
    expect(env.get).toHaveBeenCalledTimes(4);
  });
});
