import { describe, it, expect } from 'vitest';
import { ConfigError } from './errors';
import { err, ok, unwrap } from './result';

describe('unwrap', () => {
  it('returns the value of a success', () => {
    expect(unwrap(ok(42))).toBe(42);
  });

  it('rethrows the carried error itself', () => {
    const error = new ConfigError('Invalid config file: /etc/ocmeter.json', { filePath: '/etc/ocmeter.json' });
    let thrown: unknown;
    try {
      unwrap(err(error));
    } catch (e) {
      thrown = e;
    }
    expect(thrown).toBe(error);
    expect(thrown).toBeInstanceOf(ConfigError);
  });
});
