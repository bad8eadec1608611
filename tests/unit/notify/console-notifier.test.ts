import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConsoleNotifier } from '../../../src/notify/console-notifier.js';

describe('ConsoleNotifier', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('should print the secret in development', async () => {
    vi.stubEnv('NODE_ENV', 'development');

    await new ConsoleNotifier().sendActivationSecret('a@x.com', 'Ab3dEf9h');

    expect(console.log).toHaveBeenCalledWith('[ConsoleNotifier] Activation secret for a@x.com: Ab3dEf9h');
  });

  it('should keep the secret out of the log elsewhere', async () => {
    vi.stubEnv('NODE_ENV', 'production');

    await new ConsoleNotifier().sendActivationSecret('a@x.com', 'Ab3dEf9h');

    expect(console.log).toHaveBeenCalledWith('[ConsoleNotifier] Activation secret issued for a@x.com');
  });
});
