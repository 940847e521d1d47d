import { describe, it, expect, vi, afterEach } from 'vitest';

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  vi.resetModules();
});

describe('env', () => {
  it('accepts deployment-specific NODE_ENV values without exiting', async () => {
    vi.stubEnv('NODE_ENV', 'staging');
    vi.resetModules();
    const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });

    const { env } = await import('../env.js');
    const api = await import('../../index.js');

    expect(env.NODE_ENV).toBe('staging');
    expect(typeof api.renderResume).toBe('function');
    expect(exit).not.toHaveBeenCalled();
  });

  it('defaults NODE_ENV to production', async () => {
    vi.stubEnv('NODE_ENV', undefined);
    vi.resetModules();

    const { env } = await import('../env.js');
    expect(env.NODE_ENV).toBe('production');
  });
});
