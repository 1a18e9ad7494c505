import { describe, it, expect, vi, afterEach } from 'vitest';

afterEach(async () => {
  const { resetRuntime } = await import('../runtime');
  resetRuntime();
  vi.resetModules();
});

describe('getRuntime', () => {
  it('returns the same runtime on every call', async () => {
    const { getRuntime } = await import('../runtime');
    expect(getRuntime()).toBe(getRuntime());
  });

  it('shares one runtime between separately bundled copies of the module', async () => {
    const routeCopy = await import('../runtime');
    vi.resetModules();
    const instrumentationCopy = await import('../runtime');

    expect(instrumentationCopy).not.toBe(routeCopy);
    expect(instrumentationCopy.getRuntime()).toBe(routeCopy.getRuntime());
  });

  it('installs and drops a replacement runtime', async () => {
    const { createRuntime, getRuntime, resetRuntime } = await import('../runtime');
    const replacement = createRuntime({ settings: { MAX_CONCURRENT_JOBS: 1 } });

    resetRuntime(replacement);
    expect(getRuntime()).toBe(replacement);
    expect(getRuntime().settings.MAX_CONCURRENT_JOBS).toBe(1);

    resetRuntime();
    expect(getRuntime()).not.toBe(replacement);
  });
});
