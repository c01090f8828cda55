import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

describe('ff help output', () => {
  let errSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.resetModules();
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    errSpy.mockRestore();
  });

  it('lists the input forms, options and keys', async () => {
    const { printHelp } = await import('../../src/cli/help.js');
    printHelp();
    const out = errSpy.mock.calls.map((c: unknown[]) => String(c[0] ?? '')).join('\n');
    expect(out).toContain('Usage: ff [options] [<file> | <item>...]');
    expect(out).toContain('--multi-select, -m');
    expect(out).toContain('--height-percentage <percent>');
    expect(out).toContain('Exit without selecting');
    expect(out).toContain('~/.config/ff/config.json');
  });

  it('prints a leading message before the usage', async () => {
    const { printHelp } = await import('../../src/cli/help.js');
    printHelp('Missing input.');
    expect(errSpy.mock.calls[0]?.[0]).toBe('Missing input.');
    expect(errSpy.mock.calls[1]?.[0]).toBe('');
  });
});
