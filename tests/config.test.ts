import { describe, it, expect, afterEach, vi } from 'vitest';
import { ConfigError, loadConfig } from '../src/config.js';
import { MemFS } from '../src/kernel/vfs/index.js';

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'silent', umask: 0o022 });
  });

  it('reads the log level and an octal umask', () => {
    expect(loadConfig({ MEMFS_LOG_LEVEL: 'debug', MEMFS_UMASK: '077' })).toEqual({ logLevel: 'debug', umask: 0o077 });
  });

  it('accepts a leading zero on the umask', () => {
    expect(loadConfig({ MEMFS_UMASK: '0027' }).umask).toBe(0o027);
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ HOME: '/home/test', PATH: '/bin' })).toEqual({ logLevel: 'silent', umask: 0o022 });
  });

  it('rejects a umask that is not octal', () => {
    expect(() => loadConfig({ MEMFS_UMASK: '999' })).toThrow(ConfigError);
    expect(() => loadConfig({ MEMFS_UMASK: '999' })).toThrow(
      'Invalid memtree-fs configuration\n  • MEMFS_UMASK: expected an octal permission mask such as 022',
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ MEMFS_LOG_LEVEL: 'loud' })).toThrow(/• MEMFS_LOG_LEVEL: /);
  });

  it('is what a filesystem uses when none is given', () => {
    vi.stubEnv('MEMFS_UMASK', '077');
    const fs = new MemFS();
    fs.mkdir('/d');
    expect(fs.stat('/d').mode()).toBe(0o700);
  });
});
