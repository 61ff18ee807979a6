import { describe, it, expect, afterEach, vi } from 'vitest';
import { getLogLevel, getNodeEnv, getSnapshotDir, isDevelopment, DEFAULT_SNAPSHOT_DIR } from './env.js';

describe('environment configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should read the log level case-insensitively', () => {
    vi.stubEnv('LOG_LEVEL', 'DEBUG');
    expect(getLogLevel()).toBe('debug');
  });

  it('should fall back to info for unknown levels', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    expect(getLogLevel()).toBe('info');
  });

  it('should detect development mode', () => {
    vi.stubEnv('NODE_ENV', 'development');
    expect(getNodeEnv()).toBe('development');
    expect(isDevelopment()).toBe(true);
  });

  it('should use the default snapshot directory when unset or empty', () => {
    vi.stubEnv('LEVAIN_SNAPSHOT_DIR', '');
    expect(getSnapshotDir()).toBe(DEFAULT_SNAPSHOT_DIR);
  });

  it('should honour LEVAIN_SNAPSHOT_DIR', () => {
    vi.stubEnv('LEVAIN_SNAPSHOT_DIR', '/tmp/levain-test');
    expect(getSnapshotDir()).toBe('/tmp/levain-test');
  });
});
