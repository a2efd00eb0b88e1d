import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { resolve } from 'node:path';
import { loadEnv } from './env-loader.js';
import { existsSync } from 'node:fs';
import { config as dotenvConfig } from 'dotenv';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
}));

vi.mock('dotenv', () => ({
  config: vi.fn(),
}));

describe('loadEnv', () => {
  const mockExistsSync = vi.mocked(existsSync);
  const mockDotenvConfig = vi.mocked(dotenvConfig);

  beforeEach(() => {
    vi.clearAllMocks();
    mockDotenvConfig.mockReturnValue({ parsed: undefined });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return empty loaded array when no .env files exist', () => {
    mockExistsSync.mockReturnValue(false);

    const result = loadEnv({ projectDir: '/projects/session-a' });

    expect(result.loaded).toEqual([]);
    expect(mockDotenvConfig).not.toHaveBeenCalled();
  });

  it('should load the project .env before the cwd fallback', () => {
    mockExistsSync.mockReturnValue(true);
    mockDotenvConfig.mockReturnValue({ parsed: { FFMPEG_PATH: '/opt/ffmpeg' } });

    const result = loadEnv({ projectDir: '/projects/session-a' });

    expect(result.loaded[0]).toBe('/projects/session-a/.env');
    expect(mockDotenvConfig).toHaveBeenNthCalledWith(1, { path: '/projects/session-a/.env' });
    expect(mockDotenvConfig).toHaveBeenNthCalledWith(
      2,
      expect.objectContaining({ override: false }),
    );
  });

  it('should load cwd .env as fallback when no project dir is given', () => {
    mockExistsSync.mockReturnValue(true);
    mockDotenvConfig.mockReturnValue({ parsed: { TIERLINE_LOG_LEVEL: 'debug' } });

    const result = loadEnv();

    expect(result.loaded).toEqual([resolve(process.cwd(), '.env')]);
    expect(mockDotenvConfig).toHaveBeenCalledWith(
      expect.objectContaining({ override: false }),
    );
  });

  it('should not list the cwd .env twice when it is also the project .env', () => {
    mockExistsSync.mockReturnValue(true);
    mockDotenvConfig.mockReturnValue({ parsed: { ROOT: 'value' } });

    const result = loadEnv({ projectDir: process.cwd() });

    expect(result.loaded).toEqual([resolve(process.cwd(), '.env')]);
    expect(mockDotenvConfig).toHaveBeenCalledTimes(1);
  });

  it('should respect verbose option and log to console', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    mockExistsSync.mockReturnValue(true);
    mockDotenvConfig.mockReturnValue({ parsed: { TEST: 'value' } });

    loadEnv({ projectDir: '/projects/session-a', verbose: true });

    expect(consoleSpy).toHaveBeenCalledWith('[env] Loaded: /projects/session-a/.env');
  });

  it('should not log to console when verbose is false', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    mockExistsSync.mockReturnValue(true);
    mockDotenvConfig.mockReturnValue({ parsed: { TEST: 'value' } });

    loadEnv({ projectDir: '/projects/session-a', verbose: false });

    expect(consoleSpy).not.toHaveBeenCalled();
  });
});
