import { describe, it, expect } from 'vitest';
import { loadConfig, toMegabytes } from '../../src/config.js';
import { ConfigurationError } from '../../src/utils/errors.js';

describe('loadConfig', () => {
  it('applies defaults around the required token', () => {
    const config = loadConfig({ TELEGRAM_TOKEN: 'test-token' });

    expect(config.TELEGRAM_TOKEN).toBe('test-token');
    expect(config.UPLOAD_LIMIT_BYTES).toBe(50 * 1024 * 1024);
    expect(config.PART_SIZE_BYTES).toBe(48 * 1024 * 1024);
    expect(config.YTDLP_MAX_HEIGHT).toBe(360);
    expect(config.YTDLP_RETRIES).toBe(3);
    expect(config.YTDLP_TIMEOUT_MS).toBe(0);
    expect(config.YTDLP_PATH).toBe('yt-dlp');
    expect(config.YTDLP_COOKIES_CONTENT).toBeUndefined();
    expect(config.LOG_VERBOSE).toBe(false);
  });

  it('parses numeric and boolean overrides', () => {
    const config = loadConfig({
      TELEGRAM_TOKEN: 'test-token',
      UPLOAD_LIMIT_BYTES: '2000',
      PART_SIZE_BYTES: '1500',
      YTDLP_MAX_HEIGHT: '480',
      LOG_VERBOSE: 'TRUE',
    });

    expect(config.UPLOAD_LIMIT_BYTES).toBe(2000);
    expect(config.PART_SIZE_BYTES).toBe(1500);
    expect(config.YTDLP_MAX_HEIGHT).toBe(480);
    expect(config.LOG_VERBOSE).toBe(true);
  });

  it('fails without a token', () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
    expect(() => loadConfig({})).toThrow(/TELEGRAM_TOKEN/);
  });

  it('rejects a part size that is not below the upload limit', () => {
    expect(() => loadConfig({
      TELEGRAM_TOKEN: 'test-token',
      UPLOAD_LIMIT_BYTES: '1000',
      PART_SIZE_BYTES: '1000',
    })).toThrow('PART_SIZE_BYTES: PART_SIZE_BYTES must be smaller than UPLOAD_LIMIT_BYTES');
  });

  it('rejects a non-numeric limit', () => {
    expect(() => loadConfig({ TELEGRAM_TOKEN: 'test-token', UPLOAD_LIMIT_BYTES: 'lots' })).toThrow(/UPLOAD_LIMIT_BYTES/);
  });
});

describe('toMegabytes', () => {
  it('rounds down to whole mebibytes', () => {
    expect(toMegabytes(50 * 1024 * 1024)).toBe(50);
    expect(toMegabytes(50 * 1024 * 1024 - 1)).toBe(49);
    expect(toMegabytes(1023)).toBe(0);
  });
});
