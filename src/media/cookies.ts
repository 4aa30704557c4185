import * as fs from 'fs';
import * as path from 'path';
import type { Config } from '../config.js';

/**
 * If YTDLP_COOKIES_CONTENT is provided, write it to YTDLP_COOKIES_FILE so
 * yt-dlp can pick it up. Returns true when a cookie file was written.
 */
export function ensureCookiesFile(
  config: Pick<Config, 'YTDLP_COOKIES_CONTENT' | 'YTDLP_COOKIES_FILE'>
): boolean {
  if (!config.YTDLP_COOKIES_CONTENT) {
    console.log('[cookies] No YTDLP_COOKIES_CONTENT provided; proceeding without cookies');
    return false;
  }

  fs.mkdirSync(path.dirname(config.YTDLP_COOKIES_FILE), { recursive: true });
  fs.writeFileSync(config.YTDLP_COOKIES_FILE, config.YTDLP_COOKIES_CONTENT, {
    encoding: 'utf-8',
    mode: 0o600,
  });
  console.log(`[cookies] Wrote cookies to ${config.YTDLP_COOKIES_FILE}`);
  return true;
}
