import { execFile } from 'child_process';
import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as path from 'path';
import type { Config } from '../config.js';
import { debugLog } from '../utils/debug-log.js';
import { DownloadFailure, getErrorMessage } from '../utils/errors.js';

// ── Types ──────────────────────────────────────────────────────────

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  cmd: string,
  args: string[],
  timeoutMs: number
) => Promise<CommandResult>;

/** Resolves a URL to a media file inside `outputDir`. */
export interface Fetcher {
  fetch(url: string, outputDir: string): Promise<string>;
}

export interface YtDlpOptions {
  binary: string;
  maxHeight: number;
  retries: number;
  timeoutMs: number;
  cookiesFile: string;
}

// ── Restriction Detection ──────────────────────────────────────────

// Failures a cookies.txt from a logged-in browser usually fixes
const RESTRICTION_PATTERNS = [
  /age-restricted/i,
  /login/i,
  /private/i,
];

export function isRestrictionError(errorMsg: string): boolean {
  return RESTRICTION_PATTERNS.some(p => p.test(errorMsg));
}

// ── Shell Helpers ──────────────────────────────────────────────────

/** Fields of execFile's error that describe how the process ended. */
export interface ExecFailure {
  code?: string | number | null;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
}

/**
 * Failure text for a finished command: its stderr when there is any,
 * otherwise how it ended. execFile's own message carries the full argv
 * (URL, cookie path), so it is never used here.
 */
export function describeCommandFailure(cmd: string, error: ExecFailure, stderr: string): string {
  const name = path.basename(cmd);
  const detail = stderr.trim();
  if (detail) return `${name} failed: ${detail}`;
  if (error.killed || error.signal) return `${name} failed: terminated by ${error.signal ?? 'SIGTERM'}`;
  if (typeof error.code === 'number') return `${name} failed: exited with code ${error.code}`;
  if (typeof error.code === 'string') return `${name} failed: could not start (${error.code})`;
  return `${name} failed`;
}

export function runCommand(
  cmd: string,
  args: string[],
  timeoutMs: number
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    execFile(cmd, args, { timeout: timeoutMs, maxBuffer: 10 * 1024 * 1024 }, (error, stdout, stderr) => {
      if (error) {
        reject(new Error(describeCommandFailure(cmd, error, stderr || '')));
        return;
      }
      resolve({ stdout: stdout || '', stderr: stderr || '' });
    });
  });
}

// ── yt-dlp ─────────────────────────────────────────────────────────

export function ytDlpOptionsFromConfig(config: Config): YtDlpOptions {
  return {
    binary: config.YTDLP_PATH,
    maxHeight: config.YTDLP_MAX_HEIGHT,
    retries: config.YTDLP_RETRIES,
    timeoutMs: config.YTDLP_TIMEOUT_MS,
    cookiesFile: config.YTDLP_COOKIES_FILE,
  };
}

export function formatSelector(maxHeight: number): string {
  const h = `[height<=${maxHeight}]`;
  return `bestvideo${h}+bestaudio/best${h}/best${h}/best`;
}

export class YtDlpFetcher implements Fetcher {
  constructor(
    private readonly options: YtDlpOptions,
    private readonly run: CommandRunner = runCommand
  ) {}

  buildArgs(url: string, outputDir: string): string[] {
    const args = [
      '-f', formatSelector(this.options.maxHeight),
      '-o', path.join(outputDir, '%(id)s.%(ext)s'),
      '--no-playlist',
      '--no-warnings',
      '--merge-output-format', 'mp4',
      '--geo-bypass',
      '--retries', String(this.options.retries),
      '--skip-unavailable-fragments',
      '--no-simulate',
      '--print', 'after_move:%(id)s',
      '--print', 'after_move:filepath',
    ];

    if (this.options.cookiesFile && fs.existsSync(this.options.cookiesFile)) {
      args.push('--cookies', this.options.cookiesFile);
      debugLog(`[fetcher] Using cookiefile: ${this.options.cookiesFile}`);
    }

    // `--` keeps a URL starting with a dash from being read as an option
    args.push('--', url);
    return args;
  }

  async fetch(url: string, outputDir: string): Promise<string> {
    let stdout: string;
    try {
      ({ stdout } = await this.run(this.options.binary, this.buildArgs(url, outputDir), this.options.timeoutMs));
    } catch (error) {
      const msg = getErrorMessage(error);
      throw new DownloadFailure(msg, isRestrictionError(msg), { cause: error });
    }

    const filePath = await resolveOutputPath(stdout, outputDir);
    if (!filePath) {
      throw new DownloadFailure('Download completed but output file not found', false);
    }
    return filePath;
  }
}

/**
 * Find the file yt-dlp wrote. The printed path is tried first, then the same
 * name with a merged `.mp4` extension, then any non-empty `<id>.*` file.
 */
export async function resolveOutputPath(stdout: string, outputDir: string): Promise<string | null> {
  const lines = stdout.split('\n').map(line => line.trim()).filter(Boolean);
  const videoId = lines.length >= 2 ? lines[lines.length - 2] : null;
  const printed = lines.length >= 1 ? lines[lines.length - 1] : null;

  if (printed) {
    if (await isFile(printed)) return printed;

    const base = printed.slice(0, printed.length - path.extname(printed).length);
    const mp4 = `${base}.mp4`;
    if (await isFile(mp4)) return mp4;
  }

  if (videoId) {
    const entries = await fsp.readdir(outputDir).catch((): string[] => []);
    for (const name of entries.sort()) {
      if (!name.startsWith(`${videoId}.`)) continue;
      const candidate = path.join(outputDir, name);
      const stat = await fsp.stat(candidate).catch(() => null);
      if (stat?.isFile() && stat.size > 0) return candidate;
    }
  }

  return null;
}

async function isFile(filePath: string): Promise<boolean> {
  const stat = await fsp.stat(filePath).catch(() => null);
  return stat?.isFile() ?? false;
}
