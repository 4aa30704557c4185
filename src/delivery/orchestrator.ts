import * as fsp from 'fs/promises';
import * as path from 'path';
import { toMegabytes, type Config } from '../config.js';
import { removeDir, removeFiles } from '../media/cleanup.js';
import { isRestrictionError, type Fetcher } from '../media/fetcher.js';
import { splitFile, type FilePart, type Segmenter } from '../media/segmenter.js';
import type { ReplySink } from '../telegram/reply-sink.js';
import { debugLog } from '../utils/debug-log.js';
import {
  AccessFailure,
  ConfigurationError,
  DeliveryError,
  DownloadFailure,
  SplitFailure,
  UploadFailure,
  getErrorMessage,
} from '../utils/errors.js';

// ── Types ──────────────────────────────────────────────────────────

export type DeliveryState =
  | 'queued'
  | 'downloading'
  | 'size_check'
  | 'direct_send'
  | 'splitting'
  | 'part_upload'
  | 'cleanup'
  | 'done'
  | 'failed';

export type DeliveryMode = 'direct' | 'split';

export interface DeliveryRequest {
  url: string;
  sink: ReplySink;
}

export interface DeliveryOutcome {
  state: 'done' | 'failed';
  mode: DeliveryMode | null;
  /** Attachments uploaded successfully */
  uploaded: number;
  error?: DeliveryError;
}

export interface DeliverySettings {
  scratchDir: string;
  uploadLimitBytes: number;
  partSizeBytes: number;
}

export interface DeliveryDeps {
  settings: DeliverySettings;
  fetcher: Fetcher;
  splitFile?: Segmenter;
  onStateChange?: (state: DeliveryState, url: string) => void;
}

interface SendResult {
  mode: DeliveryMode | null;
  uploaded: number;
  error?: DeliveryError;
}

// ── Messages ───────────────────────────────────────────────────────

export const COOKIES_HINT =
  '\n\nHint: This video may require login/cookies. ' +
  'Set YTDLP_COOKIES_CONTENT (exported cookies.txt content) in env and restart.';

export function failureText(error: DeliveryError): string {
  if (error instanceof DownloadFailure) {
    return `\u{274C} Download failed: ${error.message}${error.restricted ? COOKIES_HINT : ''}`;
  }
  if (error instanceof AccessFailure) {
    return `\u{274C} Downloaded but failed to access file: ${error.message}`;
  }
  if (error instanceof SplitFailure) {
    return `\u{274C} Failed to split file: ${error.message}`;
  }
  if (error instanceof UploadFailure && error.part) {
    return `\u{274C} Failed to upload part ${error.part.index}/${error.part.count}: ${error.message}`;
  }
  if (error instanceof UploadFailure) {
    return `\u{274C} Upload failed: ${error.message}`;
  }
  return `\u{274C} ${error.message}`;
}

function successText(mode: DeliveryMode, uploaded: number): string {
  return mode === 'direct'
    ? '\u{2705} Done \u{2014} file sent.'
    : `\u{2705} Done \u{2014} big file sent in ${uploaded} parts.`;
}

export function deliverySettingsFromConfig(config: Config): DeliverySettings {
  return {
    scratchDir: config.SCRATCH_DIR,
    uploadLimitBytes: config.UPLOAD_LIMIT_BYTES,
    partSizeBytes: config.PART_SIZE_BYTES,
  };
}

// ── Orchestrator ───────────────────────────────────────────────────

/**
 * Drives one request through download, size check, whole or split upload
 * and cleanup. Requests share nothing but the scratch directory: each one
 * downloads into its own work dir, so two requests for the same URL never
 * write to the same path.
 */
export class DeliveryOrchestrator {
  private readonly settings: DeliverySettings;
  private readonly fetcher: Fetcher;
  private readonly split: Segmenter;
  private readonly onStateChange?: (state: DeliveryState, url: string) => void;

  constructor(deps: DeliveryDeps) {
    if (deps.settings.partSizeBytes >= deps.settings.uploadLimitBytes) {
      throw new ConfigurationError('Part size must be smaller than the upload limit');
    }
    this.settings = deps.settings;
    this.fetcher = deps.fetcher;
    this.split = deps.splitFile ?? splitFile;
    this.onStateChange = deps.onStateChange;
  }

  async deliver(request: DeliveryRequest): Promise<DeliveryOutcome> {
    const { url, sink } = request;

    this.transition('queued', url);
    await this.notify(sink, `Queued: ${url}\nStarting download...`, true);

    this.transition('downloading', url);
    let workDir: string;
    try {
      workDir = await fsp.mkdtemp(path.join(this.settings.scratchDir, 'clipcourier-'));
    } catch (error) {
      return this.downloadFailed(sink, url, error);
    }

    let filePath: string;
    try {
      filePath = await this.fetcher.fetch(url, workDir);
    } catch (error) {
      // yt-dlp may leave fragments behind even when it fails
      await removeDir(workDir);
      return this.downloadFailed(sink, url, error);
    }

    console.log(`[delivery] Downloaded ${url} -> ${filePath}`);
    const produced: string[] = [filePath];
    const result = await this.send(filePath, sink, url, produced);

    this.transition('cleanup', url);
    const report = await removeFiles(produced);
    await removeDir(workDir);
    debugLog(`[delivery] Cleanup removed ${report.removed.length} file(s), ${report.failed.length} failure(s)`);

    return this.finish(sink, url, result);
  }

  private async send(
    filePath: string,
    sink: ReplySink,
    url: string,
    produced: string[]
  ): Promise<SendResult> {
    this.transition('size_check', url);
    let size: number;
    try {
      size = (await fsp.stat(filePath)).size;
    } catch (error) {
      console.error(`[delivery] Could not get file size of ${filePath}:`, error);
      return { mode: null, uploaded: 0, error: new AccessFailure(getErrorMessage(error), { cause: error }) };
    }

    const fileName = path.basename(filePath);

    if (size <= this.settings.uploadLimitBytes) {
      this.transition('direct_send', url);
      await this.notify(sink, `Uploading ${fileName} (${toMegabytes(size)} MB)...`);
      try {
        await sink.sendFile(filePath, fileName);
      } catch (error) {
        console.error(`[delivery] Upload failed for ${fileName}:`, error);
        return { mode: 'direct', uploaded: 0, error: new UploadFailure(getErrorMessage(error), null, { cause: error }) };
      }
      return { mode: 'direct', uploaded: 1 };
    }

    this.transition('splitting', url);
    await this.notify(
      sink,
      `File is ${toMegabytes(size)} MB (>${toMegabytes(this.settings.uploadLimitBytes)} MB). Splitting into parts...`
    );

    let parts: FilePart[];
    try {
      parts = await this.split(filePath, this.settings.partSizeBytes);
    } catch (error) {
      console.error(`[delivery] Splitting ${fileName} failed:`, error);
      const failure = error instanceof SplitFailure
        ? error
        : new SplitFailure(getErrorMessage(error), { cause: error });
      return { mode: 'split', uploaded: 0, error: failure };
    }
    produced.push(...parts.map(part => part.path));
    console.log(`[delivery] Split ${fileName} (${size} bytes) into ${parts.length} parts`);

    this.transition('part_upload', url);
    let uploaded = 0;
    for (const part of parts) {
      const partName = path.basename(part.path);
      try {
        await sink.sendFile(part.path, partName);
      } catch (error) {
        console.error(`[delivery] Upload failed for ${partName}:`, error);
        const failure = new UploadFailure(
          getErrorMessage(error),
          { index: part.index, count: parts.length },
          { cause: error }
        );
        return { mode: 'split', uploaded, error: failure };
      }
      uploaded++;
      // Free disk as we go; the final cleanup pass covers the rest
      await removeFiles([part.path]);
    }

    return { mode: 'split', uploaded };
  }

  private downloadFailed(sink: ReplySink, url: string, error: unknown): Promise<DeliveryOutcome> {
    const failure = error instanceof DownloadFailure ? error : toDownloadFailure(error);
    console.error(`[delivery] Download failed for ${url}: ${failure.message}`);
    return this.finish(sink, url, { mode: null, uploaded: 0, error: failure });
  }

  private async finish(sink: ReplySink, url: string, result: SendResult): Promise<DeliveryOutcome> {
    if (result.error) {
      await this.notify(sink, failureText(result.error));
      this.transition('failed', url);
      return { state: 'failed', mode: result.mode, uploaded: result.uploaded, error: result.error };
    }

    await this.notify(sink, successText(result.mode ?? 'direct', result.uploaded));
    this.transition('done', url);
    return { state: 'done', mode: result.mode, uploaded: result.uploaded };
  }

  private transition(state: DeliveryState, url: string): void {
    debugLog(`[delivery] ${url}: ${state}`);
    this.onStateChange?.(state, url);
  }

  /** Status messages are informational; a rejected edit never fails the request. */
  private async notify(sink: ReplySink, text: string, initial = false): Promise<void> {
    try {
      if (initial) {
        await sink.begin(text);
      } else {
        await sink.update(text);
      }
    } catch (e) {
      console.warn(`[delivery] Failed to update status message: ${getErrorMessage(e)}`);
    }
  }
}

function toDownloadFailure(error: unknown): DownloadFailure {
  const msg = getErrorMessage(error);
  return new DownloadFailure(msg, isRestrictionError(msg), { cause: error });
}
