/**
 * Base error for every failure that ends a delivery request.
 * The message is shown to the user as-is.
 */
export class DeliveryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DeliveryError';
  }
}

/** yt-dlp could not produce a file (network, extraction, format). */
export class DownloadFailure extends DeliveryError {
  constructor(
    message: string,
    public readonly restricted: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, 'DOWNLOAD_FAILED', options);
    this.name = 'DownloadFailure';
  }
}

/** The downloaded file could not be found or read. */
export class AccessFailure extends DeliveryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ACCESS_FAILED', options);
    this.name = 'AccessFailure';
  }
}

/** Telegram rejected an attachment. `part` is set when a split part failed. */
export class UploadFailure extends DeliveryError {
  constructor(
    message: string,
    public readonly part: { index: number; count: number } | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, 'UPLOAD_FAILED', options);
    this.name = 'UploadFailure';
  }
}

export class SplitFailure extends DeliveryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SPLIT_FAILED', options);
    this.name = 'SplitFailure';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
