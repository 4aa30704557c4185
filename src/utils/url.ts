const URL_RE = /(https?:\/\/\S+)/;

/** First http(s) URL in free text; the match runs up to the next whitespace. */
export function extractFirstUrl(text: string): string | null {
  const match = URL_RE.exec(text);
  return match ? match[1] : null;
}

/**
 * Validate URL protocol. Only http/https reach yt-dlp, so `file://` and
 * extractor shortcuts like `ytsearch:` are refused.
 */
export function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

// `scheme:` at the start of a token, e.g. `https:`, `file:`, `ytsearch:`
const SCHEME_RE = /^[a-z][a-z0-9+.-]*:/i;

/** Prefix `https://` to a bare `host/path` token; tokens with a scheme pass through as-is. */
export function ensureUrl(token: string): string {
  return SCHEME_RE.test(token) ? token : `https://${token}`;
}

/**
 * URL argument of a `/command <URL>` message, or null when missing or invalid.
 * Only the first whitespace-separated token counts. A bare `youtu.be/abc`
 * becomes `https://youtu.be/abc`; any scheme other than http(s) is refused.
 */
export function parseCommandUrl(args: string): string | null {
  const token = args.trim().split(/\s+/)[0];
  if (!token) return null;

  const url = ensureUrl(token);
  if (!isHttpUrl(url)) return null;
  // A bare word like `cats` is not a host
  return new URL(url).hostname.includes('.') ? url : null;
}
