import * as fsp from 'fs/promises';
import { getErrorMessage } from '../utils/errors.js';

export interface CleanupFailure {
  path: string;
  error: string;
}

export interface CleanupReport {
  removed: string[];
  failed: CleanupFailure[];
}

/**
 * Best-effort deletion. A path that is already gone counts as removed;
 * anything else is logged and reported, never thrown.
 */
export async function removeFiles(paths: readonly string[]): Promise<CleanupReport> {
  const report: CleanupReport = { removed: [], failed: [] };

  for (const filePath of paths) {
    try {
      await fsp.rm(filePath, { force: true });
      report.removed.push(filePath);
    } catch (error) {
      const message = getErrorMessage(error);
      console.warn(`[cleanup] Failed to remove ${filePath}: ${message}`);
      report.failed.push({ path: filePath, error: message });
    }
  }

  return report;
}

/** Remove a request's work directory and anything left inside it. */
export async function removeDir(dir: string): Promise<boolean> {
  try {
    await fsp.rm(dir, { recursive: true, force: true });
    return true;
  } catch (error) {
    console.warn(`[cleanup] Failed to remove directory ${dir}: ${getErrorMessage(error)}`);
    return false;
  }
}
