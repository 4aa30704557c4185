let verbose = false;

export function setVerboseLogging(enabled: boolean): void {
  verbose = enabled;
}

/** Conditional debug logging - only logs when LOG_VERBOSE is enabled */
export function debugLog(message: string): void {
  if (verbose) {
    console.log(message);
  }
}
