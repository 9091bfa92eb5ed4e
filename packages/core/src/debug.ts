/**
 * Trace output for the compile pipeline and the file writer (skipped accounts,
 * per-account unit names, files written and pruned). Silent unless
 * MAILSYNC_UNITS_DEBUG is set, so `check` and `print` output can be piped.
 */
const enabled = () => !!process.env.MAILSYNC_UNITS_DEBUG;

export function debug(tag: string, message: string): void {
  if (enabled()) console.log(`[${tag}] ${message}`);
}

export function debugWarn(tag: string, message: string): void {
  if (enabled()) console.warn(`[${tag}] ${message}`);
}
