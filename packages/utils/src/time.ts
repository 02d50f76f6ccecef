/**
 * Time Utilities
 */

/**
 * Wait for a promise to settle, giving up after `ms`.
 * Resolves true if the promise settled in time. The timer is always cleared.
 */
export async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>(resolve => {
    timer = setTimeout(() => resolve(false), ms);
  });

  try {
    return await Promise.race([
      promise.then(() => true, () => true),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) {
    return '--';
  }
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Parse a timecode string (HH:MM:SS.ffffff) to microseconds.
 * Returns null for anything that isn't a timecode.
 */
export function parseTimecodeUs(timecode: string): number | null {
  const match = timecode.trim().match(/^(\d+):(\d{1,2}):(\d{1,2})(?:\.(\d+))?$/);
  if (!match) return null;

  const hours = parseInt(match[1] ?? '0', 10);
  const minutes = parseInt(match[2] ?? '0', 10);
  const seconds = parseInt(match[3] ?? '0', 10);
  const fraction = parseInt((match[4] ?? '').padEnd(6, '0').substring(0, 6), 10);

  return (hours * 3600 + minutes * 60 + seconds) * 1_000_000 + fraction;
}
