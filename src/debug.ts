/**
 * Shared debug logging utility.
 * Enable by setting WORD_FREQ_DEBUG=1. Output goes to stderr so it never mixes with the report.
 */

let debugEnabled = false;

export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

/**
 * Create a debug logger with an optional module prefix.
 * @param prefix Optional prefix to identify the module (e.g., "walk")
 */
export function createDebugLogger(prefix?: string): (...args: unknown[]) => void {
  const tag = prefix ? `[DEBUG ${prefix}]` : "[DEBUG]";
  return (...args: unknown[]) => {
    if (debugEnabled) {
      console.error(tag, ...args);
    }
  };
}

/**
 * Format a timestamp as HH:MM:SS.mmm
 */
function formatTimestamp(date: Date): string {
  const h = date.getHours().toString().padStart(2, "0");
  const m = date.getMinutes().toString().padStart(2, "0");
  const s = date.getSeconds().toString().padStart(2, "0");
  const ms = date.getMilliseconds().toString().padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

/**
 * Format duration in milliseconds to a readable string.
 */
function formatDuration(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(0)}µs`;
  if (ms < 1000) return `${ms.toFixed(1)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

export interface Timer {
  time<T>(label: string, fn: () => T): T;
  done(): void;
}

/**
 * Create a scoped timer for measuring pipeline stages.
 * Logs nothing unless debug mode is on.
 */
export function createTimer(prefix?: string): Timer {
  const tag = prefix ? `[DEBUG ${prefix}]` : "[DEBUG]";
  const overallStart = performance.now();

  return {
    time<T>(label: string, fn: () => T): T {
      if (!debugEnabled) {
        return fn();
      }

      const start = performance.now();
      const startTime = new Date();
      try {
        const result = fn();
        console.error(`${tag} ${formatTimestamp(startTime)} ${label}: ${formatDuration(performance.now() - start)}`);
        return result;
      } catch (err) {
        console.error(`${tag} ${formatTimestamp(startTime)} ${label}: FAILED after ${formatDuration(performance.now() - start)}`);
        throw err;
      }
    },

    done(): void {
      if (debugEnabled) {
        const elapsed = performance.now() - overallStart;
        console.error(`${tag} ${formatTimestamp(new Date())} Total: ${formatDuration(elapsed)}`);
      }
    },
  };
}
