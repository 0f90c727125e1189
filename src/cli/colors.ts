/**
 * Terminal color utilities with NO_COLOR support.
 * Diagnostics go to stderr; stdout carries only the report.
 */

const isColorSupported = Boolean(process.stderr.isTTY) && !process.env["NO_COLOR"];

export const c = {
  reset: isColorSupported ? "\x1b[0m" : "",
  bold: isColorSupported ? "\x1b[1m" : "",
  dim: isColorSupported ? "\x1b[2m" : "",
  red: isColorSupported ? "\x1b[31m" : "",
  yellow: isColorSupported ? "\x1b[33m" : "",
} as const;

export type LineWriter = (line: string) => void;

const toStderr: LineWriter = (line) => console.error(line);

export function logError(msg: string, hint?: string, write: LineWriter = toStderr): void {
  write(`${c.red}Error:${c.reset} ${msg}`);
  if (hint) {
    write(`${c.dim}Hint: ${hint}${c.reset}`);
  }
}

export function logWarning(msg: string, write: LineWriter = toStderr): void {
  write(`${c.yellow}Warning:${c.reset} ${msg}`);
}

export function logInfo(msg: string, write: LineWriter = toStderr): void {
  write(`${c.dim}${msg}${c.reset}`);
}
