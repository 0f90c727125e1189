/**
 * Run options, their defaults, and environment configuration.
 * Centralizes tuning constants for easier adjustment.
 */

import { ConfigError } from "./errors.js";

/**
 * Word-boundary rule used by the term scanner.
 * - word-chars: runs of letters, digits, `_` and `'`
 * - unicode: Unicode word boundaries (UAX #29) via Intl.Segmenter
 */
export type TokenizerPolicy = "word-chars" | "unicode";

export const TOKENIZER_POLICIES: readonly TokenizerPolicy[] = ["word-chars", "unicode"];

/** Report ordering */
export type ReportOrder = "lexicographic" | "frequency";

export interface WordCountOptions {
  /** Count `Foo` and `foo` separately */
  caseSensitive: boolean;
  order: ReportOrder;
  tokenizer: TokenizerPolicy;
}

export const DEFAULT_OPTIONS: WordCountOptions = {
  caseSensitive: false,
  order: "lexicographic",
  tokenizer: "word-chars",
};

/**
 * File reading thresholds
 */
export const READ_CONFIG = {
  /** Initial capacity of the shared read buffer (bytes) */
  INITIAL_BUFFER_SIZE: 64 * 1024,
} as const;

// ─── Environment ────────────────────────────────────────────────────────────

export interface EnvConfig {
  debug: boolean;
  tokenizer?: TokenizerPolicy;
}

function isTokenizerPolicy(value: string): value is TokenizerPolicy {
  return TOKENIZER_POLICIES.some((policy) => policy === value);
}

/**
 * Read settings from the environment.
 * WORD_FREQ_DEBUG=1 enables debug output; WORD_FREQ_TOKENIZER picks the scanner policy.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const debugValue = env["WORD_FREQ_DEBUG"];
  const debug = debugValue !== undefined && debugValue !== "" && debugValue !== "0";

  const tokenizerValue = env["WORD_FREQ_TOKENIZER"];
  if (tokenizerValue === undefined || tokenizerValue === "") {
    return { debug };
  }
  if (!isTokenizerPolicy(tokenizerValue)) {
    throw new ConfigError(
      `Unknown tokenizer "${tokenizerValue}"`,
      `WORD_FREQ_TOKENIZER must be one of: ${TOKENIZER_POLICIES.join(", ")}`,
    );
  }
  return { debug, tokenizer: tokenizerValue };
}
