/**
 * Command-line interface built on commander.js.
 * `runCli` parses arguments, runs the count, and returns the exit code.
 */

import { Command, CommanderError } from "commander";
import { DEFAULT_OPTIONS, loadEnvConfig, type WordCountOptions } from "../config.js";
import { ConfigError, NotADirectoryError } from "../errors.js";
import { countWords } from "../core/run.js";
import { setDebugEnabled } from "../debug.js";
import { logError, logInfo, logWarning, type LineWriter } from "./colors.js";
import { writeReport } from "./output.js";
import { formatSummary } from "./stats.js";

export interface CliIO {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

const processIO: CliIO = {
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
};

interface CliFlags {
  printByFrequency?: boolean;
  caseSensitive?: boolean;
}

// ─── Command Setup ───────────────────────────────────────────────────────────

export function buildProgram(io: CliIO): Command {
  return new Command()
    .name("word-freq")
    .description("Count the distinct words in every file under a directory")
    .argument("[dir]", "Directory to scan", ".")
    .option("--print-by-frequency", "Sort by count (highest first) instead of alphabetically")
    .option("--case-sensitive", "Count differently-cased spellings separately")
    .helpOption("-h, --help", "Show this help")
    .addHelpText(
      "after",
      `
Environment
  WORD_FREQ_TOKENIZER   word-chars (default) or unicode
  WORD_FREQ_DEBUG       set to 1 for timing and a run summary on stderr
  NO_COLOR              disable colored diagnostics

Examples
  # Count words under the current directory
  word-freq

  # Most frequent words first, keeping case distinctions
  word-freq --print-by-frequency --case-sensitive src/
`,
    )
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.writeOut(text),
      writeErr: (text) => io.writeErr(text),
    });
}

// ─── Main ────────────────────────────────────────────────────────────────────

export function runCli(
  argv: string[],
  io: CliIO = processIO,
  env: NodeJS.ProcessEnv = process.env,
): number {
  const program = buildProgram(io);
  try {
    program.parse(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const flags = program.opts<CliFlags>();
  const root = program.args[0] ?? ".";
  const errLine: LineWriter = (line) => io.writeErr(`${line}\n`);

  try {
    const envConfig = loadEnvConfig(env);
    setDebugEnabled(envConfig.debug);

    const options: WordCountOptions = {
      caseSensitive: Boolean(flags.caseSensitive),
      order: flags.printByFrequency ? "frequency" : "lexicographic",
      tokenizer: envConfig.tokenizer ?? DEFAULT_OPTIONS.tokenizer,
    };

    const { rows, summary } = countWords({
      ...options,
      root,
      onWarning: (warning) => logWarning(warning.message, errLine),
    });

    writeReport(rows, (text) => io.writeOut(text));
    if (envConfig.debug) {
      logInfo(formatSummary(summary), errLine);
    }
    return 0;
  } catch (err) {
    if (err instanceof ConfigError) {
      logError(err.message, err.hint, errLine);
      return 1;
    }
    if (err instanceof NotADirectoryError) {
      logError(err.message, "Pass a directory to scan", errLine);
      return 1;
    }
    throw err;
  }
}
