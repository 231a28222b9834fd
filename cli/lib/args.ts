/**
 * Command-line argument parsing.
 */

import { parseArgs } from "node:util";

import { DEFAULT_OUTPUT_PATH } from "../../lib/encode/index.js";

export const USAGE = `Usage: anomaly-spiral <text-file> [options]

Options:
  -a, --anomaly <pct>   anomaly position, 0-100 (prompted for when omitted)
  -o, --out <path>      output file, .svg or .json (default: ${DEFAULT_OUTPUT_PATH})
  -c, --config <path>   YAML config file
  -h, --help            show this help`;

export interface CliOptions {
  textPath: string;
  /** Raw --anomaly value; null means ask interactively. */
  anomalyRaw: string | null;
  outputPath: string;
  configPath: string | undefined;
}

export type ParsedArgs =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "error"; message: string };

export function parseCliArgs(argv: string[]): ParsedArgs {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: {
        anomaly: { type: "string", short: "a" },
        out: { type: "string", short: "o" },
        config: { type: "string", short: "c" },
        help: { type: "boolean", short: "h" },
      },
      allowPositionals: true,
      strict: true,
    });

    if (values.help) return { kind: "help" };

    if (positionals.length === 0) {
      return { kind: "error", message: "Missing text file argument" };
    }
    if (positionals.length > 1) {
      return { kind: "error", message: `Unexpected arguments: ${positionals.slice(1).join(" ")}` };
    }

    return {
      kind: "run",
      options: {
        textPath: positionals[0],
        anomalyRaw: values.anomaly ?? null,
        outputPath: values.out ?? DEFAULT_OUTPUT_PATH,
        configPath: values.config,
      },
    };
  } catch (err) {
    // parseArgs rejects unknown options and missing option values.
    return { kind: "error", message: (err as Error).message };
  }
}
