// pattern: Functional Core
import { parseArgs } from "node:util";
import type { RunOptions } from "./run";

export const USAGE = `Usage: newsletter-digest [-v|--verbose] [--config FILE] <command>

Commands:
  setup                    Authorize Gmail access and save the OAuth token
  run                      Fetch, triage and summarize newsletters, then send the briefing

Run options:
  --dry-run                Print the briefing instead of sending it; change no state
  --lookback-days N        Search the last N days instead of since the last run
  --output FILE            Write the briefing as Markdown to FILE and HTML beside it (implies --dry-run)
  --dump-emails FILE       Write the fetched email list to FILE
  --dump-triage FILE       Write the triage decisions to FILE

Global options:
  -v, --verbose            Debug logging
  --config FILE            Configuration file (default ./config.yaml)
  -h, --help               Show this help`;

export type GlobalOptions = {
  readonly verbose: boolean;
  readonly configPath: string | null;
};

export type CliCommand =
  | { readonly name: "setup" }
  | { readonly name: "run"; readonly options: RunOptions };

export type CliInvocation =
  | { readonly kind: "help" }
  | { readonly kind: "usage-error"; readonly message: string }
  | {
      readonly kind: "command";
      readonly global: GlobalOptions;
      readonly command: CliCommand;
    };

const RUN_ONLY_FLAGS = [
  "dry-run",
  "lookback-days",
  "output",
  "dump-emails",
  "dump-triage",
] as const;

function parsePositiveInteger(value: string): number | null {
  if (!/^\d+$/.test(value)) return null;
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : null;
}

/**
 * Parses process arguments (without the node and script entries).
 */
export function parseCli(argv: ReadonlyArray<string>): CliInvocation {
  let parsed;
  try {
    parsed = parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        verbose: { type: "boolean", short: "v", default: false },
        config: { type: "string" },
        help: { type: "boolean", short: "h", default: false },
        "dry-run": { type: "boolean", default: false },
        "lookback-days": { type: "string" },
        output: { type: "string" },
        "dump-emails": { type: "string" },
        "dump-triage": { type: "string" },
      },
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { kind: "usage-error", message };
  }

  const { values, positionals } = parsed;
  if (values.help) return { kind: "help" };

  const [commandName, ...extra] = positionals;
  if (commandName === undefined) {
    return { kind: "usage-error", message: "missing command" };
  }
  if (extra.length > 0) {
    return { kind: "usage-error", message: `unexpected argument: ${extra.join(" ")}` };
  }

  const global: GlobalOptions = {
    verbose: values.verbose,
    configPath: values.config ?? null,
  };

  if (commandName === "setup") {
    const stray = RUN_ONLY_FLAGS.find(
      (flag) => values[flag] !== undefined && values[flag] !== false,
    );
    if (stray) {
      return { kind: "usage-error", message: `--${stray} is only valid for run` };
    }
    return { kind: "command", global, command: { name: "setup" } };
  }

  if (commandName !== "run") {
    return { kind: "usage-error", message: `unknown command: ${commandName}` };
  }

  let lookbackDays: number | null = null;
  const rawLookback = values["lookback-days"];
  if (rawLookback !== undefined) {
    lookbackDays = parsePositiveInteger(rawLookback);
    if (lookbackDays === null) {
      return {
        kind: "usage-error",
        message: `--lookback-days must be a positive integer, got "${rawLookback}"`,
      };
    }
  }

  return {
    kind: "command",
    global,
    command: {
      name: "run",
      options: {
        dryRun: values["dry-run"],
        lookbackDays,
        outputPath: values.output ?? null,
        dumpEmailsPath: values["dump-emails"] ?? null,
        dumpTriagePath: values["dump-triage"] ?? null,
      },
    },
  };
}
