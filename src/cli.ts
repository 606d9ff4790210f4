import { stat } from "node:fs/promises";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { loadConfig, ConfigError } from "./config.ts";
import type { RuntimeConfig } from "./config.ts";
import { bootstrap } from "./bootstrap.ts";
import { loadContract } from "./crew/contract.ts";
import { mountDataset, runGoal } from "./runtime/run-goal.ts";
import { AUTOMATION_PROFILES, describePhase } from "./automation/types.ts";
import type { AutomationProfile } from "./automation/types.ts";
import { isOneOf } from "./runtime/validation.ts";
import { errorMessage } from "./types/errors.ts";

// ── Parsed CLI Arguments ───────────────────────────────────────────────────

export interface ParsedArgs {
  goal: string | null;
  datasets: string[];
  contractPath: string | null;
  mount: string | null;
  profile: AutomationProfile | null;
  dryRun: boolean;
  help: boolean;
}

// ── Argument Parser ────────────────────────────────────────────────────────

/**
 * Parse CLI arguments into a structured ParsedArgs object.
 *
 * @param argv Arguments after the script name (e.g. process.argv.slice(2))
 * @throws Error if arguments are invalid
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    goal: null,
    datasets: [],
    contractPath: null,
    mount: null,
    profile: null,
    dryRun: false,
    help: false,
  };

  const valueAfter = (flag: string, i: number, what: string): string => {
    const value = argv[i + 1];
    if (!value || value.startsWith("--")) {
      throw new Error(`${flag} requires ${what}`);
    }
    return value;
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? "";

    if (arg === "--help" || arg === "-h") {
      result.help = true;
      i++;
    } else if (arg === "--dry-run") {
      result.dryRun = true;
      i++;
    } else if (arg === "--dataset") {
      result.datasets.push(valueAfter(arg, i, "a file path"));
      i += 2;
    } else if (arg === "--contract") {
      result.contractPath = valueAfter(arg, i, "a file path");
      i += 2;
    } else if (arg === "--mount") {
      result.mount = valueAfter(arg, i, "a file path");
      i += 2;
    } else if (arg === "--profile") {
      const value = argv[i + 1];
      if (!isOneOf(AUTOMATION_PROFILES, value)) {
        throw new Error(`--profile must be one of: ${AUTOMATION_PROFILES.join(", ")}`);
      }
      result.profile = value;
      i += 2;
    } else if (!arg.startsWith("--")) {
      // Positional argument = goal string
      if (result.goal !== null) {
        throw new Error(`Unexpected argument: ${arg}`);
      }
      result.goal = arg;
      i++;
    } else {
      throw new Error(`Unknown flag: ${arg}`);
    }
  }

  return result;
}

// ── Help Text ──────────────────────────────────────────────────────────────

const HELP_TEXT = `
autoflow-crew: guarded automation and multi-agent analysis runs

Usage:
  npm start -- "goal description" [--dataset PATH]...   Run a crew to completion
  npm start -- --mount PATH                             Mount a dataset and let AutoFlow react

Options:
  --dataset PATH                       Dataset for the crew (repeatable)
  --contract FILE                      Plan contract (.json, .yaml or .yml)
  --profile off|balanced|aggressive    AutoFlow profile for this run (with --mount)
  --dry-run                            Show the contract without running
  --help, -h                           Show this help message

Examples:
  npm start -- "Explain churn drivers" --dataset data/customers.csv
  npm start -- "Quarterly summary" --contract contracts/summary.yaml --dry-run
  npm start -- --mount data/sales.csv --profile balanced
`.trim();

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  // Parse arguments
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(`Error: ${errorMessage(err)}`);
    console.error("Run with --help for usage information.");
    process.exit(1);
    return;
  }

  // Help mode
  if (args.help) {
    console.log(HELP_TEXT);
    process.exit(0);
    return;
  }

  if ((args.goal === null) === (args.mount === null)) {
    console.error("Error: Provide either a goal string or --mount PATH.");
    console.error(HELP_TEXT);
    process.exit(1);
    return;
  }

  // Load config
  let config: RuntimeConfig;
  try {
    config = loadConfig();
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      console.error(`Failed to load config: ${errorMessage(err)}`);
    }
    process.exit(1);
    return;
  }

  // Bootstrap application
  const app = bootstrap(config);

  try {
    // ── Mount Mode ───────────────────────────────────────────────────────
    if (args.mount !== null) {
      const path = resolve(args.mount);
      const { size } = await stat(path);
      await app.start();
      if (args.profile !== null) {
        app.engine.updateProfile(args.profile);
      }

      const phase = await mountDataset(app, path, size);
      console.log(`AutoFlow: ${describePhase(phase)}`);

      await app.shutdown();
      process.exit(phase.kind === "idle" ? 0 : 1);
      return;
    }

    // ── Crew Goal Mode ───────────────────────────────────────────────────
    const goal = args.goal ?? "";
    const contract =
      args.contractPath !== null ? await loadContract(resolve(args.contractPath)) : undefined;
    const datasets = args.datasets.map((d) => resolve(d));

    const outcome = await runGoal(app, goal, { datasets, contract, dryRun: args.dryRun });

    if (outcome.kind === "dry_run") {
      console.log(JSON.stringify(outcome.contract, null, 2));
      await app.shutdown();
      process.exit(0);
      return;
    }

    const { result, guard } = outcome;
    app.logger.info("crew_goal_finished", {
      runId: result.runId,
      status: result.status,
      ticks: result.ticks,
      toolCalls: result.toolCalls,
      tokens: result.tokens,
      durationMs: result.durationMs,
    });

    // Human-readable summary
    console.log("\n=== Crew Result ===");
    console.log(`Run ID:     ${result.runId}`);
    console.log(`Status:     ${result.status}`);
    console.log(`Ticks:      ${result.ticks}`);
    console.log(`Tool calls: ${result.toolCalls}`);
    console.log(`Tokens:     ${result.tokens}`);
    console.log(`Duration:   ${(result.durationMs / 1000).toFixed(1)}s`);
    if (result.gateFailures.length > 0) {
      console.log(`Gates:      ${result.gateFailures.join("; ")}`);
    }
    if (result.missingDeliverables.length > 0) {
      console.log(`Missing:    ${result.missingDeliverables.join(", ")}`);
    }
    if (result.error) {
      console.log(`Error:      ${result.error}`);
    }
    if (guard) {
      const pct = (ratio: number) => `${(ratio * 100).toFixed(1)}%`;
      console.log(
        `Guard:      ${pct(guard.nullPercentage)} nulls, ${pct(guard.duplicateRatio)} duplicates`,
      );
    }

    await app.shutdown();
    process.exit(result.status === "completed" ? 0 : 1);
  } catch (err: unknown) {
    app.logger.error("cli_unhandled_error", {
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    await app.shutdown();
    process.exit(1);
  }
}

// Run only when executed as the entry point (not when imported for testing)
const entry = process.argv[1];
if (entry && pathToFileURL(resolve(entry)).href === import.meta.url) {
  main().catch((err: unknown) => {
    console.error(`Fatal: Failed to start: ${errorMessage(err)}`);
    process.exit(1);
  });
}
