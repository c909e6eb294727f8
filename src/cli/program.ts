/**
 * driftwatch — CLI Commands
 *
 * `evaluate` / `remediate` run one forced pipeline pass and exit with
 * 0 (compliant), 1 (non-compliant) or 2 (error). `watch` runs the control
 * loop over triggers read from stdin; `status` and `audit` inspect what the
 * loop left behind.
 */

import { createInterface } from "node:readline";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { expandHome, loadConfig, type DriftwatchConfig } from "../config.js";
import { createEngine, type Engine, type EngineOptions } from "../engine.js";
import { TriggerParseError, describeError } from "../errors.js";
import { createLogger, type LoggerOptions } from "../logger.js";
import { TriggerQueue } from "../router/queue.js";
import { summarizeRun, type ResourceRunResult } from "../router/router.js";
import { readStatusFile } from "../status-store.js";
import { parseTriggerLine } from "../triggers/parse.js";
import { resourceKey, type AuditRecord, type RunMode } from "../types.js";

export const EXIT_COMPLIANT = 0;
export const EXIT_NON_COMPLIANT = 1;
export const EXIT_ERROR = 2;

const RUN_MODES: RunMode[] = ["evaluate", "auto", "remediate"];

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value.trim()) || Number.parseInt(value, 10) < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return Number.parseInt(value, 10);
}

const limitOption = (description: string, fallback: number) =>
  new Option("-n, --limit <n>", description).argParser(parsePositiveInt).default(fallback);

export type CliIO = {
  out: Pick<Console, "log" | "warn" | "error">;
  stdin: NodeJS.ReadableStream;
  env: NodeJS.ProcessEnv;
  /** Engine overrides (providers, stores) for embedding and tests. */
  engine?: EngineOptions;
  now?: () => number;
};

type GlobalOptions = { config?: string; verbose?: boolean };

export function exitCodeFor(result: ResourceRunResult): number {
  if (result.error) return EXIT_ERROR;
  return summarizeRun(result) === "NON_COMPLIANT" ? EXIT_NON_COMPLIANT : EXIT_COMPLIANT;
}

export function formatRunResult(result: ResourceRunResult): string[] {
  const { ref } = result;
  const lines = [`${ref.resourceType}/${ref.resourceId} (${result.key})`];
  for (const verdict of result.verdicts) {
    lines.push(`  ${verdict.compliance.padEnd(14)} ${verdict.ruleName}: ${verdict.reason}`);
    const outcome = result.outcomes.find((o) => o.ruleName === verdict.ruleName);
    if (outcome) {
      const escalated = outcome.escalated ? " [escalated]" : "";
      lines.push(`    remediation ${outcome.actionName}: ${outcome.status}${escalated} (${outcome.reason})`);
    }
  }
  if (result.verdicts.length === 0 && !result.error) lines.push("  no rules apply to this resource");
  lines.push(`Result: ${summarizeRun(result)}`);
  return lines;
}

export function formatAuditRecord(record: AuditRecord): string {
  const head = `${record.recordedAt.slice(0, 19)} | ${record.resource.resourceType}/${record.resource.resourceId}`;
  if (record.kind === "failure") {
    return `${head} | FAILURE ${record.error.name}: ${record.error.message}`;
  }
  const remediation = record.remediation ? ` | ${record.remediation.actionName} ${record.remediation.status}` : "";
  return `${head} | ${record.verdict.compliance} ${record.verdict.ruleName}${remediation}`;
}

export function buildProgram(io: CliIO, onExit: (code: number) => void): Command {
  const now = io.now ?? Date.now;
  const program = new Command();
  // Set before any subcommand is added so they inherit both
  program.exitOverride();
  program.configureOutput({
    writeOut: (str) => io.out.log(str.trimEnd()),
    writeErr: (str) => io.out.error(str.trimEnd()),
  });
  program
    .name("driftwatch")
    .description("Continuous compliance evaluation and auto-remediation for cloud resources")
    .option("-c, --config <path>", "Config file (default: ~/.driftwatch/config.json)")
    .option("-v, --verbose", "Log debug output");

  const configFor = (): { config: DriftwatchConfig; log: LoggerOptions } => {
    const global = program.opts<GlobalOptions>();
    const loaded = loadConfig(global.config, io.env);
    const config = global.verbose ? { ...loaded, verbose: true } : loaded;
    return { config, log: { verbose: config.verbose, sink: io.out } };
  };

  const withEngine = async (fn: (engine: Engine, log: LoggerOptions) => Promise<void>): Promise<void> => {
    const { config, log } = configFor();
    const engine = await createEngine(config, { log: io.out, ...io.engine });
    engine.start();
    try {
      await fn(engine, log);
    } finally {
      await engine.stop();
    }
  };

  const runCommand = (mode: RunMode) => async (resource: string, opts: { json?: boolean }) => {
    await withEngine(async (engine) => {
      const result = await engine.runOnce(resource, mode);
      if (opts.json) {
        io.out.log(JSON.stringify(result, null, 2));
      } else {
        for (const line of formatRunResult(result)) io.out.log(line);
      }
      if (result.error) io.out.error(`${result.error.name}: ${result.error.message}`);
      onExit(exitCodeFor(result));
    });
  };

  // ── evaluate ─────────────────────────────────────────────────
  program
    .command("evaluate")
    .description("Evaluate one resource against every applicable rule (no remediation)")
    .argument("<resource-id>", "<ResourceType>/<id> or a bare id such as sg-0123")
    .option("--json", "Output the run result as JSON")
    .action(runCommand("evaluate"));

  // ── remediate ────────────────────────────────────────────────
  program
    .command("remediate")
    .description("Evaluate one resource and run the bound remediation for each violation")
    .argument("<resource-id>", "<ResourceType>/<id> or a bare id such as sg-0123")
    .option("--json", "Output the run result as JSON")
    .action(runCommand("remediate"));

  // ── status ───────────────────────────────────────────────────
  program
    .command("status")
    .description("Show the last known pipeline state of every tracked resource")
    .option("--json", "Output as JSON")
    .action(async (opts: { json?: boolean }) => {
      const { config, log } = configFor();
      const statuses = readStatusFile(expandHome(config.status.path), createLogger("status", log));
      if (opts.json) {
        io.out.log(JSON.stringify(statuses, null, 2));
        return;
      }
      if (statuses.length === 0) {
        io.out.log("No resources tracked.");
        return;
      }
      for (const s of statuses) {
        io.out.log(`${s.key} ${s.state} ${s.pending ? "pending" : "-"} ${s.lastResult ?? "-"}`);
      }
    });

  // ── watch ────────────────────────────────────────────────────
  program
    .command("watch")
    .description("Run the control loop on newline-delimited triggers from stdin")
    .addOption(new Option("--mode <mode>", "Default run mode for triggers").choices(RUN_MODES).default("auto"))
    .option("--initial-sweep", "Sweep every monitored resource type before reading triggers")
    .action(async (opts: { mode: RunMode; initialSweep?: boolean }) => {
      await withEngine(async (engine, log) => {
        const logger = createLogger("watch", log);
        const queue = new TriggerQueue();
        const consuming = engine.router.consume(queue);
        engine.scheduleSweeps(queue);
        if (opts.initialSweep) {
          queue.push({ kind: "PeriodicSweep", resourceTypeFilter: [...engine.config.sweep.resourceTypes] }, opts.mode);
        }

        const lines = createInterface({ input: io.stdin, crlfDelay: Infinity });
        const shutdown = (signal: NodeJS.Signals) => {
          logger.info(`${signal} received, finishing in-flight work`);
          lines.close();
        };
        process.once("SIGINT", shutdown);
        process.once("SIGTERM", shutdown);

        let malformed = 0;
        try {
          for await (const line of lines) {
            try {
              const queued = parseTriggerLine(line, opts.mode);
              if (queued) queue.push(queued.trigger, queued.mode);
            } catch (err) {
              if (!(err instanceof TriggerParseError)) throw err;
              malformed++;
              logger.warn(`Dropping trigger: ${err.message}`);
            }
          }
        } finally {
          process.off("SIGINT", shutdown);
          process.off("SIGTERM", shutdown);
          queue.close();
          await consuming;
        }
        logger.info(`Processed ${queue.totalReceived} trigger(s); dropped ${malformed} malformed`);
      });
    });

  // ── audit ────────────────────────────────────────────────────
  const audit = program.command("audit").description("Query the audit trail");

  audit
    .command("list")
    .description("List recent audit records, newest first")
    .option("--since <date>", "Start date (ISO-8601 or relative like '24h', '7d')")
    .option("--rule <name>", "Filter by rule name")
    .option("--type <resourceType>", "Filter by resource type")
    .option("--escalated", "Only records with an escalated remediation")
    .addOption(limitOption("Max results", 25))
    .action(async (opts: { since?: string; rule?: string; type?: string; escalated?: boolean; limit: number }) => {
      await withEngine(async (engine) => {
        const records = await engine.sink.query({
          ...(opts.since ? { startDate: resolveRelativeDate(opts.since, now()) } : {}),
          ...(opts.rule ? { ruleName: opts.rule } : {}),
          ...(opts.type ? { resourceTypes: [opts.type] } : {}),
          escalatedOnly: Boolean(opts.escalated),
          limit: opts.limit,
        });
        if (records.length === 0) {
          io.out.log("No audit records found.");
          return;
        }
        for (const record of records) io.out.log(formatAuditRecord(record));
      });
    });

  audit
    .command("history")
    .description("Show the audit timeline of one resource, oldest first")
    .argument("<resource-id>", "<ResourceType>/<id> or a bare id")
    .addOption(limitOption("Max records", 50))
    .action(async (resource: string, opts: { limit: number }) => {
      await withEngine(async (engine) => {
        const key = resourceKey(engine.resolve(resource));
        const timeline = await engine.sink.getTimeline(key, opts.limit);
        if (timeline.records.length === 0) {
          io.out.log(`No audit records for ${key}.`);
          return;
        }
        io.out.log(`${key}: ${timeline.records.length} record(s) from ${timeline.firstSeen} to ${timeline.lastSeen}`);
        for (const record of timeline.records) io.out.log(formatAuditRecord(record));
      });
    });

  audit
    .command("summary")
    .description("Summarize audit activity")
    .option("--since <date>", "Start date (ISO-8601 or relative)", "24h")
    .option("--until <date>", "End date (ISO-8601)")
    .action(async (opts: { since: string; until?: string }) => {
      await withEngine(async (engine) => {
        const endDate = opts.until ?? new Date(now()).toISOString();
        const summary = await engine.sink.getSummary(resolveRelativeDate(opts.since, now()), endDate);
        io.out.log(`Audit Summary (${summary.timeRange.start.slice(0, 16)} → ${summary.timeRange.end.slice(0, 16)})`);
        io.out.log(`Total records: ${summary.totalRecords}`);
        for (const [compliance, count] of Object.entries(summary.byCompliance)) {
          io.out.log(`  ${compliance.padEnd(14)} ${count}`);
        }
        for (const [outcome, count] of Object.entries(summary.byOutcome)) {
          io.out.log(`  ${outcome.padEnd(14)} ${count}`);
        }
        io.out.log(`Escalations: ${summary.escalations}`);
      });
    });

  return program;
}

/**
 * Parse argv and run the command. Resolves with the process exit code;
 * errors print `<ErrorName>: <reason>` and map to 2.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let exitCode = EXIT_COMPLIANT;
  const program = buildProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode === 0 ? EXIT_COMPLIANT : EXIT_ERROR;
    const { name, message } = describeError(err);
    io.out.error(`${name}: ${message}`);
    return EXIT_ERROR;
  }
  return exitCode;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function resolveRelativeDate(input: string, now: number): string {
  const match = input.match(/^(\d+)(m|h|d)$/);
  if (match) {
    const multipliers: Record<string, number> = { m: 60_000, h: 3_600_000, d: 86_400_000 };
    const ms = Number.parseInt(match[1] ?? "0", 10) * (multipliers[match[2] ?? "d"] ?? 86_400_000);
    return new Date(now - ms).toISOString();
  }
  // Assume ISO-8601 if not relative
  return input;
}
