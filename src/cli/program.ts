/**
 * CLI Module - Program
 *
 * energy-tracker [--quiet] [--json] [--db <path>] <command>
 *
 * Exit codes:
 *   0 - success
 *   1 - unrecovered error
 *   2 - partial sync failure (quiet mode only)
 */
import { Command, CommanderError } from "commander";
import { z } from "zod";

import { createLogger, setLogLevel } from "../logger.js";
import {
  botCommand,
  configSetCommand,
  costCommand,
  demandCommand,
  exportCommand,
  initCommand,
  ratesCommand,
  statusCommand,
  syncCommand,
  usageCommand,
} from "./commands.js";
import {
  type CliContext,
  type CliEnvironment,
  type CliOutput,
  CostOptionsSchema,
  EXIT_ERROR,
  EXIT_OK,
  ExportOptionsSchema,
  type GlobalOptions,
  GlobalOptionsSchema,
  RatesOptionsSchema,
  StatusOptionsSchema,
  SyncOptionsSchema,
  UsageOptionsSchema,
} from "./schema.js";

const log = createLogger("cli");

const NoOptionsSchema = z.object({});

type Handler<S extends z.ZodTypeAny> = (
  ctx: CliContext,
  options: z.output<S>,
  args: ReadonlyArray<string>,
) => Promise<number> | number;

function createOutput(env: CliEnvironment, options: GlobalOptions): CliOutput {
  return {
    data: (text) => env.stdout(`${text}\n`),
    info: (text) => {
      if (!options.quiet) {
        env.stdout(`${text}\n`);
      }
    },
    error: (text) => env.stderr(`${text}\n`),
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `--${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
}

/**
 * Build the commander program. Every action reports its exit code
 * through `setExitCode` instead of exiting the process.
 */
export function buildProgram(
  env: CliEnvironment,
  setExitCode: (code: number) => void,
): Command {
  /**
   * Adapt a handler to commander: commander passes positional arguments,
   * then the command's options, then the command itself.
   */
  const action =
    <S extends z.ZodTypeAny>(schema: S, handler: Handler<S>) =>
    async (...received: unknown[]): Promise<void> => {
      const command = received.at(-1);
      if (!(command instanceof Command)) {
        throw new Error("Action invoked without its command");
      }

      const global = GlobalOptionsSchema.safeParse(command.optsWithGlobals());
      const own = schema.safeParse(command.opts());
      if (!global.success || !own.success) {
        const issues = [global, own].flatMap((parsed) =>
          parsed.success ? [] : [formatIssues(parsed.error)],
        );
        env.stderr(`Error: invalid options: ${issues.join("; ")}\n`);
        setExitCode(EXIT_ERROR);
        return;
      }

      if (global.data.quiet) {
        setLogLevel("warn");
      }

      const ctx: CliContext = {
        config: env.config,
        envPath: env.envPath,
        services: env.services,
        options: global.data,
        output: createOutput(env, global.data),
        now: env.now,
      };
      const args = received
        .slice(0, -2)
        .filter((value): value is string => typeof value === "string");

      log.debug({ command: command.name(), args }, "Running command");
      setExitCode(await handler(ctx, own.data, args));
    };

  const program = new Command();

  program
    .name("energy-tracker")
    .description(
      "Sync half-hourly electricity usage and tariff rates, compute costs and send usage alerts",
    )
    .option("-q, --quiet", "only print warnings and errors (for scheduled runs)")
    .option("-j, --json", "print results as JSON")
    .option("--db <path>", "SQLite database path (default: DB_PATH)")
    .exitOverride()
    .configureOutput({
      writeOut: env.stdout,
      writeErr: env.stderr,
    });

  program
    .command("init")
    .description("look up the meter for ENERGY_ACCOUNT and save its identifiers")
    .action(action(NoOptionsSchema, (ctx) => initCommand(ctx)));

  program
    .command("sync")
    .description("fetch consumption, unit rates and standing charges, then check alerts")
    .option("--days <n>", "sync the last N days instead of resuming")
    .option("--from <iso>", "window start (ISO 8601)")
    .option("--to <iso>", "window end (ISO 8601, default now)")
    .action(action(SyncOptionsSchema, syncCommand));

  program
    .command("demand")
    .description("check live demand and daily usage alerts without syncing")
    .action(action(NoOptionsSchema, (ctx) => demandCommand(ctx)));

  program
    .command("usage")
    .description("show stored consumption")
    .option("--days <n>", "days to show", "7")
    .option("--group <period>", "total by day, week or month")
    .action(action(UsageOptionsSchema, usageCommand));

  program
    .command("rates")
    .description("show stored unit rates")
    .option("--days <n>", "days to show", "7")
    .action(action(RatesOptionsSchema, ratesCommand));

  program
    .command("cost")
    .description("compute cost from stored usage and rates")
    .option("--days <n>", "days to cost", "7")
    .option("--group <period>", "none, day, week or month", "day")
    .action(action(CostOptionsSchema, costCommand));

  program
    .command("export")
    .description("write every stored record to a JSON file")
    .option("--output <file>", "output file", "energy_export.json")
    .action(action(ExportOptionsSchema, exportCommand));

  program
    .command("bot")
    .description("run the Telegram command bot until interrupted")
    .action(action(NoOptionsSchema, (ctx) => botCommand(ctx)));

  program
    .command("status")
    .description("print the status summary")
    .option("--write", "also write it to STATUS_CACHE_PATH")
    .action(action(StatusOptionsSchema, statusCommand));

  const configCommand = program
    .command("config")
    .description("change settings stored in the env file");

  configCommand
    .command("set <key> <value>")
    .description("set one runtime setting, e.g. ALERT_THRESHOLD_WATTS 1500")
    .action(
      action(NoOptionsSchema, (ctx, _options, [key = "", value = ""]) =>
        configSetCommand(ctx, key, value),
      ),
    );

  return program;
}

/**
 * Run the CLI once and resolve to the process exit code.
 *
 * @example
 * process.exitCode = await runCli(process.argv, environment);
 */
export async function runCli(
  argv: ReadonlyArray<string>,
  env: CliEnvironment,
): Promise<number> {
  let exitCode = EXIT_OK;
  const program = buildProgram(env, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help, usage errors and unknown commands; commander already printed them
      return error.exitCode === 0 ? EXIT_OK : EXIT_ERROR;
    }
    const message = error instanceof Error ? error.message : String(error);
    log.error({ error: message }, "Command failed");
    env.stderr(`Error: ${message}\n`);
    return EXIT_ERROR;
  }

  return exitCode;
}
