import * as fs from "fs";
import * as path from "path";
import { parseArgs } from "util";
import { discoverSqlFiles, runBatch } from "./batch";
import { ColrefConfig, loadConfigFile, resolveConfig, UnresolvedPolicySchema } from "./config";
import { ConfigError, errorMessage } from "./errors";
import { createLogger, fileSink, Logger, logger as consoleLogger } from "./logger";
import { copyToErrorReports, renderErrorReport, resolveOutputPaths, writeColumns } from "./report-writer";
import { MULTI_DIALECT_ORDER } from "./sql-parser";

export const USAGE = `Usage: colref [paths...] [options]

Extract table.column references from SQL files.

Options:
  -d, --dialect <name>             SQL dialect (default: transactsql)
      --multi-dialect              Try ${MULTI_DIALECT_ORDER.join(", ")} in turn
      --no-unqualified             Do not infer tables for unqualified columns
      --unresolved-policy <p>      drop | first-table (default: drop)
  -o, --output <path>              .csv / .xlsx file or directory (default: output/columns.csv)
  -c, --config <file>              JSON config file (default: ./colref.config.json if present)
  -h, --help                       Show this help`;

export interface CliArgs {
  help: boolean;
  config?: string;
  overrides: Partial<ColrefConfig>;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  let parsed;
  try {
    parsed = parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        dialect: { type: "string", short: "d" },
        "multi-dialect": { type: "boolean" },
        "no-unqualified": { type: "boolean" },
        "unresolved-policy": { type: "string" },
        output: { type: "string", short: "o" },
        config: { type: "string", short: "c" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    throw new UsageError(errorMessage(err));
  }
  const { values, positionals } = parsed;

  const overrides: Partial<ColrefConfig> = {};
  if (values.dialect !== undefined) { overrides.dialect = values.dialect; }
  if (values["multi-dialect"]) { overrides.multiDialect = true; }
  if (values["no-unqualified"]) { overrides.resolveUnqualified = false; }
  if (values["unresolved-policy"] !== undefined) {
    const policy = UnresolvedPolicySchema.safeParse(values["unresolved-policy"]);
    if (!policy.success) {
      throw new UsageError(`--unresolved-policy must be one of: ${UnresolvedPolicySchema.options.join(", ")}`);
    }
    overrides.unresolvedPolicy = policy.data;
  }
  if (values.output !== undefined) { overrides.output = values.output; }
  if (positionals.length > 0) { overrides.inputs = positionals; }

  return { help: values.help ?? false, config: values.config, overrides };
}

function logSummary(log: Logger, result: ReturnType<typeof runBatch>): void {
  const { summary } = result;
  log.info("SUMMARY BY FILE");
  for (const f of [...summary.perFile].sort((a, b) => a.file.localeCompare(b.file))) {
    log.info(`  ${f.report} (${f.dataset}): ${f.count} unique columns`);
  }
  log.info("PROCESSING SUMMARY");
  log.info(`Total files processed: ${summary.totalFiles}`);
  log.info(`Successfully processed with columns: ${summary.successful}`);
  log.info(`Files with 0 columns found: ${summary.zeroColumns}`);
  log.info(`Files with errors: ${summary.failed}`);
  for (const f of result.failed) {
    log.error(`  ${f.file}: ${f.error}`);
  }
}

/**
 * Run the command line. Resolves to the process exit code.
 */
export async function main(argv: readonly string[] = process.argv.slice(2), cwd: string = process.cwd()): Promise<number> {
  let args: CliArgs;
  let config: ColrefConfig;
  try {
    args = parseCliArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return 0;
    }
    config = resolveConfig(loadConfigFile(args.config, cwd), args.overrides);
  } catch (err) {
    if (err instanceof UsageError || err instanceof ConfigError) {
      consoleLogger.error(err.message);
      if (err instanceof UsageError) { console.error(USAGE); }
      return 1;
    }
    throw err;
  }

  const paths = resolveOutputPaths(path.resolve(cwd, config.output));
  fs.mkdirSync(paths.outDir, { recursive: true });
  const log = createLogger({ sinks: [fileSink(paths.logFile)] });

  const files = await discoverSqlFiles(config.inputs.map(i => path.resolve(cwd, i)), log);
  if (files.length === 0) {
    log.error("No SQL files found to process.");
    return 1;
  }

  const result = runBatch(files, {
    dialect: config.dialect,
    multiDialect: config.multiDialect,
    dialects: config.dialects,
    resolveUnqualified: config.resolveUnqualified,
    unresolvedPolicy: config.unresolvedPolicy,
    logger: log,
    cwd,
  });

  await writeColumns(paths.dataFile, result.rows);
  log.info(`Output written to: ${paths.dataFile} (${result.rows.length} rows)`);
  logSummary(log, result);

  if (result.failed.length > 0 || result.zeroColumn.length > 0) {
    copyToErrorReports([...result.failed.map(f => f.source), ...result.zeroColumn.map(z => z.source)], paths.errorReportsDir, log);
    fs.writeFileSync(paths.errorsFile, renderErrorReport(result, new Date(), paths.errorReportsDir), "utf8");
    log.info(`Error report written to: ${paths.errorsFile}`);
  }
  return 0;
}
