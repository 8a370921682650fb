import * as fs from "fs";
import * as path from "path";
import * as fg from "fast-glob";
import { formatParseError } from "./diagnostics";
import { errorMessage } from "./errors";
import { Logger, logger as defaultLogger } from "./logger";
import { normalizeSql } from "./normalizer";
import { ExtractionOutcome, ExtractionStatus, ExtractOptions, extractReferences } from "./pipeline";

export interface ReportName {
  report: string;
  dataset: string;
}

export interface FileDiagnostic {
  dialect: string;
  statementIndex: number | null;
  message: string;
  /** Full report from formatParseError. */
  formatted: string;
}

export interface FileExtraction extends ReportName {
  /** Path as shown in reports, relative to the working directory when inside it. */
  file: string;
  /** Absolute path of the source file. */
  source: string;
  /** Unique references in first-occurrence order, wildcards removed. */
  references: string[];
  totalExtracted: number;
  wildcardsFiltered: number;
  /** null when the file held nothing to parse. */
  status: ExtractionStatus | null;
  dialect: string | null;
  diagnostics: FileDiagnostic[];
}

export interface ColumnRow extends ReportName {
  column: string;
}

export interface FailedFile {
  file: string;
  source: string;
  error: string;
  stack: string | null;
}

export type ZeroColumnFile = Omit<FileExtraction, "references">;

export interface BatchSummary {
  totalFiles: number;
  successful: number;
  zeroColumns: number;
  failed: number;
  totalReferences: number;
  uniqueReferences: number;
  perFile: Array<ReportName & { file: string; count: number }>;
  statuses: Record<ExtractionStatus, number>;
}

export interface BatchResult {
  rows: ColumnRow[];
  successful: string[];
  zeroColumn: ZeroColumnFile[];
  failed: FailedFile[];
  summary: BatchSummary;
}

export interface BatchOptions extends ExtractOptions {
  /** Base directory for the file keys in reports. Defaults to process.cwd(). */
  cwd?: string;
}

const SQL_EXT_RE = /\.sql$/i;

/**
 * `<report>__<dataset>.sql` -> { report, dataset }; without "__" the dataset
 * is "Default". Only the first "__" splits.
 */
export function parseReportName(filePath: string): ReportName {
  const base = path.basename(filePath).replace(SQL_EXT_RE, "");
  const at = base.indexOf("__");
  if (at < 0) { return { report: base, dataset: "Default" }; }
  return { report: base.slice(0, at), dataset: base.slice(at + 2) || "Default" };
}

/**
 * Expand files and directories into the .sql files to process. Directories
 * are searched recursively; anything else is reported and skipped.
 */
export async function discoverSqlFiles(inputs: readonly string[], log: Logger = defaultLogger): Promise<string[]> {
  const found = new Set<string>();
  for (const input of inputs) {
    const abs = path.resolve(input);
    let stat: fs.Stats;
    try {
      stat = fs.statSync(abs);
    } catch {
      log.warn(`Path not found: ${input}`);
      continue;
    }

    if (stat.isDirectory()) {
      const files = await fg.glob("**/*.sql", { cwd: abs, absolute: true, caseSensitiveMatch: false, onlyFiles: true });
      log.info(`Found ${files.length} SQL file(s) in ${input}`);
      for (const f of files) { found.add(path.resolve(f)); }
    } else if (SQL_EXT_RE.test(abs)) {
      found.add(abs);
    } else {
      log.warn(`Skipping non-SQL file: ${input}`);
    }
  }
  return [...found].sort();
}

export function fileKey(filePath: string, cwd: string = process.cwd()): string {
  const rel = path.relative(cwd, filePath);
  return rel && !rel.startsWith("..") && !path.isAbsolute(rel) ? rel : filePath;
}

function collectDiagnostics(outcome: ExtractionOutcome, sql: string): FileDiagnostic[] {
  const out: FileDiagnostic[] = [];
  for (const attempt of outcome.attempts) {
    if (!attempt.error) { continue; }
    out.push({
      dialect: attempt.dialect,
      statementIndex: null,
      message: attempt.error.message,
      formatted: formatParseError(attempt.error, sql, { dialect: attempt.dialect }),
    });
  }
  for (const failure of outcome.statementFailures) {
    out.push({
      dialect: failure.dialect,
      statementIndex: failure.statementIndex,
      message: failure.error.message,
      formatted: formatParseError(failure.error, sql, { dialect: failure.dialect, statementIndex: failure.statementIndex }),
    });
  }
  return out;
}

/**
 * Read, normalize and extract one file. Read errors propagate; extraction
 * problems come back as diagnostics.
 */
export function processFile(filePath: string, options: BatchOptions = {}): FileExtraction {
  const log = options.logger ?? defaultLogger;
  const base = {
    file: fileKey(filePath, options.cwd),
    source: path.resolve(filePath),
    ...parseReportName(filePath),
  };
  const empty: FileExtraction = { ...base, references: [], totalExtracted: 0, wildcardsFiltered: 0, status: null, dialect: null, diagnostics: [] };

  const raw = fs.readFileSync(filePath, "utf8");
  if (!raw.trim()) {
    log.warn(`File ${base.file} is empty`);
    return empty;
  }

  const sql = normalizeSql(raw);
  if (!sql) {
    log.warn(`File ${base.file} contains only comments/DDL (no query statements)`);
    return empty;
  }

  const outcome = extractReferences(sql, options);
  const seen = new Set<string>();
  const references: string[] = [];
  let wildcardsFiltered = 0;
  for (const ref of outcome.references) {
    if (ref.endsWith(".*")) {
      wildcardsFiltered++;
      log.debug(`Skipping wildcard column: ${ref}`);
      continue;
    }
    if (seen.has(ref)) { continue; }
    seen.add(ref);
    references.push(ref);
  }

  return {
    ...base,
    references,
    totalExtracted: outcome.references.length,
    wildcardsFiltered,
    status: outcome.status,
    dialect: outcome.dialect,
    diagnostics: collectDiagnostics(outcome, sql),
  };
}

function emptyStatuses(): Record<ExtractionStatus, number> {
  return { SUCCESS: 0, PARTIAL_OK: 0, PARSE_ERROR: 0, ZERO_COLUMNS: 0 };
}

/**
 * Process files one after another. A file that cannot be read or processed
 * is recorded as failed and the batch moves on.
 */
export function runBatch(files: readonly string[], options: BatchOptions = {}): BatchResult {
  const log = options.logger ?? defaultLogger;
  const rows: ColumnRow[] = [];
  const successful: string[] = [];
  const zeroColumn: ZeroColumnFile[] = [];
  const failed: FailedFile[] = [];
  const perFile: BatchSummary["perFile"] = [];
  const statuses = emptyStatuses();

  log.info(`Processing ${files.length} SQL file(s)...`);
  for (const file of files) {
    log.info(`Processing: ${file}`);
    let result: FileExtraction;
    try {
      result = processFile(file, options);
    } catch (err) {
      log.error(`Error processing ${file}`, err);
      failed.push({ file: fileKey(file, options.cwd), source: path.resolve(file), error: errorMessage(err), stack: err instanceof Error ? err.stack ?? null : null });
      continue;
    }

    if (result.status) { statuses[result.status]++; }
    perFile.push({ file: result.file, report: result.report, dataset: result.dataset, count: result.references.length });

    if (result.references.length === 0) {
      const { references, ...info } = result;
      zeroColumn.push(info);
      if (result.diagnostics.length > 0) {
        log.warn(`No unique columns found in ${result.report} (${result.dataset}) - Parse errors detected: ${result.diagnostics.length}`);
      } else {
        log.warn(`No unique columns found in ${result.report} (${result.dataset}) - Total extracted: ${result.totalExtracted}, Wildcards filtered: ${result.wildcardsFiltered}`);
      }
      continue;
    }

    successful.push(result.file);
    for (const column of result.references) {
      rows.push({ report: result.report, dataset: result.dataset, column });
    }
    log.info(`Found ${result.references.length} unique columns in ${result.report} (${result.dataset})`);
  }

  const uniqueReferences = new Set(rows.map(r => r.column)).size;
  log.info(`Found ${rows.length} total table.column references (${uniqueReferences} unique)`);

  return {
    rows,
    successful,
    zeroColumn,
    failed,
    summary: {
      totalFiles: files.length,
      successful: successful.length,
      zeroColumns: zeroColumn.length,
      failed: failed.length,
      totalReferences: rows.length,
      uniqueReferences,
      perFile,
      statuses,
    },
  };
}
