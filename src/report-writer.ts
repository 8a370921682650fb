import * as fs from "fs";
import * as path from "path";
import * as ExcelJS from "exceljs";
import type { BatchResult, ColumnRow, FileDiagnostic } from "./batch";
import { Logger, logger as defaultLogger } from "./logger";

export const CSV_HEADER = ["ReportName", "Dataset", "ColumnName"] as const;
export const WORKSHEET_NAME = "Columns";
export const DEFAULT_OUTPUT_NAME = "columns";

const RULE = "=".repeat(80);
const DIVIDER = "-".repeat(80);

export interface OutputPaths {
  outDir: string;
  /** .csv or .xlsx file receiving the rows. */
  dataFile: string;
  logFile: string;
  errorsFile: string;
  errorReportsDir: string;
}

/**
 * `--output` names either the data file (.csv / .xlsx) or a directory that
 * receives columns.csv. Log, error report and copies live beside it.
 */
export function resolveOutputPaths(output: string): OutputPaths {
  const abs = path.resolve(output);
  const isFile = /\.(csv|xlsx)$/i.test(abs);
  const outDir = isFile ? path.dirname(abs) : abs;
  const dataFile = isFile ? abs : path.join(outDir, `${DEFAULT_OUTPUT_NAME}.csv`);
  const stem = path.basename(dataFile).replace(/\.(csv|xlsx)$/i, "");
  return {
    outDir,
    dataFile,
    logFile: path.join(outDir, `${stem}.log`),
    errorsFile: path.join(outDir, "errors.txt"),
    errorReportsDir: path.join(outDir, "Error_Reports"),
  };
}

export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(rows: readonly ColumnRow[]): string {
  const lines = [CSV_HEADER.join(",")];
  for (const row of rows) {
    lines.push([row.report, row.dataset, row.column].map(csvField).join(","));
  }
  return lines.join("\r\n") + "\r\n";
}

export function writeCsv(filePath: string, rows: readonly ColumnRow[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, toCsv(rows), "utf8");
}

export function buildWorkbook(rows: readonly ColumnRow[]): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();

  const sheet = workbook.addWorksheet(WORKSHEET_NAME);
  sheet.columns = [
    { key: "report", header: CSV_HEADER[0], width: 30 },
    { key: "dataset", header: CSV_HEADER[1], width: 20 },
    { key: "column", header: CSV_HEADER[2], width: 50 },
  ];
  sheet.getRow(1).font = { bold: true };

  for (const row of rows) {
    sheet.addRow({ report: row.report, dataset: row.dataset, column: row.column });
  }
  return workbook;
}

export async function writeXlsx(filePath: string, rows: readonly ColumnRow[]): Promise<void> {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  await buildWorkbook(rows).xlsx.writeFile(filePath);
}

/** Write rows in the format the file extension asks for. */
export async function writeColumns(filePath: string, rows: readonly ColumnRow[]): Promise<void> {
  if (/\.xlsx$/i.test(filePath)) {
    await writeXlsx(filePath, rows);
  } else {
    writeCsv(filePath, rows);
  }
}

function formatTimestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

function renderDiagnostics(diagnostics: readonly FileDiagnostic[]): string[] {
  const out: string[] = ["", "Detailed Parse Errors:"];
  for (const d of diagnostics) {
    out.push("");
    out.push(`  Statement #${d.statementIndex ?? "all"}`);
    out.push(`  Dialect: ${d.dialect}`);
    out.push(`  Error: ${d.message}`);
    out.push("", "  Detailed Error Information:");
    for (const line of d.formatted.split("\n")) {
      out.push(`    ${line}`);
    }
  }
  return out;
}

/**
 * Text of errors.txt: counts, then every failed file and every file that
 * produced no columns, with their diagnostics.
 */
export function renderErrorReport(result: BatchResult, generatedAt: Date, errorReportsDir: string): string {
  const { summary, failed, zeroColumn } = result;
  const out: string[] = [
    RULE,
    "ERROR REPORT",
    RULE,
    "",
    `Generated: ${formatTimestamp(generatedAt)}`,
    `Total files processed: ${summary.totalFiles}`,
    `Files with errors: ${summary.failed}`,
    `Files with 0 columns: ${summary.zeroColumns}`,
    `Files successfully processed: ${summary.successful}`,
    "",
  ];

  if (failed.length > 0) {
    out.push(`FILES WITH PROCESSING ERRORS (${failed.length}):`, DIVIDER);
    for (const f of failed) {
      out.push("", `File: ${f.file}`, `Error: ${f.error}`);
      if (f.stack) { out.push("", "Traceback:", f.stack); }
      out.push(DIVIDER);
    }
    out.push("");
  }

  if (zeroColumn.length > 0) {
    out.push(`FILES WITH 0 COLUMNS FOUND (${zeroColumn.length}):`, DIVIDER);
    for (const z of zeroColumn) {
      out.push("", `File: ${z.file}`, `Report: ${z.report} (${z.dataset})`);
      if (z.totalExtracted > 0) {
        out.push(`Reason: ${z.totalExtracted} columns extracted but filtered (wildcards: ${z.wildcardsFiltered})`);
      } else if (z.diagnostics.length > 0) {
        out.push("Reason: Parse error(s) prevented column extraction");
      } else {
        out.push("Reason: No columns extracted (may be DDL-only, empty file, or parse error)");
      }
      if (z.diagnostics.length > 0) { out.push(...renderDiagnostics(z.diagnostics)); }
      out.push(DIVIDER);
    }
    out.push("");
  }

  out.push(
    "",
    `Total files with errors: ${failed.length}`,
    `Total files with 0 columns: ${zeroColumn.length}`,
    "",
    `All error files have been copied to: ${errorReportsDir}`,
  );
  return out.join("\n") + "\n";
}

/**
 * Copy source files into the Error_Reports directory. A file that cannot be
 * copied is logged and the rest still go.
 */
export function copyToErrorReports(files: readonly string[], dir: string, log: Logger = defaultLogger): string[] {
  const copied: string[] = [];
  if (files.length === 0) { return copied; }
  fs.mkdirSync(dir, { recursive: true });
  for (const file of files) {
    const target = path.join(dir, path.basename(file));
    try {
      fs.copyFileSync(file, target);
      copied.push(target);
      log.info(`Copied to Error_Reports: ${target}`);
    } catch (err) {
      log.error(`Failed to copy ${file} to Error_Reports`, err);
    }
  }
  return copied;
}
