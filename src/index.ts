export { buildScopes, canonicalTableName, collectCteNames, lookupAlias } from "./alias-resolver";
export type { AliasBindings, ScopeTable } from "./alias-resolver";
export { toStatementTrees } from "./ast-utils";
export { discoverSqlFiles, parseReportName, processFile, runBatch } from "./batch";
export type { BatchOptions, BatchResult, BatchSummary, ColumnRow, FailedFile, FileDiagnostic, FileExtraction, ZeroColumnFile } from "./batch";
export { resolveTableFor } from "./column-resolver";
export type { UnresolvedPolicy } from "./column-resolver";
export { DEFAULT_CONFIG, loadConfigFile, parseConfig, resolveConfig } from "./config";
export type { ColrefConfig, ConfigFile } from "./config";
export { formatParseError } from "./diagnostics";
export { ConfigError, ParseFailure, StatementProcessingError } from "./errors";
export { fallbackExtract } from "./fallback-tokenizer";
export { createLogger, fileSink, memorySink } from "./logger";
export type { Logger, LogLevel, LogSink } from "./logger";
export { decodeHtmlEntities, normalizeSql } from "./normalizer";
export { extractReferences, processStatement, resolveTrialDialects } from "./pipeline";
export type { DialectAttempt, ExtractionOutcome, ExtractionStatus, ExtractOptions, StatementFailure, StatementResult } from "./pipeline";
export { buildReference, extractStatementReferences } from "./reference-builder";
export type { BuildOptions } from "./reference-builder";
export { renderErrorReport, resolveOutputPaths, toCsv, writeColumns, writeCsv, writeXlsx } from "./report-writer";
export { DEFAULT_DIALECT, MULTI_DIALECT_ORDER, NodeSqlParser, normalizeDialect } from "./sql-parser";
export type { StructuralParser } from "./sql-parser";
export { SqlTreeBuilder } from "./sql-tree";
export type { ColumnNode, QueryBlockNode, StatementTree } from "./sql-tree";
