import * as crypto from "crypto";
import { Parser } from "node-sql-parser";
import { isRecord, toStatementTrees } from "./ast-utils";
import { errorMessage, ParseFailure } from "./errors";
import { logger } from "./logger";
import { LruCache } from "./lru-cache";
import type { StatementTree } from "./sql-tree";

export const DEFAULT_DIALECT = "transactsql";

export const MULTI_DIALECT_ORDER: readonly string[] = ["transactsql", "postgresql", "mysql", "snowflake", "bigquery", "mariadb"];

const DIALECT_ALIASES: Record<string, string> = {
    mssql: "transactsql",
    sqlserver: "transactsql",
    sql_server: "transactsql",
    "sql-server": "transactsql",
    "t-sql": "transactsql",
    tsql: "transactsql",
    postgres: "postgresql",
    pg: "postgresql",
    big_query: "bigquery",
};

export function normalizeDialect(name: string): string {
    const key = name.trim().toLowerCase();
    return DIALECT_ALIASES[key] ?? key;
}

/**
 * Anything that can turn SQL text into statement trees for a dialect.
 * Throws ParseFailure when the text does not parse.
 */
export interface StructuralParser {
    parse(text: string, dialect: string): Array<StatementTree | null>;
}

type ParseOutcome =
    | { ok: true; statements: Array<StatementTree | null> }
    | { ok: false; failure: ParseFailure };

function contentHash(s: string) {
    return crypto.createHash("sha1").update(s).digest("hex");
}

function positiveInt(value: unknown): number | null {
    return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : null;
}

/** Line/column from a parser error's `location.start`, when it has one. */
export function errorLocation(err: unknown): { line: number | null; column: number | null } {
    if (isRecord(err) && isRecord(err.location) && isRecord(err.location.start)) {
        return { line: positiveInt(err.location.start.line), column: positiveInt(err.location.start.column) };
    }
    return { line: null, column: null };
}

export interface NodeSqlParserOptions {
    cacheSize?: number;
    cacheTtlMs?: number;
}

/**
 * node-sql-parser backed parser. Outcomes, failures included, are cached by
 * a hash of dialect and text so repeated trials of the same text are free.
 */
export class NodeSqlParser implements StructuralParser {
    private readonly parser = new Parser();
    private readonly cache: LruCache<ParseOutcome>;

    constructor(options: NodeSqlParserOptions = {}) {
        this.cache = new LruCache<ParseOutcome>(options.cacheSize ?? 200, options.cacheTtlMs);
    }

    parse(text: string, dialect: string): Array<StatementTree | null> {
        const database = normalizeDialect(dialect);
        const key = contentHash(`${database}\u0000${text}`);

        let outcome = this.cache.get(key);
        if (!outcome) {
            outcome = this.parseUncached(text, database);
            this.cache.set(key, outcome);
        } else {
            logger.debug(`parse cache hit (${database})`);
        }

        if (!outcome.ok) { throw outcome.failure; }
        return outcome.statements;
    }

    private parseUncached(text: string, database: string): ParseOutcome {
        let ast: unknown;
        try {
            ast = this.parser.astify(text, { database });
        } catch (err) {
            const { line, column } = errorLocation(err);
            return { ok: false, failure: new ParseFailure(errorMessage(err), database, line, column, { cause: err }) };
        }
        return { ok: true, statements: toStatementTrees(ast) };
    }
}
