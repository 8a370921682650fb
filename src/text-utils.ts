import keywordList from "./sql-keywords.json";

const SQL_KEYWORDS: ReadonlySet<string> = new Set(keywordList);

export function isSqlKeyword(token: string): boolean {
    return SQL_KEYWORDS.has(token.toLowerCase());
}

/**
 * Remove one layer of identifier quoting: [x], "x" or `x`.
 */
export function stripIdentifierQuotes(name: string): string {
    const n = String(name).trim();
    if (n.length >= 2) {
        const first = n[0];
        const last = n[n.length - 1];
        if ((first === "[" && last === "]") || (first === '"' && last === '"') || (first === "`" && last === "`")) {
            return n.slice(1, -1).trim();
        }
    }
    return n;
}

/**
 * Split a dotted name into its parts, ignoring dots inside [..], ".." or `..`.
 * e.g. "[dbo].[My.Table]" -> ["dbo", "My.Table"]
 */
export function splitQualifiedName(name: string): string[] {
    const parts: string[] = [];
    let cur = "";
    let closing: string | null = null;
    for (const ch of String(name)) {
        if (closing) {
            cur += ch;
            if (ch === closing) { closing = null; }
            continue;
        }
        if (ch === "[") { closing = "]"; cur += ch; continue; }
        if (ch === '"' || ch === "`") { closing = ch; cur += ch; continue; }
        if (ch === ".") { parts.push(cur); cur = ""; continue; }
        cur += ch;
    }
    parts.push(cur);
    return parts.map(stripIdentifierQuotes).filter(Boolean);
}

export function sameIdentifier(a: string, b: string): boolean {
    return a.toLowerCase() === b.toLowerCase();
}

export function stripStrings(s: string): string {
    // Replace string literals (including N'...') with spaces to preserve indices
    return s.replace(/N?'(?:''|[^'])*'/g, (m) => " ".repeat(m.length));
}

export function stripComments(sql: string): string {
    // Line and block comments become spaces of the same length so offsets remain stable.
    sql = sql.replace(/--.*$/gm, (m) => " ".repeat(m.length));
    sql = sql.replace(/\/\*[\s\S]*?\*\//g, (m) => m.replace(/[^\n]/g, " "));
    return sql;
}
