const NAMED_ENTITIES: Record<string, string> = {
  lt: "<",
  gt: ">",
  amp: "&",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

function fromCodePoint(code: number, fallback: string): string {
  return Number.isFinite(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : fallback;
}

/**
 * Decode the HTML entities SQL picks up when it is exported from web tools:
 * &lt; &gt; &amp; &quot; &apos; &nbsp; and numeric &#NN; / &#xHH;.
 * Unknown entities are left as they are.
 */
export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(?:#(\d+)|#[xX]([0-9a-fA-F]+)|([A-Za-z]+));/g, (m: string, dec?: string, hex?: string, name?: string) => {
    if (dec) { return fromCodePoint(parseInt(dec, 10), m); }
    if (hex) { return fromCodePoint(parseInt(hex, 16), m); }
    if (name) { return NAMED_ENTITIES[name.toLowerCase()] ?? m; }
    return m;
  });
}

const SET_STATEMENT_RE = /^SET\s+/i;
const UPDATE_SET_RE = /\bUPDATE\s[\s\S]*\bSET\b/i;

// Standalone SET statements go; the SET of an UPDATE stays.
function dropSetStatements(sql: string): string {
  return sql
    .split(";")
    .map(s => s.trim())
    .filter(s => s && !(SET_STATEMENT_RE.test(s) && !UPDATE_SET_RE.test(s)))
    .join("; ");
}

/**
 * Clean raw SQL before parsing: comments, batch separators, session
 * statements, declarations, DDL, locking hints, TOP clauses, terminal escape
 * codes and stray control or non-printable characters are removed and
 * whitespace is collapsed. Applying it twice gives the same text.
 */
export function normalizeSql(raw: string): string {
  let sql = raw.replace(/\r\n?/g, "\n");
  sql = decodeHtmlEntities(sql);

  // comments
  sql = sql.replace(/--[^\n]*/g, "");
  sql = sql.replace(/\/\*[\s\S]*?\*\//g, " ");

  // batch and session noise
  sql = sql.replace(/^[ \t]*USE[ \t]+[^\s;]+[ \t]*;?[ \t]*$/gim, "");
  sql = sql.replace(/^[ \t]*GO[ \t]*;?[ \t]*$/gim, "");
  sql = sql.replace(/\bSET\s+NOCOUNT\s+(?:ON|OFF)\b\s*;?/gi, "");
  sql = sql.replace(
    /\bSET\s+TRANSACTION\s+ISOLATION\s+LEVEL\s+(?:READ\s+UNCOMMITTED|READ\s+COMMITTED|REPEATABLE\s+READ|SNAPSHOT|SERIALIZABLE)\b\s*;?/gi,
    ""
  );
  sql = dropSetStatements(sql);
  sql = sql.replace(/\bDECLARE\s+[^;\n]+;?/gi, "");

  // DDL runs to the next semicolon
  sql = sql.replace(/\b(?:CREATE|ALTER|DROP)\s+[^;]+;?/gi, "");

  // hints and row limits
  sql = sql.replace(/\s*WITH\s*\(\s*NOLOCK\s*\)/gi, "");
  sql = sql.replace(/\s*\(\s*NOLOCK\s*\)/gi, "");
  sql = sql.replace(/\bTOP\s*\(\s*\d+\s*\)\s*/gi, "");
  sql = sql.replace(/\bTOP\s+\d+\s+/gi, "");

  // terminal escape sequences, raw and as literal text
  sql = sql.replace(/\x1B\[[0-?]*[ -/]*[@-~]/g, "");
  sql = sql.replace(/\x9B[0-?]*[ -/]*[@-~]/g, "");
  sql = sql.replace(/\x1B[@-Z\\-_]/g, "");
  sql = sql.replace(/\[[0-9;]+m/g, "");
  sql = sql.replace(/[\x1B\x9B]/g, "");
  sql = sql.replace(/\\x[0-9a-fA-F]{2}/g, "");
  sql = sql.replace(/\\[0-7]{1,3}/g, "");

  // control, zero-width and other non-printable characters
  sql = sql.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, "");
  sql = sql.replace(/[\u200B-\u200F\uFEFF]/g, "");
  sql = sql.replace(/[^\x20-\x7E\n\t]/g, "");

  // whitespace
  sql = sql.replace(/[ \t]+/g, " ");
  sql = sql.replace(/ +$/gm, "");
  sql = sql.replace(/^ +/gm, "");
  sql = sql.replace(/\n{2,}/g, "\n");
  return sql.trim();
}
