import { errorMessage } from "./errors";
import { logger } from "./logger";
import { isSqlKeyword, splitQualifiedName, stripComments, stripStrings } from "./text-utils";

// Bracketed, double-quoted, backtick or bare identifier
const IDENT = '(?:\\[[^\\]\\r\\n]+\\]|"[^"\\r\\n]+"|`[^`\\r\\n]+`|[A-Za-z_][A-Za-z0-9_$]*)';
const IDENT_OR_STAR = `(?:${IDENT}|\\*)`;
// not in the middle of a word or a longer dotted chain
const START = '(?<![A-Za-z0-9_$.@#\\]"`])';
// not followed by more name characters, another ".part" or a call "("
const END = '(?![A-Za-z0-9_$]|\\s*[.(])';

const THREE_PART_RE = new RegExp(`${START}(${IDENT})\\.(${IDENT})\\.(${IDENT_OR_STAR})${END}`, "g");
const TWO_PART_RE = new RegExp(`${START}(${IDENT})\\.(${IDENT_OR_STAR})${END}`, "g");

const identPart = '(?:\\[[^\\]]+\\]|"[^"]+"|`[^`]+`|[A-Za-z0-9_]+)';
const tableToken = `[@#]?${identPart}(?:\\s*\\.\\s*${identPart})*`;
const aliasToken = '(?:[A-Za-z_][A-Za-z0-9_]*|\\[[^\\]]+\\])';
const TABLE_TARGET_RE = new RegExp(
    `\\b((?:from|join|update|into)\\s+)(${tableToken})(?:\\s+(?:as\\s+)?(${aliasToken}))?`,
    "gi"
);
// one more ", table [alias]" item of a comma-separated FROM list
const LIST_ITEM_RE = new RegExp(`(\\s*,\\s*)(${tableToken})(?:\\s+(?:as\\s+)?(${aliasToken}))?`, "iy");

interface Span { start: number; end: number }

interface DottedMatch extends Span { parts: string[] }

export interface TableTargets {
    /** lower-cased alias -> dotted table path */
    aliases: Map<string, string>;
    /** where table names sit in the text, so they are not read as table.column */
    spans: Span[];
}

/**
 * Best-effort alias table from FROM / JOIN / UPDATE / INTO targets,
 * including every item of a comma-separated FROM list.
 */
export function scanTableTargets(text: string): TableTargets {
    const aliases = new Map<string, string>();
    const spans: Span[] = [];

    // false when the word after the table is a keyword, not an alias
    const addTarget = (tableText: string, start: number, aliasRaw: string | undefined): boolean => {
        spans.push({ start, end: start + tableText.length });
        if (!aliasRaw) { return true; }
        const alias = splitQualifiedName(aliasRaw).join(".");
        if (isSqlKeyword(alias)) { return false; }
        const table = splitQualifiedName(tableText.replace(/\s*\.\s*/g, ".")).join(".");
        if (table) { aliases.set(alias.toLowerCase(), table); }
        return true;
    };

    TABLE_TARGET_RE.lastIndex = 0;
    let m: RegExpExecArray | null;
    while ((m = TABLE_TARGET_RE.exec(text))) {
        const start = m.index + m[1].length;
        if (!addTarget(m[2], start, m[3])) {
            // give the keyword back so "FROM a JOIN b" still sees b
            TABLE_TARGET_RE.lastIndex = start + m[2].length;
            continue;
        }
        if (!/^from/i.test(m[1])) { continue; }

        LIST_ITEM_RE.lastIndex = TABLE_TARGET_RE.lastIndex;
        let item: RegExpExecArray | null;
        while ((item = LIST_ITEM_RE.exec(text))) {
            const itemStart = item.index + item[1].length;
            if (!addTarget(item[2], itemStart, item[3])) {
                TABLE_TARGET_RE.lastIndex = itemStart + item[2].length;
                break;
            }
            TABLE_TARGET_RE.lastIndex = LIST_ITEM_RE.lastIndex;
        }
    }
    return { aliases, spans };
}

function collect(re: RegExp, text: string): DottedMatch[] {
    const out: DottedMatch[] = [];
    re.lastIndex = 0;
    let m: RegExpExecArray | null;
    while ((m = re.exec(text))) {
        out.push({ start: m.index, end: m.index + m[0].length, parts: m.slice(1) });
    }
    return out;
}

const inside = (pos: number, spans: readonly Span[]) => spans.some(s => pos >= s.start && pos < s.end);

/**
 * Recover table.column and schema.table.column references straight from the
 * text. Used when structural extraction fails or finds nothing. Never throws.
 */
export function fallbackExtract(text: string): string[] {
    try {
        const clean = stripStrings(stripComments(text));
        const { aliases, spans } = scanTableTargets(clean);

        const threePart = collect(THREE_PART_RE, clean);
        const twoPart = collect(TWO_PART_RE, clean).filter(m => !inside(m.start, threePart));
        const matches = [...threePart, ...twoPart]
            .filter(m => !inside(m.start, spans))
            .sort((a, b) => a.start - b.start);

        const out: string[] = [];
        for (const match of matches) {
            const parts = match.parts.map(p => splitQualifiedName(p).join("."));
            const column = parts[parts.length - 1];
            if (!column || column === "*") { continue; }
            if (parts.length === 2) {
                const [table] = parts;
                if (isSqlKeyword(table)) { continue; }
                const resolved = aliases.get(table.toLowerCase()) ?? table;
                out.push(`${resolved}.${column}`);
            } else {
                out.push(parts.join("."));
            }
        }
        return out;
    } catch (err) {
        logger.debug(`fallback tokenizer failed: ${errorMessage(err)}`);
        return [];
    }
}
