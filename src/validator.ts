/**
 * Read-only query gate.
 *
 * Static keyword check, not a parser. It keeps a cooperative caller from
 * running a mutation by accident; it is not a security boundary against a
 * hostile one (functions with side effects, procedural extensions and the
 * like pass straight through). Keep it this permissive: callers rely on
 * forms such as EXPLAIN ANALYZE.
 *
 * Comment removal is quote-aware: `--` or `/*` inside a string literal, a
 * quoted identifier or a dollar-quoted body is text, so it cannot hide what
 * follows it. Plain '...' literals follow standard_conforming_strings (no
 * backslash escapes); only E'...' literals honour them.
 */

export const ALLOWED_OPENERS = ["SELECT", "WITH", "EXPLAIN", "SHOW", "DESCRIBE", "VALUES"] as const;

export const DENIED_KEYWORDS = [
  "INSERT",
  "UPDATE",
  "DELETE",
  "DROP",
  "CREATE",
  "ALTER",
  "TRUNCATE",
  "GRANT",
  "REVOKE",
  "EXEC",
  "EXECUTE",
] as const;

const DENIED_PATTERNS = DENIED_KEYWORDS.map(
  (keyword) => [keyword, new RegExp(`\\b${keyword}\\b`)] as const
);

export interface QueryCheck {
  allowed: boolean;
  reason?: string;
}

const DOLLAR_TAG = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/;
const IDENTIFIER_CHAR = /[A-Za-z0-9_$]/;

/** Index just past the quote closing the literal opened at `start`. */
function skipQuoted(sql: string, start: number, quote: string, backslashEscapes: boolean): number {
  let i = start + 1;
  while (i < sql.length) {
    const ch = sql[i];
    if (backslashEscapes && ch === "\\") {
      i += 2;
    } else if (ch === quote) {
      // a doubled quote is an escaped quote
      if (sql[i + 1] !== quote) return i + 1;
      i += 2;
    } else {
      i++;
    }
  }
  return sql.length;
}

/**
 * Remove `--` line comments and `/* *\/` block comments outside quoted
 * text. An unterminated block comment or literal is kept as is.
 */
export function stripComments(sql: string): string {
  let out = "";
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];
    const prev = i > 0 ? sql[i - 1] : "";

    if (ch === "-" && next === "-") {
      const end = sql.indexOf("\n", i);
      i = end === -1 ? sql.length : end;
      continue;
    }

    if (ch === "/" && next === "*") {
      const end = sql.indexOf("*/", i + 2);
      if (end === -1) {
        out += sql.slice(i);
        break;
      }
      // a comment separates tokens like whitespace does
      out += " ";
      i = end + 2;
      continue;
    }

    if (ch === "'" || ch === '"') {
      const escaped =
        ch === "'" &&
        (prev === "E" || prev === "e") &&
        (i < 2 || !IDENTIFIER_CHAR.test(sql[i - 2]));
      const end = skipQuoted(sql, i, ch, escaped);
      out += sql.slice(i, end);
      i = end;
      continue;
    }

    if (ch === "$" && !IDENTIFIER_CHAR.test(prev)) {
      const tag = DOLLAR_TAG.exec(sql.slice(i));
      if (tag) {
        const close = sql.indexOf(tag[0], i + tag[0].length);
        const end = close === -1 ? sql.length : close + tag[0].length;
        out += sql.slice(i, end);
        i = end;
        continue;
      }
    }

    out += ch;
    i++;
  }

  return out;
}

/**
 * Strip comments, then trim and uppercase.
 */
export function normalizeQuery(sql: string): string {
  return stripComments(sql).trim().toUpperCase();
}

export function checkQuery(sql: string): QueryCheck {
  const cleaned = normalizeQuery(sql);

  if (cleaned.length === 0) {
    return { allowed: false, reason: "Query is empty" };
  }

  if (!ALLOWED_OPENERS.some((opener) => cleaned.startsWith(opener))) {
    return {
      allowed: false,
      reason: `Query must start with one of: ${ALLOWED_OPENERS.join(", ")}`,
    };
  }

  // Whole text, not just the prefix: a WITH clause can carry a DELETE.
  for (const [keyword, pattern] of DENIED_PATTERNS) {
    if (pattern.test(cleaned)) {
      return { allowed: false, reason: `Query contains disallowed keyword: ${keyword}` };
    }
  }

  return { allowed: true };
}

export function validateQuery(sql: string): boolean {
  return checkQuery(sql).allowed;
}
