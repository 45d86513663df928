/**
 * Lexical facts about a statement's text, read without the engine.
 */
export interface SqlScan {
  /** Number of parameter slots, i.e. the highest index any parameter takes. */
  parameterCount: number;
  /** Whether SQL follows a `;` that is outside literals and comments. */
  multipleStatements: boolean;
}

const IDENTIFIER_CHAR = /[A-Za-z0-9_$]/;

/** Index just past the quote that closes the literal opened at `start`. */
function skipQuoted(sql: string, start: number, close: string): number {
  let i = start + 1;
  while (i < sql.length) {
    if (sql[i] === close) {
      // A doubled quote is an escaped quote
      if (close !== "]" && sql[i + 1] === close) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return i;
}

function readWhile(sql: string, start: number, pattern: RegExp): number {
  let i = start;
  while (i < sql.length && pattern.test(sql.charAt(i))) i++;
  return i;
}

/**
 * Count parameter slots the way SQLite numbers them: `?NNN` takes index NNN,
 * a bare `?` takes one past the largest index so far, and each distinct
 * `:name`, `@name` or `$name` takes the next free index.
 */
export function scanSql(sql: string): SqlScan {
  let parameterCount = 0;
  let afterSemicolon = false;
  let multipleStatements = false;
  const named = new Set<string>();

  let i = 0;
  while (i < sql.length) {
    const ch = sql.charAt(i);
    const next = sql.charAt(i + 1);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (ch === "-" && next === "-") {
      const end = sql.indexOf("\n", i);
      i = end === -1 ? sql.length : end + 1;
      continue;
    }
    if (ch === "/" && next === "*") {
      const end = sql.indexOf("*/", i + 2);
      i = end === -1 ? sql.length : end + 2;
      continue;
    }

    if (afterSemicolon && ch !== ";") {
      multipleStatements = true;
    }

    switch (ch) {
      case "'":
      case '"':
      case "`":
        i = skipQuoted(sql, i, ch);
        continue;
      case "[":
        i = skipQuoted(sql, i, "]");
        continue;
      case ";":
        afterSemicolon = true;
        i++;
        continue;
      case "?": {
        const end = readWhile(sql, i + 1, /[0-9]/);
        parameterCount =
          end > i + 1
            ? Math.max(parameterCount, Number(sql.slice(i + 1, end)))
            : parameterCount + 1;
        i = end;
        continue;
      }
      case ":":
      case "@":
      case "$": {
        const end = readWhile(sql, i + 1, IDENTIFIER_CHAR);
        const prev = sql.charAt(i - 1);
        if (end > i + 1 && !(i > 0 && IDENTIFIER_CHAR.test(prev))) {
          const name = sql.slice(i, end);
          if (!named.has(name)) {
            named.add(name);
            parameterCount++;
          }
        }
        i = Math.max(end, i + 1);
        continue;
      }
      default:
        if (IDENTIFIER_CHAR.test(ch)) {
          // Whole words, so a `$` inside an identifier is not a parameter
          i = readWhile(sql, i, IDENTIFIER_CHAR);
        } else {
          i++;
        }
    }
  }

  return { parameterCount, multipleStatements };
}
