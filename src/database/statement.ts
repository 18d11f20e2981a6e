/**
 * SQL text inspection
 *
 * Lexical helpers for model-written SQL: the leading keyword and the
 * statements a text holds. Quoted strings, quoted identifiers, dollar-quoted
 * bodies and comments are skipped, so a `;` inside them does not split.
 */

/**
 * Strip leading comments and return the first keyword, lower-cased
 */
export function leadingKeyword(sql: string): string {
  const withoutComments = sql
    .replace(/^\s*(?:--[^\n]*\n|\/\*[\s\S]*?\*\/|\s)*/, '')
    .replace(/^\(+/, '');
  const match = /^([a-zA-Z]+)/.exec(withoutComments);
  return match?.[1]?.toLowerCase() ?? '';
}

const DOLLAR_TAG = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/;

/**
 * Split on top-level semicolons. Pieces holding only whitespace or
 * comments are dropped, so a trailing `;` does not count as a statement.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let start = 0;
  let significant = false;
  let index = 0;

  const flush = (end: number): void => {
    if (significant) {
      statements.push(sql.slice(start, end).trim());
    }
    start = end + 1;
    significant = false;
  };

  while (index < sql.length) {
    const char = sql[index];
    const next = sql[index + 1];

    if (char === '-' && next === '-') {
      const end = sql.indexOf('\n', index);
      index = end === -1 ? sql.length : end + 1;
      continue;
    }

    if (char === '/' && next === '*') {
      // Block comments nest
      let depth = 1;
      index += 2;
      while (index < sql.length && depth > 0) {
        if (sql[index] === '/' && sql[index + 1] === '*') {
          depth++;
          index += 2;
        } else if (sql[index] === '*' && sql[index + 1] === '/') {
          depth--;
          index += 2;
        } else {
          index++;
        }
      }
      continue;
    }

    if (char === "'" || char === '"') {
      const escapes = char === "'" && /[eE]/.test(sql[index - 1] ?? '') && !/\w/.test(sql[index - 2] ?? '');
      significant = true;
      index++;
      while (index < sql.length) {
        if (escapes && sql[index] === '\\') {
          index += 2;
          continue;
        }
        if (sql[index] === char) {
          if (sql[index + 1] === char) {
            index += 2;
            continue;
          }
          break;
        }
        index++;
      }
      index++;
      continue;
    }

    if (char === '$') {
      const tag = DOLLAR_TAG.exec(sql.slice(index))?.[0];
      if (tag && !/\w/.test(sql[index - 1] ?? '')) {
        significant = true;
        const end = sql.indexOf(tag, index + tag.length);
        index = end === -1 ? sql.length : end + tag.length;
        continue;
      }
    }

    if (char === ';') {
      flush(index);
    } else if (char !== undefined && !/\s/.test(char)) {
      significant = true;
    }
    index++;
  }

  flush(sql.length);
  return statements;
}
