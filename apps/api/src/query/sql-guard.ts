/**
 * Read-only statement checks run before anything reaches the database.
 *
 * Checks work on a normalized copy of the statement: comments removed,
 * string / dollar-quoted literals replaced by `?`, quoted identifiers replaced
 * by `"_"`, whitespace collapsed and keywords upper-cased. The statement that
 * is executed is always the caller's original text.
 */

const READ_ONLY_LEADING_KEYWORDS = new Set(['SELECT', 'WITH', 'VALUES', 'TABLE', 'SHOW', 'EXPLAIN']);

const FORBIDDEN_PATTERNS: Array<[RegExp, string]> = [
  [/\b(INSERT|UPDATE|DELETE|MERGE|UPSERT)\b/, 'data modification'],
  [/\b(DROP|CREATE|ALTER|TRUNCATE|RENAME)\b/, 'schema change'],
  [/\b(GRANT|REVOKE)\b/, 'privilege change'],
  [/\bINTO\b/, 'SELECT INTO / INSERT INTO'],
  [/\bCOPY\b/, 'COPY'],
  [/\bFOR\s+(NO\s+KEY\s+UPDATE|UPDATE|SHARE|KEY\s+SHARE)\b/, 'row locking'],
  [
    /\b(NEXTVAL|SETVAL|PG_SLEEP|PG_TERMINATE_BACKEND|PG_CANCEL_BACKEND|PG_RELOAD_CONF|SET_CONFIG|LO_IMPORT|LO_EXPORT|PG_READ_FILE|PG_READ_BINARY_FILE|DBLINK|DBLINK_EXEC)\s*\(/,
    'side-effecting function',
  ],
];

export interface StatementInspection {
  normalized: string;
  /** Non-empty statements separated by top-level semicolons. */
  statementCount: number;
  leadingKeyword?: string;
  readOnly: boolean;
  /** Why the statement is not read-only. */
  reason?: string;
}

function isIdentChar(c: string | undefined): boolean {
  return c !== undefined && /[A-Za-z0-9_$]/.test(c);
}

/** `E'...'` string: backslash escapes apply inside. */
function isEscapeString(text: string, quoteAt: number): boolean {
  return /[eE]/.test(text[quoteAt - 1] ?? '') && !isIdentChar(text[quoteAt - 2]);
}

interface Token {
  /** Index just past the token. */
  end: number;
  /** What the normalized text shows in its place. */
  replacement: string;
}

/** Comment, string literal, quoted identifier or dollar-quoted body starting at `i`. */
function opaqueTokenAt(text: string, i: number): Token | undefined {
  const n = text.length;
  const c = text[i];
  const next = text[i + 1];

  if (c === '-' && next === '-') {
    let j = i;
    while (j < n && text[j] !== '\n') j++;
    return { end: j, replacement: ' ' };
  }

  if (c === '/' && next === '*') {
    let depth = 1;
    let j = i + 2;
    while (j < n && depth > 0) {
      if (text[j] === '/' && text[j + 1] === '*') {
        depth++;
        j += 2;
      } else if (text[j] === '*' && text[j + 1] === '/') {
        depth--;
        j += 2;
      } else {
        j++;
      }
    }
    return { end: j, replacement: ' ' };
  }

  if (c === "'" || c === '"') {
    const escapes = c === "'" && isEscapeString(text, i);
    let j = i + 1;
    while (j < n) {
      if (escapes && text[j] === '\\') {
        j += 2;
        continue;
      }
      if (text[j] === c) {
        if (text[j + 1] === c) {
          j += 2;
          continue;
        }
        break;
      }
      j++;
    }
    return { end: j + 1, replacement: c === "'" ? ' ? ' : ' "_" ' };
  }

  if (c === '$' && !isIdentChar(text[i - 1])) {
    const tag = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/.exec(text.slice(i));
    if (tag) {
      const close = text.indexOf(tag[0], i + tag[0].length);
      return { end: close < 0 ? n : close + tag[0].length, replacement: ' ? ' };
    }
  }

  return undefined;
}

/** Strips comments and literals; see the module comment for the exact output. */
export function normalizeSql(text: string): string {
  let out = '';
  let i = 0;
  while (i < text.length) {
    const token = opaqueTokenAt(text, i);
    if (token) {
      // The E prefix belongs to the literal.
      if (text[i] === "'" && isEscapeString(text, i)) out = out.slice(0, -1);
      out += token.replacement;
      i = token.end;
      continue;
    }
    out += text[i];
    i++;
  }
  return out.replace(/\s+/g, ' ').trim().toUpperCase();
}

/** Index of the first `;` outside comments and quoted text, or -1. */
export function firstStatementEnd(text: string): number {
  let i = 0;
  while (i < text.length) {
    const token = opaqueTokenAt(text, i);
    if (token) {
      i = token.end;
      continue;
    }
    if (text[i] === ';') return i;
    i++;
  }
  return -1;
}

export function inspectStatement(text: string): StatementInspection {
  const normalized = normalizeSql(text);
  const statements = normalized
    .split(';')
    .map((s) => s.trim())
    .filter(Boolean);
  const first = statements[0] ?? '';
  const leadingKeyword = /^[(\s]*([A-Z_]+)/.exec(first)?.[1];
  const base = { normalized, statementCount: statements.length, leadingKeyword };

  if (statements.length === 0) return { ...base, readOnly: false, reason: 'no statement' };
  if (statements.length > 1) return { ...base, readOnly: false, reason: 'multiple statements' };
  if (!leadingKeyword || !READ_ONLY_LEADING_KEYWORDS.has(leadingKeyword)) {
    return { ...base, readOnly: false, reason: `${leadingKeyword ?? 'unknown'} statement` };
  }
  for (const [pattern, label] of FORBIDDEN_PATTERNS) {
    if (pattern.test(first)) return { ...base, readOnly: false, reason: label };
  }
  return { ...base, readOnly: true };
}
