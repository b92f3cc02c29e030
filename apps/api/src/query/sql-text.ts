import { firstStatementEnd } from './sql-guard';

/** `WITH name [(cols)] AS (`, so the word "with" in prose does not count. */
const CTE_START = /\bWITH\s+(RECURSIVE\s+)?\w+\s*(\([^)]*\)\s*)?AS\s*\(/i;

/** Cuts `sql` after its first statement-ending semicolon. */
export function truncateAtStatementEnd(sql: string): string {
  const end = firstStatementEnd(sql);
  return (end < 0 ? sql : sql.slice(0, end + 1)).trim();
}

/**
 * Pulls the SQL statement out of a model completion: drops code fences and
 * any prose before the first SELECT/WITH, stops at the end of the first
 * statement, and removes MySQL-style backticks.
 */
export function extractSql(completion: string): string {
  let sqlQuery = completion
    .trim()
    .replace(/^```\w*\n?/i, '')
    .replace(/\n?```$/i, '')
    .trim();
  const selectIndex = sqlQuery.search(/\bSELECT\b/i);
  const withIndex = sqlQuery.search(CTE_START);
  const startIndex =
    selectIndex >= 0 && (withIndex < 0 || selectIndex < withIndex)
      ? selectIndex
      : withIndex >= 0
        ? withIndex
        : -1;
  if (startIndex > 0) {
    sqlQuery = sqlQuery
      .slice(startIndex)
      .replace(/\n?```.*$/s, '')
      .trim();
  }
  return truncateAtStatementEnd(sqlQuery).replace(/`/g, '');
}
