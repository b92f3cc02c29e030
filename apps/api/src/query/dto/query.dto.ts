/**
 * DTOs for query endpoints with validation constraints.
 * Shape checks live in QueryController; statement checks in SqlExecutorService.
 */

/** Max length for natural language query (chars). */
export const MAX_NL_QUERY_LENGTH = 2000;

/** Max length for raw SQL (chars). */
export const MAX_SQL_LENGTH = 50_000;

export class NaturalLanguageQueryDto {
  /** Natural language question to translate to SQL. */
  query!: string;
  /** Session to record the attempt in. */
  sessionId?: string;
}

export class ExecuteSqlDto {
  /** SQL statement to execute (read-only unless mutations are enabled). */
  sql!: string;
  /** Session to record the attempt in. */
  sessionId?: string;
}
