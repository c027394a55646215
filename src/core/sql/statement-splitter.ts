export const STATEMENT_SEPARATOR = ';';

/**
 * Splits raw SQL into trimmed, non-empty statements.
 *
 * Splitting is purely lexical on `;`: a semicolon inside a string literal,
 * comment or function body is still treated as a separator. Do not send
 * such statements through multi-statement mode.
 *
 * @param sql - Raw SQL, possibly holding several statements
 * @returns Statements in source order; empty when `sql` has none
 */
export const splitStatements = (sql: string): string[] =>
  sql
    .split(STATEMENT_SEPARATOR)
    .map(statement => statement.trim())
    .filter(statement => statement.length > 0);
