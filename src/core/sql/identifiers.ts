import { InvalidIdentifierError } from '../errors.js';

export const DEFAULT_SCHEMA = 'public';

/**
 * A `(schema, table)` pair identifying a relation.
 */
export interface QualifiedName {
  schema: string;
  table: string;
}

const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Keywords that always get quoted even though they look like plain identifiers.
 * Extend with {@link registerReservedWord}.
 */
const reservedWords = new Set<string>([
  'select',
  'from',
  'where',
  'insert',
  'update',
  'delete',
  'create',
  'drop',
  'alter'
]);

export const registerReservedWord = (...words: string[]): void => {
  for (const word of words) {
    reservedWords.add(word.toLowerCase());
  }
};

export const isReservedWord = (name: string): boolean => reservedWords.has(name.toLowerCase());

/**
 * Escapes a single identifier for interpolation into generated SQL.
 *
 * Plain, non-reserved names pass through unchanged; anything else is wrapped in
 * double quotes with embedded quotes doubled. Every schema, table and column
 * name placed in generated SQL text must go through here.
 */
export const escapeIdentifier = (name: string): string => {
  if (PLAIN_IDENTIFIER.test(name) && !isReservedWord(name)) {
    return name;
  }
  return `"${name.replace(/"/g, '""')}"`;
};

/**
 * The name as the server stores it once {@link escapeIdentifier} has put it
 * into DDL: unquoted names are folded to lower case, quoted ones are kept.
 * Use it for every catalog lookup by name.
 */
export const catalogName = (name: string): string =>
  escapeIdentifier(name) === name ? name.toLowerCase() : name;

const stripQuotes = (part: string): string => {
  const trimmed = part.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/""/g, '"');
  }
  return trimmed;
};

/**
 * Resolves `"schema.table"` or a bare `"table"` into a {@link QualifiedName}.
 *
 * @param raw - The name as supplied by the caller
 * @param defaultSchema - Schema used when `raw` carries none
 * @throws InvalidIdentifierError when `raw` has more than one dot or an empty part
 */
export const parseQualifiedName = (raw: string, defaultSchema: string = DEFAULT_SCHEMA): QualifiedName => {
  const parts = raw.split('.');
  if (parts.length > 2) {
    throw new InvalidIdentifierError(raw, 'expected "table" or "schema.table"');
  }

  const [schema, table] = parts.length === 2
    ? [stripQuotes(parts[0]), stripQuotes(parts[1])]
    : [defaultSchema, stripQuotes(parts[0])];

  if (!schema) {
    throw new InvalidIdentifierError(raw, 'schema name is empty');
  }
  if (!table) {
    throw new InvalidIdentifierError(raw, 'table name is empty');
  }
  return { schema, table };
};

/**
 * Renders an escaped `schema.table` reference.
 */
export const formatQualifiedName = (name: QualifiedName): string =>
  `${escapeIdentifier(name.schema)}.${escapeIdentifier(name.table)}`;

/**
 * Resolves either a qualified name, or a bare table plus an explicit schema.
 * A schema inside `name` wins over `schema`.
 */
export const resolveTableName = (name: string, schema?: string): QualifiedName =>
  parseQualifiedName(name, schema ?? DEFAULT_SCHEMA);
