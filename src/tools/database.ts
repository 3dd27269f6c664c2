/**
 * @fileoverview Read-only database tools.
 *
 * These give the model schema discovery and SELECT access to the audit
 * database. Every outcome, including driver errors, is rendered as text.
 *
 * @module sql-audit-agent/tools/database
 * @version 0.1.0
 */

import { z } from 'zod';
import type { ToolDefinition } from '../types/tools.types.js';
import { ToolKind } from '../types/tools.types.js';
import { describeError } from '../errors.js';
import { defineTool } from './define-tool.js';
import type { SqlClient } from './sql-client.js';

const MAX_ROWS = 20;

// Whole words only: created_at is not CREATE.
const FORBIDDEN_KEYWORDS = /\b(INSERT|UPDATE|DELETE|DROP|ALTER|CREATE|TRUNCATE|GRANT)\b/;

const LIST_TABLES_SQL =
  "SELECT table_name FROM information_schema.tables WHERE table_schema = 'public' ORDER BY table_name";

const TABLE_SCHEMA_SQL =
  'SELECT column_name, data_type, is_nullable FROM information_schema.columns ' +
  'WHERE table_name = $1 ORDER BY ordinal_position';

const DISTINCT_STATUSES_SQL = 'SELECT DISTINCT status FROM audit_events WHERE status IS NOT NULL;';

const USER_EXISTS_SQL = 'SELECT 1 FROM audit_events WHERE user_id = $1 LIMIT 1';

/**
 * Renders one cell the way the result table shows it.
 */
export function formatCell(cell: unknown): string {
  if (cell === null || cell === undefined) return 'NULL';
  if (cell instanceof Date) return cell.toISOString();
  if (typeof cell === 'object') return JSON.stringify(cell);
  return String(cell);
}

/**
 * Runs a SELECT and renders up to {@link MAX_ROWS} rows as a pipe table.
 */
export async function queryPostgres(sql: SqlClient, query: string): Promise<string> {
  const upper = query.trim().toUpperCase();
  if (!upper.startsWith('SELECT')) {
    return 'Error: Only SELECT queries are allowed.';
  }
  if (FORBIDDEN_KEYWORDS.test(upper)) {
    return 'Error: Write operations or schema changes are not permitted.';
  }

  try {
    const { columns, rows } = await sql.query(query);
    if (rows.length === 0) {
      return 'Query returned no rows.';
    }

    const header = columns.join(' | ');
    const lines = [header, '-'.repeat(header.length)];
    for (const row of rows.slice(0, MAX_ROWS)) {
      lines.push(row.map(formatCell).join(' | '));
    }
    if (rows.length > MAX_ROWS) {
      lines.push(`... and ${rows.length - MAX_ROWS} more rows.`);
    }
    return lines.join('\n');
  } catch (error) {
    return `Database error: ${describeError(error)}`;
  }
}

export async function listTables(sql: SqlClient): Promise<string> {
  try {
    const { rows } = await sql.query(LIST_TABLES_SQL);
    if (rows.length === 0) {
      return 'No tables found in public schema.';
    }
    return `Available tables: ${rows.map((row) => formatCell(row[0])).join(', ')}`;
  } catch (error) {
    return `Error listing tables: ${describeError(error)}`;
  }
}

export async function getTableSchema(sql: SqlClient, tableName: string): Promise<string> {
  try {
    const { rows } = await sql.query(TABLE_SCHEMA_SQL, [tableName]);
    if (rows.length === 0) {
      return `Table '${tableName}' not found or no access.`;
    }

    const lines = [`Schema for '${tableName}':`, 'Column | Type | Nullable', '------|------|---------'];
    for (const [column, type, nullable] of rows) {
      lines.push(`${formatCell(column)} | ${formatCell(type)} | ${formatCell(nullable)}`);
    }
    return lines.join('\n');
  } catch (error) {
    return `Error getting schema: ${describeError(error)}`;
  }
}

/**
 * Whether the audit log holds at least one event for the user.
 * Lookup failures count as "no".
 */
export async function userExists(sql: SqlClient, userId: string): Promise<boolean> {
  try {
    const { rows } = await sql.query(USER_EXISTS_SQL, [userId]);
    return rows.length > 0;
  } catch {
    return false;
  }
}

/**
 * Creates the read-only query tools.
 */
export function createDatabaseTools(sql: SqlClient): ToolDefinition[] {
  return [
    defineTool({
      name: 'list_tables',
      kind: ToolKind.QUERY,
      description: 'List all tables. Call this first if unsure what exists.',
      parameters: [],
      schema: z.object({}),
      execute: () => listTables(sql),
    }),
    defineTool({
      name: 'get_table_schema',
      kind: ToolKind.QUERY,
      description: 'Get columns before writing any SQL.',
      parameters: [{ name: 'table_name', description: 'Table to describe' }],
      schema: z.object({ table_name: z.string().min(1) }),
      execute: ({ table_name }) => getTableSchema(sql, table_name),
    }),
    defineTool({
      name: 'query_postgres',
      kind: ToolKind.QUERY,
      description: 'Execute a SELECT query. Always include LIMIT.',
      parameters: [{ name: 'query', description: 'A single SELECT statement' }],
      schema: z.object({ query: z.string().min(1) }),
      execute: ({ query }) => queryPostgres(sql, query),
    }),
    defineTool({
      name: 'get_distinct_statuses',
      kind: ToolKind.QUERY,
      description: 'Get valid status values from audit_events.',
      parameters: [],
      schema: z.object({}),
      execute: () => queryPostgres(sql, DISTINCT_STATUSES_SQL),
    }),
  ];
}
