/**
 * @fileoverview Tools module public exports.
 *
 * @module sql-audit-agent/tools
 * @version 0.1.0
 */

import type { ToolDefinition } from '../types/tools.types.js';
import { createActionTools, type ActionToolDeps } from './actions.js';
import { createDatabaseTools } from './database.js';

export { ToolRegistry, type ToolRegistryEvents } from './tool-registry.js';
export { defineTool, bindArguments, formatSignature } from './define-tool.js';
export {
  createDatabaseTools,
  queryPostgres,
  listTables,
  getTableSchema,
  userExists,
  formatCell,
} from './database.js';
export { createActionTools, formatStamp, type ActionToolDeps } from './actions.js';
export { PgSqlClient, type SqlClient, type SqlResult, type PgConnectionConfig } from './sql-client.js';
export { createSmtpTransport, type MailTransport, type MailMessage, type SmtpSettings } from './mailer.js';

/**
 * The full audit tool set: query tools first, then actions.
 */
export function createAuditTools(deps: ActionToolDeps): ToolDefinition[] {
  return [...createDatabaseTools(deps.sql), ...createActionTools(deps)];
}
