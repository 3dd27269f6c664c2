/**
 * @fileoverview In-process stand-ins for the database and mail server,
 * used by tests and the offline example.
 *
 * @module sql-audit-agent/testing/fakes
 * @version 0.1.0
 */

import type { SqlClient, SqlResult } from '../tools/sql-client.js';
import type { MailMessage, MailTransport } from '../tools/mailer.js';

export interface RecordedQuery {
  readonly text: string;
  readonly params: ReadonlyArray<unknown>;
}

export type QueryHandler = (text: string, params: ReadonlyArray<unknown>) => SqlResult;

/**
 * A SqlClient whose answers come from a handler. A handler that throws
 * makes the query reject.
 */
export class FakeSqlClient implements SqlClient {
  readonly calls: RecordedQuery[] = [];

  constructor(private readonly handler: QueryHandler) {}

  async query(text: string, params: ReadonlyArray<unknown> = []): Promise<SqlResult> {
    this.calls.push({ text, params });
    return this.handler(text, params);
  }
}

const EMPTY: SqlResult = { columns: [], rows: [] };

/**
 * A tiny audit database: an `audit_events` table keyed by user id, plus
 * the information_schema lookups the query tools make.
 */
export function createAuditDatabase(knownUsers: ReadonlyArray<string>): FakeSqlClient {
  return new FakeSqlClient((text, params) => {
    if (text.includes('FROM audit_events WHERE user_id')) {
      return knownUsers.includes(String(params[0]))
        ? { columns: ['?column?'], rows: [[1]] }
        : EMPTY;
    }
    if (text.includes('information_schema.tables')) {
      return { columns: ['table_name'], rows: [['audit_events']] };
    }
    if (text.includes('information_schema.columns')) {
      return params[0] === 'audit_events'
        ? {
            columns: ['column_name', 'data_type', 'is_nullable'],
            rows: [
              ['user_id', 'text', 'NO'],
              ['status', 'text', 'YES'],
            ],
          }
        : EMPTY;
    }
    return EMPTY;
  });
}

/**
 * A MailTransport that keeps every message.
 */
export class FakeMailTransport implements MailTransport {
  readonly sent: MailMessage[] = [];

  async sendMail(message: MailMessage): Promise<unknown> {
    this.sent.push(message);
    return { messageId: `fake-${this.sent.length}` };
  }
}
