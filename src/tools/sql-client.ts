/**
 * @fileoverview SQL access for the query tools.
 *
 * Tools depend on the small {@link SqlClient} interface; the production
 * implementation opens a fresh `pg` connection per query and always closes it.
 *
 * @module sql-audit-agent/tools/sql-client
 * @version 0.1.0
 */

import pg from 'pg';

/**
 * Rows in column order, plus the column names.
 */
export interface SqlResult {
  readonly columns: ReadonlyArray<string>;
  readonly rows: ReadonlyArray<ReadonlyArray<unknown>>;
}

export interface SqlClient {
  query(text: string, params?: ReadonlyArray<unknown>): Promise<SqlResult>;
}

export interface PgConnectionConfig {
  readonly host: string;
  readonly port: number;
  readonly database: string;
  readonly user: string;
  readonly password: string;
}

/**
 * PostgreSQL client with one connection per query.
 */
export class PgSqlClient implements SqlClient {
  constructor(private readonly connection: PgConnectionConfig) {}

  async query(text: string, params: ReadonlyArray<unknown> = []): Promise<SqlResult> {
    const client = new pg.Client({ ...this.connection });
    await client.connect();

    try {
      const result = await client.query({
        text,
        values: [...params],
        rowMode: 'array',
      });
      return {
        columns: result.fields.map((field) => field.name),
        rows: result.rows,
      };
    } finally {
      await client.end();
    }
  }
}
