import { getTableColumns, sql, type SQL } from 'drizzle-orm';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgColumn, PgDatabase, PgTable } from 'drizzle-orm/pg-core';

import { LogisticsTableRegistry, type LogisticsRow, type LogisticsTableName, type RowKey } from '@mft/shared';

import { logisticsTables } from '../../database/schema.js';
import { fromPgError } from '../constraintErrors.js';
import { DEFAULT_LIST_LIMIT, type LogisticsStore } from './logisticsStore.js';

type PgExecutor = PgDatabase<NodePgQueryResultHKT>;

function columnsByName(table: PgTable): Map<string, PgColumn> {
  return new Map(Object.values(getTableColumns(table)).map((c) => [c.name, c]));
}

const COLUMNS = new Map<LogisticsTableName, Map<string, PgColumn>>(
  LogisticsTableRegistry.tableNames().map((name) => [name, columnsByName(logisticsTables[name])]),
);

function column(table: LogisticsTableName, name: string): PgColumn {
  const col = COLUMNS.get(table)?.get(name);
  if (!col) throw new Error(`Unknown column ${table}.${name}`);
  return col;
}

function whereEquals(table: LogisticsTableName, columns: readonly string[], values: readonly unknown[]): SQL {
  return sql.join(
    columns.map((c, i) => sql`${column(table, c)} = ${values[i]}`),
    sql` and `,
  );
}

function whereKey(table: LogisticsTableName, key: RowKey): SQL {
  return whereEquals(table, LogisticsTableRegistry.require(table).primaryKey, key);
}

// numeric comes back from node-postgres as a string.
function decodeRow(table: LogisticsTableName, raw: Record<string, unknown>): LogisticsRow {
  const entry = LogisticsTableRegistry.require(table);
  const row: LogisticsRow = { ...raw };
  for (const col of entry.decimalColumns) {
    const v = row[col];
    if (typeof v === 'string') row[col] = Number(v);
  }
  return row;
}

/** LogisticsStore over PostgreSQL. Table and column names come from the drizzle schema. */
export class PgLogisticsStore implements LogisticsStore {
  constructor(
    private readonly executor: PgExecutor,
    private readonly inTransaction = false,
  ) {}

  private async run(table: LogisticsTableName, query: SQL): Promise<LogisticsRow[]> {
    try {
      const result = await this.executor.execute<Record<string, unknown>>(query);
      return result.rows.map((r) => decodeRow(table, r));
    } catch (e) {
      throw fromPgError(e, table) ?? e;
    }
  }

  async find(table: LogisticsTableName, key: RowKey): Promise<LogisticsRow | null> {
    const rows = await this.run(table, sql`select * from ${logisticsTables[table]} where ${whereKey(table, key)} limit 1`);
    return rows[0] ?? null;
  }

  async list(table: LogisticsTableName, opts?: { limit?: number }): Promise<LogisticsRow[]> {
    const entry = LogisticsTableRegistry.require(table);
    const orderBy = sql.join(
      entry.primaryKey.map((c) => sql`${column(table, c)}`),
      sql`, `,
    );
    const limit = opts?.limit ?? DEFAULT_LIST_LIMIT;
    return await this.run(table, sql`select * from ${logisticsTables[table]} order by ${orderBy} limit ${limit}`);
  }

  async findBy(
    table: LogisticsTableName,
    columns: readonly string[],
    values: readonly unknown[],
    opts?: { limit?: number },
  ): Promise<LogisticsRow[]> {
    const limit = opts?.limit ?? DEFAULT_LIST_LIMIT;
    return await this.run(
      table,
      sql`select * from ${logisticsTables[table]} where ${whereEquals(table, columns, values)} limit ${limit}`,
    );
  }

  async insert(table: LogisticsTableName, row: LogisticsRow): Promise<LogisticsRow> {
    const names = Object.keys(row).filter((c) => row[c] !== undefined);
    const cols = sql.join(
      names.map((c) => sql.identifier(column(table, c).name)),
      sql`, `,
    );
    const values = sql.join(
      names.map((c) => sql`${row[c]}`),
      sql`, `,
    );
    const rows = await this.run(table, sql`insert into ${logisticsTables[table]} (${cols}) values (${values}) returning *`);
    const inserted = rows[0];
    if (!inserted) throw new Error(`insert into ${table} returned no row`);
    return inserted;
  }

  async update(table: LogisticsTableName, key: RowKey, patch: LogisticsRow): Promise<LogisticsRow | null> {
    const names = Object.keys(patch).filter((c) => patch[c] !== undefined);
    if (names.length === 0) return await this.find(table, key);
    const sets = sql.join(
      names.map((c) => sql`${sql.identifier(column(table, c).name)} = ${patch[c]}`),
      sql`, `,
    );
    const rows = await this.run(
      table,
      sql`update ${logisticsTables[table]} set ${sets} where ${whereKey(table, key)} returning *`,
    );
    return rows[0] ?? null;
  }

  async delete(table: LogisticsTableName, key: RowKey): Promise<boolean> {
    const rows = await this.run(table, sql`delete from ${logisticsTables[table]} where ${whereKey(table, key)} returning *`);
    return rows.length > 0;
  }

  async transaction<T>(fn: (tx: LogisticsStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) return await fn(this);
    return await this.executor.transaction(async (tx) => await fn(new PgLogisticsStore(tx, true)));
  }
}
