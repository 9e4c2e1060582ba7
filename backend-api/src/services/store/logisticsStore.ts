import type { LogisticsRow, LogisticsTableName, RowKey } from '@mft/shared';

/**
 * Row storage behind the constraint layer. Rows are keyed by column name as in the registry;
 * keys are primary-key values in registry order.
 *
 * A store does not validate: the constraint guard does, inside `transaction`.
 */
export interface LogisticsStore {
  find(table: LogisticsTableName, key: RowKey): Promise<LogisticsRow | null>;
  list(table: LogisticsTableName, opts?: { limit?: number }): Promise<LogisticsRow[]>;
  /** Rows of `table` whose `columns` equal `values`. */
  findBy(
    table: LogisticsTableName,
    columns: readonly string[],
    values: readonly unknown[],
    opts?: { limit?: number },
  ): Promise<LogisticsRow[]>;
  /** Columns absent from `row` take their column default. */
  insert(table: LogisticsTableName, row: LogisticsRow): Promise<LogisticsRow>;
  update(table: LogisticsTableName, key: RowKey, patch: LogisticsRow): Promise<LogisticsRow | null>;
  delete(table: LogisticsTableName, key: RowKey): Promise<boolean>;
  /** Runs `fn` atomically. Nested calls join the outer transaction. */
  transaction<T>(fn: (tx: LogisticsStore) => Promise<T>): Promise<T>;
}

export const DEFAULT_LIST_LIMIT = 500;
