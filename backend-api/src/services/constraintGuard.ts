import type { ZodIssue } from 'zod';

import {
  LogisticsTableRegistry,
  type ForeignKey,
  type LogisticsRow,
  type LogisticsTableEntry,
  type LogisticsTableName,
  type RowKey,
} from '@mft/shared';

import { DomainViolation, ReferentialIntegrityViolation, RowNotFoundError, UniquenessViolation } from './constraintErrors.js';
import type { LogisticsStore } from './store/logisticsStore.js';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v) && !(v instanceof Date);
}

function describeIssue(table: LogisticsTableName, issue: ZodIssue): string {
  const where = issue.path.length > 0 ? `${table}.${issue.path.join('.')}` : table;
  return `${where}: ${issue.message}`;
}

/**
 * Parses a row against the table's column domains (enumerations, lengths, numeric ranges).
 * Unknown columns are rejected. Throws DomainViolation.
 */
export function parseLogisticsRow(entry: LogisticsTableEntry, input: unknown): LogisticsRow {
  if (!isRecord(input)) throw new DomainViolation(`${entry.name}: row must be an object`, entry.name);
  const parsed = entry.schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const column = issue?.path[0];
    throw new DomainViolation(
      issue ? describeIssue(entry.name, issue) : `${entry.name}: invalid row`,
      entry.name,
      typeof column === 'string' ? column : null,
    );
  }
  return parsed.data;
}

function applyDefaults(entry: LogisticsTableEntry, input: Record<string, unknown>): Record<string, unknown> {
  const out = { ...input };
  for (const [column, make] of Object.entries(entry.defaults)) {
    if (out[column] === undefined) out[column] = make();
  }
  return out;
}

function assertChecks(entry: LogisticsTableEntry, row: LogisticsRow) {
  for (const check of entry.checks) {
    if (!check.test(row)) {
      throw new DomainViolation(`${entry.name}: check ${check.name} failed (${check.description})`, entry.name, check.name);
    }
  }
}

// MATCH SIMPLE: a key with any NULL column is not checked.
function referencedKey(key: ForeignKey, row: LogisticsRow): RowKey | null {
  const out: string[] = [];
  for (const col of key.columns) {
    const v = row[col];
    if (typeof v !== 'string') return null;
    out.push(v);
  }
  return out;
}

function requireKey(entry: LogisticsTableEntry, key: RowKey) {
  if (key.length !== entry.primaryKey.length || key.some((v) => v.length === 0)) {
    throw new DomainViolation(
      `${entry.name}: key must have ${entry.primaryKey.length} part(s) (${entry.primaryKey.join(', ')})`,
      entry.name,
    );
  }
}

/**
 * Enforces the logistics schema on every write before it reaches the store:
 * column domains and check constraints (DomainViolation), primary keys (UniquenessViolation),
 * foreign keys and restrict-on-delete (ReferentialIntegrityViolation).
 *
 * Each write runs in one store transaction with its checks. Errors from the database itself
 * (a concurrent writer) are translated by the store to the same classes.
 */
export class ConstraintGuard {
  constructor(private readonly store: LogisticsStore) {}

  async create(table: LogisticsTableName, input: unknown): Promise<LogisticsRow> {
    const entry = LogisticsTableRegistry.require(table);
    const row = parseLogisticsRow(entry, isRecord(input) ? applyDefaults(entry, input) : input);
    assertChecks(entry, row);
    const key = LogisticsTableRegistry.keyOf(entry, row);
    if (!key) throw new DomainViolation(`${table}: primary key is missing`, table);

    return await this.store.transaction(async (tx) => {
      if (await tx.find(table, key)) {
        throw new UniquenessViolation(
          `${table}: duplicate key (${LogisticsTableRegistry.formatKey(entry, key)})`,
          table,
          LogisticsTableRegistry.primaryKeyName(table),
        );
      }
      await this.assertReferences(tx, entry, row);
      return await tx.insert(table, row);
    });
  }

  /** Patches non-key columns of an existing row; the merged row is validated as a whole. */
  async update(table: LogisticsTableName, key: RowKey, patch: unknown): Promise<LogisticsRow> {
    const entry = LogisticsTableRegistry.require(table);
    requireKey(entry, key);
    if (!isRecord(patch)) throw new DomainViolation(`${table}: patch must be an object`, table);
    const fields = patch;
    entry.primaryKey.forEach((col, i) => {
      const v = fields[col];
      if (v !== undefined && v !== key[i]) {
        throw new DomainViolation(`${table}.${col}: primary key columns cannot be changed`, table, col);
      }
    });

    return await this.store.transaction(async (tx) => {
      const existing = await tx.find(table, key);
      if (!existing) throw new RowNotFoundError(table, LogisticsTableRegistry.formatKey(entry, key));

      const merged = parseLogisticsRow(entry, { ...existing, ...fields });
      assertChecks(entry, merged);
      await this.assertReferences(tx, entry, merged);

      const changes: LogisticsRow = {};
      for (const col of Object.keys(fields)) {
        if (fields[col] !== undefined && !entry.primaryKey.includes(col)) changes[col] = merged[col];
      }
      const updated = await tx.update(table, key, changes);
      if (!updated) throw new RowNotFoundError(table, LogisticsTableRegistry.formatKey(entry, key));
      return updated;
    });
  }

  /** Restrict semantics: a row that is still referenced cannot be deleted. */
  async delete(table: LogisticsTableName, key: RowKey): Promise<void> {
    const entry = LogisticsTableRegistry.require(table);
    requireKey(entry, key);

    await this.store.transaction(async (tx) => {
      const existing = await tx.find(table, key);
      if (!existing) throw new RowNotFoundError(table, LogisticsTableRegistry.formatKey(entry, key));

      for (const ref of LogisticsTableRegistry.referencedBy(table)) {
        const values = ref.referencedColumns.map((c) => existing[c]);
        const referencing = await tx.findBy(ref.table, ref.columns, values, { limit: 1 });
        if (referencing.length > 0) {
          throw new ReferentialIntegrityViolation(
            `${table} (${LogisticsTableRegistry.formatKey(entry, key)}) is still referenced by ${ref.table}`,
            table,
            LogisticsTableRegistry.foreignKeyName(ref.table, ref),
          );
        }
      }
      await tx.delete(table, key);
    });
  }

  private async assertReferences(tx: LogisticsStore, entry: LogisticsTableEntry, row: LogisticsRow) {
    for (const fk of entry.foreignKeys) {
      const key = referencedKey(fk, row);
      if (!key) continue;
      if (await tx.find(fk.references, key)) continue;
      throw new ReferentialIntegrityViolation(
        `${entry.name}.${fk.columns.join(', ')}: no ${fk.references} row with ${fk.referencedColumns
          .map((c, i) => `${c}=${key[i] ?? ''}`)
          .join(', ')}`,
        entry.name,
        LogisticsTableRegistry.foreignKeyName(entry.name, fk),
      );
    }
  }
}
