import { randomInt } from 'node:crypto';

import {
  LogisticsTableName,
  LogisticsTableRegistry,
  PACKAGING_TYPE_VALUES,
  formatPackagingNumber,
  type LogisticsRow,
  type LogisticsTableEntry,
  type PackagingType,
  type RowKey,
} from '@mft/shared';

import { logInfo, logWarn } from '../utils/logger.js';
import { ConstraintViolation, DomainViolation, RowNotFoundError, type ConstraintViolationKind } from './constraintErrors.js';
import { ConstraintGuard, parseLogisticsRow } from './constraintGuard.js';
import { DEFAULT_LIST_LIMIT, type LogisticsStore } from './store/logisticsStore.js';

export type LogisticsFailureKind = ConstraintViolationKind | 'not_found';

export type LogisticsFailure = { ok: false; error: string; kind: LogisticsFailureKind; constraint: string | null };

const ID_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const ID_RANDOM_LENGTH = 8;

/** `SUP_x7Kq2MzA`: the table's prefix and eight random letters or digits. */
export function generateRowId(prefix: string): string {
  let out = prefix;
  for (let i = 0; i < ID_RANDOM_LENGTH; i += 1) out += ID_ALPHABET[randomInt(ID_ALPHABET.length)];
  return out;
}

/**
 * Converts the errors of the constraint layer to a failure result.
 * Anything else (database unreachable, programming errors) propagates.
 */
export function toFailure(e: unknown): LogisticsFailure {
  if (e instanceof ConstraintViolation) return { ok: false, error: e.message, kind: e.kind, constraint: e.constraint };
  if (e instanceof RowNotFoundError) return { ok: false, error: e.message, kind: 'not_found', constraint: null };
  throw e;
}

function asPackagingType(v: unknown): PackagingType | null {
  return PACKAGING_TYPE_VALUES.find((t) => t === v) ?? null;
}

function asNumber(v: unknown): number | null {
  return typeof v === 'number' ? v : null;
}

// box_data and pallet_data share one column layout under their own prefix.
function withPackagingNumber(table: LogisticsTableName, row: LogisticsRow): LogisticsRow {
  const prefix = table === LogisticsTableName.Boxes ? 'box' : table === LogisticsTableName.Pallets ? 'pallet' : null;
  if (!prefix) return row;
  const numberColumn = `${prefix}_number`;
  if (row[numberColumn] != null) return row;
  const number = formatPackagingNumber({
    type: asPackagingType(row[`${prefix}_type`]),
    lengthMm: asNumber(row[`${prefix}_length_mm`]),
    widthMm: asNumber(row[`${prefix}_width_mm`]),
    heightMm: asNumber(row[`${prefix}_height_mm`]),
  });
  return number ? { ...row, [numberColumn]: number } : row;
}

function withGeneratedId(entry: LogisticsTableEntry, input: Record<string, unknown>): Record<string, unknown> {
  const idColumn = entry.primaryKey[0];
  if (!entry.idPrefix || !idColumn || input[idColumn] != null) return input;
  return { ...input, [idColumn]: generateRowId(entry.idPrefix) };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export async function createRow(
  store: LogisticsStore,
  args: { table: LogisticsTableName; input: unknown; actor?: string },
): Promise<{ ok: true; row: LogisticsRow } | LogisticsFailure> {
  const entry = LogisticsTableRegistry.require(args.table);
  try {
    if (!isRecord(args.input)) throw new DomainViolation(`${args.table}: row must be an object`, args.table);
    const parsed = parseLogisticsRow(entry, withGeneratedId(entry, args.input));
    const row = await new ConstraintGuard(store).create(args.table, withPackagingNumber(args.table, parsed));
    logInfo('logistics row created', {
      table: args.table,
      key: LogisticsTableRegistry.formatKey(entry, LogisticsTableRegistry.keyOf(entry, row) ?? []),
      actor: args.actor ?? null,
    });
    return { ok: true, row };
  } catch (e) {
    const failure = toFailure(e);
    logWarn('logistics create rejected', { table: args.table, kind: failure.kind, error: failure.error });
    return failure;
  }
}

export async function updateRow(
  store: LogisticsStore,
  args: { table: LogisticsTableName; key: RowKey; patch: unknown; actor?: string },
): Promise<{ ok: true; row: LogisticsRow } | LogisticsFailure> {
  const entry = LogisticsTableRegistry.require(args.table);
  try {
    const row = await new ConstraintGuard(store).update(args.table, args.key, args.patch);
    logInfo('logistics row updated', {
      table: args.table,
      key: LogisticsTableRegistry.formatKey(entry, args.key),
      actor: args.actor ?? null,
    });
    return { ok: true, row };
  } catch (e) {
    const failure = toFailure(e);
    logWarn('logistics update rejected', { table: args.table, kind: failure.kind, error: failure.error });
    return failure;
  }
}

export async function deleteRow(
  store: LogisticsStore,
  args: { table: LogisticsTableName; key: RowKey; actor?: string },
): Promise<{ ok: true } | LogisticsFailure> {
  const entry = LogisticsTableRegistry.require(args.table);
  try {
    await new ConstraintGuard(store).delete(args.table, args.key);
    logInfo('logistics row deleted', {
      table: args.table,
      key: LogisticsTableRegistry.formatKey(entry, args.key),
      actor: args.actor ?? null,
    });
    return { ok: true };
  } catch (e) {
    const failure = toFailure(e);
    logWarn('logistics delete rejected', { table: args.table, kind: failure.kind, error: failure.error });
    return failure;
  }
}

export async function getRow(
  store: LogisticsStore,
  args: { table: LogisticsTableName; key: RowKey },
): Promise<{ ok: true; row: LogisticsRow } | LogisticsFailure> {
  const entry = LogisticsTableRegistry.require(args.table);
  if (args.key.length !== entry.primaryKey.length) {
    return {
      ok: false,
      error: `${args.table}: key must have ${entry.primaryKey.length} part(s) (${entry.primaryKey.join(', ')})`,
      kind: 'domain',
      constraint: null,
    };
  }
  const row = await store.find(args.table, args.key);
  if (!row) {
    return {
      ok: false,
      error: new RowNotFoundError(args.table, LogisticsTableRegistry.formatKey(entry, args.key)).message,
      kind: 'not_found',
      constraint: null,
    };
  }
  return { ok: true, row };
}

export async function listRows(
  store: LogisticsStore,
  args: { table: LogisticsTableName; limit?: number },
): Promise<{ ok: true; rows: LogisticsRow[] }> {
  const limit = Math.max(1, Math.min(args.limit ?? DEFAULT_LIST_LIMIT, 5000));
  const rows = await store.list(args.table, { limit });
  return { ok: true, rows };
}
