/**
 * LogisticsTableRegistry -- the single source of truth for the logistics schema.
 *
 * Centralizes per table:
 *  - the zod row schema (column domains and enumerations)
 *  - the column list, primary key and foreign keys
 *  - check constraints
 *  - the dependency order (referenced tables first)
 *
 * The server's constraint layer, its stores and the API read the schema from here only.
 */
import type { z } from 'zod';

import { LogisticsTableName } from './tables.js';
import {
  boxRowSchema,
  boxToPalletRowSchema,
  breakpointRowSchema,
  lineRowSchema,
  modelRowSchema,
  palletRowSchema,
  partRowSchema,
  partToBoxRowSchema,
  partToBreakpointRowSchema,
  partToLineRowSchema,
  partToModelRowSchema,
  supplierRowSchema,
  workshopRowSchema,
} from './dto.js';

// ────────────────────────────────────────────────────────────
// Types
// ────────────────────────────────────────────────────────────

/** A row keyed by column name. */
export type LogisticsRow = Record<string, unknown>;

/** Primary-key values in the order of `primaryKey`. */
export type RowKey = readonly string[];

export type ForeignKey = {
  columns: readonly string[];
  references: LogisticsTableName;
  referencedColumns: readonly string[];
};

export type CheckConstraint = {
  name: string;
  /** SQL semantics: a check over NULL operands passes. */
  test: (row: LogisticsRow) => boolean;
  description: string;
};

export type LogisticsTableKind = 'entity' | 'association';

export type LogisticsTableEntry = {
  name: LogisticsTableName;
  kind: LogisticsTableKind;
  schema: z.AnyZodObject;
  columns: readonly string[];
  primaryKey: readonly string[];
  foreignKeys: readonly ForeignKey[];
  checks: readonly CheckConstraint[];
  /** numeric(5,2) columns; the pg driver returns them as strings. */
  decimalColumns: readonly string[];
  /** Prefix of generated ids (entities only). */
  idPrefix: string | null;
  /** Column defaults applied on insert when the column is omitted (an explicit null stays null). */
  defaults: Readonly<Record<string, () => unknown>>;
};

// ────────────────────────────────────────────────────────────
// Helpers
// ────────────────────────────────────────────────────────────

function fk(column: string, references: LogisticsTableName, referencedColumn = column): ForeignKey {
  return { columns: [column], references, referencedColumns: [referencedColumn] };
}

function nonNegative(v: unknown): boolean {
  return v == null || (typeof v === 'number' && v >= 0);
}

function positiveVolumeArea(prefix: 'box' | 'pallet'): CheckConstraint {
  const vol = `${prefix}_vol_m3`;
  const area = `${prefix}_area_m2`;
  return {
    name: `chk_positive_${prefix}_volume_area`,
    test: (row) => nonNegative(row[vol]) && nonNegative(row[area]),
    description: `${vol} >= 0 AND ${area} >= 0`,
  };
}

function columnsOf(schema: z.AnyZodObject): readonly string[] {
  return Object.keys(schema.shape);
}

// ────────────────────────────────────────────────────────────
// Registry entries (dependency-safe order)
// ────────────────────────────────────────────────────────────

const ENTRIES: readonly LogisticsTableEntry[] = [
  {
    name: LogisticsTableName.Suppliers,
    kind: 'entity',
    schema: supplierRowSchema,
    columns: columnsOf(supplierRowSchema),
    primaryKey: ['supplier_id'],
    foreignKeys: [],
    checks: [],
    decimalColumns: [],
    idPrefix: 'SUP_',
    defaults: {},
  },
  {
    name: LogisticsTableName.Parts,
    kind: 'entity',
    schema: partRowSchema,
    columns: columnsOf(partRowSchema),
    primaryKey: ['part_id'],
    foreignKeys: [fk('supplier_id', LogisticsTableName.Suppliers)],
    checks: [],
    decimalColumns: ['part_weight_kg'],
    idPrefix: 'PRT_',
    defaults: {},
  },
  {
    name: LogisticsTableName.Boxes,
    kind: 'entity',
    schema: boxRowSchema,
    columns: columnsOf(boxRowSchema),
    primaryKey: ['box_id'],
    foreignKeys: [],
    checks: [positiveVolumeArea('box')],
    decimalColumns: ['box_weight_kg', 'box_vol_m3', 'box_area_m2'],
    idPrefix: 'BOX_',
    defaults: {},
  },
  {
    name: LogisticsTableName.Pallets,
    kind: 'entity',
    schema: palletRowSchema,
    columns: columnsOf(palletRowSchema),
    primaryKey: ['pallet_id'],
    foreignKeys: [],
    checks: [positiveVolumeArea('pallet')],
    decimalColumns: ['pallet_weight_kg', 'pallet_vol_m3', 'pallet_area_m2'],
    idPrefix: 'PLT_',
    defaults: {},
  },
  {
    name: LogisticsTableName.Models,
    kind: 'entity',
    schema: modelRowSchema,
    columns: columnsOf(modelRowSchema),
    primaryKey: ['model_id'],
    foreignKeys: [],
    checks: [],
    decimalColumns: [],
    idPrefix: 'MDL_',
    defaults: {},
  },
  {
    name: LogisticsTableName.Workshops,
    kind: 'entity',
    schema: workshopRowSchema,
    columns: columnsOf(workshopRowSchema),
    primaryKey: ['workshop_id'],
    foreignKeys: [],
    checks: [],
    decimalColumns: [],
    idPrefix: 'WSP_',
    defaults: {},
  },
  {
    name: LogisticsTableName.Lines,
    kind: 'entity',
    schema: lineRowSchema,
    columns: columnsOf(lineRowSchema),
    primaryKey: ['line_id'],
    foreignKeys: [fk('workshop_id', LogisticsTableName.Workshops)],
    checks: [],
    decimalColumns: [],
    idPrefix: 'LNE_',
    defaults: {},
  },
  {
    name: LogisticsTableName.Breakpoints,
    kind: 'entity',
    schema: breakpointRowSchema,
    columns: columnsOf(breakpointRowSchema),
    primaryKey: ['breakpoint_id'],
    foreignKeys: [],
    checks: [],
    decimalColumns: [],
    idPrefix: 'BPT_',
    defaults: { input_date: () => new Date() },
  },
  {
    name: LogisticsTableName.PartToBox,
    kind: 'association',
    schema: partToBoxRowSchema,
    columns: columnsOf(partToBoxRowSchema),
    primaryKey: ['part_id', 'box_id'],
    foreignKeys: [fk('part_id', LogisticsTableName.Parts), fk('box_id', LogisticsTableName.Boxes)],
    checks: [],
    decimalColumns: [],
    idPrefix: null,
    defaults: {},
  },
  {
    name: LogisticsTableName.BoxToPallet,
    kind: 'association',
    schema: boxToPalletRowSchema,
    columns: columnsOf(boxToPalletRowSchema),
    primaryKey: ['box_id', 'pallet_id'],
    foreignKeys: [fk('box_id', LogisticsTableName.Boxes), fk('pallet_id', LogisticsTableName.Pallets)],
    checks: [],
    decimalColumns: [],
    idPrefix: null,
    defaults: {},
  },
  {
    name: LogisticsTableName.PartToModel,
    kind: 'association',
    schema: partToModelRowSchema,
    columns: columnsOf(partToModelRowSchema),
    primaryKey: ['part_id', 'model_id'],
    foreignKeys: [fk('part_id', LogisticsTableName.Parts), fk('model_id', LogisticsTableName.Models)],
    checks: [],
    decimalColumns: [],
    idPrefix: null,
    defaults: {},
  },
  {
    name: LogisticsTableName.PartToLine,
    kind: 'association',
    schema: partToLineRowSchema,
    columns: columnsOf(partToLineRowSchema),
    primaryKey: ['part_id', 'line_id'],
    foreignKeys: [fk('part_id', LogisticsTableName.Parts), fk('line_id', LogisticsTableName.Lines)],
    checks: [],
    decimalColumns: [],
    idPrefix: null,
    defaults: {},
  },
  {
    name: LogisticsTableName.PartToBreakpoint,
    kind: 'association',
    schema: partToBreakpointRowSchema,
    columns: columnsOf(partToBreakpointRowSchema),
    primaryKey: ['part_id', 'breakpoint_id'],
    foreignKeys: [fk('part_id', LogisticsTableName.Parts), fk('breakpoint_id', LogisticsTableName.Breakpoints)],
    checks: [],
    decimalColumns: [],
    idPrefix: null,
    defaults: {},
  },
];

const byName = new Map<LogisticsTableName, LogisticsTableEntry>(ENTRIES.map((e) => [e.name, e]));

export type ReferencingForeignKey = ForeignKey & { table: LogisticsTableName };

const referencing = new Map<LogisticsTableName, ReferencingForeignKey[]>();
for (const entry of ENTRIES) {
  for (const key of entry.foreignKeys) {
    const list = referencing.get(key.references) ?? [];
    list.push({ ...key, table: entry.name });
    referencing.set(key.references, list);
  }
}

// ────────────────────────────────────────────────────────────
// Row helpers (pure)
// ────────────────────────────────────────────────────────────

/** Key values of a row, or null when a key column is missing or not a string. */
export function keyOf(entry: LogisticsTableEntry, row: LogisticsRow): RowKey | null {
  const out: string[] = [];
  for (const col of entry.primaryKey) {
    const v = row[col];
    if (typeof v !== 'string' || v.length === 0) return null;
    out.push(v);
  }
  return out;
}

/** Constraint name PostgreSQL reports for a foreign key (drizzle-kit naming). */
export function foreignKeyName(table: LogisticsTableName, key: ForeignKey): string {
  return `${table}_${key.columns.join('_')}_${key.references}_${key.referencedColumns.join('_')}_fk`;
}

/** Constraint name PostgreSQL reports for a primary key. */
export function primaryKeyName(table: LogisticsTableName): string {
  return `${table}_pkey`;
}

export function formatKey(entry: LogisticsTableEntry, key: RowKey): string {
  return entry.primaryKey.map((col, i) => `${col}=${key[i] ?? ''}`).join(', ');
}

// ────────────────────────────────────────────────────────────
// LogisticsTableRegistry API
// ────────────────────────────────────────────────────────────

export const LogisticsTableRegistry = {
  /** All entries in dependency-safe order. */
  entries(): readonly LogisticsTableEntry[] {
    return ENTRIES;
  },

  tableNames(): readonly LogisticsTableName[] {
    return ENTRIES.map((e) => e.name);
  },

  get(name: LogisticsTableName): LogisticsTableEntry | undefined {
    return byName.get(name);
  },

  /** Lookup that fails loudly; for names already known to be valid. */
  require(name: LogisticsTableName): LogisticsTableEntry {
    const entry = byName.get(name);
    if (!entry) throw new Error(`Unknown logistics table: ${name}`);
    return entry;
  },

  isTableName(name: string): name is LogisticsTableName {
    return ENTRIES.some((e) => e.name === name);
  },

  /** Foreign keys of other tables pointing at `name`. */
  referencedBy(name: LogisticsTableName): readonly ReferencingForeignKey[] {
    return referencing.get(name) ?? [];
  },

  /** Tables `name` depends on through its foreign keys. */
  dependsOn(name: LogisticsTableName): readonly LogisticsTableName[] {
    const entry = byName.get(name);
    if (!entry) return [];
    return [...new Set(entry.foreignKeys.map((k) => k.references))];
  },

  keyOf,

  formatKey,

  foreignKeyName,

  primaryKeyName,
} as const;
