import { z } from 'zod';

import {
  LOCALIZATION_VALUES,
  MODEL_CODE_VALUES,
  MODEL_NAME_VALUES,
  PACKAGING_TYPE_VALUES,
  WORKSHOP_CODE_VALUES,
  WORKSHOP_NAME_VALUES,
} from '../domain/enums.js';

// Column domains. They mirror what PostgreSQL accepts for the column types of the schema,
// so a row that passes here is only rejected by the database on a concurrent change.

const SMALLINT_MIN = -32_768;
const SMALLINT_MAX = 32_767;
const INT_MIN = -2_147_483_648;
const INT_MAX = 2_147_483_647;

export const ID_MAX_LENGTH = 12;

/** Rounds half away from zero to two places, the way numeric(5,2) stores a value. */
export function roundDecimal2(v: number): number {
  return (Math.sign(v) * Math.round((Math.abs(v) + Number.EPSILON) * 100)) / 100;
}

export const idColumn = () => z.string().min(1, 'id is empty').max(ID_MAX_LENGTH);

const varchar = (length: number) => z.string().max(length);

// numeric(5,2): three integer digits, two fractional.
const decimal52 = () =>
  z
    .number()
    .finite()
    .transform(roundDecimal2)
    .refine((v) => Math.abs(v) < 1000, { message: 'numeric(5,2) overflow: absolute value must be below 1000' });

const smallint = () => z.number().int().min(SMALLINT_MIN).max(SMALLINT_MAX);
const int = () => z.number().int().min(INT_MIN).max(INT_MAX);

const timestamp = () =>
  z
    .union([z.date(), z.string().datetime({ offset: true })])
    .transform((v) => (v instanceof Date ? v : new Date(v)))
    .refine((d) => !Number.isNaN(d.getTime()), { message: 'invalid timestamp' });

const localization = () => z.enum(LOCALIZATION_VALUES);
const packagingType = () => z.enum(PACKAGING_TYPE_VALUES);

export const supplierRowSchema = z
  .object({
    supplier_id: idColumn(),
    supplier_name: varchar(200).nullable().optional(),
    location: varchar(50).nullable().optional(),
    city: varchar(50).nullable().optional(),
    street: varchar(100).nullable().optional(),
    building: varchar(10).nullable().optional(),
    localization: localization().nullable().optional(),
  })
  .strict();

export const partRowSchema = z
  .object({
    part_id: idColumn(),
    part_number: varchar(50).nullable().optional(),
    part_name: varchar(100).nullable().optional(),
    part_weight_kg: decimal52().nullable().optional(),
    supplier_id: idColumn().nullable().optional(),
  })
  .strict();

export const boxRowSchema = z
  .object({
    box_id: idColumn(),
    box_number: varchar(50).nullable().optional(),
    box_type: packagingType().nullable().optional(),
    box_weight_kg: decimal52().nullable().optional(),
    box_length_mm: smallint().nullable().optional(),
    box_width_mm: smallint().nullable().optional(),
    box_height_mm: smallint().nullable().optional(),
    box_vol_m3: decimal52().nullable().optional(),
    box_area_m2: decimal52().nullable().optional(),
    box_stacking: smallint().nullable().optional(),
  })
  .strict();

export const palletRowSchema = z
  .object({
    pallet_id: idColumn(),
    pallet_number: varchar(50).nullable().optional(),
    pallet_type: packagingType().nullable().optional(),
    pallet_weight_kg: decimal52().nullable().optional(),
    pallet_length_mm: smallint().nullable().optional(),
    pallet_width_mm: smallint().nullable().optional(),
    pallet_height_mm: smallint().nullable().optional(),
    pallet_vol_m3: decimal52().nullable().optional(),
    pallet_area_m2: decimal52().nullable().optional(),
    pallet_stacking: smallint().nullable().optional(),
  })
  .strict();

export const modelRowSchema = z
  .object({
    model_id: idColumn(),
    model_code: z.enum(MODEL_CODE_VALUES).nullable().optional(),
    model_name: z.enum(MODEL_NAME_VALUES).nullable().optional(),
  })
  .strict();

export const workshopRowSchema = z
  .object({
    workshop_id: idColumn(),
    workshop_code: z.enum(WORKSHOP_CODE_VALUES).nullable().optional(),
    workshop_name: z.enum(WORKSHOP_NAME_VALUES).nullable().optional(),
  })
  .strict();

export const lineRowSchema = z
  .object({
    line_id: idColumn(),
    line_code: varchar(10).nullable().optional(),
    line_name: varchar(50).nullable().optional(),
    workshop_id: idColumn().nullable().optional(),
  })
  .strict();

export const breakpointRowSchema = z
  .object({
    breakpoint_id: idColumn(),
    input_date: timestamp().nullable().optional(), // omitted -> creation instant
    breakpoint_number: varchar(10),
    breakpoint_date: timestamp().nullable().optional(),
  })
  .strict();

export const partToBoxRowSchema = z
  .object({
    part_id: idColumn(),
    box_id: idColumn(),
    part_per_box: int().nullable().optional(),
  })
  .strict();

export const boxToPalletRowSchema = z
  .object({
    box_id: idColumn(),
    pallet_id: idColumn(),
    box_per_pallet: smallint().nullable().optional(),
  })
  .strict();

export const partToModelRowSchema = z
  .object({
    part_id: idColumn(),
    model_id: idColumn(),
    configuration: varchar(20).nullable().optional(),
    part_per_vehicle: smallint().nullable().optional(),
  })
  .strict();

export const partToLineRowSchema = z
  .object({
    part_id: idColumn(),
    line_id: idColumn(),
  })
  .strict();

export const partToBreakpointRowSchema = z
  .object({
    part_id: idColumn(),
    breakpoint_id: idColumn(),
    part_number_before_change: varchar(50).nullable().optional(),
    supplier_name_before_change: varchar(200).nullable().optional(),
    localization_before_change: localization().nullable().optional(),
    line_name_before_change: varchar(50).nullable().optional(),
  })
  .strict();

export type SupplierRow = z.infer<typeof supplierRowSchema>;
export type PartRow = z.infer<typeof partRowSchema>;
export type BoxRow = z.infer<typeof boxRowSchema>;
export type PalletRow = z.infer<typeof palletRowSchema>;
export type ModelRow = z.infer<typeof modelRowSchema>;
export type WorkshopRow = z.infer<typeof workshopRowSchema>;
export type LineRow = z.infer<typeof lineRowSchema>;
export type BreakpointRow = z.infer<typeof breakpointRowSchema>;
export type PartToBoxRow = z.infer<typeof partToBoxRowSchema>;
export type BoxToPalletRow = z.infer<typeof boxToPalletRowSchema>;
export type PartToModelRow = z.infer<typeof partToModelRowSchema>;
export type PartToLineRow = z.infer<typeof partToLineRowSchema>;
export type PartToBreakpointRow = z.infer<typeof partToBreakpointRowSchema>;
