import { sql } from 'drizzle-orm';
import {
  check,
  integer,
  numeric,
  pgEnum,
  pgTable,
  primaryKey,
  smallint,
  timestamp,
  varchar,
} from 'drizzle-orm/pg-core';

import {
  EnumTypeName,
  ID_MAX_LENGTH,
  LOCALIZATION_VALUES,
  LogisticsTableName,
  MODEL_CODE_VALUES,
  MODEL_NAME_VALUES,
  PACKAGING_TYPE_VALUES,
  WORKSHOP_CODE_VALUES,
  WORKSHOP_NAME_VALUES,
} from '@mft/shared';

// Column names are the lowercase forms of the historical UPPER_CASE identifiers
// (PostgreSQL folds unquoted identifiers, so both spellings address the same column).
// All identifiers are varchar(12), including the two references that used to be varchar(10).

export const localization = pgEnum(EnumTypeName.Localization, LOCALIZATION_VALUES);
export const packagingType = pgEnum(EnumTypeName.PackagingType, PACKAGING_TYPE_VALUES);
export const modelCodes = pgEnum(EnumTypeName.ModelCodes, MODEL_CODE_VALUES);
export const modelNames = pgEnum(EnumTypeName.ModelNames, MODEL_NAME_VALUES);
export const workshopCodes = pgEnum(EnumTypeName.WorkshopCodes, WORKSHOP_CODE_VALUES);
export const workshopNames = pgEnum(EnumTypeName.WorkshopNames, WORKSHOP_NAME_VALUES);

const id = (name: string) => varchar(name, { length: ID_MAX_LENGTH });
const decimal52 = (name: string) => numeric(name, { precision: 5, scale: 2 });

export const supplierData = pgTable(LogisticsTableName.Suppliers, {
  supplierId: id('supplier_id').primaryKey(),
  supplierName: varchar('supplier_name', { length: 200 }),
  location: varchar('location', { length: 50 }),
  city: varchar('city', { length: 50 }),
  street: varchar('street', { length: 100 }),
  building: varchar('building', { length: 10 }),
  localization: localization('localization'),
});

export const partData = pgTable(LogisticsTableName.Parts, {
  partId: id('part_id').primaryKey(),
  partNumber: varchar('part_number', { length: 50 }),
  partName: varchar('part_name', { length: 100 }),
  partWeightKg: decimal52('part_weight_kg'),
  supplierId: id('supplier_id').references(() => supplierData.supplierId),
});

export const boxData = pgTable(
  LogisticsTableName.Boxes,
  {
    boxId: id('box_id').primaryKey(),
    boxNumber: varchar('box_number', { length: 50 }),
    boxType: packagingType('box_type'),
    boxWeightKg: decimal52('box_weight_kg'),
    boxLengthMm: smallint('box_length_mm'),
    boxWidthMm: smallint('box_width_mm'),
    boxHeightMm: smallint('box_height_mm'),
    boxVolM3: decimal52('box_vol_m3'),
    boxAreaM2: decimal52('box_area_m2'),
    boxStacking: smallint('box_stacking'),
  },
  (t) => ({
    positiveVolumeArea: check('chk_positive_box_volume_area', sql`${t.boxVolM3} >= 0 AND ${t.boxAreaM2} >= 0`),
  }),
);

export const palletData = pgTable(
  LogisticsTableName.Pallets,
  {
    palletId: id('pallet_id').primaryKey(),
    palletNumber: varchar('pallet_number', { length: 50 }),
    palletType: packagingType('pallet_type'),
    palletWeightKg: decimal52('pallet_weight_kg'),
    palletLengthMm: smallint('pallet_length_mm'),
    palletWidthMm: smallint('pallet_width_mm'),
    palletHeightMm: smallint('pallet_height_mm'),
    palletVolM3: decimal52('pallet_vol_m3'),
    palletAreaM2: decimal52('pallet_area_m2'),
    palletStacking: smallint('pallet_stacking'),
  },
  (t) => ({
    positiveVolumeArea: check(
      'chk_positive_pallet_volume_area',
      sql`${t.palletVolM3} >= 0 AND ${t.palletAreaM2} >= 0`,
    ),
  }),
);

export const modelData = pgTable(LogisticsTableName.Models, {
  modelId: id('model_id').primaryKey(),
  modelCode: modelCodes('model_code'),
  modelName: modelNames('model_name'),
});

export const workshopData = pgTable(LogisticsTableName.Workshops, {
  workshopId: id('workshop_id').primaryKey(),
  workshopCode: workshopCodes('workshop_code'),
  workshopName: workshopNames('workshop_name'),
});

export const lineData = pgTable(LogisticsTableName.Lines, {
  lineId: id('line_id').primaryKey(),
  lineCode: varchar('line_code', { length: 10 }),
  lineName: varchar('line_name', { length: 50 }),
  workshopId: id('workshop_id').references(() => workshopData.workshopId),
});

export const breakpointData = pgTable(LogisticsTableName.Breakpoints, {
  breakpointId: id('breakpoint_id').primaryKey(),
  inputDate: timestamp('input_date', { withTimezone: true }).defaultNow(),
  breakpointNumber: varchar('breakpoint_number', { length: 10 }).notNull(),
  breakpointDate: timestamp('breakpoint_date', { withTimezone: true }),
});

// Association tables: composite primary keys, restrict on delete (no cascade anywhere).

export const partToBox = pgTable(
  LogisticsTableName.PartToBox,
  {
    partId: id('part_id')
      .notNull()
      .references(() => partData.partId),
    boxId: id('box_id')
      .notNull()
      .references(() => boxData.boxId),
    partPerBox: integer('part_per_box'),
  },
  (t) => ({
    pk: primaryKey({ name: 'part_to_box_pkey', columns: [t.partId, t.boxId] }),
  }),
);

export const boxToPallet = pgTable(
  LogisticsTableName.BoxToPallet,
  {
    boxId: id('box_id')
      .notNull()
      .references(() => boxData.boxId),
    palletId: id('pallet_id')
      .notNull()
      .references(() => palletData.palletId),
    boxPerPallet: smallint('box_per_pallet'),
  },
  (t) => ({
    pk: primaryKey({ name: 'box_to_pallet_pkey', columns: [t.boxId, t.palletId] }),
  }),
);

export const partToModel = pgTable(
  LogisticsTableName.PartToModel,
  {
    partId: id('part_id')
      .notNull()
      .references(() => partData.partId),
    modelId: id('model_id')
      .notNull()
      .references(() => modelData.modelId),
    configuration: varchar('configuration', { length: 20 }),
    partPerVehicle: smallint('part_per_vehicle'),
  },
  (t) => ({
    pk: primaryKey({ name: 'part_to_model_pkey', columns: [t.partId, t.modelId] }),
  }),
);

export const partToLine = pgTable(
  LogisticsTableName.PartToLine,
  {
    partId: id('part_id')
      .notNull()
      .references(() => partData.partId),
    lineId: id('line_id')
      .notNull()
      .references(() => lineData.lineId),
  },
  (t) => ({
    pk: primaryKey({ name: 'part_to_line_pkey', columns: [t.partId, t.lineId] }),
  }),
);

export const partToBreakpoint = pgTable(
  LogisticsTableName.PartToBreakpoint,
  {
    partId: id('part_id')
      .notNull()
      .references(() => partData.partId),
    breakpointId: id('breakpoint_id')
      .notNull()
      .references(() => breakpointData.breakpointId),
    partNumberBeforeChange: varchar('part_number_before_change', { length: 50 }),
    supplierNameBeforeChange: varchar('supplier_name_before_change', { length: 200 }),
    localizationBeforeChange: localization('localization_before_change'),
    lineNameBeforeChange: varchar('line_name_before_change', { length: 50 }),
  },
  (t) => ({
    pk: primaryKey({ name: 'part_to_breakpoint_pkey', columns: [t.partId, t.breakpointId] }),
  }),
);

export const logisticsTables = {
  [LogisticsTableName.Suppliers]: supplierData,
  [LogisticsTableName.Parts]: partData,
  [LogisticsTableName.Boxes]: boxData,
  [LogisticsTableName.Pallets]: palletData,
  [LogisticsTableName.Models]: modelData,
  [LogisticsTableName.Workshops]: workshopData,
  [LogisticsTableName.Lines]: lineData,
  [LogisticsTableName.Breakpoints]: breakpointData,
  [LogisticsTableName.PartToBox]: partToBox,
  [LogisticsTableName.BoxToPallet]: boxToPallet,
  [LogisticsTableName.PartToModel]: partToModel,
  [LogisticsTableName.PartToLine]: partToLine,
  [LogisticsTableName.PartToBreakpoint]: partToBreakpoint,
} as const;
