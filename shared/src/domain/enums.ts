// Enumerated domains of the logistics schema (shared by the server and its clients).
// Values are stored verbatim in PostgreSQL enum types, so they must not be reworded.

export const Localization = {
  Yes: 'yes',
  No: 'no',
} as const;

export type Localization = (typeof Localization)[keyof typeof Localization];

export const PackagingType = {
  Returnable: 'returnable',
  NonReturnable: 'non-returnable',
} as const;

export type PackagingType = (typeof PackagingType)[keyof typeof PackagingType];

export const ModelCode = {
  A01: 'A01',
  A08: 'A08',
  B02: 'B02',
  B04: 'B04',
  B06: 'B06',
  B16: 'B16',
} as const;

export type ModelCode = (typeof ModelCode)[keyof typeof ModelCode];

export const ModelName = {
  Jolion: 'Jolion',
  H3: 'H3',
  F7: 'F7',
  F7x: 'F7x',
  Dargo: 'Dargo',
  H7: 'H7',
} as const;

export type ModelName = (typeof ModelName)[keyof typeof ModelName];

export const WorkshopCode = {
  Assembly: 'AS',
  Component: 'COMP',
  Painting: 'PAINT',
  Welding: 'WELD',
  Stamping: 'STAMP',
  Engine: 'EN',
} as const;

export type WorkshopCode = (typeof WorkshopCode)[keyof typeof WorkshopCode];

export const WorkshopName = {
  Assembly: 'Assembly',
  Component: 'Component',
  Painting: 'Painting',
  Welding: 'Welding',
  Stamping: 'Stamping',
  Engine: 'Engine',
} as const;

export type WorkshopName = (typeof WorkshopName)[keyof typeof WorkshopName];

// Tuples in declaration order: zod and pgEnum both need a non-empty literal tuple.
export const LOCALIZATION_VALUES = ['yes', 'no'] as const satisfies readonly Localization[];
export const PACKAGING_TYPE_VALUES = ['returnable', 'non-returnable'] as const satisfies readonly PackagingType[];
export const MODEL_CODE_VALUES = ['A01', 'A08', 'B02', 'B04', 'B06', 'B16'] as const satisfies readonly ModelCode[];
export const MODEL_NAME_VALUES = ['Jolion', 'H3', 'F7', 'F7x', 'Dargo', 'H7'] as const satisfies readonly ModelName[];
export const WORKSHOP_CODE_VALUES = ['AS', 'COMP', 'PAINT', 'WELD', 'STAMP', 'EN'] as const satisfies readonly WorkshopCode[];
export const WORKSHOP_NAME_VALUES = [
  'Assembly',
  'Component',
  'Painting',
  'Welding',
  'Stamping',
  'Engine',
] as const satisfies readonly WorkshopName[];

// PostgreSQL type names of the enums above.
export const EnumTypeName = {
  Localization: 'localization',
  PackagingType: 'packaging_type',
  ModelCodes: 'model_codes',
  ModelNames: 'model_names',
  WorkshopCodes: 'workshop_codes',
  WorkshopNames: 'workshop_names',
} as const;

export type EnumTypeName = (typeof EnumTypeName)[keyof typeof EnumTypeName];
