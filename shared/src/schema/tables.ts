// Table names of the logistics schema.
// Kept in one place so the server schema, the registry and the API agree.

export const LogisticsTableName = {
  Suppliers: 'supplier_data',
  Parts: 'part_data',
  Boxes: 'box_data',
  Pallets: 'pallet_data',
  Models: 'model_data',
  Workshops: 'workshop_data',
  Lines: 'line_data',
  Breakpoints: 'breakpoint_data',
  PartToBox: 'part_to_box',
  BoxToPallet: 'box_to_pallet',
  PartToModel: 'part_to_model',
  PartToLine: 'part_to_line',
  PartToBreakpoint: 'part_to_breakpoint',
} as const;

export type LogisticsTableName = (typeof LogisticsTableName)[keyof typeof LogisticsTableName];
