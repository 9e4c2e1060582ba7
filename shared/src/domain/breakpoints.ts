// Change history of a part: one item per breakpoint it took part in.

import type { Localization } from './enums.js';

export type PartBreakpointSnapshot = {
  partNumber: string | null;
  supplierName: string | null;
  localization: Localization | null;
  lineName: string | null;
};

export type PartBreakpointHistoryItem = {
  breakpointId: string;
  breakpointNumber: string;
  breakpointDate: Date | null;
  inputDate: Date | null;
  before: PartBreakpointSnapshot; // values as they were before the change
};
