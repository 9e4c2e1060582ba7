import {
  LOCALIZATION_VALUES,
  LogisticsTableName,
  LogisticsTableRegistry,
  type Localization,
  type LogisticsRow,
  type PartBreakpointHistoryItem,
  type PartBreakpointSnapshot,
} from '@mft/shared';

import { logInfo, logWarn } from '../utils/logger.js';
import { ReferentialIntegrityViolation } from './constraintErrors.js';
import { ConstraintGuard } from './constraintGuard.js';
import { generateRowId, toFailure, type LogisticsFailure } from './logisticsService.js';
import type { LogisticsStore } from './store/logisticsStore.js';

const BREAKPOINT_ID_PREFIX = 'BPT_';

function asString(v: unknown): string | null {
  return typeof v === 'string' ? v : null;
}

function asDate(v: unknown): Date | null {
  if (v instanceof Date) return v;
  if (typeof v === 'string') {
    const d = new Date(v);
    return Number.isNaN(d.getTime()) ? null : d;
  }
  return null;
}

function asLocalization(v: unknown): Localization | null {
  return LOCALIZATION_VALUES.find((l) => l === v) ?? null;
}

function missingReference(column: string, references: LogisticsTableName, id: string) {
  const key = LogisticsTableRegistry.require(LogisticsTableName.PartToBreakpoint).foreignKeys.find(
    (k) => k.references === references,
  );
  return new ReferentialIntegrityViolation(
    `${LogisticsTableName.PartToBreakpoint}: no ${references} row with ${column}=${id}`,
    LogisticsTableName.PartToBreakpoint,
    key ? LogisticsTableRegistry.foreignKeyName(LogisticsTableName.PartToBreakpoint, key) : null,
  );
}

// The line a part is built on: the given one, or its only line. Several lines are ambiguous.
async function resolveLine(tx: LogisticsStore, partId: string, lineId: string | undefined): Promise<LogisticsRow | null> {
  if (lineId !== undefined) {
    const line = await tx.find(LogisticsTableName.Lines, [lineId]);
    if (!line) throw missingReference('line_id', LogisticsTableName.Lines, lineId);
    return line;
  }
  const links = await tx.findBy(LogisticsTableName.PartToLine, ['part_id'], [partId], { limit: 2 });
  const only = links.length === 1 ? asString(links[0]?.line_id) : null;
  return only ? await tx.find(LogisticsTableName.Lines, [only]) : null;
}

function toHistoryItem(link: LogisticsRow, breakpoint: LogisticsRow): PartBreakpointHistoryItem {
  return {
    breakpointId: asString(breakpoint.breakpoint_id) ?? '',
    breakpointNumber: asString(breakpoint.breakpoint_number) ?? '',
    breakpointDate: asDate(breakpoint.breakpoint_date),
    inputDate: asDate(breakpoint.input_date),
    before: {
      partNumber: asString(link.part_number_before_change),
      supplierName: asString(link.supplier_name_before_change),
      localization: asLocalization(link.localization_before_change),
      lineName: asString(link.line_name_before_change),
    },
  };
}

// Undated breakpoints sort last.
function compareDates(a: Date | null, b: Date | null): number {
  if (a && b) return a.getTime() - b.getTime();
  if (a) return -1;
  if (b) return 1;
  return 0;
}

/**
 * Records a change of a part: a new breakpoint_data row plus the part_to_breakpoint link holding
 * the part's number, supplier and line as they are right now, before the change is applied.
 */
export async function recordPartBreakpoint(
  store: LogisticsStore,
  args: {
    partId: string;
    breakpointNumber: string;
    breakpointDate?: Date | string | null;
    lineId?: string;
    breakpointId?: string;
    actor?: string;
  },
): Promise<{ ok: true; item: PartBreakpointHistoryItem } | LogisticsFailure> {
  try {
    const item = await store.transaction(async (tx) => {
      const guard = new ConstraintGuard(tx);

      const part = await tx.find(LogisticsTableName.Parts, [args.partId]);
      if (!part) throw missingReference('part_id', LogisticsTableName.Parts, args.partId);
      const supplierId = asString(part.supplier_id);
      const supplier = supplierId ? await tx.find(LogisticsTableName.Suppliers, [supplierId]) : null;
      const line = await resolveLine(tx, args.partId, args.lineId);

      const snapshot: PartBreakpointSnapshot = {
        partNumber: asString(part.part_number),
        supplierName: asString(supplier?.supplier_name),
        localization: asLocalization(supplier?.localization),
        lineName: asString(line?.line_name),
      };

      const breakpoint = await guard.create(LogisticsTableName.Breakpoints, {
        breakpoint_id: args.breakpointId ?? generateRowId(BREAKPOINT_ID_PREFIX),
        breakpoint_number: args.breakpointNumber,
        breakpoint_date: args.breakpointDate ?? null,
      });
      const link = await guard.create(LogisticsTableName.PartToBreakpoint, {
        part_id: args.partId,
        breakpoint_id: breakpoint.breakpoint_id,
        part_number_before_change: snapshot.partNumber,
        supplier_name_before_change: snapshot.supplierName,
        localization_before_change: snapshot.localization,
        line_name_before_change: snapshot.lineName,
      });
      return toHistoryItem(link, breakpoint);
    });
    logInfo('part breakpoint recorded', {
      partId: args.partId,
      breakpointId: item.breakpointId,
      actor: args.actor ?? null,
    });
    return { ok: true, item };
  } catch (e) {
    const failure = toFailure(e);
    logWarn('part breakpoint rejected', { partId: args.partId, kind: failure.kind, error: failure.error });
    return failure;
  }
}

export async function listPartBreakpoints(
  store: LogisticsStore,
  args: { partId: string },
): Promise<{ ok: true; items: PartBreakpointHistoryItem[] } | LogisticsFailure> {
  const part = await store.find(LogisticsTableName.Parts, [args.partId]);
  if (!part) {
    return { ok: false, error: `part not found: ${args.partId}`, kind: 'not_found', constraint: null };
  }
  const links = await store.findBy(LogisticsTableName.PartToBreakpoint, ['part_id'], [args.partId]);
  const items: PartBreakpointHistoryItem[] = [];
  for (const link of links) {
    const breakpointId = asString(link.breakpoint_id);
    const breakpoint = breakpointId ? await store.find(LogisticsTableName.Breakpoints, [breakpointId]) : null;
    if (breakpoint) items.push(toHistoryItem(link, breakpoint));
  }
  items.sort(
    (a, b) => compareDates(a.breakpointDate, b.breakpointDate) || compareDates(a.inputDate, b.inputDate),
  );
  return { ok: true, items };
}
