import { beforeEach, describe, expect, it } from 'vitest';

import {
  LOCALIZATION_VALUES,
  LogisticsTableName,
  MODEL_CODE_VALUES,
  MODEL_NAME_VALUES,
  PACKAGING_TYPE_VALUES,
  WORKSHOP_CODE_VALUES,
  WORKSHOP_NAME_VALUES,
} from '@mft/shared';

import {
  ConstraintViolation,
  DomainViolation,
  ReferentialIntegrityViolation,
  RowNotFoundError,
  UniquenessViolation,
} from '../services/constraintErrors.js';
import { ConstraintGuard } from '../services/constraintGuard.js';
import { MemoryLogisticsStore } from './utils/memoryLogisticsStore.js';

const T = LogisticsTableName;

let store: MemoryLogisticsStore;
let guard: ConstraintGuard;

async function seedParents() {
  await guard.create(T.Suppliers, { supplier_id: 'S1', supplier_name: 'Acme Metals', localization: 'yes' });
  await guard.create(T.Parts, { part_id: 'P1', part_number: 'PN-100', supplier_id: 'S1' });
  await guard.create(T.Boxes, { box_id: 'B1', box_type: 'returnable' });
  await guard.create(T.Pallets, { pallet_id: 'PL1', pallet_type: 'non-returnable' });
  await guard.create(T.Models, { model_id: 'M1', model_code: 'A01', model_name: 'Jolion' });
  await guard.create(T.Workshops, { workshop_id: 'W1', workshop_code: 'AS', workshop_name: 'Assembly' });
  await guard.create(T.Lines, { line_id: 'L1', line_name: 'Main line', workshop_id: 'W1' });
  await guard.create(T.Breakpoints, { breakpoint_id: 'BP1', breakpoint_number: 'BP-0001' });
}

beforeEach(() => {
  store = new MemoryLogisticsStore();
  guard = new ConstraintGuard(store);
});

describe('create: foreign keys', () => {
  it('accepts a part whose supplier exists and rejects one whose supplier does not', async () => {
    await guard.create(T.Suppliers, { supplier_id: 'S1' });
    const part = await guard.create(T.Parts, { part_id: 'P1', supplier_id: 'S1' });
    expect(part.supplier_id).toBe('S1');

    const err = await guard.create(T.Parts, { part_id: 'P2', supplier_id: 'S9' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ReferentialIntegrityViolation);
    expect(err).toMatchObject({
      kind: 'referential',
      table: 'part_data',
      constraint: 'part_data_supplier_id_supplier_data_supplier_id_fk',
      message: 'part_data.supplier_id: no supplier_data row with supplier_id=S9',
    });
    expect(store.count(T.Parts)).toBe(1);
  });

  it('accepts a null supplier reference', async () => {
    const part = await guard.create(T.Parts, { part_id: 'P1', supplier_id: null });
    expect(part.supplier_id).toBeNull();
  });

  it('rejects a line in a missing workshop', async () => {
    await expect(guard.create(T.Lines, { line_id: 'L1', workshop_id: 'W9' })).rejects.toBeInstanceOf(
      ReferentialIntegrityViolation,
    );
  });

  it('requires both ends of an association to exist', async () => {
    await seedParents();
    await expect(guard.create(T.PartToBox, { part_id: 'P1', box_id: 'B9' })).rejects.toBeInstanceOf(
      ReferentialIntegrityViolation,
    );
    await expect(guard.create(T.PartToBox, { part_id: 'P9', box_id: 'B1' })).rejects.toBeInstanceOf(
      ReferentialIntegrityViolation,
    );
    await expect(guard.create(T.PartToBox, { part_id: 'P1', box_id: 'B1', part_per_box: 24 })).resolves.toEqual({
      part_id: 'P1',
      box_id: 'B1',
      part_per_box: 24,
    });
  });
});

describe('create: check constraints', () => {
  it('rejects a box with negative volume and accepts zero', async () => {
    const err = await guard.create(T.Boxes, { box_id: 'B1', box_vol_m3: -1 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DomainViolation);
    expect(err).toMatchObject({
      constraint: 'chk_positive_box_volume_area',
      message: 'box_data: check chk_positive_box_volume_area failed (box_vol_m3 >= 0 AND box_area_m2 >= 0)',
    });

    const box = await guard.create(T.Boxes, { box_id: 'B1', box_vol_m3: 0 });
    expect(box.box_vol_m3).toBe(0);
  });

  it.each([
    [T.Boxes, { box_id: 'X1', box_area_m2: -0.5 }],
    [T.Pallets, { pallet_id: 'X1', pallet_vol_m3: -2 }],
    [T.Pallets, { pallet_id: 'X1', pallet_area_m2: -0.01 }],
  ])('rejects negative volume or area in %s', async (table, row) => {
    await expect(guard.create(table, row)).rejects.toBeInstanceOf(DomainViolation);
  });

  it('lets NULL volume and area pass', async () => {
    const pallet = await guard.create(T.Pallets, { pallet_id: 'PL1', pallet_vol_m3: null });
    expect(pallet.pallet_vol_m3).toBeNull();
    expect(pallet.pallet_area_m2).toBeNull();
  });
});

describe('create: enumerated domains', () => {
  const cases: Array<[string, LogisticsTableName, string, string, readonly string[]]> = [
    ['localization', T.Suppliers, 'supplier_id', 'localization', LOCALIZATION_VALUES],
    ['packaging_type (box)', T.Boxes, 'box_id', 'box_type', PACKAGING_TYPE_VALUES],
    ['packaging_type (pallet)', T.Pallets, 'pallet_id', 'pallet_type', PACKAGING_TYPE_VALUES],
    ['model_codes', T.Models, 'model_id', 'model_code', MODEL_CODE_VALUES],
    ['model_names', T.Models, 'model_id', 'model_name', MODEL_NAME_VALUES],
    ['workshop_codes', T.Workshops, 'workshop_id', 'workshop_code', WORKSHOP_CODE_VALUES],
    ['workshop_names', T.Workshops, 'workshop_id', 'workshop_name', WORKSHOP_NAME_VALUES],
  ];

  it.each(cases)('accepts every listed %s value', async (_label, table, idColumn, column, values) => {
    let n = 0;
    for (const value of values) {
      n += 1;
      const row = await guard.create(table, { [idColumn]: `E${n}`, [column]: value });
      expect(row[column]).toBe(value);
    }
    expect(store.count(table)).toBe(values.length);
  });

  it.each(cases)('rejects a %s value outside the set', async (_label, table, idColumn, column) => {
    const err = await guard.create(table, { [idColumn]: 'E1', [column]: 'Z99' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DomainViolation);
    expect(err).toMatchObject({ table, constraint: column });
    expect(store.count(table)).toBe(0);
  });

  it('rejects model code Z99', async () => {
    const err = await guard.create(T.Models, { model_id: 'M1', model_code: 'Z99' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DomainViolation);
    expect(String((err as Error).message)).toMatch(/^model_data\.model_code: Invalid enum value/);
  });

  it('is case sensitive', async () => {
    await expect(guard.create(T.Models, { model_id: 'M1', model_name: 'jolion' })).rejects.toBeInstanceOf(
      DomainViolation,
    );
  });
});

describe('create: column domains', () => {
  it('rejects an id longer than 12 characters', async () => {
    await expect(guard.create(T.Suppliers, { supplier_id: 'SUP_123456789' })).rejects.toBeInstanceOf(DomainViolation);
  });

  it('rejects a missing primary key', async () => {
    await expect(guard.create(T.Suppliers, { supplier_name: 'No id' })).rejects.toBeInstanceOf(DomainViolation);
  });

  it('rejects unknown columns', async () => {
    const err = await guard.create(T.Suppliers, { supplier_id: 'S1', bogus: 1 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DomainViolation);
    expect((err as Error).message).toBe("supplier_data: Unrecognized key(s) in object: 'bogus'");
  });

  it('rejects a row that is not an object', async () => {
    await expect(guard.create(T.Suppliers, ['S1'])).rejects.toBeInstanceOf(DomainViolation);
  });

  it('rounds numeric(5,2) values and rejects overflow', async () => {
    const part = await guard.create(T.Parts, { part_id: 'P1', part_weight_kg: 12.3456 });
    expect(part.part_weight_kg).toBe(12.35);
    await expect(guard.create(T.Parts, { part_id: 'P2', part_weight_kg: 999.999 })).rejects.toBeInstanceOf(
      DomainViolation,
    );
    await expect(guard.create(T.Parts, { part_id: 'P3', part_weight_kg: 999.99 })).resolves.toMatchObject({
      part_weight_kg: 999.99,
    });
  });

  it('enforces smallint and varchar limits', async () => {
    await expect(guard.create(T.Boxes, { box_id: 'B1', box_length_mm: 40000 })).rejects.toBeInstanceOf(DomainViolation);
    await expect(guard.create(T.Boxes, { box_id: 'B1', box_length_mm: 12.5 })).rejects.toBeInstanceOf(DomainViolation);
    await expect(
      guard.create(T.Breakpoints, { breakpoint_id: 'BP1', breakpoint_number: 'BP-00000001' }),
    ).rejects.toBeInstanceOf(DomainViolation);
  });

  it('requires breakpoint_number', async () => {
    await expect(guard.create(T.Breakpoints, { breakpoint_id: 'BP1' })).rejects.toBeInstanceOf(DomainViolation);
  });
});

describe('create: uniqueness', () => {
  it('rejects a duplicate entity key', async () => {
    await guard.create(T.Suppliers, { supplier_id: 'S1' });
    const err = await guard.create(T.Suppliers, { supplier_id: 'S1' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UniquenessViolation);
    expect(err).toMatchObject({ constraint: 'supplier_data_pkey', message: 'supplier_data: duplicate key (supplier_id=S1)' });
  });

  it.each([
    [T.PartToBox, { part_id: 'P1', box_id: 'B1' }],
    [T.BoxToPallet, { box_id: 'B1', pallet_id: 'PL1' }],
    [T.PartToModel, { part_id: 'P1', model_id: 'M1' }],
    [T.PartToLine, { part_id: 'P1', line_id: 'L1' }],
    [T.PartToBreakpoint, { part_id: 'P1', breakpoint_id: 'BP1' }],
  ])('rejects a second %s row with the same key pair', async (table, row) => {
    await seedParents();
    await guard.create(table, row);
    const err = await guard.create(table, row).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UniquenessViolation);
    expect(err).toBeInstanceOf(ConstraintViolation);
    expect(store.count(table)).toBe(1);
  });

  it('allows the same part in two boxes', async () => {
    await seedParents();
    await guard.create(T.Boxes, { box_id: 'B2' });
    await guard.create(T.PartToBox, { part_id: 'P1', box_id: 'B1' });
    await guard.create(T.PartToBox, { part_id: 'P1', box_id: 'B2' });
    expect(store.count(T.PartToBox)).toBe(2);
  });
});

describe('create: breakpoint input_date default', () => {
  it('stamps the creation instant when omitted', async () => {
    const before = Date.now();
    const row = await guard.create(T.Breakpoints, { breakpoint_id: 'BP1', breakpoint_number: 'BP-1' });
    const after = Date.now();
    expect(row.input_date).toBeInstanceOf(Date);
    const at = (row.input_date as Date).getTime();
    expect(at).toBeGreaterThanOrEqual(before);
    expect(at).toBeLessThanOrEqual(after);
  });

  it('keeps an explicit value and an explicit null', async () => {
    const given = await guard.create(T.Breakpoints, {
      breakpoint_id: 'BP1',
      breakpoint_number: 'BP-1',
      input_date: '2024-02-01T08:00:00Z',
    });
    expect(given.input_date).toEqual(new Date('2024-02-01T08:00:00Z'));

    const empty = await guard.create(T.Breakpoints, { breakpoint_id: 'BP2', breakpoint_number: 'BP-2', input_date: null });
    expect(empty.input_date).toBeNull();
  });
});

describe('update', () => {
  beforeEach(seedParents);

  it('patches non-key columns and returns the full row', async () => {
    const row = await guard.update(T.Parts, ['P1'], { part_name: 'Bracket' });
    expect(row).toEqual({
      part_id: 'P1',
      part_number: 'PN-100',
      part_name: 'Bracket',
      part_weight_kg: null,
      supplier_id: 'S1',
    });
  });

  it('validates foreign keys of the merged row', async () => {
    await expect(guard.update(T.Parts, ['P1'], { supplier_id: 'S9' })).rejects.toBeInstanceOf(
      ReferentialIntegrityViolation,
    );
    await expect(guard.update(T.Parts, ['P1'], { supplier_id: null })).resolves.toMatchObject({ supplier_id: null });
  });

  it('validates checks on update', async () => {
    await guard.update(T.Boxes, ['B1'], { box_vol_m3: 0.5 });
    await expect(guard.update(T.Boxes, ['B1'], { box_vol_m3: -1 })).rejects.toBeInstanceOf(DomainViolation);
    expect((await store.find(T.Boxes, ['B1']))?.box_vol_m3).toBe(0.5);
  });

  it('validates enumerations on update', async () => {
    await expect(guard.update(T.Workshops, ['W1'], { workshop_code: 'PAINTING' })).rejects.toBeInstanceOf(
      DomainViolation,
    );
  });

  it('refuses to change key columns', async () => {
    const err = await guard.update(T.Parts, ['P1'], { part_id: 'P2' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DomainViolation);
    expect(err).toMatchObject({ message: 'part_data.part_id: primary key columns cannot be changed' });
    await expect(guard.update(T.Parts, ['P1'], { part_id: 'P1', part_name: 'Same key' })).resolves.toMatchObject({
      part_name: 'Same key',
    });
  });

  it('reports a missing row', async () => {
    const err = await guard.update(T.Parts, ['P9'], { part_name: 'x' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RowNotFoundError);
    expect((err as Error).message).toBe('row not found in part_data: part_id=P9');
  });

  it('rejects a key of the wrong arity', async () => {
    await expect(guard.update(T.PartToBox, ['P1'], { part_per_box: 2 })).rejects.toBeInstanceOf(DomainViolation);
  });
});

describe('delete', () => {
  beforeEach(seedParents);

  it('restricts deletion of a referenced supplier', async () => {
    const err = await guard.delete(T.Suppliers, ['S1']).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ReferentialIntegrityViolation);
    expect(err).toMatchObject({
      message: 'supplier_data (supplier_id=S1) is still referenced by part_data',
      constraint: 'part_data_supplier_id_supplier_data_supplier_id_fk',
    });
    expect(await store.find(T.Suppliers, ['S1'])).not.toBeNull();
  });

  it('deletes once the references are gone', async () => {
    await guard.delete(T.Parts, ['P1']);
    await guard.delete(T.Suppliers, ['S1']);
    expect(await store.find(T.Suppliers, ['S1'])).toBeNull();
  });

  it('restricts deletion of a part still linked to a line', async () => {
    await guard.create(T.PartToLine, { part_id: 'P1', line_id: 'L1' });
    await expect(guard.delete(T.Parts, ['P1'])).rejects.toBeInstanceOf(ReferentialIntegrityViolation);
    await expect(guard.delete(T.Lines, ['L1'])).rejects.toBeInstanceOf(ReferentialIntegrityViolation);
    await guard.delete(T.PartToLine, ['P1', 'L1']);
    await guard.delete(T.Lines, ['L1']);
    expect(store.count(T.Lines)).toBe(0);
  });

  it('reports a missing row', async () => {
    await expect(guard.delete(T.Boxes, ['B9'])).rejects.toBeInstanceOf(RowNotFoundError);
  });
});

describe('transactions', () => {
  it('rolls back earlier writes when a later one is rejected', async () => {
    await expect(
      store.transaction(async (tx) => {
        const inner = new ConstraintGuard(tx);
        await inner.create(T.Suppliers, { supplier_id: 'S1' });
        await inner.create(T.Parts, { part_id: 'P1', supplier_id: 'S9' });
      }),
    ).rejects.toBeInstanceOf(ReferentialIntegrityViolation);
    expect(store.count(T.Suppliers)).toBe(0);
  });
});
