import { Router } from 'express';
import { z } from 'zod';

import { LogisticsTableRegistry, type LogisticsTableName, type RowKey } from '@mft/shared';

import { requireAuth, requirePermission } from '../auth/middleware.js';
import { PermissionCode } from '../auth/permissions.js';
import { createRow, deleteRow, getRow, listRows, updateRow, type LogisticsFailureKind } from '../services/logisticsService.js';
import type { LogisticsStore } from '../services/store/logisticsStore.js';

export function statusForFailure(kind: LogisticsFailureKind): number {
  switch (kind) {
    case 'domain':
      return 400;
    case 'not_found':
      return 404;
    case 'referential':
    case 'uniqueness':
      return 409;
  }
}

const rowBodySchema = z.record(z.unknown());

function tableParam(params: { table?: string }): LogisticsTableName | null {
  const raw = String(params.table ?? '');
  return LogisticsTableRegistry.isTableName(raw) ? raw : null;
}

function keyParams(params: { key1?: string; key2?: string }): RowKey {
  return [params.key1, params.key2].filter((v): v is string => typeof v === 'string' && v.length > 0);
}

function tableSummary() {
  return LogisticsTableRegistry.entries().map((e) => ({
    name: e.name,
    kind: e.kind,
    columns: e.columns,
    primaryKey: e.primaryKey,
    foreignKeys: e.foreignKeys,
    checks: e.checks.map((c) => ({ name: c.name, description: c.description })),
  }));
}

export function createLogisticsRouter(store: LogisticsStore) {
  const router = Router();
  router.use(requireAuth);

  router.get('/tables', requirePermission(PermissionCode.LogisticsView), (_req, res) => {
    return res.json({ ok: true, tables: tableSummary() });
  });

  router.get('/:table', requirePermission(PermissionCode.LogisticsView), async (req, res) => {
    try {
      const table = tableParam(req.params);
      if (!table) return res.status(404).json({ ok: false, error: `unknown table: ${req.params.table}` });
      const querySchema = z.object({
        limit: z.coerce.number().int().positive().max(5000).optional(),
      });
      const parsed = querySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      }
      const result = await listRows(store, {
        table,
        ...(parsed.data.limit !== undefined && { limit: parsed.data.limit }),
      });
      return res.json(result);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.get('/:table/:key1/:key2?', requirePermission(PermissionCode.LogisticsView), async (req, res) => {
    try {
      const table = tableParam(req.params);
      if (!table) return res.status(404).json({ ok: false, error: `unknown table: ${req.params.table}` });
      const result = await getRow(store, { table, key: keyParams(req.params) });
      if (!result.ok) return res.status(statusForFailure(result.kind)).json(result);
      return res.json(result);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.post('/:table', requirePermission(PermissionCode.LogisticsCreate), async (req, res) => {
    try {
      const table = tableParam(req.params);
      if (!table) return res.status(404).json({ ok: false, error: `unknown table: ${req.params.table}` });
      const parsed = rowBodySchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      }
      const result = await createRow(store, { table, input: parsed.data, actor: req.user?.username ?? 'unknown' });
      if (!result.ok) return res.status(statusForFailure(result.kind)).json(result);
      return res.status(201).json(result);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.put('/:table/:key1/:key2?', requirePermission(PermissionCode.LogisticsEdit), async (req, res) => {
    try {
      const table = tableParam(req.params);
      if (!table) return res.status(404).json({ ok: false, error: `unknown table: ${req.params.table}` });
      const parsed = rowBodySchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      }
      const result = await updateRow(store, {
        table,
        key: keyParams(req.params),
        patch: parsed.data,
        actor: req.user?.username ?? 'unknown',
      });
      if (!result.ok) return res.status(statusForFailure(result.kind)).json(result);
      return res.json(result);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.delete('/:table/:key1/:key2?', requirePermission(PermissionCode.LogisticsDelete), async (req, res) => {
    try {
      const table = tableParam(req.params);
      if (!table) return res.status(404).json({ ok: false, error: `unknown table: ${req.params.table}` });
      const result = await deleteRow(store, { table, key: keyParams(req.params), actor: req.user?.username ?? 'unknown' });
      if (!result.ok) return res.status(statusForFailure(result.kind)).json(result);
      return res.json(result);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  return router;
}
