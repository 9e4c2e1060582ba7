import { Router } from 'express';
import { z } from 'zod';

import { ID_MAX_LENGTH } from '@mft/shared';

import { requireAuth, requirePermission } from '../auth/middleware.js';
import { PermissionCode } from '../auth/permissions.js';
import { listPartBreakpoints, recordPartBreakpoint } from '../services/breakpointService.js';
import type { LogisticsStore } from '../services/store/logisticsStore.js';
import { statusForFailure } from './logistics.js';

const recordSchema = z.object({
  partId: z.string().min(1).max(ID_MAX_LENGTH),
  breakpointNumber: z.string().min(1).max(10),
  breakpointDate: z.string().datetime({ offset: true }).nullable().optional(),
  lineId: z.string().min(1).max(ID_MAX_LENGTH).optional(),
  breakpointId: z.string().min(1).max(ID_MAX_LENGTH).optional(),
});

export function createBreakpointsRouter(store: LogisticsStore) {
  const router = Router();
  router.use(requireAuth);

  router.post('/', requirePermission(PermissionCode.BreakpointsRecord), async (req, res) => {
    try {
      const parsed = recordSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      }
      const { partId, breakpointNumber, breakpointDate, lineId, breakpointId } = parsed.data;
      const result = await recordPartBreakpoint(store, {
        partId,
        breakpointNumber,
        ...(breakpointDate !== undefined && { breakpointDate }),
        ...(lineId !== undefined && { lineId }),
        ...(breakpointId !== undefined && { breakpointId }),
        actor: req.user?.username ?? 'unknown',
      });
      if (!result.ok) return res.status(statusForFailure(result.kind)).json(result);
      return res.status(201).json(result);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.get('/parts/:partId', requirePermission(PermissionCode.BreakpointsView), async (req, res) => {
    try {
      const partId = String(req.params.partId || '');
      if (!partId) return res.status(400).json({ ok: false, error: 'missing partId' });
      const result = await listPartBreakpoints(store, { partId });
      if (!result.ok) return res.status(statusForFailure(result.kind)).json(result);
      return res.json(result);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  return router;
}
