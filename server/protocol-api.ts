/**
 * PET Protocol API Routes
 *
 * - GET  /api/protocols/device-profile - Scanner constants and recon profiles
 * - POST /api/protocols/calculate - Plan standard, low-dose and fast protocols
 * - GET  /api/protocols/k-store/:tracer/:reconProfile - Site k summary
 * - POST /api/protocols/k-store/measurements - Append a measured k
 * - GET  /api/protocols/session-log(.csv) - Runs planned in this session
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import { kMeasurementSchema, protocolRequestSchema, tracerSchema } from '@shared/schema';
import type { ZodError } from 'zod';
import { logger } from './logger';
import {
  ProtocolPlanner,
  storeKey,
  type KFactorStore,
  type PetPhysicsModel,
  type SessionLog,
} from './pet-protocol';

export interface ProtocolApiDeps {
  model: PetPhysicsModel;
  store: KFactorStore;
  sessionLog: SessionLog;
}

const formatIssues = (error: ZodError) =>
  error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));

export function createProtocolRouter({ model, store, sessionLog }: ProtocolApiDeps): Router {
  const router = Router();
  const planner = new ProtocolPlanner(model, store);

  router.get('/device-profile', (_req: Request, res: Response) => {
    res.json({ device: model.device, pediatric: model.pediatric });
  });

  router.post('/calculate', (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = protocolRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: 'Invalid protocol request', details: formatIssues(parsed.error) });
      }

      const plan = planner.plan(parsed.data);
      const entry = sessionLog.record(plan);
      logger.info(`Planned ${plan.tracer} protocols (${plan.calibration.provenanceLabel}) as run ${entry.id}`, 'protocol-api');
      res.json({ runId: entry.id, plan });
    } catch (error) {
      next(error);
    }
  });

  router.get('/k-store/:tracer/:reconProfile', (req: Request, res: Response, next: NextFunction) => {
    try {
      const tracer = tracerSchema.safeParse(req.params.tracer.toUpperCase());
      if (!tracer.success) {
        return res.status(400).json({ error: 'Invalid tracer' });
      }

      const { load, summary } = store.getSiteSummary(tracer.data, req.params.reconProfile);
      if (load.status === 'parse-error') {
        return res.status(500).json({ error: 'K store is unreadable', status: load.status, details: load.error });
      }
      if (!summary) {
        return res.status(404).json({ error: 'No k measurements recorded', key: storeKey(tracer.data, req.params.reconProfile) });
      }

      res.json({ key: storeKey(tracer.data, req.params.reconProfile), ...summary });
    } catch (error) {
      next(error);
    }
  });

  router.post('/k-store/measurements', (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = kMeasurementSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: 'Invalid k measurement', details: formatIssues(parsed.error) });
      }

      const { tracer, reconProfile, k } = parsed.data;
      const { store: updated, persistence } = store.recordMeasurement(tracer, reconProfile, k);
      if (persistence.status === 'skipped') {
        return res.status(409).json({ error: 'K measurement not recorded', details: persistence.error });
      }
      if (persistence.status === 'write-error') {
        return res.status(500).json({ error: 'Failed to persist k measurement', details: persistence.error });
      }

      res.status(201).json({
        key: storeKey(tracer, reconProfile),
        summary: store.summarize(updated, tracer, reconProfile),
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/session-log', (_req: Request, res: Response) => {
    res.json({ entries: sessionLog.list() });
  });

  router.get('/session-log.csv', (_req: Request, res: Response) => {
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', 'attachment; filename="pet_protocol_session_log.csv"');
    res.send(sessionLog.toCsv());
  });

  return router;
}
