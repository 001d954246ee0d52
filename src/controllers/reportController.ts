import { NextFunction, Request, Response } from 'express';
import { currentActor } from '../middleware/auth';
import { ReportLifecycle } from '../services/reportLifecycle';
import {
  assignReportSchema,
  cleanupPhotoSchema,
  cleanupStatusQuerySchema,
  collectorParamsSchema,
  confirmCleanupSchema,
  createReportSchema,
  paginationSchema,
  reassignReportSchema,
  recordWeightSchema,
  reportIdParamsSchema,
  reportListQuerySchema,
  resolveDisputeSchema,
} from '../validators/reportSchemas';
import {
  serializeCleanupStatus,
  serializeCollectorStats,
  serializeReport,
  serializeTransition,
} from './presenters';

export const createReportController = (lifecycle: ReportLifecycle) => ({
  // POST /api/v1/reports
  createReport: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createReportSchema.parse(req.body);
      const result = await lifecycle.createReport(currentActor(req), {
        latitude: body.latitude,
        longitude: body.longitude,
        addressDescription: body.address_description,
        description: body.description,
        photo: body.photo,
      });
      return res.status(201).json({ data: serializeTransition(result) });
    } catch (error) {
      next(error);
    }
  },

  // GET /api/v1/reports/:id
  getReport: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = reportIdParamsSchema.parse(req.params);
      const report = await lifecycle.getReport(currentActor(req), id);
      return res.status(200).json({ data: serializeReport(report) });
    } catch (error) {
      next(error);
    }
  },

  // DELETE /api/v1/reports/:id
  deleteReport: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = reportIdParamsSchema.parse(req.params);
      await lifecycle.deleteReport(currentActor(req), id);
      return res.status(204).send();
    } catch (error) {
      next(error);
    }
  },

  // PATCH /api/v1/reports/:id/assign
  assignReport: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = reportIdParamsSchema.parse(req.params);
      const body = assignReportSchema.parse(req.body ?? {});
      const result = await lifecycle.assignReport(currentActor(req), id, {
        collectorId: body.collector_id,
        startNow: body.start_now,
      });
      return res.status(200).json({ data: serializeTransition(result) });
    } catch (error) {
      next(error);
    }
  },

  // PATCH /api/v1/reports/:id/reassign
  reassignReport: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = reportIdParamsSchema.parse(req.params);
      const body = reassignReportSchema.parse(req.body);
      const result = await lifecycle.reassignReport(currentActor(req), id, body.collector_id);
      return res.status(200).json({ data: serializeTransition(result) });
    } catch (error) {
      next(error);
    }
  },

  // PATCH /api/v1/reports/:id/start
  startCleanup: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = reportIdParamsSchema.parse(req.params);
      const result = await lifecycle.startCleanup(currentActor(req), id);
      return res.status(200).json({ data: serializeTransition(result) });
    } catch (error) {
      next(error);
    }
  },

  // POST /api/v1/reports/:id/cleanup-photo
  submitCleanupPhoto: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = reportIdParamsSchema.parse(req.params);
      const body = cleanupPhotoSchema.parse(req.body);
      const result = await lifecycle.submitCleanupPhoto(currentActor(req), id, {
        photo: body.photo,
        notes: body.notes,
      });
      return res.status(200).json({ data: serializeTransition(result) });
    } catch (error) {
      next(error);
    }
  },

  // POST /api/v1/reports/:id/confirm-cleanup (auth optional, code accepted)
  confirmCleanup: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = reportIdParamsSchema.parse(req.params);
      const body = confirmCleanupSchema.parse(req.body);
      const result = await lifecycle.confirmCleanup(req.actor ?? null, id, body);
      return res.status(200).json({ data: serializeTransition(result) });
    } catch (error) {
      next(error);
    }
  },

  // GET /api/v1/reports/:id/cleanup-status?code=
  getCleanupStatus: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = reportIdParamsSchema.parse(req.params);
      const { code } = cleanupStatusQuerySchema.parse(req.query);
      const status = await lifecycle.getCleanupStatus(req.actor ?? null, id, code);
      return res.status(200).json({ data: serializeCleanupStatus(status) });
    } catch (error) {
      next(error);
    }
  },

  // PUT /api/v1/reports/:id/resolve-dispute
  resolveDispute: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = reportIdParamsSchema.parse(req.params);
      const body = resolveDisputeSchema.parse(req.body);
      const result = await lifecycle.resolveDispute(currentActor(req), id, body);
      return res.status(200).json({ data: serializeTransition(result) });
    } catch (error) {
      next(error);
    }
  },

  // PUT /api/v1/reports/:id/weight
  recordWeight: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = reportIdParamsSchema.parse(req.params);
      const body = recordWeightSchema.parse(req.body);
      const result = await lifecycle.recordWeight(currentActor(req), id, body.weight_kg);
      return res.status(200).json({ data: serializeTransition(result) });
    } catch (error) {
      next(error);
    }
  },

  // PUT /api/v1/reports/:id/confirm-collection
  legacyConfirm: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = reportIdParamsSchema.parse(req.params);
      const result = await lifecycle.legacyConfirm(currentActor(req), id);
      return res.status(200).json({ data: serializeTransition(result) });
    } catch (error) {
      next(error);
    }
  },

  // GET /api/v1/reports/awaiting-confirmation
  listAwaitingConfirmation: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit, offset } = paginationSchema.parse(req.query);
      const reports = await lifecycle.listAwaitingConfirmation(currentActor(req), limit, offset);
      return res.status(200).json({ data: reports.map(serializeReport) });
    } catch (error) {
      next(error);
    }
  },

  // GET /api/v1/reports/disputed
  listDisputed: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit, offset } = paginationSchema.parse(req.query);
      const reports = await lifecycle.listDisputed(currentActor(req), limit, offset);
      return res.status(200).json({ data: reports.map(serializeReport) });
    } catch (error) {
      next(error);
    }
  },

  // GET /api/v1/reports/my-reports?status=
  listMyReports: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = reportListQuerySchema.parse(req.query);
      const reports = await lifecycle.listMyReports(currentActor(req), query);
      return res.status(200).json({ data: reports.map(serializeReport) });
    } catch (error) {
      next(error);
    }
  },

  // GET /api/v1/reports/collector/:collectorId
  listCollectorReports: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { collectorId } = collectorParamsSchema.parse(req.params);
      const query = reportListQuerySchema.parse(req.query);
      const reports = await lifecycle.listCollectorReports(currentActor(req), collectorId, query);
      return res.status(200).json({ data: reports.map(serializeReport) });
    } catch (error) {
      next(error);
    }
  },

  // GET /api/v1/reports/collector/:collectorId/stats
  getCollectorStats: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { collectorId } = collectorParamsSchema.parse(req.params);
      const stats = await lifecycle.getCollectorStats(currentActor(req), collectorId);
      return res.status(200).json({ data: serializeCollectorStats(collectorId, stats) });
    } catch (error) {
      next(error);
    }
  },
});

export type ReportController = ReturnType<typeof createReportController>;
