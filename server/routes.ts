import type { Express, Request } from "express";
import type { z } from "zod";
import type { ScanResult } from "@shared/schema";
import { api } from "@shared/routes";
import { AppError, ErrorCode, ValidationError } from "./error-handling";
import { attachUser, currentUserId, requireAdmin, requireAuth } from "./auth";
import { decodeBase64Image } from "./image-validation";
import { EXTENSION_BY_CONTENT_TYPE, type BlobStore } from "./blob-storage";
import { monitoring, type HealthState } from "./monitoring";
import { cache } from "./cache-service";
import type { BreedClassifier } from "./classifier-client";
import type { CorrectionService } from "./corrections";
import type { ScanPipeline } from "./scan-pipeline";
import type { ScanRecords } from "./scan-records";
import type { AgeSimulationQueue } from "./age-simulation-queue";
import type { IStorage } from "./storage";

export interface AppServices {
  storage: IStorage;
  records: ScanRecords;
  blobs: BlobStore;
  pipeline: ScanPipeline;
  corrections: CorrectionService;
  classifier: BreedClassifier;
  queue: AgeSimulationQueue;
}

const CONTENT_TYPE_BY_EXTENSION: Record<string, string> = Object.fromEntries(
  Object.entries(EXTENSION_BY_CONTENT_TYPE).map(([type, ext]) => [ext, type]),
);

// Wildcard routes keep the untyped params dictionary
const FILES_ROUTE: string = '/api/files/*';

function parseInput<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'body';
    throw new ValidationError(issue?.message ?? 'Invalid input', field, ErrorCode.INVALID_INPUT);
  }
  return parsed.data;
}

function parseId(raw: string): number {
  const id = Number.parseInt(raw, 10);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError('Invalid id', 'id', ErrorCode.INVALID_INPUT);
  }
  return id;
}

function userIdOf(req: Request): number {
  if (!req.user) {
    throw new AppError(ErrorCode.UNAUTHORIZED);
  }
  return req.user.id;
}

// Anonymous scans are reachable by link; owned scans only by the owner or an admin
function assertCanAccess(req: Request, record: ScanResult): void {
  if (record.userId === null || req.user?.isAdmin) return;
  if (req.user?.id !== record.userId) {
    throw new AppError(ErrorCode.SCAN_NOT_FOUND, undefined, { scanId: record.scanId });
  }
}

async function findAccessibleScan(services: AppServices, req: Request, scanId: string): Promise<ScanResult> {
  const record = await services.records.get(scanId);
  if (!record) {
    throw new AppError(ErrorCode.SCAN_NOT_FOUND, undefined, { scanId });
  }
  assertCanAccess(req, record);
  return record;
}

const HEALTH_RANK: Record<HealthState, number> = { healthy: 0, degraded: 1, down: 2 };

export function registerRoutes(app: Express, services: AppServices): void {
  const { storage, records, blobs, pipeline, corrections, classifier, queue } = services;

  app.use('/api', attachUser(storage));

  // ============ SCANS ============

  app.post(api.scans.analyze.path, async (req, res, next) => {
    try {
      const input = parseInput(api.scans.analyze.input, req.body);
      const { record, source } = await pipeline.analyze({
        buffer: decodeBase64Image(input.imageBase64),
        fileName: input.fileName,
        userId: currentUserId(req),
      });
      res.status(201).json({ scan: records.toResponse(record), cached: source !== 'analysis' });
    } catch (err) {
      next(err);
    }
  });

  app.get(api.scans.list.path, requireAuth, async (req, res, next) => {
    try {
      const results = await storage.getScanResults(currentUserId(req));
      res.json({ results: results.map(record => records.toResponse(record)) });
    } catch (err) {
      next(err);
    }
  });

  app.get(api.scans.get.path, async (req, res, next) => {
    try {
      const record = await findAccessibleScan(services, req, req.params.scanId);
      res.json(records.toResponse(record));
    } catch (err) {
      next(err);
    }
  });

  app.delete(api.scans.delete.path, async (req, res, next) => {
    try {
      await findAccessibleScan(services, req, req.params.scanId);
      await pipeline.deleteScan(req.params.scanId);
      res.json({ success: true });
    } catch (err) {
      next(err);
    }
  });

  // ============ AGE SIMULATION ============

  app.get(api.simulations.status.path, async (req, res, next) => {
    try {
      await findAccessibleScan(services, req, req.params.scanId);
      const status = await records.getSimulationStatus(req.params.scanId);
      if (!status) {
        throw new AppError(ErrorCode.SCAN_NOT_FOUND, undefined, { scanId: req.params.scanId });
      }
      // Pollers must never see a stale status from an intermediary
      res.set({
        'Cache-Control': 'no-store, no-cache, must-revalidate',
        'Pragma': 'no-cache',
      });
      res.json(status);
    } catch (err) {
      next(err);
    }
  });

  app.post(api.simulations.regenerate.path, async (req, res, next) => {
    try {
      await findAccessibleScan(services, req, req.params.scanId);
      const simulation = await pipeline.regenerateSimulation(req.params.scanId);
      res.status(202).json({ status: simulation.status });
    } catch (err) {
      next(err);
    }
  });

  // ============ CORRECTIONS (ADMIN) ============

  app.post(api.corrections.create.path, requireAdmin, async (req, res, next) => {
    try {
      const input = parseInput(api.corrections.create.input, req.body);
      const outcome = await corrections.correctBreed(input.scanId, input.correctedBreed);
      res.status(201).json({
        success: true,
        teachingFailed: outcome.teaching.failed,
        teachingStatus: outcome.teaching.status,
        message: outcome.message,
        correctionId: outcome.correction.id,
      });
    } catch (err) {
      next(err);
    }
  });

  app.get(api.corrections.list.path, requireAdmin, async (_req, res, next) => {
    try {
      res.json({ corrections: await corrections.list() });
    } catch (err) {
      next(err);
    }
  });

  app.delete(api.corrections.delete.path, requireAdmin, async (req, res, next) => {
    try {
      await corrections.delete(parseId(req.params.id));
      res.json({ success: true });
    } catch (err) {
      next(err);
    }
  });

  app.post(api.corrections.reteach.path, requireAdmin, async (req, res, next) => {
    try {
      const { correction, teaching } = await corrections.reteach(parseId(req.params.id));
      res.json({
        success: !teaching.failed,
        teachingStatus: teaching.status,
        message: teaching.message,
        correction,
      });
    } catch (err) {
      next(err);
    }
  });

  app.get(api.corrections.trainingQueue.path, requireAdmin, async (_req, res, next) => {
    try {
      const queued = await corrections.trainingQueue();
      res.json({
        scans: queued.scans.map(record => records.toResponse(record)),
        corrections: queued.corrections,
        stats: queued.stats,
      });
    } catch (err) {
      next(err);
    }
  });

  app.get(api.corrections.classifierStats.path, requireAdmin, async (_req, res, next) => {
    try {
      res.json(await corrections.classifierStats());
    } catch (err) {
      next(err);
    }
  });

  // ============ NOTIFICATIONS ============

  app.get(api.notifications.list.path, requireAuth, async (req, res, next) => {
    try {
      res.json(await storage.getNotifications(userIdOf(req)));
    } catch (err) {
      next(err);
    }
  });

  app.get(api.notifications.unreadCount.path, requireAuth, async (req, res, next) => {
    try {
      res.json({ count: await storage.getUnreadNotificationCount(userIdOf(req)) });
    } catch (err) {
      next(err);
    }
  });

  app.post(api.notifications.markAllRead.path, requireAuth, async (req, res, next) => {
    try {
      res.json({ updated: await storage.markAllNotificationsRead(userIdOf(req)) });
    } catch (err) {
      next(err);
    }
  });

  app.post(api.notifications.markRead.path, requireAuth, async (req, res, next) => {
    try {
      const notification = await storage.markNotificationRead(parseId(req.params.id), userIdOf(req));
      if (!notification) {
        res.status(404).json({ message: 'Notification not found' });
        return;
      }
      res.json(notification);
    } catch (err) {
      next(err);
    }
  });

  app.delete(api.notifications.delete.path, requireAuth, async (req, res, next) => {
    try {
      const deleted = await storage.deleteNotification(parseId(req.params.id), userIdOf(req));
      if (!deleted) {
        res.status(404).json({ message: 'Notification not found' });
        return;
      }
      res.json({ success: true });
    } catch (err) {
      next(err);
    }
  });

  // ============ FILES & HEALTH ============

  app.get(FILES_ROUTE, async (req, res, next) => {
    try {
      const path = req.params[0];
      if (!path || path.split('/').includes('..')) {
        res.status(404).json({ message: 'File not found' });
        return;
      }
      if (!(await blobs.exists(path))) {
        res.status(404).json({ message: 'File not found' });
        return;
      }
      const extension = path.slice(path.lastIndexOf('.') + 1).toLowerCase();
      res.type(CONTENT_TYPE_BY_EXTENSION[extension] ?? 'application/octet-stream');
      // Stored files are images only, never documents
      res.set({
        'X-Content-Type-Options': 'nosniff',
        'Content-Security-Policy': "default-src 'none'; sandbox",
      });
      res.send(await blobs.get(path));
    } catch (err) {
      next(err);
    }
  });

  app.get(api.health.path, async (_req, res, next) => {
    try {
      const dependencies = monitoring.getHealthStatus();
      const worst = Object.values(dependencies)
        .map(service => service.status)
        .reduce<HealthState>((acc, state) => (HEALTH_RANK[state] > HEALTH_RANK[acc] ? state : acc), 'healthy');
      const classifierReachable = await classifier.isHealthy();

      res.json({
        status: worst,
        classifierReachable,
        services: dependencies,
        queue: queue.size,
        cache: cache.getStats(),
      });
    } catch (err) {
      next(err);
    }
  });
}
