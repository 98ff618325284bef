import { z } from 'zod';
import { insertBreedCorrectionSchema, simulationStatuses, verificationStatuses } from './schema';

export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;
export const MAX_IMAGE_DIMENSION = 10000;

export const errorSchemas = {
  validation: z.object({
    message: z.string(),
    field: z.string().optional(),
  }),
  notFound: z.object({
    message: z.string(),
  }),
  internal: z.object({
    message: z.string(),
  }),
};

const predictionSchema = z.object({
  breed: z.string(),
  confidence: z.number(),
});

const simulationBlockSchema = z.object({
  status: z.enum(simulationStatuses),
  '1_years': z.string().nullable(),
  '3_years': z.string().nullable(),
  breed_profile: z.unknown().nullable(),
  error: z.string().nullable(),
});

export const scanResultResponseSchema = z.object({
  scan_id: z.string(),
  breed: z.string(),
  confidence: z.number(),
  top_predictions: z.array(predictionSchema),
  verification_status: z.enum(verificationStatuses),
  prediction_method: z.string().nullable(),
  description: z.string().nullable(),
  origin_history: z.unknown().nullable(),
  health_risks: z.unknown().nullable(),
  image: z.string().nullable(),
  simulation: simulationBlockSchema,
  created_at: z.string(),
});
export type ScanResultResponse = z.infer<typeof scanResultResponseSchema>;

export const simulationStatusResponseSchema = z.object({
  status: z.enum(simulationStatuses),
  simulations: z.object({
    '1_years': z.string().nullable(),
    '3_years': z.string().nullable(),
  }),
  original_image: z.string().nullable(),
  breed: z.string(),
  scan_id: z.string(),
  timestamp: z.number(),
  progress: z.object({
    completed: z.number(),
    total: z.number(),
    percentage: z.number(),
  }),
  breed_profile: z.unknown().nullable(),
  error: z.string().nullable(),
});
export type SimulationStatusResponse = z.infer<typeof simulationStatusResponseSchema>;

export const api = {
  scans: {
    analyze: {
      method: 'POST' as const,
      path: '/api/analyze',
      input: z.object({
        imageBase64: z.string().min(1, 'Please select an image to upload.'),
        fileName: z.string().max(255).optional(),
      }),
      responses: {
        201: z.object({ scan: scanResultResponseSchema, cached: z.boolean() }),
        400: errorSchemas.validation,
        422: z.object({ code: z.literal('NOT_A_DOG'), title: z.string(), message: z.string() }),
      },
    },
    list: {
      method: 'GET' as const,
      path: '/api/results',
      responses: { 200: z.object({ results: z.array(scanResultResponseSchema) }) },
    },
    get: {
      method: 'GET' as const,
      path: '/api/results/:scanId',
      responses: { 200: scanResultResponseSchema, 404: errorSchemas.notFound },
    },
    delete: {
      method: 'DELETE' as const,
      path: '/api/results/:scanId',
      responses: { 200: z.object({ success: z.boolean() }), 404: errorSchemas.notFound },
    },
  },
  simulations: {
    status: {
      method: 'GET' as const,
      path: '/api/results/:scanId/simulation-status',
      responses: { 200: simulationStatusResponseSchema, 404: errorSchemas.notFound },
    },
    regenerate: {
      method: 'POST' as const,
      path: '/api/results/:scanId/simulation/regenerate',
      responses: { 202: z.object({ status: z.enum(simulationStatuses) }), 404: errorSchemas.notFound },
    },
  },
  corrections: {
    create: {
      method: 'POST' as const,
      path: '/api/admin/corrections',
      input: insertBreedCorrectionSchema.pick({ scanId: true }).extend({
        correctedBreed: z.string().trim().min(1).max(255),
      }),
      responses: {
        201: z.object({
          success: z.literal(true),
          teachingFailed: z.boolean(),
          teachingStatus: z.string(),
          message: z.string(),
          correctionId: z.number(),
        }),
        404: errorSchemas.notFound,
      },
    },
    list: {
      method: 'GET' as const,
      path: '/api/admin/corrections',
    },
    delete: {
      method: 'DELETE' as const,
      path: '/api/admin/corrections/:id',
    },
    reteach: {
      method: 'POST' as const,
      path: '/api/admin/corrections/:id/reteach',
    },
    trainingQueue: {
      method: 'GET' as const,
      path: '/api/admin/training-queue',
    },
    classifierStats: {
      method: 'GET' as const,
      path: '/api/admin/classifier/stats',
    },
  },
  notifications: {
    list: { method: 'GET' as const, path: '/api/notifications' },
    unreadCount: { method: 'GET' as const, path: '/api/notifications/unread-count' },
    markRead: { method: 'POST' as const, path: '/api/notifications/:id/read' },
    markAllRead: { method: 'POST' as const, path: '/api/notifications/read-all' },
    delete: { method: 'DELETE' as const, path: '/api/notifications/:id' },
  },
  health: {
    method: 'GET' as const,
    path: '/api/health',
  },
};
