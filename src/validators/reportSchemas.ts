import { z } from 'zod';
import { PhotoUpload, ReportStatus } from '../types';

const IMAGE_FILENAME = /\.(jpe?g|png|webp|heic)$/i;

export const photoSchema = z
  .object({
    filename: z.string().trim().min(1).regex(IMAGE_FILENAME, 'must be a jpg, png, webp or heic file'),
    content_base64: z.string().min(1),
  })
  .transform((photo): PhotoUpload => ({
    filename: photo.filename,
    content: Buffer.from(photo.content_base64, 'base64'),
  }))
  .refine((photo) => photo.content.length > 0, 'photo content is empty');

export const createReportSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  address_description: z.string().max(500).optional(),
  description: z.string().max(5000).optional(),
  photo: photoSchema,
});

export const assignReportSchema = z.object({
  collector_id: z.string().min(1).optional(),
  start_now: z.boolean().optional(),
});

export const reassignReportSchema = z.object({
  collector_id: z.string().min(1),
});

export const cleanupPhotoSchema = z.object({
  photo: photoSchema,
  notes: z.string().max(2000).optional(),
});

export const confirmCleanupSchema = z.object({
  confirmed: z.boolean(),
  reason: z.string().max(2000).optional(),
  code: z.string().max(32).optional(),
});

export const resolveDisputeSchema = z.object({
  resolution: z.string(),
  notes: z.string().max(2000).optional(),
});

export const recordWeightSchema = z.object({
  weight_kg: z.number(),
});

export const paginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export const reportListQuerySchema = paginationSchema.extend({
  status: z.nativeEnum(ReportStatus).optional(),
});

export const collectorParamsSchema = z.object({
  collectorId: z.string().min(1),
});

export const cleanupStatusQuerySchema = z.object({
  code: z.string().max(32).optional(),
});

export const reportIdParamsSchema = z.object({
  id: z.string().min(1),
});
