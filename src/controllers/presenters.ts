import { CollectorStats, NotificationRecord, Report } from '../types';
import { CleanupStatus, TransitionResult } from '../services/reportLifecycle';

const iso = (date: Date | null): string | null => (date ? date.toISOString() : null);

export const serializeReport = (report: Report) => ({
  id: report.id,
  latitude: report.latitude,
  longitude: report.longitude,
  address_description: report.addressDescription,
  description: report.description,
  image_url: report.imageUrl,
  weight_kg: report.weightKg,
  weight_verified_at: iso(report.weightVerifiedAt),
  weight_verified_by: report.weightVerifiedBy,
  description_quality_score: report.descriptionQualityScore,
  status: report.status,
  cleanup_photo_url: report.cleanupPhotoUrl,
  cleanup_photo_submitted_at: iso(report.cleanupPhotoSubmittedAt),
  citizen_confirmed: report.citizenConfirmed,
  citizen_confirmed_at: iso(report.citizenConfirmedAt),
  confirmation_deadline: iso(report.confirmationDeadline),
  auto_confirmed: report.autoConfirmed,
  dispute_reason: report.disputeReason,
  last_action: report.lastAction,
  last_action_at: iso(report.lastActionAt),
  created_at: report.createdAt.toISOString(),
  resolved_at: iso(report.resolvedAt),
  user_id: report.userId,
  collector_id: report.collectorId,
});

// The confirmation code is only handed out through the cleanup status read
export const serializeTransition = (result: TransitionResult) => ({
  report: serializeReport(result.report),
  ...(result.pointsCredited !== undefined && { points_credited: result.pointsCredited }),
  ...(result.pointsBreakdown !== undefined && { points_breakdown: result.pointsBreakdown }),
});

export const serializeCleanupStatus = (status: CleanupStatus) => ({
  report_id: status.reportId,
  status: status.status,
  cleanup_photo_url: status.cleanupPhotoUrl,
  cleanup_photo_submitted_at: iso(status.cleanupPhotoSubmittedAt),
  confirmation_deadline: iso(status.confirmationDeadline),
  confirmation_code: status.confirmationCode,
  can_confirm: status.canConfirm,
  citizen_confirmed: status.citizenConfirmed,
  auto_confirmed: status.autoConfirmed,
  dispute_reason: status.disputeReason,
  points_estimate: status.pointsEstimate,
});

export const serializeCollectorStats = (collectorId: string, stats: CollectorStats) => ({
  collector_id: collectorId,
  assigned: stats.assigned,
  awaiting_confirmation: stats.awaitingConfirmation,
  completed: stats.completed,
  disputed: stats.disputed,
  total_weight_kg: stats.totalWeightKg,
});

export const serializeNotification = (notification: NotificationRecord) => ({
  id: notification.id,
  type: notification.type,
  title: notification.title,
  message: notification.message,
  data: notification.data,
  is_read: notification.isRead,
  created_at: notification.createdAt.toISOString(),
});
