import { NewNotification, WasteRepository } from '../repositories/types';
import { Clock } from '../utils/clock';
import { logger } from '../utils/logger';
import { NotificationRecord } from '../types';

const notificationLogger = logger.child({ module: 'notifications' });

export interface NotificationData {
  report_id?: string;
  points_earned?: number;
  confirmation_deadline?: string;
  period?: string;
}

/**
 * Best-effort user notifications. A failed write is logged and reported
 * as null; it never fails the lifecycle transition that triggered it.
 */
export class NotificationService {
  constructor(
    private readonly repo: WasteRepository,
    private readonly clock: Clock
  ) {}

  async createNotification(
    userId: string,
    type: string,
    title: string,
    message: string,
    data?: NotificationData
  ): Promise<NotificationRecord | null> {
    const notification: NewNotification = { userId, type, title, message, data: { ...data } };
    try {
      const record = await this.repo.insertNotification(notification, this.clock.now());
      notificationLogger.debug({ userId, type }, 'Notification created');
      return record;
    } catch (error) {
      notificationLogger.warn({ err: error, userId, type }, 'Failed to create notification');
      return null;
    }
  }

  // Common notification templates
  async notifyCleanupSubmitted(userId: string, reportId: string, deadline: Date) {
    return this.createNotification(
      userId,
      'cleanup_submitted',
      'Cleanup done, please confirm 🧹',
      'A collector has cleaned the site you reported. Confirm or dispute the cleanup before the deadline.',
      { report_id: reportId, confirmation_deadline: deadline.toISOString() }
    );
  }

  async notifyReportCompleted(userId: string, reportId: string, points: number) {
    return this.createNotification(
      userId,
      'report_completed',
      'Report completed! 🎉',
      points > 0
        ? `Your waste report is closed. You earned ${points} points!`
        : 'Your waste report is closed.',
      { report_id: reportId, points_earned: points }
    );
  }

  async notifyAutoConfirmed(userId: string, reportId: string) {
    return this.createNotification(
      userId,
      'report_auto_confirmed',
      'Report auto-confirmed ⏰',
      'The confirmation deadline passed, so the cleanup of your report was confirmed automatically.',
      { report_id: reportId }
    );
  }

  async notifyDisputeResolved(userId: string, reportId: string, accepted: boolean) {
    return this.createNotification(
      userId,
      'dispute_resolved',
      accepted ? 'Dispute closed ✅' : 'Cleanup will be redone 🔁',
      accepted
        ? 'A supervisor reviewed your dispute and confirmed the cleanup.'
        : 'A supervisor upheld your dispute. The site will be cleaned again.',
      { report_id: reportId }
    );
  }

  async notifyPointsEarned(userId: string, points: number, reason: string, data?: NotificationData) {
    return this.createNotification(
      userId,
      'points_earned',
      'Points earned! 💰',
      `You earned ${points} points for ${reason}`,
      { ...data, points_earned: points }
    );
  }
}
