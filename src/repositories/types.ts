import {
  CitizenStats,
  CollectorStats,
  NewReport,
  NewUser,
  NotificationRecord,
  PointEntry,
  Report,
  ReportPatch,
  ReportStatus,
  User,
} from '../types';

export interface ReportFilter {
  status?: ReportStatus;
  ownerId?: string;
  collectorId?: string;
  // Restrict to reports whose owner lives in this commune (case-insensitive)
  ownerCommune?: string;
  orderBy?: 'created_at' | 'confirmation_deadline' | 'last_action_at';
  limit?: number;
  offset?: number;
}

export interface NewNotification {
  userId: string;
  type: string;
  title: string;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Persistence contract consumed by the lifecycle. Every method is a single
 * statement or a short group of statements; multi-step transitions run
 * inside `transaction`, which hands the work a repository bound to the
 * open transaction.
 */
export interface WasteRepository {
  transaction<T>(work: (repo: WasteRepository) => Promise<T>): Promise<T>;

  // Reports
  findReport(id: string, options?: { forUpdate?: boolean }): Promise<Report | null>;
  insertReport(report: NewReport): Promise<Report>;
  updateReport(id: string, patch: ReportPatch): Promise<Report>;
  deleteReport(id: string): Promise<void>;
  listReports(filter: ReportFilter): Promise<Report[]>;
  isConfirmationCodeTaken(code: string): Promise<boolean>;
  findExpiredConfirmationIds(now: Date): Promise<string[]>;
  /**
   * Conditional auto-confirmation: only applies while the row is still
   * awaiting confirmation past its deadline and neither confirmed nor
   * auto-confirmed. Returns null when the guard did not match.
   */
  autoConfirm(id: string, now: Date): Promise<Report | null>;
  getCollectorStats(collectorId: string): Promise<CollectorStats>;

  // Users and points
  findUser(id: string): Promise<User | null>;
  insertUser(user: NewUser): Promise<User>;
  /**
   * Records ledger rows keyed by (sourceKey, component), skipping any that
   * already exist, and increments the user's balance by the sum of the rows
   * actually written. Returns the entries that were credited.
   */
  creditPoints(userId: string, sourceKey: string, entries: PointEntry[], now: Date): Promise<PointEntry[]>;
  getCitizenStats(userId: string): Promise<CitizenStats>;

  // Subscriptions
  listSubscribedCitizens(): Promise<User[]>;
  hasValidSubscription(userId: string, now: Date): Promise<boolean>;
  setSubscriptionActive(userId: string, active: boolean): Promise<void>;

  // Notifications
  insertNotification(notification: NewNotification, now: Date): Promise<NotificationRecord>;
  listNotifications(userId: string, limit: number): Promise<NotificationRecord[]>;
}

export const reportSourceKey = (reportId: string): string => `report:${reportId}`;

export const subscriptionSourceKey = (userId: string, period: Date): string => {
  const month = String(period.getUTCMonth() + 1).padStart(2, '0');
  return `subscription:${userId}:${period.getUTCFullYear()}-${month}`;
};
