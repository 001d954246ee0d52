import { randomUUID } from 'crypto';
import { SqliteDatabase } from '../config/sqlite';
import { AppError } from '../lib/errors';
import { Role } from '../lib/permissions';
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
import {
  mapNotificationRow,
  mapReportRow,
  mapUserRow,
  NotificationRow,
  patchAssignments,
  ReportRow,
  UserRow,
} from './rowMapping';
import { NewNotification, ReportFilter, WasteRepository } from './types';

type SqlValue = string | number | null;

const toSqlValue = (value: string | number | boolean | Date | null | undefined): SqlValue => {
  if (value === undefined || value === null) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
};

const REPORT_SELECT = `
  SELECT r.*, u.commune AS owner_commune
  FROM reports r
  JOIN users u ON u.id = r.user_id
`;

const ORDER_BY: Record<NonNullable<ReportFilter['orderBy']>, string> = {
  created_at: 'r.created_at DESC',
  confirmation_deadline: 'r.confirmation_deadline ASC',
  last_action_at: 'r.last_action_at DESC',
};

/**
 * better-sqlite3 adapter. The driver is synchronous and the connection is
 * shared, so every statement issued outside a transaction and every
 * BEGIN ... COMMIT block goes through one promise chain: a root-level write
 * never lands inside another caller's open transaction.
 */
export class SqliteWasteRepository implements WasteRepository {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly db: SqliteDatabase,
    private readonly inTransaction: boolean = false
  ) {}

  async transaction<T>(work: (repo: WasteRepository) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return work(this);
    }

    return this.enqueue(async () => {
      this.db.exec('BEGIN IMMEDIATE');
      try {
        const result = await work(new SqliteWasteRepository(this.db, true));
        this.db.exec('COMMIT');
        return result;
      } catch (error) {
        this.db.exec('ROLLBACK');
        throw error;
      }
    });
  }

  // ==================== REPORTS ====================

  async findReport(id: string): Promise<Report | null> {
    return this.serialised(() => this.selectReport(id));
  }

  async insertReport(report: NewReport): Promise<Report> {
    return this.serialised(() => {
      this.db
        .prepare(
          `INSERT INTO reports (
            id, latitude, longitude, address_description, description, image_url,
            description_quality_score, status, user_id, last_action, last_action_at, created_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 'created', ?, ?)`
        )
        .run(
          report.id,
          report.latitude,
          report.longitude,
          report.addressDescription,
          report.description,
          report.imageUrl,
          report.descriptionQualityScore,
          ReportStatus.PENDING,
          report.userId,
          toSqlValue(report.createdAt),
          toSqlValue(report.createdAt)
        );
      return this.requireReport(report.id);
    });
  }

  async updateReport(id: string, patch: ReportPatch): Promise<Report> {
    return this.serialised(() => {
      const assignments = patchAssignments(patch);
      if (assignments.length > 0) {
        const setClause = assignments.map(({ column }) => `${column} = ?`).join(', ');
        const values = assignments.map(({ value }) => toSqlValue(value));
        this.db.prepare(`UPDATE reports SET ${setClause} WHERE id = ?`).run(...values, id);
      }
      return this.requireReport(id);
    });
  }

  async deleteReport(id: string): Promise<void> {
    return this.serialised(() => {
      this.db.prepare('DELETE FROM reports WHERE id = ?').run(id);
    });
  }

  async listReports(filter: ReportFilter): Promise<Report[]> {
    return this.serialised(() => {
      const conditions: string[] = [];
      const params: SqlValue[] = [];

      if (filter.status) {
        conditions.push('r.status = ?');
        params.push(filter.status);
      }
      if (filter.ownerId) {
        conditions.push('r.user_id = ?');
        params.push(filter.ownerId);
      }
      if (filter.collectorId) {
        conditions.push('r.collector_id = ?');
        params.push(filter.collectorId);
      }
      if (filter.ownerCommune) {
        conditions.push('LOWER(TRIM(u.commune)) = LOWER(TRIM(?))');
        params.push(filter.ownerCommune);
      }

      const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
      const orderBy = ORDER_BY[filter.orderBy ?? 'created_at'];
      params.push(filter.limit ?? 50, filter.offset ?? 0);

      const rows = this.db
        .prepare<unknown[], ReportRow>(`${REPORT_SELECT} ${where} ORDER BY ${orderBy} LIMIT ? OFFSET ?`)
        .all(...params);
      return rows.map(mapReportRow);
    });
  }

  async isConfirmationCodeTaken(code: string): Promise<boolean> {
    return this.serialised(() => {
      const row = this.db
        .prepare<unknown[], { id: string }>('SELECT id FROM reports WHERE confirmation_code = ?')
        .get(code);
      return row !== undefined;
    });
  }

  async findExpiredConfirmationIds(now: Date): Promise<string[]> {
    return this.serialised(() => {
      const rows = this.db
        .prepare<unknown[], { id: string }>(
          `SELECT id FROM reports
           WHERE status = ? AND confirmation_deadline < ?
             AND citizen_confirmed = 0 AND auto_confirmed = 0
           ORDER BY confirmation_deadline ASC`
        )
        .all(ReportStatus.AWAITING_CONFIRMATION, toSqlValue(now));
      return rows.map((row) => row.id);
    });
  }

  async autoConfirm(id: string, now: Date): Promise<Report | null> {
    return this.serialised(() => {
      const stamp = toSqlValue(now);
      const result = this.db
        .prepare(
          `UPDATE reports
           SET auto_confirmed = 1, status = ?, resolved_at = ?,
               last_action = 'auto_confirmed', last_action_at = ?
           WHERE id = ? AND status = ? AND confirmation_deadline < ?
             AND citizen_confirmed = 0 AND auto_confirmed = 0`
        )
        .run(ReportStatus.COMPLETED, stamp, stamp, id, ReportStatus.AWAITING_CONFIRMATION, stamp);

      if (result.changes === 0) return null;
      return this.requireReport(id);
    });
  }

  async getCollectorStats(collectorId: string): Promise<CollectorStats> {
    return this.serialised(() => {
      const row = this.db
        .prepare<
          unknown[],
          {
            assigned: number;
            awaiting: number | null;
            completed: number | null;
            disputed: number | null;
            total_weight: number | null;
          }
        >(
          `SELECT COUNT(*) AS assigned,
                  SUM(CASE WHEN status = 'AWAITING_CONFIRMATION' THEN 1 ELSE 0 END) AS awaiting,
                  SUM(CASE WHEN status = 'COMPLETED' THEN 1 ELSE 0 END) AS completed,
                  SUM(CASE WHEN status = 'DISPUTED' THEN 1 ELSE 0 END) AS disputed,
                  SUM(CASE WHEN status = 'COMPLETED' THEN weight_kg END) AS total_weight
           FROM reports WHERE collector_id = ?`
        )
        .get(collectorId);
      return {
        assigned: row?.assigned ?? 0,
        awaitingConfirmation: row?.awaiting ?? 0,
        completed: row?.completed ?? 0,
        disputed: row?.disputed ?? 0,
        totalWeightKg: row?.total_weight ?? 0,
      };
    });
  }

  // ==================== USERS & POINTS ====================

  async findUser(id: string): Promise<User | null> {
    return this.serialised(() => this.selectUser(id));
  }

  async insertUser(user: NewUser): Promise<User> {
    return this.serialised(() => {
      this.db
        .prepare(
          `INSERT INTO users (id, full_name, role, commune, points, subscription_active, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          user.id,
          user.fullName,
          user.role,
          user.commune,
          user.points ?? 0,
          toSqlValue(user.subscriptionActive),
          toSqlValue(user.createdAt ?? new Date())
        );

      const created = this.selectUser(user.id);
      if (!created) throw AppError.notFound('User', user.id);
      return created;
    });
  }

  async creditPoints(userId: string, sourceKey: string, entries: PointEntry[], now: Date): Promise<PointEntry[]> {
    if (!this.inTransaction) {
      return this.transaction((repo) => repo.creditPoints(userId, sourceKey, entries, now));
    }

    const insert = this.db.prepare(
      `INSERT OR IGNORE INTO point_credits (id, user_id, source_key, component, points, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`
    );

    const credited: PointEntry[] = [];
    for (const entry of entries) {
      if (entry.points <= 0) continue;
      const result = insert.run(randomUUID(), userId, sourceKey, entry.component, entry.points, toSqlValue(now));
      if (result.changes > 0) {
        credited.push(entry);
      }
    }

    const total = credited.reduce((sum, entry) => sum + entry.points, 0);
    if (total > 0) {
      this.db.prepare('UPDATE users SET points = points + ? WHERE id = ?').run(total, userId);
    }
    return credited;
  }

  async getCitizenStats(userId: string): Promise<CitizenStats> {
    return this.serialised(() => {
      const row = this.db
        .prepare<unknown[], { total_reports: number; total_weight: number | null }>(
          'SELECT COUNT(*) AS total_reports, SUM(weight_kg) AS total_weight FROM reports WHERE user_id = ?'
        )
        .get(userId);
      return {
        totalReports: row?.total_reports ?? 0,
        totalWeightKg: row?.total_weight ?? 0,
      };
    });
  }

  // ==================== SUBSCRIPTIONS ====================

  async listSubscribedCitizens(): Promise<User[]> {
    return this.serialised(() => {
      const rows = this.db
        .prepare<unknown[], UserRow>('SELECT * FROM users WHERE subscription_active = 1 ORDER BY created_at ASC')
        .all();
      return rows.map(mapUserRow).filter((user) => user.role === Role.CITIZEN);
    });
  }

  async hasValidSubscription(userId: string, now: Date): Promise<boolean> {
    return this.serialised(() => {
      const row = this.db
        .prepare<unknown[], { id: string }>(
          'SELECT id FROM subscriptions WHERE user_id = ? AND is_active = 1 AND end_date > ? LIMIT 1'
        )
        .get(userId, toSqlValue(now));
      return row !== undefined;
    });
  }

  async setSubscriptionActive(userId: string, active: boolean): Promise<void> {
    return this.serialised(() => {
      this.db.prepare('UPDATE users SET subscription_active = ? WHERE id = ?').run(toSqlValue(active), userId);
    });
  }

  // ==================== NOTIFICATIONS ====================

  async insertNotification(notification: NewNotification, now: Date): Promise<NotificationRecord> {
    return this.serialised(() => {
      const id = randomUUID();
      this.db
        .prepare(
          `INSERT INTO notifications (id, user_id, type, title, message, data, is_read, created_at)
           VALUES (?, ?, ?, ?, ?, ?, 0, ?)`
        )
        .run(
          id,
          notification.userId,
          notification.type,
          notification.title,
          notification.message,
          JSON.stringify(notification.data ?? {}),
          toSqlValue(now)
        );

      const row = this.db.prepare<unknown[], NotificationRow>('SELECT * FROM notifications WHERE id = ?').get(id);
      if (!row) throw AppError.notFound('Notification', id);
      return mapNotificationRow(row);
    });
  }

  async listNotifications(userId: string, limit: number): Promise<NotificationRecord[]> {
    return this.serialised(() => {
      const rows = this.db
        .prepare<unknown[], NotificationRow>(
          'SELECT * FROM notifications WHERE user_id = ? ORDER BY created_at DESC LIMIT ?'
        )
        .all(userId, limit);
      return rows.map(mapNotificationRow);
    });
  }

  // ==================== CONNECTION ====================

  /**
   * Run statements on the connection: directly inside a transaction,
   * otherwise after every queued transaction has finished.
   */
  private serialised<T>(statements: () => T): Promise<T> {
    if (this.inTransaction) {
      return new Promise<T>((resolve) => resolve(statements()));
    }
    return this.enqueue(async () => statements());
  }

  private enqueue<T>(run: () => Promise<T>): Promise<T> {
    const result = this.queue.then(run);
    // Failures reach the caller through `result`; the chain only orders work
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private selectReport(id: string): Report | null {
    const row = this.db.prepare<unknown[], ReportRow>(`${REPORT_SELECT} WHERE r.id = ?`).get(id);
    return row ? mapReportRow(row) : null;
  }

  private requireReport(id: string): Report {
    const report = this.selectReport(id);
    if (!report) throw AppError.notFound('Report', id);
    return report;
  }

  private selectUser(id: string): User | null {
    const row = this.db.prepare<unknown[], UserRow>('SELECT * FROM users WHERE id = ?').get(id);
    return row ? mapUserRow(row) : null;
  }
}
