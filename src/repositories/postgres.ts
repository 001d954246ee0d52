import { randomUUID } from 'crypto';
import { Pool, PoolClient } from 'pg';
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
import { withRetry } from '../utils/databaseRetry';
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

const REPORT_SELECT = `
  SELECT r.*, u.commune AS owner_commune
  FROM reports r
  JOIN users u ON u.id = r.user_id
`;

const ORDER_BY: Record<NonNullable<ReportFilter['orderBy']>, string> = {
  created_at: 'r.created_at DESC',
  confirmation_deadline: 'r.confirmation_deadline ASC',
  last_action_at: 'r.last_action_at DESC NULLS LAST',
};

/**
 * pg adapter. The root instance queries through the pool; `transaction`
 * checks out a client and hands the work an instance bound to it.
 */
export class PostgresWasteRepository implements WasteRepository {
  constructor(
    private readonly pool: Pool,
    private readonly client: PoolClient | null = null
  ) {}

  private get db(): Pool | PoolClient {
    return this.client ?? this.pool;
  }

  // Reads outside a transaction retry on transient connection errors
  private read<T>(operation: () => Promise<T>, name: string): Promise<T> {
    return this.client ? operation() : withRetry(operation, { operationName: name });
  }

  async transaction<T>(work: (repo: WasteRepository) => Promise<T>): Promise<T> {
    if (this.client) {
      return work(this);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(new PostgresWasteRepository(this.pool, client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  // ==================== REPORTS ====================

  async findReport(id: string, options: { forUpdate?: boolean } = {}): Promise<Report | null> {
    const lock = options.forUpdate && this.client ? 'FOR UPDATE OF r' : '';
    const result = await this.read(
      () => this.db.query<ReportRow>(`${REPORT_SELECT} WHERE r.id = $1 ${lock}`, [id]),
      'findReport'
    );
    return result.rows[0] ? mapReportRow(result.rows[0]) : null;
  }

  async insertReport(report: NewReport): Promise<Report> {
    await this.db.query(
      `INSERT INTO reports (
        id, latitude, longitude, address_description, description, image_url,
        description_quality_score, status, user_id, last_action, last_action_at, created_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, 'created', $10, $10)`,
      [
        report.id,
        report.latitude,
        report.longitude,
        report.addressDescription,
        report.description,
        report.imageUrl,
        report.descriptionQualityScore,
        ReportStatus.PENDING,
        report.userId,
        report.createdAt,
      ]
    );
    return this.requireReport(report.id);
  }

  async updateReport(id: string, patch: ReportPatch): Promise<Report> {
    const assignments = patchAssignments(patch);
    if (assignments.length > 0) {
      const setClause = assignments.map(({ column }, index) => `${column} = $${index + 1}`).join(', ');
      const values = assignments.map(({ value }) => value);
      await this.db.query(`UPDATE reports SET ${setClause} WHERE id = $${assignments.length + 1}`, [...values, id]);
    }
    return this.requireReport(id);
  }

  async deleteReport(id: string): Promise<void> {
    await this.db.query('DELETE FROM reports WHERE id = $1', [id]);
  }

  async listReports(filter: ReportFilter): Promise<Report[]> {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (filter.status) {
      params.push(filter.status);
      conditions.push(`r.status = $${params.length}`);
    }
    if (filter.ownerId) {
      params.push(filter.ownerId);
      conditions.push(`r.user_id = $${params.length}`);
    }
    if (filter.collectorId) {
      params.push(filter.collectorId);
      conditions.push(`r.collector_id = $${params.length}`);
    }
    if (filter.ownerCommune) {
      params.push(filter.ownerCommune);
      conditions.push(`LOWER(TRIM(u.commune)) = LOWER(TRIM($${params.length}))`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const orderBy = ORDER_BY[filter.orderBy ?? 'created_at'];
    params.push(filter.limit ?? 50, filter.offset ?? 0);

    const result = await this.read(
      () =>
        this.db.query<ReportRow>(
          `${REPORT_SELECT} ${where} ORDER BY ${orderBy} LIMIT $${params.length - 1} OFFSET $${params.length}`,
          params
        ),
      'listReports'
    );
    return result.rows.map(mapReportRow);
  }

  async isConfirmationCodeTaken(code: string): Promise<boolean> {
    const result = await this.db.query('SELECT 1 FROM reports WHERE confirmation_code = $1', [code]);
    return (result.rowCount ?? 0) > 0;
  }

  async findExpiredConfirmationIds(now: Date): Promise<string[]> {
    const result = await this.read(
      () =>
        this.db.query<{ id: string }>(
          `SELECT id FROM reports
           WHERE status = $1 AND confirmation_deadline < $2
             AND citizen_confirmed = false AND auto_confirmed = false
           ORDER BY confirmation_deadline ASC`,
          [ReportStatus.AWAITING_CONFIRMATION, now]
        ),
      'findExpiredConfirmationIds'
    );
    return result.rows.map((row) => row.id);
  }

  async autoConfirm(id: string, now: Date): Promise<Report | null> {
    const result = await this.db.query(
      `UPDATE reports
       SET auto_confirmed = true, status = $1, resolved_at = $2,
           last_action = 'auto_confirmed', last_action_at = $2
       WHERE id = $3 AND status = $4 AND confirmation_deadline < $2
         AND citizen_confirmed = false AND auto_confirmed = false`,
      [ReportStatus.COMPLETED, now, id, ReportStatus.AWAITING_CONFIRMATION]
    );

    if ((result.rowCount ?? 0) === 0) return null;
    return this.requireReport(id);
  }

  // ==================== USERS & POINTS ====================

  async findUser(id: string): Promise<User | null> {
    const result = await this.read(
      () => this.db.query<UserRow>('SELECT * FROM users WHERE id = $1', [id]),
      'findUser'
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async insertUser(user: NewUser): Promise<User> {
    const result = await this.db.query<UserRow>(
      `INSERT INTO users (id, full_name, role, commune, points, subscription_active, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING *`,
      [
        user.id,
        user.fullName,
        user.role,
        user.commune,
        user.points ?? 0,
        user.subscriptionActive,
        user.createdAt ?? new Date(),
      ]
    );
    return mapUserRow(result.rows[0]);
  }

  async creditPoints(userId: string, sourceKey: string, entries: PointEntry[], now: Date): Promise<PointEntry[]> {
    if (!this.client) {
      return this.transaction((repo) => repo.creditPoints(userId, sourceKey, entries, now));
    }

    const credited: PointEntry[] = [];
    for (const entry of entries) {
      if (entry.points <= 0) continue;
      const result = await this.db.query(
        `INSERT INTO point_credits (id, user_id, source_key, component, points, created_at)
         VALUES ($1, $2, $3, $4, $5, $6)
         ON CONFLICT (source_key, component) DO NOTHING`,
        [randomUUID(), userId, sourceKey, entry.component, entry.points, now]
      );
      if ((result.rowCount ?? 0) > 0) {
        credited.push(entry);
      }
    }

    const total = credited.reduce((sum, entry) => sum + entry.points, 0);
    if (total > 0) {
      await this.db.query('UPDATE users SET points = points + $1 WHERE id = $2', [total, userId]);
    }
    return credited;
  }

  async getCitizenStats(userId: string): Promise<CitizenStats> {
    const result = await this.read(
      () =>
        this.db.query<{ total_reports: string; total_weight: number | null }>(
          'SELECT COUNT(*) AS total_reports, SUM(weight_kg) AS total_weight FROM reports WHERE user_id = $1',
          [userId]
        ),
      'getCitizenStats'
    );
    const row = result.rows[0];
    return {
      totalReports: row ? Number(row.total_reports) : 0,
      totalWeightKg: row?.total_weight ?? 0,
    };
  }

  async getCollectorStats(collectorId: string): Promise<CollectorStats> {
    const result = await this.read(
      () =>
        this.db.query<{
          assigned: string;
          awaiting: string;
          completed: string;
          disputed: string;
          total_weight: number | null;
        }>(
          `SELECT COUNT(*) AS assigned,
                  COUNT(*) FILTER (WHERE status = 'AWAITING_CONFIRMATION') AS awaiting,
                  COUNT(*) FILTER (WHERE status = 'COMPLETED') AS completed,
                  COUNT(*) FILTER (WHERE status = 'DISPUTED') AS disputed,
                  SUM(weight_kg) FILTER (WHERE status = 'COMPLETED') AS total_weight
           FROM reports WHERE collector_id = $1`,
          [collectorId]
        ),
      'getCollectorStats'
    );
    const row = result.rows[0];
    return {
      assigned: row ? Number(row.assigned) : 0,
      awaitingConfirmation: row ? Number(row.awaiting) : 0,
      completed: row ? Number(row.completed) : 0,
      disputed: row ? Number(row.disputed) : 0,
      totalWeightKg: row?.total_weight ?? 0,
    };
  }

  // ==================== SUBSCRIPTIONS ====================

  async listSubscribedCitizens(): Promise<User[]> {
    const result = await this.read(
      () => this.db.query<UserRow>('SELECT * FROM users WHERE subscription_active = true ORDER BY created_at ASC'),
      'listSubscribedCitizens'
    );
    return result.rows.map(mapUserRow).filter((user) => user.role === Role.CITIZEN);
  }

  async hasValidSubscription(userId: string, now: Date): Promise<boolean> {
    const result = await this.db.query(
      'SELECT 1 FROM subscriptions WHERE user_id = $1 AND is_active = true AND end_date > $2 LIMIT 1',
      [userId, now]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async setSubscriptionActive(userId: string, active: boolean): Promise<void> {
    await this.db.query('UPDATE users SET subscription_active = $1 WHERE id = $2', [active, userId]);
  }

  // ==================== NOTIFICATIONS ====================

  async insertNotification(notification: NewNotification, now: Date): Promise<NotificationRecord> {
    const result = await this.db.query<NotificationRow>(
      `INSERT INTO notifications (id, user_id, type, title, message, data, is_read, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, false, $7)
       RETURNING *`,
      [
        randomUUID(),
        notification.userId,
        notification.type,
        notification.title,
        notification.message,
        JSON.stringify(notification.data ?? {}),
        now,
      ]
    );
    return mapNotificationRow(result.rows[0]);
  }

  async listNotifications(userId: string, limit: number): Promise<NotificationRecord[]> {
    const result = await this.read(
      () =>
        this.db.query<NotificationRow>(
          'SELECT * FROM notifications WHERE user_id = $1 ORDER BY created_at DESC LIMIT $2',
          [userId, limit]
        ),
      'listNotifications'
    );
    return result.rows.map(mapNotificationRow);
  }

  private async requireReport(id: string): Promise<Report> {
    const report = await this.findReport(id);
    if (!report) throw AppError.notFound('Report', id);
    return report;
  }
}
