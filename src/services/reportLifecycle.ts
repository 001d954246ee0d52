import { randomUUID } from 'crypto';
import { defaultScoringConfig, ScoringConfig } from '../config/scoring';
import {
  AlreadySetError,
  AppError,
  ExpiredError,
  InvalidStateError,
  PermissionDeniedError,
  ValidationError,
} from '../lib/errors';
import {
  bypassesCommuneScope,
  canActInCommune,
  getRoleLabel,
  hasPermission,
  isAgent,
  isSupervisorTier,
  Role,
} from '../lib/permissions';
import { reportSourceKey, WasteRepository } from '../repositories/types';
import {
  Actor,
  CollectorStats,
  PhotoUpload,
  PointComponent,
  PointEntry,
  POINT_COMPONENTS,
  Report,
  ReportStatus,
  User,
} from '../types';
import { addHours, Clock } from '../utils/clock';
import { CodeGenerator, generateConfirmationCode, issueUniqueCode, normalizeConfirmationCode } from '../utils/confirmationCode';
import { lifecycleLogger } from '../utils/logger';
import { assertDisputed, authorizeResolver, parseResolution, resolutionPatch } from './disputeResolution';
import { NotificationService } from './notificationService';
import { PHOTO_FOLDERS, PhotoStorage } from './photoStorage';
import { pointsForReport, scoreDescription } from './scoringService';

export const MIN_DISPUTE_REASON_LENGTH = 10;
export const MAX_WEIGHT_KG = 1000;

export type PointsBreakdownDetails = Partial<Record<PointComponent, number>>;

export interface TransitionResult {
  report: Report;
  pointsCredited?: number;
  pointsBreakdown?: PointsBreakdownDetails;
}

export interface CreateReportInput {
  latitude: number;
  longitude: number;
  addressDescription?: string | null;
  description?: string | null;
  photo: PhotoUpload;
}

export interface AssignReportInput {
  collectorId?: string;
  startNow?: boolean;
}

export interface CleanupPhotoInput {
  photo: PhotoUpload;
  notes?: string;
}

export interface ConfirmCleanupInput {
  confirmed: boolean;
  reason?: string;
  code?: string;
}

export interface ResolveDisputeInput {
  resolution: unknown;
  notes?: string;
}

export interface CleanupStatus {
  reportId: string;
  status: ReportStatus;
  cleanupPhotoUrl: string | null;
  cleanupPhotoSubmittedAt: Date | null;
  confirmationDeadline: Date | null;
  confirmationCode: string | null;
  canConfirm: boolean;
  citizenConfirmed: boolean;
  autoConfirmed: boolean;
  disputeReason: string | null;
  pointsEstimate: number;
}

export interface SweepResult {
  reports: Report[];
  failed: string[];
}

export interface ReportPage {
  limit?: number;
  offset?: number;
  status?: ReportStatus;
}

type ConfirmOutcome = { expired: true; report: Report } | { expired: false; result: TransitionResult };

export interface ReportLifecycleDeps {
  repo: WasteRepository;
  photos: PhotoStorage;
  clock: Clock;
  notifications: NotificationService;
  scoring?: ScoringConfig;
  generateCode?: CodeGenerator;
}

// ==================== GUARDS ====================

const requireReport = async (repo: WasteRepository, id: string): Promise<Report> => {
  const report = await repo.findReport(id, { forUpdate: true });
  if (!report) throw AppError.notFound('Report', id);
  return report;
};

const requireUser = async (repo: WasteRepository, id: string): Promise<User> => {
  const user = await repo.findUser(id);
  if (!user) throw AppError.notFound('User', id);
  return user;
};

const requireStatus = (report: Report, allowed: ReportStatus[], action: string): void => {
  if (!allowed.includes(report.status)) {
    throw new InvalidStateError(
      `Cannot ${action} a report in status ${report.status} (expected ${allowed.join(' or ')})`
    );
  }
};

const requireCommune = (actor: Actor, report: Report): void => {
  if (!canActInCommune(actor.role, actor.commune, report.ownerCommune)) {
    throw new PermissionDeniedError('Report is outside your commune');
  }
};

const requireAssignedCollector = (actor: Actor, report: Report): void => {
  if (report.collectorId !== actor.id) {
    throw new PermissionDeniedError('Not the assigned collector');
  }
};

const requirePhoto = (photo: PhotoUpload | undefined, field: string): PhotoUpload => {
  if (!photo || photo.content.length === 0 || photo.filename.trim() === '') {
    throw new ValidationError(`${field} is required`, { [field]: 'missing photo' });
  }
  return photo;
};

const validateCoordinates = (latitude: number, longitude: number): void => {
  const fields: Record<string, string> = {};
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    fields.latitude = 'must be between -90 and 90';
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    fields.longitude = 'must be between -180 and 180';
  }
  if (Object.keys(fields).length > 0) {
    throw new ValidationError('Invalid coordinates', fields);
  }
};

const toEntries = (details: PointsBreakdownDetails): PointEntry[] =>
  POINT_COMPONENTS.flatMap((component) => {
    const points = details[component];
    return points ? [{ component, points }] : [];
  });

const toDetails = (entries: PointEntry[]): PointsBreakdownDetails => {
  const details: PointsBreakdownDetails = {};
  for (const entry of entries) {
    details[entry.component] = entry.points;
  }
  return details;
};

const sumEntries = (entries: PointEntry[]): number => entries.reduce((sum, entry) => sum + entry.points, 0);

/**
 * Report lifecycle state machine.
 *
 * PENDING → ASSIGNED → IN_PROGRESS → AWAITING_CONFIRMATION → COMPLETED | DISPUTED
 * DISPUTED → IN_PROGRESS (reject) | COMPLETED (accept)
 * IN_PROGRESS → COMPLETED (legacy confirmation without photo)
 *
 * Every transition runs in one transaction with the report row locked.
 * Points are credited through the ledger, so a component is paid at most
 * once per report whichever transition computes it.
 */
export class ReportLifecycle {
  private readonly repo: WasteRepository;
  private readonly photos: PhotoStorage;
  private readonly clock: Clock;
  private readonly notifications: NotificationService;
  private readonly scoring: ScoringConfig;
  private readonly generateCode: CodeGenerator;

  constructor(deps: ReportLifecycleDeps) {
    this.repo = deps.repo;
    this.photos = deps.photos;
    this.clock = deps.clock;
    this.notifications = deps.notifications;
    this.scoring = deps.scoring ?? defaultScoringConfig;
    this.generateCode = deps.generateCode ?? generateConfirmationCode;
  }

  // ==================== CREATION ====================

  async createReport(actor: Actor, input: CreateReportInput): Promise<TransitionResult> {
    if (!hasPermission(actor.role, 'CREATE_REPORTS')) {
      throw new PermissionDeniedError('Only citizens can create reports');
    }
    validateCoordinates(input.latitude, input.longitude);
    const photo = requirePhoto(input.photo, 'photo');
    await requireUser(this.repo, actor.id);

    const imageUrl = await this.photos.upload(photo.content, photo.filename, PHOTO_FOLDERS.reports);
    const description = input.description?.trim() || null;

    try {
      const report = await this.repo.insertReport({
        id: randomUUID(),
        latitude: input.latitude,
        longitude: input.longitude,
        addressDescription: input.addressDescription?.trim() || null,
        description,
        imageUrl,
        descriptionQualityScore: description ? scoreDescription(description, this.scoring) : null,
        userId: actor.id,
        createdAt: this.clock.now(),
      });

      lifecycleLogger.info(
        { reportId: report.id, userId: actor.id, descriptionScore: report.descriptionQualityScore },
        'Report created'
      );
      return { report };
    } catch (error) {
      await this.removePhoto(imageUrl, 'report insert failed');
      throw error;
    }
  }

  async deleteReport(actor: Actor, reportId: string): Promise<TransitionResult> {
    const report = await this.repo.transaction(async (repo) => {
      const current = await requireReport(repo, reportId);
      if (current.userId !== actor.id) {
        throw new PermissionDeniedError('Only the reporting citizen can delete this report');
      }
      requireStatus(current, [ReportStatus.PENDING], 'delete');
      await repo.deleteReport(reportId);
      return current;
    });

    lifecycleLogger.info({ reportId, userId: actor.id }, 'Report deleted');
    await this.removePhoto(report.imageUrl, 'report deleted');
    return { report };
  }

  // ==================== ASSIGNMENT ====================

  async assignReport(actor: Actor, reportId: string, input: AssignReportInput = {}): Promise<TransitionResult> {
    const report = await this.repo.transaction(async (repo) => {
      const current = await requireReport(repo, reportId);
      if (!hasPermission(actor.role, 'ASSIGN_REPORTS')) {
        throw new PermissionDeniedError('Only collection agents can take reports');
      }
      requireCommune(actor, current);

      const collectorId = input.collectorId ?? actor.id;
      if (actor.role === Role.COLLECTOR && collectorId !== actor.id) {
        throw new PermissionDeniedError('Collectors can only assign reports to themselves');
      }
      await this.requireAgent(repo, collectorId);
      requireStatus(current, [ReportStatus.PENDING], 'assign');

      const now = this.clock.now();
      return repo.updateReport(reportId, {
        collectorId,
        status: input.startNow ? ReportStatus.IN_PROGRESS : ReportStatus.ASSIGNED,
        lastAction: 'assigned',
        lastActionAt: now,
      });
    });

    lifecycleLogger.info({ reportId, collectorId: report.collectorId, status: report.status }, 'Report assigned');
    return { report };
  }

  async reassignReport(actor: Actor, reportId: string, collectorId: string): Promise<TransitionResult> {
    const report = await this.repo.transaction(async (repo) => {
      const current = await requireReport(repo, reportId);
      if (!hasPermission(actor.role, 'REASSIGN_REPORTS')) {
        throw new PermissionDeniedError('Only supervisors, coordinators or admins can reassign reports');
      }
      requireCommune(actor, current);
      await this.requireAgent(repo, collectorId);
      requireStatus(current, [ReportStatus.ASSIGNED, ReportStatus.IN_PROGRESS], 'reassign');

      return repo.updateReport(reportId, {
        collectorId,
        lastAction: 'reassigned',
        lastActionAt: this.clock.now(),
      });
    });

    lifecycleLogger.info({ reportId, collectorId, by: actor.id }, 'Report reassigned');
    return { report };
  }

  async startCleanup(actor: Actor, reportId: string): Promise<TransitionResult> {
    const report = await this.repo.transaction(async (repo) => {
      const current = await requireReport(repo, reportId);
      requireAssignedCollector(actor, current);
      requireStatus(current, [ReportStatus.ASSIGNED], 'start cleanup on');

      return repo.updateReport(reportId, {
        status: ReportStatus.IN_PROGRESS,
        lastAction: 'cleanup_started',
        lastActionAt: this.clock.now(),
      });
    });

    lifecycleLogger.info({ reportId, collectorId: actor.id }, 'Cleanup started');
    return { report };
  }

  // ==================== CLEANUP PROOF ====================

  async submitCleanupPhoto(actor: Actor, reportId: string, input: CleanupPhotoInput): Promise<TransitionResult> {
    const submittable = [ReportStatus.IN_PROGRESS, ReportStatus.ASSIGNED];

    if (!hasPermission(actor.role, 'SUBMIT_CLEANUP_PHOTO')) {
      throw new PermissionDeniedError(`${getRoleLabel(actor.role)} role cannot submit cleanup photos`);
    }

    // Checked before the upload so a rejected call leaves no file behind
    const before = await requireReport(this.repo, reportId);
    requireAssignedCollector(actor, before);
    const photo = requirePhoto(input.photo, 'photo');
    requireStatus(before, submittable, 'submit a cleanup photo for');

    const cleanupPhotoUrl = await this.photos.upload(photo.content, photo.filename, PHOTO_FOLDERS.cleanups);

    let report: Report;
    try {
      report = await this.repo.transaction(async (repo) => {
        const current = await requireReport(repo, reportId);
        requireAssignedCollector(actor, current);
        requireStatus(current, submittable, 'submit a cleanup photo for');

        const now = this.clock.now();
        const confirmationCode = await issueUniqueCode((code) => repo.isConfirmationCodeTaken(code), this.generateCode);
        const notes = input.notes?.trim();

        return repo.updateReport(reportId, {
          cleanupPhotoUrl,
          cleanupPhotoSubmittedAt: now,
          confirmationCode,
          confirmationDeadline: addHours(now, this.scoring.weights.confirmationWindowHours),
          citizenConfirmed: false,
          citizenConfirmedAt: null,
          autoConfirmed: false,
          description: notes
            ? [current.description, `Collector notes: ${notes}`].filter(Boolean).join('\n\n')
            : current.description,
          status: ReportStatus.AWAITING_CONFIRMATION,
          lastAction: 'photo_submitted',
          lastActionAt: now,
        });
      });
    } catch (error) {
      await this.removePhoto(cleanupPhotoUrl, 'cleanup submission failed');
      throw error;
    }

    lifecycleLogger.info(
      { reportId, collectorId: actor.id, deadline: report.confirmationDeadline },
      'Cleanup photo submitted'
    );
    if (report.confirmationDeadline) {
      await this.notifications.notifyCleanupSubmitted(report.userId, report.id, report.confirmationDeadline);
    }
    return { report };
  }

  // ==================== CITIZEN CONFIRMATION ====================

  /**
   * Confirm or dispute a cleanup, either as the reporting citizen or with
   * the confirmation code. Past the deadline the report is auto-confirmed
   * and committed before the call fails with Expired.
   */
  async confirmCleanup(actor: Actor | null, reportId: string, input: ConfirmCleanupInput): Promise<TransitionResult> {
    const outcome = await this.repo.transaction<ConfirmOutcome>(async (repo) => {
      const current = await requireReport(repo, reportId);

      const isOwner = actor !== null && actor.id === current.userId;
      const codeMatches =
        input.code !== undefined &&
        current.confirmationCode !== null &&
        normalizeConfirmationCode(input.code) === current.confirmationCode;
      if (!isOwner && !codeMatches) {
        throw new PermissionDeniedError('Only the reporting citizen or a holder of the confirmation code can confirm');
      }

      requireStatus(current, [ReportStatus.AWAITING_CONFIRMATION], 'confirm');

      const now = this.clock.now();
      if (current.confirmationDeadline && now.getTime() > current.confirmationDeadline.getTime()) {
        const autoConfirmed = await repo.autoConfirm(reportId, now);
        return { expired: true, report: autoConfirmed ?? current };
      }

      if (!input.confirmed) {
        const reason = input.reason?.trim() ?? '';
        if (reason.length < MIN_DISPUTE_REASON_LENGTH) {
          throw new ValidationError(
            `Dispute reason must be at least ${MIN_DISPUTE_REASON_LENGTH} characters`,
            { reason: 'too short' }
          );
        }
        const report = await repo.updateReport(reportId, {
          status: ReportStatus.DISPUTED,
          disputeReason: reason,
          lastAction: 'disputed',
          lastActionAt: now,
        });
        return { expired: false, result: { report } };
      }

      const report = await repo.updateReport(reportId, {
        citizenConfirmed: true,
        citizenConfirmedAt: now,
        status: ReportStatus.COMPLETED,
        resolvedAt: now,
        lastAction: 'confirmed',
        lastActionAt: now,
      });
      const credit = await this.creditReport(repo, report, now);
      return { expired: false, result: { report, ...credit } };
    });

    if (outcome.expired) {
      lifecycleLogger.info({ reportId }, 'Confirmation after deadline, report auto-confirmed');
      await this.notifications.notifyAutoConfirmed(outcome.report.userId, reportId);
      throw new ExpiredError('Confirmation deadline expired, report auto-confirmed');
    }

    const { result } = outcome;
    if (result.report.status === ReportStatus.COMPLETED) {
      lifecycleLogger.info({ reportId, pointsCredited: result.pointsCredited }, 'Cleanup confirmed');
      await this.notifications.notifyReportCompleted(result.report.userId, reportId, result.pointsCredited ?? 0);
    } else {
      lifecycleLogger.info({ reportId }, 'Cleanup disputed');
    }
    return result;
  }

  async legacyConfirm(actor: Actor, reportId: string): Promise<TransitionResult> {
    const result = await this.repo.transaction(async (repo) => {
      const current = await requireReport(repo, reportId);
      if (current.userId !== actor.id) {
        throw new PermissionDeniedError('Only the reporting citizen can confirm collection');
      }
      requireStatus(current, [ReportStatus.IN_PROGRESS], 'confirm collection of');

      const now = this.clock.now();
      const report = await repo.updateReport(reportId, {
        citizenConfirmed: true,
        citizenConfirmedAt: now,
        status: ReportStatus.COMPLETED,
        resolvedAt: now,
        lastAction: 'legacy_confirmed',
        lastActionAt: now,
      });

      // Flat award, separate from the engine total paid on photo confirmation
      const credited = await repo.creditPoints(
        report.userId,
        reportSourceKey(report.id),
        [{ component: 'legacy_confirmation', points: this.scoring.weights.legacyConfirmationPoints }],
        now
      );
      return { report, pointsCredited: sumEntries(credited), pointsBreakdown: toDetails(credited) };
    });

    lifecycleLogger.info({ reportId, pointsCredited: result.pointsCredited }, 'Collection confirmed without photo');
    await this.notifications.notifyReportCompleted(result.report.userId, reportId, result.pointsCredited);
    return result;
  }

  // ==================== DISPUTES ====================

  async resolveDispute(actor: Actor, reportId: string, input: ResolveDisputeInput): Promise<TransitionResult> {
    const { report, previousPhotoUrl, accepted } = await this.repo.transaction(async (repo) => {
      const current = await requireReport(repo, reportId);
      authorizeResolver(actor, current);
      const resolution = parseResolution(input.resolution);
      assertDisputed(current);

      const updated = await repo.updateReport(
        reportId,
        resolutionPatch(current, resolution, input.notes, this.clock.now())
      );
      return { report: updated, previousPhotoUrl: current.cleanupPhotoUrl, accepted: resolution === 'accept' };
    });

    lifecycleLogger.info({ reportId, accepted, by: actor.id }, 'Dispute resolved');
    if (!accepted && previousPhotoUrl) {
      await this.removePhoto(previousPhotoUrl, 'dispute rejected');
    }
    await this.notifications.notifyDisputeResolved(report.userId, reportId, accepted);
    return { report };
  }

  // ==================== WEIGHT ====================

  async recordWeight(actor: Actor, reportId: string, weightKg: number): Promise<TransitionResult> {
    const result = await this.repo.transaction(async (repo) => {
      const current = await requireReport(repo, reportId);
      if (!hasPermission(actor.role, 'RECORD_WEIGHT')) {
        throw new PermissionDeniedError(`${getRoleLabel(actor.role)} role cannot record weights`);
      }

      const isAssigned = current.collectorId === actor.id;
      if (!isAssigned && !isSupervisorTier(actor.role)) {
        throw new PermissionDeniedError('Not the assigned collector');
      }
      if (!isAssigned) {
        requireCommune(actor, current);
      }
      if (!Number.isFinite(weightKg) || weightKg <= 0 || weightKg > MAX_WEIGHT_KG) {
        throw new ValidationError(`Weight must be greater than 0 and at most ${MAX_WEIGHT_KG} kg`, {
          weightKg: 'out of range',
        });
      }
      if (current.weightKg !== null) {
        throw new AlreadySetError('Weight already recorded for this report');
      }

      const now = this.clock.now();
      const report = await repo.updateReport(reportId, {
        weightKg,
        weightVerifiedAt: now,
        weightVerifiedBy: actor.id,
        descriptionQualityScore:
          current.descriptionQualityScore ?? scoreDescription(current.description, this.scoring),
        lastAction: 'weight_recorded',
        lastActionAt: now,
      });
      const credit = await this.creditReport(repo, report, now);
      return { report, ...credit };
    });

    lifecycleLogger.info({ reportId, weightKg, pointsCredited: result.pointsCredited }, 'Weight recorded');
    if (result.pointsCredited > 0) {
      await this.notifications.notifyPointsEarned(result.report.userId, result.pointsCredited, 'verified waste weight', {
        report_id: reportId,
      });
    }
    return result;
  }

  // ==================== SCHEDULED ====================

  /**
   * Auto-confirm every report whose confirmation deadline has passed. Each
   * row commits on its own through a guarded conditional update, so a row
   * already handled elsewhere is skipped and a failing row does not stop
   * the others.
   */
  async sweepExpiredConfirmations(): Promise<SweepResult> {
    const now = this.clock.now();
    const candidates = await this.repo.findExpiredConfirmationIds(now);
    const reports: Report[] = [];
    const failed: string[] = [];

    for (const reportId of candidates) {
      let report: Report | null;
      try {
        report = await this.repo.transaction((repo) => repo.autoConfirm(reportId, now));
      } catch (error) {
        lifecycleLogger.error({ err: error, reportId }, 'Auto-confirmation failed');
        failed.push(reportId);
        continue;
      }
      if (!report) continue;
      reports.push(report);
      await this.notifications.notifyAutoConfirmed(report.userId, report.id);
    }

    lifecycleLogger.info(
      { candidates: candidates.length, autoConfirmed: reports.length, failed: failed.length },
      'Confirmation sweep done'
    );
    return { reports, failed };
  }

  // ==================== READS ====================

  async getReport(actor: Actor, reportId: string): Promise<Report> {
    const report = await this.repo.findReport(reportId);
    if (!report) throw AppError.notFound('Report', reportId);
    if (report.userId === actor.id) return report;
    if (isAgent(actor.role)) {
      requireCommune(actor, report);
      return report;
    }
    throw new PermissionDeniedError('You cannot view this report');
  }

  async getCleanupStatus(actor: Actor | null, reportId: string, code?: string): Promise<CleanupStatus> {
    const report = await this.repo.findReport(reportId);
    if (!report) throw AppError.notFound('Report', reportId);

    const isOwner = actor !== null && actor.id === report.userId;
    const isScopedAgent =
      actor !== null && isAgent(actor.role) && canActInCommune(actor.role, actor.commune, report.ownerCommune);
    const codeMatches =
      code !== undefined && report.confirmationCode !== null && normalizeConfirmationCode(code) === report.confirmationCode;
    if (!isOwner && !isScopedAgent && !codeMatches) {
      throw new PermissionDeniedError('You cannot view the cleanup status of this report');
    }

    const awaiting = report.status === ReportStatus.AWAITING_CONFIRMATION;
    const now = this.clock.now();
    const withinDeadline =
      report.confirmationDeadline === null || now.getTime() <= report.confirmationDeadline.getTime();

    return {
      reportId: report.id,
      status: report.status,
      cleanupPhotoUrl: report.cleanupPhotoUrl,
      cleanupPhotoSubmittedAt: report.cleanupPhotoSubmittedAt,
      confirmationDeadline: report.confirmationDeadline,
      confirmationCode: awaiting ? report.confirmationCode : null,
      canConfirm: awaiting && withinDeadline,
      citizenConfirmed: report.citizenConfirmed,
      autoConfirmed: report.autoConfirmed,
      disputeReason: report.disputeReason,
      pointsEstimate: pointsForReport(report, { id: report.userId }, this.scoring).total,
    };
  }

  async listAwaitingConfirmation(actor: Actor, limit = 50, offset = 0): Promise<Report[]> {
    if (!hasPermission(actor.role, 'VIEW_AWAITING_CONFIRMATION')) {
      throw new PermissionDeniedError('Only collection agents can list reports awaiting confirmation');
    }
    return this.repo.listReports({
      status: ReportStatus.AWAITING_CONFIRMATION,
      ownerCommune: this.communeFilter(actor),
      orderBy: 'confirmation_deadline',
      limit,
      offset,
    });
  }

  async listDisputed(actor: Actor, limit = 50, offset = 0): Promise<Report[]> {
    if (!hasPermission(actor.role, 'VIEW_DISPUTED')) {
      throw new PermissionDeniedError('Only supervisors, coordinators or admins can list disputed reports');
    }
    return this.repo.listReports({
      status: ReportStatus.DISPUTED,
      ownerCommune: this.communeFilter(actor),
      orderBy: 'last_action_at',
      limit,
      offset,
    });
  }

  // Reports filed by the caller, newest first
  async listMyReports(actor: Actor, page: ReportPage = {}): Promise<Report[]> {
    return this.repo.listReports({
      ownerId: actor.id,
      status: page.status,
      orderBy: 'created_at',
      limit: page.limit ?? 50,
      offset: page.offset ?? 0,
    });
  }

  async listCollectorReports(actor: Actor, collectorId: string, page: ReportPage = {}): Promise<Report[]> {
    await this.requireCollectorView(actor, collectorId);
    return this.repo.listReports({
      collectorId,
      status: page.status,
      orderBy: 'last_action_at',
      limit: page.limit ?? 50,
      offset: page.offset ?? 0,
    });
  }

  async getCollectorStats(actor: Actor, collectorId: string): Promise<CollectorStats> {
    await this.requireCollectorView(actor, collectorId);
    return this.repo.getCollectorStats(collectorId);
  }

  // ==================== HELPERS ====================

  /**
   * Collectors see their own work; the supervisor tier sees any agent's,
   * supervisors only inside their commune.
   */
  private async requireCollectorView(actor: Actor, collectorId: string): Promise<User> {
    const collector = await this.repo.findUser(collectorId);
    if (!collector || !isAgent(collector.role)) throw AppError.notFound('Collector', collectorId);
    if (actor.id === collectorId) return collector;
    if (!hasPermission(actor.role, 'VIEW_COLLECTOR_STATS')) {
      throw new PermissionDeniedError("You cannot view another collector's work");
    }
    if (!canActInCommune(actor.role, actor.commune, collector.commune)) {
      throw new PermissionDeniedError('Collector is outside your commune');
    }
    return collector;
  }

  private communeFilter(actor: Actor): string | undefined {
    if (bypassesCommuneScope(actor.role)) return undefined;
    return actor.commune ?? undefined;
  }

  private async requireAgent(repo: WasteRepository, userId: string): Promise<User> {
    const user = await requireUser(repo, userId);
    if (!isAgent(user.role)) {
      throw new ValidationError('Assignee must be a collection agent', { collectorId: 'not an agent' });
    }
    return user;
  }

  private async creditReport(
    repo: WasteRepository,
    report: Report,
    now: Date
  ): Promise<{ pointsCredited: number; pointsBreakdown: PointsBreakdownDetails }> {
    const breakdown = pointsForReport(report, { id: report.userId }, this.scoring);
    const credited = await repo.creditPoints(report.userId, reportSourceKey(report.id), toEntries(breakdown.details), now);
    return { pointsCredited: sumEntries(credited), pointsBreakdown: toDetails(credited) };
  }

  private async removePhoto(url: string, reason: string): Promise<void> {
    try {
      await this.photos.remove(url);
    } catch (error) {
      lifecycleLogger.warn({ err: error, url, reason }, 'Failed to delete photo');
    }
  }
}
