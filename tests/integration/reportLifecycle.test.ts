import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  AlreadySetError,
  ExpiredError,
  InvalidStateError,
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
} from '../../src/lib/errors';
import { Role } from '../../src/lib/permissions';
import { Report, ReportStatus } from '../../src/types';
import {
  asActor,
  Cast,
  createCast,
  createTestContext,
  createUser,
  photo,
  RICH_DESCRIPTION,
  sequenceCodes,
  T0,
  TestContext,
} from '../helpers';

describe('Report lifecycle', () => {
  let ctx: TestContext;
  let cast: Cast;

  const setup = async (options: Parameters<typeof createTestContext>[0] = {}) => {
    ctx = createTestContext(options);
    cast = await createCast(ctx);
  };

  const createReport = async (description: string | null = RICH_DESCRIPTION): Promise<Report> => {
    const { report } = await ctx.lifecycle.createReport(asActor(cast.citizen), {
      latitude: -4.3217,
      longitude: 15.3125,
      description,
      photo: photo(),
    });
    return report;
  };

  const startedReport = async (description: string | null = RICH_DESCRIPTION): Promise<Report> => {
    const report = await createReport(description);
    const { report: started } = await ctx.lifecycle.assignReport(asActor(cast.collector), report.id, {
      startNow: true,
    });
    return started;
  };

  const submittedReport = async (description: string | null = RICH_DESCRIPTION): Promise<Report> => {
    const report = await startedReport(description);
    const { report: submitted } = await ctx.lifecycle.submitCleanupPhoto(asActor(cast.collector), report.id, {
      photo: photo('after.jpg'),
    });
    return submitted;
  };

  const pointsOf = async (userId: string): Promise<number> => {
    const user = await ctx.repo.findUser(userId);
    return user ? user.points : -1;
  };

  beforeEach(async () => {
    await setup();
  });

  afterEach(() => {
    ctx.db.close();
  });

  describe('createReport', () => {
    it('stores a pending report with its description score', async () => {
      const report = await createReport();

      expect(report.status).toBe(ReportStatus.PENDING);
      expect(report.descriptionQualityScore).toBe(30);
      expect(report.lastAction).toBe('created');
      expect(report.imageUrl).toBe('https://photos.test/reports/1-site.jpg');
      expect(report.userId).toBe(cast.citizen.id);
      expect(report.ownerCommune).toBe('Gombe');
      expect(report.createdAt.toISOString()).toBe(T0.toISOString());
    });

    it('leaves the score empty without a description', async () => {
      const report = await createReport('   ');
      expect(report.description).toBeNull();
      expect(report.descriptionQualityScore).toBeNull();
    });

    it('rejects agents before uploading anything', async () => {
      await expect(
        ctx.lifecycle.createReport(asActor(cast.collector), { latitude: 0, longitude: 0, photo: photo() })
      ).rejects.toBeInstanceOf(PermissionDeniedError);
      expect(ctx.photos.files.size).toBe(0);
    });

    it('validates coordinates', async () => {
      await expect(
        ctx.lifecycle.createReport(asActor(cast.citizen), { latitude: 95, longitude: 15, photo: photo() })
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('assignment', () => {
    it('lets a collector take a pending report', async () => {
      const report = await createReport();
      const { report: assigned } = await ctx.lifecycle.assignReport(asActor(cast.collector), report.id);

      expect(assigned.status).toBe(ReportStatus.ASSIGNED);
      expect(assigned.collectorId).toBe(cast.collector.id);
      expect(assigned.lastAction).toBe('assigned');
    });

    it('moves straight to in progress when asked', async () => {
      const report = await startedReport();
      expect(report.status).toBe(ReportStatus.IN_PROGRESS);
    });

    it('stops collectors from assigning someone else', async () => {
      const report = await createReport();
      await expect(
        ctx.lifecycle.assignReport(asActor(cast.collector), report.id, { collectorId: cast.otherCollector.id })
      ).rejects.toBeInstanceOf(PermissionDeniedError);
    });

    it('lets a supervisor assign a collector in the same commune', async () => {
      const report = await createReport();
      const { report: assigned } = await ctx.lifecycle.assignReport(asActor(cast.supervisor), report.id, {
        collectorId: cast.otherCollector.id,
      });
      expect(assigned.collectorId).toBe(cast.otherCollector.id);
    });

    it('enforces commune scope for supervisors', async () => {
      const remote = await createUser(ctx, Role.SUPERVISOR, { commune: 'Lemba' });
      const report = await createReport();
      await expect(
        ctx.lifecycle.assignReport(asActor(remote), report.id, { collectorId: cast.collector.id })
      ).rejects.toThrow('Report is outside your commune');
    });

    it('only assigns collection agents', async () => {
      const report = await createReport();
      await expect(
        ctx.lifecycle.assignReport(asActor(cast.supervisor), report.id, { collectorId: cast.citizen.id })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('refuses to assign a report twice', async () => {
      const report = await startedReport();
      await expect(ctx.lifecycle.assignReport(asActor(cast.otherCollector), report.id)).rejects.toBeInstanceOf(
        InvalidStateError
      );
    });

    it('starts cleanup for the assigned collector only', async () => {
      const report = await createReport();
      await ctx.lifecycle.assignReport(asActor(cast.collector), report.id);

      await expect(ctx.lifecycle.startCleanup(asActor(cast.otherCollector), report.id)).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
      const { report: started } = await ctx.lifecycle.startCleanup(asActor(cast.collector), report.id);
      expect(started.status).toBe(ReportStatus.IN_PROGRESS);
      expect(started.lastAction).toBe('cleanup_started');
    });

    it('lets supervisors reassign active work', async () => {
      const report = await startedReport();

      await expect(
        ctx.lifecycle.reassignReport(asActor(cast.collector), report.id, cast.otherCollector.id)
      ).rejects.toBeInstanceOf(PermissionDeniedError);

      const { report: reassigned } = await ctx.lifecycle.reassignReport(
        asActor(cast.supervisor),
        report.id,
        cast.otherCollector.id
      );
      expect(reassigned.collectorId).toBe(cast.otherCollector.id);
      expect(reassigned.status).toBe(ReportStatus.IN_PROGRESS);
      expect(reassigned.lastAction).toBe('reassigned');
    });
  });

  describe('submitCleanupPhoto', () => {
    it('opens a 48 hour confirmation window with an 8 character code', async () => {
      const report = await submittedReport();

      expect(report.status).toBe(ReportStatus.AWAITING_CONFIRMATION);
      expect(report.cleanupPhotoUrl).toBe('https://photos.test/cleanups/2-after.jpg');
      expect(report.cleanupPhotoSubmittedAt?.toISOString()).toBe('2025-03-10T08:00:00.000Z');
      expect(report.confirmationDeadline?.toISOString()).toBe('2025-03-12T08:00:00.000Z');
      expect(report.confirmationCode).toMatch(/^[0-9A-F]{8}$/);
      expect(report.citizenConfirmed).toBe(false);
      expect(report.lastAction).toBe('photo_submitted');
    });

    it('notifies the reporting citizen', async () => {
      const report = await submittedReport();
      const notifications = await ctx.repo.listNotifications(cast.citizen.id, 10);

      expect(notifications).toHaveLength(1);
      expect(notifications[0].type).toBe('cleanup_submitted');
      expect(notifications[0].data).toEqual({
        report_id: report.id,
        confirmation_deadline: '2025-03-12T08:00:00.000Z',
      });
    });

    it('appends collector notes to the description', async () => {
      const report = await startedReport('Déchets au coin de la rue');
      const { report: submitted } = await ctx.lifecycle.submitCleanupPhoto(asActor(cast.collector), report.id, {
        photo: photo('after.jpg'),
        notes: '  Trois sacs ramassés  ',
      });
      expect(submitted.description).toBe('Déchets au coin de la rue\n\nCollector notes: Trois sacs ramassés');
    });

    it('rejects other collectors without storing a photo', async () => {
      const report = await startedReport();
      await expect(
        ctx.lifecycle.submitCleanupPhoto(asActor(cast.otherCollector), report.id, { photo: photo('after.jpg') })
      ).rejects.toBeInstanceOf(PermissionDeniedError);
      expect(ctx.photos.files.size).toBe(1);
    });

    it('checks the role permission even for the assigned collector', async () => {
      const report = await startedReport();
      const demoted = { ...asActor(cast.collector), role: Role.CITIZEN };

      await expect(
        ctx.lifecycle.submitCleanupPhoto(demoted, report.id, { photo: photo('after.jpg') })
      ).rejects.toThrow(new PermissionDeniedError('Citizen role cannot submit cleanup photos'));
      expect(ctx.photos.files.size).toBe(1);
      expect((await ctx.repo.findReport(report.id))?.status).toBe(ReportStatus.IN_PROGRESS);
    });

    it('requires a non-empty photo', async () => {
      const report = await startedReport();
      await expect(
        ctx.lifecycle.submitCleanupPhoto(asActor(cast.collector), report.id, {
          photo: { filename: 'after.jpg', content: Buffer.alloc(0) },
        })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('refuses a second submission', async () => {
      const report = await submittedReport();
      await expect(
        ctx.lifecycle.submitCleanupPhoto(asActor(cast.collector), report.id, { photo: photo('again.jpg') })
      ).rejects.toBeInstanceOf(InvalidStateError);
      expect(ctx.photos.files.size).toBe(2);
    });

    it('draws a new code when the first one is taken', async () => {
      ctx.db.close();
      await setup({ generateCode: sequenceCodes('AAAA1111', 'AAAA1111', 'BBBB2222') });

      const first = await submittedReport();
      const second = await submittedReport();
      expect(first.confirmationCode).toBe('AAAA1111');
      expect(second.confirmationCode).toBe('BBBB2222');
    });

    it('rolls back and removes the photo when no code is free', async () => {
      ctx.db.close();
      await setup({ generateCode: sequenceCodes('AAAA1111') });

      await submittedReport();
      const report = await startedReport();
      await expect(
        ctx.lifecycle.submitCleanupPhoto(asActor(cast.collector), report.id, { photo: photo('after.jpg') })
      ).rejects.toBeInstanceOf(AlreadySetError);

      const stored = await ctx.repo.findReport(report.id);
      expect(stored?.status).toBe(ReportStatus.IN_PROGRESS);
      expect(stored?.cleanupPhotoUrl).toBeNull();
      expect(ctx.photos.removed).toEqual(['https://photos.test/cleanups/4-after.jpg']);
    });
  });

  describe('confirmCleanup', () => {
    it('completes the report and credits description plus fast bonus', async () => {
      const report = await submittedReport();
      ctx.clock.advanceHours(1);

      const result = await ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, { confirmed: true });

      expect(result.report.status).toBe(ReportStatus.COMPLETED);
      expect(result.report.citizenConfirmed).toBe(true);
      expect(result.report.citizenConfirmedAt?.toISOString()).toBe('2025-03-10T09:00:00.000Z');
      expect(result.report.resolvedAt?.toISOString()).toBe('2025-03-10T09:00:00.000Z');
      expect(result.report.lastAction).toBe('confirmed');
      expect(result.pointsCredited).toBe(50);
      expect(result.pointsBreakdown).toEqual({ description: 30, confirmation_bonus: 20 });
      expect(await pointsOf(cast.citizen.id)).toBe(50);
    });

    it('sends a completion notification with the points', async () => {
      const report = await submittedReport();
      await ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, { confirmed: true });

      const notifications = await ctx.repo.listNotifications(cast.citizen.id, 10);
      const completed = notifications.find((notification) => notification.type === 'report_completed');
      expect(completed?.message).toBe('Your waste report is closed. You earned 50 points!');
    });

    it('accepts the confirmation code without authentication', async () => {
      const report = await submittedReport();
      const code = report.confirmationCode ?? '';

      const result = await ctx.lifecycle.confirmCleanup(null, report.id, {
        confirmed: true,
        code: ` ${code.toLowerCase()} `,
      });
      expect(result.report.status).toBe(ReportStatus.COMPLETED);
      expect(await pointsOf(cast.citizen.id)).toBe(50);
    });

    it('rejects strangers and wrong codes', async () => {
      const report = await submittedReport();
      const neighbour = await createUser(ctx, Role.CITIZEN);

      await expect(
        ctx.lifecycle.confirmCleanup(asActor(neighbour), report.id, { confirmed: true })
      ).rejects.toBeInstanceOf(PermissionDeniedError);
      await expect(
        ctx.lifecycle.confirmCleanup(null, report.id, { confirmed: true, code: 'ZZZZZZZZ' })
      ).rejects.toBeInstanceOf(PermissionDeniedError);
    });

    it('withholds the bonus after 24 hours', async () => {
      const report = await submittedReport();
      ctx.clock.advanceHours(30);

      const result = await ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, { confirmed: true });
      expect(result.pointsCredited).toBe(30);
      expect(result.pointsBreakdown).toEqual({ description: 30 });
    });

    it('still accepts a confirmation exactly at the deadline', async () => {
      const report = await submittedReport();
      ctx.clock.advanceHours(48);

      const result = await ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, { confirmed: true });
      expect(result.report.status).toBe(ReportStatus.COMPLETED);
      expect(result.report.autoConfirmed).toBe(false);
    });

    it('records a dispute with a reason of at least 10 characters', async () => {
      const report = await submittedReport();

      const result = await ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, {
        confirmed: false,
        reason: 'Poubelles!',
      });
      expect(result.report.status).toBe(ReportStatus.DISPUTED);
      expect(result.report.disputeReason).toBe('Poubelles!');
      expect(result.report.lastAction).toBe('disputed');
      expect(result.pointsCredited).toBeUndefined();
      expect(await pointsOf(cast.citizen.id)).toBe(0);
    });

    it('rejects a short dispute reason and leaves the report untouched', async () => {
      const report = await submittedReport();

      await expect(
        ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, { confirmed: false, reason: 'Sale!' })
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(
        ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, { confirmed: false, reason: '   court    ' })
      ).rejects.toBeInstanceOf(ValidationError);

      const stored = await ctx.repo.findReport(report.id);
      expect(stored?.status).toBe(ReportStatus.AWAITING_CONFIRMATION);
    });

    it('auto-confirms and fails with Expired past the deadline', async () => {
      const report = await submittedReport();
      ctx.clock.advanceHours(49);

      await expect(
        ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, { confirmed: true })
      ).rejects.toBeInstanceOf(ExpiredError);

      const stored = await ctx.repo.findReport(report.id);
      expect(stored?.status).toBe(ReportStatus.COMPLETED);
      expect(stored?.autoConfirmed).toBe(true);
      expect(stored?.citizenConfirmed).toBe(false);
      expect(stored?.resolvedAt?.toISOString()).toBe('2025-03-12T09:00:00.000Z');
      expect(stored?.lastAction).toBe('auto_confirmed');
      expect(await pointsOf(cast.citizen.id)).toBe(0);
    });

    it('reports expiry before validating a late dispute', async () => {
      const report = await submittedReport();
      ctx.clock.advanceHours(49);

      await expect(
        ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, { confirmed: false, reason: 'Non' })
      ).rejects.toBeInstanceOf(ExpiredError);
    });

    it('refuses a second confirmation', async () => {
      const report = await submittedReport();
      await ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, { confirmed: true });

      await expect(
        ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, { confirmed: true })
      ).rejects.toBeInstanceOf(InvalidStateError);
      expect(await pointsOf(cast.citizen.id)).toBe(50);
    });

    it('refuses to confirm before a cleanup photo exists', async () => {
      const report = await startedReport();
      await expect(
        ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, { confirmed: true })
      ).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('reports unknown reports as not found', async () => {
      await expect(
        ctx.lifecycle.confirmCleanup(asActor(cast.citizen), 'missing-report', { confirmed: true })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('recordWeight', () => {
    it('credits description and weight points once', async () => {
      const report = await submittedReport();

      const result = await ctx.lifecycle.recordWeight(asActor(cast.collector), report.id, 15.5);
      expect(result.report.weightKg).toBe(15.5);
      expect(result.report.weightVerifiedBy).toBe(cast.collector.id);
      expect(result.report.lastAction).toBe('weight_recorded');
      expect(result.pointsCredited).toBe(61);
      expect(result.pointsBreakdown).toEqual({ description: 30, weight: 31 });
      expect(await pointsOf(cast.citizen.id)).toBe(61);
    });

    it('pays only the missing component on a later confirmation', async () => {
      const report = await submittedReport();
      await ctx.lifecycle.recordWeight(asActor(cast.collector), report.id, 15.5);
      ctx.clock.advanceHours(1);

      const result = await ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, { confirmed: true });
      expect(result.pointsCredited).toBe(20);
      expect(result.pointsBreakdown).toEqual({ confirmation_bonus: 20 });
      expect(await pointsOf(cast.citizen.id)).toBe(81);
    });

    it('pays only the weight when recorded after confirmation', async () => {
      const report = await submittedReport();
      await ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, { confirmed: true });

      const result = await ctx.lifecycle.recordWeight(asActor(cast.collector), report.id, 15.5);
      expect(result.pointsCredited).toBe(31);
      expect(await pointsOf(cast.citizen.id)).toBe(81);
    });

    it('fills a missing description score with zero', async () => {
      const report = await submittedReport(null);
      const result = await ctx.lifecycle.recordWeight(asActor(cast.collector), report.id, 10);

      expect(result.report.descriptionQualityScore).toBe(0);
      expect(result.pointsBreakdown).toEqual({ weight: 20 });
    });

    it('refuses a second weight', async () => {
      const report = await submittedReport();
      await ctx.lifecycle.recordWeight(asActor(cast.collector), report.id, 15.5);

      await expect(ctx.lifecycle.recordWeight(asActor(cast.collector), report.id, 20)).rejects.toBeInstanceOf(
        AlreadySetError
      );
      expect((await ctx.repo.findReport(report.id))?.weightKg).toBe(15.5);
      expect(await pointsOf(cast.citizen.id)).toBe(61);
    });

    it('validates the weight range', async () => {
      const report = await submittedReport();
      await expect(ctx.lifecycle.recordWeight(asActor(cast.collector), report.id, 0)).rejects.toBeInstanceOf(
        ValidationError
      );
      await expect(ctx.lifecycle.recordWeight(asActor(cast.collector), report.id, 1001)).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('refuses roles without the weight permission', async () => {
      const report = await submittedReport();
      const demoted = { ...asActor(cast.collector), role: Role.CITIZEN };

      await expect(ctx.lifecycle.recordWeight(asActor(cast.citizen), report.id, 5)).rejects.toThrow(
        new PermissionDeniedError('Citizen role cannot record weights')
      );
      await expect(ctx.lifecycle.recordWeight(demoted, report.id, 5)).rejects.toBeInstanceOf(PermissionDeniedError);
      expect((await ctx.repo.findReport(report.id))?.weightKg).toBeNull();
    });

    it('allows the supervisor tier within scope', async () => {
      const report = await submittedReport();
      const remote = await createUser(ctx, Role.SUPERVISOR, { commune: 'Lemba' });

      await expect(
        ctx.lifecycle.recordWeight(asActor(cast.otherCollector), report.id, 5)
      ).rejects.toBeInstanceOf(PermissionDeniedError);
      await expect(ctx.lifecycle.recordWeight(asActor(remote), report.id, 5)).rejects.toBeInstanceOf(
        PermissionDeniedError
      );

      const result = await ctx.lifecycle.recordWeight(asActor(cast.supervisor), report.id, 5);
      expect(result.report.weightVerifiedBy).toBe(cast.supervisor.id);
    });
  });

  describe('legacyConfirm', () => {
    it('completes an in-progress report with the flat award', async () => {
      const report = await startedReport();

      const result = await ctx.lifecycle.legacyConfirm(asActor(cast.citizen), report.id);
      expect(result.report.status).toBe(ReportStatus.COMPLETED);
      expect(result.report.lastAction).toBe('legacy_confirmed');
      expect(result.pointsCredited).toBe(100);
      expect(result.pointsBreakdown).toEqual({ legacy_confirmation: 100 });
      expect(await pointsOf(cast.citizen.id)).toBe(100);
    });

    it('is limited to the owner and in-progress reports', async () => {
      const started = await startedReport();
      await expect(ctx.lifecycle.legacyConfirm(asActor(cast.collector), started.id)).rejects.toBeInstanceOf(
        PermissionDeniedError
      );

      const submitted = await submittedReport();
      await expect(ctx.lifecycle.legacyConfirm(asActor(cast.citizen), submitted.id)).rejects.toBeInstanceOf(
        InvalidStateError
      );
    });
  });

  describe('deleteReport', () => {
    it('deletes a pending report and its photo', async () => {
      const report = await createReport();
      await ctx.lifecycle.deleteReport(asActor(cast.citizen), report.id);

      expect(await ctx.repo.findReport(report.id)).toBeNull();
      expect(ctx.photos.removed).toEqual(['https://photos.test/reports/1-site.jpg']);
    });

    it('keeps reports that are already being handled', async () => {
      const report = await startedReport();
      await expect(ctx.lifecycle.deleteReport(asActor(cast.citizen), report.id)).rejects.toBeInstanceOf(
        InvalidStateError
      );
    });

    it('keeps photos when storage removal fails', async () => {
      const report = await createReport();
      ctx.photos.failRemovals = true;

      await ctx.lifecycle.deleteReport(asActor(cast.citizen), report.id);
      expect(await ctx.repo.findReport(report.id)).toBeNull();
      expect(ctx.photos.files.size).toBe(1);
    });
  });

  describe('reads', () => {
    it('exposes the cleanup status to the owner', async () => {
      const report = await submittedReport();
      const status = await ctx.lifecycle.getCleanupStatus(asActor(cast.citizen), report.id);

      expect(status.status).toBe(ReportStatus.AWAITING_CONFIRMATION);
      expect(status.confirmationCode).toBe(report.confirmationCode);
      expect(status.canConfirm).toBe(true);
      expect(status.pointsEstimate).toBe(30);
    });

    it('lets anonymous callers in with the code only', async () => {
      const report = await submittedReport();

      await expect(ctx.lifecycle.getCleanupStatus(null, report.id)).rejects.toBeInstanceOf(PermissionDeniedError);
      const status = await ctx.lifecycle.getCleanupStatus(null, report.id, report.confirmationCode ?? undefined);
      expect(status.reportId).toBe(report.id);
    });

    it('closes the window after the deadline', async () => {
      const report = await submittedReport();
      ctx.clock.advanceHours(49);

      const status = await ctx.lifecycle.getCleanupStatus(asActor(cast.citizen), report.id);
      expect(status.canConfirm).toBe(false);
    });

    it('lists reports awaiting confirmation for agents', async () => {
      const report = await submittedReport();

      const listed = await ctx.lifecycle.listAwaitingConfirmation(asActor(cast.collector));
      expect(listed.map((item) => item.id)).toEqual([report.id]);
      await expect(ctx.lifecycle.listAwaitingConfirmation(asActor(cast.citizen))).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
    });

    it("lists the caller's own reports newest first", async () => {
      const first = await createReport();
      ctx.clock.advanceHours(1);
      const second = await createReport();
      const neighbour = await createUser(ctx, Role.CITIZEN);
      await ctx.lifecycle.createReport(asActor(neighbour), { latitude: 0, longitude: 0, photo: photo() });
      await ctx.lifecycle.assignReport(asActor(cast.collector), first.id);

      const mine = await ctx.lifecycle.listMyReports(asActor(cast.citizen));
      expect(mine.map((report) => report.id)).toEqual([second.id, first.id]);

      const pending = await ctx.lifecycle.listMyReports(asActor(cast.citizen), { status: ReportStatus.PENDING });
      expect(pending.map((report) => report.id)).toEqual([second.id]);

      const paged = await ctx.lifecycle.listMyReports(asActor(cast.citizen), { limit: 1, offset: 1 });
      expect(paged.map((report) => report.id)).toEqual([first.id]);
    });

    it("summarizes a collector's work", async () => {
      const awaiting = await submittedReport();
      const completed = await startedReport();
      await ctx.lifecycle.legacyConfirm(asActor(cast.citizen), completed.id);
      await ctx.lifecycle.recordWeight(asActor(cast.collector), completed.id, 12);

      expect(await ctx.lifecycle.getCollectorStats(asActor(cast.collector), cast.collector.id)).toEqual({
        assigned: 2,
        awaitingConfirmation: 1,
        completed: 1,
        disputed: 0,
        totalWeightKg: 12,
      });

      const listed = await ctx.lifecycle.listCollectorReports(asActor(cast.supervisor), cast.collector.id);
      expect(new Set(listed.map((report) => report.id))).toEqual(new Set([awaiting.id, completed.id]));
      const done = await ctx.lifecycle.listCollectorReports(asActor(cast.collector), cast.collector.id, {
        status: ReportStatus.COMPLETED,
      });
      expect(done.map((report) => report.id)).toEqual([completed.id]);
    });

    it("scopes access to a collector's work", async () => {
      const remote = await createUser(ctx, Role.SUPERVISOR, { commune: 'Lemba' });

      await expect(
        ctx.lifecycle.getCollectorStats(asActor(cast.otherCollector), cast.collector.id)
      ).rejects.toBeInstanceOf(PermissionDeniedError);
      await expect(ctx.lifecycle.getCollectorStats(asActor(remote), cast.collector.id)).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
      await expect(
        ctx.lifecycle.getCollectorStats(asActor(cast.supervisor), cast.citizen.id)
      ).rejects.toBeInstanceOf(NotFoundError);

      const stats = await ctx.lifecycle.getCollectorStats(asActor(cast.coordinator), cast.collector.id);
      expect(stats.assigned).toBe(0);
    });

    it('hides reports from other citizens', async () => {
      const report = await createReport();
      const neighbour = await createUser(ctx, Role.CITIZEN);

      await expect(ctx.lifecycle.getReport(asActor(neighbour), report.id)).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
      const seen = await ctx.lifecycle.getReport(asActor(cast.collector), report.id);
      expect(seen.id).toBe(report.id);
    });
  });

  describe('end to end', () => {
    it('runs a report from creation to a fast confirmation', async () => {
      const { report } = await ctx.lifecycle.createReport(asActor(cast.citizen), {
        latitude: -4.44,
        longitude: 15.27,
        description: RICH_DESCRIPTION,
        photo: photo(),
      });
      expect(report.descriptionQualityScore).toBeGreaterThan(20);
      await ctx.lifecycle.assignReport(asActor(cast.collector), report.id);
      await ctx.lifecycle.startCleanup(asActor(cast.collector), report.id);
      const { report: submitted } = await ctx.lifecycle.submitCleanupPhoto(asActor(cast.collector), report.id, {
        photo: photo('after.jpg'),
      });
      expect(submitted.confirmationCode).toHaveLength(8);
      expect(submitted.confirmationDeadline?.getTime()).toBe(T0.getTime() + 48 * 60 * 60 * 1000);

      ctx.clock.advanceHours(1);
      const result = await ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, { confirmed: true });

      expect(result.report.status).toBe(ReportStatus.COMPLETED);
      expect(result.pointsCredited).toBe(50);
      expect(await pointsOf(cast.citizen.id)).toBe(50);
    });

    it('runs a disputed report back through cleanup', async () => {
      const report = await submittedReport();
      const previousPhoto = report.cleanupPhotoUrl;

      await ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, {
        confirmed: false,
        reason: 'Les sacs sont toujours là',
      });
      const { report: rejected } = await ctx.lifecycle.resolveDispute(asActor(cast.supervisor), report.id, {
        resolution: 'reject',
      });
      expect(rejected.status).toBe(ReportStatus.IN_PROGRESS);
      expect(rejected.cleanupPhotoUrl).toBeNull();
      expect(ctx.photos.removed).toEqual([previousPhoto]);

      ctx.clock.advanceHours(2);
      const { report: resubmitted } = await ctx.lifecycle.submitCleanupPhoto(asActor(cast.collector), report.id, {
        photo: photo('after-2.jpg'),
      });
      expect(resubmitted.status).toBe(ReportStatus.AWAITING_CONFIRMATION);
      expect(resubmitted.confirmationDeadline?.toISOString()).toBe('2025-03-12T10:00:00.000Z');

      ctx.clock.advanceHours(1);
      const result = await ctx.lifecycle.confirmCleanup(asActor(cast.citizen), report.id, { confirmed: true });
      expect(result.pointsBreakdown).toEqual({ description: 30, confirmation_bonus: 20 });
    });
  });
});
