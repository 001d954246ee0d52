import { InvalidStateError, PermissionDeniedError, ValidationError } from '../lib/errors';
import { canActInCommune, hasPermission } from '../lib/permissions';
import { Actor, Report, ReportPatch, ReportStatus } from '../types';

export type DisputeResolution = 'accept' | 'reject';

export const DISPUTE_RESOLUTIONS: readonly DisputeResolution[] = ['accept', 'reject'];

export const parseResolution = (value: unknown): DisputeResolution => {
  const resolution = DISPUTE_RESOLUTIONS.find((candidate) => candidate === value);
  if (!resolution) {
    throw new ValidationError(`resolution must be one of: ${DISPUTE_RESOLUTIONS.join(', ')}`, {
      resolution: 'invalid value',
    });
  }
  return resolution;
};

/**
 * Supervisors resolve disputes in their own commune; coordinators and
 * admins resolve anywhere.
 */
export const authorizeResolver = (actor: Actor, report: Report): void => {
  if (!hasPermission(actor.role, 'RESOLVE_DISPUTES')) {
    throw new PermissionDeniedError('Only supervisors, coordinators or admins can resolve disputes');
  }
  if (!canActInCommune(actor.role, actor.commune, report.ownerCommune)) {
    throw new PermissionDeniedError('Report is outside your commune');
  }
};

export const assertDisputed = (report: Report): void => {
  if (report.status !== ReportStatus.DISPUTED) {
    throw new InvalidStateError(`Report is not disputed (status ${report.status})`);
  }
};

const appendNotes = (reason: string | null, notes: string | undefined): string | null => {
  const trimmed = notes?.trim();
  if (!trimmed) return reason;
  const note = `[Supervisor notes: ${trimmed}]`;
  return reason ? `${reason}\n${note}` : note;
};

/**
 * The write a resolution makes. `accept` closes the report as confirmed;
 * `reject` sends it back to the collector with the proof cleared.
 */
export const resolutionPatch = (
  report: Report,
  resolution: DisputeResolution,
  notes: string | undefined,
  now: Date
): ReportPatch => {
  if (resolution === 'accept') {
    return {
      citizenConfirmed: true,
      status: ReportStatus.COMPLETED,
      resolvedAt: now,
      lastAction: 'dispute_resolved_accepted',
      lastActionAt: now,
    };
  }

  return {
    cleanupPhotoUrl: null,
    cleanupPhotoSubmittedAt: null,
    confirmationCode: null,
    confirmationDeadline: null,
    status: ReportStatus.IN_PROGRESS,
    disputeReason: appendNotes(report.disputeReason, notes),
    lastAction: 'dispute_resolved_rejected',
    lastActionAt: now,
  };
};
