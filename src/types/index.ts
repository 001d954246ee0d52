import { Role } from '../lib/permissions';

export enum ReportStatus {
  PENDING = 'PENDING',
  ASSIGNED = 'ASSIGNED',
  IN_PROGRESS = 'IN_PROGRESS',
  AWAITING_CONFIRMATION = 'AWAITING_CONFIRMATION',
  COMPLETED = 'COMPLETED',
  DISPUTED = 'DISPUTED',
}

export const REPORT_STATUSES: readonly ReportStatus[] = Object.values(ReportStatus);

export const LAST_ACTIONS = [
  'created',
  'assigned',
  'reassigned',
  'cleanup_started',
  'photo_submitted',
  'confirmed',
  'disputed',
  'auto_confirmed',
  'dispute_resolved_accepted',
  'dispute_resolved_rejected',
  'weight_recorded',
  'legacy_confirmed',
] as const;

export type LastAction = (typeof LAST_ACTIONS)[number];

export interface Report {
  id: string;
  latitude: number;
  longitude: number;
  addressDescription: string | null;
  description: string | null;
  imageUrl: string;

  weightKg: number | null;
  weightVerifiedAt: Date | null;
  weightVerifiedBy: string | null;
  descriptionQualityScore: number | null;

  status: ReportStatus;
  cleanupPhotoUrl: string | null;
  cleanupPhotoSubmittedAt: Date | null;
  citizenConfirmed: boolean;
  citizenConfirmedAt: Date | null;
  confirmationCode: string | null;
  confirmationDeadline: Date | null;
  autoConfirmed: boolean;
  disputeReason: string | null;
  lastAction: LastAction | null;
  lastActionAt: Date | null;

  createdAt: Date;
  resolvedAt: Date | null;

  userId: string;
  collectorId: string | null;
  // Joined from the owner's user row; drives commune scoping
  ownerCommune: string | null;
}

export type NewReport = Pick<
  Report,
  | 'id'
  | 'latitude'
  | 'longitude'
  | 'addressDescription'
  | 'description'
  | 'imageUrl'
  | 'descriptionQualityScore'
  | 'userId'
  | 'createdAt'
>;

export type ReportPatch = Partial<
  Omit<Report, 'id' | 'userId' | 'createdAt' | 'ownerCommune' | 'imageUrl'>
>;

export interface User {
  id: string;
  fullName: string;
  role: Role;
  commune: string | null;
  points: number;
  subscriptionActive: boolean;
  createdAt: Date;
}

export type NewUser = Omit<User, 'points' | 'createdAt'> & { points?: number; createdAt?: Date };

/**
 * The authenticated caller as supplied by the identity collaborator.
 */
export interface Actor {
  id: string;
  role: Role;
  commune: string | null;
}

export const POINT_COMPONENTS = [
  'description',
  'weight',
  'confirmation_bonus',
  'legacy_confirmation',
  'subscription',
] as const;

export type PointComponent = (typeof POINT_COMPONENTS)[number];

export interface PointEntry {
  component: PointComponent;
  points: number;
}

export interface PhotoUpload {
  filename: string;
  content: Buffer;
}

export interface NotificationRecord {
  id: string;
  userId: string;
  type: string;
  title: string;
  message: string;
  data: Record<string, unknown>;
  isRead: boolean;
  createdAt: Date;
}

export interface CitizenStats {
  totalReports: number;
  totalWeightKg: number;
}

export interface CollectorStats {
  assigned: number;
  awaitingConfirmation: number;
  completed: number;
  disputed: number;
  // Recorded weight on completed reports only
  totalWeightKg: number;
}
