import { parseRole, Role } from '../lib/permissions';
import {
  LAST_ACTIONS,
  LastAction,
  NotificationRecord,
  Report,
  ReportPatch,
  REPORT_STATUSES,
  ReportStatus,
  User,
} from '../types';
import { dbLogger } from '../utils/logger';

// PostgreSQL hands back Date and boolean; SQLite stores ISO text and 0/1.
type DbDate = Date | string;
type DbBool = boolean | number;

export type ReportRow = {
  id: string;
  latitude: number;
  longitude: number;
  address_description: string | null;
  description: string | null;
  image_url: string;
  weight_kg: number | null;
  weight_verified_at: DbDate | null;
  weight_verified_by: string | null;
  description_quality_score: number | null;
  status: string;
  cleanup_photo_url: string | null;
  cleanup_photo_submitted_at: DbDate | null;
  citizen_confirmed: DbBool;
  citizen_confirmed_at: DbDate | null;
  confirmation_code: string | null;
  confirmation_deadline: DbDate | null;
  auto_confirmed: DbBool;
  dispute_reason: string | null;
  last_action: string | null;
  last_action_at: DbDate | null;
  created_at: DbDate;
  resolved_at: DbDate | null;
  user_id: string;
  collector_id: string | null;
  owner_commune: string | null;
};

export type UserRow = {
  id: string;
  full_name: string;
  role: string;
  commune: string | null;
  points: number | string;
  subscription_active: DbBool;
  created_at: DbDate;
};

export type NotificationRow = {
  id: string;
  user_id: string;
  type: string;
  title: string;
  message: string;
  data: string | Record<string, unknown> | null;
  is_read: DbBool;
  created_at: DbDate;
};

export const toDate = (value: DbDate): Date => (value instanceof Date ? value : new Date(value));

export const toOptionalDate = (value: DbDate | null): Date | null => (value === null ? null : toDate(value));

export const toBool = (value: DbBool): boolean => value === true || value === 1;

const parseStatus = (value: string): ReportStatus => {
  const status = REPORT_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new Error(`Unknown report status '${value}'`);
  }
  return status;
};

const parseLastAction = (value: string | null): LastAction | null =>
  LAST_ACTIONS.find((candidate) => candidate === value) ?? null;

export const mapReportRow = (row: ReportRow): Report => ({
  id: row.id,
  latitude: Number(row.latitude),
  longitude: Number(row.longitude),
  addressDescription: row.address_description,
  description: row.description,
  imageUrl: row.image_url,
  weightKg: row.weight_kg === null ? null : Number(row.weight_kg),
  weightVerifiedAt: toOptionalDate(row.weight_verified_at),
  weightVerifiedBy: row.weight_verified_by,
  descriptionQualityScore: row.description_quality_score,
  status: parseStatus(row.status),
  cleanupPhotoUrl: row.cleanup_photo_url,
  cleanupPhotoSubmittedAt: toOptionalDate(row.cleanup_photo_submitted_at),
  citizenConfirmed: toBool(row.citizen_confirmed),
  citizenConfirmedAt: toOptionalDate(row.citizen_confirmed_at),
  confirmationCode: row.confirmation_code,
  confirmationDeadline: toOptionalDate(row.confirmation_deadline),
  autoConfirmed: toBool(row.auto_confirmed),
  disputeReason: row.dispute_reason,
  lastAction: parseLastAction(row.last_action),
  lastActionAt: toOptionalDate(row.last_action_at),
  createdAt: toDate(row.created_at),
  resolvedAt: toOptionalDate(row.resolved_at),
  userId: row.user_id,
  collectorId: row.collector_id,
  ownerCommune: row.owner_commune,
});

export const mapUserRow = (row: UserRow): User => {
  let role = parseRole(row.role);
  if (!role) {
    dbLogger.warn({ userId: row.id, role: row.role }, 'Unknown role on user row, treating as citizen');
    role = Role.CITIZEN;
  }

  return {
    id: row.id,
    fullName: row.full_name,
    role,
    commune: row.commune,
    points: Number(row.points),
    subscriptionActive: toBool(row.subscription_active),
    createdAt: toDate(row.created_at),
  };
};

const parseData = (value: NotificationRow['data']): Record<string, unknown> => {
  if (value === null) return {};
  if (typeof value !== 'string') return value;
  const parsed: unknown = JSON.parse(value);
  return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed) ? { ...parsed } : {};
};

export const mapNotificationRow = (row: NotificationRow): NotificationRecord => ({
  id: row.id,
  userId: row.user_id,
  type: row.type,
  title: row.title,
  message: row.message,
  data: parseData(row.data),
  isRead: toBool(row.is_read),
  createdAt: toDate(row.created_at),
});

export type PatchValue = ReportPatch[keyof ReportPatch];

// Report fields a patch may touch, with their columns, in a stable order
const REPORT_PATCH_COLUMNS: ReadonlyArray<readonly [keyof ReportPatch, string]> = [
  ['latitude', 'latitude'],
  ['longitude', 'longitude'],
  ['addressDescription', 'address_description'],
  ['description', 'description'],
  ['weightKg', 'weight_kg'],
  ['weightVerifiedAt', 'weight_verified_at'],
  ['weightVerifiedBy', 'weight_verified_by'],
  ['descriptionQualityScore', 'description_quality_score'],
  ['status', 'status'],
  ['cleanupPhotoUrl', 'cleanup_photo_url'],
  ['cleanupPhotoSubmittedAt', 'cleanup_photo_submitted_at'],
  ['citizenConfirmed', 'citizen_confirmed'],
  ['citizenConfirmedAt', 'citizen_confirmed_at'],
  ['confirmationCode', 'confirmation_code'],
  ['confirmationDeadline', 'confirmation_deadline'],
  ['autoConfirmed', 'auto_confirmed'],
  ['disputeReason', 'dispute_reason'],
  ['lastAction', 'last_action'],
  ['lastActionAt', 'last_action_at'],
  ['resolvedAt', 'resolved_at'],
  ['collectorId', 'collector_id'],
];

/**
 * The columns a patch sets, skipping undefined fields. Both adapters build
 * their UPDATE statements from this list.
 */
export const patchAssignments = (patch: ReportPatch): Array<{ column: string; value: PatchValue }> =>
  REPORT_PATCH_COLUMNS.filter(([field]) => patch[field] !== undefined).map(([field, column]) => ({
    column,
    value: patch[field],
  }));
