// src/lib/permissions.ts
// 🔐 Role-Based Access Control for the report lifecycle

export enum Role {
  CITIZEN = 'citizen',
  COLLECTOR = 'collector',
  SUPERVISOR = 'supervisor',
  COORDINATOR = 'coordinator',
  ADMIN = 'admin',
}

export type PermissionKey =
  | 'CREATE_REPORTS'
  | 'ASSIGN_REPORTS'
  | 'REASSIGN_REPORTS'
  | 'SUBMIT_CLEANUP_PHOTO'
  | 'RECORD_WEIGHT'
  | 'RESOLVE_DISPUTES'
  | 'VIEW_AWAITING_CONFIRMATION'
  | 'VIEW_DISPUTED'
  | 'VIEW_COLLECTOR_STATS'
  | 'RUN_SCHEDULED_TASKS';

export type Permission = Partial<Record<PermissionKey, boolean>>;

export const PERMISSION_KEYS: readonly PermissionKey[] = [
  'CREATE_REPORTS',
  'ASSIGN_REPORTS',
  'REASSIGN_REPORTS',
  'SUBMIT_CLEANUP_PHOTO',
  'RECORD_WEIGHT',
  'RESOLVE_DISPUTES',
  'VIEW_AWAITING_CONFIRMATION',
  'VIEW_DISPUTED',
  'VIEW_COLLECTOR_STATS',
  'RUN_SCHEDULED_TASKS',
];

/**
 * Role-Permission Matrix
 * Defines what each role can do in the lifecycle
 */
export const ROLE_PERMISSIONS: Record<Role, Permission> = {
  // 🧍 Citizen - reports waste, confirms or disputes cleanups
  [Role.CITIZEN]: {
    CREATE_REPORTS: true,
  },

  // 🚛 Collector - takes reports, cleans, submits proof and weight
  [Role.COLLECTOR]: {
    ASSIGN_REPORTS: true,
    SUBMIT_CLEANUP_PHOTO: true,
    RECORD_WEIGHT: true,
    VIEW_AWAITING_CONFIRMATION: true,
  },

  // 🧭 Supervisor - arbitrates disputes in their commune
  [Role.SUPERVISOR]: {
    ASSIGN_REPORTS: true,
    REASSIGN_REPORTS: true,
    SUBMIT_CLEANUP_PHOTO: true,
    RECORD_WEIGHT: true,
    RESOLVE_DISPUTES: true,
    VIEW_AWAITING_CONFIRMATION: true,
    VIEW_DISPUTED: true,
    VIEW_COLLECTOR_STATS: true,
  },

  // 🗺️ Coordinator - same as supervisor, across all communes
  [Role.COORDINATOR]: {
    ASSIGN_REPORTS: true,
    REASSIGN_REPORTS: true,
    SUBMIT_CLEANUP_PHOTO: true,
    RECORD_WEIGHT: true,
    RESOLVE_DISPUTES: true,
    VIEW_AWAITING_CONFIRMATION: true,
    VIEW_DISPUTED: true,
    VIEW_COLLECTOR_STATS: true,
  },

  // 👑 Admin - everything, including scheduled tasks
  [Role.ADMIN]: {
    ASSIGN_REPORTS: true,
    REASSIGN_REPORTS: true,
    SUBMIT_CLEANUP_PHOTO: true,
    RECORD_WEIGHT: true,
    RESOLVE_DISPUTES: true,
    VIEW_AWAITING_CONFIRMATION: true,
    VIEW_DISPUTED: true,
    VIEW_COLLECTOR_STATS: true,
    RUN_SCHEDULED_TASKS: true,
  },
};

const AGENT_ROLES: ReadonlySet<Role> = new Set([
  Role.COLLECTOR,
  Role.SUPERVISOR,
  Role.COORDINATOR,
  Role.ADMIN,
]);

const SUPERVISOR_TIER: ReadonlySet<Role> = new Set([Role.SUPERVISOR, Role.COORDINATOR, Role.ADMIN]);

// Older rows and tokens carry French role names
const ROLE_SYNONYMS: Record<string, Role> = {
  citizen: Role.CITIZEN,
  citoyen: Role.CITIZEN,
  collector: Role.COLLECTOR,
  ramasseur: Role.COLLECTOR,
  supervisor: Role.SUPERVISOR,
  superviseur: Role.SUPERVISOR,
  coordinator: Role.COORDINATOR,
  coordinateur: Role.COORDINATOR,
  admin: Role.ADMIN,
  administrateur: Role.ADMIN,
};

/**
 * Check if a role has a specific permission
 */
export const hasPermission = (role: Role, permission: PermissionKey): boolean => {
  return ROLE_PERMISSIONS[role][permission] ?? false;
};

export const isAgent = (role: Role): boolean => AGENT_ROLES.has(role);

export const isSupervisorTier = (role: Role): boolean => SUPERVISOR_TIER.has(role);

/**
 * Coordinators and admins act in every commune; everyone else is
 * limited to reports whose owner lives in their own commune.
 */
export const bypassesCommuneScope = (role: Role): boolean => {
  return role === Role.COORDINATOR || role === Role.ADMIN;
};

/**
 * Commune comparison is case-insensitive and only enforced when both
 * sides have a commune on record.
 */
export const sharesCommune = (actorCommune: string | null, ownerCommune: string | null): boolean => {
  if (!actorCommune || !ownerCommune) return true;
  return actorCommune.trim().toLowerCase() === ownerCommune.trim().toLowerCase();
};

export const canActInCommune = (
  role: Role,
  actorCommune: string | null,
  ownerCommune: string | null
): boolean => {
  return bypassesCommuneScope(role) || sharesCommune(actorCommune, ownerCommune);
};

/**
 * Get human-readable label for a role
 */
export const getRoleLabel = (role: Role): string => {
  const labels: Record<Role, string> = {
    [Role.CITIZEN]: 'Citizen',
    [Role.COLLECTOR]: 'Waste Collector',
    [Role.SUPERVISOR]: 'Supervisor',
    [Role.COORDINATOR]: 'Coordinator',
    [Role.ADMIN]: 'Administrator',
  };
  return labels[role];
};

/**
 * Get all permissions for a role
 */
export const getRolePermissions = (role: Role): PermissionKey[] => {
  return PERMISSION_KEYS.filter((key) => hasPermission(role, key));
};

/**
 * Canonicalise a stored role string. Returns null for unknown values.
 */
export const parseRole = (value: string | null | undefined): Role | null => {
  if (!value) return null;
  return ROLE_SYNONYMS[value.trim().toLowerCase()] ?? null;
};
