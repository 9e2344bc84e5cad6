// =============================================================================
// GAZETTE - Role Definitions
//
// Five fixed roles. A user holds exactly one, chosen at registration and
// never reassigned by ordinary flows.
// =============================================================================

/** All roles in the system */
export type UserRole =
  | 'reader'
  | 'journalist'
  | 'editor'
  | 'publisher'
  | 'staff';

export const USER_ROLES: readonly UserRole[] = [
  'reader', 'journalist', 'editor', 'publisher', 'staff',
];

/** Roles a visitor may pick on the registration form */
export const SELF_REGISTRABLE_ROLES: readonly UserRole[] = [
  'reader', 'journalist', 'editor', 'publisher',
];

/** Roles a publisher can add to their house team */
export type TeamRole = Extract<UserRole, 'editor' | 'journalist'>;

export const TEAM_ROLES: readonly TeamRole[] = ['editor', 'journalist'];

export function isUserRole(value: unknown): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}

export function isTeamRole(value: unknown): value is TeamRole {
  return TEAM_ROLES.some((role) => role === value);
}

/**
 * Parse a stored or submitted role. Rows with an unknown role are a data
 * error and fail here, before any role check sees them.
 */
export function parseRole(value: unknown): UserRole {
  if (!isUserRole(value)) {
    throw new Error(`Unknown user role: ${String(value)}`);
  }
  return value;
}
