/**
 * Authentication and authorization types.
 *
 * API keys arrive via the X-Api-Key header. Each key acts as a subject:
 * an account for holders, an operator id for admins and viewers.
 *
 * Role permissions:
 * - viewer: read
 * - holder: read, write (own account only)
 * - admin:  read, write, admin
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "holder" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "write" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  holder: ["read", "write"],
  admin: ["read", "write", "admin"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set by the auth middleware (or by the unsecured-mode
 * fallback, which acts as an admin).
 */
export interface AuthContext {
  readonly type: "api-key" | "unsecured";
  /** Account or operator the caller acts as */
  readonly subject: string;
  readonly role: Role;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly subject: string;
}
