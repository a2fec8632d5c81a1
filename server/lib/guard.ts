import type { Permission, Principal } from "../../shared/schema";

export type GuardDenyReason = "no_session" | "missing_permission";

export type GuardDecision =
  | { allowed: true; principal: Principal }
  | { allowed: false; reason: GuardDenyReason };

export function hasPermission(principal: Principal | undefined, token: Permission): boolean {
  return principal?.permissions.includes(token) ?? false;
}

export function requireAuthenticated(principal: Principal | undefined): GuardDecision {
  if (!principal) {
    return { allowed: false, reason: "no_session" };
  }
  return { allowed: true, principal };
}

/** Authentication is checked before the permission token. */
export function requirePermission(principal: Principal | undefined, token: Permission): GuardDecision {
  const authenticated = requireAuthenticated(principal);
  if (!authenticated.allowed) return authenticated;

  if (!authenticated.principal.permissions.includes(token)) {
    return { allowed: false, reason: "missing_permission" };
  }
  return authenticated;
}
