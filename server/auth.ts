import type { NextFunction, Request, Response } from "express";
import { principalSchema, type Permission, type Principal } from "../shared/schema";
import { requirePermission as checkPermission, requireAuthenticated } from "./lib/guard";
import type { ServiceError } from "./lib/result";

export type FlashCategory = "success" | "info" | "warning" | "danger";

export interface FlashMessage {
  category: FlashCategory;
  message: string;
}

// Session configuration
declare module "express-session" {
  interface SessionData {
    principal?: Principal;
    flash?: FlashMessage[];
  }
}

export function flash(req: Request, message: string, category: FlashCategory = "info") {
  const pending = req.session.flash ?? [];
  pending.push({ category, message });
  req.session.flash = pending;
}

export function takeFlash(req: Request): FlashMessage[] {
  const pending = req.session.flash ?? [];
  delete req.session.flash;
  return pending;
}

const CATEGORY_BY_ERROR: Record<ServiceError["kind"], FlashCategory> = {
  not_found: "danger",
  denied: "danger",
  conflict: "warning",
  rejected: "danger",
};

export function flashError(req: Request, error: ServiceError) {
  flash(req, error.message, CATEGORY_BY_ERROR[error.kind]);
}

/** Only same-site relative paths are honored; anything else falls back. */
export function safeRedirect(target: unknown, fallback: string): string {
  if (typeof target !== "string") return fallback;
  if (!target.startsWith("/") || target.startsWith("//") || target.includes("\\")) return fallback;
  return target;
}

/** A session value that does not have the Principal shape counts as no session. */
export function sessionPrincipal(value: unknown): Principal | undefined {
  const parsed = principalSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

export function currentPrincipal(req: Request): Principal | undefined {
  return sessionPrincipal(req.session.principal);
}

/** Principal of a request that already went through `requireAuth`. */
export function principalOf(req: Request): Principal {
  const principal = currentPrincipal(req);
  if (!principal) {
    throw new Error("principalOf() used on a route without requireAuth");
  }
  return principal;
}

// Auth middleware
export function requireAuth(req: Request, res: Response, next: NextFunction) {
  const decision = requireAuthenticated(currentPrincipal(req));
  if (!decision.allowed) {
    flash(req, "Entre com um usuário habilitado para continuar", "warning");
    return res.redirect("/login");
  }
  next();
}

// Permission middleware - always checks the session first
export function requirePermission(token: Permission) {
  return (req: Request, res: Response, next: NextFunction) => {
    const decision = checkPermission(currentPrincipal(req), token);
    if (!decision.allowed) {
      if (decision.reason === "no_session") {
        flash(req, "Sessão expirada", "warning");
        return res.redirect("/login");
      }
      flash(req, "Você não tem permissão para essa ação", "danger");
      return res.redirect("/dashboard");
    }
    next();
  };
}
