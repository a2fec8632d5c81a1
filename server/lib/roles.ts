import { ADMIN_ROLE_NAME, type Role } from "../../shared/schema";
import type { Collection } from "./document-store";
import { fail, ok, type ServiceResult } from "./result";

export const SEED_ROLES: Role[] = [
  {
    name: ADMIN_ROLE_NAME,
    description: "Acesso total ao painel e configurações",
    permissions: [
      "manage_students",
      "manage_journals",
      "manage_assets",
      "manage_rules",
      "manage_announcements",
      "manage_calendar",
      "manage_departments",
      "approve_departments",
      "manage_settings",
      "manage_roles",
      "manage_users",
      "manage_tickets",
    ],
  },
  {
    name: "Gerente",
    description: "Cuida de pessoas, calendários e arquivos",
    permissions: [
      "manage_students",
      "manage_assets",
      "manage_calendar",
      "manage_announcements",
      "manage_departments",
      "manage_tickets",
    ],
  },
  {
    name: "Diretor de Departamento",
    description: "Aprova filas e acompanha entregas do time",
    permissions: ["manage_assets", "manage_calendar", "approve_departments", "manage_tickets"],
  },
  {
    name: "Colaborador",
    description: "Acesso apenas para consultar materiais",
    permissions: [],
  },
];

// Roles that must always be able to answer tickets
const TICKET_MANAGER_ROLES = new Set([ADMIN_ROLE_NAME, "Gerente", "Diretor de Departamento"]);

/**
 * Source of truth for authorization. Permission tokens are stored as given:
 * an unknown token is kept and simply never matches a guard.
 */
export class RoleRegistry {
  constructor(private readonly roles: Collection<Role[]>) {}

  async listRoles(): Promise<Role[]> {
    const roles = await this.roles.read();
    return roles.sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()));
  }

  async findRole(name: string): Promise<Role | undefined> {
    const roles = await this.roles.read();
    return roles.find((role) => role.name === name);
  }

  async permissionsOf(name: string): Promise<string[]> {
    const role = await this.findRole(name);
    return role ? [...role.permissions] : [];
  }

  async allPermissions(): Promise<string[]> {
    const roles = await this.roles.read();
    const permSet = new Set<string>();
    for (const role of roles) {
      role.permissions.forEach((permission) => permSet.add(permission));
    }
    return [...permSet].sort();
  }

  createRole(name: string, description: string, permissions: string[]): Promise<ServiceResult<Role>> {
    return this.roles.mutate((roles) => {
      if (roles.some((role) => role.name === name)) {
        return fail<Role>("conflict", "Já existe um cargo com esse nome");
      }
      const role: Role = { name, description, permissions: [...new Set(permissions)] };
      roles.push(role);
      return ok(role);
    });
  }

  updateRole(name: string, description: string, permissions: string[]): Promise<ServiceResult<Role>> {
    return this.roles.mutate((roles) => {
      const role = roles.find((r) => r.name === name);
      if (!role) {
        return fail<Role>("not_found", "Cargo não encontrado");
      }
      role.description = description;
      role.permissions = [...new Set(permissions)];
      return ok(role);
    });
  }

  /** Adds `manage_tickets` to the privileged seed roles that lack it. */
  ensureTicketPermissions(): Promise<number> {
    return this.roles.mutate((roles) => {
      let patched = 0;
      for (const role of roles) {
        if (TICKET_MANAGER_ROLES.has(role.name) && !role.permissions.includes("manage_tickets")) {
          role.permissions.push("manage_tickets");
          patched++;
        }
      }
      return patched;
    });
  }
}
