import bcrypt from "bcrypt";
import crypto from "crypto";
import { ADMIN_ROLE_NAME, type Principal, type User, type UserSummary } from "../../shared/schema";
import type { AdminCredential } from "../config";
import type { Collection } from "./document-store";
import type { RoleRegistry } from "./roles";
import { fail, ok, type ServiceResult } from "./result";

export const SALT_ROUNDS = 12;

export type AuthenticationResult = { ok: true; principal: Principal } | { ok: false; reason: "denied" };

export interface NewUser {
  name: string;
  username: string;
  password: string;
  role: string;
  portalEnabled: boolean;
}

export function toSummary(user: User): UserSummary {
  const { password_hash: _omit, ...summary } = user;
  return summary;
}

/**
 * Resolves credentials to a Principal: the static admin list first, then the
 * user store. The permission set is copied into the Principal at login and is
 * not looked up again for the rest of the session.
 */
export class IdentityResolver {
  constructor(
    private readonly admins: readonly AdminCredential[],
    private readonly users: Collection<User[]>,
    private readonly roles: RoleRegistry,
    private readonly saltRounds: number = SALT_ROUNDS,
  ) {}

  async authenticate(username: string, password: string): Promise<AuthenticationResult> {
    const admin = this.admins.find((a) => a.username === username && a.password === password);
    if (admin) {
      const adminPerms = await this.roles.permissionsOf(ADMIN_ROLE_NAME);
      return {
        ok: true,
        principal: {
          username,
          role: ADMIN_ROLE_NAME,
          permissions: adminPerms.length > 0 ? adminPerms : await this.roles.allPermissions(),
        },
      };
    }

    const users = await this.users.read();
    for (const user of users) {
      if (user.username !== username || !user.portal_enabled) continue;
      if (await bcrypt.compare(password, user.password_hash)) {
        return {
          ok: true,
          principal: {
            username,
            role: user.role,
            permissions: await this.roles.permissionsOf(user.role),
          },
        };
      }
    }

    return { ok: false, reason: "denied" };
  }

  async listUsers(): Promise<UserSummary[]> {
    const users = await this.users.read();
    return users
      .sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()))
      .map(toSummary);
  }

  async createUser(input: NewUser): Promise<ServiceResult<UserSummary>> {
    if (this.admins.some((a) => a.username === input.username)) {
      return fail<UserSummary>("conflict", "Usuário já existe");
    }
    if (!(await this.roles.findRole(input.role))) {
      return fail<UserSummary>("rejected", "Cargo inválido");
    }

    // Hashed before taking the collection lock
    const passwordHash = await bcrypt.hash(input.password, this.saltRounds);

    return this.users.mutate((users) => {
      if (users.some((u) => u.username === input.username)) {
        return fail<UserSummary>("conflict", "Usuário já existe");
      }
      const user: User = {
        id: crypto.randomUUID(),
        name: input.name,
        username: input.username,
        role: input.role,
        password_hash: passwordHash,
        portal_enabled: input.portalEnabled,
        created_at: new Date().toISOString(),
      };
      users.push(user);
      return ok(toSummary(user));
    });
  }

  toggleUser(userId: string): Promise<ServiceResult<UserSummary>> {
    return this.users.mutate((users) => {
      const user = users.find((u) => u.id === userId);
      if (!user) return fail<UserSummary>("not_found", "Usuário não encontrado");
      user.portal_enabled = !user.portal_enabled;
      return ok(toSummary(user));
    });
  }

  async changeUserRole(userId: string, roleName: string): Promise<ServiceResult<UserSummary>> {
    const role = await this.roles.findRole(roleName);
    return this.users.mutate((users) => {
      const user = users.find((u) => u.id === userId);
      if (!user) return fail<UserSummary>("not_found", "Usuário não encontrado");
      if (!role) return fail<UserSummary>("rejected", "Cargo inválido");
      user.role = role.name;
      return ok(toSummary(user));
    });
  }
}
