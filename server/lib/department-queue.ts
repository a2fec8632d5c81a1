import crypto from "crypto";
import type {
  Department,
  Member,
  Principal,
  QueueDecision,
  QueueRequest,
} from "../../shared/schema";
import type { Collection } from "./document-store";
import { hasPermission } from "./guard";
import { fail, ok, type ServiceResult } from "./result";

export interface NewDepartment {
  name: string;
  description: string;
  director: string;
}

export interface JoinRequestInput {
  name: string;
  contact: string;
  desiredRole: string;
  motivation: string;
}

export const SEED_DEPARTMENT: NewDepartment = {
  name: "Redação",
  description: "Produção de textos e pautas do jornal",
  director: "Definir diretor",
};

export function pendingCount(departments: Department[]): number {
  return departments.reduce(
    (total, d) => total + d.queue.filter((entry) => entry.status === "pendente").length,
    0,
  );
}

/**
 * Departments with their membership roster and join-request queue.
 * A queue entry goes pendente -> aprovado | rejeitado exactly once.
 */
export class DepartmentQueue {
  constructor(private readonly departments: Collection<Department[]>) {}

  async list(): Promise<Department[]> {
    const departments = await this.departments.read();
    return departments.sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()));
  }

  async findByToken(token: string): Promise<Department | undefined> {
    const departments = await this.departments.read();
    return departments.find((d) => d.join_token === token);
  }

  create(input: NewDepartment): Promise<Department> {
    return this.departments.mutate((departments) => {
      const department: Department = {
        id: crypto.randomUUID(),
        name: input.name,
        description: input.description,
        director: input.director,
        join_token: crypto.randomUUID(),
        members: [],
        queue: [],
      };
      departments.push(department);
      return department;
    });
  }

  /** Creates the default department when there is none yet. */
  ensureSeeded(): Promise<boolean> {
    return this.departments.mutate((departments) => {
      if (departments.length > 0) return false;
      departments.push({
        id: crypto.randomUUID(),
        ...SEED_DEPARTMENT,
        join_token: crypto.randomUUID(),
        members: [],
        queue: [],
      });
      return true;
    });
  }

  /** Public entry point: the join token is the only credential. */
  submitRequest(token: string, input: JoinRequestInput): Promise<ServiceResult<QueueRequest>> {
    return this.departments.mutate((departments) => {
      const department = departments.find((d) => d.join_token === token);
      if (!department) {
        return fail<QueueRequest>("not_found", "Link de inscrição inválido");
      }
      const entry: QueueRequest = {
        id: crypto.randomUUID(),
        name: input.name,
        contact: input.contact,
        desired_role: input.desiredRole,
        motivation: input.motivation,
        status: "pendente",
        created_at: new Date().toISOString(),
      };
      department.queue.push(entry);
      return ok(entry);
    });
  }

  /**
   * Decides the first entry matching `queueId` that is still pendente.
   * An already decided or absent entry yields `not_found` and leaves the
   * document untouched.
   */
  decide(
    departmentId: string,
    queueId: string,
    action: QueueDecision,
    actor: Principal,
  ): Promise<ServiceResult<QueueRequest>> {
    if (!hasPermission(actor, "approve_departments")) {
      return Promise.resolve(fail<QueueRequest>("denied", "Você não tem permissão para essa ação"));
    }

    return this.departments.mutate((departments) => {
      const department = departments.find((d) => d.id === departmentId);
      if (!department) {
        return fail<QueueRequest>("not_found", "Departamento não encontrado");
      }

      const entry = department.queue.find((e) => e.id === queueId && e.status === "pendente");
      if (!entry) {
        return fail<QueueRequest>("not_found", "Solicitação não encontrada ou já decidida");
      }

      const now = new Date().toISOString();
      entry.status = action === "approve" ? "aprovado" : "rejeitado";
      entry.decided_at = now;
      entry.decided_by = actor.username;

      if (action === "approve") {
        department.members.push({ name: entry.name, role: entry.desired_role, joined_at: now });
      }
      return ok(entry);
    });
  }

  addMember(departmentId: string, name: string, role: string): Promise<ServiceResult<Member>> {
    return this.departments.mutate((departments) => {
      const department = departments.find((d) => d.id === departmentId);
      if (!department) {
        return fail<Member>("not_found", "Departamento não encontrado");
      }
      const member: Member = { name, role, joined_at: new Date().toISOString() };
      department.members.push(member);
      return ok(member);
    });
  }
}
