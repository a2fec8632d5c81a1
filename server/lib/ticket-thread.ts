import crypto from "crypto";
import type { Principal, Ticket, TicketMessage } from "../../shared/schema";
import type { Collection } from "./document-store";
import { hasPermission } from "./guard";
import { fail, ok, type ServiceResult } from "./result";

export interface NewTicket {
  title: string;
  reason: string;
  customReason?: string;
  urgency?: string;
  message: string;
}

const NOT_FOUND = "Ticket não encontrado";

function messageFrom(principal: Principal, body: string): TicketMessage {
  return {
    author: principal.username,
    role: principal.role,
    body,
    timestamp: new Date().toISOString(),
  };
}

function byCreatedDesc(a: Ticket, b: Ticket): number {
  return b.created_at.localeCompare(a.created_at);
}

export class TicketThread {
  constructor(private readonly tickets: Collection<Ticket[]>) {}

  /** manage_tickets holders see every ticket, everybody else only their own. */
  async visibleTo(principal: Principal): Promise<Ticket[]> {
    const tickets = await this.tickets.read();
    const visible = hasPermission(principal, "manage_tickets")
      ? tickets
      : tickets.filter((t) => t.created_by === principal.username);
    return visible.sort(byCreatedDesc);
  }

  async openCount(): Promise<number> {
    const tickets = await this.tickets.read();
    return tickets.filter((t) => t.status === "aberto").length;
  }

  open(creator: Principal, input: NewTicket): Promise<Ticket> {
    const reason = input.reason || "Outro";
    return this.tickets.mutate((tickets) => {
      const ticket: Ticket = {
        id: crypto.randomUUID(),
        title: input.title,
        reason: reason === "Outro" ? input.customReason || "Outro" : reason,
        urgency: input.urgency || "normal",
        status: "aberto",
        created_by: creator.username,
        created_role: creator.role,
        messages: [messageFrom(creator, input.message)],
        created_at: new Date().toISOString(),
      };
      tickets.push(ticket);
      return ticket;
    });
  }

  /**
   * Appends a message from the creator or a manage_tickets holder. A reply from
   * a manage_tickets holder reopens a closed ticket; the creator's does not.
   */
  reply(ticketId: string, principal: Principal, body: string): Promise<ServiceResult<Ticket>> {
    return this.tickets.mutate((tickets) => {
      const ticket = tickets.find((t) => t.id === ticketId);
      if (!ticket) return fail<Ticket>("not_found", NOT_FOUND);

      const canManage = hasPermission(principal, "manage_tickets");
      if (ticket.created_by !== principal.username && !canManage) {
        return fail<Ticket>("denied", "Você não pode interagir com este ticket");
      }

      ticket.messages.push(messageFrom(principal, body));
      if (ticket.status === "fechado" && canManage) {
        ticket.status = "aberto";
      }
      return ok(ticket);
    });
  }

  close(ticketId: string, principal: Principal, finalMessage?: string): Promise<ServiceResult<Ticket>> {
    if (!hasPermission(principal, "manage_tickets")) {
      return Promise.resolve(fail<Ticket>("denied", "Você não tem permissão para essa ação"));
    }
    return this.tickets.mutate((tickets) => {
      const ticket = tickets.find((t) => t.id === ticketId);
      if (!ticket) return fail<Ticket>("not_found", NOT_FOUND);

      ticket.status = "fechado";
      ticket.messages.push(messageFrom(principal, finalMessage || "Ticket fechado"));
      return ok(ticket);
    });
  }

  delete(ticketId: string, principal: Principal): Promise<ServiceResult<Ticket>> {
    if (!hasPermission(principal, "manage_tickets")) {
      return Promise.resolve(fail<Ticket>("denied", "Você não tem permissão para essa ação"));
    }
    return this.tickets.mutate((tickets) => {
      const index = tickets.findIndex((t) => t.id === ticketId);
      if (index < 0) return fail<Ticket>("not_found", NOT_FOUND);
      const [removed] = tickets.splice(index, 1);
      return ok(removed);
    });
  }
}
