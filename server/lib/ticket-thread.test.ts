import { z } from "zod";
import { ticketSchema, type Ticket } from "../../shared/schema";
import { createTestDataDir, principal, type TestDataDir } from "../testing";
import { Collection, JsonDocumentStore } from "./document-store";
import { TicketThread } from "./ticket-thread";

describe("TicketThread", () => {
  let testDir: TestDataDir;
  let thread: TicketThread;

  const student = principal("joana", "Colaborador");
  const other = principal("pedro", "Colaborador");
  const manager = principal("gerente", "Gerente", ["manage_tickets"]);

  beforeEach(async () => {
    testDir = await createTestDataDir("tickets");
    thread = new TicketThread(
      new Collection<Ticket[]>(new JsonDocumentStore(testDir.dir), "tickets", z.array(ticketSchema), () => []),
    );
  });

  afterEach(async () => {
    await testDir.cleanup();
  });

  async function openTicket(reason = "Problema técnico"): Promise<Ticket> {
    return thread.open(student, { title: "Sem acesso", reason, message: "Não consigo entrar" });
  }

  it("opens a ticket with the first message", async () => {
    const ticket = await openTicket();

    expect(ticket).toMatchObject({
      title: "Sem acesso",
      reason: "Problema técnico",
      urgency: "normal",
      status: "aberto",
      created_by: "joana",
      created_role: "Colaborador",
    });
    expect(ticket.messages).toHaveLength(1);
    expect(ticket.messages[0]).toMatchObject({ author: "joana", body: "Não consigo entrar" });
  });

  it("uses the custom reason for Outro", async () => {
    const ticket = await thread.open(student, {
      title: "Pedido",
      reason: "Outro",
      customReason: "Troca de pauta",
      urgency: "alta",
      message: "Podemos trocar?",
    });

    expect(ticket.reason).toBe("Troca de pauta");
    expect(ticket.urgency).toBe("alta");
  });

  it("keeps Outro when no custom reason is given", async () => {
    const ticket = await thread.open(student, { title: "Pedido", reason: "Outro", customReason: "", message: "Oi" });

    expect(ticket.reason).toBe("Outro");
  });

  it("shows everything to managers and only own tickets to others", async () => {
    await openTicket();
    await thread.open(other, { title: "Outro", reason: "Problema técnico", message: "Oi" });

    expect((await thread.visibleTo(manager)).length).toBe(2);
    expect((await thread.visibleTo(student)).map((t) => t.created_by)).toEqual(["joana"]);
  });

  it("lets only the creator or a manager reply", async () => {
    const ticket = await openTicket();

    expect(await thread.reply(ticket.id, other, "Intrometido")).toEqual({
      ok: false,
      error: { kind: "denied", message: "Você não pode interagir com este ticket" },
    });
    const reply = await thread.reply(ticket.id, student, "Mais detalhes");
    expect(reply.ok && reply.value.messages).toHaveLength(2);
  });

  it("reopens a closed ticket only on a manager reply", async () => {
    const ticket = await openTicket();
    await thread.close(ticket.id, manager);

    const fromCreator = await thread.reply(ticket.id, student, "Ainda não funciona");
    expect(fromCreator.ok && fromCreator.value.status).toBe("fechado");

    const fromManager = await thread.reply(ticket.id, manager, "Vamos olhar de novo");
    expect(fromManager.ok && fromManager.value.status).toBe("aberto");
  });

  it("closes with a default final message", async () => {
    const ticket = await openTicket();

    const closed = await thread.close(ticket.id, manager);

    expect(closed.ok && closed.value.status).toBe("fechado");
    expect(closed.ok && closed.value.messages[closed.value.messages.length - 1].body).toBe("Ticket fechado");
    expect(await thread.openCount()).toBe(0);
  });

  it("denies close and delete without manage_tickets", async () => {
    const ticket = await openTicket();

    expect(await thread.close(ticket.id, student)).toEqual({
      ok: false,
      error: { kind: "denied", message: "Você não tem permissão para essa ação" },
    });
    expect((await thread.delete(ticket.id, student)).ok).toBe(false);
    const [stored] = await thread.visibleTo(manager);
    expect(stored.status).toBe("aberto");
  });

  it("deletes a ticket", async () => {
    const ticket = await openTicket();

    expect((await thread.delete(ticket.id, manager)).ok).toBe(true);
    expect(await thread.visibleTo(manager)).toEqual([]);
    expect(await thread.delete(ticket.id, manager)).toEqual({
      ok: false,
      error: { kind: "not_found", message: "Ticket não encontrado" },
    });
  });
});
