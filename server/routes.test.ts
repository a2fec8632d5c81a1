import path from "path";
import request from "supertest";
import type { Express } from "express";
import { createApp } from "./app";
import type { PortalConfig } from "./config";
import { createPortal, type Portal } from "./portal";
import { seed } from "./seed";
import { createTestDataDir, type TestDataDir } from "./testing";

type Agent = ReturnType<typeof request.agent>;

describe("portal routes", () => {
  let testDir: TestDataDir;
  let portal: Portal;
  let app: Express;

  beforeEach(async () => {
    testDir = await createTestDataDir("routes");
    const config: PortalConfig = {
      protocol: "http",
      host: "localhost",
      port: 5000,
      debug: false,
      admin_users: [{ username: "admin", password: "test-secret" }],
      sessionSecret: "test-secret",
      dataDir: path.join(testDir.dir, "data"),
      uploadDir: path.join(testDir.dir, "uploads"),
    };
    portal = createPortal(config, { saltRounds: 4 });
    await seed(portal);
    ({ app } = await createApp(portal));
  });

  afterEach(async () => {
    await testDir.cleanup();
  });

  async function login(username: string, password: string): Promise<Agent> {
    const agent = request.agent(app);
    await agent.post("/login").type("form").send({ username, password }).expect(302).expect("Location", "/dashboard");
    return agent;
  }

  async function onboardedAdmin(): Promise<Agent> {
    const admin = await login("admin", "test-secret");
    await admin
      .post("/users")
      .type("form")
      .send({ name: "Caio", username: "caio", password: "test-secret", role: "Colaborador", portal_enabled: "on" })
      .expect(302);
    await admin.post("/welcome/complete").expect(302).expect("Location", "/dashboard");
    return admin;
  }

  it("sends anonymous visitors to the login page", async () => {
    await request(app).get("/").expect(302).expect("Location", "/login");
    await request(app).get("/dashboard").expect(302).expect("Location", "/login");
  });

  it("reports bad credentials on the login page", async () => {
    const agent = request.agent(app);
    await agent.post("/login").type("form").send({ username: "admin", password: "wrong" }).expect("Location", "/login");

    const page = await agent.get("/login").expect(200);

    expect(page.text).toContain("Usuário ou senha inválidos ou acesso bloqueado");
  });

  it("walks an administrator through onboarding", async () => {
    const admin = await login("admin", "test-secret");

    await admin.get("/dashboard").expect(302).expect("Location", "/welcome");
    await admin.post("/welcome/complete").expect(302).expect("Location", "/welcome");
    const welcome = await admin.get("/welcome").expect(200);
    expect(welcome.text).toContain("Crie ao menos um departamento e um usuário para finalizar");

    await admin
      .post("/users")
      .type("form")
      .send({ username: "caio", password: "test-secret", role: "Colaborador", portal_enabled: "on", redirect_to: "/welcome" })
      .expect(302)
      .expect("Location", "/welcome");
    await admin.post("/welcome/complete").expect(302).expect("Location", "/dashboard");

    const dashboard = await admin.get("/dashboard").expect(200);
    expect(dashboard.text).toContain("Configuração inicial concluída!");
  });

  it("ignores off-site redirect targets", async () => {
    const admin = await onboardedAdmin();

    await admin
      .post("/students")
      .type("form")
      .send({ name: "Lia", redirect_to: "https://example.com/" })
      .expect(302)
      .expect("Location", "/dashboard?tab=students");
  });

  it("does not send principals without manage_settings to onboarding", async () => {
    const admin = await login("admin", "test-secret");
    await admin
      .post("/users")
      .type("form")
      .send({ username: "caio", password: "test-secret", role: "Colaborador", portal_enabled: "on" })
      .expect(302);

    const caio = await login("caio", "test-secret");

    await caio.get("/dashboard").expect(200);
  });

  it("blocks a collaborator from privileged forms", async () => {
    await onboardedAdmin();
    const caio = await login("caio", "test-secret");

    await caio.post("/students").type("form").send({ name: "Intruso" }).expect(302).expect("Location", "/dashboard");

    const page = await caio.get("/dashboard").expect(200);
    expect(page.text).toContain("Você não tem permissão para essa ação");
    expect(await portal.storage.getAllStudents()).toEqual([]);
  });

  it("denies login to a disabled user", async () => {
    const admin = await onboardedAdmin();
    const [caio] = await portal.identity.listUsers();
    await admin.post(`/users/${caio.id}/toggle`).expect(302);

    await request(app)
      .post("/login")
      .type("form")
      .send({ username: "caio", password: "test-secret" })
      .expect(302)
      .expect("Location", "/login");
  });

  it("runs a join request from the public link to the roster", async () => {
    const admin = await onboardedAdmin();
    const [department] = await portal.departments.list();

    await request(app)
      .post(`/departments/apply/${department.join_token}`)
      .type("form")
      .send({ name: "Ana", contact: "ana@example.com", desired_role: "Repórter", motivation: "Escrever" })
      .expect(302)
      .expect("Location", `/departments/apply/${department.join_token}`);

    const [pending] = (await portal.departments.list())[0].queue;
    expect(pending).toMatchObject({ name: "Ana", status: "pendente" });

    const decidePath = `/departments/${department.id}/queue/${pending.id}/approve`;
    await admin.post(decidePath).expect(302).expect("Location", "/dashboard?tab=departments");
    await admin.post(decidePath).expect(302);

    const page = await admin.get("/dashboard?tab=departments").expect(200);
    expect(page.text).toContain("Solicitação não encontrada ou já decidida");
    const [stored] = await portal.departments.list();
    expect(stored.members.map((m) => m.name)).toEqual(["Ana"]);
    expect(stored.queue[0].status).toBe("aprovado");
  });

  it("rejects an unknown queue action and an unknown join link", async () => {
    const admin = await onboardedAdmin();
    const [department] = await portal.departments.list();

    await admin.post(`/departments/${department.id}/queue/q/archive`).expect(302);
    const page = await admin.get("/dashboard?tab=departments").expect(200);
    expect(page.text).toContain("Ação inválida");

    await request(app).get("/departments/apply/not-a-token").expect(302).expect("Location", "/login");
  });

  it("accepts only PDF journals and serves the stored file to signed-in users", async () => {
    const admin = await onboardedAdmin();

    await admin
      .post("/journals")
      .field("title", "Edição de maio")
      .attach("file", Buffer.from("not a pdf"), "edicao.docx")
      .expect(302)
      .expect("Location", "/dashboard?tab=journals");
    expect(await portal.storage.getAllJournals()).toEqual([]);

    await admin
      .post("/journals")
      .field("title", "Edição de maio")
      .field("release_date", "2024-05-20")
      .attach("file", Buffer.from("%PDF-1.4 test"), "edicao maio.pdf")
      .expect(302);

    const [journal] = await portal.storage.getAllJournals();
    expect(journal.status).toBe("pendente");
    expect(journal.file).toMatch(/_edicao_maio\.pdf$/);

    const file = journal.file ?? "";
    const download = await admin.get(`/uploads/journals/${file}`).responseType("blob").expect(200);
    expect(Buffer.from(download.body).toString("utf-8")).toBe("%PDF-1.4 test");
    await request(app).get(`/uploads/journals/${file}`).expect(302).expect("Location", "/login");
    await admin.get("/uploads/journals/missing.pdf").expect(404);
  });

  it("records a journal decision through the public approval link", async () => {
    const journal = await portal.storage.createJournal({
      title: "Edição de junho",
      edition: "13",
      releaseDate: "2024-06-20",
      description: "",
      file: null,
    });

    const page = await request(app).get(`/approve/${journal.approval_token}`).expect(200);
    expect(page.text).toContain("Edição de junho");

    await request(app)
      .post(`/approve/${journal.approval_token}`)
      .type("form")
      .send({ action: "reject", reason: "Revisar capa" })
      .expect(302)
      .expect("Location", `/approve/${journal.approval_token}`);

    const stored = await portal.storage.getJournalByToken(journal.approval_token);
    expect(stored).toMatchObject({ status: "rejeitado", approval_reason: "Revisar capa" });
  });

  it("archives assets with the uploader as default owner", async () => {
    const admin = await onboardedAdmin();

    await admin.post("/assets").field("notes", "sem arquivo").expect(302);
    await admin.post("/assets").attach("file", Buffer.from("x"), "script.exe").expect(302);
    expect(await portal.storage.getAllAssets()).toEqual([]);

    await admin.post("/assets").attach("file", Buffer.from("a,b"), "lista.csv").expect(302);

    const [asset] = await portal.storage.getAllAssets();
    expect(asset).toMatchObject({ original_name: "lista.csv", owner: "admin", scope: "pessoal" });
  });

  it("turns away an asset over 16MB before storing anything", async () => {
    const admin = await onboardedAdmin();

    await admin
      .post("/assets")
      .attach("file", Buffer.alloc(16 * 1024 * 1024 + 1), "grande.pdf")
      .expect(302)
      .expect("Location", "/dashboard?tab=assets");

    const page = await admin.get("/dashboard?tab=assets").expect(200);
    expect(page.text).toContain("Arquivo excede o limite de 16MB");
    expect(await portal.storage.getAllAssets()).toEqual([]);
  });

  it("saves the widget form over the normalized widgets", async () => {
    const admin = await onboardedAdmin();

    await admin
      .post("/settings/widgets")
      .type("form")
      .send({ enabled_students: "on", title_students: "Equipe", enabled_agenda: "on" })
      .expect(302)
      .expect("Location", "/dashboard?tab=settings");

    const widgets = await portal.storage.getWidgets();
    expect(widgets.filter((w) => w.enabled).map((w) => w.id)).toEqual(["students", "agenda"]);
    expect(widgets.find((w) => w.id === "students")?.title).toBe("Equipe");
  });

  it("runs a help ticket between a collaborator and the staff", async () => {
    const admin = await onboardedAdmin();
    const caio = await login("caio", "test-secret");

    await caio
      .post("/tickets")
      .type("form")
      .send({ title: "Sem acesso", reason: "Problema técnico", message: "Não consigo enviar" })
      .expect(302)
      .expect("Location", "/dashboard?tab=tickets");
    const [ticket] = await portal.collections.tickets.read();

    await caio.post(`/tickets/${ticket.id}/close`).expect(302).expect("Location", "/dashboard");
    await admin.post(`/tickets/${ticket.id}/close`).type("form").send({ message: "" }).expect(302);
    await admin.post(`/tickets/${ticket.id}/reply`).type("form").send({ message: "Reabrindo" }).expect(302);

    const [stored] = await portal.collections.tickets.read();
    expect(stored.status).toBe("aberto");
    expect(stored.messages.map((m) => m.body)).toEqual(["Não consigo enviar", "Ticket fechado", "Reabrindo"]);
  });

  it("manages roles and keeps the session permission snapshot", async () => {
    const admin = await onboardedAdmin();
    const caio = await login("caio", "test-secret");

    await admin
      .post(`/roles/${encodeURIComponent("Colaborador")}`)
      .type("form")
      .send({ description: "Agenda", permissions: "manage_calendar" })
      .expect(302);

    await caio.post("/calendar").type("form").send({ title: "Fechamento" }).expect("Location", "/dashboard");
    expect(await portal.storage.getAllEvents()).toEqual([]);

    const fresh = await login("caio", "test-secret");
    await fresh.post("/calendar").type("form").send({ title: "Fechamento", date: "2024-07-01" }).expect("Location", "/dashboard?tab=calendar");
    expect((await portal.storage.getAllEvents()).map((e) => e.title)).toEqual(["Fechamento"]);
  });

  it("answers health checks and unknown pages", async () => {
    const health = await request(app).get("/health").expect(200);
    expect(health.body.status).toBe("ok");

    const missing = await request(app).get("/nope").expect(404);
    expect(missing.text).toContain("Página não encontrada");
  });
});
