import fs from "fs/promises";
import path from "path";
import type { Widget } from "../shared/schema";
import { JsonDocumentStore } from "./lib/document-store";
import { createCollections, JsonStorage } from "./storage";
import { createTestDataDir, type TestDataDir } from "./testing";

describe("JsonStorage", () => {
  let testDir: TestDataDir;
  let storage: JsonStorage;

  beforeEach(async () => {
    testDir = await createTestDataDir("storage");
    storage = new JsonStorage(createCollections(new JsonDocumentStore(testDir.dir)));
  });

  afterEach(async () => {
    await testDir.cleanup();
  });

  it("creates and toggles students", async () => {
    const student = await storage.createStudent({
      name: "Lia",
      role: "Editora",
      contact: "",
      notes: "",
      portalEnabled: false,
    });

    const toggled = await storage.toggleStudent(student.id);

    expect(toggled.ok && toggled.value.portal_enabled).toBe(true);
    expect(await storage.toggleStudent("missing")).toEqual({
      ok: false,
      error: { kind: "not_found", message: "Participante não encontrado" },
    });
  });

  it("lets a reviewer revise a journal decision", async () => {
    const journal = await storage.createJournal({
      title: "Edição de maio",
      edition: "12",
      releaseDate: "2024-05-20",
      description: "",
      file: null,
    });
    expect(journal.status).toBe("pendente");

    const rejected = await storage.decideJournal(journal.approval_token, "reject");
    expect(rejected.ok && rejected.value).toMatchObject({ status: "rejeitado", approval_reason: "Sem justificativa" });

    const approved = await storage.decideJournal(journal.approval_token, "approve");
    expect(approved.ok && approved.value).toMatchObject({ status: "aprovado", approval_reason: null });

    expect((await storage.decideJournal("bad-token", "approve")).ok).toBe(false);
  });

  it("sorts journals by release date, newest first", async () => {
    for (const [title, releaseDate] of [["A", "2024-01-10"], ["B", "2024-03-01"], ["C", "2023-12-01"]]) {
      await storage.createJournal({ title, edition: "", releaseDate, description: "", file: null });
    }
    expect((await storage.getAllJournals()).map((j) => j.title)).toEqual(["B", "A", "C"]);
  });

  it("derives the asset scope from the department", async () => {
    const personal = await storage.createAsset({
      originalName: "a.pdf",
      storedName: "1_a.pdf",
      notes: "",
      owner: "lia",
      departmentId: null,
    });
    const shared = await storage.createAsset({
      originalName: "b.pdf",
      storedName: "2_b.pdf",
      notes: "",
      owner: "lia",
      departmentId: "dep-1",
    });

    expect(personal.scope).toBe("pessoal");
    expect(shared.scope).toBe("departamento");
  });

  it("fills defaults for assets written before scope existed", async () => {
    await fs.writeFile(
      path.join(testDir.dir, "assets.json"),
      JSON.stringify([{ id: "1", original_name: "x.txt", stored_name: "1_x.txt", uploaded_at: "2024-01-01T00:00:00" }]),
      "utf-8",
    );

    const [asset] = await storage.getAllAssets();

    expect(asset).toMatchObject({ scope: "pessoal", owner: "", department_id: null, notes: "" });
  });

  it("stamps rules updates", async () => {
    expect((await storage.getRules()).updated_at).toBeNull();

    const rules = await storage.updateRules("Respeite os prazos.");

    expect(rules.content).toBe("Respeite os prazos.");
    expect(rules.updated_at).not.toBeNull();
  });

  it("publishes and removes announcements", async () => {
    const announcement = await storage.createAnnouncement({ title: "Reunião", body: "", audience: "", pinned: true });
    expect(announcement.audience).toBe("todos");

    expect(await storage.removeAnnouncement(announcement.id)).toBe(true);
    expect(await storage.removeAnnouncement(announcement.id)).toBe(false);
    expect(await storage.getAllAnnouncements()).toEqual([]);
  });

  it("orders calendar events by date", async () => {
    await storage.createEvent({ title: "Depois", date: "2024-09-01", category: "", departmentId: null, description: "" });
    await storage.createEvent({ title: "Antes", date: "2024-02-01", category: "", departmentId: null, description: "" });

    const events = await storage.getAllEvents();

    expect(events.map((e) => e.title)).toEqual(["Antes", "Depois"]);
    expect(events[0].category).toBe("geral");
  });

  it("normalizes widgets on read and persists them only on update", async () => {
    const widgets = await storage.getWidgets();
    expect(widgets.map((w) => w.id)).toEqual(["welcome", "students", "tickets", "agenda", "departments"]);

    await storage.updateWidgets((current) => current.map((w) => ({ ...w, enabled: w.id !== "welcome" })));

    const settings = await storage.getSiteSettings();
    expect(settings.widgets?.find((w) => w.id === "welcome")?.enabled).toBe(false);
  });

  it("applies concurrent widget edits on top of each other", async () => {
    const disable = (id: string) => (current: Widget[]) =>
      current.map((w) => (w.id === id ? { ...w, enabled: false } : w));

    await Promise.all([storage.updateWidgets(disable("students")), storage.updateWidgets(disable("tickets"))]);

    const disabled = (await storage.getWidgets()).filter((w) => !w.enabled).map((w) => w.id);
    expect(disabled).toEqual(["students", "tickets"]);
  });

  it("updates visual settings and completes onboarding", async () => {
    const settings = await storage.updateVisualSettings({ logoUrl: "", primaryColor: "", accentColor: "#111111" });
    expect(settings).toMatchObject({ primary_color: "#0d6efd", accent_color: "#111111" });

    expect((await storage.completeOnboarding()).onboarding_done).toBe(true);
  });
});
