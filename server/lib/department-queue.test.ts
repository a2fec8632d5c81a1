import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { departmentSchema, type Department } from "../../shared/schema";
import { createTestDataDir, principal, type TestDataDir } from "../testing";
import { DepartmentQueue, pendingCount } from "./department-queue";
import { Collection, JsonDocumentStore } from "./document-store";

describe("DepartmentQueue", () => {
  let testDir: TestDataDir;
  let queue: DepartmentQueue;

  const director = principal("diretora", "Diretor de Departamento", ["approve_departments"]);
  const reader = principal("leitor", "Colaborador");

  beforeEach(async () => {
    testDir = await createTestDataDir("departments");
    queue = new DepartmentQueue(
      new Collection<Department[]>(new JsonDocumentStore(testDir.dir), "departments", z.array(departmentSchema), () => []),
    );
  });

  afterEach(async () => {
    await testDir.cleanup();
  });

  const ana = { name: "Ana", contact: "ana@example.com", desiredRole: "Repórter", motivation: "Gosto de escrever" };

  it("creates departments with distinct join tokens", async () => {
    const a = await queue.create({ name: "Redação", description: "", director: "Lia" });
    const b = await queue.create({ name: "Fotografia", description: "", director: "Rui" });

    expect(a.join_token).not.toBe(b.join_token);
    expect(await queue.findByToken(b.join_token)).toEqual(b);
    expect((await queue.list()).map((d) => d.name)).toEqual(["Fotografia", "Redação"]);
  });

  it("seeds a default department only once", async () => {
    expect(await queue.ensureSeeded()).toBe(true);
    expect(await queue.ensureSeeded()).toBe(false);
    expect((await queue.list()).map((d) => d.name)).toEqual(["Redação"]);
  });

  it("rejects a request with an unknown token", async () => {
    expect(await queue.submitRequest("no-such-token", ana)).toEqual({
      ok: false,
      error: { kind: "not_found", message: "Link de inscrição inválido" },
    });
  });

  it("approves Ana into the roster exactly once", async () => {
    const department = await queue.create({ name: "Redação", description: "", director: "Lia" });
    const submitted = await queue.submitRequest(department.join_token, ana);
    if (!submitted.ok) throw new Error("request not stored");
    expect(submitted.value.status).toBe("pendente");

    const decided = await queue.decide(department.id, submitted.value.id, "approve", director);

    expect(decided.ok && decided.value.status).toBe("aprovado");
    expect(decided.ok && decided.value.decided_by).toBe("diretora");
    const [stored] = await queue.list();
    expect(stored.members).toHaveLength(1);
    expect(stored.members[0]).toMatchObject({ name: "Ana", role: "Repórter" });
    expect(pendingCount([stored])).toBe(0);
  });

  it("rejects without touching the roster", async () => {
    const department = await queue.create({ name: "Redação", description: "", director: "Lia" });
    const submitted = await queue.submitRequest(department.join_token, ana);
    if (!submitted.ok) throw new Error("request not stored");

    await queue.decide(department.id, submitted.value.id, "reject", director);

    const [stored] = await queue.list();
    expect(stored.members).toEqual([]);
    expect(stored.queue[0].status).toBe("rejeitado");
  });

  it("treats a second decision as a no-op that leaves the document unchanged", async () => {
    const department = await queue.create({ name: "Redação", description: "", director: "Lia" });
    const submitted = await queue.submitRequest(department.join_token, ana);
    if (!submitted.ok) throw new Error("request not stored");
    await queue.decide(department.id, submitted.value.id, "approve", director);
    const file = path.join(testDir.dir, "departments.json");
    const before = await fs.readFile(file, "utf-8");

    const again = await queue.decide(department.id, submitted.value.id, "reject", director);

    expect(again).toEqual({
      ok: false,
      error: { kind: "not_found", message: "Solicitação não encontrada ou já decidida" },
    });
    expect(await fs.readFile(file, "utf-8")).toBe(before);
  });

  it("requires approve_departments to decide", async () => {
    const department = await queue.create({ name: "Redação", description: "", director: "Lia" });
    const submitted = await queue.submitRequest(department.join_token, ana);
    if (!submitted.ok) throw new Error("request not stored");

    const result = await queue.decide(department.id, submitted.value.id, "approve", reader);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.kind).toBe("denied");
    expect(pendingCount(await queue.list())).toBe(1);
  });

  it("reports an unknown department", async () => {
    expect(await queue.decide("missing", "q", "approve", director)).toEqual({
      ok: false,
      error: { kind: "not_found", message: "Departamento não encontrado" },
    });
    expect(await queue.addMember("missing", "Rui", "Fotógrafo")).toEqual({
      ok: false,
      error: { kind: "not_found", message: "Departamento não encontrado" },
    });
  });

  it("adds members directly", async () => {
    const department = await queue.create({ name: "Fotografia", description: "", director: "Rui" });

    const added = await queue.addMember(department.id, "Caio", "Fotógrafo");

    expect(added.ok && added.value).toMatchObject({ name: "Caio", role: "Fotógrafo" });
    const [stored] = await queue.list();
    expect(stored.members.map((m) => m.name)).toEqual(["Caio"]);
  });
});
