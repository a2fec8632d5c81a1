import { z } from "zod";
import { roleSchema, type Role } from "../../shared/schema";
import { createTestDataDir, type TestDataDir } from "../testing";
import { Collection, JsonDocumentStore } from "./document-store";
import { RoleRegistry, SEED_ROLES } from "./roles";

describe("RoleRegistry", () => {
  let testDir: TestDataDir;
  let collection: Collection<Role[]>;
  let registry: RoleRegistry;

  function rolesCollection(initial: Role[]): Collection<Role[]> {
    return new Collection<Role[]>(new JsonDocumentStore(testDir.dir), "roles", z.array(roleSchema), () =>
      initial.map((r) => ({ ...r, permissions: [...r.permissions] })),
    );
  }

  beforeEach(async () => {
    testDir = await createTestDataDir("roles");
    collection = rolesCollection(SEED_ROLES);
    registry = new RoleRegistry(collection);
  });

  afterEach(async () => {
    await testDir.cleanup();
  });

  it("lists roles by lower-cased name", async () => {
    const names = (await registry.listRoles()).map((r) => r.name);
    expect(names).toEqual(["Administrador", "Colaborador", "Diretor de Departamento", "Gerente"]);
  });

  it("returns the permissions of a role and nothing for an unknown one", async () => {
    expect(await registry.permissionsOf("Diretor de Departamento")).toEqual([
      "manage_assets",
      "manage_calendar",
      "approve_departments",
      "manage_tickets",
    ]);
    expect(await registry.permissionsOf("Fantasma")).toEqual([]);
  });

  it("hands out copies of the permission list", async () => {
    const perms = await registry.permissionsOf("Gerente");
    perms.push("manage_roles");

    expect(await registry.permissionsOf("Gerente")).not.toContain("manage_roles");
  });

  it("computes the sorted union of every role's permissions", async () => {
    await registry.createRole("Revisor", "", ["review_drafts"]);

    const all = await registry.allPermissions();

    expect(all).toContain("review_drafts");
    expect(all).toEqual([...all].sort());
    expect(new Set(all).size).toBe(all.length);
  });

  it("creates a role and rejects a duplicate name", async () => {
    const created = await registry.createRole("Revisor", "Revisa textos", ["manage_rules", "manage_rules"]);
    expect(created).toEqual({
      ok: true,
      value: { name: "Revisor", description: "Revisa textos", permissions: ["manage_rules"] },
    });

    const duplicate = await registry.createRole("Revisor", "", []);
    expect(duplicate).toEqual({
      ok: false,
      error: { kind: "conflict", message: "Já existe um cargo com esse nome" },
    });
  });

  it("updates an existing role", async () => {
    const result = await registry.updateRole("Colaborador", "Leitura", ["manage_calendar"]);

    expect(result.ok).toBe(true);
    expect(await registry.findRole("Colaborador")).toEqual({
      name: "Colaborador",
      description: "Leitura",
      permissions: ["manage_calendar"],
    });
    expect(await registry.updateRole("Fantasma", "", [])).toEqual({
      ok: false,
      error: { kind: "not_found", message: "Cargo não encontrado" },
    });
  });

  it("grants manage_tickets to the privileged roles that lack it", async () => {
    await testDir.cleanup();
    testDir = await createTestDataDir("roles-legacy");
    const legacy = SEED_ROLES.map((r) => ({
      ...r,
      permissions: r.permissions.filter((p) => p !== "manage_tickets"),
    }));
    registry = new RoleRegistry(rolesCollection(legacy));

    expect(await registry.ensureTicketPermissions()).toBe(3);
    expect(await registry.ensureTicketPermissions()).toBe(0);
    expect(await registry.permissionsOf("Colaborador")).toEqual([]);
    expect(await registry.permissionsOf("Gerente")).toContain("manage_tickets");
  });
});
