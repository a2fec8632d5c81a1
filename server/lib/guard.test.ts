import { principal } from "../testing";
import { hasPermission, requireAuthenticated, requirePermission } from "./guard";

describe("authorization guard", () => {
  const editor = principal("ana", "Gerente", ["manage_students"]);

  it("denies a missing session before looking at permissions", () => {
    expect(requireAuthenticated(undefined)).toEqual({ allowed: false, reason: "no_session" });
    expect(requirePermission(undefined, "manage_students")).toEqual({
      allowed: false,
      reason: "no_session",
    });
  });

  it("allows a principal holding the token", () => {
    expect(requirePermission(editor, "manage_students")).toEqual({ allowed: true, principal: editor });
  });

  it("denies a principal without the token", () => {
    expect(requirePermission(editor, "manage_roles")).toEqual({
      allowed: false,
      reason: "missing_permission",
    });
    expect(hasPermission(editor, "manage_roles")).toBe(false);
    expect(hasPermission(undefined, "manage_students")).toBe(false);
  });
});
