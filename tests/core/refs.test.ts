import { describe, expect, test } from "vitest";
import { InvalidObjectRefError } from "src/core/errors.ts";
import {
  idsOfType,
  objectRef,
  parseObjectRef,
  userRef,
} from "src/core/refs.ts";
import { isRelationOf } from "src/core/types.ts";

describe("object refs", () => {
  test("formats type:id refs", () => {
    expect(objectRef("organization", "acme")).toBe("organization:acme");
    expect(userRef("alice")).toBe("user:alice");
  });

  test("splits on the first colon only", () => {
    expect(parseObjectRef("resource:db:replica")).toEqual({
      type: "resource",
      id: "db:replica",
    });
  });

  test("rejects refs missing a type or an id", () => {
    for (const ref of ["acme", ":acme", "organization:"]) {
      expect(() => parseObjectRef(ref)).toThrow(InvalidObjectRefError);
    }
  });

  test("idsOfType keeps distinct ids of one type", () => {
    const ids = idsOfType(
      ["resource:a", "organization:x", "resource:b", "resource:a"],
      "resource",
    );
    expect([...ids]).toEqual(["a", "b"]);
  });
});

describe("isRelationOf", () => {
  test("accepts relations defined on the type", () => {
    expect(isRelationOf("organization", "can_add_member")).toBe(true);
    expect(isRelationOf("organization", "senior_project_manager")).toBe(true);
    expect(isRelationOf("resource", "can_view_resource")).toBe(true);
  });

  test("rejects relations of other types and unknown names", () => {
    expect(isRelationOf("organization", "can_view_resource")).toBe(false);
    expect(isRelationOf("resource", "can_add_member")).toBe(false);
    expect(isRelationOf("resource", "owner")).toBe(false);
  });
});
