import { describe, expect, test } from "vitest";
import { MemoryEntityStore } from "src/store/memory/adapter.ts";
import { describeEntityStore } from "tests/helpers/store-contract.ts";

describeEntityStore("memory", async () => new MemoryEntityStore());

describe("MemoryEntityStore", () => {
  test("instances do not share records", async () => {
    const a = new MemoryEntityStore();
    const b = new MemoryEntityStore();
    await a.organizations.insert({ name: "Acme", description: null });
    expect(await b.organizations.list()).toEqual([]);
  });

  test("role permissions are copied on insert", async () => {
    const store = new MemoryEntityStore();
    const permissions = ["can_view_member"];
    const role = await store.roles.insert({
      name: "viewer",
      description: null,
      permissions,
    });
    permissions.push("can_add_member");
    expect(role.permissions).toEqual(["can_view_member"]);
  });
});
