import { beforeEach, describe, expect, test } from "vitest";
import type { EntityStore } from "src/store/interface.ts";

/**
 * Behaviour every EntityStore backing must share. `create` is called before
 * each test and must return an empty store.
 */
export function describeEntityStore(
  name: string,
  create: () => Promise<EntityStore>,
): void {
  describe(`${name} entity store`, () => {
    let store: EntityStore;

    beforeEach(async () => {
      store = await create();
    });

    describe("organizations", () => {
      test("insert assigns an id and timestamps", async () => {
        const org = await store.organizations.insert({
          name: "Acme",
          description: "Widgets",
        });
        expect(org.id).not.toBe("");
        expect(org.name).toBe("Acme");
        expect(org.description).toBe("Widgets");
        expect(org.createdAt).toBeInstanceOf(Date);
        expect(org.updatedAt).toBeInstanceOf(Date);
        expect(await store.organizations.findById(org.id)).toEqual(org);
      });

      test("list returns records in insertion order", async () => {
        const first = await store.organizations.insert({
          name: "First",
          description: null,
        });
        const second = await store.organizations.insert({
          name: "Second",
          description: null,
        });
        const listed = await store.organizations.list();
        expect(listed.map((o) => o.id)).toEqual([first.id, second.id]);
      });

      test("update overwrites only the fields it carries", async () => {
        const org = await store.organizations.insert({
          name: "Acme",
          description: "Widgets",
        });
        const updated = await store.organizations.update(org.id, {
          name: "Acme Corp",
        });
        expect(updated?.name).toBe("Acme Corp");
        expect(updated?.description).toBe("Widgets");
        expect(updated?.id).toBe(org.id);
        expect(updated?.createdAt).toEqual(org.createdAt);
      });

      test("update and findById return null for unknown ids", async () => {
        expect(await store.organizations.findById("missing")).toBeNull();
        expect(
          await store.organizations.update("missing", { name: "x" }),
        ).toBeNull();
      });

      test("delete reports whether a record was removed", async () => {
        const org = await store.organizations.insert({
          name: "Acme",
          description: null,
        });
        expect(await store.organizations.delete(org.id)).toBe(true);
        expect(await store.organizations.delete(org.id)).toBe(false);
        expect(await store.organizations.findById(org.id)).toBeNull();
      });
    });

    describe("resources", () => {
      test("listByOrganization filters by owner", async () => {
        const db = await store.resources.insert({
          name: "db",
          description: null,
          resourceType: "database",
          organizationId: "acme",
        });
        await store.resources.insert({
          name: "bucket",
          description: null,
          resourceType: "storage",
          organizationId: "other",
        });
        const owned = await store.resources.listByOrganization("acme");
        expect(owned.map((r) => r.id)).toEqual([db.id]);
        expect(owned[0]?.resourceType).toBe("database");
      });

      test("update keeps the owner", async () => {
        const db = await store.resources.insert({
          name: "db",
          description: null,
          resourceType: "database",
          organizationId: "acme",
        });
        const updated = await store.resources.update(db.id, {
          resourceType: "cache",
        });
        expect(updated?.resourceType).toBe("cache");
        expect(updated?.organizationId).toBe("acme");
      });
    });

    describe("catalogs", () => {
      test("roles keep their permission list", async () => {
        const role = await store.roles.insert({
          name: "auditor",
          description: null,
          permissions: ["can_view_member", "can_view_resource"],
        });
        const updated = await store.roles.update(role.id, {
          permissions: ["can_view_member"],
        });
        expect(role.permissions).toEqual([
          "can_view_member",
          "can_view_resource",
        ]);
        expect(updated?.permissions).toEqual(["can_view_member"]);
        expect(updated?.name).toBe("auditor");
      });

      test("permissions store their resource type", async () => {
        const permission = await store.permissions.insert({
          name: "can_view_resource",
          description: "View a resource",
          resourceType: "resource",
        });
        expect(await store.permissions.list()).toEqual([permission]);
      });

      test("project managers update name and email", async () => {
        const pm = await store.projectManagers.insert({
          userId: "pat",
          name: "Pat",
          email: "pat@example.test",
        });
        const updated = await store.projectManagers.update(pm.id, {
          email: "pat@corp.example.test",
        });
        expect(updated?.userId).toBe("pat");
        expect(updated?.name).toBe("Pat");
        expect(updated?.email).toBe("pat@corp.example.test");
      });
    });
  });
}
