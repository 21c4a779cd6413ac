import { beforeEach, describe, expect, test } from "vitest";
import {
  createTestContext,
  idOf,
  type TestContext,
} from "tests/helpers/app.ts";

describe("resource routes", () => {
  let ctx: TestContext;
  let orgId: string;

  beforeEach(async () => {
    ctx = createTestContext();
    const org = await ctx.seedOrganization("Acme", {
      u1: "admin",
      u2: "member",
      pat: "project_manager",
    });
    orgId = org.id;
  });

  describe("POST /resources", () => {
    test("a member creates a resource linked to the organization", async () => {
      const res = await ctx.request("POST", "/resources?user_id=u2", {
        name: "billing-db",
        resource_type: "database",
        organization_id: orgId,
      });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        id: expect.any(String),
        name: "billing-db",
        description: null,
        resource_type: "database",
        organization_id: orgId,
        created_at: expect.any(String),
        updated_at: expect.any(String),
      });
      expect(ctx.oracle.tuples).toContainEqual({
        user: `organization:${orgId}`,
        relation: "organization",
        object: `resource:${idOf(res.body)}`,
      });
    });

    test("denies callers who cannot add resources", async () => {
      const res = await ctx.request("POST", "/resources?user_id=pat", {
        name: "billing-db",
        resource_type: "database",
        organization_id: orgId,
      });
      expect(res).toEqual({
        status: 403,
        body: { detail: "Cannot add resources to this organization" },
      });
      expect(await ctx.store.resources.list()).toEqual([]);
    });

    test("rolls back the record when linking fails", async () => {
      ctx.oracle.fail.add("write");
      const res = await ctx.request("POST", "/resources?user_id=u1", {
        name: "billing-db",
        resource_type: "database",
        organization_id: orgId,
      });
      expect(res).toEqual({
        status: 500,
        body: { detail: "Failed to link resource to organization" },
      });
      expect(await ctx.store.resources.list()).toEqual([]);
    });

    test("requires a resource type", async () => {
      const res = await ctx.request("POST", "/resources?user_id=u1", {
        name: "billing-db",
        organization_id: orgId,
      });
      expect(res).toEqual({
        status: 400,
        body: { detail: "resource_type: Required" },
      });
    });
  });

  describe("GET /resources", () => {
    test("lists resources visible through organization roles", async () => {
      const r1 = await ctx.seedResource(orgId, "r1");
      const r2 = await ctx.seedResource(orgId, "r2");
      const other = await ctx.seedOrganization("Other", { u9: "admin" });
      await ctx.seedResource(other.id, "r3");

      const res = await ctx.request("GET", "/resources?user_id=pat");
      expect(res.status).toBe(200);
      expect(res.body).toEqual([
        expect.objectContaining({ id: r1.id, name: "r1" }),
        expect.objectContaining({ id: r2.id, name: "r2" }),
      ]);
    });

    test("filters by owning organization", async () => {
      await ctx.seedResource(orgId, "r1");
      const other = await ctx.seedOrganization("Other", { u2: "member" });
      const r2 = await ctx.seedResource(other.id, "r2");

      const res = await ctx.request(
        "GET",
        `/resources?user_id=u2&organization_id=${other.id}`,
      );
      expect(res.body).toEqual([expect.objectContaining({ id: r2.id })]);
    });

    test("lists nothing when the lookup fails", async () => {
      await ctx.seedResource(orgId);
      ctx.oracle.fail.add("listObjects");
      const res = await ctx.request("GET", "/resources?user_id=u1");
      expect(res).toEqual({ status: 200, body: [] });
    });
  });

  describe("GET /resources/:id", () => {
    test("returns the resource to a member", async () => {
      const db = await ctx.seedResource(orgId);
      const res = await ctx.request("GET", `/resources/${db.id}?user_id=u2`);
      expect(res.status).toBe(200);
      expect(res.body).toEqual(
        expect.objectContaining({ id: db.id, organization_id: orgId }),
      );
    });

    test("denies outsiders", async () => {
      const db = await ctx.seedResource(orgId);
      const res = await ctx.request("GET", `/resources/${db.id}?user_id=u9`);
      expect(res).toEqual({
        status: 403,
        body: { detail: "No access to this resource" },
      });
    });

    test("denies when the relationship store stalls", async () => {
      const db = await ctx.seedResource(orgId);
      ctx.oracle.hang.add("check");
      const res = await ctx.request("GET", `/resources/${db.id}?user_id=u1`);
      expect(res.status).toBe(403);
    });

    test("checks access before existence", async () => {
      const res = await ctx.request("GET", "/resources/ghost?user_id=u1");
      expect(res.status).toBe(403);
    });
  });

  describe("PUT /resources/:id", () => {
    test("an admin updates the type and keeps the owner", async () => {
      const db = await ctx.seedResource(orgId);
      const res = await ctx.request("PUT", `/resources/${db.id}?user_id=u1`, {
        resource_type: "cache",
      });
      expect(res.status).toBe(200);
      expect(res.body).toEqual(
        expect.objectContaining({
          name: "db",
          resource_type: "cache",
          organization_id: orgId,
        }),
      );
    });

    test("denies members", async () => {
      const db = await ctx.seedResource(orgId);
      const res = await ctx.request("PUT", `/resources/${db.id}?user_id=u2`, {
        name: "renamed",
      });
      expect(res).toEqual({
        status: 403,
        body: { detail: "Admin access required" },
      });
    });
  });

  describe("DELETE /resources/:id", () => {
    test("an admin deletes the resource and its link", async () => {
      const db = await ctx.seedResource(orgId);
      const res = await ctx.request(
        "DELETE",
        `/resources/${db.id}?user_id=u1`,
      );
      expect(res).toEqual({
        status: 200,
        body: { message: "Resource deleted successfully" },
      });
      expect(await ctx.store.resources.findById(db.id)).toBeNull();
      expect(
        await ctx.authorization.check(
          "u2",
          "can_view_resource",
          "resource",
          db.id,
        ),
      ).toBe(false);
    });

    test("returns 404 when access holds but the record is gone", async () => {
      ctx.oracle.grant(
        `organization:${orgId}`,
        "organization",
        "resource:ghost",
      );
      const res = await ctx.request("DELETE", "/resources/ghost?user_id=u1");
      expect(res).toEqual({
        status: 404,
        body: { detail: "Resource not found" },
      });
    });

    test("denies members", async () => {
      const db = await ctx.seedResource(orgId);
      const res = await ctx.request(
        "DELETE",
        `/resources/${db.id}?user_id=u2`,
      );
      expect(res.status).toBe(403);
      expect(await ctx.store.resources.findById(db.id)).toEqual(db);
    });
  });

  describe("GET /resources/:id/permissions", () => {
    test("reports what the caller may do", async () => {
      const db = await ctx.seedResource(orgId);
      const member = await ctx.request(
        "GET",
        `/resources/${db.id}/permissions?user_id=u2`,
      );
      expect(member).toEqual({
        status: 200,
        body: {
          resource_id: db.id,
          user_id: "u2",
          permissions: { can_view: true, can_delete: false },
        },
      });

      const admin = await ctx.request(
        "GET",
        `/resources/${db.id}/permissions?user_id=u1`,
      );
      expect(admin.body).toEqual(
        expect.objectContaining({
          permissions: { can_view: true, can_delete: true },
        }),
      );
    });

    test("returns 404 for unknown resources", async () => {
      const res = await ctx.request(
        "GET",
        "/resources/ghost/permissions?user_id=u1",
      );
      expect(res).toEqual({
        status: 404,
        body: { detail: "Resource not found" },
      });
    });
  });
});
