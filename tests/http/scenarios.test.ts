import { beforeEach, describe, expect, test } from "vitest";
import {
  createTestContext,
  idOf,
  type TestContext,
} from "tests/helpers/app.ts";

describe("end-to-end access scenarios", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  test("only the creator can read a new organization", async () => {
    const created = await ctx.request("POST", "/organizations?user_id=u1", {
      name: "Acme",
    });
    const id = idOf(created.body);

    const own = await ctx.request("GET", `/organizations/${id}?user_id=u1`);
    const foreign = await ctx.request("GET", `/organizations/${id}?user_id=u2`);
    expect(own.status).toBe(200);
    expect(foreign.status).toBe(403);
  });

  test("a member reads but cannot modify the organization", async () => {
    const created = await ctx.request("POST", "/organizations?user_id=u1", {
      name: "Acme",
    });
    const id = idOf(created.body);
    await ctx.request("POST", `/organizations/${id}/members?user_id=u1`, {
      user_id: "u2",
      role: "member",
    });

    const read = await ctx.request("GET", `/organizations/${id}?user_id=u2`);
    const update = await ctx.request(
      "PUT",
      `/organizations/${id}?user_id=u2`,
      { name: "Renamed" },
    );
    const remove = await ctx.request(
      "DELETE",
      `/organizations/${id}?user_id=u2`,
    );
    expect(read.status).toBe(200);
    expect(update.status).toBe(403);
    expect(remove.status).toBe(403);
  });

  test("revoking the only grant withdraws derived permissions", async () => {
    const created = await ctx.request("POST", "/organizations?user_id=u1", {
      name: "Acme",
    });
    const id = idOf(created.body);
    await ctx.request("POST", `/organizations/${id}/members?user_id=u1`, {
      user_id: "u2",
      role: "member",
    });
    await ctx.request(
      "DELETE",
      `/organizations/${id}/members/u2?user_id=u1&role=member`,
    );

    const results = await ctx.authorization.checkAll(
      "u2",
      ["can_view_member", "can_add_resource"],
      "organization",
      id,
    );
    expect([...results.values()]).toEqual([false, false]);
  });

  test("an admin's organization role reaches its resources", async () => {
    const created = await ctx.request("POST", "/organizations?user_id=u1", {
      name: "Acme",
    });
    const orgId = idOf(created.body);
    const resource = await ctx.request("POST", "/resources?user_id=u1", {
      name: "billing-db",
      resource_type: "database",
      organization_id: orgId,
    });
    const resourceId = idOf(resource.body);

    expect(
      await ctx.authorization.check(
        "u1",
        "can_delete_resource",
        "resource",
        resourceId,
      ),
    ).toBe(true);

    const listed = await ctx.request("GET", "/resources?user_id=u1");
    expect(listed.body).toEqual([resource.body]);

    const removed = await ctx.request(
      "DELETE",
      `/resources/${resourceId}?user_id=u1`,
    );
    expect(removed.status).toBe(200);

    const again = await ctx.request(
      "DELETE",
      `/resources/${resourceId}?user_id=u1`,
    );
    expect(again.status).toBe(403);
  });

  test("a stalled relationship store denies instead of failing the request", async () => {
    const created = await ctx.request("POST", "/organizations?user_id=u1", {
      name: "Acme",
    });
    const id = idOf(created.body);
    ctx.oracle.hang.add("check");

    const res = await ctx.request("GET", `/organizations/${id}?user_id=u1`);
    expect(res).toEqual({
      status: 403,
      body: { detail: "Not a member of this organization" },
    });
  });
});
