import { Elysia } from "elysia";
import { DependencyFailureError, ValidationError } from "src/core/errors.ts";
import {
  type AppDependencies,
  found,
  requireAccess,
} from "src/http/context.ts";
import { organizationResponse } from "src/http/serializers.ts";
import {
  callerQuery,
  memberAssignment,
  memberPath,
  memberRemovalQuery,
  organizationCreate,
  organizationUpdate,
  parseInput,
} from "src/http/validation.ts";
import type { Resource } from "src/store/interface.ts";

export function organizationRoutes({
  store,
  authorization,
  logger,
}: AppDependencies) {
  const log = logger.child({ component: "organizations" });

  /**
   * Remove what hangs off a deleted organization. The organization record
   * is already gone, so failures here are logged and not reported.
   */
  async function removeDependents(
    organizationId: string,
    resources: Resource[],
  ): Promise<void> {
    for (const resource of resources) {
      await store.resources.delete(resource.id);
      if (!(await authorization.revokeAll("resource", resource.id))) {
        log.warn(
          { organizationId, resourceId: resource.id },
          "Left relationships behind for deleted resource",
        );
      }
    }
    if (!(await authorization.revokeAll("organization", organizationId))) {
      log.warn({ organizationId }, "Left memberships behind");
    }
  }

  return new Elysia({ prefix: "/organizations" })
    .get("/", async ({ query }) => {
      const { user_id } = parseInput(callerQuery, query);
      const organizations = await store.organizations.list();
      const visible = await Promise.all(
        organizations.map((organization) =>
          authorization.check(
            user_id,
            "can_view_member",
            "organization",
            organization.id,
          ),
        ),
      );
      return organizations
        .filter((_, i) => visible[i])
        .map(organizationResponse);
    })

    .get("/:id", async ({ params, query }) => {
      const { user_id } = parseInput(callerQuery, query);
      await requireAccess(
        authorization,
        user_id,
        "can_view_member",
        "organization",
        params.id,
        "Not a member of this organization",
      );
      const organization = await found(
        store.organizations.findById(params.id),
        "Organization",
      );
      return organizationResponse(organization);
    })

    .post("/", async ({ query, body }) => {
      const { user_id } = parseInput(callerQuery, query);
      const input = parseInput(organizationCreate, body);

      const organization = await store.organizations.insert({
        name: input.name,
        description: input.description ?? null,
      });

      // The creator administers the organization; without that tuple nobody
      // could reach it, so the record is rolled back
      if (!(await authorization.assign(user_id, "admin", organization.id))) {
        await store.organizations.delete(organization.id);
        throw new DependencyFailureError(
          "Failed to assign organization admin",
        );
      }

      log.info(
        { organizationId: organization.id, userId: user_id },
        "Organization created",
      );
      return organizationResponse(organization);
    })

    .put("/:id", async ({ params, query, body }) => {
      const { user_id } = parseInput(callerQuery, query);
      const patch = parseInput(organizationUpdate, body);
      await requireAccess(
        authorization,
        user_id,
        "can_add_member",
        "organization",
        params.id,
        "Admin access required",
      );
      const organization = await found(
        store.organizations.update(params.id, patch),
        "Organization",
      );
      return organizationResponse(organization);
    })

    .delete("/:id", async ({ params, query }) => {
      const { user_id } = parseInput(callerQuery, query);
      await requireAccess(
        authorization,
        user_id,
        "can_delete_member",
        "organization",
        params.id,
        "Admin access required",
      );
      await found(store.organizations.findById(params.id), "Organization");

      const owned = await store.resources.listByOrganization(params.id);
      await store.organizations.delete(params.id);
      await removeDependents(params.id, owned);

      log.info(
        { organizationId: params.id, resources: owned.length },
        "Organization deleted",
      );
      return { message: "Organization deleted successfully" };
    })

    .post("/:id/members", async ({ params, query, body }) => {
      const { user_id } = parseInput(callerQuery, query);
      const member = parseInput(memberAssignment, body);
      if (
        member.organization_id !== undefined &&
        member.organization_id !== params.id
      ) {
        throw new ValidationError(
          "organization_id does not match the organization in the path",
        );
      }
      await requireAccess(
        authorization,
        user_id,
        "can_add_member",
        "organization",
        params.id,
        "Admin access required",
      );
      await found(store.organizations.findById(params.id), "Organization");

      const assigned = await authorization.assign(
        member.user_id,
        member.role,
        params.id,
      );
      if (!assigned) throw new DependencyFailureError("Failed to add member");
      return {
        message: `User ${member.user_id} added as ${member.role}`,
      };
    })

    .delete("/:id/members/:memberUserId", async ({ params, query }) => {
      const { user_id, role } = parseInput(memberRemovalQuery, query);
      const { id, memberUserId } = parseInput(memberPath, params);
      await requireAccess(
        authorization,
        user_id,
        "can_delete_member",
        "organization",
        id,
        "Admin access required",
      );
      await found(store.organizations.findById(id), "Organization");

      if (!(await authorization.unassign(memberUserId, role, id))) {
        throw new DependencyFailureError("Failed to remove member");
      }
      return { message: `User ${memberUserId} removed from ${role}` };
    });
}
