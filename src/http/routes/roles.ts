import { Elysia } from "elysia";
import { DependencyFailureError } from "src/core/errors.ts";
import {
  type AppDependencies,
  found,
  requireAccess,
} from "src/http/context.ts";
import { roleResponse } from "src/http/serializers.ts";
import {
  callerQuery,
  parseInput,
  roleAssignment,
  roleCreate,
  roleRemovalQuery,
  roleUpdate,
} from "src/http/validation.ts";

/**
 * Role catalog plus direct role grants. Catalog entries are descriptive only;
 * what a role can do is decided by the authorization model.
 */
export function roleRoutes({ store, authorization }: AppDependencies) {
  return new Elysia({ prefix: "/roles" })
    .get("/", async ({ query }) => {
      parseInput(callerQuery, query);
      const roles = await store.roles.list();
      return roles.map(roleResponse);
    })

    .get("/:id", async ({ params, query }) => {
      parseInput(callerQuery, query);
      const role = await found(store.roles.findById(params.id), "Role");
      return roleResponse(role);
    })

    .post("/", async ({ query, body }) => {
      parseInput(callerQuery, query);
      const input = parseInput(roleCreate, body);
      const role = await store.roles.insert({
        name: input.name,
        description: input.description ?? null,
        permissions: input.permissions,
      });
      return roleResponse(role);
    })

    .put("/:id", async ({ params, query, body }) => {
      parseInput(callerQuery, query);
      const patch = parseInput(roleUpdate, body);
      const role = await found(store.roles.update(params.id, patch), "Role");
      return roleResponse(role);
    })

    .post("/assign", async ({ query, body }) => {
      const { user_id } = parseInput(callerQuery, query);
      const grant = parseInput(roleAssignment, body);
      await requireAccess(
        authorization,
        user_id,
        "can_add_member",
        "organization",
        grant.organization_id,
        "Admin access required",
      );
      const assigned = await authorization.assign(
        grant.user_id,
        grant.role,
        grant.organization_id,
      );
      if (!assigned) throw new DependencyFailureError("Failed to assign role");
      return {
        message: `Role ${grant.role} assigned to user ${grant.user_id}`,
      };
    })

    .delete("/assign", async ({ query }) => {
      const { user_id, subject_id, role, organization_id } = parseInput(
        roleRemovalQuery,
        query,
      );
      await requireAccess(
        authorization,
        user_id,
        "can_delete_member",
        "organization",
        organization_id,
        "Admin access required",
      );
      if (!(await authorization.unassign(subject_id, role, organization_id))) {
        throw new DependencyFailureError("Failed to remove role");
      }
      return { message: `Role ${role} removed from user ${subject_id}` };
    });
}
