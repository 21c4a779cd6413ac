import { Elysia } from "elysia";
import { DependencyFailureError } from "src/core/errors.ts";
import {
  type AppDependencies,
  found,
  requireAccess,
} from "src/http/context.ts";
import { resourceResponse } from "src/http/serializers.ts";
import {
  callerQuery,
  parseInput,
  resourceCreate,
  resourceListQuery,
  resourceUpdate,
} from "src/http/validation.ts";
import type { ResourcePatch } from "src/store/interface.ts";

export function resourceRoutes({
  store,
  authorization,
  logger,
}: AppDependencies) {
  const log = logger.child({ component: "resources" });

  return new Elysia({ prefix: "/resources" })
    .get("/", async ({ query }) => {
      const { user_id, organization_id } = parseInput(
        resourceListQuery,
        query,
      );
      const visible = await authorization.listAccessibleObjects(
        user_id,
        "can_view_resource",
        "resource",
      );
      const resources = organization_id
        ? await store.resources.listByOrganization(organization_id)
        : await store.resources.list();
      return resources
        .filter((resource) => visible.has(resource.id))
        .map(resourceResponse);
    })

    .get("/:id", async ({ params, query }) => {
      const { user_id } = parseInput(callerQuery, query);
      await requireAccess(
        authorization,
        user_id,
        "can_view_resource",
        "resource",
        params.id,
        "No access to this resource",
      );
      const resource = await found(
        store.resources.findById(params.id),
        "Resource",
      );
      return resourceResponse(resource);
    })

    .post("/", async ({ query, body }) => {
      const { user_id } = parseInput(callerQuery, query);
      const input = parseInput(resourceCreate, body);
      await requireAccess(
        authorization,
        user_id,
        "can_add_resource",
        "organization",
        input.organization_id,
        "Cannot add resources to this organization",
      );

      const resource = await store.resources.insert({
        name: input.name,
        description: input.description ?? null,
        resourceType: input.resource_type,
        organizationId: input.organization_id,
      });

      const linked = await authorization.linkResourceToOrganization(
        resource.id,
        resource.organizationId,
      );
      if (!linked) {
        await store.resources.delete(resource.id);
        throw new DependencyFailureError(
          "Failed to link resource to organization",
        );
      }

      log.info(
        {
          resourceId: resource.id,
          organizationId: resource.organizationId,
          userId: user_id,
        },
        "Resource created",
      );
      return resourceResponse(resource);
    })

    .put("/:id", async ({ params, query, body }) => {
      const { user_id } = parseInput(callerQuery, query);
      const input = parseInput(resourceUpdate, body);
      await requireAccess(
        authorization,
        user_id,
        "can_delete_resource",
        "resource",
        params.id,
        "Admin access required",
      );

      const patch: ResourcePatch = {};
      if (input.name !== undefined) patch.name = input.name;
      if (input.description !== undefined) {
        patch.description = input.description;
      }
      if (input.resource_type !== undefined) {
        patch.resourceType = input.resource_type;
      }

      const resource = await found(
        store.resources.update(params.id, patch),
        "Resource",
      );
      return resourceResponse(resource);
    })

    .delete("/:id", async ({ params, query }) => {
      const { user_id } = parseInput(callerQuery, query);
      await requireAccess(
        authorization,
        user_id,
        "can_delete_resource",
        "resource",
        params.id,
        "Admin access required",
      );
      const resource = await found(
        store.resources.findById(params.id),
        "Resource",
      );

      await store.resources.delete(resource.id);
      const unlinked = await authorization.unlinkResourceFromOrganization(
        resource.id,
        resource.organizationId,
      );
      if (!unlinked) {
        log.warn(
          { resourceId: resource.id, organizationId: resource.organizationId },
          "Deleted resource is still linked to its organization",
        );
      }
      return { message: "Resource deleted successfully" };
    })

    .get("/:id/permissions", async ({ params, query }) => {
      const { user_id } = parseInput(callerQuery, query);
      const resource = await found(
        store.resources.findById(params.id),
        "Resource",
      );
      const results = await authorization.checkAll(
        user_id,
        ["can_view_resource", "can_delete_resource"],
        "resource",
        resource.id,
      );
      return {
        resource_id: resource.id,
        user_id,
        permissions: {
          can_view: results.get("can_view_resource") === true,
          can_delete: results.get("can_delete_resource") === true,
        },
      };
    });
}
