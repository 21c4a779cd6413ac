import { Elysia } from "elysia";
import { ValidationError } from "src/core/errors.ts";
import {
  isRelationOf,
  type ObjectType,
  RELATIONS_BY_TYPE,
  type RelationOf,
} from "src/core/types.ts";
import {
  type AppDependencies,
  found,
  requireAccess,
} from "src/http/context.ts";
import { permissionResponse } from "src/http/serializers.ts";
import {
  callerQuery,
  parseInput,
  permissionCheck,
  permissionCreate,
  permissionUpdate,
  subjectPath,
  userPermissionsQuery,
} from "src/http/validation.ts";
import type { PermissionPatch } from "src/store/interface.ts";

/** Relation a caller needs to inspect someone else's access to an object */
const INSPECT_RELATION: { [T in ObjectType]: RelationOf<T> } = {
  organization: "can_add_member",
  resource: "can_delete_resource",
};

const SELF_OR_ADMIN =
  "Can only check your own permissions without admin access";

export function permissionRoutes({ store, authorization }: AppDependencies) {
  async function requireInspect<T extends ObjectType>(
    caller: string,
    subject: string,
    objectType: T,
    objectId: string,
  ): Promise<void> {
    if (caller === subject) return;
    await requireAccess(
      authorization,
      caller,
      INSPECT_RELATION[objectType],
      objectType,
      objectId,
      SELF_OR_ADMIN,
    );
  }

  async function checkRelation<T extends ObjectType>(
    caller: string,
    subject: string,
    permission: string,
    objectType: T,
    objectId: string,
  ): Promise<boolean> {
    if (!isRelationOf(objectType, permission)) {
      const accepted = RELATIONS_BY_TYPE[objectType].join(", ");
      throw new ValidationError(`permission: must be one of: ${accepted}`);
    }
    await requireInspect(caller, subject, objectType, objectId);
    return authorization.check(subject, permission, objectType, objectId);
  }

  return new Elysia({ prefix: "/permissions" })
    .get("/", async ({ query }) => {
      parseInput(callerQuery, query);
      const permissions = await store.permissions.list();
      return permissions.map(permissionResponse);
    })

    .get("/:id", async ({ params, query }) => {
      parseInput(callerQuery, query);
      const permission = await found(
        store.permissions.findById(params.id),
        "Permission",
      );
      return permissionResponse(permission);
    })

    .post("/", async ({ query, body }) => {
      parseInput(callerQuery, query);
      const input = parseInput(permissionCreate, body);
      const permission = await store.permissions.insert({
        name: input.name,
        description: input.description ?? null,
        resourceType: input.resource_type,
      });
      return permissionResponse(permission);
    })

    .put("/:id", async ({ params, query, body }) => {
      parseInput(callerQuery, query);
      const input = parseInput(permissionUpdate, body);

      const patch: PermissionPatch = {};
      if (input.name !== undefined) patch.name = input.name;
      if (input.description !== undefined) {
        patch.description = input.description;
      }
      if (input.resource_type !== undefined) {
        patch.resourceType = input.resource_type;
      }

      const permission = await found(
        store.permissions.update(params.id, patch),
        "Permission",
      );
      return permissionResponse(permission);
    })

    .post("/check", async ({ query, body }) => {
      const { user_id } = parseInput(callerQuery, query);
      const request = parseInput(permissionCheck, body);
      const allowed = await checkRelation(
        user_id,
        request.user_id,
        request.permission,
        request.resource_type,
        request.resource_id,
      );
      return {
        user_id: request.user_id,
        permission: request.permission,
        resource_id: request.resource_id,
        resource_type: request.resource_type,
        allowed,
      };
    })

    .get("/user/:subjectId/permissions", async ({ params, query }) => {
      const { user_id, organization_id } = parseInput(
        userPermissionsQuery,
        query,
      );
      const { subjectId } = parseInput(subjectPath, params);
      await requireInspect(user_id, subjectId, "organization", organization_id);
      const results = await authorization.checkAll(
        subjectId,
        RELATIONS_BY_TYPE.organization,
        "organization",
        organization_id,
      );
      return {
        user_id: subjectId,
        organization_id,
        permissions: Object.fromEntries(results),
      };
    });
}
