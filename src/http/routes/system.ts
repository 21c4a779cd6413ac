import { Elysia } from "elysia";
import { ORGANIZATION_ROLES } from "src/core/types.ts";
import type { AppDependencies } from "src/http/context.ts";

const RBAC_INFO = {
  model: "Relationship-based access control over organizations",
  pattern: "Coarse-grained roles, resource permissions inherited by owner",
  types: {
    user: "Individual users in the system",
    organization: "Groups that contain users with roles",
    resource: "Assets owned by organizations",
  },
  roles: {
    admin: {
      description: "Full control over organization and its resources",
      permissions: [
        "can_view_member",
        "can_add_member",
        "can_delete_member",
        "can_add_resource",
        "can_manage_projects",
        "can_view_resource",
        "can_delete_resource",
      ],
    },
    member: {
      description: "Basic access to organization and resources",
      permissions: ["can_view_member", "can_add_resource", "can_view_resource"],
    },
    project_manager: {
      description: "Views members and the organization's resources",
      permissions: ["can_view_member", "can_view_resource"],
    },
    senior_project_manager: {
      description: "Project manager who also creates resources",
      permissions: [
        "can_view_member",
        "can_add_resource",
        "can_manage_projects",
        "can_view_resource",
      ],
    },
  },
  inheritance:
    "Resources inherit admin, member and project_manager from the organization they belong to",
} as const;

export function systemRoutes({ authorization, info }: AppDependencies) {
  return new Elysia()
    .get("/", () => ({
      message: `Welcome to the ${info.title}`,
      version: info.version,
      model: RBAC_INFO.model,
      roles: ORGANIZATION_ROLES,
    }))

    .get("/health", async () => {
      const connected = await authorization.health();
      return {
        status: "healthy",
        version: info.version,
        fga: connected ? "connected" : "disconnected",
      };
    })

    .get("/rbac-info", () => RBAC_INFO);
}
