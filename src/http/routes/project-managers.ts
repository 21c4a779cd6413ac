import { Elysia } from "elysia";
import {
  AuthorizationDeniedError,
  DependencyFailureError,
} from "src/core/errors.ts";
import { PROJECT_MANAGER_ROLES } from "src/core/types.ts";
import {
  type AppDependencies,
  found,
  requireAccess,
} from "src/http/context.ts";
import { projectManagerResponse } from "src/http/serializers.ts";
import {
  callerQuery,
  parseInput,
  projectManagerAssignment,
  projectManagerCreate,
  projectManagerListQuery,
  projectManagerRemovalQuery,
  projectManagerUnassignPath,
  projectManagerUpdate,
} from "src/http/validation.ts";
import type { ProjectManager } from "src/store/interface.ts";

export function projectManagerRoutes({
  store,
  authorization,
  logger,
}: AppDependencies) {
  const log = logger.child({ component: "project-managers" });

  /** Profiles whose user holds a project manager role in the organization */
  async function assignedTo(
    organizationId: string,
    profiles: ProjectManager[],
  ): Promise<ProjectManager[]> {
    const held = await Promise.all(
      profiles.map(async (profile) => {
        const roles = await authorization.checkAll(
          profile.userId,
          PROJECT_MANAGER_ROLES,
          "organization",
          organizationId,
        );
        return [...roles.values()].some(Boolean);
      }),
    );
    return profiles.filter((_, i) => held[i]);
  }

  return new Elysia({ prefix: "/project-managers" })
    .get("/", async ({ query }) => {
      const { user_id, organization_id } = parseInput(
        projectManagerListQuery,
        query,
      );
      const profiles = await store.projectManagers.list();
      if (organization_id === undefined) {
        return profiles.map(projectManagerResponse);
      }

      await requireAccess(
        authorization,
        user_id,
        "can_view_member",
        "organization",
        organization_id,
        "No access to this organization",
      );
      const assigned = await assignedTo(organization_id, profiles);
      return assigned.map(projectManagerResponse);
    })

    .get("/:id", async ({ params, query }) => {
      parseInput(callerQuery, query);
      const profile = await found(
        store.projectManagers.findById(params.id),
        "Project manager",
      );
      return projectManagerResponse(profile);
    })

    .post("/", async ({ query, body }) => {
      parseInput(callerQuery, query);
      const input = parseInput(projectManagerCreate, body);
      const profile = await store.projectManagers.insert({
        userId: input.user_id,
        name: input.name,
        email: input.email,
      });
      return projectManagerResponse(profile);
    })

    .put("/:id", async ({ params, query, body }) => {
      const { user_id } = parseInput(callerQuery, query);
      const patch = parseInput(projectManagerUpdate, body);
      const profile = await found(
        store.projectManagers.findById(params.id),
        "Project manager",
      );
      if (profile.userId !== user_id) {
        throw new AuthorizationDeniedError("Can only update your own profile");
      }
      const updated = await found(
        store.projectManagers.update(profile.id, patch),
        "Project manager",
      );
      return projectManagerResponse(updated);
    })

    .post("/:id/assign", async ({ params, query, body }) => {
      const { user_id } = parseInput(callerQuery, query);
      const assignment = parseInput(projectManagerAssignment, body);
      await requireAccess(
        authorization,
        user_id,
        "can_manage_projects",
        "organization",
        assignment.organization_id,
        "Project management access required",
      );
      const profile = await found(
        store.projectManagers.findById(params.id),
        "Project manager",
      );

      const assigned = await authorization.assign(
        profile.userId,
        assignment.role,
        assignment.organization_id,
      );
      if (!assigned) {
        throw new DependencyFailureError("Failed to assign project manager");
      }
      log.info(
        {
          projectManagerId: profile.id,
          organizationId: assignment.organization_id,
          role: assignment.role,
        },
        "Project manager assigned",
      );
      return { message: `Project manager assigned as ${assignment.role}` };
    })

    .delete("/:id/assign/:organizationId", async ({ params, query }) => {
      const { user_id, role } = parseInput(projectManagerRemovalQuery, query);
      const { id, organizationId } = parseInput(
        projectManagerUnassignPath,
        params,
      );
      await requireAccess(
        authorization,
        user_id,
        "can_manage_projects",
        "organization",
        organizationId,
        "Project management access required",
      );
      const profile = await found(
        store.projectManagers.findById(id),
        "Project manager",
      );

      const removed = await authorization.unassign(
        profile.userId,
        role,
        organizationId,
      );
      if (!removed) {
        throw new DependencyFailureError("Failed to remove project manager");
      }
      return { message: `Project manager removed from ${role} role` };
    });
}
