import type {
  Organization,
  Permission,
  ProjectManager,
  Resource,
  Role,
} from "src/store/interface.ts";

// Response bodies use the snake_case field names clients send

function timestamps(record: { createdAt: Date; updatedAt: Date }) {
  return {
    created_at: record.createdAt.toISOString(),
    updated_at: record.updatedAt.toISOString(),
  };
}

export function organizationResponse(organization: Organization) {
  return {
    id: organization.id,
    name: organization.name,
    description: organization.description,
    ...timestamps(organization),
  };
}

export function resourceResponse(resource: Resource) {
  return {
    id: resource.id,
    name: resource.name,
    description: resource.description,
    resource_type: resource.resourceType,
    organization_id: resource.organizationId,
    ...timestamps(resource),
  };
}

export function roleResponse(role: Role) {
  return {
    id: role.id,
    name: role.name,
    description: role.description,
    permissions: role.permissions,
    ...timestamps(role),
  };
}

export function permissionResponse(permission: Permission) {
  return {
    id: permission.id,
    name: permission.name,
    description: permission.description,
    resource_type: permission.resourceType,
    ...timestamps(permission),
  };
}

export function projectManagerResponse(projectManager: ProjectManager) {
  return {
    id: projectManager.id,
    user_id: projectManager.userId,
    name: projectManager.name,
    email: projectManager.email,
    ...timestamps(projectManager),
  };
}
