import { z } from "zod";
import { ValidationError } from "src/core/errors.ts";
import {
  MEMBER_ROLES,
  OBJECT_TYPES,
  ORGANIZATION_ROLES,
  PROJECT_MANAGER_ROLES,
} from "src/core/types.ts";

/** Closed string set; the message lists what is accepted */
function oneOf<T extends readonly [string, ...string[]]>(values: T) {
  return z.enum(values, {
    errorMap: () => ({ message: `must be one of: ${values.join(", ")}` }),
  });
}

const id = z.string().trim().min(1);
const name = z.string().trim().min(1);
const description = z.string().nullable().optional();

export const callerQuery = z.object({ user_id: id });

export const memberPath = z.object({ id, memberUserId: id });

export const subjectPath = z.object({ subjectId: id });

export const projectManagerUnassignPath = z.object({
  id,
  organizationId: id,
});

export const organizationCreate = z.object({ name, description });

export const organizationUpdate = z.object({
  name: name.optional(),
  description,
});

export const memberAssignment = z.object({
  user_id: id,
  role: oneOf(MEMBER_ROLES),
  organization_id: id.optional(),
});

export const memberRemovalQuery = callerQuery.extend({
  role: oneOf(MEMBER_ROLES),
});

export const resourceListQuery = callerQuery.extend({
  organization_id: id.optional(),
});

export const resourceCreate = z.object({
  name,
  description,
  resource_type: name,
  organization_id: id,
});

export const resourceUpdate = z.object({
  name: name.optional(),
  description,
  resource_type: name.optional(),
});

export const roleCreate = z.object({
  name,
  description,
  permissions: z.array(name).default([]),
});

export const roleUpdate = z.object({
  name: name.optional(),
  description,
  permissions: z.array(name).optional(),
});

export const roleAssignment = z.object({
  user_id: id,
  role: oneOf(ORGANIZATION_ROLES),
  organization_id: id,
});

export const roleRemovalQuery = callerQuery.extend({
  subject_id: id,
  role: oneOf(ORGANIZATION_ROLES),
  organization_id: id,
});

export const permissionCreate = z.object({
  name,
  description,
  resource_type: name,
});

export const permissionUpdate = z.object({
  name: name.optional(),
  description,
  resource_type: name.optional(),
});

export const permissionCheck = z.object({
  user_id: id,
  permission: name,
  resource_id: id,
  resource_type: oneOf(OBJECT_TYPES).default("organization"),
});

export const userPermissionsQuery = callerQuery.extend({
  organization_id: id,
});

export const projectManagerListQuery = callerQuery.extend({
  organization_id: id.optional(),
});

export const projectManagerCreate = z.object({
  user_id: id,
  name,
  email: z.string().trim().email(),
});

export const projectManagerUpdate = z.object({
  name: name.optional(),
  email: z.string().trim().email().optional(),
});

export const projectManagerAssignment = z.object({
  organization_id: id,
  role: oneOf(PROJECT_MANAGER_ROLES),
});

export const projectManagerRemovalQuery = callerQuery.extend({
  role: oneOf(PROJECT_MANAGER_ROLES),
});

/** Parse request input or throw a ValidationError naming each bad field */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues
        .map((issue) =>
          issue.path.length > 0
            ? `${issue.path.join(".")}: ${issue.message}`
            : issue.message,
        )
        .join("; "),
    );
  }
  return result.data;
}
