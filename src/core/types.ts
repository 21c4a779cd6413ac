/** Object types the authorization model defines relations on */
export const OBJECT_TYPES = ["organization", "resource"] as const;
export type ObjectType = (typeof OBJECT_TYPES)[number];

/** Subject type for every caller-supplied identity */
export const SUBJECT_TYPE = "user";

/** Roles a caller can grant through the membership endpoints */
export const MEMBER_ROLES = ["admin", "member"] as const;
export type MemberRole = (typeof MEMBER_ROLES)[number];

export const PROJECT_MANAGER_ROLES = [
  "project_manager",
  "senior_project_manager",
] as const;
export type ProjectManagerRole = (typeof PROJECT_MANAGER_ROLES)[number];

/** Every directly assignable user → organization relation */
export const ORGANIZATION_ROLES = [
  ...MEMBER_ROLES,
  ...PROJECT_MANAGER_ROLES,
] as const;
export type OrganizationRole = (typeof ORGANIZATION_ROLES)[number];

export const ORGANIZATION_PERMISSIONS = [
  "can_view_member",
  "can_add_member",
  "can_delete_member",
  "can_add_resource",
  "can_manage_projects",
] as const;
export type OrganizationPermission = (typeof ORGANIZATION_PERMISSIONS)[number];

export const RESOURCE_PERMISSIONS = [
  "can_view_resource",
  "can_delete_resource",
] as const;
export type ResourcePermission = (typeof RESOURCE_PERMISSIONS)[number];

/** Roles a resource inherits from its owning organization */
export const RESOURCE_ROLES = ["admin", "member", "project_manager"] as const;
export type ResourceRole = (typeof RESOURCE_ROLES)[number];

/** Relation linking a resource to the organization that owns it */
export const OWNER_RELATION = "organization";

/** Relations that may be checked on each object type */
export interface RelationsByType {
  organization: OrganizationRole | OrganizationPermission;
  resource: ResourceRole | ResourcePermission;
}

export type RelationOf<T extends ObjectType> = RelationsByType[T];

export const RELATIONS_BY_TYPE: {
  [T in ObjectType]: readonly RelationOf<T>[];
} = {
  organization: [...ORGANIZATION_ROLES, ...ORGANIZATION_PERMISSIONS],
  resource: [...RESOURCE_ROLES, ...RESOURCE_PERMISSIONS],
};

/** A relationship tuple in wire form: `user` and `object` are `type:id` refs */
export interface RelationshipTuple {
  user: string;
  relation: string;
  object: string;
}

export function isRelationOf<T extends ObjectType>(
  objectType: T,
  value: string,
): value is RelationOf<T> {
  return RELATIONS_BY_TYPE[objectType].some((relation) => relation === value);
}
