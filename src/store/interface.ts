export interface Organization {
  id: string;
  name: string;
  description: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Resource {
  id: string;
  name: string;
  description: string | null;
  resourceType: string;
  organizationId: string;
  createdAt: Date;
  updatedAt: Date;
}

/** Catalog entry naming a bundle of permissions; carries no grants */
export interface Role {
  id: string;
  name: string;
  description: string | null;
  permissions: string[];
  createdAt: Date;
  updatedAt: Date;
}

/** Catalog entry describing a permission on a resource type */
export interface Permission {
  id: string;
  name: string;
  description: string | null;
  resourceType: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface ProjectManager {
  id: string;
  userId: string;
  name: string;
  email: string;
  createdAt: Date;
  updatedAt: Date;
}

type Generated = "id" | "createdAt" | "updatedAt";

export type NewOrganization = Omit<Organization, Generated>;
export type OrganizationPatch = Partial<NewOrganization>;

export type NewResource = Omit<Resource, Generated>;
/** Ownership is fixed at creation */
export type ResourcePatch = Partial<Omit<NewResource, "organizationId">>;

export type NewRole = Omit<Role, Generated>;
export type RolePatch = Partial<NewRole>;

export type NewPermission = Omit<Permission, Generated>;
export type PermissionPatch = Partial<NewPermission>;

export type NewProjectManager = Omit<ProjectManager, Generated>;
export type ProjectManagerPatch = Partial<Omit<NewProjectManager, "userId">>;

/**
 * Attribute storage for one entity type. Patches overwrite only the keys
 * they carry; ids and timestamps are assigned by the store.
 */
export interface Repository<TRecord, TNew, TPatch> {
  /** All records in insertion order */
  list(): Promise<TRecord[]>;

  findById(id: string): Promise<TRecord | null>;

  insert(input: TNew): Promise<TRecord>;

  /** Returns null when no record has this id */
  update(id: string, patch: TPatch): Promise<TRecord | null>;

  /** Returns false when no record has this id */
  delete(id: string): Promise<boolean>;
}

export interface ResourceRepository
  extends Repository<Resource, NewResource, ResourcePatch> {
  listByOrganization(organizationId: string): Promise<Resource[]>;
}

export interface EntityStore {
  organizations: Repository<Organization, NewOrganization, OrganizationPatch>;
  resources: ResourceRepository;
  roles: Repository<Role, NewRole, RolePatch>;
  permissions: Repository<Permission, NewPermission, PermissionPatch>;
  projectManagers: Repository<
    ProjectManager,
    NewProjectManager,
    ProjectManagerPatch
  >;

  /** Release connections */
  destroy(): Promise<void>;
}
