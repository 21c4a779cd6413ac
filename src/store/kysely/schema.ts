import type { ColumnType, Generated } from "kysely";

/** Timestamps default to now() on insert and are set explicitly on update */
export type Timestamp = ColumnType<Date, Date | undefined, Date>;

export interface OrganizationsTable {
  id: Generated<string>;
  name: string;
  description: string | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface ResourcesTable {
  id: Generated<string>;
  name: string;
  description: string | null;
  resource_type: string;
  organization_id: string;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface RolesTable {
  id: Generated<string>;
  name: string;
  description: string | null;
  permissions: string[];
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface PermissionsTable {
  id: Generated<string>;
  name: string;
  description: string | null;
  resource_type: string;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface ProjectManagersTable {
  id: Generated<string>;
  user_id: string;
  name: string;
  email: string;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface DB {
  "app.organizations": OrganizationsTable;
  "app.resources": ResourcesTable;
  "app.roles": RolesTable;
  "app.permissions": PermissionsTable;
  "app.project_managers": ProjectManagersTable;
}
