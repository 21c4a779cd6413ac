import { type Kysely, type Selectable, sql } from "kysely";
import type {
  EntityStore,
  NewOrganization,
  NewPermission,
  NewProjectManager,
  NewResource,
  NewRole,
  Organization,
  OrganizationPatch,
  Permission,
  PermissionPatch,
  ProjectManager,
  ProjectManagerPatch,
  Repository,
  Resource,
  ResourcePatch,
  ResourceRepository,
  Role,
  RolePatch,
} from "src/store/interface.ts";
import type {
  DB,
  OrganizationsTable,
  PermissionsTable,
  ProjectManagersTable,
  ResourcesTable,
  RolesTable,
} from "src/store/kysely/schema.ts";

function deleted(result: { numDeletedRows: bigint }): boolean {
  return BigInt(result.numDeletedRows) > 0n;
}

class KyselyOrganizationRepository
  implements Repository<Organization, NewOrganization, OrganizationPatch>
{
  constructor(private db: Kysely<DB>) {}

  async list(): Promise<Organization[]> {
    const rows = await this.db
      .selectFrom("app.organizations")
      .selectAll()
      .orderBy("created_at")
      .orderBy("id")
      .execute();
    return rows.map((r) => this.rowToOrganization(r));
  }

  async findById(id: string): Promise<Organization | null> {
    const row = await this.db
      .selectFrom("app.organizations")
      .selectAll()
      .where("id", "=", id)
      .executeTakeFirst();
    return row ? this.rowToOrganization(row) : null;
  }

  async insert(input: NewOrganization): Promise<Organization> {
    const row = await this.db
      .insertInto("app.organizations")
      .values({ name: input.name, description: input.description })
      .returningAll()
      .executeTakeFirstOrThrow();
    return this.rowToOrganization(row);
  }

  async update(
    id: string,
    patch: OrganizationPatch,
  ): Promise<Organization | null> {
    const row = await this.db
      .updateTable("app.organizations")
      .set({
        name: patch.name,
        description: patch.description,
        updated_at: sql<Date>`now()`,
      })
      .where("id", "=", id)
      .returningAll()
      .executeTakeFirst();
    return row ? this.rowToOrganization(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db
      .deleteFrom("app.organizations")
      .where("id", "=", id)
      .executeTakeFirst();
    return deleted(result);
  }

  private rowToOrganization(
    row: Selectable<OrganizationsTable>,
  ): Organization {
    return {
      id: row.id,
      name: row.name,
      description: row.description,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

class KyselyResourceRepository implements ResourceRepository {
  constructor(private db: Kysely<DB>) {}

  async list(): Promise<Resource[]> {
    const rows = await this.db
      .selectFrom("app.resources")
      .selectAll()
      .orderBy("created_at")
      .orderBy("id")
      .execute();
    return rows.map((r) => this.rowToResource(r));
  }

  async listByOrganization(organizationId: string): Promise<Resource[]> {
    const rows = await this.db
      .selectFrom("app.resources")
      .selectAll()
      .where("organization_id", "=", organizationId)
      .orderBy("created_at")
      .orderBy("id")
      .execute();
    return rows.map((r) => this.rowToResource(r));
  }

  async findById(id: string): Promise<Resource | null> {
    const row = await this.db
      .selectFrom("app.resources")
      .selectAll()
      .where("id", "=", id)
      .executeTakeFirst();
    return row ? this.rowToResource(row) : null;
  }

  async insert(input: NewResource): Promise<Resource> {
    const row = await this.db
      .insertInto("app.resources")
      .values({
        name: input.name,
        description: input.description,
        resource_type: input.resourceType,
        organization_id: input.organizationId,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return this.rowToResource(row);
  }

  async update(id: string, patch: ResourcePatch): Promise<Resource | null> {
    const row = await this.db
      .updateTable("app.resources")
      .set({
        name: patch.name,
        description: patch.description,
        resource_type: patch.resourceType,
        updated_at: sql<Date>`now()`,
      })
      .where("id", "=", id)
      .returningAll()
      .executeTakeFirst();
    return row ? this.rowToResource(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db
      .deleteFrom("app.resources")
      .where("id", "=", id)
      .executeTakeFirst();
    return deleted(result);
  }

  private rowToResource(row: Selectable<ResourcesTable>): Resource {
    return {
      id: row.id,
      name: row.name,
      description: row.description,
      resourceType: row.resource_type,
      organizationId: row.organization_id,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

class KyselyRoleRepository implements Repository<Role, NewRole, RolePatch> {
  constructor(private db: Kysely<DB>) {}

  async list(): Promise<Role[]> {
    const rows = await this.db
      .selectFrom("app.roles")
      .selectAll()
      .orderBy("created_at")
      .orderBy("id")
      .execute();
    return rows.map((r) => this.rowToRole(r));
  }

  async findById(id: string): Promise<Role | null> {
    const row = await this.db
      .selectFrom("app.roles")
      .selectAll()
      .where("id", "=", id)
      .executeTakeFirst();
    return row ? this.rowToRole(row) : null;
  }

  async insert(input: NewRole): Promise<Role> {
    const row = await this.db
      .insertInto("app.roles")
      .values({
        name: input.name,
        description: input.description,
        permissions: input.permissions,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return this.rowToRole(row);
  }

  async update(id: string, patch: RolePatch): Promise<Role | null> {
    const row = await this.db
      .updateTable("app.roles")
      .set({
        name: patch.name,
        description: patch.description,
        permissions: patch.permissions,
        updated_at: sql<Date>`now()`,
      })
      .where("id", "=", id)
      .returningAll()
      .executeTakeFirst();
    return row ? this.rowToRole(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db
      .deleteFrom("app.roles")
      .where("id", "=", id)
      .executeTakeFirst();
    return deleted(result);
  }

  private rowToRole(row: Selectable<RolesTable>): Role {
    return {
      id: row.id,
      name: row.name,
      description: row.description,
      permissions: row.permissions,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

class KyselyPermissionRepository
  implements Repository<Permission, NewPermission, PermissionPatch>
{
  constructor(private db: Kysely<DB>) {}

  async list(): Promise<Permission[]> {
    const rows = await this.db
      .selectFrom("app.permissions")
      .selectAll()
      .orderBy("created_at")
      .orderBy("id")
      .execute();
    return rows.map((r) => this.rowToPermission(r));
  }

  async findById(id: string): Promise<Permission | null> {
    const row = await this.db
      .selectFrom("app.permissions")
      .selectAll()
      .where("id", "=", id)
      .executeTakeFirst();
    return row ? this.rowToPermission(row) : null;
  }

  async insert(input: NewPermission): Promise<Permission> {
    const row = await this.db
      .insertInto("app.permissions")
      .values({
        name: input.name,
        description: input.description,
        resource_type: input.resourceType,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return this.rowToPermission(row);
  }

  async update(
    id: string,
    patch: PermissionPatch,
  ): Promise<Permission | null> {
    const row = await this.db
      .updateTable("app.permissions")
      .set({
        name: patch.name,
        description: patch.description,
        resource_type: patch.resourceType,
        updated_at: sql<Date>`now()`,
      })
      .where("id", "=", id)
      .returningAll()
      .executeTakeFirst();
    return row ? this.rowToPermission(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db
      .deleteFrom("app.permissions")
      .where("id", "=", id)
      .executeTakeFirst();
    return deleted(result);
  }

  private rowToPermission(row: Selectable<PermissionsTable>): Permission {
    return {
      id: row.id,
      name: row.name,
      description: row.description,
      resourceType: row.resource_type,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

class KyselyProjectManagerRepository
  implements Repository<ProjectManager, NewProjectManager, ProjectManagerPatch>
{
  constructor(private db: Kysely<DB>) {}

  async list(): Promise<ProjectManager[]> {
    const rows = await this.db
      .selectFrom("app.project_managers")
      .selectAll()
      .orderBy("created_at")
      .orderBy("id")
      .execute();
    return rows.map((r) => this.rowToProjectManager(r));
  }

  async findById(id: string): Promise<ProjectManager | null> {
    const row = await this.db
      .selectFrom("app.project_managers")
      .selectAll()
      .where("id", "=", id)
      .executeTakeFirst();
    return row ? this.rowToProjectManager(row) : null;
  }

  async insert(input: NewProjectManager): Promise<ProjectManager> {
    const row = await this.db
      .insertInto("app.project_managers")
      .values({ user_id: input.userId, name: input.name, email: input.email })
      .returningAll()
      .executeTakeFirstOrThrow();
    return this.rowToProjectManager(row);
  }

  async update(
    id: string,
    patch: ProjectManagerPatch,
  ): Promise<ProjectManager | null> {
    const row = await this.db
      .updateTable("app.project_managers")
      .set({
        name: patch.name,
        email: patch.email,
        updated_at: sql<Date>`now()`,
      })
      .where("id", "=", id)
      .returningAll()
      .executeTakeFirst();
    return row ? this.rowToProjectManager(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db
      .deleteFrom("app.project_managers")
      .where("id", "=", id)
      .executeTakeFirst();
    return deleted(result);
  }

  private rowToProjectManager(
    row: Selectable<ProjectManagersTable>,
  ): ProjectManager {
    return {
      id: row.id,
      userId: row.user_id,
      name: row.name,
      email: row.email,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

/** EntityStore over PostgreSQL; run the migrations in ./migrations first */
export class KyselyEntityStore implements EntityStore {
  readonly organizations: KyselyOrganizationRepository;
  readonly resources: KyselyResourceRepository;
  readonly roles: KyselyRoleRepository;
  readonly permissions: KyselyPermissionRepository;
  readonly projectManagers: KyselyProjectManagerRepository;

  constructor(private db: Kysely<DB>) {
    this.organizations = new KyselyOrganizationRepository(db);
    this.resources = new KyselyResourceRepository(db);
    this.roles = new KyselyRoleRepository(db);
    this.permissions = new KyselyPermissionRepository(db);
    this.projectManagers = new KyselyProjectManagerRepository(db);
  }

  async destroy(): Promise<void> {
    await this.db.destroy();
  }
}
