import { randomUUID } from "node:crypto";
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

interface StoredRecord {
  id: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Map-backed repository. Maps keep insertion order, so `list` returns
 * records in the order they were created.
 */
export class MemoryRepository<
  TRecord extends StoredRecord,
  TNew extends object,
  TPatch extends Partial<TRecord>,
> implements Repository<TRecord, TNew, TPatch>
{
  protected records = new Map<string, TRecord>();

  constructor(
    private build: (input: TNew, id: string, now: Date) => TRecord,
  ) {}

  async list(): Promise<TRecord[]> {
    return [...this.records.values()];
  }

  async findById(id: string): Promise<TRecord | null> {
    return this.records.get(id) ?? null;
  }

  async insert(input: TNew): Promise<TRecord> {
    const record = this.build(input, randomUUID(), new Date());
    this.records.set(record.id, record);
    return record;
  }

  async update(id: string, patch: TPatch): Promise<TRecord | null> {
    const existing = this.records.get(id);
    if (!existing) return null;

    const updated: TRecord = {
      ...existing,
      ...patch,
      id: existing.id,
      createdAt: existing.createdAt,
      updatedAt: new Date(),
    };
    this.records.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }
}

class MemoryResourceRepository
  extends MemoryRepository<Resource, NewResource, ResourcePatch>
  implements ResourceRepository
{
  async listByOrganization(organizationId: string): Promise<Resource[]> {
    return [...this.records.values()].filter(
      (r) => r.organizationId === organizationId,
    );
  }
}

/** Process-local EntityStore; every instance starts empty */
export class MemoryEntityStore implements EntityStore {
  readonly organizations = new MemoryRepository<
    Organization,
    NewOrganization,
    OrganizationPatch
  >((input, id, now) => ({ ...input, id, createdAt: now, updatedAt: now }));

  readonly resources = new MemoryResourceRepository(
    (input, id, now) => ({ ...input, id, createdAt: now, updatedAt: now }),
  );

  readonly roles = new MemoryRepository<Role, NewRole, RolePatch>(
    (input, id, now) => ({
      ...input,
      permissions: [...input.permissions],
      id,
      createdAt: now,
      updatedAt: now,
    }),
  );

  readonly permissions = new MemoryRepository<
    Permission,
    NewPermission,
    PermissionPatch
  >((input, id, now) => ({ ...input, id, createdAt: now, updatedAt: now }));

  readonly projectManagers = new MemoryRepository<
    ProjectManager,
    NewProjectManager,
    ProjectManagerPatch
  >((input, id, now) => ({ ...input, id, createdAt: now, updatedAt: now }));

  async destroy(): Promise<void> {}
}
