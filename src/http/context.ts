import type { Authorization } from "src/core/authorization.ts";
import { AuthorizationDeniedError, NotFoundError } from "src/core/errors.ts";
import type { ObjectType, RelationOf } from "src/core/types.ts";
import type { Logger } from "src/logger.ts";
import type { EntityStore } from "src/store/interface.ts";

export interface AppInfo {
  title: string;
  version: string;
}

export interface AppDependencies {
  store: EntityStore;
  authorization: Authorization;
  logger: Logger;
  info: AppInfo;
  /** Allowed CORS origin; "*" reflects any origin */
  corsOrigin?: string;
}

/** Throw 403 unless the oracle grants `relation` on the object */
export async function requireAccess<T extends ObjectType>(
  authorization: Authorization,
  subject: string,
  relation: RelationOf<T>,
  objectType: T,
  objectId: string,
  message?: string,
): Promise<void> {
  const allowed = await authorization.check(
    subject,
    relation,
    objectType,
    objectId,
  );
  if (!allowed) {
    throw new AuthorizationDeniedError(
      message ?? `Missing ${relation} on ${objectType}`,
    );
  }
}

export async function found<T>(
  lookup: Promise<T | null>,
  entity: string,
): Promise<T> {
  const record = await lookup;
  if (record === null) throw new NotFoundError(entity);
  return record;
}
