import { idsOfType, objectRef, userRef } from "src/core/refs.ts";
import { withTimeout } from "src/core/timeout.ts";
import {
  type ObjectType,
  type OrganizationRole,
  OWNER_RELATION,
  type RelationOf,
  type RelationshipTuple,
} from "src/core/types.ts";
import type { Logger } from "src/logger.ts";
import type { RelationshipOracle } from "src/oracle/interface.ts";

const DEFAULT_TIMEOUT_MS = 2000;

export interface Authorization {
  assign(
    subject: string,
    role: OrganizationRole,
    organizationId: string,
  ): Promise<boolean>;
  unassign(
    subject: string,
    role: OrganizationRole,
    organizationId: string,
  ): Promise<boolean>;
  linkResourceToOrganization(
    resourceId: string,
    organizationId: string,
  ): Promise<boolean>;
  unlinkResourceFromOrganization(
    resourceId: string,
    organizationId: string,
  ): Promise<boolean>;
  check<T extends ObjectType>(
    subject: string,
    relation: RelationOf<T>,
    objectType: T,
    objectId: string,
  ): Promise<boolean>;
  checkAll<T extends ObjectType>(
    subject: string,
    relations: readonly RelationOf<T>[],
    objectType: T,
    objectId: string,
  ): Promise<Map<RelationOf<T>, boolean>>;
  listAccessibleObjects<T extends ObjectType>(
    subject: string,
    relation: RelationOf<T>,
    objectType: T,
  ): Promise<Set<string>>;
  revokeAll(objectType: ObjectType, objectId: string): Promise<boolean>;
  health(): Promise<boolean>;
}

export interface AuthorizationOptions {
  /** Upper bound for every oracle call (default: 2000ms) */
  timeoutMs?: number;
  logger: Logger;
}

/**
 * Facade over the relationship store. Checks fail closed: an oracle error or
 * timeout is a denial. Writes report failure as `false` and are idempotent
 * with respect to the resulting relationship state.
 */
export function createAuthorization(
  oracle: RelationshipOracle,
  options: AuthorizationOptions,
): Authorization {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const logger = options.logger.child({ component: "authorization" });

  function call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    return withTimeout(run(), timeoutMs, operation);
  }

  async function writeTuple(tuple: RelationshipTuple): Promise<boolean> {
    try {
      await call("write", () => oracle.write([tuple]));
      return true;
    } catch (error) {
      // Duplicate writes are rejected by the store; the state still matches
      if (await holds(tuple)) {
        logger.debug({ tuple }, "Tuple already present");
        return true;
      }
      logger.error({ err: error, tuple }, "Failed to write tuple");
      return false;
    }
  }

  async function deleteTuple(tuple: RelationshipTuple): Promise<boolean> {
    try {
      await call("delete", () => oracle.delete([tuple]));
      return true;
    } catch (error) {
      if ((await holds(tuple)) === false) {
        logger.debug({ tuple }, "Tuple already absent");
        return true;
      }
      logger.error({ err: error, tuple }, "Failed to delete tuple");
      return false;
    }
  }

  /** Re-read a tuple after a failed write; null if the store is unreachable */
  async function holds(tuple: RelationshipTuple): Promise<boolean | null> {
    try {
      return await call("check", () => oracle.check(tuple));
    } catch {
      return null;
    }
  }

  function membership(
    subject: string,
    role: OrganizationRole,
    organizationId: string,
  ): RelationshipTuple {
    return {
      user: userRef(subject),
      relation: role,
      object: objectRef("organization", organizationId),
    };
  }

  function ownership(
    resourceId: string,
    organizationId: string,
  ): RelationshipTuple {
    return {
      user: objectRef("organization", organizationId),
      relation: OWNER_RELATION,
      object: objectRef("resource", resourceId),
    };
  }

  async function check<T extends ObjectType>(
    subject: string,
    relation: RelationOf<T>,
    objectType: T,
    objectId: string,
  ): Promise<boolean> {
    const tuple: RelationshipTuple = {
      user: userRef(subject),
      relation,
      object: objectRef(objectType, objectId),
    };
    try {
      return await call("check", () => oracle.check(tuple));
    } catch (error) {
      logger.warn({ err: error, tuple }, "Permission check failed, denying");
      return false;
    }
  }

  return {
    assign(subject, role, organizationId) {
      return writeTuple(membership(subject, role, organizationId));
    },

    unassign(subject, role, organizationId) {
      return deleteTuple(membership(subject, role, organizationId));
    },

    linkResourceToOrganization(resourceId, organizationId) {
      return writeTuple(ownership(resourceId, organizationId));
    },

    unlinkResourceFromOrganization(resourceId, organizationId) {
      return deleteTuple(ownership(resourceId, organizationId));
    },

    check,

    async checkAll<T extends ObjectType>(
      subject: string,
      relations: readonly RelationOf<T>[],
      objectType: T,
      objectId: string,
    ): Promise<Map<RelationOf<T>, boolean>> {
      const results = await Promise.all(
        relations.map((relation) =>
          check(subject, relation, objectType, objectId),
        ),
      );
      const byRelation = new Map<RelationOf<T>, boolean>();
      relations.forEach((relation, i) => {
        byRelation.set(relation, results[i] === true);
      });
      return byRelation;
    },

    async listAccessibleObjects<T extends ObjectType>(
      subject: string,
      relation: RelationOf<T>,
      objectType: T,
    ): Promise<Set<string>> {
      try {
        const refs = await call("listObjects", () =>
          oracle.listObjects(userRef(subject), relation, objectType),
        );
        return idsOfType(refs, objectType);
      } catch (error) {
        logger.warn(
          { err: error, subject, relation, objectType },
          "Reverse lookup failed, returning no objects",
        );
        return new Set();
      }
    },

    async revokeAll(objectType, objectId) {
      const object = objectRef(objectType, objectId);
      try {
        const tuples = await call("read", () => oracle.read(object));
        if (tuples.length > 0) {
          await call("delete", () => oracle.delete(tuples));
        }
        logger.debug({ object, count: tuples.length }, "Revoked tuples");
        return true;
      } catch (error) {
        logger.error({ err: error, object }, "Failed to revoke tuples");
        return false;
      }
    },

    async health() {
      try {
        await call("ping", () => oracle.ping());
        return true;
      } catch (error) {
        logger.warn({ err: error }, "Relationship store unreachable");
        return false;
      }
    },
  };
}
