import type { RelationshipTuple } from "src/core/types.ts";

/**
 * Wire contract of the external relationship store.
 * Implementations throw on transport or oracle errors; policy about what a
 * failure means lives in the authorization facade.
 */
export interface RelationshipOracle {
  /** Is `(user, relation, object)` true, directly or through rewrite rules */
  check(tuple: RelationshipTuple): Promise<boolean>;

  /** Store tuples; rejects tuples that already exist */
  write(tuples: RelationshipTuple[]): Promise<void>;

  /** Remove tuples; rejects tuples that do not exist */
  delete(tuples: RelationshipTuple[]): Promise<void>;

  /** Refs (`type:id`) of objects of `type` the user has `relation` to */
  listObjects(user: string, relation: string, type: string): Promise<string[]>;

  /** Every stored tuple whose object is `object` */
  read(object: string): Promise<RelationshipTuple[]>;

  /** Resolves when the store answers a cheap request */
  ping(): Promise<void>;
}
