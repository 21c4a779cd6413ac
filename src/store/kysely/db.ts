import { Kysely, PostgresDialect } from "kysely";
import pg from "pg";
import type { PostgresConfig } from "src/config.ts";
import type { DB } from "src/store/kysely/schema.ts";

export function createDb(config: PostgresConfig): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({
      pool: new pg.Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
      }),
    }),
  });
}
