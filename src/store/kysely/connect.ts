import { Kysely, PostgresDialect } from "kysely";
import pg from "pg";
import type { PostgresConfig } from "../../config.ts";
import type { DB } from "./schema.ts";

export function createPostgresDb(config: PostgresConfig): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({
      pool: new pg.Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        max: config.poolMax,
      }),
    }),
  });
}
