import { PostgresDialect } from "kysely";
import { defineConfig } from "kysely-ctl";
import pg from "pg";
import { loadConfig } from "./src/config.ts";

const { postgres } = loadConfig();

export default defineConfig({
  dialect: new PostgresDialect({
    pool: new pg.Pool({
      host: postgres.host,
      port: postgres.port,
      user: postgres.user,
      password: postgres.password,
      database: postgres.database,
      max: postgres.poolMax,
    }),
  }),
  migrations: {
    migrationFolder: "src/store/kysely/migrations",
  },
});
