// Load environment variables first if you keep them in a .env file, e.g.
// import 'dotenv/config'

import { RunMigrateCLI, createCLIConsoleLogger } from "../src/cli";
import { type MigrationUnit, defineMigration } from "../src/lib/migration-unit";
import { loadSqlMigrations } from "../src/lib/sql-file-loader";

// Replace with your own catalog. Set MIGRATIONS_DIR to load `<id>_<name>.sql`
// files instead.
const exampleMigrations: MigrationUnit[] = [
  defineMigration({
    id: "001",
    name: "create_users",
    forward: async (client, helpers) => {
      await helpers.createTable(client, "users", {
        id: "SERIAL PRIMARY KEY",
        email: "TEXT NOT NULL UNIQUE",
        created_at: "TIMESTAMPTZ NOT NULL DEFAULT now()",
      });
    },
  }),
  defineMigration({
    id: "002",
    name: "index_users_created_at",
    forward: `CREATE INDEX IF NOT EXISTS idx_users_created_at ON users (created_at);`,
  }),
];

async function main(): Promise<void> {
  const directory = process.env.MIGRATIONS_DIR;
  const migrations = directory
    ? await loadSqlMigrations(directory)
    : exampleMigrations;

  await RunMigrateCLI({
    migrations,
    loadFrom: "env",
    logger: createCLIConsoleLogger(true),
  });
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Failed to run CLI: ${message}`);
  process.exitCode = 1;
});
