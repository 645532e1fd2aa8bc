import { Pool } from "pg";
import { type SqlPool } from "./database";
import { MigrationError } from "./errors";
import { type LogDataInput, BaseLogger, describeError } from "./logger";
import {
  type MigrationManagerOptions,
  MigrationManager,
} from "./migration-system";
import { type MigrationUnit } from "./migration-unit";
import { type VerifierMode } from "./verifier";

/**
 * Logger function type for the migrate CLI
 */
export type CLILoggerFunction = (
  type:
    | "info"
    | "error"
    | "warn"
    | "migrate-info"
    | "migrate-error"
    | "migrate-warn",
  message: string,
) => void;

/**
 * Console-based logger implementation for the migrate CLI
 * @param migrateVerbose Whether to log verbose migration messages
 */
export const createCLIConsoleLogger = (
  migrateVerbose: boolean = true,
): CLILoggerFunction => {
  return (type, message) => {
    switch (type) {
      case "info":
        console.log(message);
        break;
      case "error":
        console.error(message);
        break;
      case "warn":
        console.warn(message);
        break;
      case "migrate-info":
        if (migrateVerbose) {
          console.log(`[MIGRATE-INFO] ${message}`);
        }
        break;
      case "migrate-error":
        console.error(`[MIGRATE-ERROR] ${message}`);
        break;
      case "migrate-warn":
        console.warn(`[MIGRATE-WARN] ${message}`);
        break;
    }
  };
};

/**
 * Routes engine log entries to the CLI logger's migrate-* channels
 */
class CLIMigrationLogger extends BaseLogger {
  private cliLogger: CLILoggerFunction;

  constructor(logger: CLILoggerFunction) {
    super();
    this.cliLogger = logger;
  }

  private format(data: LogDataInput, withError: boolean): string {
    const unitPrefix = data.unit ? `[${data.unit}]` : "";
    const stagePrefix = data.stage ? `[${data.stage}]` : "";
    const prefix = `${unitPrefix} ${stagePrefix}`.trim();
    const body =
      withError && data.error !== undefined
        ? `${data.message}: ${describeError(data.error)}`
        : data.message;
    return prefix ? `${prefix} ${body}` : body;
  }

  info(data: LogDataInput): void {
    this.cliLogger("migrate-info", this.format(data, false));
  }

  error(data: LogDataInput): void {
    this.cliLogger("migrate-error", this.format(data, true));
  }

  warn(data: LogDataInput): void {
    this.cliLogger("migrate-warn", this.format(data, false));
  }
}

const HELP_TEXT = `
Database Migration CLI

Available commands:
  up          Apply pending migrations
  status      Show migration status
  dry-run     Apply pending migrations in a rolled-back transaction and report problems
`;

const VERIFY_MODES = ["off", "dry-run", "enforce"] as const;

function parseVerifyMode(value: string): VerifierMode | false {
  switch (value) {
    case "off":
      return false;
    case "dry-run":
    case "enforce":
      return value;
    default:
      throw new Error(
        `Invalid MIGRATE_VERIFY value "${value}", expected one of: ${VERIFY_MODES.join(", ")}`,
      );
  }
}

function parsePositiveInt(name: string, value: string): number {
  const parsed = Number.parseInt(value, 10);

  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }

  return parsed;
}

/**
 * Engine options read from `<prefix>MIGRATE_*` variables
 */
export function readManagerOptionsFromEnv(
  env: Record<string, string | undefined>,
  prefix: string = "",
): MigrationManagerOptions {
  const opts: MigrationManagerOptions = {};

  const timeout = env[`${prefix}MIGRATE_UNIT_TIMEOUT_MS`];
  if (timeout) {
    opts.unitTimeoutMs = parsePositiveInt(
      `${prefix}MIGRATE_UNIT_TIMEOUT_MS`,
      timeout,
    );
  }

  const verify = env[`${prefix}MIGRATE_VERIFY`];
  if (verify) {
    opts.verify = parseVerifyMode(verify);
  }

  const ledgerTable = env[`${prefix}MIGRATE_LEDGER_TABLE`];
  if (ledgerTable) {
    opts.ledgerTable = ledgerTable;
  }

  return opts;
}

async function testConnection(
  pool: SqlPool,
  logger: CLILoggerFunction,
  loadedFrom: "env" | "pool",
  envPrefix: string,
  env: Record<string, string | undefined>,
): Promise<boolean> {
  try {
    await pool.query("SELECT 1");
    logger("info", "Successfully connected to database");
    return true;
  } catch (error: unknown) {
    logger("error", "Error connecting to database:");
    logger("error", `→ ${describeError(error)}`);

    if (loadedFrom === "env") {
      logger("error", "\nPlease check your database connection settings:");
      logger("error", `→ Host: ${env[`${envPrefix}POSTGRES_HOST`]}`);
      logger("error", `→ Port: ${env[`${envPrefix}POSTGRES_PORT`]}`);
      logger("error", `→ Database: ${env[`${envPrefix}POSTGRES_DATABASE`]}`);
      logger("error", `→ User: ${env[`${envPrefix}POSTGRES_USER`]}`);
    } else {
      logger(
        "error",
        "\nPlease check that the provided database pool is configured correctly.",
      );
    }

    logger("error", "\nMake sure PostgreSQL is running and accessible.");

    return false;
  }
}

async function runUp(
  manager: MigrationManager,
  logger: CLILoggerFunction,
): Promise<void> {
  logger("info", "Applying pending migrations...");
  const result = await manager.up();

  if (result.appliedCount > 0) {
    logger(
      "info",
      `Applied ${result.appliedCount} migrations: ${result.appliedUnitIds.join(", ")}`,
    );
  } else {
    logger("info", "No pending migrations to apply");
  }
}

async function showStatus(
  manager: MigrationManager,
  logger: CLILoggerFunction,
): Promise<void> {
  const status = await manager.status();

  logger("info", "\nMigration Status:");
  logger("info", "=================");

  if (status.length === 0) {
    logger("info", "No migrations registered or applied.");
    return;
  }

  logger("info", "ID                   | State    | Applied At");
  logger("info", "---------------------|----------|--------------------");

  for (const row of status) {
    const date = row.appliedAt
      ? row.appliedAt.toISOString().replace("T", " ").substring(0, 19)
      : "-";

    logger("info", `${row.id.padEnd(20)} | ${row.state.padEnd(8)} | ${date}`);
  }
}

async function runDryRun(
  manager: MigrationManager,
  logger: CLILoggerFunction,
): Promise<void> {
  const report = await manager.dryRun();

  if (report.results.length === 0) {
    logger("info", "No pending migrations to check");
    return;
  }

  for (const result of report.results) {
    if (result.ok) {
      logger("info", `✓ ${result.unitId}`);
    } else {
      logger(
        "warn",
        `✗ ${result.unitId} (${result.violation.kind}): ${result.violation.message}`,
      );
    }
  }

  for (const unitId of report.notReached) {
    logger("warn", `- ${unitId} (not reached)`);
  }

  if (!report.ok) {
    throw new Error("Dry run found problems; nothing was applied");
  }

  logger("info", "Dry run passed; nothing was applied");
}

/**
 * Run the migrate CLI with the provided configuration
 * @param config.migrations Migration catalog, ascending by id
 * @param config.loadFrom Whether to build a pg Pool from environment variables or use the given pool
 * @param config.envPrefix Optional prefix for environment variables (e.g., "API_" for "API_POSTGRES_USER")
 * @param config.pool Pool to use when loadFrom is "pool"
 * @param config.logger Logger function for CLI output
 * @param config.argv Optional array to use instead of process.argv
 * @param config.env Optional environment object to use instead of process.env
 * @param config.options Engine options; merged over the MIGRATE_* variables
 */
export async function RunMigrateCLI(config: {
  migrations: MigrationUnit[];
  loadFrom: "env" | "pool";
  envPrefix?: string;
  pool?: SqlPool;
  logger: CLILoggerFunction;
  argv?: string[];
  env?: Record<string, string | undefined>;
  options?: MigrationManagerOptions;
}): Promise<void> {
  const env = config.env || process.env;
  const prefix = config.envPrefix || "";
  let poolInstance: SqlPool;

  if (config.loadFrom === "env") {
    if (config.pool) {
      throw new Error("Cannot provide both pool and loadFrom='env'");
    }

    const requiredEnvVars = [
      "POSTGRES_USER",
      "POSTGRES_HOST",
      "POSTGRES_DATABASE",
      "POSTGRES_PASSWORD",
      "POSTGRES_PORT",
    ];

    const missingEnvVars = requiredEnvVars
      .filter((envVar) => !env[`${prefix}${envVar}`])
      .map((envVar) => `${prefix}${envVar}`);

    if (missingEnvVars.length > 0) {
      config.logger(
        "error",
        `Missing required environment variables: ${missingEnvVars.join(", ")}`,
      );
      config.logger(
        "error",
        "Please ensure all required database configuration is set in your .env file or environment variables.",
      );

      throw new Error(
        `Missing required environment variables: ${missingEnvVars.join(", ")}`,
      );
    }

    const optionalInt = (name: string, fallback: number): number => {
      const value = env[`${prefix}${name}`];
      return value ? parsePositiveInt(`${prefix}${name}`, value) : fallback;
    };

    const pgPool = new Pool({
      user: env[`${prefix}POSTGRES_USER`],
      host: env[`${prefix}POSTGRES_HOST`],
      database: env[`${prefix}POSTGRES_DATABASE`],
      password: env[`${prefix}POSTGRES_PASSWORD`],
      port: parsePositiveInt(
        `${prefix}POSTGRES_PORT`,
        env[`${prefix}POSTGRES_PORT`] ?? "",
      ),
      max: optionalInt("POSTGRES_MAX_CONNECTIONS", 20),
      idleTimeoutMillis: optionalInt("POSTGRES_IDLE_TIMEOUT", 30000),
      connectionTimeoutMillis: optionalInt("POSTGRES_CONNECTION_TIMEOUT", 2000),
    });

    pgPool.on("error", (err) => {
      config.logger(
        "error",
        `Unexpected error on idle client in PostgreSQL pool: ${err.message}`,
      );
    });

    poolInstance = pgPool;
  } else {
    if (!config.pool) {
      throw new Error("Must provide pool when loadFrom='pool'");
    }

    if (config.envPrefix) {
      throw new Error("Cannot provide envPrefix when loadFrom='pool'");
    }

    poolInstance = config.pool;
  }

  const args = config.argv || process.argv;
  const operation = args[2] || "help";

  try {
    if (operation === "help" || !["up", "status", "dry-run"].includes(operation)) {
      config.logger("info", HELP_TEXT);
      return;
    }

    const connected = await testConnection(
      poolInstance,
      config.logger,
      config.loadFrom,
      prefix,
      env,
    );

    if (!connected) {
      config.logger(
        "error",
        "\nAborting operation due to database connection failure.\n",
      );
      throw new Error("Database connection failure");
    }

    const manager = new MigrationManager(
      poolInstance,
      new CLIMigrationLogger(config.logger),
      { ...readManagerOptionsFromEnv(env, prefix), ...config.options },
    );
    manager.register(config.migrations);

    switch (operation) {
      case "up":
        await runUp(manager, config.logger);
        break;
      case "status":
        await showStatus(manager, config.logger);
        break;
      case "dry-run":
        await runDryRun(manager, config.logger);
        break;
    }
  } catch (error: unknown) {
    if (error instanceof MigrationError && error.unitId) {
      config.logger(
        "error",
        `Migration failed at unit ${error.unitId} [${error.code}]: ${error.message}`,
      );
    } else {
      config.logger("error", `Error: ${describeError(error)}`);
    }
    throw error;
  } finally {
    await poolInstance.end();
  }
}
