import { type SqlClient, quoteIdentifier, splitTableName } from "./database";
import {
  type LogStage,
  type Logger,
  consoleLogger,
  createPrefixedLogger,
} from "./logger";

export type TriggerTiming = "BEFORE" | "AFTER";
export type TriggerEvent = "INSERT" | "UPDATE" | "DELETE";

export interface TriggerDefinition {
  tableName: string;
  triggerName: string;
  timing: TriggerTiming;
  events: TriggerEvent[];
  /** Function to execute, e.g. `update_updated_at_column()` */
  functionCall: string;
  forEach?: "ROW" | "STATEMENT";
}

/**
 * Idempotent DDL helpers handed to function migration units. Each one checks
 * the system catalogs before acting, so a unit built from them can be re-run.
 */
export interface SchemaHelpers {
  createTable: (
    client: SqlClient,
    tableName: string,
    columns: Record<string, string>,
    constraints?: string[],
  ) => Promise<void>;

  addColumn: (
    client: SqlClient,
    tableName: string,
    columnName: string,
    columnType: string,
    defaultValue?: string,
  ) => Promise<void>;

  addIndex: (
    client: SqlClient,
    tableName: string,
    indexName: string,
    columns: string[],
    unique?: boolean,
  ) => Promise<void>;

  removeIndex: (client: SqlClient, indexName: string) => Promise<boolean>;

  removePolicy: (
    client: SqlClient,
    tableName: string,
    policyName: string,
  ) => Promise<boolean>;

  /**
   * Drop a function by signature, e.g. `update_updated_at_column()`.
   * With cascade, dependent triggers are dropped as well.
   */
  removeFunction: (
    client: SqlClient,
    signature: string,
    cascade?: boolean,
  ) => Promise<void>;

  triggerExists: (
    client: SqlClient,
    tableName: string,
    triggerName: string,
  ) => Promise<boolean>;

  /**
   * Drop (if present) and create a trigger
   */
  recreateTrigger: (
    client: SqlClient,
    definition: TriggerDefinition,
  ) => Promise<void>;
}

/**
 * Create schema helpers with the specified logger
 */
export function createSchemaHelpers(
  logger: Logger = consoleLogger,
  prefix: { unit?: string; stage?: LogStage } = {},
): SchemaHelpers {
  const prefixedLogger = createPrefixedLogger(logger, {
    stage: "schema",
    ...prefix,
  });

  async function createTable(
    client: SqlClient,
    tableName: string,
    columns: Record<string, string>,
    constraints: string[] = [],
  ): Promise<void> {
    const columnDefs = Object.entries(columns)
      .map(([name, type]) => `${name} ${type}`)
      .join(",\n    ");

    const constraintDefs =
      constraints.length > 0 ? ",\n    " + constraints.join(",\n    ") : "";

    await client.query(`
      CREATE TABLE IF NOT EXISTS ${tableName} (
        ${columnDefs}${constraintDefs}
      )
    `);

    prefixedLogger.info({
      message: `Ensured table ${tableName} exists`,
    });
  }

  async function addColumn(
    client: SqlClient,
    tableName: string,
    columnName: string,
    columnType: string,
    defaultValue?: string,
  ): Promise<void> {
    const { schema, table } = splitTableName(tableName);
    const { rows } = await client.query(
      `
      SELECT column_name
      FROM information_schema.columns
      WHERE table_schema = $1 AND table_name = $2 AND column_name = $3
      `,
      [schema, table, columnName],
    );

    if (rows.length > 0) {
      prefixedLogger.info({
        message: `Column ${columnName} already exists in table ${tableName}`,
      });
      return;
    }

    const defaultClause = defaultValue ? ` DEFAULT ${defaultValue}` : "";
    await client.query(`
      ALTER TABLE ${tableName}
      ADD COLUMN ${columnName} ${columnType}${defaultClause}
    `);

    prefixedLogger.info({
      message: `Added column ${columnName} to table ${tableName}`,
    });
  }

  async function addIndex(
    client: SqlClient,
    tableName: string,
    indexName: string,
    columns: string[],
    unique: boolean = false,
  ): Promise<void> {
    const { rows } = await client.query(
      `SELECT indexname FROM pg_indexes WHERE indexname = $1`,
      [indexName],
    );

    if (rows.length > 0) {
      prefixedLogger.info({
        message: `Index ${indexName} already exists`,
      });
      return;
    }

    const uniqueClause = unique ? "UNIQUE " : "";
    await client.query(`
      CREATE ${uniqueClause}INDEX ${indexName}
      ON ${tableName} (${columns.join(", ")})
    `);

    prefixedLogger.info({
      message: `Created index ${indexName} on table ${tableName}`,
    });
  }

  async function removeIndex(
    client: SqlClient,
    indexName: string,
  ): Promise<boolean> {
    const { rows } = await client.query(
      `SELECT indexname FROM pg_indexes WHERE indexname = $1`,
      [indexName],
    );

    if (rows.length === 0) {
      prefixedLogger.info({
        message: `Index ${indexName} doesn't exist, nothing to remove`,
      });
      return false;
    }

    await client.query(`DROP INDEX IF EXISTS ${indexName}`);
    prefixedLogger.info({ message: `Removed index ${indexName}` });
    return true;
  }

  async function removePolicy(
    client: SqlClient,
    tableName: string,
    policyName: string,
  ): Promise<boolean> {
    const { schema, table } = splitTableName(tableName);
    const { rows } = await client.query(
      `
      SELECT policyname
      FROM pg_policies
      WHERE schemaname = $1 AND tablename = $2 AND policyname = $3
      `,
      [schema, table, policyName],
    );

    if (rows.length === 0) {
      prefixedLogger.info({
        message: `Policy "${policyName}" doesn't exist on table ${tableName}, nothing to remove`,
      });
      return false;
    }

    await client.query(
      `DROP POLICY IF EXISTS ${quoteIdentifier(policyName)} ON ${tableName}`,
    );
    prefixedLogger.info({
      message: `Removed policy "${policyName}" from table ${tableName}`,
    });
    return true;
  }

  async function removeFunction(
    client: SqlClient,
    signature: string,
    cascade: boolean = false,
  ): Promise<void> {
    await client.query(
      `DROP FUNCTION IF EXISTS ${signature}${cascade ? " CASCADE" : ""}`,
    );
    prefixedLogger.info({
      message: `Ensured function ${signature} is removed${cascade ? " (cascade)" : ""}`,
    });
  }

  async function triggerExists(
    client: SqlClient,
    tableName: string,
    triggerName: string,
  ): Promise<boolean> {
    const { schema, table } = splitTableName(tableName);
    const { rows } = await client.query(
      `
      SELECT 1
      FROM information_schema.triggers
      WHERE event_object_schema = $1
        AND event_object_table = $2
        AND trigger_name = $3
      LIMIT 1
      `,
      [schema, table, triggerName],
    );

    return rows.length > 0;
  }

  async function recreateTrigger(
    client: SqlClient,
    definition: TriggerDefinition,
  ): Promise<void> {
    const trigger = quoteIdentifier(definition.triggerName);

    await client.query(
      `DROP TRIGGER IF EXISTS ${trigger} ON ${definition.tableName}`,
    );
    await client.query(`
      CREATE TRIGGER ${trigger}
        ${definition.timing} ${definition.events.join(" OR ")} ON ${definition.tableName}
        FOR EACH ${definition.forEach ?? "ROW"}
        EXECUTE FUNCTION ${definition.functionCall}
    `);

    prefixedLogger.info({
      message: `Recreated trigger ${definition.triggerName} on table ${definition.tableName}`,
    });
  }

  return {
    createTable,
    addColumn,
    addIndex,
    removeIndex,
    removePolicy,
    removeFunction,
    triggerExists,
    recreateTrigger,
  };
}
