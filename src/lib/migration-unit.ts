import { createHash } from "crypto";
import { type SqlClient } from "./database";
import { InvalidCatalogError } from "./errors";
import { type SchemaHelpers } from "./schema-helpers";

/**
 * Forward change logic of a unit. Either a SQL script (run as one simple query,
 * so it may hold several statements and `DO $$ ... $$` blocks) or a function
 * that runs inside the unit's transaction.
 */
export type ForwardAction =
  | string
  | ((client: SqlClient, helpers: SchemaHelpers) => Promise<void>);

export interface MigrationUnit {
  /** Sortable identifier, e.g. a timestamp or a zero-padded sequence */
  readonly id: string;
  readonly name: string;
  readonly forward: ForwardAction;
  /** SHA-256 hex digest used for drift detection */
  readonly checksum: string;
}

export interface MigrationDefinition {
  id: string;
  name: string;
  forward: ForwardAction;
  /**
   * Explicit checksum. Function units default to a digest of the function
   * source, which changes whenever the function is edited or reformatted.
   */
  checksum?: string;
}

export function computeChecksum(forward: ForwardAction): string {
  const content =
    typeof forward === "string"
      ? forward.replace(/\r\n/g, "\n")
      : forward.toString();

  return createHash("sha256").update(content, "utf8").digest("hex");
}

/**
 * Create an immutable migration unit
 */
export function defineMigration(definition: MigrationDefinition): MigrationUnit {
  if (!definition.id.trim()) {
    throw new InvalidCatalogError("Migration id must not be empty");
  }

  return Object.freeze({
    id: definition.id,
    name: definition.name,
    forward: definition.forward,
    checksum: definition.checksum ?? computeChecksum(definition.forward),
  });
}

/**
 * Check that ids are unique and strictly ascending
 * @throws InvalidCatalogError
 */
export function validateCatalog(catalog: readonly MigrationUnit[]): void {
  const seen = new Set<string>();
  const duplicates: string[] = [];

  for (const unit of catalog) {
    if (seen.has(unit.id)) {
      duplicates.push(unit.id);
    }
    seen.add(unit.id);
  }

  if (duplicates.length > 0) {
    throw new InvalidCatalogError(
      `Duplicate migration IDs detected: ${duplicates.join(", ")}`,
    );
  }

  for (let i = 1; i < catalog.length; i++) {
    const previous = catalog[i - 1];
    const current = catalog[i];

    if (previous && current && !(previous.id < current.id)) {
      throw new InvalidCatalogError(
        `Migrations must be ordered by ascending id: ${current.id} follows ${previous.id}`,
      );
    }
  }
}

/**
 * Run a unit's forward action on the given client
 */
export async function runForwardAction(
  unit: MigrationUnit,
  client: SqlClient,
  helpers: SchemaHelpers,
): Promise<void> {
  if (typeof unit.forward === "string") {
    await client.query(unit.forward);
    return;
  }

  await unit.forward(client, helpers);
}
