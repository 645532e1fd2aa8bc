import { type DriftRecord, DriftDetectedError } from "./errors";
import { type LedgerEntry } from "./ledger-store";
import { type Logger, createPrefixedLogger } from "./logger";
import { type MigrationUnit, validateCatalog } from "./migration-unit";

export interface Plan {
  /** Units still to apply, ascending by id */
  units: readonly MigrationUnit[];
  /** Catalog ids that the ledger already records */
  alreadyApplied: readonly string[];
  /** Ledger ids with no unit in the catalog */
  orphaned: readonly string[];
}

/**
 * Compute the pending units for a catalog against the applied ledger entries.
 * @throws InvalidCatalogError when ids are duplicated or out of order
 * @throws DriftDetectedError when an applied unit's checksum changed
 */
export function planMigrations(
  catalog: readonly MigrationUnit[],
  applied: Iterable<LedgerEntry>,
  logger?: Logger,
): Plan {
  validateCatalog(catalog);

  const entries = new Map<string, LedgerEntry>();
  for (const entry of applied) {
    entries.set(entry.unitId, entry);
  }

  const drifted: DriftRecord[] = [];
  const pending: MigrationUnit[] = [];
  const alreadyApplied: string[] = [];

  for (const unit of catalog) {
    const entry = entries.get(unit.id);

    if (!entry) {
      pending.push(unit);
      continue;
    }

    alreadyApplied.push(unit.id);

    if (entry.checksum !== unit.checksum) {
      drifted.push({
        unitId: unit.id,
        recordedChecksum: entry.checksum,
        currentChecksum: unit.checksum,
      });
    }
  }

  if (drifted.length > 0) {
    throw new DriftDetectedError(drifted);
  }

  const catalogIds = new Set(catalog.map((unit) => unit.id));
  const orphaned = [...entries.keys()].filter((id) => !catalogIds.has(id));

  if (logger && orphaned.length > 0) {
    createPrefixedLogger(logger, { stage: "plan" }).warn({
      message: `Ledger records migrations missing from the catalog: ${orphaned.join(", ")}`,
    });
  }

  return { units: pending, alreadyApplied, orphaned };
}
