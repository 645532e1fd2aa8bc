import { describe, it, expect } from "vitest";
import { DriftDetectedError, InvalidCatalogError } from "./errors";
import { type LedgerEntry } from "./ledger-store";
import { type LogDataInput, type Logger } from "./logger";
import { type MigrationUnit, defineMigration } from "./migration-unit";
import { planMigrations } from "./planner";

const catalog: MigrationUnit[] = [
  defineMigration({ id: "001", name: "one", forward: "SELECT 1" }),
  defineMigration({ id: "002", name: "two", forward: "SELECT 2" }),
  defineMigration({ id: "003", name: "three", forward: "SELECT 3" }),
];

function entryFor(unit: MigrationUnit, checksum = unit.checksum): LedgerEntry {
  return {
    unitId: unit.id,
    name: unit.name,
    checksum,
    appliedAt: new Date("2025-01-01T00:00:00.000Z"),
    executionMs: 5,
  };
}

function unitAt(index: number): MigrationUnit {
  const unit = catalog[index];
  if (!unit) {
    throw new Error(`No unit at ${index}`);
  }
  return unit;
}

describe("planMigrations", () => {
  it("should plan every unit against an empty ledger", () => {
    const plan = planMigrations(catalog, []);

    expect(plan.units.map((unit) => unit.id)).toEqual(["001", "002", "003"]);
    expect(plan.alreadyApplied).toEqual([]);
    expect(plan.orphaned).toEqual([]);
  });

  it("should leave out applied units", () => {
    const plan = planMigrations(catalog, [entryFor(unitAt(0))]);

    expect(plan.units.map((unit) => unit.id)).toEqual(["002", "003"]);
    expect(plan.alreadyApplied).toEqual(["001"]);
  });

  it("should plan gaps in catalog order", () => {
    const plan = planMigrations(catalog, [entryFor(unitAt(1))]);
    expect(plan.units.map((unit) => unit.id)).toEqual(["001", "003"]);
  });

  it("should return an empty plan when everything is applied", () => {
    const plan = planMigrations(catalog, catalog.map((unit) => entryFor(unit)));
    expect(plan.units).toEqual([]);
  });

  it("should raise DriftDetectedError listing every drifted unit", () => {
    const applied = [
      entryFor(unitAt(0), "stale-1"),
      entryFor(unitAt(1)),
      entryFor(unitAt(2), "stale-3"),
    ];

    let caught: unknown;
    try {
      planMigrations(catalog, applied);
    } catch (error: unknown) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DriftDetectedError);
    if (caught instanceof DriftDetectedError) {
      expect(caught.code).toBe("DRIFT_DETECTED");
      expect(caught.drifted).toEqual([
        {
          unitId: "001",
          recordedChecksum: "stale-1",
          currentChecksum: unitAt(0).checksum,
        },
        {
          unitId: "003",
          recordedChecksum: "stale-3",
          currentChecksum: unitAt(2).checksum,
        },
      ]);
    }
  });

  it("should report orphaned ledger entries and warn about them", () => {
    const warnings: LogDataInput[] = [];
    const logger: Logger = {
      info: () => {},
      error: () => {},
      warn: (data) => warnings.push(data),
    };
    const ghost: LedgerEntry = { ...entryFor(unitAt(0)), unitId: "000" };

    const plan = planMigrations(catalog, [ghost], logger);

    expect(plan.orphaned).toEqual(["000"]);
    expect(plan.units).toHaveLength(3);
    expect(warnings).toEqual([
      {
        stage: "plan",
        unit: undefined,
        message: "Ledger records migrations missing from the catalog: 000",
      },
    ]);
  });

  it("should reject an invalid catalog", () => {
    expect(() => planMigrations([unitAt(1), unitAt(0)], [])).toThrow(
      InvalidCatalogError,
    );
  });
});
