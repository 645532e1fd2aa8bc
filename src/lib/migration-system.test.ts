import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest";
import { TestDatabaseInstance } from "./db-utilities/test-db-instance";
import {
  DriftDetectedError,
  InvalidCatalogError,
  LedgerEntryNotFoundError,
  LockHeldError,
} from "./errors";
import { consoleLogger, MutableLogger } from "./logger";
import { MigrationLock } from "./migration-lock";
import { MigrationManager } from "./migration-system";
import { type MigrationUnit, defineMigration } from "./migration-unit";

// Control whether to show logs during tests
const MIGRATION_MANAGER_VERBOSE_LOGGING = false;

// A reporting table in the state a careless earlier deploy left it in:
// a redundant index, duplicated policies and a trigger function without a
// pinned search_path
const LEGACY_SCHEMA = `
  CREATE TABLE financial_reports (
    id SERIAL PRIMARY KEY,
    report_date DATE NOT NULL,
    amount NUMERIC(12, 2) NOT NULL DEFAULT 0,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );

  CREATE INDEX idx_financial_reports_report_date ON financial_reports (report_date);

  ALTER TABLE financial_reports ENABLE ROW LEVEL SECURITY;
  CREATE POLICY "Allow public insert access" ON financial_reports FOR INSERT WITH CHECK (true);
  CREATE POLICY "Allow public read access" ON financial_reports FOR SELECT USING (true);
  CREATE POLICY "Allow public insert to financial_reports" ON financial_reports FOR INSERT WITH CHECK (true);
  CREATE POLICY "Allow public read access to financial_reports" ON financial_reports FOR SELECT USING (true);

  CREATE FUNCTION update_updated_at_column() RETURNS TRIGGER AS $$
  BEGIN
    NEW.updated_at = now();
    RETURN NEW;
  END;
  $$ LANGUAGE plpgsql;

  CREATE TRIGGER update_financial_reports_updated_at
    BEFORE UPDATE ON financial_reports
    FOR EACH ROW EXECUTE FUNCTION update_updated_at_column();
`;

const securityFixes: MigrationUnit[] = [
  defineMigration({
    id: "001-drop-index",
    name: "Drop redundant report date index",
    forward: `DROP INDEX IF EXISTS idx_financial_reports_report_date;`,
  }),
  defineMigration({
    id: "002-fix-policies",
    name: "Remove duplicated public policies",
    forward: `
      DROP POLICY IF EXISTS "Allow public insert to financial_reports" ON financial_reports;
      DROP POLICY IF EXISTS "Allow public read access to financial_reports" ON financial_reports;
    `,
  }),
  defineMigration({
    id: "003-fix-function",
    name: "Pin search_path of update_updated_at_column",
    checksum: "003-fix-function-v1",
    forward: async (client, helpers) => {
      // CASCADE takes the trigger with it, so look before dropping
      const hadTrigger = await helpers.triggerExists(
        client,
        "financial_reports",
        "update_financial_reports_updated_at",
      );

      await helpers.removeFunction(client, "update_updated_at_column()", true);

      await client.query(`
        CREATE OR REPLACE FUNCTION update_updated_at_column() RETURNS TRIGGER
        LANGUAGE plpgsql
        SECURITY DEFINER
        SET search_path = ''
        AS $$
        BEGIN
          NEW.updated_at = now();
          RETURN NEW;
        END;
        $$;
      `);

      if (hadTrigger) {
        await helpers.recreateTrigger(client, {
          tableName: "financial_reports",
          triggerName: "update_financial_reports_updated_at",
          timing: "BEFORE",
          events: ["UPDATE"],
          functionCall: "update_updated_at_column()",
        });
      }
    },
  }),
];

describe("MigrationManager", () => {
  let db: TestDatabaseInstance;
  let testLogger: MutableLogger;

  beforeAll(async () => {
    db = await TestDatabaseInstance.create();
  });

  afterAll(async () => {
    await db.stop();
  });

  beforeEach(async () => {
    await db.reset();
    await db.getPool().query(LEGACY_SCHEMA);
    testLogger = new MutableLogger(
      consoleLogger,
      MIGRATION_MANAGER_VERBOSE_LOGGING,
    );
  });

  const newManager = (catalog: MigrationUnit[] = securityFixes) => {
    const manager = new MigrationManager(db.getPool(), testLogger);
    manager.register(catalog);
    return manager;
  };

  const policyNames = async (): Promise<string[]> => {
    const { rows } = await db.getPool().query(`
      SELECT policyname FROM pg_policies
      WHERE tablename = 'financial_reports'
      ORDER BY policyname
    `);
    return rows.map((row) => String(row.policyname));
  };

  describe("security fix scenario", () => {
    it("should apply all three units against the legacy schema", async () => {
      const result = await newManager().up();

      expect(result.appliedCount).toBe(3);
      expect(result.appliedUnitIds).toEqual([
        "001-drop-index",
        "002-fix-policies",
        "003-fix-function",
      ]);
      expect(result.previouslyApplied).toEqual([]);

      expect(await policyNames()).toEqual([
        "Allow public insert access",
        "Allow public read access",
      ]);

      const fn = await db.getPool().query(`
        SELECT prosecdef, proconfig::text AS config
        FROM pg_proc WHERE proname = 'update_updated_at_column'
      `);
      expect(fn.rows).toHaveLength(1);
      expect(fn.rows[0]?.prosecdef).toBe(true);
      expect(String(fn.rows[0]?.config)).toContain("search_path=");

      const triggers = await db.getPool().query(`
        SELECT count(*)::int AS n FROM information_schema.triggers
        WHERE event_object_table = 'financial_reports'
          AND trigger_name = 'update_financial_reports_updated_at'
      `);
      expect(triggers.rows[0]?.n).toBe(1);

      const index = await db.getPool().query(
        `SELECT count(*)::int AS n FROM pg_indexes WHERE indexname = $1`,
        ["idx_financial_reports_report_date"],
      );
      expect(index.rows[0]?.n).toBe(0);

      const entries = await newManager().ledgerStore.listEntries();
      expect(entries.map((entry) => entry.unitId)).toEqual([
        "001-drop-index",
        "002-fix-policies",
        "003-fix-function",
      ]);
    });

    it("should apply nothing on a second run", async () => {
      await newManager().up();
      const second = await newManager().up();

      expect(second.appliedCount).toBe(0);
      expect(second.previouslyApplied).toEqual([
        "001-drop-index",
        "002-fix-policies",
        "003-fix-function",
      ]);
      expect(await policyNames()).toHaveLength(2);
    });

    it("should keep the trigger firing after the function is replaced", async () => {
      await newManager().up();

      await db.getPool().query(`
        INSERT INTO financial_reports (report_date, amount, updated_at)
        VALUES ('2025-01-01', 10, '2000-01-01T00:00:00Z');
        UPDATE financial_reports SET amount = 20;
      `);

      const { rows } = await db.getPool().query(
        `SELECT updated_at > '2000-01-02'::timestamptz AS touched FROM financial_reports`,
      );
      expect(rows[0]?.touched).toBe(true);
    });

    it("should apply only what is pending after a partial run", async () => {
      await newManager(securityFixes.slice(0, 1)).up();

      const result = await newManager().up();

      expect(result.appliedUnitIds).toEqual([
        "002-fix-policies",
        "003-fix-function",
      ]);
      expect(result.previouslyApplied).toEqual(["001-drop-index"]);
    });

    it("should pass a dry run without changing anything", async () => {
      const report = await newManager().dryRun();

      expect(report.ok).toBe(true);
      expect(report.results.map((r) => r.unitId)).toEqual([
        "001-drop-index",
        "002-fix-policies",
        "003-fix-function",
      ]);
      expect(await policyNames()).toHaveLength(4);
      await expect(
        newManager().ledgerStore.get("001-drop-index"),
      ).rejects.toBeInstanceOf(LedgerEntryNotFoundError);
    });

    it("should apply the same units under enforce verification", async () => {
      const manager = new MigrationManager(db.getPool(), testLogger, {
        verify: "enforce",
        unitTimeoutMs: 10000,
      });
      manager.register(securityFixes);

      const result = await manager.up();
      expect(result.appliedCount).toBe(3);
    });
  });

  describe("concurrent runs", () => {
    it("should let exactly one of two simultaneous runs apply the catalog", async () => {
      const outcomes = await Promise.allSettled([
        newManager().up(),
        newManager().up(),
      ]);

      const applied = outcomes.flatMap((outcome) =>
        outcome.status === "fulfilled" ? outcome.value.appliedUnitIds : [],
      );
      const rejected = outcomes.flatMap((outcome): unknown[] =>
        outcome.status === "rejected" ? [outcome.reason] : [],
      );

      expect(applied).toEqual([
        "001-drop-index",
        "002-fix-policies",
        "003-fix-function",
      ]);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]).toBeInstanceOf(LockHeldError);

      const entries = await newManager().ledgerStore.listEntries();
      expect(entries).toHaveLength(3);
      expect(await policyNames()).toHaveLength(2);
    });

    it("should raise LockHeldError while another run holds the lock", async () => {
      const holder = new MigrationLock(db.getPool(), testLogger, {
        ownerId: "long-running-deploy",
      });
      await holder.acquire();

      try {
        const run = newManager().up();
        await expect(run).rejects.toBeInstanceOf(LockHeldError);
        await expect(run).rejects.toMatchObject({
          code: "LOCK_HELD",
          holder: "long-running-deploy",
        });
        expect(await policyNames()).toHaveLength(4);
      } finally {
        await holder.release();
      }
    });
  });

  describe("drift", () => {
    it("should refuse to run when an applied unit changed", async () => {
      await newManager().up();

      const edited = [
        securityFixes[0],
        defineMigration({
          id: "002-fix-policies",
          name: "Remove duplicated public policies",
          forward: `DROP POLICY IF EXISTS "Allow public insert to financial_reports" ON financial_reports;`,
        }),
        securityFixes[2],
      ].filter((unit): unit is MigrationUnit => unit !== undefined);

      const run = newManager(edited).up();

      await expect(run).rejects.toBeInstanceOf(DriftDetectedError);
      await expect(run).rejects.toMatchObject({
        drifted: [{ unitId: "002-fix-policies" }],
      });
    });
  });

  describe("status", () => {
    it("should report pending, applied, drifted and orphaned units", async () => {
      await newManager(securityFixes.slice(0, 2)).up();
      await newManager().ledgerStore.recordApplied(
        "999-retired",
        "retired",
        new Date("2025-01-01T00:00:00.000Z"),
        { name: "Retired unit" },
      );

      const catalog = [
        securityFixes[0],
        defineMigration({
          id: "002-fix-policies",
          name: "Remove duplicated public policies",
          forward: "SELECT 1;",
        }),
        securityFixes[2],
      ].filter((unit): unit is MigrationUnit => unit !== undefined);

      const status = await newManager(catalog).status();

      expect(status.map((row) => [row.id, row.state])).toEqual([
        ["001-drop-index", "applied"],
        ["002-fix-policies", "drifted"],
        ["003-fix-function", "pending"],
        ["999-retired", "orphaned"],
      ]);
      expect(status[2]?.appliedAt).toBeNull();
      expect(status[3]?.appliedAt).toEqual(
        new Date("2025-01-01T00:00:00.000Z"),
      );
    });
  });

  describe("register", () => {
    it("should reject a catalog with duplicate ids", () => {
      const unit = securityFixes[0];
      if (!unit) {
        throw new Error("missing fixture");
      }

      expect(() => newManager([unit, unit])).toThrow(InvalidCatalogError);
    });

    it("should expose the registered catalog", () => {
      expect(newManager().catalog.map((unit) => unit.id)).toEqual([
        "001-drop-index",
        "002-fix-policies",
        "003-fix-function",
      ]);
    });
  });
});
