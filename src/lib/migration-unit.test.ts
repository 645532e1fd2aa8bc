import { createHash } from "crypto";
import { describe, it, expect } from "vitest";
import { InvalidCatalogError } from "./errors";
import {
  computeChecksum,
  defineMigration,
  validateCatalog,
} from "./migration-unit";

const sha256 = (text: string): string =>
  createHash("sha256").update(text, "utf8").digest("hex");

describe("computeChecksum", () => {
  it("should hash SQL text with SHA-256", () => {
    const sql = "DROP INDEX IF EXISTS idx_demo;";
    expect(computeChecksum(sql)).toBe(sha256(sql));
    expect(computeChecksum(sql)).toHaveLength(64);
  });

  it("should treat CRLF and LF line endings alike", () => {
    expect(computeChecksum("SELECT 1;\r\nSELECT 2;")).toBe(
      computeChecksum("SELECT 1;\nSELECT 2;"),
    );
  });

  it("should change when the SQL changes", () => {
    expect(computeChecksum("SELECT 1")).not.toBe(computeChecksum("SELECT 2"));
  });

  it("should hash the source of a function action", () => {
    const action = async (): Promise<void> => {};
    expect(computeChecksum(action)).toBe(sha256(action.toString()));
  });
});

describe("defineMigration", () => {
  it("should compute a checksum when none is given", () => {
    const unit = defineMigration({
      id: "001",
      name: "drop_index",
      forward: "DROP INDEX IF EXISTS idx_demo;",
    });

    expect(unit.checksum).toBe(sha256("DROP INDEX IF EXISTS idx_demo;"));
  });

  it("should keep an explicit checksum", () => {
    const unit = defineMigration({
      id: "001",
      name: "noop",
      forward: async () => {},
      checksum: "v1",
    });

    expect(unit.checksum).toBe("v1");
  });

  it("should return a frozen unit", () => {
    const unit = defineMigration({ id: "001", name: "a", forward: "SELECT 1" });
    expect(Object.isFrozen(unit)).toBe(true);
  });

  it("should reject an empty id", () => {
    expect(() =>
      defineMigration({ id: "  ", name: "a", forward: "SELECT 1" }),
    ).toThrow(InvalidCatalogError);
  });
});

describe("validateCatalog", () => {
  const unit = (id: string) => defineMigration({ id, name: id, forward: "SELECT 1" });

  it("should accept an empty catalog", () => {
    expect(() => validateCatalog([])).not.toThrow();
  });

  it("should accept ascending ids", () => {
    expect(() =>
      validateCatalog([unit("001"), unit("002"), unit("010")]),
    ).not.toThrow();
  });

  it("should reject duplicate ids", () => {
    expect(() => validateCatalog([unit("001"), unit("001")])).toThrow(
      "Duplicate migration IDs detected: 001",
    );
  });

  it("should reject ids out of order", () => {
    expect(() => validateCatalog([unit("002"), unit("001")])).toThrow(
      "Migrations must be ordered by ascending id: 001 follows 002",
    );
  });

  it("should compare ids as plain strings", () => {
    expect(() => validateCatalog([unit("10"), unit("9")])).not.toThrow();
    expect(() => validateCatalog([unit("9"), unit("10")])).toThrow(
      InvalidCatalogError,
    );
  });
});
